import { createTestAutomation } from './index.js';
import { StdoutReporter } from './reporter/index.js';

const STORY =
  'As a visitor, I want to open https://example.com so that I can verify the page shows "Example Domain"';

async function main(): Promise<void> {
  const automation = await createTestAutomation();
  const { orchestrator, repository } = automation;

  try {
    const scenarioId = await orchestrator.createFromUserStory(STORY, 'example-project', 'Public demo site');
    const scenario = await repository.getScenario(scenarioId);
    console.log(`Generated scenario ${scenarioId} with ${scenario?.steps.length ?? 0} steps`);

    const result = await orchestrator.executeTest(scenarioId);
    await new StdoutReporter().report(result, scenario?.title);

    if (!result.passed) {
      console.log(await orchestrator.analyzeFailure(scenarioId));
    }
  } finally {
    await automation.close();
  }
}

console.log('Starting story-driven test run...');
main()
  .then(() => console.log('Execution finished.'))
  .catch(err => {
    console.error('Execution failed:', err);
    process.exitCode = 1;
  });
