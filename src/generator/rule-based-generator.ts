/**
 * Rule-based scenario generator.
 *
 * Deterministic and offline: the story is read with regular expressions, a
 * step template is chosen by domain category (quote > login > claim > payment,
 * else a single page-load check) and the scenario is assembled around it.
 */

import type { IScenarioGenerator, IScenarioValidationResult } from './index.js';
import type { ITestResult, ITestScenario, ITestStep, ParameterMap } from '../types/index.js';
import { ACTIONS, ASSERTION_ACTIONS, GENERATED_TAG, PARAMS, TEXT_INPUT_ACTIONS } from '../constants/index.js';
import {
  createScenario,
  createStep,
  getParameterValue,
  orderedSteps,
  renumberSteps,
  validateScenario,
} from '../model/index.js';
import { ILogger } from '../infra/logger.js';
import { analyzeStory, CATEGORY_PATTERNS, type IStoryAnalysis, type StoryCategory } from './story-analysis.js';
import { buildSteps, CATEGORY_TEMPLATES } from './templates.js';

const DESCRIPTION_STORY_CHARS = 100;
const DEFAULT_STEP_TIMEOUT_MS = 30000;
const REFINE_WAIT_MS = 1000;

const VERIFICATION_ACTIONS: readonly string[] = [
  ...ASSERTION_ACTIONS,
  ACTIONS.VERIFY_ELEMENT,
  ACTIONS.VERIFY_TEXT,
  ACTIONS.VERIFY_TITLE,
  ACTIONS.VERIFY_URL,
  ACTIONS.VERIFY_STATUS_CODE,
  ACTIONS.VERIFY_BODY,
  ACTIONS.VERIFY_HEADER,
];

// Values used when the requirements name a field the scenario does not supply
const GENERATED_FIELDS: ReadonlyArray<readonly [string, RegExp, () => string | number]> = [
  ['email', /\be-?mail\b/i, () => 'test.user@example.com'],
  ['password', /\bpassword\b/i, () => 'Test-Passw0rd!'],
  ['name', /\bname\b/i, () => 'Test User'],
  ['phone', /\bphone\b/i, () => '+1-555-0100'],
  ['address', /\baddress\b/i, () => '100 Test Street'],
  ['zip', /\bzip\b|\bpostal\b/i, () => '12345'],
  ['amount', /\bamount\b/i, () => 100],
  ['date', /\bdate\b/i, () => new Date().toISOString().slice(0, 10)],
];

export function isVerificationAction(action: string): boolean {
  return VERIFICATION_ACTIONS.includes(action.toLowerCase());
}

function fieldName(target: string): string {
  const tokens = target.match(/[A-Za-z][\w-]*/g);
  return tokens ? tokens[tokens.length - 1] : target;
}

function scenarioCategory(scenario: ITestScenario): StoryCategory {
  const recorded = CATEGORY_PATTERNS.find(([category]) => category === scenario.metadata.category);
  if (recorded) {
    return recorded[0];
  }
  const byTitle = CATEGORY_PATTERNS.find(([, pattern]) => pattern.test(scenario.title));
  return byTitle ? byTitle[0] : 'generic';
}

function sameStep(a: ITestStep, b: ITestStep): boolean {
  return (
    a.action === b.action && a.target === b.target && JSON.stringify(a.parameters) === JSON.stringify(b.parameters)
  );
}

export class RuleBasedScenarioGenerator implements IScenarioGenerator {
  readonly name = 'rule-based';

  constructor(private logger?: ILogger) {}

  async generate(userStory: string, projectContext: string): Promise<ITestScenario> {
    const story = typeof userStory === 'string' ? userStory : '';
    const analysis = analyzeStory(story);

    this.logger?.debug('Story analysed', {
      category: analysis.category,
      testType: analysis.testType,
      urls: analysis.urls.length,
    });

    return this.buildScenario(story, projectContext, analysis);
  }

  private buildScenario(story: string, projectContext: string, analysis: IStoryAnalysis): ITestScenario {
    const template = CATEGORY_TEMPLATES[analysis.category];
    const tags: string[] = [analysis.category];
    if (analysis.primaryUrl) tags.push('web');
    if (analysis.testType === 'API') tags.push('api');
    tags.push(GENERATED_TAG);

    return createScenario({
      title: template.title,
      description: `Automated test generated from user story: ${story.slice(0, DESCRIPTION_STORY_CHARS)}`,
      originalUserStory: story,
      type: analysis.testType,
      status: 'Generated',
      priority: template.priority,
      steps: buildSteps(analysis.category, analysis),
      tags,
      preconditions: [...template.preconditions],
      expectedOutcomes: [...template.expectedOutcomes],
      createdBy: 'generator',
      metadata: {
        generator: this.name,
        category: analysis.category,
        projectContext: typeof projectContext === 'string' ? projectContext : '',
        urls: analysis.urls,
        actionKeywords: analysis.actionKeywords,
      },
    });
  }

  async refineSteps(steps: ITestStep[], feedback: string): Promise<ITestStep[]> {
    const text = feedback.toLowerCase();
    const source = orderedSteps(structuredClone(steps));
    const refined: ITestStep[] = [];

    source.forEach((step, index) => {
      if (text.includes('timeout') || text.includes('slow')) {
        step.timeout = (step.timeout ?? DEFAULT_STEP_TIMEOUT_MS) * 2;
      }
      if (text.includes('screenshot')) {
        step.takeScreenshot = true;
      }
      refined.push(step);

      const next = source[index + 1];
      const alreadyWaits = next !== undefined && next.action.toLowerCase() === ACTIONS.WAIT;
      if (text.includes('wait') && step.action.toLowerCase() === ACTIONS.NAVIGATE && !alreadyWaits) {
        refined.push(
          createStep({
            action: ACTIONS.WAIT,
            target: 'page',
            description: 'Wait for page to settle',
            expectedResult: 'Wait completed',
            parameters: { [PARAMS.DURATION]: REFINE_WAIT_MS },
            takeScreenshot: step.takeScreenshot,
          })
        );
      }
    });

    return renumberSteps(refined);
  }

  async analyzeFailure(result: ITestResult): Promise<string> {
    const failed = result.stepResults.filter(step => !step.passed);
    const lines = [
      `Test Status: ${result.passed ? 'PASSED' : 'FAILED'}`,
      `Duration: ${result.duration}ms`,
      `Message: ${result.message || 'None'}`,
      `Failed Steps: ${failed.length}`,
    ];

    for (const step of failed) {
      lines.push(`- ${step.stepName} (${step.action} ${step.target}): ${step.message}`);
      lines.push(`  Recommendation: ${this.recommend(step.message, step.target)}`);
    }

    if (failed.length === 0 && result.error) {
      lines.push(`Error: ${result.error.message}`);
    }

    return lines.join('\n');
  }

  private recommend(message: string, target: string): string {
    if (/not found|no element|locator|selector/i.test(message)) {
      return `Element not found: check the selector '${target}' or wait for the page to finish loading`;
    }
    if (/time(?:d)? ?out/i.test(message)) {
      return 'Timeout: raise the step timeout or add a wait before this step';
    }
    return 'Review the step message and the application logs';
  }

  async generateTestData(scenario: ITestScenario, requirements: string): Promise<ParameterMap> {
    const data: ParameterMap = structuredClone(scenario.testData);

    for (const step of orderedSteps(scenario.steps)) {
      if (!step.isEnabled) continue;

      const keys = new Set([...Object.keys(step.parameters), ...Object.keys(step.stepData)]);
      for (const key of keys) {
        const value = getParameterValue(step, key);
        if (value === undefined) continue;

        const isTypedValue = key === PARAMS.VALUE && TEXT_INPUT_ACTIONS.includes(step.action.toLowerCase());
        const name = isTypedValue ? fieldName(step.target) : key;
        if (!(name in data)) {
          data[name] = structuredClone(value);
        }
      }
    }

    for (const [name, pattern, generate] of GENERATED_FIELDS) {
      if (pattern.test(requirements) && !(name in data)) {
        data[name] = generate();
      }
    }

    return data;
  }

  async optimizeScenarios(scenarios: ITestScenario[]): Promise<ITestScenario[]> {
    return scenarios.map(scenario => {
      const kept: ITestStep[] = [];
      for (const step of orderedSteps(scenario.steps)) {
        if (!step.isEnabled) continue;
        const previous = kept[kept.length - 1];
        if (previous && sameStep(previous, step)) continue;
        kept.push(step);
      }
      return { ...structuredClone(scenario), steps: renumberSteps(structuredClone(kept)) };
    });
  }

  async suggestAdditionalTests(existing: ITestScenario[], projectContext: string): Promise<ITestScenario[]> {
    const suggestions: ITestScenario[] = [];
    const covered = new Set(existing.map(scenarioCategory));
    const hasNegative = existing.some(scenario => scenario.tags.includes('negative'));

    const login = existing.find(scenario => scenarioCategory(scenario) === 'login');
    if (login && !hasNegative) {
      suggestions.push(this.negativeLogin(login));
    }

    const contextAnalysis = analyzeStory(projectContext);
    for (const category of contextAnalysis.mentionedCategories) {
      if (!covered.has(category)) {
        suggestions.push(this.buildScenario(projectContext, projectContext, { ...contextAnalysis, category }));
      }
    }

    return suggestions;
  }

  private negativeLogin(login: ITestScenario): ITestScenario {
    const entry = orderedSteps(login.steps).find(step => step.action.toLowerCase() === ACTIONS.NAVIGATE);
    const target = entry?.target ?? CATEGORY_TEMPLATES.login.defaultPath;

    const steps = [
      createStep({
        action: ACTIONS.NAVIGATE,
        target,
        description: `Navigate to ${target}`,
        expectedResult: 'Login page loads successfully',
        parameters: { [PARAMS.URL]: target },
      }),
      createStep({
        action: ACTIONS.ENTER_TEXT,
        target: '#username',
        description: 'Enter unknown username',
        parameters: { [PARAMS.VALUE]: 'invalid@example.com' },
      }),
      createStep({
        action: ACTIONS.ENTER_TEXT,
        target: '#password',
        description: 'Enter wrong password',
        parameters: { [PARAMS.VALUE]: 'wrong-password' },
      }),
      createStep({
        action: ACTIONS.CLICK,
        target: "button[type='submit']",
        description: 'Click login button',
      }),
      createStep({
        action: ACTIONS.VERIFY,
        target: '.error-message',
        description: 'Verify login is rejected',
        expectedResult: 'An error message is shown',
        parameters: { [PARAMS.EXPECTED]: 'Invalid', [PARAMS.MODE]: 'text' },
      }),
    ];

    return createScenario({
      title: 'Login Test - Invalid Credentials',
      description: `Negative path for ${login.title}`,
      type: login.type,
      status: 'Generated',
      priority: 'High',
      environment: login.environment,
      projectId: login.projectId,
      steps: renumberSteps(steps),
      tags: ['login', 'negative', GENERATED_TAG],
      preconditions: ['Application is accessible'],
      expectedOutcomes: ['Login is rejected', 'An error message is shown'],
      createdBy: 'generator',
      metadata: { generator: this.name, category: 'login', basedOn: login.id },
    });
  }

  async validateScenario(scenario: ITestScenario): Promise<IScenarioValidationResult> {
    const issues = validateScenario(scenario);
    const suggestions: string[] = [];
    const missingCoverage: string[] = [];
    const recommendedAssertions: string[] = [];

    let qualityScore = 50;
    if (scenario.steps.length >= 3) qualityScore += 20;
    else suggestions.push('Add more steps to cover the full user flow');
    if (scenario.preconditions.length > 0) qualityScore += 10;
    else suggestions.push('Document the preconditions');
    if (scenario.expectedOutcomes.length > 0) qualityScore += 10;
    else suggestions.push('List the expected outcomes');
    if (scenario.tags.length > 0) qualityScore += 5;
    else suggestions.push('Tag the scenario for filtering');
    if (scenario.description.trim()) qualityScore += 5;
    else suggestions.push('Add a description');
    qualityScore = Math.min(100, qualityScore);

    const steps = orderedSteps(scenario.steps);
    if (!steps.some(step => isVerificationAction(step.action))) {
      missingCoverage.push('No verification step');
    }
    if (!scenario.tags.includes('negative')) {
      missingCoverage.push('No negative test path');
    }

    steps.forEach((step, index) => {
      const action = step.action.toLowerCase();
      const next = steps[index + 1];
      if (action === ACTIONS.NAVIGATE && !(next && isVerificationAction(next.action))) {
        recommendedAssertions.push(`Verify the page title after navigating to ${step.target}`);
      }
      if (action === ACTIONS.CLICK && !next) {
        recommendedAssertions.push(`Verify the outcome of '${step.description || step.target}'`);
      }
    });

    return {
      isValid: issues.length === 0,
      qualityScore,
      issues,
      suggestions,
      missingCoverage,
      recommendedAssertions,
    };
  }
}
