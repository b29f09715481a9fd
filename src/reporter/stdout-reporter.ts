import { IReporter } from './index.js';
import type { ITestResult } from '../types/index.js';
import chalk from 'chalk';

export class StdoutReporter implements IReporter {
  async report(result: ITestResult, title?: string): Promise<void> {
    console.log('\n' + chalk.bold.blue('=== TEST REPORT ==='));
    if (title) {
      console.log(`Scenario:    ${title}`);
    }
    console.log(`Scenario ID: ${result.scenarioId}`);
    console.log(`Result ID:   ${result.id}`);
    console.log(`Executor:    ${result.executedBy}`);
    console.log(`Environment: ${result.environment}`);
    console.log(`Duration:    ${result.duration}ms`);
    if (result.retryAttempts > 0) {
      console.log(`Retries:     ${result.retryAttempts}`);
    }
    console.log('---------------------------');

    console.log(chalk.bold('Steps:'));
    result.stepResults.forEach((step, i) => {
      const statusColor = step.passed ? chalk.green : step.isRequired ? chalk.red : chalk.yellow;
      const icon = step.passed ? '✓' : '✗';
      const optional = step.isRequired ? '' : ' (optional)';
      console.log(`  ${i + 1}. ${statusColor(icon)} ${step.stepName}${optional} [${step.duration}ms]`);
      if (!step.passed) {
        console.log(`     ${chalk.dim(step.message)}`);
      }
      if (step.screenshotPath) {
        console.log(`     Screenshot: ${step.screenshotPath}`);
      }
    });

    console.log('---------------------------');
    console.log(result.message);
    if (result.passed) {
      console.log(chalk.bold.green('FINAL STATUS: PASSED'));
    } else {
      console.log(chalk.bold.red('FINAL STATUS: FAILED'));
    }
    console.log(chalk.bold.blue('===================') + '\n');
  }
}
