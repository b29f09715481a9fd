/**
 * StdoutReporter Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { StdoutReporter } from '../stdout-reporter.js';
import { createScenario, createStep, createStepResult, createTestResult, completeStepResult, addStepResult, completeTestResult } from '../../model/index.js';

function buildResult(outcomes: { description: string; passed: boolean; optional?: boolean; screenshotPath?: string }[]) {
  const scenario = createScenario({ title: 'Checkout', projectId: 'shop', environment: 'Staging' });
  const result = createTestResult(scenario, 'playwright', 1000);
  for (const outcome of outcomes) {
    const step = createStep({
      action: 'click',
      target: '#x',
      description: outcome.description,
      continueOnFailure: outcome.optional ?? false,
    });
    addStepResult(
      result,
      completeStepResult(
        createStepResult(step, 1000),
        { passed: outcome.passed, message: outcome.passed ? 'ok' : 'Element #x not found', screenshotPath: outcome.screenshotPath },
        1025
      )
    );
  }
  return completeTestResult(result, 1500);
}

describe('StdoutReporter', () => {
  let reporter: StdoutReporter;
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, void>;
  let originalLevel: typeof chalk.level;

  function lines(): string[] {
    return consoleLogSpy.mock.calls.map(call => String(call[0]));
  }

  beforeEach(() => {
    originalLevel = chalk.level;
    chalk.level = 0;
    reporter = new StdoutReporter();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    chalk.level = originalLevel;
  });

  it('should report a passing result', async () => {
    const result = buildResult([{ description: 'Open cart', passed: true }]);

    await reporter.report(result, 'Checkout');

    expect(lines()).toContain('Scenario:    Checkout');
    expect(lines()).toContain(`Scenario ID: ${result.scenarioId}`);
    expect(lines()).toContain('Executor:    playwright');
    expect(lines()).toContain('Environment: Staging');
    expect(lines()).toContain('Duration:    500ms');
    expect(lines()).toContain('  1. ✓ Open cart [25ms]');
    expect(lines()).toContain('All test steps completed successfully');
    expect(lines()).toContain('FINAL STATUS: PASSED');
  });

  it('should show failed steps with their message', async () => {
    const result = buildResult([
      { description: 'Dismiss banner', passed: false, optional: true },
      { description: 'Pay', passed: false, screenshotPath: 'screenshots/pay.png' },
    ]);

    await reporter.report(result);

    expect(lines()).toContain('  1. ✗ Dismiss banner (optional) [25ms]');
    expect(lines()).toContain('  2. ✗ Pay [25ms]');
    expect(lines()).toContain('     Element #x not found');
    expect(lines()).toContain('     Screenshot: screenshots/pay.png');
    expect(lines()).toContain('Test failed at step: Pay');
    expect(lines()).toContain('FINAL STATUS: FAILED');
  });

  it('should mention retries only when there were some', async () => {
    const result = buildResult([{ description: 'Open cart', passed: true }]);

    await reporter.report(result);
    expect(lines().some(line => line.startsWith('Retries:'))).toBe(false);

    consoleLogSpy.mockClear();
    await reporter.report({ ...result, retryAttempts: 2 });
    expect(lines()).toContain('Retries:     2');
  });
});
