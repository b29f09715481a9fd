/**
 * Execution records. A result is created empty when a run starts, receives one
 * step result per executed step and is completed exactly once.
 */

import type { IStepResult, ITestResult, ITestScenario, ITestStep } from '../types/index.js';
import { newId } from './ids.js';

export class ResultAlreadyCompletedError extends Error {
  constructor(resultId: string) {
    super(`Result ${resultId} is already completed`);
    this.name = 'ResultAlreadyCompletedError';
  }
}

export const ALL_STEPS_PASSED_MESSAGE = 'All test steps completed successfully';

export function createTestResult(
  scenario: Pick<ITestScenario, 'id' | 'environment'>,
  executedBy: string,
  startedAt: number = Date.now()
): ITestResult {
  return {
    id: newId('result'),
    scenarioId: scenario.id,
    environment: scenario.environment,
    startedAt,
    duration: 0,
    passed: false,
    message: '',
    executedBy,
    stepResults: [],
    screenshots: [],
    executionTags: [],
    retryAttempts: 0,
  };
}

export function createStepResult(step: ITestStep, startedAt: number = Date.now()): IStepResult {
  return {
    id: newId('step-result'),
    stepId: step.id,
    stepName: step.description || step.action,
    action: step.action,
    target: step.target,
    passed: false,
    message: '',
    expectedResult: step.expectedResult,
    actualResult: '',
    startedAt,
    completedAt: startedAt,
    duration: 0,
    isRequired: !step.continueOnFailure,
  };
}

export interface StepOutcome {
  passed: boolean;
  message: string;
  actualResult?: string;
  screenshotPath?: string;
}

export function completeStepResult(
  stepResult: IStepResult,
  outcome: StepOutcome,
  completedAt: number = Date.now()
): IStepResult {
  return {
    ...stepResult,
    passed: outcome.passed,
    message: outcome.message,
    actualResult: outcome.actualResult ?? stepResult.actualResult,
    screenshotPath: outcome.screenshotPath ?? stepResult.screenshotPath,
    completedAt,
    duration: Math.max(0, completedAt - stepResult.startedAt),
  };
}

export function addStepResult(result: ITestResult, stepResult: IStepResult): void {
  if (result.completedAt !== undefined) {
    throw new ResultAlreadyCompletedError(result.id);
  }
  result.stepResults.push(stepResult);
  if (stepResult.screenshotPath) {
    result.screenshots.push(stepResult.screenshotPath);
  }
}

export function getFirstFailure(result: ITestResult): IStepResult | undefined {
  return result.stepResults.find(step => !step.passed && step.isRequired);
}

export function isCompleted(result: ITestResult): boolean {
  return result.completedAt !== undefined;
}

/**
 * Finalises the result: passed iff every required step passed.
 * An executor-provided message on a failed result is kept.
 */
export function completeTestResult(result: ITestResult, completedAt: number = Date.now()): ITestResult {
  if (result.completedAt !== undefined) {
    throw new ResultAlreadyCompletedError(result.id);
  }

  const firstFailure = getFirstFailure(result);
  result.completedAt = Math.max(completedAt, result.startedAt);
  result.duration = result.completedAt - result.startedAt;
  result.passed = firstFailure === undefined;

  if (result.passed) {
    result.message = ALL_STEPS_PASSED_MESSAGE;
  } else if (!result.message) {
    result.message = firstFailure ? `Test failed at step: ${firstFailure.stepName}` : 'Test failed';
  }
  if (firstFailure && !result.error) {
    result.error = { errorType: 'StepFailure', message: firstFailure.message, failedStep: firstFailure.stepName };
  }

  return result;
}

/**
 * Percentage of step results that passed, 0 when there are none.
 */
export function getSuccessRate(result: ITestResult): number {
  if (result.stepResults.length === 0) {
    return 0;
  }
  const passed = result.stepResults.filter(step => step.passed).length;
  return (passed / result.stepResults.length) * 100;
}

