import { describe, it, expect } from 'vitest';
import {
  addStepResult,
  completeStepResult,
  completeTestResult,
  createStepResult,
  createTestResult,
  getFirstFailure,
  getSuccessRate,
  ResultAlreadyCompletedError,
} from '../result.js';
import { createStep } from '../scenario.js';

const scenario = { id: 'scenario-1', environment: 'Testing' as const };

function stepResult(description: string, passed: boolean, continueOnFailure = false) {
  const step = createStep({ action: 'click', target: '#x', description, continueOnFailure });
  return completeStepResult(createStepResult(step, 1000), { passed, message: passed ? 'ok' : 'not found' }, 1040);
}

describe('Test result lifecycle', () => {
  it('should start empty and not passed', () => {
    const result = createTestResult(scenario, 'fake-executor', 1000);

    expect(result.scenarioId).toBe('scenario-1');
    expect(result.environment).toBe('Testing');
    expect(result.stepResults).toEqual([]);
    expect(result.completedAt).toBeUndefined();
  });

  it('should time step results', () => {
    const step = stepResult('Click login', true);

    expect(step.duration).toBe(40);
    expect(step.stepName).toBe('Click login');
    expect(step.isRequired).toBe(true);
  });

  it('should pass when every required step passed', () => {
    const result = createTestResult(scenario, 'fake-executor', 1000);
    addStepResult(result, stepResult('Open page', true));
    addStepResult(result, stepResult('Optional banner', false, true));

    completeTestResult(result, 1500);

    expect(result.passed).toBe(true);
    expect(result.duration).toBe(500);
    expect(result.message).toBe('All test steps completed successfully');
  });

  it('should fail and name the first failed required step', () => {
    const result = createTestResult(scenario, 'fake-executor', 1000);
    addStepResult(result, stepResult('Open page', true));
    addStepResult(result, stepResult('Click login', false));

    completeTestResult(result, 1200);

    expect(result.passed).toBe(false);
    expect(result.message).toBe('Test failed at step: Click login');
    expect(result.error).toEqual({ errorType: 'StepFailure', message: 'not found', failedStep: 'Click login' });
    expect(getFirstFailure(result)?.stepName).toBe('Click login');
  });

  it('should keep a message the executor already set', () => {
    const result = createTestResult(scenario, 'fake-executor', 1000);
    addStepResult(result, stepResult('Click login', false));
    result.message = 'Scenario timeout of 100ms exceeded';

    completeTestResult(result, 1100);

    expect(result.message).toBe('Scenario timeout of 100ms exceeded');
  });

  it('should complete only once', () => {
    const result = createTestResult(scenario, 'fake-executor', 1000);
    completeTestResult(result, 1001);

    expect(() => completeTestResult(result, 1002)).toThrow(ResultAlreadyCompletedError);
    expect(() => addStepResult(result, stepResult('Late', true))).toThrow(ResultAlreadyCompletedError);
  });

  it('should compute the step success rate', () => {
    const result = createTestResult(scenario, 'fake-executor', 1000);
    expect(getSuccessRate(result)).toBe(0);

    addStepResult(result, stepResult('a', true));
    addStepResult(result, stepResult('b', true));
    addStepResult(result, stepResult('c', false, true));
    addStepResult(result, stepResult('d', true));

    expect(getSuccessRate(result)).toBe(75);
  });
});
