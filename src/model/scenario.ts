/**
 * Scenario and step helpers: defaults, parameter lookup, structural validation
 * and cloning. Validation returns error strings rather than throwing so that
 * callers decide whether a problem blocks persistence or only gets reported.
 */

import type { ITestScenario, ITestStep, ParameterValue } from '../types/index.js';
import {
  ASSERTION_ACTIONS,
  ACTIONS,
  BODY_ACTIONS,
  ERROR_MESSAGES,
  PARAMS,
  TEXT_INPUT_ACTIONS,
} from '../constants/index.js';
import { newId } from './ids.js';

export type StepInit = Partial<ITestStep> & Pick<ITestStep, 'action' | 'target'>;

export type ScenarioInit = Partial<ITestScenario> & Pick<ITestScenario, 'title'>;

export function createStep(init: StepInit): ITestStep {
  return {
    id: newId('step'),
    order: 1,
    description: '',
    expectedResult: '',
    parameters: {},
    stepData: {},
    prerequisites: [],
    continueOnFailure: false,
    takeScreenshot: false,
    validationRules: [],
    isEnabled: true,
    tags: [],
    ...init,
  };
}

export function createScenario(init: ScenarioInit): ITestScenario {
  const now = Date.now();
  return {
    id: newId('scenario'),
    description: '',
    originalUserStory: '',
    type: 'UI',
    status: 'Draft',
    priority: 'Medium',
    environment: 'Development',
    projectId: '',
    steps: [],
    tags: [],
    preconditions: [],
    expectedOutcomes: [],
    createdAt: now,
    updatedAt: now,
    createdBy: 'system',
    retryCount: 0,
    canRunInParallel: true,
    metadata: {},
    configuration: {},
    testData: {},
    ...init,
  };
}

/**
 * Parameters win over step data.
 */
export function getParameterValue(step: ITestStep, key: string): ParameterValue | undefined {
  if (Object.prototype.hasOwnProperty.call(step.parameters, key)) {
    return step.parameters[key];
  }
  if (Object.prototype.hasOwnProperty.call(step.stepData, key)) {
    return step.stepData[key];
  }
  return undefined;
}

export function hasParameter(step: ITestStep, key: string): boolean {
  return getParameterValue(step, key) !== undefined;
}

/**
 * Renders a parameter for use as text (typed input, expected values).
 */
export function parameterAsString(value: ParameterValue | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function parameterAsNumber(value: ParameterValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function validateStep(step: ITestStep): string[] {
  const errors: string[] = [];
  const action = step.action.trim().toLowerCase();

  if (!action) {
    errors.push(ERROR_MESSAGES.ACTION_REQUIRED);
  }
  if (!step.target.trim()) {
    errors.push(ERROR_MESSAGES.TARGET_REQUIRED);
  }
  if (step.timeout !== undefined && !(step.timeout > 0)) {
    errors.push(ERROR_MESSAGES.STEP_TIMEOUT_POSITIVE);
  }
  if (step.waitBefore !== undefined && step.waitBefore < 0) {
    errors.push(ERROR_MESSAGES.WAIT_BEFORE_NEGATIVE);
  }
  if (step.waitAfter !== undefined && step.waitAfter < 0) {
    errors.push(ERROR_MESSAGES.WAIT_AFTER_NEGATIVE);
  }

  if (TEXT_INPUT_ACTIONS.includes(action) && !hasParameter(step, PARAMS.VALUE)) {
    errors.push(ERROR_MESSAGES.VALUE_REQUIRED);
  }
  if (BODY_ACTIONS.includes(action) && !hasParameter(step, PARAMS.BODY)) {
    errors.push(ERROR_MESSAGES.BODY_REQUIRED);
  }
  if (action === ACTIONS.WAIT && !hasParameter(step, PARAMS.DURATION)) {
    errors.push(ERROR_MESSAGES.DURATION_REQUIRED);
  }
  if (ASSERTION_ACTIONS.includes(action) && !hasParameter(step, PARAMS.EXPECTED)) {
    errors.push(ERROR_MESSAGES.EXPECTED_REQUIRED);
  }

  return errors;
}

export function validateScenario(scenario: ITestScenario): string[] {
  const errors: string[] = [];

  if (!scenario.title.trim()) {
    errors.push(ERROR_MESSAGES.TITLE_REQUIRED);
  }
  if (!scenario.projectId.trim()) {
    errors.push(ERROR_MESSAGES.PROJECT_REQUIRED);
  }
  if (scenario.steps.length === 0) {
    errors.push(ERROR_MESSAGES.STEPS_REQUIRED);
  }
  for (const step of scenario.steps) {
    const prefix = ERROR_MESSAGES.STEP_PREFIX(step.action);
    for (const error of validateStep(step)) {
      errors.push(prefix + error);
    }
  }
  if (scenario.timeoutDuration !== undefined && !(scenario.timeoutDuration > 0)) {
    errors.push(ERROR_MESSAGES.SCENARIO_TIMEOUT_POSITIVE);
  }
  if (scenario.retryCount < 0) {
    errors.push(ERROR_MESSAGES.RETRY_COUNT_NEGATIVE);
  }

  return errors;
}

/**
 * Steps in execution order. Ties keep their list position.
 */
export function orderedSteps(steps: readonly ITestStep[]): ITestStep[] {
  return steps
    .map((step, index) => ({ step, index }))
    .sort((a, b) => a.step.order - b.step.order || a.index - b.index)
    .map(entry => entry.step);
}

export function renumberSteps(steps: readonly ITestStep[]): ITestStep[] {
  return steps.map((step, index) => ({ ...step, order: index + 1 }));
}

/**
 * Deep copy with fresh scenario and step ids, Draft status and new timestamps.
 */
export function cloneScenario(scenario: ITestScenario, overrides: Partial<ITestScenario> = {}): ITestScenario {
  const copy = structuredClone(scenario);
  const now = Date.now();
  return {
    ...copy,
    id: newId('scenario'),
    status: 'Draft',
    createdAt: now,
    updatedAt: now,
    steps: copy.steps.map(step => ({ ...step, id: newId('step') })),
    ...overrides,
  };
}
