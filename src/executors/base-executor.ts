/**
 * Shared step loop for executors.
 *
 * Subclasses supply a per-run session and a step handler; this class owns
 * ordering, waits, per-step and per-scenario time limits, cancellation and
 * result bookkeeping. The session is always closed, including when the run
 * is cancelled.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ITestResult, ITestScenario, ITestStep, IStepResult, TestType } from '../types/index.js';
import type {
  ExecutorConfig,
  IExecutorCapabilities,
  IExecutorValidationResult,
  IHealthCheckResult,
  ITestExecutor,
} from './index.js';
import { ERROR_MESSAGES } from '../constants/index.js';
import {
  addStepResult,
  completeStepResult,
  completeTestResult,
  createStepResult,
  createTestResult,
  newId,
  orderedSteps,
  parameterAsNumber,
  validateScenario,
  type StepOutcome,
} from '../model/index.js';
import { ILogger } from '../infra/logger.js';
import { toError } from '../errors/index.js';

export const DEFAULT_STEP_TIMEOUT_MS = 30000;

export interface IStepContext<TSession> {
  session: TSession;
  scenario: ITestScenario;
  step: ITestStep;
  result: ITestResult;
  /** Aborts when the step runs out of time or the caller cancels. */
  signal: AbortSignal;
  /** Time budget for this step in milliseconds. */
  timeout: number;
}

export type HealthReading = Omit<IHealthCheckResult, 'responseTime' | 'checkedAt'>;

class StepTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StepTimeoutError';
  }
}

export abstract class BaseTestExecutor<TSession> implements ITestExecutor {
  abstract readonly name: string;
  protected abstract readonly supportedTypes: readonly TestType[];
  protected abstract readonly supportedActions: readonly string[];
  protected readonly supportsScreenshots: boolean = false;
  protected maxParallelExecutions = 1;
  protected defaultStepTimeout = DEFAULT_STEP_TIMEOUT_MS;
  protected config: ExecutorConfig = {};
  protected initialized = false;

  constructor(protected logger: ILogger) {}

  protected abstract openSession(scenario: ITestScenario, signal?: AbortSignal): Promise<TSession>;

  protected abstract closeSession(session: TSession): Promise<void>;

  protected abstract executeStep(context: IStepContext<TSession>): Promise<StepOutcome>;

  protected abstract checkHealth(signal?: AbortSignal): Promise<HealthReading>;

  protected async onInitialize(_config: ExecutorConfig): Promise<void> {}

  protected async onCleanup(): Promise<void> {}

  /**
   * Returns a screenshot reference for the step, when the backend can take one.
   */
  protected async captureScreenshot(_session: TSession, _scenario: ITestScenario, _step: ITestStep): Promise<string | undefined> {
    return undefined;
  }

  canExecute(testType: TestType): boolean {
    return this.supportedTypes.includes(testType);
  }

  getCapabilities(): IExecutorCapabilities {
    return {
      supportedTypes: [...this.supportedTypes],
      supportedActions: [...this.supportedActions],
      maxParallelExecutions: this.maxParallelExecutions,
      supportsScreenshots: this.supportsScreenshots,
      supportsVideoRecording: false,
    };
  }

  async initialize(config: ExecutorConfig): Promise<boolean> {
    this.config = { ...config };
    this.defaultStepTimeout = parameterAsNumber(config.defaultStepTimeout) ?? this.defaultStepTimeout;
    this.maxParallelExecutions = parameterAsNumber(config.maxParallelExecutions) ?? this.maxParallelExecutions;

    try {
      await this.onInitialize(config);
      this.initialized = true;
      this.logger.info(`Executor ${this.name} initialized`);
      return true;
    } catch (error) {
      this.logger.error(`Executor ${this.name} failed to initialize`, error);
      return false;
    }
  }

  async cleanup(): Promise<void> {
    await this.onCleanup();
    this.initialized = false;
    this.logger.info(`Executor ${this.name} cleaned up`);
  }

  async validateScenario(scenario: ITestScenario): Promise<IExecutorValidationResult> {
    const messages: string[] = [];

    if (!this.canExecute(scenario.type)) {
      messages.push(`Test type ${scenario.type} is not supported by ${this.name}`);
    }
    messages.push(...validateScenario(scenario));
    for (const step of scenario.steps) {
      if (step.isEnabled && !this.supportedActions.includes(step.action.toLowerCase())) {
        messages.push(ERROR_MESSAGES.UNSUPPORTED_ACTION(step.action, this.name));
      }
    }

    return { canExecute: messages.length === 0, messages };
  }

  async performHealthCheck(signal?: AbortSignal): Promise<IHealthCheckResult> {
    const checkedAt = Date.now();
    try {
      const reading = await this.checkHealth(signal);
      return { ...reading, responseTime: Date.now() - checkedAt, checkedAt };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      return {
        isHealthy: false,
        message: ERROR_MESSAGES.HEALTH_CHECK_FAILED(toError(error).message),
        responseTime: Date.now() - checkedAt,
        metrics: {},
        checkedAt,
      };
    }
  }

  async executeTest(scenario: ITestScenario, signal?: AbortSignal): Promise<ITestResult> {
    signal?.throwIfAborted();

    const result = createTestResult(scenario, this.name);
    result.executionTags = [...scenario.tags];
    const deadline = scenario.timeoutDuration !== undefined ? result.startedAt + scenario.timeoutDuration : undefined;

    this.logger.info(`Executing scenario ${scenario.id} with ${this.name}`, {
      scenarioId: scenario.id,
      steps: scenario.steps.length,
    });

    let session: TSession;
    try {
      session = await this.openSession(scenario, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = toError(error).message;
      this.logger.error(`Executor ${this.name} could not open a session`, error);
      addStepResult(result, this.failedSetupStep(message));
      result.error = { errorType: 'SessionError', message };
      result.message = `Session setup failed: ${message}`;
      return completeTestResult(result);
    }

    try {
      for (const step of orderedSteps(scenario.steps)) {
        if (!step.isEnabled) {
          continue;
        }
        signal?.throwIfAborted();

        if (deadline !== undefined && Date.now() >= deadline) {
          this.recordScenarioTimeout(result, step, scenario.timeoutDuration ?? 0);
          break;
        }

        const stepResult = await this.runStep({ session, scenario, step, result }, deadline, signal);
        addStepResult(result, stepResult);

        if (!stepResult.passed && stepResult.isRequired) {
          this.logger.warn(`Required step failed, stopping scenario ${scenario.id}`, {
            step: stepResult.stepName,
            message: stepResult.message,
          });
          break;
        }
      }
    } finally {
      await this.closeSessionQuietly(session);
    }

    completeTestResult(result);
    this.logger.info(`Scenario ${scenario.id} finished`, {
      passed: result.passed,
      duration: result.duration,
      executor: this.name,
    });
    return result;
  }

  private async runStep(
    base: Omit<IStepContext<TSession>, 'signal' | 'timeout'>,
    deadline: number | undefined,
    signal?: AbortSignal
  ): Promise<IStepResult> {
    const { step, scenario, result } = base;
    const stepResult = createStepResult(step);
    const stepTimeout = step.timeout ?? this.defaultStepTimeout;

    try {
      if (step.waitBefore) {
        await sleep(step.waitBefore, undefined, { signal });
      }

      const remaining = deadline !== undefined ? deadline - Date.now() : Infinity;
      const limitedByScenario = remaining < stepTimeout;
      const timeout = Math.max(1, Math.min(stepTimeout, remaining));
      const timeoutMessage = limitedByScenario
        ? ERROR_MESSAGES.SCENARIO_TIMEOUT(scenario.timeoutDuration ?? 0)
        : ERROR_MESSAGES.STEP_TIMEOUT(step.action, timeout);

      let outcome: StepOutcome;
      try {
        outcome = await this.withTimeout(
          stepSignal => this.executeStep({ ...base, signal: stepSignal, timeout }),
          timeout,
          timeoutMessage,
          signal
        );
      } catch (error) {
        if (error instanceof StepTimeoutError && limitedByScenario) {
          result.message = error.message;
        }
        throw error;
      }

      let screenshotPath = outcome.screenshotPath;
      if (!screenshotPath && step.takeScreenshot) {
        screenshotPath = await this.captureScreenshot(base.session, scenario, step);
      }

      if (step.waitAfter) {
        await sleep(step.waitAfter, undefined, { signal });
      }

      return completeStepResult(stepResult, { ...outcome, screenshotPath });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      return completeStepResult(stepResult, { passed: false, message: toError(error).message });
    }
  }

  /**
   * Runs the operation with its own abort signal that fires on timeout or
   * when the caller's signal aborts.
   */
  private async withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeout: number,
    timeoutMessage: string,
    parent?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new StepTimeoutError(timeoutMessage);
        controller.abort(error);
        reject(error);
      }, timeout);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    // Losing branches must not surface as unhandled rejections
    expired.catch(() => undefined);
    cancelled.catch(() => undefined);

    try {
      return await Promise.race([operation(controller.signal), expired, cancelled]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private recordScenarioTimeout(result: ITestResult, step: ITestStep, timeoutDuration: number): void {
    const message = ERROR_MESSAGES.SCENARIO_TIMEOUT(timeoutDuration);
    const now = Date.now();
    const record = { ...createStepResult(step, now), isRequired: true };
    addStepResult(result, completeStepResult(record, { passed: false, message }, now));
    result.message = message;
  }

  private failedSetupStep(message: string): IStepResult {
    const now = Date.now();
    return {
      id: newId('step-result'),
      stepId: 'session-setup',
      stepName: 'Session setup',
      action: 'setup',
      target: this.name,
      passed: false,
      message,
      expectedResult: 'Session opens',
      actualResult: '',
      startedAt: now,
      completedAt: now,
      duration: 0,
      isRequired: true,
    };
  }

  private async closeSessionQuietly(session: TSession): Promise<void> {
    try {
      await this.closeSession(session);
    } catch (error) {
      this.logger.warn(`Executor ${this.name} failed to close its session`, { error: toError(error).message });
    }
  }
}
