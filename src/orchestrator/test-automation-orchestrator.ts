/**
 * Test Automation Orchestrator
 * Coordinates the generator, repository and executors behind the public
 * create / execute / report operations.
 */

import type { ITestResult, ITestScenario, ITestStatistics, ParameterMap } from '../types/index.js';
import type { IScenarioGenerator, IScenarioValidationResult } from '../generator/index.js';
import type { ExecutorConfig, IExecutorValidationResult, IHealthCheckResult, ITestExecutor } from '../executors/index.js';
import { ExecutorRegistry } from '../executors/registry.js';
import type { IResultSearchCriteria, IScenarioSearchCriteria, ITestRepository } from '../storage/index.js';
import { cloneScenario, validateScenario } from '../model/index.js';
import { ERROR_MESSAGES } from '../constants/index.js';
import {
  BatchExecutionError,
  ExecutionError,
  GenerationError,
  NoExecutorError,
  NotFoundError,
  PersistenceError,
  TestAutomationError,
  ValidationError,
  toError,
  type IBatchFailure,
} from '../errors/index.js';
import { RetryStrategy } from '../infra/retry-utils.js';
import { Semaphore, mapWithConcurrency } from '../infra/semaphore.js';
import type { BackoffType } from '../infra/config.js';
import { ILogger } from '../infra/logger.js';

export const NO_FAILURES_MESSAGE = 'No failures to analyze';

export interface IOrchestratorOptions {
  /** Default bound for executeTestsParallel. */
  maxConcurrency?: number;
  healthCheckConcurrency?: number;
  retryBackoff?: BackoffType;
  retryInitialDelayMs?: number;
  retryStrategy?: RetryStrategy;
}

/**
 * Only the caller's own signal makes a failure a cancellation; a timeout
 * raised inside an executor or repository is an ordinary fault.
 */
function isCancellation(signal?: AbortSignal): boolean {
  return signal?.aborted === true;
}

export class TestAutomationOrchestrator {
  private maxConcurrency: number;
  private healthCheckConcurrency: number;
  private retryBackoff: BackoffType;
  private retryInitialDelayMs: number;
  private retryStrategy: RetryStrategy;

  constructor(
    private generator: IScenarioGenerator,
    private repository: ITestRepository,
    private registry: ExecutorRegistry,
    private logger: ILogger,
    options: IOrchestratorOptions = {}
  ) {
    this.maxConcurrency = options.maxConcurrency ?? 3;
    this.healthCheckConcurrency = options.healthCheckConcurrency ?? 4;
    this.retryBackoff = options.retryBackoff ?? 'none';
    this.retryInitialDelayMs = options.retryInitialDelayMs ?? 0;
    this.retryStrategy = options.retryStrategy ?? new RetryStrategy(logger);
  }

  /**
   * Generates a scenario from the story, stamps the project and saves it.
   * Returns the new scenario id.
   */
  async createFromUserStory(
    userStory: string,
    projectId: string,
    projectContext: string = '',
    signal?: AbortSignal
  ): Promise<string> {
    this.logger.info('Generating test scenario from user story', { projectId, generator: this.generator.name });

    const generated = await this.callGenerator('generate', () =>
      this.generator.generate(userStory, projectContext, signal), signal);
    const scenario: ITestScenario = { ...generated, projectId };

    const errors = validateScenario(scenario);
    if (errors.length > 0) {
      this.logger.warn('Generated scenario failed validation', { projectId, errors });
      throw new ValidationError(`Generated scenario is invalid: ${errors.join('; ')}`, errors);
    }

    const scenarioId = await this.persist('save scenario', () => this.repository.saveScenario(scenario, signal), signal);
    this.logger.info(`Test scenario ${scenarioId} created`, { scenarioId, projectId, steps: scenario.steps.length });
    return scenarioId;
  }

  /**
   * Runs the scenario on the first capable executor. A failed result is
   * retried up to retryCount times; only the last attempt is kept.
   */
  async executeTest(scenarioId: string, signal?: AbortSignal): Promise<ITestResult> {
    const scenario = await this.loadScenario(scenarioId, signal);

    const errors = validateScenario(scenario);
    if (errors.length > 0) {
      throw new ValidationError(`Scenario ${scenarioId} is invalid: ${errors.join('; ')}`, errors);
    }

    const executor = this.selectExecutor(scenario);
    const log = this.logger.child({ scenarioId, executor: executor.name });
    log.info(`Executing test scenario ${scenarioId}`, { retryCount: scenario.retryCount });

    const { value: result, attempts } = await this.retryStrategy.executeWithAttempts(
      attempt => this.runOnce(executor, scenario, attempt, log, signal),
      {
        maxRetries: scenario.retryCount,
        backoff: this.retryBackoff,
        initialDelay: this.retryInitialDelayMs,
        retryOnError: false,
        shouldRetryResult: attemptResult => !attemptResult.passed,
        signal,
      }
    );
    result.retryAttempts = attempts - 1;

    await this.persist('save result', () => this.repository.saveResult(result, signal), signal);
    log.info(`Test scenario ${scenarioId} execution completed`, {
      resultId: result.id,
      passed: result.passed,
      attempts,
      duration: result.duration,
    });
    return result;
  }

  /**
   * Executes every id with at most maxConcurrency runs in flight. Results
   * follow input order. When any run fails, a BatchExecutionError carrying
   * the successful results is thrown once all runs have settled.
   */
  async executeTestsParallel(
    scenarioIds: string[],
    maxConcurrency: number = this.maxConcurrency,
    signal?: AbortSignal
  ): Promise<ITestResult[]> {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ValidationError('maxConcurrency must be an integer of at least 1', [
        `maxConcurrency was ${maxConcurrency}`,
      ]);
    }

    this.logger.info('Executing scenarios in parallel', { count: scenarioIds.length, maxConcurrency });
    const semaphore = new Semaphore(maxConcurrency);
    const settled = await Promise.allSettled(
      scenarioIds.map(id => semaphore.run(() => this.executeTest(id, signal)))
    );

    const results: ITestResult[] = [];
    const failures: IBatchFailure[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        failures.push({ scenarioId: scenarioIds[index], error: toError(outcome.reason) });
      }
    });

    signal?.throwIfAborted();
    if (failures.length > 0) {
      this.logger.warn('Parallel execution finished with failures', {
        failed: failures.map(failure => failure.scenarioId),
        succeeded: results.length,
      });
      throw new BatchExecutionError(
        `${failures.length} of ${scenarioIds.length} executions failed`,
        results,
        failures
      );
    }
    return results;
  }

  async getProjectTests(projectId: string, signal?: AbortSignal): Promise<ITestScenario[]> {
    return this.persist('load project scenarios', () => this.repository.getScenariosByProject(projectId, signal), signal);
  }

  async getTestStatistics(projectId: string, from: number, to: number, signal?: AbortSignal): Promise<ITestStatistics> {
    return this.persist('compute statistics', () => this.repository.getTestStatistics(projectId, from, to, signal), signal);
  }

  async getTestHistory(scenarioId: string, signal?: AbortSignal): Promise<ITestResult[]> {
    return this.persist('load results', () => this.repository.getResults(scenarioId, signal), signal);
  }

  async searchTests(criteria: IScenarioSearchCriteria, signal?: AbortSignal): Promise<ITestScenario[]> {
    return this.persist('search scenarios', () => this.repository.searchScenarios(criteria, signal), signal);
  }

  async searchResults(criteria: IResultSearchCriteria, signal?: AbortSignal): Promise<ITestResult[]> {
    return this.persist('search results', () => this.repository.searchResults(criteria, signal), signal);
  }

  /**
   * Health of every registered executor, keyed by name. Checks run
   * concurrently; a check that throws is reported as unhealthy.
   */
  async getExecutorHealthStatus(signal?: AbortSignal): Promise<Record<string, IHealthCheckResult>> {
    const executors = this.registry.list();
    const entries = await mapWithConcurrency(executors, this.healthCheckConcurrency, async executor => {
      try {
        return [executor.name, await executor.performHealthCheck(signal)] as const;
      } catch (error) {
        if (isCancellation(signal)) {
          throw error;
        }
        this.logger.warn(`Health check of ${executor.name} threw`, { error: toError(error).message });
        const unhealthy: IHealthCheckResult = {
          isHealthy: false,
          message: ERROR_MESSAGES.HEALTH_CHECK_FAILED(toError(error).message),
          responseTime: 0,
          metrics: {},
          checkedAt: Date.now(),
        };
        return [executor.name, unhealthy] as const;
      }
    });
    return Object.fromEntries(entries);
  }

  /**
   * Explains the latest result of the scenario when it failed.
   */
  async analyzeFailure(scenarioId: string, signal?: AbortSignal): Promise<string> {
    const [latest] = await this.getTestHistory(scenarioId, signal);
    if (!latest || latest.passed) {
      return NO_FAILURES_MESSAGE;
    }
    return this.callGenerator('analyze failure', () => this.generator.analyzeFailure(latest, signal), signal);
  }

  async refineTestScenario(scenarioId: string, feedback: string, signal?: AbortSignal): Promise<ITestScenario> {
    const scenario = await this.loadScenario(scenarioId, signal);
    const steps = await this.callGenerator('refine steps', () =>
      this.generator.refineSteps(scenario.steps, feedback, signal), signal);

    const refined: ITestScenario = { ...scenario, steps, status: 'Active' };
    const errors = validateScenario(refined);
    if (errors.length > 0) {
      throw new ValidationError(`Refined scenario ${scenarioId} is invalid: ${errors.join('; ')}`, errors);
    }

    await this.persist('update scenario', () => this.repository.updateScenario(refined, signal), signal);
    this.logger.info(`Refined test scenario ${scenarioId}`, { scenarioId, steps: steps.length });
    return refined;
  }

  async generateTestData(scenarioId: string, requirements: string, signal?: AbortSignal): Promise<ParameterMap> {
    const scenario = await this.loadScenario(scenarioId, signal);
    return this.callGenerator('generate test data', () =>
      this.generator.generateTestData(scenario, requirements, signal), signal);
  }

  async validateTestScenario(scenarioId: string, signal?: AbortSignal): Promise<IScenarioValidationResult> {
    const scenario = await this.loadScenario(scenarioId, signal);
    return this.callGenerator('validate scenario', () => this.generator.validateScenario(scenario, signal), signal);
  }

  /**
   * Asks the executor that would run the scenario whether it can.
   */
  async preflightTest(scenarioId: string, signal?: AbortSignal): Promise<IExecutorValidationResult> {
    const scenario = await this.loadScenario(scenarioId, signal);
    return this.selectExecutor(scenario).validateScenario(scenario);
  }

  /**
   * Suggested scenarios are returned as drafts for the project, not saved.
   */
  async suggestAdditionalTests(projectId: string, projectContext: string, signal?: AbortSignal): Promise<ITestScenario[]> {
    const existing = await this.getProjectTests(projectId, signal);
    const suggestions = await this.callGenerator('suggest tests', () =>
      this.generator.suggestAdditionalTests(existing, projectContext, signal), signal);
    return suggestions.map(suggestion => ({ ...suggestion, projectId, status: 'Draft' as const }));
  }

  async optimizeTestScenarios(projectId: string, signal?: AbortSignal): Promise<ITestScenario[]> {
    const scenarios = await this.getProjectTests(projectId, signal);
    const optimized = await this.callGenerator('optimize scenarios', () =>
      this.generator.optimizeScenarios(scenarios, signal), signal);

    for (const scenario of optimized) {
      await this.persist('update scenario', () => this.repository.updateScenario(scenario, signal), signal);
    }
    this.logger.info('Optimized project scenarios', { projectId, count: optimized.length });
    return optimized;
  }

  async deleteTestScenario(scenarioId: string, signal?: AbortSignal): Promise<boolean> {
    this.logger.info(`Deleting test scenario ${scenarioId}`, { scenarioId });
    return this.persist('delete scenario', () => this.repository.deleteScenario(scenarioId, signal), signal);
  }

  /**
   * Saves a draft copy with fresh ids. Returns the copy's id.
   */
  async cloneTestScenario(scenarioId: string, newTitle: string = '', signal?: AbortSignal): Promise<string> {
    const original = await this.loadScenario(scenarioId, signal);
    const clone = cloneScenario(original, { title: newTitle.trim() || `${original.title} (Copy)` });

    const cloneId = await this.persist('save scenario', () => this.repository.saveScenario(clone, signal), signal);
    this.logger.info(`Cloned test scenario ${scenarioId} to ${cloneId}`, { scenarioId, cloneId });
    return cloneId;
  }

  async archiveOldResults(cutoff: number, signal?: AbortSignal): Promise<number> {
    const archived = await this.persist('archive results', () => this.repository.archiveOldResults(cutoff, signal), signal);
    this.logger.info('Archived old results', { cutoff, archived });
    return archived;
  }

  registerExecutor(executor: ITestExecutor, config: ExecutorConfig = {}): Promise<boolean> {
    return this.registry.register(executor, config);
  }

  async shutdown(): Promise<void> {
    await this.registry.cleanupAll();
    this.logger.info('Orchestrator shut down');
  }

  private async runOnce(
    executor: ITestExecutor,
    scenario: ITestScenario,
    attempt: number,
    log: ILogger,
    signal?: AbortSignal
  ): Promise<ITestResult> {
    let result: ITestResult;
    try {
      result = await executor.executeTest(scenario, signal);
    } catch (error) {
      if (isCancellation(signal)) {
        throw error;
      }
      log.error(`Executor ${executor.name} failed on scenario ${scenario.id}`, error);
      throw new ExecutionError(`Executor ${executor.name} failed: ${toError(error).message}`, toError(error));
    }

    if (result.completedAt === undefined) {
      throw new ExecutionError(`Executor ${executor.name} returned an unfinished result for scenario ${scenario.id}`);
    }
    if (!result.passed) {
      log.warn(`Attempt ${attempt} of scenario ${scenario.id} failed`, { message: result.message });
    }
    return result;
  }

  private selectExecutor(scenario: ITestScenario): ITestExecutor {
    const executor = this.registry.select(scenario.type);
    if (!executor) {
      throw new NoExecutorError(ERROR_MESSAGES.NO_EXECUTOR(scenario.type), scenario.type);
    }
    return executor;
  }

  private async loadScenario(scenarioId: string, signal?: AbortSignal): Promise<ITestScenario> {
    const scenario = await this.persist('load scenario', () => this.repository.getScenario(scenarioId, signal), signal);
    if (!scenario) {
      throw new NotFoundError(ERROR_MESSAGES.SCENARIO_NOT_FOUND(scenarioId), scenarioId);
    }
    return scenario;
  }

  /**
   * Runs a repository call, surfacing unexpected failures as PersistenceError.
   */
  private async persist<T>(operation: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof TestAutomationError || isCancellation(signal)) {
        throw error;
      }
      this.logger.error(`Repository failed to ${operation}`, error);
      throw new PersistenceError(`Failed to ${operation}: ${toError(error).message}`, toError(error));
    }
  }

  private async callGenerator<T>(operation: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof TestAutomationError || isCancellation(signal)) {
        throw error;
      }
      this.logger.error(`Generator ${this.generator.name} failed to ${operation}`, error);
      throw new GenerationError(`Failed to ${operation}: ${toError(error).message}`, toError(error));
    }
  }
}
