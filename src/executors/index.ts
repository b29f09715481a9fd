import type { ITestResult, ITestScenario, ParameterMap, TestType } from '../types/index.js';

export interface IExecutorCapabilities {
  supportedTypes: TestType[];
  supportedActions: string[];
  maxParallelExecutions: number;
  supportsScreenshots: boolean;
  supportsVideoRecording: boolean;
}

export interface IExecutorValidationResult {
  canExecute: boolean;
  messages: string[];
}

export interface IHealthCheckResult {
  isHealthy: boolean;
  message: string;
  responseTime: number; // milliseconds
  metrics: ParameterMap;
  checkedAt: number;
}

export type ExecutorConfig = ParameterMap;

/**
 * A backend that runs whole scenarios of the test types it declares.
 * initialize and cleanup bracket the executor's lifetime, not a single run.
 */
export interface ITestExecutor {
  readonly name: string;

  canExecute(testType: TestType): boolean;

  /**
   * Runs the scenario and returns a completed result. A failed assertion is a
   * failed step, not a rejection; rejections are reserved for faults and
   * cancellation.
   */
  executeTest(scenario: ITestScenario, signal?: AbortSignal): Promise<ITestResult>;

  /**
   * Pre-flight check, independent of execution.
   */
  validateScenario(scenario: ITestScenario): Promise<IExecutorValidationResult>;

  getCapabilities(): IExecutorCapabilities;

  performHealthCheck(signal?: AbortSignal): Promise<IHealthCheckResult>;

  /**
   * Acquires long-lived resources. Resolves false when the executor cannot be used.
   */
  initialize(config: ExecutorConfig): Promise<boolean>;

  cleanup(): Promise<void>;
}

export * from './base-executor.js';
export * from './registry.js';
export * from './ui/playwright-executor.js';
export * from './api/http-executor.js';
