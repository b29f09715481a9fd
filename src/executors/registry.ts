import type { TestType } from '../types/index.js';
import type { ExecutorConfig, ITestExecutor } from './index.js';
import { ILogger } from '../infra/logger.js';

/**
 * Ordered set of initialized executors. Selection is first-registered-wins;
 * registering two executors for the same type is allowed and not reported.
 */
export class ExecutorRegistry {
  private executors: ITestExecutor[] = [];

  constructor(private logger: ILogger) {}

  /**
   * Initializes the executor and keeps it only when initialization succeeds.
   */
  async register(executor: ITestExecutor, config: ExecutorConfig = {}): Promise<boolean> {
    let initialized = false;
    try {
      initialized = await executor.initialize(config);
    } catch (error) {
      this.logger.error(`Executor ${executor.name} threw during initialization`, error);
    }

    if (!initialized) {
      this.logger.warn(`Executor ${executor.name} was not registered`);
      return false;
    }

    this.executors.push(executor);
    this.logger.info(`Registered executor ${executor.name}`, {
      position: this.executors.length,
      supportedTypes: executor.getCapabilities().supportedTypes,
    });
    return true;
  }

  select(testType: TestType): ITestExecutor | undefined {
    return this.executors.find(executor => executor.canExecute(testType));
  }

  list(): readonly ITestExecutor[] {
    return [...this.executors];
  }

  get size(): number {
    return this.executors.length;
  }

  async cleanupAll(): Promise<void> {
    const executors = this.executors;
    this.executors = [];

    for (const executor of executors) {
      try {
        await executor.cleanup();
      } catch (error) {
        this.logger.error(`Executor ${executor.name} failed to clean up`, error);
      }
    }
  }
}
