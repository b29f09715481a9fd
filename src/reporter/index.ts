import type { ITestResult } from '../types/index.js';

/**
 * Reporter responsible for presenting the result of a test execution.
 */
export interface IReporter {
  /**
   * @param title Scenario title shown in the header, when known.
   */
  report(result: ITestResult, title?: string): Promise<void>;
}

export * from './stdout-reporter.js';
