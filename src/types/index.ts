/**
 * Core domain types.
 * Shared vocabulary for the generator, executors, repositories and the orchestrator.
 * Timestamps are epoch milliseconds and durations are milliseconds so that every
 * object serialises to JSON without conversion.
 */

export type TestType = 'UI' | 'API' | 'Mixed' | 'Database' | 'Performance' | 'Security';

export type TestStatus = 'Draft' | 'Generated' | 'Validated' | 'Active' | 'Deprecated';

export type TestPriority = 'Low' | 'Medium' | 'High' | 'Critical';

export type TestEnvironment = 'Development' | 'Testing' | 'Staging' | 'Production';

/**
 * Any-shape value allowed in parameter, metadata and configuration maps.
 */
export type ParameterValue =
  | string
  | number
  | boolean
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export type ParameterMap = Record<string, ParameterValue>;

export interface IValidationRule {
  validationType: string; // equals, contains, regex, ...
  expectedValue: ParameterValue;
  target: string;
  errorMessage: string;
  isRequired: boolean;
}

export interface ITestStep {
  id: string;
  order: number;
  action: string;
  target: string;
  description: string;
  expectedResult: string;
  parameters: ParameterMap;
  stepData: ParameterMap; // consulted after parameters
  prerequisites: string[];
  timeout?: number;
  waitBefore?: number;
  waitAfter?: number;
  continueOnFailure: boolean;
  takeScreenshot: boolean;
  validationRules: IValidationRule[];
  isEnabled: boolean;
  tags: string[];
}

export interface ITestScenario {
  id: string;
  title: string;
  description: string;
  originalUserStory: string;
  type: TestType;
  status: TestStatus;
  priority: TestPriority;
  environment: TestEnvironment;
  projectId: string;
  steps: ITestStep[];
  tags: string[];
  preconditions: string[];
  expectedOutcomes: string[];
  createdAt: number;
  updatedAt: number;
  createdBy: string;
  timeoutDuration?: number;
  retryCount: number;
  canRunInParallel: boolean;
  metadata: ParameterMap;
  configuration: ParameterMap;
  testData: ParameterMap;
}

export interface IStepResult {
  id: string;
  stepId: string;
  stepName: string;
  action: string;
  target: string;
  passed: boolean;
  message: string;
  expectedResult: string;
  actualResult: string;
  startedAt: number;
  completedAt: number;
  duration: number;
  screenshotPath?: string;
  isRequired: boolean;
}

export interface ITestError {
  errorType: string;
  message: string;
  failedStep?: string;
}

export interface ITestResult {
  id: string;
  scenarioId: string;
  environment: TestEnvironment;
  startedAt: number;
  completedAt?: number; // set exactly once, by completeTestResult
  duration: number;
  passed: boolean;
  message: string;
  executedBy: string;
  stepResults: IStepResult[];
  screenshots: string[];
  executionTags: string[];
  retryAttempts: number;
  error?: ITestError;
}

export interface ITypeStatistics {
  scenarioCount: number;
  executionCount: number;
  passRate: number;
  averageDuration: number;
}

export interface IEnvironmentStatistics {
  executionCount: number;
  passRate: number;
  averageDuration: number;
}

export interface IDailyStatistics {
  date: string; // YYYY-MM-DD (UTC)
  executionCount: number;
  passRate: number;
  averageDuration: number;
}

export interface ITestStatistics {
  projectId: string;
  from: number;
  to: number;
  totalScenarios: number;
  totalExecutions: number;
  passedExecutions: number;
  failedExecutions: number;
  passRate: number;
  averageDuration: number;
  statsByType: Partial<Record<TestType, ITypeStatistics>>;
  statsByEnvironment: Partial<Record<TestEnvironment, IEnvironmentStatistics>>;
  dailyTrends: IDailyStatistics[];
}
