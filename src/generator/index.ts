import type { ITestResult, ITestScenario, ITestStep, ParameterMap } from '../types/index.js';

export interface IScenarioValidationResult {
  isValid: boolean;
  qualityScore: number; // 0-100
  issues: string[];
  suggestions: string[];
  missingCoverage: string[];
  recommendedAssertions: string[];
}

/**
 * Turns user stories into scenarios and assists with their upkeep.
 * Implementations may be local (rule-based) or backed by a language model.
 */
export interface IScenarioGenerator {
  readonly name: string;

  /** Never rejects for a string input; degrades to a single verification step. */
  generate(userStory: string, projectContext: string, signal?: AbortSignal): Promise<ITestScenario>;

  refineSteps(steps: ITestStep[], feedback: string, signal?: AbortSignal): Promise<ITestStep[]>;

  analyzeFailure(result: ITestResult, signal?: AbortSignal): Promise<string>;

  generateTestData(scenario: ITestScenario, requirements: string, signal?: AbortSignal): Promise<ParameterMap>;

  optimizeScenarios(scenarios: ITestScenario[], signal?: AbortSignal): Promise<ITestScenario[]>;

  suggestAdditionalTests(
    existing: ITestScenario[],
    projectContext: string,
    signal?: AbortSignal
  ): Promise<ITestScenario[]>;

  validateScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<IScenarioValidationResult>;
}

export * from './story-analysis.js';
export * from './rule-based-generator.js';
export * from './llm-generator.js';
