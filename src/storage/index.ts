/**
 * Persistence contract for scenarios and their results.
 * Implementations hand out copies; stored state changes only through save,
 * update, delete and archive calls. Every method rejects before doing any
 * work when its signal is already aborted.
 */

import type {
  ITestResult,
  ITestScenario,
  ITestStatistics,
  TestEnvironment,
  TestPriority,
  TestStatus,
  TestType,
} from '../types/index.js';

export type ScenarioSortField = 'createdAt' | 'updatedAt' | 'title' | 'type' | 'status' | 'priority' | 'createdBy';

export type ResultSortField = 'startedAt' | 'completedAt' | 'duration' | 'passed' | 'environment' | 'executedBy';

export interface IPaging {
  pageNumber?: number; // 1-based, default 1
  pageSize?: number; // default 50
}

export interface IScenarioSearchCriteria extends IPaging {
  projectId?: string;
  type?: TestType;
  status?: TestStatus;
  priority?: TestPriority;
  tags?: string[]; // any overlap
  createdBy?: string; // case-insensitive substring
  createdFrom?: number;
  createdTo?: number;
  searchText?: string; // title or description
  sortBy?: ScenarioSortField;
  sortDescending?: boolean; // default true
}

export interface IResultSearchCriteria extends IPaging {
  scenarioId?: string;
  projectId?: string;
  passed?: boolean;
  environment?: TestEnvironment;
  executedBy?: string; // case-insensitive substring
  executedFrom?: number;
  executedTo?: number;
  minDuration?: number;
  maxDuration?: number;
  executionTags?: string[]; // any overlap
  sortBy?: ResultSortField;
  sortDescending?: boolean; // default true
}

export interface ITestRepository {
  /**
   * Inserts or replaces the scenario, stamping updatedAt. Returns its id.
   */
  saveScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<string>;

  getScenario(id: string, signal?: AbortSignal): Promise<ITestScenario | null>;

  /**
   * Newest first by createdAt.
   */
  getScenariosByProject(projectId: string, signal?: AbortSignal): Promise<ITestScenario[]>;

  searchScenarios(criteria: IScenarioSearchCriteria, signal?: AbortSignal): Promise<ITestScenario[]>;

  /**
   * Replaces an existing scenario, stamping updatedAt. False when the id is unknown.
   */
  updateScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<boolean>;

  /**
   * Removes the scenario only; its results stay until archived.
   */
  deleteScenario(id: string, signal?: AbortSignal): Promise<boolean>;

  saveResult(result: ITestResult, signal?: AbortSignal): Promise<string>;

  getResult(id: string, signal?: AbortSignal): Promise<ITestResult | null>;

  /**
   * Newest first by startedAt.
   */
  getResults(scenarioId: string, signal?: AbortSignal): Promise<ITestResult[]>;

  searchResults(criteria: IResultSearchCriteria, signal?: AbortSignal): Promise<ITestResult[]>;

  getTestStatistics(projectId: string, from: number, to: number, signal?: AbortSignal): Promise<ITestStatistics>;

  /**
   * Removes results with startedAt < cutoff and returns how many were removed.
   */
  archiveOldResults(cutoff: number, signal?: AbortSignal): Promise<number>;
}

export * from './search.js';
export * from './statistics.js';
export * from './in-memory-repository.js';
export * from './redis-repository.js';
export * from './storage-factory.js';
