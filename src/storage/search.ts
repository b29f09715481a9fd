import type { ITestResult, ITestScenario } from '../types/index.js';
import { DEFAULT_PAGE_SIZE } from '../constants/index.js';
import { ValidationError } from '../errors/index.js';
import type {
  IPaging,
  IResultSearchCriteria,
  IScenarioSearchCriteria,
  ResultSortField,
  ScenarioSortField,
} from './index.js';

type SortKey = string | number | boolean;

function containsIgnoreCase(value: string, fragment: string): boolean {
  return value.toLowerCase().includes(fragment.toLowerCase());
}

function overlaps(values: readonly string[], wanted: readonly string[] | undefined): boolean {
  return !wanted || wanted.length === 0 || values.some(value => wanted.includes(value));
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (typeof a === 'string' && typeof b === 'string') {
    return a.localeCompare(b);
  }
  return Number(a) - Number(b);
}

function sortBy<T>(items: T[], key: (item: T) => SortKey, descending: boolean): T[] {
  const direction = descending ? -1 : 1;
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => direction * compareKeys(key(a.item), key(b.item)) || a.index - b.index)
    .map(entry => entry.item);
}

/**
 * Resolves paging defaults and rejects values below 1.
 */
export function resolvePaging(paging: IPaging): { pageNumber: number; pageSize: number } {
  const pageNumber = paging.pageNumber ?? 1;
  const pageSize = paging.pageSize ?? DEFAULT_PAGE_SIZE;
  const errors: string[] = [];

  if (!Number.isInteger(pageNumber) || pageNumber < 1) {
    errors.push('pageNumber must be an integer of at least 1');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    errors.push('pageSize must be an integer of at least 1');
  }
  if (errors.length > 0) {
    throw new ValidationError('Invalid paging', errors);
  }

  return { pageNumber, pageSize };
}

function page<T>(items: T[], paging: IPaging): T[] {
  const { pageNumber, pageSize } = resolvePaging(paging);
  const start = (pageNumber - 1) * pageSize;
  return items.slice(start, start + pageSize);
}

const SCENARIO_SORT_KEYS: Record<ScenarioSortField, (scenario: ITestScenario) => SortKey> = {
  createdAt: s => s.createdAt,
  updatedAt: s => s.updatedAt,
  title: s => s.title,
  type: s => s.type,
  status: s => s.status,
  priority: s => s.priority,
  createdBy: s => s.createdBy,
};

const RESULT_SORT_KEYS: Record<ResultSortField, (result: ITestResult) => SortKey> = {
  startedAt: r => r.startedAt,
  completedAt: r => r.completedAt ?? 0,
  duration: r => r.duration,
  passed: r => r.passed,
  environment: r => r.environment,
  executedBy: r => r.executedBy,
};

export function matchesScenario(scenario: ITestScenario, criteria: IScenarioSearchCriteria): boolean {
  const { projectId, type, status, priority, tags, createdBy, createdFrom, createdTo, searchText } = criteria;

  return (
    (!projectId || scenario.projectId === projectId) &&
    (!type || scenario.type === type) &&
    (!status || scenario.status === status) &&
    (!priority || scenario.priority === priority) &&
    overlaps(scenario.tags, tags) &&
    (!createdBy || containsIgnoreCase(scenario.createdBy, createdBy)) &&
    (createdFrom === undefined || scenario.createdAt >= createdFrom) &&
    (createdTo === undefined || scenario.createdAt <= createdTo) &&
    (!searchText ||
      containsIgnoreCase(scenario.title, searchText) ||
      containsIgnoreCase(scenario.description, searchText))
  );
}

/**
 * Filters, sorts (createdAt descending by default) and pages scenarios.
 */
export function searchScenarioList(scenarios: ITestScenario[], criteria: IScenarioSearchCriteria): ITestScenario[] {
  resolvePaging(criteria);
  const matched = scenarios.filter(scenario => matchesScenario(scenario, criteria));
  const sorted = sortBy(matched, SCENARIO_SORT_KEYS[criteria.sortBy ?? 'createdAt'], criteria.sortDescending ?? true);
  return page(sorted, criteria);
}

/**
 * projectScenarioIds must be given when criteria.projectId is set; results
 * belong to a project through their scenario.
 */
export function matchesResult(
  result: ITestResult,
  criteria: IResultSearchCriteria,
  projectScenarioIds?: ReadonlySet<string>
): boolean {
  const { scenarioId, projectId, passed, environment, executedBy, executedFrom, executedTo, minDuration, maxDuration } =
    criteria;

  return (
    (!scenarioId || result.scenarioId === scenarioId) &&
    (!projectId || (projectScenarioIds?.has(result.scenarioId) ?? false)) &&
    (passed === undefined || result.passed === passed) &&
    (!environment || result.environment === environment) &&
    (!executedBy || containsIgnoreCase(result.executedBy, executedBy)) &&
    (executedFrom === undefined || result.startedAt >= executedFrom) &&
    (executedTo === undefined || result.startedAt <= executedTo) &&
    (minDuration === undefined || result.duration >= minDuration) &&
    (maxDuration === undefined || result.duration <= maxDuration) &&
    overlaps(result.executionTags, criteria.executionTags)
  );
}

export function searchResultList(
  results: ITestResult[],
  criteria: IResultSearchCriteria,
  projectScenarioIds?: ReadonlySet<string>
): ITestResult[] {
  resolvePaging(criteria);
  const matched = results.filter(result => matchesResult(result, criteria, projectScenarioIds));
  const sorted = sortBy(matched, RESULT_SORT_KEYS[criteria.sortBy ?? 'startedAt'], criteria.sortDescending ?? true);
  return page(sorted, criteria);
}

export function newestScenariosFirst(scenarios: ITestScenario[]): ITestScenario[] {
  return sortBy(scenarios, s => s.createdAt, true);
}

export function newestResultsFirst(results: ITestResult[]): ITestResult[] {
  return sortBy(results, r => r.startedAt, true);
}
