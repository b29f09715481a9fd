import type {
  IDailyStatistics,
  IEnvironmentStatistics,
  ITestResult,
  ITestScenario,
  ITestStatistics,
  ITypeStatistics,
  TestEnvironment,
  TestType,
} from '../types/index.js';

interface Aggregate {
  executionCount: number;
  passRate: number;
  averageDuration: number;
}

function aggregate(results: readonly ITestResult[]): Aggregate {
  if (results.length === 0) {
    return { executionCount: 0, passRate: 0, averageDuration: 0 };
  }
  const passed = results.filter(result => result.passed).length;
  const totalDuration = results.reduce((sum, result) => sum + result.duration, 0);
  return {
    executionCount: results.length,
    passRate: (passed / results.length) * 100,
    averageDuration: totalDuration / results.length,
  };
}

function groupBy<T, K>(items: readonly T[], key: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

/**
 * Calendar day of an epoch-ms timestamp, in UTC.
 */
export function utcDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Project statistics over the results whose startedAt lies in [from, to].
 * Pass rates are percentages; averages are milliseconds. Both are 0 for
 * empty sets.
 */
export function computeStatistics(
  projectId: string,
  allScenarios: readonly ITestScenario[],
  allResults: readonly ITestResult[],
  from: number,
  to: number
): ITestStatistics {
  const scenarios = allScenarios.filter(scenario => scenario.projectId === projectId);
  const scenarioTypes = new Map(scenarios.map(scenario => [scenario.id, scenario.type]));
  const results = allResults.filter(
    result => scenarioTypes.has(result.scenarioId) && result.startedAt >= from && result.startedAt <= to
  );
  const overall = aggregate(results);
  const passedExecutions = results.filter(result => result.passed).length;

  const statsByType: Partial<Record<TestType, ITypeStatistics>> = {};
  for (const [type, typeScenarios] of groupBy(scenarios, scenario => scenario.type)) {
    statsByType[type] = {
      scenarioCount: typeScenarios.length,
      ...aggregate(results.filter(result => scenarioTypes.get(result.scenarioId) === type)),
    };
  }

  const statsByEnvironment: Partial<Record<TestEnvironment, IEnvironmentStatistics>> = {};
  for (const [environment, environmentResults] of groupBy(results, result => result.environment)) {
    statsByEnvironment[environment] = aggregate(environmentResults);
  }

  const dailyTrends: IDailyStatistics[] = [...groupBy(results, result => utcDay(result.startedAt))]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, dayResults]) => ({ date, ...aggregate(dayResults) }));

  return {
    projectId,
    from,
    to,
    totalScenarios: scenarios.length,
    totalExecutions: results.length,
    passedExecutions,
    failedExecutions: results.length - passedExecutions,
    passRate: overall.passRate,
    averageDuration: overall.averageDuration,
    statsByType,
    statsByEnvironment,
    dailyTrends,
  };
}
