/**
 * In-memory implementation of ITestRepository.
 *
 * Maps are never edited in place: each write swaps in a new value for its key,
 * so a reader iterating a snapshot never sees a half-applied change. Result
 * lists are kept per scenario and replaced whole on append.
 */

import type { ITestResult, ITestScenario, ITestStatistics } from '../types/index.js';
import type { IResultSearchCriteria, IScenarioSearchCriteria, ITestRepository } from './index.js';
import { newestResultsFirst, newestScenariosFirst, searchResultList, searchScenarioList } from './search.js';
import { computeStatistics } from './statistics.js';

export class InMemoryTestRepository implements ITestRepository {
  private scenarios: Map<string, ITestScenario> = new Map();

  // scenarioId -> results in insertion order
  private results: Map<string, readonly ITestResult[]> = new Map();

  // resultId -> scenarioId
  private resultIndex: Map<string, string> = new Map();

  async saveScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    this.scenarios.set(scenario.id, structuredClone({ ...scenario, updatedAt: Date.now() }));
    return scenario.id;
  }

  async getScenario(id: string, signal?: AbortSignal): Promise<ITestScenario | null> {
    signal?.throwIfAborted();
    const scenario = this.scenarios.get(id);
    return scenario ? structuredClone(scenario) : null;
  }

  async getScenariosByProject(projectId: string, signal?: AbortSignal): Promise<ITestScenario[]> {
    signal?.throwIfAborted();
    const scenarios = [...this.scenarios.values()].filter(scenario => scenario.projectId === projectId);
    return structuredClone(newestScenariosFirst(scenarios));
  }

  async searchScenarios(criteria: IScenarioSearchCriteria, signal?: AbortSignal): Promise<ITestScenario[]> {
    signal?.throwIfAborted();
    return structuredClone(searchScenarioList([...this.scenarios.values()], criteria));
  }

  async updateScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    if (!this.scenarios.has(scenario.id)) {
      return false;
    }
    this.scenarios.set(scenario.id, structuredClone({ ...scenario, updatedAt: Date.now() }));
    return true;
  }

  async deleteScenario(id: string, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    return this.scenarios.delete(id);
  }

  async saveResult(result: ITestResult, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const previousScenario = this.resultIndex.get(result.id);
    if (previousScenario !== undefined) {
      this.removeResult(previousScenario, result.id);
    }

    const existing = this.results.get(result.scenarioId) ?? [];
    this.results.set(result.scenarioId, [...existing, structuredClone(result)]);
    this.resultIndex.set(result.id, result.scenarioId);
    return result.id;
  }

  async getResult(id: string, signal?: AbortSignal): Promise<ITestResult | null> {
    signal?.throwIfAborted();
    const scenarioId = this.resultIndex.get(id);
    const result = scenarioId !== undefined ? this.results.get(scenarioId)?.find(r => r.id === id) : undefined;
    return result ? structuredClone(result) : null;
  }

  async getResults(scenarioId: string, signal?: AbortSignal): Promise<ITestResult[]> {
    signal?.throwIfAborted();
    return structuredClone(newestResultsFirst([...(this.results.get(scenarioId) ?? [])]));
  }

  async searchResults(criteria: IResultSearchCriteria, signal?: AbortSignal): Promise<ITestResult[]> {
    signal?.throwIfAborted();
    return structuredClone(searchResultList(this.allResults(), criteria, this.projectScenarioIds(criteria.projectId)));
  }

  async getTestStatistics(projectId: string, from: number, to: number, signal?: AbortSignal): Promise<ITestStatistics> {
    signal?.throwIfAborted();
    return computeStatistics(projectId, [...this.scenarios.values()], this.allResults(), from, to);
  }

  async archiveOldResults(cutoff: number, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    let archived = 0;

    for (const [scenarioId, results] of [...this.results]) {
      const kept = results.filter(result => result.startedAt >= cutoff);
      if (kept.length === results.length) {
        continue;
      }
      archived += results.length - kept.length;
      for (const result of results) {
        if (result.startedAt < cutoff) {
          this.resultIndex.delete(result.id);
        }
      }
      if (kept.length > 0) {
        this.results.set(scenarioId, kept);
      } else {
        this.results.delete(scenarioId);
      }
    }

    return archived;
  }

  private allResults(): ITestResult[] {
    return [...this.results.values()].flat();
  }

  private projectScenarioIds(projectId: string | undefined): Set<string> | undefined {
    if (!projectId) {
      return undefined;
    }
    return new Set([...this.scenarios.values()].filter(s => s.projectId === projectId).map(s => s.id));
  }

  private removeResult(scenarioId: string, resultId: string): void {
    const remaining = (this.results.get(scenarioId) ?? []).filter(result => result.id !== resultId);
    if (remaining.length > 0) {
      this.results.set(scenarioId, remaining);
    } else {
      this.results.delete(scenarioId);
    }
  }
}
