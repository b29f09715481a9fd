/**
 * Redis implementation of ITestRepository.
 * Documents are stored as JSON; searches and statistics load the relevant
 * documents and reuse the in-process filters.
 *
 * Redis keys structure:
 * - scenario:{id} -> JSON(ITestScenario)
 * - result:{id} -> JSON(ITestResult)
 * - scenarios:all -> Set of scenario ids
 * - project:scenarios:{projectId} -> Set of scenario ids
 * - scenario:results:{scenarioId} -> Set of result ids
 * - results:all -> Set of result ids
 */

import { createClient } from 'redis';
import type { ITestResult, ITestScenario, ITestStatistics } from '../types/index.js';
import type { IResultSearchCriteria, IScenarioSearchCriteria, ITestRepository } from './index.js';
import { newestResultsFirst, newestScenariosFirst, searchResultList, searchScenarioList } from './search.js';
import { computeStatistics } from './statistics.js';
import { ILogger } from '../infra/logger.js';

/**
 * The commands the repository issues. NodeRedisStore adapts a node-redis
 * client; tests supply an in-process map.
 */
export interface IRedisStore {
  get(key: string): Promise<string | null>;
  mGet(keys: string[]): Promise<(string | null)[]>;
  set(key: string, value: string): Promise<void>;
  del(keys: string[]): Promise<number>;
  sAdd(key: string, members: string[]): Promise<void>;
  sRem(key: string, members: string[]): Promise<void>;
  sMembers(key: string): Promise<string[]>;
}

const KEYS = {
  scenario: (id: string) => `scenario:${id}`,
  result: (id: string) => `result:${id}`,
  allScenarios: 'scenarios:all',
  projectScenarios: (projectId: string) => `project:scenarios:${projectId}`,
  scenarioResults: (scenarioId: string) => `scenario:results:${scenarioId}`,
  allResults: 'results:all',
} as const;

export class NodeRedisStore implements IRedisStore {
  private client: ReturnType<typeof createClient>;
  private isConnected: boolean = false;

  constructor(url: string, private logger: ILogger) {
    this.client = createClient({
      url,
      socket: {
        reconnectStrategy: retries => {
          if (retries > 10) {
            this.logger.error('Redis: too many reconnection attempts, giving up');
            return new Error('Too many reconnection attempts');
          }
          const delay = Math.min(retries * 100, 3000);
          this.logger.warn(`Redis: reconnecting in ${delay}ms`, { attempt: retries });
          return delay;
        },
      },
    });

    this.client.on('error', err => {
      this.logger.error('Redis client error', err);
      this.isConnected = false;
    });
    this.client.on('ready', () => {
      this.logger.info('Redis client ready');
      this.isConnected = true;
    });
    this.client.on('end', () => {
      this.logger.info('Redis client disconnected');
      this.isConnected = false;
    });
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
    this.isConnected = true;
  }

  async disconnect(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
    this.isConnected = false;
  }

  private async ensureConnected(): Promise<void> {
    if (!this.isConnected || !this.client.isOpen) {
      await this.connect();
    }
  }

  async get(key: string): Promise<string | null> {
    await this.ensureConnected();
    return this.client.get(key);
  }

  async mGet(keys: string[]): Promise<(string | null)[]> {
    if (keys.length === 0) {
      return [];
    }
    await this.ensureConnected();
    return this.client.mGet(keys);
  }

  async set(key: string, value: string): Promise<void> {
    await this.ensureConnected();
    await this.client.set(key, value);
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    await this.ensureConnected();
    return this.client.del(keys);
  }

  async sAdd(key: string, members: string[]): Promise<void> {
    if (members.length === 0) {
      return;
    }
    await this.ensureConnected();
    await this.client.sAdd(key, members);
  }

  async sRem(key: string, members: string[]): Promise<void> {
    if (members.length === 0) {
      return;
    }
    await this.ensureConnected();
    await this.client.sRem(key, members);
  }

  async sMembers(key: string): Promise<string[]> {
    await this.ensureConnected();
    return this.client.sMembers(key);
  }
}

function parseDocuments<T>(values: (string | null)[]): T[] {
  const documents: T[] = [];
  for (const value of values) {
    if (value !== null) {
      documents.push(JSON.parse(value));
    }
  }
  return documents;
}

export class RedisTestRepository implements ITestRepository {
  constructor(private store: IRedisStore) {}

  async saveScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const previous = await this.loadScenario(scenario.id);
    if (previous && previous.projectId !== scenario.projectId) {
      await this.store.sRem(KEYS.projectScenarios(previous.projectId), [scenario.id]);
    }
    await this.writeScenario(scenario);
    return scenario.id;
  }

  async getScenario(id: string, signal?: AbortSignal): Promise<ITestScenario | null> {
    signal?.throwIfAborted();
    return this.loadScenario(id);
  }

  async getScenariosByProject(projectId: string, signal?: AbortSignal): Promise<ITestScenario[]> {
    signal?.throwIfAborted();
    const ids = await this.store.sMembers(KEYS.projectScenarios(projectId));
    return newestScenariosFirst(await this.loadScenarios(ids));
  }

  async searchScenarios(criteria: IScenarioSearchCriteria, signal?: AbortSignal): Promise<ITestScenario[]> {
    signal?.throwIfAborted();
    const ids = await this.store.sMembers(
      criteria.projectId ? KEYS.projectScenarios(criteria.projectId) : KEYS.allScenarios
    );
    return searchScenarioList(await this.loadScenarios(ids), criteria);
  }

  async updateScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const previous = await this.loadScenario(scenario.id);
    if (!previous) {
      return false;
    }
    if (previous.projectId !== scenario.projectId) {
      await this.store.sRem(KEYS.projectScenarios(previous.projectId), [scenario.id]);
    }
    await this.writeScenario(scenario);
    return true;
  }

  async deleteScenario(id: string, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const scenario = await this.loadScenario(id);
    if (!scenario) {
      return false;
    }
    await this.store.sRem(KEYS.projectScenarios(scenario.projectId), [id]);
    await this.store.sRem(KEYS.allScenarios, [id]);
    await this.store.del([KEYS.scenario(id)]);
    return true;
  }

  async saveResult(result: ITestResult, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const previous = await this.loadResult(result.id);
    if (previous && previous.scenarioId !== result.scenarioId) {
      await this.store.sRem(KEYS.scenarioResults(previous.scenarioId), [result.id]);
    }
    await this.store.set(KEYS.result(result.id), JSON.stringify(result));
    await this.store.sAdd(KEYS.scenarioResults(result.scenarioId), [result.id]);
    await this.store.sAdd(KEYS.allResults, [result.id]);
    return result.id;
  }

  async getResult(id: string, signal?: AbortSignal): Promise<ITestResult | null> {
    signal?.throwIfAborted();
    return this.loadResult(id);
  }

  async getResults(scenarioId: string, signal?: AbortSignal): Promise<ITestResult[]> {
    signal?.throwIfAborted();
    const ids = await this.store.sMembers(KEYS.scenarioResults(scenarioId));
    return newestResultsFirst(await this.loadResults(ids));
  }

  async searchResults(criteria: IResultSearchCriteria, signal?: AbortSignal): Promise<ITestResult[]> {
    signal?.throwIfAborted();
    const ids = await this.store.sMembers(
      criteria.scenarioId ? KEYS.scenarioResults(criteria.scenarioId) : KEYS.allResults
    );
    const projectScenarioIds = criteria.projectId
      ? new Set(await this.store.sMembers(KEYS.projectScenarios(criteria.projectId)))
      : undefined;
    return searchResultList(await this.loadResults(ids), criteria, projectScenarioIds);
  }

  async getTestStatistics(projectId: string, from: number, to: number, signal?: AbortSignal): Promise<ITestStatistics> {
    signal?.throwIfAborted();
    const scenarioIds = await this.store.sMembers(KEYS.projectScenarios(projectId));
    const scenarios = await this.loadScenarios(scenarioIds);

    const results: ITestResult[] = [];
    for (const scenarioId of scenarioIds) {
      signal?.throwIfAborted();
      results.push(...(await this.loadResults(await this.store.sMembers(KEYS.scenarioResults(scenarioId)))));
    }

    return computeStatistics(projectId, scenarios, results, from, to);
  }

  async archiveOldResults(cutoff: number, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const results = await this.loadResults(await this.store.sMembers(KEYS.allResults));
    const expired = results.filter(result => result.startedAt < cutoff);

    for (const result of expired) {
      await this.store.sRem(KEYS.scenarioResults(result.scenarioId), [result.id]);
    }
    await this.store.sRem(KEYS.allResults, expired.map(result => result.id));
    await this.store.del(expired.map(result => KEYS.result(result.id)));

    return expired.length;
  }

  private async writeScenario(scenario: ITestScenario): Promise<void> {
    const stored: ITestScenario = { ...scenario, updatedAt: Date.now() };
    await this.store.set(KEYS.scenario(scenario.id), JSON.stringify(stored));
    await this.store.sAdd(KEYS.allScenarios, [scenario.id]);
    await this.store.sAdd(KEYS.projectScenarios(scenario.projectId), [scenario.id]);
  }

  private async loadScenario(id: string): Promise<ITestScenario | null> {
    const [scenario] = await this.loadScenarios([id]);
    return scenario ?? null;
  }

  private async loadScenarios(ids: string[]): Promise<ITestScenario[]> {
    return parseDocuments<ITestScenario>(await this.store.mGet(ids.map(KEYS.scenario)));
  }

  private async loadResult(id: string): Promise<ITestResult | null> {
    const [result] = await this.loadResults([id]);
    return result ?? null;
  }

  private async loadResults(ids: string[]): Promise<ITestResult[]> {
    return parseDocuments<ITestResult>(await this.store.mGet(ids.map(KEYS.result)));
  }
}
