/**
 * Composition root: builds the default stack from configuration.
 */

import { EnvConfig, readSettings, type IAutomationSettings, type IConfig } from './infra/config.js';
import { ILogger, WinstonLogger } from './infra/logger.js';
import { LLMProviderFactory } from './providers/factory.js';
import { LlmScenarioGenerator, RuleBasedScenarioGenerator, type IScenarioGenerator } from './generator/index.js';
import { ExecutorRegistry } from './executors/registry.js';
import { PlaywrightTestExecutor } from './executors/ui/playwright-executor.js';
import { HttpTestExecutor } from './executors/api/http-executor.js';
import type { ExecutorConfig } from './executors/index.js';
import { createRepository } from './storage/storage-factory.js';
import type { ITestRepository } from './storage/index.js';
import { TestAutomationOrchestrator } from './orchestrator/index.js';

export interface ITestAutomation {
  orchestrator: TestAutomationOrchestrator;
  repository: ITestRepository;
  settings: IAutomationSettings;
  /** Cleans up executors and closes the repository connection. */
  close(): Promise<void>;
}

export interface ITestAutomationOptions {
  config?: IConfig;
  logger?: ILogger;
  /** Skip the browser executor, e.g. for API-only deployments. */
  withBrowser?: boolean;
}

export function createGenerator(settings: IAutomationSettings, config: IConfig, logger: ILogger): IScenarioGenerator {
  const ruleBased = new RuleBasedScenarioGenerator(logger);
  if (settings.generator === 'rule-based') {
    return ruleBased;
  }

  const provider = LLMProviderFactory.createFromConfig(config, logger);
  return new LlmScenarioGenerator(provider, logger, { fallback: ruleBased });
}

export function createLogger(settings: IAutomationSettings): WinstonLogger {
  return new WinstonLogger({ level: settings.logLevel, logDir: settings.logDir });
}

export function browserExecutorConfig(settings: IAutomationSettings): ExecutorConfig {
  const config: ExecutorConfig = { headless: settings.headless };
  if (settings.appBaseUrl) config.baseUrl = settings.appBaseUrl;
  return config;
}

export function httpExecutorConfig(settings: IAutomationSettings): ExecutorConfig {
  const config: ExecutorConfig = {};
  if (settings.apiBaseUrl) config.baseUrl = settings.apiBaseUrl;
  if (settings.apiHealthPath) config.healthPath = settings.apiHealthPath;
  return config;
}

/**
 * Wires generator, repository, executors and orchestrator from settings.
 * Executors that fail to initialize are logged and left out.
 */
export async function createTestAutomation(options: ITestAutomationOptions = {}): Promise<ITestAutomation> {
  const config = options.config ?? new EnvConfig();
  const settings = readSettings(config);
  const logger = options.logger ?? createLogger(settings);

  const generator = createGenerator(settings, config, logger);
  const { repository, close: closeRepository } = await createRepository(settings, logger);
  const registry = new ExecutorRegistry(logger);

  const orchestrator = new TestAutomationOrchestrator(generator, repository, registry, logger, {
    maxConcurrency: settings.maxConcurrency,
    healthCheckConcurrency: settings.healthCheckConcurrency,
    retryBackoff: settings.retryBackoff,
    retryInitialDelayMs: settings.retryInitialDelayMs,
  });

  if (options.withBrowser ?? true) {
    await orchestrator.registerExecutor(new PlaywrightTestExecutor(logger), browserExecutorConfig(settings));
  }
  await orchestrator.registerExecutor(new HttpTestExecutor(logger), httpExecutorConfig(settings));

  logger.info('Test automation ready', {
    generator: generator.name,
    storage: settings.storageType,
    executors: registry.list().map(executor => executor.name),
  });

  return {
    orchestrator,
    repository,
    settings,
    close: async () => {
      await orchestrator.shutdown();
      await closeRepository();
    },
  };
}

export * from './types/index.js';
export * from './constants/index.js';
export * from './errors/index.js';
export * from './model/index.js';
export * from './generator/index.js';
export * from './executors/index.js';
export * from './storage/index.js';
export * from './orchestrator/index.js';
export * from './reporter/index.js';
export type { ILogger } from './infra/logger.js';
export { WinstonLogger, LoggerStub } from './infra/logger.js';
export { EnvConfig, ConfigStub, readSettings, type IConfig, type IAutomationSettings } from './infra/config.js';
