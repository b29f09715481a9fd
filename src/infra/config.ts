import { config } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Find package root by looking for package.json
let currentDir = __dirname;
let packageRoot = currentDir;
while (currentDir !== path.dirname(currentDir)) {
  if (fs.existsSync(path.join(currentDir, 'package.json'))) {
    packageRoot = currentDir;
    break;
  }
  currentDir = path.dirname(currentDir);
}

const envPath = path.join(packageRoot, '.env');
if (fs.existsSync(envPath)) {
  const result = config({ path: envPath });
  if (result.error) {
    console.error('Dotenv error:', result.error);
  }
}

export interface IConfig {
  get(key: string): string | undefined;
}

export class EnvConfig implements IConfig {
  get(key: string): string | undefined {
    return process.env[key];
  }
}

/**
 * Fixed key/value configuration, used by tests and embedders that do not read the environment.
 */
export class ConfigStub implements IConfig {
  constructor(private values: Record<string, string | undefined> = {}) {}

  get(key: string): string | undefined {
    return this.values[key];
  }
}

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? fallback : value.toLowerCase() === 'true'));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().optional().default(fallback);

const settingsSchema = z.object({
  STORAGE_TYPE: z
    .string()
    .optional()
    .transform(value => (value || 'memory').toLowerCase())
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: optionalString,
  GENERATOR: z
    .string()
    .optional()
    .transform(value => (value || 'rule-based').toLowerCase())
    .pipe(z.enum(['rule-based', 'llm'])),
  LLM_PROVIDER: z
    .string()
    .optional()
    .transform(value => (value || 'openai').toLowerCase())
    .pipe(z.enum(['openai', 'anthropic'])),
  HEADLESS: booleanFlag(true),
  APP_BASE_URL: optionalString,
  API_BASE_URL: optionalString,
  API_HEALTH_PATH: optionalString,
  MAX_CONCURRENCY: positiveInt(3),
  HEALTH_CHECK_CONCURRENCY: positiveInt(4),
  RETRY_BACKOFF: z.enum(['none', 'constant', 'linear', 'exponential']).optional().default('none'),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().optional().default(0),
  PORT: positiveInt(3001),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),
  LOG_DIR: optionalString,
});

export type StorageType = 'memory' | 'redis';
export type GeneratorType = 'rule-based' | 'llm';
export type BackoffType = 'none' | 'constant' | 'linear' | 'exponential';

export interface IAutomationSettings {
  storageType: StorageType;
  redisUrl?: string;
  generator: GeneratorType;
  llmProvider: 'openai' | 'anthropic';
  headless: boolean;
  /** Resolves relative navigation targets in browser scenarios. */
  appBaseUrl?: string;
  apiBaseUrl?: string;
  apiHealthPath?: string;
  maxConcurrency: number;
  healthCheckConcurrency: number;
  retryBackoff: BackoffType;
  retryInitialDelayMs: number;
  port: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  /** Directory of the log file; logs/ under the package root when unset. */
  logDir?: string;
}

const SETTING_KEYS: string[] = Object.keys(settingsSchema.shape);

/**
 * Reads and validates the typed settings from a config source.
 * Empty values fall back to their defaults; malformed values throw a zod error naming the key.
 */
export function readSettings(source: IConfig = new EnvConfig()): IAutomationSettings {
  const raw: Record<string, string | undefined> = {};
  for (const key of SETTING_KEYS) {
    const value = source.get(key);
    raw[key] = value === '' ? undefined : value;
  }

  const parsed = settingsSchema.parse(raw);
  return {
    storageType: parsed.STORAGE_TYPE,
    redisUrl: parsed.REDIS_URL,
    generator: parsed.GENERATOR,
    llmProvider: parsed.LLM_PROVIDER,
    headless: parsed.HEADLESS,
    appBaseUrl: parsed.APP_BASE_URL,
    apiBaseUrl: parsed.API_BASE_URL,
    apiHealthPath: parsed.API_HEALTH_PATH,
    maxConcurrency: parsed.MAX_CONCURRENCY,
    healthCheckConcurrency: parsed.HEALTH_CHECK_CONCURRENCY,
    retryBackoff: parsed.RETRY_BACKOFF,
    retryInitialDelayMs: parsed.RETRY_INITIAL_DELAY_MS,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    logDir: parsed.LOG_DIR,
  };
}
