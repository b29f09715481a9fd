import { describe, it, expect, vi } from 'vitest';
import { Writable } from 'stream';
import winston from 'winston';
import { WinstonLogger, LoggerStub, SERVICE_NAME } from '../logger.js';

function captureLogger(level = 'debug') {
  const entries: Record<string, unknown>[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      entries.push(JSON.parse(chunk.toString()));
      callback();
    },
  });
  const logger = new WinstonLogger({ level, transports: [new winston.transports.Stream({ stream })] });
  return { logger, entries };
}

describe('WinstonLogger', () => {
  it('should tag entries with the service name and context', async () => {
    const { logger, entries } = captureLogger();

    logger.info('Test scenario created', { scenarioId: 'scenario-1' });

    await vi.waitFor(() => expect(entries).toHaveLength(1));
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'Test scenario created',
      service: SERVICE_NAME,
      scenarioId: 'scenario-1',
    });
    expect(typeof entries[0].timestamp).toBe('string');
  });

  it('should carry child fields on every entry', async () => {
    const { logger, entries } = captureLogger();
    const scoped = logger.child({ scenarioId: 'scenario-2', executor: 'browser' });

    scoped.warn('Attempt 1 failed', { message: 'spinner still visible' });
    scoped.child({ attempt: 2 }).debug('Retrying');

    await vi.waitFor(() => expect(entries).toHaveLength(2));
    expect(entries[0]).toMatchObject({
      level: 'warn',
      scenarioId: 'scenario-2',
      executor: 'browser',
      message: 'Attempt 1 failed',
    });
    expect(entries[1]).toMatchObject({ level: 'debug', scenarioId: 'scenario-2', executor: 'browser', attempt: 2 });
  });

  it('should flatten an Error into name, message and stack', async () => {
    const { logger, entries } = captureLogger();

    logger.error('Repository failed to save result', new TypeError('disk full'));

    await vi.waitFor(() => expect(entries).toHaveLength(1));
    expect(entries[0]).toMatchObject({
      level: 'error',
      message: 'Repository failed to save result',
      errorName: 'TypeError',
      errorMessage: 'disk full',
    });
    expect(String(entries[0].stack)).toContain('TypeError: disk full');
  });

  it('should wrap a non-Error failure under error', async () => {
    const { logger, entries } = captureLogger();

    logger.error('Executor failed', { code: 'E_BROWSER' });

    await vi.waitFor(() => expect(entries).toHaveLength(1));
    expect(entries[0]).toMatchObject({ message: 'Executor failed', error: { code: 'E_BROWSER' } });
  });

  it('should drop entries below the configured level', async () => {
    const { logger, entries } = captureLogger('warn');

    logger.debug('Story analysed');
    logger.info('Executing scenario');
    logger.warn('Health check failed');

    await vi.waitFor(() => expect(entries).toHaveLength(1));
    expect(entries[0].message).toBe('Health check failed');
  });
});

describe('LoggerStub', () => {
  it('should return itself as a child', () => {
    const logger = new LoggerStub();

    expect(logger.child({ scenarioId: 'scenario-3' })).toBe(logger);
  });
});
