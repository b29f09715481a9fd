import { describe, it, expect, vi } from 'vitest';
import { ExecutorRegistry } from '../registry.js';
import { LoggerStub } from '../../infra/logger.js';
import { ScriptedExecutor } from './scripted-executor.js';

describe('ExecutorRegistry', () => {
  it('should keep only executors that initialize', async () => {
    const registry = new ExecutorRegistry(new LoggerStub());
    const broken = new ScriptedExecutor({ name: 'broken' });
    broken.failInit = new Error('no display');

    expect(await registry.register(broken)).toBe(false);
    expect(await registry.register(new ScriptedExecutor({ name: 'working' }))).toBe(true);

    expect(registry.size).toBe(1);
    expect(registry.list().map(e => e.name)).toEqual(['working']);
  });

  it('should pass configuration to initialize', async () => {
    const registry = new ExecutorRegistry(new LoggerStub());
    const executor = new ScriptedExecutor();
    const initialize = vi.spyOn(executor, 'initialize');

    await registry.register(executor, { baseUrl: 'http://localhost:8080' });

    expect(initialize).toHaveBeenCalledWith({ baseUrl: 'http://localhost:8080' });
  });

  it('should select the first registered executor for a type', async () => {
    const registry = new ExecutorRegistry(new LoggerStub());
    await registry.register(new ScriptedExecutor({ name: 'browser', types: ['UI', 'Mixed'] }));
    await registry.register(new ScriptedExecutor({ name: 'second-browser', types: ['UI'] }));
    await registry.register(new ScriptedExecutor({ name: 'http', types: ['API'] }));

    expect(registry.select('UI')?.name).toBe('browser');
    expect(registry.select('API')?.name).toBe('http');
    expect(registry.select('Performance')).toBeUndefined();
  });

  it('should clean up every executor even when one fails', async () => {
    const registry = new ExecutorRegistry(new LoggerStub());
    const first = new ScriptedExecutor({ name: 'first' });
    const second = new ScriptedExecutor({ name: 'second' });
    vi.spyOn(first, 'cleanup').mockRejectedValue(new Error('already closed'));
    const secondCleanup = vi.spyOn(second, 'cleanup');
    await registry.register(first);
    await registry.register(second);

    await registry.cleanupAll();

    expect(secondCleanup).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });
});
