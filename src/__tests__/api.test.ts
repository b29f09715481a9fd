import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../api.js';
import { TestAutomationOrchestrator } from '../orchestrator/index.js';
import { RuleBasedScenarioGenerator } from '../generator/index.js';
import { ExecutorRegistry } from '../executors/registry.js';
import { InMemoryTestRepository } from '../storage/in-memory-repository.js';
import { createScenario, createStep } from '../model/index.js';
import { LoggerStub } from '../infra/logger.js';
import { ScriptedExecutor } from '../executors/__tests__/scripted-executor.js';
import type { ITestScenario } from '../types/index.js';

describe('REST API', () => {
  let repository: InMemoryTestRepository;
  let browser: ScriptedExecutor;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    repository = new InMemoryTestRepository();
    const logger = new LoggerStub();
    const orchestrator = new TestAutomationOrchestrator(
      new RuleBasedScenarioGenerator(),
      repository,
      new ExecutorRegistry(logger),
      logger
    );
    browser = new ScriptedExecutor({ name: 'browser', types: ['UI', 'Mixed'] });
    await orchestrator.registerExecutor(browser);

    server = createApp(orchestrator, logger).listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  async function call(method: string, path: string, body?: unknown) {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    return { status: response.status, body: text ? JSON.parse(text) : undefined };
  }

  async function saveScenario(extra: Partial<ITestScenario> = {}): Promise<ITestScenario> {
    const scenario = createScenario({
      title: 'Open home page',
      projectId: 'portal',
      steps: [createStep({ action: 'click', target: '#start', description: 'Start' })],
      ...extra,
    });
    await repository.saveScenario(scenario);
    return scenario;
  }

  it('should answer the health check', async () => {
    const { status, body } = await call('GET', '/health');

    expect(status).toBe(200);
    expect(body).toEqual({ status: 'ok' });
  });

  it('should create a scenario from a story and list it under its project', async () => {
    const created = await call('POST', '/api/scenarios', {
      userStory: 'As a user, I want to login to https://app.example.com',
      projectId: 'portal',
    });

    expect(created.status).toBe(201);
    const listed = await call('GET', '/api/projects/portal/scenarios');
    expect(listed.status).toBe(200);
    expect(listed.body.scenarios).toHaveLength(1);
    expect(listed.body.scenarios[0].id).toBe(created.body.scenarioId);
    expect(listed.body.scenarios[0].projectId).toBe('portal');
  });

  it('should reject an empty story with the field named', async () => {
    const { status, body } = await call('POST', '/api/scenarios', { userStory: '', projectId: 'portal' });

    expect(status).toBe(400);
    expect(body.error).toBe('Invalid request');
    expect(body.details).toEqual(['userStory: userStory is required']);
  });

  it('should execute a stored scenario and record its history', async () => {
    const scenario = await saveScenario();

    const executed = await call('POST', `/api/scenarios/${scenario.id}/execute`);
    const history = await call('GET', `/api/scenarios/${scenario.id}/results`);

    expect(executed.status).toBe(200);
    expect(executed.body.passed).toBe(true);
    expect(executed.body.executedBy).toBe('browser');
    expect(history.body.results).toHaveLength(1);
    expect(history.body.results[0].id).toBe(executed.body.id);
  });

  it('should map a missing scenario to 404', async () => {
    const { status, body } = await call('POST', '/api/scenarios/missing-id/execute');

    expect(status).toBe(404);
    expect(body).toEqual({ error: 'NotFoundError', message: 'Scenario missing-id not found' });
  });

  it('should map a scenario without a capable executor to 422', async () => {
    const scenario = await saveScenario({ type: 'API' });

    const { status, body } = await call('POST', `/api/scenarios/${scenario.id}/execute`);

    expect(status).toBe(422);
    expect(body.message).toBe('No executor available for test type API');
  });

  it('should reject a parallel run without scenario ids', async () => {
    const { status } = await call('POST', '/api/executions/parallel', { scenarioIds: [] });

    expect(status).toBe(400);
  });

  it('should run scenarios in parallel and keep input order', async () => {
    const first = await saveScenario({ title: 'First' });
    const second = await saveScenario({ title: 'Second' });

    const { status, body } = await call('POST', '/api/executions/parallel', {
      scenarioIds: [first.id, second.id],
      maxConcurrency: 2,
    });

    expect(status).toBe(200);
    expect(body.results.map((r: { scenarioId: string }) => r.scenarioId)).toEqual([first.id, second.id]);
  });

  it('should report executor health by name', async () => {
    const { status, body } = await call('GET', '/api/executors/health');

    expect(status).toBe(200);
    expect(Object.keys(body)).toEqual(['browser']);
    expect(body.browser.isHealthy).toBe(true);
  });

  it('should report statistics for the requested window', async () => {
    const scenario = await saveScenario();
    await call('POST', `/api/scenarios/${scenario.id}/execute`);

    const { status, body } = await call('GET', `/api/projects/portal/statistics?from=0&to=${Date.now() + 1000}`);

    expect(status).toBe(200);
    expect(body.projectId).toBe('portal');
    expect(body.totalExecutions).toBe(1);
    expect(body.passedExecutions).toBe(1);
  });

  it('should delete a scenario once', async () => {
    const scenario = await saveScenario();

    expect((await call('DELETE', `/api/scenarios/${scenario.id}`)).status).toBe(204);
    expect((await call('DELETE', `/api/scenarios/${scenario.id}`)).status).toBe(404);
  });
});
