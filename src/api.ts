import express from 'express';
import cors from 'cors';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { createLogger, createTestAutomation } from './index.js';
import { TestAutomationOrchestrator } from './orchestrator/index.js';
import { ILogger } from './infra/logger.js';
import { EnvConfig, readSettings } from './infra/config.js';
import { TEST_PRIORITIES, TEST_STATUSES, TEST_TYPES } from './constants/index.js';
import {
  BatchExecutionError,
  NoExecutorError,
  NotFoundError,
  ValidationError,
  toError,
} from './errors/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const createScenarioBody = z.object({
  userStory: z.string().min(1, 'userStory is required'),
  projectId: z.string().min(1, 'projectId is required'),
  projectContext: z.string().optional().default(''),
});

const parallelBody = z.object({
  scenarioIds: z.array(z.string().min(1)).min(1, 'scenarioIds must not be empty'),
  maxConcurrency: z.number().int().positive().optional(),
});

const statisticsQuery = z.object({
  from: z.coerce.number().int().nonnegative().optional(),
  to: z.coerce.number().int().nonnegative().optional(),
});

const scenarioListQuery = z.object({
  type: z.enum(TEST_TYPES).optional(),
  status: z.enum(TEST_STATUSES).optional(),
  priority: z.enum(TEST_PRIORITIES).optional(),
});

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<unknown>;

/**
 * Express 4 does not forward rejected handler promises; route them to the error middleware.
 */
function route(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function errorStatus(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ValidationError || error instanceof z.ZodError) return 400;
  if (error instanceof NoExecutorError) return 422;
  return 500;
}

function errorBody(error: unknown): Record<string, unknown> {
  if (error instanceof z.ZodError) {
    return {
      error: 'Invalid request',
      details: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    };
  }

  const err = toError(error);
  const body: Record<string, unknown> = { error: err.name, message: err.message };
  if (error instanceof ValidationError) {
    body.details = error.errors;
  }
  if (error instanceof BatchExecutionError) {
    body.results = error.results;
    body.failures = error.failures.map(failure => ({
      scenarioId: failure.scenarioId,
      message: failure.error.message,
    }));
  }
  if (process.env.NODE_ENV === 'development' && err.stack) {
    body.stack = err.stack;
  }
  return body;
}

export function createApp(orchestrator: TestAutomationOrchestrator, logger: ILogger): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.info(`Incoming ${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post(
    '/api/scenarios',
    route(async (req, res) => {
      const body = createScenarioBody.parse(req.body);
      const scenarioId = await orchestrator.createFromUserStory(body.userStory, body.projectId, body.projectContext);
      res.status(201).json({ scenarioId });
    })
  );

  app.get(
    '/api/projects/:projectId/scenarios',
    route(async (req, res) => {
      const query = scenarioListQuery.parse(req.query);
      const scenarios = await orchestrator.searchTests({ projectId: req.params.projectId, ...query });
      res.json({ scenarios });
    })
  );

  app.get(
    '/api/scenarios/:id/results',
    route(async (req, res) => {
      const results = await orchestrator.getTestHistory(req.params.id);
      res.json({ results });
    })
  );

  app.post(
    '/api/scenarios/:id/execute',
    route(async (req, res) => {
      const result = await orchestrator.executeTest(req.params.id);
      res.json(result);
    })
  );

  app.post(
    '/api/executions/parallel',
    route(async (req, res) => {
      const body = parallelBody.parse(req.body);
      const results = await orchestrator.executeTestsParallel(body.scenarioIds, body.maxConcurrency);
      res.json({ results });
    })
  );

  app.get(
    '/api/projects/:projectId/statistics',
    route(async (req, res) => {
      const query = statisticsQuery.parse(req.query);
      const to = query.to ?? Date.now();
      const from = query.from ?? to - 30 * DAY_MS;
      const statistics = await orchestrator.getTestStatistics(req.params.projectId, from, to);
      res.json(statistics);
    })
  );

  app.get(
    '/api/executors/health',
    route(async (_req, res) => {
      res.json(await orchestrator.getExecutorHealthStatus());
    })
  );

  app.delete(
    '/api/scenarios/:id',
    route(async (req, res) => {
      const deleted = await orchestrator.deleteTestScenario(req.params.id);
      if (!deleted) {
        res.status(404).json({ error: 'NotFoundError', message: `Scenario ${req.params.id} not found` });
        return;
      }
      res.status(204).end();
    })
  );

  // Error handling middleware - after all routes
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = errorStatus(err);
    if (status === 500) {
      logger.error(`Request ${req.method} ${req.path} failed`, err);
    } else {
      logger.warn(`Request ${req.method} ${req.path} rejected`, { status, error: toError(err).message });
    }
    if (!res.headersSent) {
      res.status(status).json(errorBody(err));
    }
  });

  return app;
}

async function main(): Promise<void> {
  const config = new EnvConfig();
  const logger = createLogger(readSettings(config));
  const automation = await createTestAutomation({ config, logger });
  const app = createApp(automation.orchestrator, logger);
  const port = automation.settings.port;

  const server = app.listen(port, () => {
    logger.info(`Test automation API started on port ${port}`);
  });

  const stop = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    automation.close().then(
      () => process.exit(0),
      error => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch(error => {
    console.error('Failed to start API server:', error);
    process.exit(1);
  });
}
