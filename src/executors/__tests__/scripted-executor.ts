import { setTimeout as sleep } from 'timers/promises';
import type { ITestScenario, ITestStep, TestType } from '../../types/index.js';
import type { StepOutcome } from '../../model/index.js';
import { BaseTestExecutor, type HealthReading, type IStepContext } from '../base-executor.js';
import type { ExecutorConfig } from '../index.js';
import { LoggerStub } from '../../infra/logger.js';

export type StepHandler = (step: ITestStep, signal: AbortSignal) => Promise<StepOutcome>;

/**
 * Executor whose step outcomes come from per-action handlers.
 * Unscripted actions pass.
 */
export class ScriptedExecutor extends BaseTestExecutor<{ id: number }> {
  readonly name: string;
  protected readonly supportedTypes: readonly TestType[];
  protected readonly supportedActions: readonly string[];
  protected readonly supportsScreenshots = true;

  executedSteps: string[] = [];
  sessionsOpened = 0;
  sessionsClosed = 0;
  failSetup?: Error;
  failInit?: Error;
  health: HealthReading | Error = { isHealthy: true, message: 'ok', metrics: {} };
  private handlers = new Map<string, StepHandler>();

  constructor(options: { name?: string; types?: TestType[]; actions?: string[] } = {}) {
    super(new LoggerStub());
    this.name = options.name ?? 'scripted';
    this.supportedTypes = options.types ?? ['UI'];
    this.supportedActions = options.actions ?? ['navigate', 'click', 'wait', 'verify', 'slow'];
  }

  on(action: string, handler: StepHandler): this {
    this.handlers.set(action, handler);
    return this;
  }

  failOn(action: string, message = 'element not found'): this {
    return this.on(action, async () => ({ passed: false, message }));
  }

  hangOn(action: string): this {
    return this.on(action, async (_step, signal) => {
      await sleep(10000, undefined, { signal });
      return { passed: true, message: 'finished' };
    });
  }

  protected async onInitialize(_config: ExecutorConfig): Promise<void> {
    if (this.failInit) {
      throw this.failInit;
    }
  }

  protected async openSession(): Promise<{ id: number }> {
    if (this.failSetup) {
      throw this.failSetup;
    }
    this.sessionsOpened++;
    return { id: this.sessionsOpened };
  }

  protected async closeSession(): Promise<void> {
    this.sessionsClosed++;
  }

  protected async executeStep(context: IStepContext<{ id: number }>): Promise<StepOutcome> {
    const { step, signal } = context;
    this.executedSteps.push(step.description || step.action);
    const handler = this.handlers.get(step.action);
    return handler ? handler(step, signal) : { passed: true, message: `${step.action} done` };
  }

  protected async checkHealth(): Promise<HealthReading> {
    if (this.health instanceof Error) {
      throw this.health;
    }
    return this.health;
  }

  protected async captureScreenshot(_session: { id: number }, scenario: ITestScenario, step: ITestStep): Promise<string> {
    return `${scenario.id}-${step.order}.png`;
  }
}
