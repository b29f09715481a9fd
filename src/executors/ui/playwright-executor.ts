/**
 * Browser executor on playwright-core.
 *
 * One browser for the executor's lifetime, a fresh context and page per run.
 * The browser is reached through IBrowserDriver so tests can substitute a
 * scripted page for a real Chromium.
 */

import path from 'path';
import { chromium, type Browser } from 'playwright-core';
import { setTimeout as sleep } from 'timers/promises';
import type { ITestScenario, ITestStep, TestType } from '../../types/index.js';
import { ACTIONS, ERROR_MESSAGES, PARAMS } from '../../constants/index.js';
import { getParameterValue, parameterAsNumber, parameterAsString, type StepOutcome } from '../../model/index.js';
import { BaseTestExecutor, type HealthReading, type IStepContext } from '../base-executor.js';
import type { ExecutorConfig } from '../index.js';
import { ILogger } from '../../infra/logger.js';

interface TimeoutOption {
  timeout?: number;
}

/**
 * The page operations the executor relies on; a playwright Page satisfies it.
 */
export interface IBrowserPage {
  goto(url: string, options?: TimeoutOption): Promise<{ status(): number } | null>;
  click(selector: string, options?: TimeoutOption): Promise<void>;
  fill(selector: string, value: string, options?: TimeoutOption): Promise<void>;
  hover(selector: string, options?: TimeoutOption): Promise<void>;
  selectOption(selector: string, values: string, options?: TimeoutOption): Promise<string[]>;
  waitForSelector(selector: string, options?: TimeoutOption & { state?: 'visible' | 'attached' }): Promise<unknown>;
  textContent(selector: string, options?: TimeoutOption): Promise<string | null>;
  title(): Promise<string>;
  url(): string;
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<Buffer>;
}

export interface IBrowserSession {
  page: IBrowserPage;
  close(): Promise<void>;
}

export interface IBrowserDriver {
  newSession(): Promise<IBrowserSession>;
  isConnected(): boolean;
  version(): string;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<IBrowserDriver>;

const VIEWPORT = { width: 1280, height: 800 };

class PlaywrightDriver implements IBrowserDriver {
  constructor(private browser: Browser) {}

  async newSession(): Promise<IBrowserSession> {
    const context = await this.browser.newContext({ viewport: VIEWPORT });
    const page = await context.newPage();
    return { page, close: () => context.close() };
  }

  isConnected(): boolean {
    return this.browser.isConnected();
  }

  version(): string {
    return this.browser.version();
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}

export const launchChromium: BrowserLauncher = async ({ headless }) =>
  new PlaywrightDriver(await chromium.launch({ headless }));

const UI_ACTIONS: readonly string[] = [
  ACTIONS.NAVIGATE,
  ACTIONS.CLICK,
  ACTIONS.ENTER_TEXT,
  ACTIONS.TYPE,
  ACTIONS.HOVER,
  ACTIONS.SELECT_OPTION,
  ACTIONS.WAIT,
  ACTIONS.VERIFY,
  ACTIONS.ASSERT,
  ACTIONS.VERIFY_ELEMENT,
  ACTIONS.VERIFY_TEXT,
  ACTIONS.VERIFY_TITLE,
  ACTIONS.VERIFY_URL,
  ACTIONS.TAKE_SCREENSHOT,
];

function isUrlLike(target: string): boolean {
  return /^https?:\/\//i.test(target) || target.startsWith('/');
}

export class PlaywrightTestExecutor extends BaseTestExecutor<IBrowserSession> {
  readonly name = 'playwright';
  protected readonly supportedTypes: readonly TestType[] = ['UI', 'Mixed'];
  protected readonly supportedActions = UI_ACTIONS;
  protected readonly supportsScreenshots = true;
  private driver: IBrowserDriver | null = null;
  private baseUrl?: string;
  private screenshotDir = 'screenshots';

  constructor(
    logger: ILogger,
    private launcher: BrowserLauncher = launchChromium
  ) {
    super(logger);
  }

  protected async onInitialize(config: ExecutorConfig): Promise<void> {
    const headless = config.headless !== false && config.headless !== 'false';
    this.baseUrl = parameterAsString(config.baseUrl);
    this.screenshotDir = parameterAsString(config.screenshotDir) ?? this.screenshotDir;

    this.logger.info('Launching browser', { headless });
    this.driver = await this.launcher({ headless });
  }

  protected async onCleanup(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    await driver?.close();
  }

  protected async openSession(): Promise<IBrowserSession> {
    if (!this.driver) {
      throw new Error(`${this.name} executor is not initialized`);
    }
    return this.driver.newSession();
  }

  protected async closeSession(session: IBrowserSession): Promise<void> {
    await session.close();
  }

  protected async checkHealth(): Promise<HealthReading> {
    if (!this.driver || !this.driver.isConnected()) {
      return { isHealthy: false, message: 'Browser is not running', metrics: {} };
    }

    const session = await this.driver.newSession();
    try {
      await session.page.goto('about:blank');
    } finally {
      await session.close();
    }
    return { isHealthy: true, message: 'Browser is responsive', metrics: { browserVersion: this.driver.version() } };
  }

  protected async captureScreenshot(session: IBrowserSession, scenario: ITestScenario, step: ITestStep): Promise<string> {
    const file = path.join(this.screenshotDir, `${scenario.id}-step${step.order}-${Date.now()}.png`);
    await session.page.screenshot({ path: file, fullPage: true });
    return file;
  }

  protected async executeStep(context: IStepContext<IBrowserSession>): Promise<StepOutcome> {
    const { session, step, timeout, signal } = context;
    const page = session.page;
    const action = step.action.toLowerCase();
    const options = { timeout };

    switch (action) {
      case ACTIONS.NAVIGATE:
        return this.navigate(page, parameterAsString(getParameterValue(step, PARAMS.URL)) ?? step.target, timeout);

      case ACTIONS.CLICK:
        await page.click(step.target, options);
        return { passed: true, message: `Clicked ${step.target}` };

      case ACTIONS.ENTER_TEXT:
      case ACTIONS.TYPE: {
        const value = parameterAsString(getParameterValue(step, PARAMS.VALUE)) ?? '';
        await page.fill(step.target, value, options);
        return { passed: true, message: `Entered text into ${step.target}`, actualResult: value };
      }

      case ACTIONS.HOVER:
        await page.hover(step.target, options);
        return { passed: true, message: `Hovered over ${step.target}` };

      case ACTIONS.SELECT_OPTION: {
        const option =
          parameterAsString(getParameterValue(step, PARAMS.OPTION)) ??
          parameterAsString(getParameterValue(step, PARAMS.VALUE)) ??
          '';
        const selected = await page.selectOption(step.target, option, options);
        return { passed: selected.length > 0, message: `Selected '${option}' in ${step.target}`, actualResult: selected.join(',') };
      }

      case ACTIONS.WAIT: {
        const duration = parameterAsNumber(getParameterValue(step, PARAMS.DURATION)) ?? 0;
        await sleep(duration, undefined, { signal });
        return { passed: true, message: `Waited ${duration}ms` };
      }

      case ACTIONS.VERIFY:
      case ACTIONS.ASSERT:
        return this.verify(context);

      case ACTIONS.VERIFY_ELEMENT:
        await page.waitForSelector(step.target, { state: 'visible', timeout });
        return { passed: true, message: `${step.target} is visible` };

      case ACTIONS.VERIFY_TEXT:
        return this.verifyText(page, step.target, this.expected(step), timeout);

      case ACTIONS.VERIFY_TITLE:
        return this.compare('Title', await page.title(), this.expected(step) ?? step.target);

      case ACTIONS.VERIFY_URL:
        return this.compare('URL', page.url(), this.expected(step) ?? step.target);

      case ACTIONS.TAKE_SCREENSHOT: {
        const file = await this.captureScreenshot(session, context.scenario, step);
        return { passed: true, message: 'Screenshot captured', screenshotPath: file };
      }

      default:
        return { passed: false, message: ERROR_MESSAGES.UNSUPPORTED_ACTION(step.action, this.name) };
    }
  }

  private expected(step: ITestStep): string | undefined {
    return parameterAsString(getParameterValue(step, PARAMS.EXPECTED));
  }

  private resolveUrl(target: string): string {
    if (/^[a-z]+:/i.test(target)) {
      return target;
    }
    if (!this.baseUrl) {
      throw new Error(`Relative target '${target}' needs a baseUrl`);
    }
    return new URL(target, this.baseUrl).toString();
  }

  private async navigate(page: IBrowserPage, target: string, timeout: number): Promise<StepOutcome> {
    const url = this.resolveUrl(target);
    const response = await page.goto(url, { timeout });
    const status = response?.status();
    if (status !== undefined && status >= 400) {
      return { passed: false, message: `Navigation to ${url} returned status ${status}`, actualResult: String(status) };
    }
    return { passed: true, message: `Navigated to ${url}`, actualResult: page.url() };
  }

  /**
   * verify/assert: mode 'load' opens the target, 'visible' waits for it,
   * 'title' and 'url' compare page properties, anything else compares text.
   */
  private async verify(context: IStepContext<IBrowserSession>): Promise<StepOutcome> {
    const { session, step, timeout } = context;
    const page = session.page;
    const mode = parameterAsString(getParameterValue(step, PARAMS.MODE))?.toLowerCase() ?? 'text';
    const expected = this.expected(step);

    switch (mode) {
      case 'load':
        return isUrlLike(step.target)
          ? this.navigate(page, step.target, timeout)
          : { passed: false, message: `Target '${step.target}' is not a URL` };
      case 'visible':
        await page.waitForSelector(step.target, { state: 'visible', timeout });
        return { passed: true, message: `${step.target} is visible` };
      case 'title':
        return this.compare('Title', await page.title(), expected ?? '');
      case 'url':
        return this.compare('URL', page.url(), expected ?? '');
      default:
        return this.verifyText(page, step.target, expected, timeout);
    }
  }

  private async verifyText(
    page: IBrowserPage,
    selector: string,
    expected: string | undefined,
    timeout: number
  ): Promise<StepOutcome> {
    const text = (await page.textContent(selector, { timeout })) ?? '';
    return this.compare(`Text of ${selector}`, text, expected ?? '');
  }

  private compare(subject: string, actual: string, expected: string): StepOutcome {
    const passed = actual.includes(expected);
    return {
      passed,
      message: passed ? `${subject} contains '${expected}'` : `${subject} does not contain '${expected}'`,
      actualResult: actual,
    };
  }
}
