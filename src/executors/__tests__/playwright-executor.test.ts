import { describe, it, expect, vi } from 'vitest';
import {
  PlaywrightTestExecutor,
  type BrowserLauncher,
  type IBrowserDriver,
  type IBrowserPage,
} from '../ui/playwright-executor.js';
import { createScenario, createStep } from '../../model/index.js';
import type { ITestStep } from '../../types/index.js';
import { LoggerStub } from '../../infra/logger.js';
import { ConfigStub, readSettings } from '../../infra/config.js';
import { RuleBasedScenarioGenerator } from '../../generator/index.js';
import { browserExecutorConfig } from '../../index.js';

/**
 * In-memory page: a map of selector to text, a title and a status per URL.
 */
class FakePage implements IBrowserPage {
  currentUrl = 'about:blank';
  filled = new Map<string, string>();
  clicked: string[] = [];
  screenshots: string[] = [];

  constructor(
    private elements: Record<string, string> = {},
    private statuses: Record<string, number> = {},
    private pageTitle = 'Shop'
  ) {}

  async goto(url: string) {
    this.currentUrl = url;
    const status = this.statuses[url] ?? 200;
    return { status: () => status };
  }

  async click(selector: string) {
    this.requireElement(selector);
    this.clicked.push(selector);
  }

  async fill(selector: string, value: string) {
    this.requireElement(selector);
    this.filled.set(selector, value);
  }

  async hover(selector: string) {
    this.requireElement(selector);
  }

  async selectOption(selector: string, value: string) {
    this.requireElement(selector);
    return [value];
  }

  async waitForSelector(selector: string) {
    this.requireElement(selector);
    return null;
  }

  async textContent(selector: string) {
    this.requireElement(selector);
    return this.elements[selector];
  }

  async title() {
    return this.pageTitle;
  }

  url() {
    return this.currentUrl;
  }

  async screenshot(options?: { path?: string }) {
    this.screenshots.push(options?.path ?? '');
    return Buffer.from('');
  }

  private requireElement(selector: string) {
    if (!(selector in this.elements)) {
      throw new Error(`Timeout waiting for selector ${selector}`);
    }
  }
}

class FakeDriver implements IBrowserDriver {
  sessions = 0;
  closed = false;

  constructor(private page: FakePage) {}

  async newSession() {
    this.sessions++;
    return { page: this.page, close: async () => undefined };
  }

  isConnected() {
    return !this.closed;
  }

  version() {
    return '126.0';
  }

  async close() {
    this.closed = true;
  }
}

function uiScenario(steps: ITestStep[]) {
  return createScenario({ title: 'Login', projectId: 'portal', type: 'UI', steps });
}

function step(order: number, action: string, target: string, parameters: ITestStep['parameters'] = {}) {
  return createStep({ order, action, target, parameters });
}

async function createExecutor(page: FakePage) {
  const driver = new FakeDriver(page);
  const launcher: BrowserLauncher = vi.fn().mockResolvedValue(driver);
  const executor = new PlaywrightTestExecutor(new LoggerStub(), launcher);
  await executor.initialize({ baseUrl: 'https://portal.example.test', screenshotDir: 'shots' });
  return { executor, driver, launcher };
}

describe('PlaywrightTestExecutor', () => {
  it('should launch headless unless configured otherwise', async () => {
    const { launcher } = await createExecutor(new FakePage());

    expect(launcher).toHaveBeenCalledWith({ headless: true });
  });

  it('should run a login flow', async () => {
    const page = new FakePage({
      '#username': '',
      '#password': '',
      "button[type='submit']": 'Sign in',
      '.dashboard': 'Welcome back, tester',
    });
    const { executor, driver } = await createExecutor(page);

    const result = await executor.executeTest(
      uiScenario([
        step(1, 'navigate', '/login'),
        step(2, 'enter_text', '#username', { value: 'tester@example.test' }),
        step(3, 'enter_text', '#password', { value: 'test-password' }),
        step(4, 'click', "button[type='submit']"),
        step(5, 'verify', '.dashboard', { expected: 'Welcome', mode: 'text' }),
      ])
    );

    expect(result.passed).toBe(true);
    expect(page.currentUrl).toBe('https://portal.example.test/login');
    expect(page.filled.get('#username')).toBe('tester@example.test');
    expect(page.clicked).toEqual(["button[type='submit']"]);
    expect(result.stepResults[4].actualResult).toBe('Welcome back, tester');
    expect(driver.sessions).toBe(1);
  });

  it('should fail navigation on an error status', async () => {
    const page = new FakePage({}, { 'https://portal.example.test/missing': 404 });
    const { executor } = await createExecutor(page);

    const result = await executor.executeTest(uiScenario([step(1, 'navigate', '/missing')]));

    expect(result.passed).toBe(false);
    expect(result.stepResults[0].message).toBe('Navigation to https://portal.example.test/missing returned status 404');
  });

  it('should fail a text check that does not match', async () => {
    const { executor } = await createExecutor(new FakePage({ h1: 'Access denied' }));

    const result = await executor.executeTest(uiScenario([step(1, 'verify_text', 'h1', { expected: 'Welcome' })]));

    expect(result.stepResults[0].message).toBe("Text of h1 does not contain 'Welcome'");
  });

  it('should turn a missing element into a failed step', async () => {
    const { executor } = await createExecutor(new FakePage());

    const result = await executor.executeTest(uiScenario([step(1, 'click', '#ghost')]));

    expect(result.passed).toBe(false);
    expect(result.stepResults[0].message).toBe('Timeout waiting for selector #ghost');
  });

  it('should verify title and url', async () => {
    const { executor } = await createExecutor(new FakePage({}, {}, 'Portal Home'));

    const result = await executor.executeTest(
      uiScenario([
        step(1, 'navigate', 'https://portal.example.test/home'),
        step(2, 'verify_title', 'page', { expected: 'Portal' }),
        step(3, 'verify_url', 'page', { expected: '/home' }),
      ])
    );

    expect(result.passed).toBe(true);
  });

  it('should write screenshots under the configured directory', async () => {
    const page = new FakePage({ '#cart': '2 items' });
    const { executor } = await createExecutor(page);
    const scenario = uiScenario([step(1, 'take_screenshot', 'page')]);

    const result = await executor.executeTest(scenario);

    expect(result.screenshots).toHaveLength(1);
    expect(result.screenshots[0]).toMatch(new RegExp(`^shots/${scenario.id}-step1-\\d+\\.png$`));
    expect(page.screenshots).toEqual(result.screenshots);
  });

  it('should report the browser version when healthy', async () => {
    const { executor } = await createExecutor(new FakePage());

    const health = await executor.performHealthCheck();

    expect(health.isHealthy).toBe(true);
    expect(health.metrics).toEqual({ browserVersion: '126.0' });
  });

  it('should be unhealthy after cleanup', async () => {
    const { executor, driver } = await createExecutor(new FakePage());

    await executor.cleanup();
    const health = await executor.performHealthCheck();

    expect(driver.closed).toBe(true);
    expect(health.isHealthy).toBe(false);
    expect(health.message).toBe('Browser is not running');
  });

  it('should resolve generated relative targets against the configured app base url', async () => {
    const page = new FakePage({
      '#username': '',
      '#password': '',
      "button[type='submit']": 'Sign in',
      '.dashboard': 'Welcome back, tester',
    });
    const launcher: BrowserLauncher = vi.fn().mockResolvedValue(new FakeDriver(page));
    const executor = new PlaywrightTestExecutor(new LoggerStub(), launcher);
    const settings = readSettings(new ConfigStub({ APP_BASE_URL: 'https://app.example.com' }));
    await executor.initialize(browserExecutorConfig(settings));
    const scenario = await new RuleBasedScenarioGenerator().generate(
      'As a user, I want to login with my credentials',
      'portal'
    );

    const result = await executor.executeTest(scenario);

    expect(result.stepResults[0].passed).toBe(true);
    expect(result.stepResults[0].message).toBe('Navigated to https://app.example.com/login');
    expect(page.currentUrl).toBe('https://app.example.com/login');
  });

  it('should not register when the browser cannot launch', async () => {
    const launcher: BrowserLauncher = vi.fn().mockRejectedValue(new Error('Executable does not exist'));
    const executor = new PlaywrightTestExecutor(new LoggerStub(), launcher);

    expect(await executor.initialize({})).toBe(false);
  });
});
