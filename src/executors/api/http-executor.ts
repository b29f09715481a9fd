/**
 * HTTP executor for API scenarios, built on the platform fetch.
 * Each run keeps the last response so that verify_* steps can inspect it.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ParameterValue, TestType } from '../../types/index.js';
import { ACTIONS, ERROR_MESSAGES, PARAMS } from '../../constants/index.js';
import { getParameterValue, parameterAsNumber, parameterAsString, type StepOutcome } from '../../model/index.js';
import { BaseTestExecutor, type HealthReading, type IStepContext } from '../base-executor.js';
import type { ExecutorConfig } from '../index.js';
import { ILogger } from '../../infra/logger.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface IHttpResponseSnapshot {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface IHttpSession {
  lastResponse?: IHttpResponseSnapshot;
}

const HTTP_ACTIONS: readonly string[] = [
  ACTIONS.NAVIGATE,
  ACTIONS.API_GET,
  ACTIONS.API_POST,
  ACTIONS.API_PUT,
  ACTIONS.API_PATCH,
  ACTIONS.API_DELETE,
  ACTIONS.VERIFY,
  ACTIONS.ASSERT,
  ACTIONS.VERIFY_STATUS_CODE,
  ACTIONS.VERIFY_BODY,
  ACTIONS.VERIFY_HEADER,
  ACTIONS.WAIT,
];

const METHODS: Record<string, string> = {
  [ACTIONS.NAVIGATE]: 'GET',
  [ACTIONS.API_GET]: 'GET',
  [ACTIONS.API_POST]: 'POST',
  [ACTIONS.API_PUT]: 'PUT',
  [ACTIONS.API_PATCH]: 'PATCH',
  [ACTIONS.API_DELETE]: 'DELETE',
};

function toHeaders(value: ParameterValue | undefined): Record<string, string> {
  if (value === undefined || typeof value !== 'object' || Array.isArray(value)) {
    return {};
  }
  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    headers[name] = typeof headerValue === 'string' ? headerValue : JSON.stringify(headerValue);
  }
  return headers;
}

export class HttpTestExecutor extends BaseTestExecutor<IHttpSession> {
  readonly name = 'http';
  protected readonly supportedTypes: readonly TestType[] = ['API', 'Mixed'];
  protected readonly supportedActions = HTTP_ACTIONS;
  private baseUrl?: string;
  private healthPath?: string;
  private defaultHeaders: Record<string, string> = {};

  constructor(
    logger: ILogger,
    private fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {
    super(logger);
    this.maxParallelExecutions = 10;
  }

  protected async onInitialize(config: ExecutorConfig): Promise<void> {
    this.baseUrl = parameterAsString(config.baseUrl);
    this.healthPath = parameterAsString(config.healthPath);
    this.defaultHeaders = toHeaders(config.defaultHeaders);
  }

  protected async openSession(): Promise<IHttpSession> {
    return {};
  }

  protected async closeSession(): Promise<void> {}

  protected async checkHealth(signal?: AbortSignal): Promise<HealthReading> {
    if (!this.baseUrl || !this.healthPath) {
      return { isHealthy: true, message: 'HTTP client ready', metrics: {} };
    }

    const url = this.resolveUrl(this.healthPath);
    const response = await this.fetchImpl(url, { method: 'GET', headers: this.defaultHeaders, signal });
    return {
      isHealthy: response.ok,
      message: response.ok ? `${url} responded ${response.status}` : `${url} returned status ${response.status}`,
      metrics: { statusCode: response.status },
    };
  }

  protected async executeStep(context: IStepContext<IHttpSession>): Promise<StepOutcome> {
    const { session, step, signal } = context;
    const action = step.action.toLowerCase();

    switch (action) {
      case ACTIONS.NAVIGATE:
      case ACTIONS.API_GET:
      case ACTIONS.API_POST:
      case ACTIONS.API_PUT:
      case ACTIONS.API_PATCH:
      case ACTIONS.API_DELETE:
        return this.request(context, METHODS[action]);

      case ACTIONS.VERIFY:
      case ACTIONS.ASSERT: {
        const mode = parameterAsString(getParameterValue(step, PARAMS.MODE))?.toLowerCase();
        if (mode === 'load' || /^https?:\/\//i.test(step.target)) {
          return this.request(context, 'GET');
        }
        return this.verifyBody(session, parameterAsString(getParameterValue(step, PARAMS.EXPECTED)) ?? '');
      }

      case ACTIONS.VERIFY_STATUS_CODE: {
        const response = this.requireResponse(session);
        const expected = parameterAsNumber(getParameterValue(step, PARAMS.EXPECTED_CODE)) ??
          parameterAsNumber(getParameterValue(step, PARAMS.EXPECTED));
        const passed = response.status === expected;
        return {
          passed,
          message: passed ? `Status code is ${expected}` : `Expected status ${expected}, got ${response.status}`,
          actualResult: String(response.status),
        };
      }

      case ACTIONS.VERIFY_BODY:
        return this.verifyBody(session, parameterAsString(getParameterValue(step, PARAMS.EXPECTED)) ?? '');

      case ACTIONS.VERIFY_HEADER: {
        const response = this.requireResponse(session);
        const name = (parameterAsString(getParameterValue(step, PARAMS.HEADER_NAME)) ?? step.target).toLowerCase();
        const expected = parameterAsString(getParameterValue(step, PARAMS.EXPECTED));
        const actual = response.headers[name];
        const passed = actual !== undefined && (expected === undefined || actual.includes(expected));
        return {
          passed,
          message: passed ? `Header ${name} matches` : `Header ${name} is ${actual ?? 'missing'}`,
          actualResult: actual ?? '',
        };
      }

      case ACTIONS.WAIT: {
        const duration = parameterAsNumber(getParameterValue(step, PARAMS.DURATION)) ?? 0;
        await sleep(duration, undefined, { signal });
        return { passed: true, message: `Waited ${duration}ms` };
      }

      default:
        return { passed: false, message: ERROR_MESSAGES.UNSUPPORTED_ACTION(step.action, this.name) };
    }
  }

  private resolveUrl(target: string): string {
    if (/^https?:\/\//i.test(target)) {
      return target;
    }
    if (!this.baseUrl) {
      throw new Error(`Relative target '${target}' needs a baseUrl`);
    }
    return new URL(target, this.baseUrl).toString();
  }

  private async request(context: IStepContext<IHttpSession>, method: string): Promise<StepOutcome> {
    const { session, step, signal } = context;
    const url = this.resolveUrl(parameterAsString(getParameterValue(step, PARAMS.URL)) ?? step.target);
    const headers = { ...this.defaultHeaders, ...toHeaders(getParameterValue(step, PARAMS.HEADERS)) };

    let body: string | undefined;
    const payload = getParameterValue(step, PARAMS.BODY);
    if (method !== 'GET' && method !== 'DELETE' && payload !== undefined) {
      body = typeof payload === 'string' ? payload : JSON.stringify(payload);
      if (typeof payload !== 'string' && !Object.keys(headers).some(h => h.toLowerCase() === 'content-type')) {
        headers['Content-Type'] = 'application/json';
      }
    }

    const response = await this.fetchImpl(url, { method, headers, body, signal });
    const snapshot: IHttpResponseSnapshot = {
      url,
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body: await response.text(),
    };
    session.lastResponse = snapshot;

    const expectedCode = parameterAsNumber(getParameterValue(step, PARAMS.EXPECTED_CODE));
    const passed = expectedCode !== undefined ? snapshot.status === expectedCode : snapshot.status < 400;
    return {
      passed,
      message: `${method} ${url} returned ${snapshot.status}`,
      actualResult: String(snapshot.status),
    };
  }

  private requireResponse(session: IHttpSession): IHttpResponseSnapshot {
    if (!session.lastResponse) {
      throw new Error('No response to verify; send a request first');
    }
    return session.lastResponse;
  }

  private verifyBody(session: IHttpSession, expected: string): StepOutcome {
    const response = this.requireResponse(session);
    const passed = response.body.includes(expected);
    return {
      passed,
      message: passed ? `Response body contains '${expected}'` : `Response body does not contain '${expected}'`,
      actualResult: response.body.slice(0, 500),
    };
  }
}
