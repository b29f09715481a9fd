/**
 * Typed errors surfaced by the orchestrator and repositories.
 * A failed assertion inside a step is never one of these: it is a failed StepResult.
 */

import type { ITestResult } from '../types/index.js';

export type ErrorCode =
  | 'GENERATION_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'NOT_FOUND'
  | 'NO_EXECUTOR'
  | 'EXECUTION_ERROR'
  | 'VALIDATION_ERROR'
  | 'BATCH_EXECUTION_ERROR';

export class TestAutomationError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'TestAutomationError';
  }
}

export class GenerationError extends TestAutomationError {
  constructor(message: string, originalError?: Error) {
    super(message, 'GENERATION_ERROR', originalError);
    this.name = 'GenerationError';
  }
}

export class PersistenceError extends TestAutomationError {
  constructor(message: string, originalError?: Error) {
    super(message, 'PERSISTENCE_ERROR', originalError);
    this.name = 'PersistenceError';
  }
}

export class NotFoundError extends TestAutomationError {
  constructor(
    message: string,
    public readonly entityId: string
  ) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class NoExecutorError extends TestAutomationError {
  constructor(
    message: string,
    public readonly testType: string
  ) {
    super(message, 'NO_EXECUTOR');
    this.name = 'NoExecutorError';
  }
}

export class ExecutionError extends TestAutomationError {
  constructor(message: string, originalError?: Error) {
    super(message, 'EXECUTION_ERROR', originalError);
    this.name = 'ExecutionError';
  }
}

export class ValidationError extends TestAutomationError {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export interface IBatchFailure {
  scenarioId: string;
  error: Error;
}

/**
 * Thrown by parallel execution after every scenario has settled and at least one failed.
 */
export class BatchExecutionError extends TestAutomationError {
  constructor(
    message: string,
    public readonly results: ITestResult[],
    public readonly failures: IBatchFailure[]
  ) {
    super(message, 'BATCH_EXECUTION_ERROR');
    this.name = 'BatchExecutionError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
