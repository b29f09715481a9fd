/**
 * Centralized constants.
 * Action names, enum value lists and message builders live here so that the
 * generator, validators and executors agree on the same strings.
 */

import type { TestEnvironment, TestPriority, TestStatus, TestType } from '../types/index.js';

// Step action names
export const ACTIONS = {
  NAVIGATE: 'navigate',
  CLICK: 'click',
  ENTER_TEXT: 'enter_text',
  TYPE: 'type',
  HOVER: 'hover',
  SELECT_OPTION: 'select_option',
  WAIT: 'wait',
  VERIFY: 'verify',
  ASSERT: 'assert',
  VERIFY_ELEMENT: 'verify_element',
  VERIFY_TEXT: 'verify_text',
  VERIFY_TITLE: 'verify_title',
  VERIFY_URL: 'verify_url',
  TAKE_SCREENSHOT: 'take_screenshot',
  API_GET: 'api_get',
  API_POST: 'api_post',
  API_PUT: 'api_put',
  API_PATCH: 'api_patch',
  API_DELETE: 'api_delete',
  VERIFY_STATUS_CODE: 'verify_status_code',
  VERIFY_BODY: 'verify_body',
  VERIFY_HEADER: 'verify_header',
} as const;

export type ActionName = (typeof ACTIONS)[keyof typeof ACTIONS];

export const KNOWN_ACTIONS: readonly string[] = Object.values(ACTIONS);

export const TEXT_INPUT_ACTIONS: readonly string[] = [ACTIONS.ENTER_TEXT, ACTIONS.TYPE];

export const BODY_ACTIONS: readonly string[] = [ACTIONS.API_POST, ACTIONS.API_PUT, ACTIONS.API_PATCH];

export const ASSERTION_ACTIONS: readonly string[] = [ACTIONS.VERIFY, ACTIONS.ASSERT];

export const TEST_TYPES = ['UI', 'API', 'Mixed', 'Database', 'Performance', 'Security'] as const satisfies readonly TestType[];

export const TEST_STATUSES = ['Draft', 'Generated', 'Validated', 'Active', 'Deprecated'] as const satisfies readonly TestStatus[];

export const TEST_PRIORITIES = ['Low', 'Medium', 'High', 'Critical'] as const satisfies readonly TestPriority[];

export const TEST_ENVIRONMENTS = ['Development', 'Testing', 'Staging', 'Production'] as const satisfies readonly TestEnvironment[];

// Parameter keys with special meaning
export const PARAMS = {
  VALUE: 'value',
  BODY: 'body',
  DURATION: 'duration',
  EXPECTED: 'expected',
  URL: 'url',
  MODE: 'mode',
  OPTION: 'option',
  HEADERS: 'headers',
  HEADER_NAME: 'headerName',
  EXPECTED_CODE: 'expectedCode',
  CLEAR_FIRST: 'clearFirst',
} as const;

export const DEFAULT_PAGE_SIZE = 50;

export const GENERATED_TAG = 'generated';

// Error messages
export const ERROR_MESSAGES = {
  TITLE_REQUIRED: 'Title is required',
  PROJECT_REQUIRED: 'ProjectId is required',
  STEPS_REQUIRED: 'At least one test step is required',
  SCENARIO_TIMEOUT_POSITIVE: 'TimeoutDuration must be positive',
  RETRY_COUNT_NEGATIVE: 'RetryCount cannot be negative',
  ACTION_REQUIRED: 'Action is required',
  TARGET_REQUIRED: 'Target is required',
  STEP_TIMEOUT_POSITIVE: 'Timeout must be positive',
  WAIT_BEFORE_NEGATIVE: 'WaitBefore cannot be negative',
  WAIT_AFTER_NEGATIVE: 'WaitAfter cannot be negative',
  VALUE_REQUIRED: "Text input actions require a 'value' parameter",
  BODY_REQUIRED: "HTTP POST/PUT/PATCH actions require a 'body' parameter",
  DURATION_REQUIRED: "Wait actions require a 'duration' parameter",
  EXPECTED_REQUIRED: "Verification actions require an 'expected' parameter",
  STEP_PREFIX: (action: string) => `Step '${action}': `,
  SCENARIO_NOT_FOUND: (id: string) => `Scenario ${id} not found`,
  RESULT_NOT_FOUND: (id: string) => `Result ${id} not found`,
  NO_EXECUTOR: (type: string) => `No executor available for test type ${type}`,
  UNSUPPORTED_ACTION: (action: string, executor: string) => `Action '${action}' is not supported by ${executor}`,
  STEP_TIMEOUT: (action: string, ms: number) => `Step '${action}' timed out after ${ms}ms`,
  SCENARIO_TIMEOUT: (ms: number) => `Scenario timeout of ${ms}ms exceeded`,
  HEALTH_CHECK_FAILED: (message: string) => `Health check failed: ${message}`,
} as const;
