/**
 * Constants Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ACTIONS,
  ASSERTION_ACTIONS,
  BODY_ACTIONS,
  ERROR_MESSAGES,
  KNOWN_ACTIONS,
  TEST_STATUSES,
  TEST_TYPES,
  TEXT_INPUT_ACTIONS,
} from '../index.js';

describe('Constants', () => {
  describe('ACTIONS', () => {
    it('should use lowercase snake_case action names', () => {
      for (const action of KNOWN_ACTIONS) {
        expect(action).toMatch(/^[a-z]+(_[a-z]+)*$/);
      }
    });

    it('should list every action exactly once', () => {
      expect(new Set(KNOWN_ACTIONS).size).toBe(Object.keys(ACTIONS).length);
    });

    it('should group actions that need extra parameters', () => {
      expect(TEXT_INPUT_ACTIONS).toEqual(['enter_text', 'type']);
      expect(BODY_ACTIONS).toEqual(['api_post', 'api_put', 'api_patch']);
      expect(ASSERTION_ACTIONS).toEqual(['verify', 'assert']);
    });
  });

  describe('enum lists', () => {
    it('should keep the declared order', () => {
      expect(TEST_TYPES[0]).toBe('UI');
      expect(TEST_STATUSES).toEqual(['Draft', 'Generated', 'Validated', 'Active', 'Deprecated']);
    });
  });

  describe('ERROR_MESSAGES', () => {
    it('should build messages from their arguments', () => {
      expect(ERROR_MESSAGES.STEP_PREFIX('click')).toBe("Step 'click': ");
      expect(ERROR_MESSAGES.NO_EXECUTOR('Security')).toBe('No executor available for test type Security');
      expect(ERROR_MESSAGES.STEP_TIMEOUT('wait', 250)).toBe("Step 'wait' timed out after 250ms");
      expect(ERROR_MESSAGES.SCENARIO_TIMEOUT(1000)).toBe('Scenario timeout of 1000ms exceeded');
      expect(ERROR_MESSAGES.HEALTH_CHECK_FAILED('boom')).toBe('Health check failed: boom');
    });
  });
});
