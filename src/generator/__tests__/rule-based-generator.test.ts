/**
 * RuleBasedScenarioGenerator Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RuleBasedScenarioGenerator } from '../rule-based-generator.js';
import { createStep, createScenario, validateScenario } from '../../model/index.js';
import type { ITestResult } from '../../types/index.js';

const LOGIN_STORY = 'As a user, I want to login to https://app.example.com';

describe('RuleBasedScenarioGenerator', () => {
  let generator: RuleBasedScenarioGenerator;

  beforeEach(() => {
    generator = new RuleBasedScenarioGenerator();
  });

  describe('generate', () => {
    it('should build a login scenario from a login story with a URL', async () => {
      const scenario = await generator.generate(LOGIN_STORY, 'Customer portal');

      expect(scenario.type).toBe('UI');
      expect(scenario.status).toBe('Generated');
      expect(scenario.title).toBe('Login Test');
      expect(scenario.priority).toBe('High');
      expect(scenario.tags).toEqual(['login', 'web', 'generated']);
      expect(scenario.steps[0].action).toBe('navigate');
      expect(scenario.steps[0].target).toBe('https://app.example.com');
      expect(scenario.steps.slice(1).some(step => ['enter_text', 'click'].includes(step.action))).toBe(true);
      expect(scenario.steps.map(step => step.order)).toEqual([1, 2, 3, 4, 5]);
      expect(scenario.metadata).toMatchObject({ generator: 'rule-based', category: 'login', projectContext: 'Customer portal' });
    });

    it('should type placeholder credentials when the story has none', async () => {
      const scenario = await generator.generate(LOGIN_STORY, '');

      expect(scenario.steps[1].parameters.value).toBe('user@example.com');
      expect(scenario.steps[2].parameters.value).toBe('password123');
    });

    it('should type the credentials found in the story', async () => {
      const scenario = await generator.generate(
        'Login to https://portal.example.com with admin@example.com and password: s3cret.',
        ''
      );

      expect(scenario.steps[1].parameters.value).toBe('admin@example.com');
      expect(scenario.steps[2].parameters.value).toBe('s3cret');
    });

    it('should prefer quote over login', async () => {
      const scenario = await generator.generate('After I log in I want a car insurance quote', '');

      expect(scenario.title).toBe('Insurance Quote Test');
      expect(scenario.steps[0].target).toBe('/quote');
    });

    it('should mark service stories as API and fall back to the category path', async () => {
      const scenario = await generator.generate('The claims service should accept a new claim', '');

      expect(scenario.type).toBe('API');
      expect(scenario.title).toBe('Claim Submission Test');
      expect(scenario.tags).toEqual(['claim', 'api', 'generated']);
      expect(scenario.steps[0].target).toBe('/claims');
    });

    it('should produce a single verify step when no keyword matches', async () => {
      const scenario = await generator.generate('Check the homepage https://www.example.com.', '');

      expect(scenario.title).toBe('Page Load Verification Test');
      expect(scenario.steps).toHaveLength(1);
      expect(scenario.steps[0].action).toBe('verify');
      expect(scenario.steps[0].target).toBe('https://www.example.com');
      expect(scenario.steps[0].parameters.expected).toBe('Page loaded');
    });

    it.each(['', '   ', '!!!'])('should degrade to the generic scenario for %j', async story => {
      const scenario = await generator.generate(story, '');

      expect(scenario.steps).toHaveLength(1);
      expect(scenario.steps[0].action).toBe('verify');
      expect(scenario.steps[0].target).toBe('body');
    });

    it('should keep the first 100 characters of the story in the description', async () => {
      const story = `Login ${'x'.repeat(200)}`;
      const scenario = await generator.generate(story, '');

      expect(scenario.description).toBe(`Automated test generated from user story: ${story.slice(0, 100)}`);
      expect(scenario.originalUserStory).toBe(story);
    });

    it('should produce structurally valid scenarios once a project is set', async () => {
      for (const story of [LOGIN_STORY, 'get a quote', 'file a claim', 'pay my bill', 'hello']) {
        const scenario = await generator.generate(story, '');
        expect(validateScenario({ ...scenario, projectId: 'project-1' })).toEqual([]);
      }
    });
  });

  describe('refineSteps', () => {
    it('should apply timeout, wait and screenshot feedback without touching the input', async () => {
      const { steps } = await generator.generate(LOGIN_STORY, '');

      const refined = await generator.refineSteps(steps, 'Page is slow, add a wait and take a screenshot');

      expect(refined).toHaveLength(6);
      expect(refined[0].timeout).toBe(60000);
      expect(refined[1].action).toBe('wait');
      expect(refined[1].parameters.duration).toBe(1000);
      expect(refined.every(step => step.takeScreenshot)).toBe(true);
      expect(refined.map(step => step.order)).toEqual([1, 2, 3, 4, 5, 6]);

      expect(steps).toHaveLength(5);
      expect(steps[0].timeout).toBe(30000);
      expect(steps[0].takeScreenshot).toBe(false);
    });
  });

  describe('analyzeFailure', () => {
    it('should narrate failed steps with recommendations', async () => {
      const result: ITestResult = {
        id: 'result-1',
        scenarioId: 'scenario-1',
        environment: 'Testing',
        startedAt: 0,
        completedAt: 1200,
        duration: 1200,
        passed: false,
        message: 'Test failed at step: Enter username',
        executedBy: 'fake',
        stepResults: [
          {
            id: 'sr-1',
            stepId: 'step-1',
            stepName: 'Enter username',
            action: 'enter_text',
            target: '#username',
            passed: false,
            message: 'Element not found: #username',
            expectedResult: '',
            actualResult: '',
            startedAt: 0,
            completedAt: 10,
            duration: 10,
            isRequired: true,
          },
        ],
        screenshots: [],
        executionTags: [],
        retryAttempts: 0,
      };

      const narrative = await generator.analyzeFailure(result);

      expect(narrative.split('\n')).toEqual([
        'Test Status: FAILED',
        'Duration: 1200ms',
        'Message: Test failed at step: Enter username',
        'Failed Steps: 1',
        '- Enter username (enter_text #username): Element not found: #username',
        "  Recommendation: Element not found: check the selector '#username' or wait for the page to finish loading",
      ]);
    });
  });

  describe('generateTestData', () => {
    it('should collect step parameters and add requested fields', async () => {
      const scenario = await generator.generate(LOGIN_STORY, '');

      const data = await generator.generateTestData(scenario, 'Needs an email and a phone number');

      expect(data).toEqual({
        url: 'https://app.example.com',
        username: 'user@example.com',
        clearFirst: true,
        password: 'password123',
        expected: 'Welcome',
        mode: 'text',
        email: 'test.user@example.com',
        phone: '+1-555-0100',
      });
    });
  });

  describe('optimizeScenarios', () => {
    it('should drop disabled and consecutive duplicate steps', async () => {
      const scenario = createScenario({
        title: 'Noisy',
        steps: [
          createStep({ action: 'click', target: '#a', order: 1 }),
          createStep({ action: 'click', target: '#a', order: 2 }),
          createStep({ action: 'click', target: '#b', order: 3, isEnabled: false }),
          createStep({ action: 'click', target: '#c', order: 4 }),
        ],
      });

      const [optimized] = await generator.optimizeScenarios([scenario]);

      expect(optimized.steps.map(step => [step.order, step.target])).toEqual([
        [1, '#a'],
        [2, '#c'],
      ]);
      expect(scenario.steps).toHaveLength(4);
    });
  });

  describe('suggestAdditionalTests', () => {
    it('should propose a negative login and uncovered categories from the context', async () => {
      const login = await generator.generate(LOGIN_STORY, '');

      const suggestions = await generator.suggestAdditionalTests(
        [login],
        'We also sell insurance quotes and process payments'
      );

      expect(suggestions.map(s => s.title)).toEqual([
        'Login Test - Invalid Credentials',
        'Insurance Quote Test',
        'Payment Test',
      ]);
      expect(suggestions[0].steps[0].target).toBe('https://app.example.com');
      expect(suggestions[0].tags).toContain('negative');
    });

    it('should suggest nothing when everything is covered', async () => {
      const login = await generator.generate(LOGIN_STORY, '');
      const negative = { ...login, tags: ['login', 'negative'] };

      expect(await generator.suggestAdditionalTests([login, negative], 'login page')).toEqual([]);
    });
  });

  describe('validateScenario', () => {
    it('should score a complete scenario at 100', async () => {
      const scenario = { ...(await generator.generate(LOGIN_STORY, '')), projectId: 'project-1' };

      const validation = await generator.validateScenario(scenario);

      expect(validation.isValid).toBe(true);
      expect(validation.qualityScore).toBe(100);
      expect(validation.issues).toEqual([]);
      expect(validation.missingCoverage).toEqual(['No negative test path']);
      expect(validation.recommendedAssertions).toEqual([
        'Verify the page title after navigating to https://app.example.com',
      ]);
    });

    it('should report structural issues and a lower score', async () => {
      const scenario = createScenario({ title: 'Empty', projectId: 'project-1' });

      const validation = await generator.validateScenario(scenario);

      expect(validation.isValid).toBe(false);
      expect(validation.issues).toEqual(['At least one test step is required']);
      expect(validation.qualityScore).toBe(50);
      expect(validation.missingCoverage).toEqual(['No verification step', 'No negative test path']);
    });
  });
});
