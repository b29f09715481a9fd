/**
 * Canned step templates, one per story category.
 */

import type { ITestStep, TestPriority } from '../types/index.js';
import { ACTIONS, PARAMS } from '../constants/index.js';
import { createStep, renumberSteps, type StepInit } from '../model/index.js';
import type { IStoryAnalysis, StoryCategory } from './story-analysis.js';

export const DEFAULT_USERNAME = 'user@example.com';
export const DEFAULT_PASSWORD = 'password123';

const NAVIGATION_TIMEOUT_MS = 30000;
const INTERACTION_TIMEOUT_MS = 10000;

export interface ICategoryTemplate {
  title: string;
  priority: TestPriority;
  defaultPath: string;
  preconditions: string[];
  expectedOutcomes: string[];
  steps(analysis: IStoryAnalysis): StepInit[];
}

function navigateTo(analysis: IStoryAnalysis, defaultPath: string): StepInit {
  const target = analysis.primaryUrl ?? defaultPath;
  return {
    action: ACTIONS.NAVIGATE,
    target,
    description: `Navigate to ${target}`,
    expectedResult: 'Page loads successfully',
    parameters: { [PARAMS.URL]: target },
    timeout: NAVIGATION_TIMEOUT_MS,
  };
}

function enterText(target: string, value: string, description: string): StepInit {
  return {
    action: ACTIONS.ENTER_TEXT,
    target,
    description,
    expectedResult: 'Field contains the entered value',
    parameters: { [PARAMS.VALUE]: value, [PARAMS.CLEAR_FIRST]: true },
    timeout: INTERACTION_TIMEOUT_MS,
  };
}

function click(target: string, description: string, expectedResult: string): StepInit {
  return { action: ACTIONS.CLICK, target, description, expectedResult, timeout: INTERACTION_TIMEOUT_MS };
}

function waitFor(duration: number, description: string): StepInit {
  return {
    action: ACTIONS.WAIT,
    target: 'page',
    description,
    expectedResult: 'Wait completed',
    parameters: { [PARAMS.DURATION]: duration },
  };
}

function verifyText(target: string, expected: string, description: string): StepInit {
  return {
    action: ACTIONS.VERIFY,
    target,
    description,
    expectedResult: `${target} contains "${expected}"`,
    parameters: { [PARAMS.EXPECTED]: expected, [PARAMS.MODE]: 'text' },
    timeout: INTERACTION_TIMEOUT_MS,
  };
}

export const CATEGORY_TEMPLATES: Record<StoryCategory, ICategoryTemplate> = {
  quote: {
    title: 'Insurance Quote Test',
    priority: 'Medium',
    defaultPath: '/quote',
    preconditions: ['Quote page is accessible'],
    expectedOutcomes: ['Quote is calculated and displayed'],
    steps: analysis => [
      navigateTo(analysis, '/quote'),
      click('#get-quote', 'Start a new quote', 'Quote form is displayed'),
      enterText('#zipCode', '10001', 'Enter ZIP code'),
      click('#submit-quote', 'Submit quote request', 'Quote request is submitted'),
      waitFor(2000, 'Wait for quote calculation'),
      verifyText('.quote-result', 'Quote', 'Verify quote is displayed'),
    ],
  },
  login: {
    title: 'Login Test',
    priority: 'High',
    defaultPath: '/login',
    preconditions: ['Application is accessible', 'Valid credentials are available'],
    expectedOutcomes: ['User successfully logs in', 'Dashboard is accessible'],
    steps: analysis => [
      navigateTo(analysis, '/login'),
      enterText('#username', analysis.credentials.username ?? DEFAULT_USERNAME, 'Enter username'),
      enterText('#password', analysis.credentials.password ?? DEFAULT_PASSWORD, 'Enter password'),
      click("button[type='submit']", 'Click login button', 'Login form is submitted'),
      verifyText('.dashboard', 'Welcome', 'Verify successful login'),
    ],
  },
  claim: {
    title: 'Claim Submission Test',
    priority: 'Medium',
    defaultPath: '/claims',
    preconditions: ['User has an active policy'],
    expectedOutcomes: ['Claim is submitted and a confirmation is shown'],
    steps: analysis => [
      navigateTo(analysis, '/claims'),
      click('#new-claim', 'Start a new claim', 'Claim form is displayed'),
      enterText('#policyNumber', 'POL-0001', 'Enter policy number'),
      enterText('#claimDescription', 'Automated claim submission', 'Describe the claim'),
      click("button[type='submit']", 'Submit the claim', 'Claim is submitted'),
      verifyText('.claim-confirmation', 'Claim submitted', 'Verify claim confirmation'),
    ],
  },
  payment: {
    title: 'Payment Test',
    priority: 'High',
    defaultPath: '/checkout',
    preconditions: ['Payment page is accessible', 'Test card details are available'],
    expectedOutcomes: ['Payment is processed', 'Confirmation is displayed'],
    steps: analysis => [
      navigateTo(analysis, '/checkout'),
      enterText('#cardNumber', '4111111111111111', 'Enter card number'),
      enterText('#expiry', '12/30', 'Enter expiry date'),
      enterText('#cvv', '123', 'Enter security code'),
      click('#pay-now', 'Submit payment', 'Payment is submitted'),
      waitFor(2000, 'Wait for payment processing'),
      verifyText('.payment-confirmation', 'Payment successful', 'Verify payment confirmation'),
    ],
  },
  generic: {
    title: 'Page Load Verification Test',
    priority: 'Medium',
    defaultPath: 'body',
    preconditions: ['Application is accessible'],
    expectedOutcomes: ['Page loads successfully'],
    steps: analysis => [
      {
        action: ACTIONS.VERIFY,
        target: analysis.primaryUrl ?? 'body',
        description: 'Verify page loads',
        expectedResult: 'Page loads successfully',
        parameters: analysis.primaryUrl
          ? { [PARAMS.EXPECTED]: 'Page loaded', [PARAMS.MODE]: 'load' }
          : { [PARAMS.EXPECTED]: 'Page loaded', [PARAMS.MODE]: 'visible' },
        timeout: NAVIGATION_TIMEOUT_MS,
      },
    ],
  },
};

export function buildSteps(category: StoryCategory, analysis: IStoryAnalysis): ITestStep[] {
  return renumberSteps(CATEGORY_TEMPLATES[category].steps(analysis).map(init => createStep(init)));
}
