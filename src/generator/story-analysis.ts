/**
 * Pattern-based reading of a user story: URLs, credentials, domain category
 * and test type. URLs are removed before keyword matching so that host names
 * such as api.example.com do not count as keywords.
 */

import type { TestType } from '../types/index.js';

export type StoryCategory = 'quote' | 'login' | 'claim' | 'payment' | 'generic';

export interface IStoryCredentials {
  username?: string;
  password?: string;
}

export interface IStoryAnalysis {
  urls: string[];
  primaryUrl?: string;
  credentials: IStoryCredentials;
  category: StoryCategory;
  mentionedCategories: Exclude<StoryCategory, 'generic'>[];
  testType: TestType;
  actionKeywords: string[];
}

const URL_PATTERN = /https?:\/\/[^\s]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;
const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
const PASSWORD_PATTERNS = [/password[:\s]+([^\s,]+)/i, /pwd[:\s]+([^\s,]+)/i, /pass[:\s]+([^\s,]+)/i];
const CREDENTIAL_HINT = /credential|password|pwd|\blog ?in\b|\bsign ?in\b|\bsignin\b/i;

// Checked in this order; the first match wins
export const CATEGORY_PATTERNS: ReadonlyArray<readonly [Exclude<StoryCategory, 'generic'>, RegExp]> = [
  ['quote', /\bquotes?\b/i],
  ['login', /\b(?:login|log in|sign in|signin)\b/i],
  ['claim', /\bclaims?\b/i],
  ['payment', /\b(?:pay|payments?|checkout)\b/i],
];

const API_PATTERN = /\b(?:api|service)\b/i;

const ACTION_KEYWORDS: ReadonlyArray<readonly [string, RegExp]> = [
  ['login', /\b(?:login|sign in|authenticate)\b/i],
  ['navigate', /\b(?:navigate|go to|visit)\b/i],
  ['enter', /\b(?:enter|input|type|fill)\b/i],
  ['click', /\b(?:click|press|submit)\b/i],
  ['verify', /\b(?:verify|check|validate)\b/i],
  ['logout', /\b(?:logout|sign out)\b/i],
  ['select', /\b(?:select|choose|pick)\b/i],
];

export function extractUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN) ?? [];
  return matches.map(url => url.replace(TRAILING_PUNCTUATION, '')).filter(url => /^https?:\/\/[^/]/.test(url));
}

export function extractCredentials(text: string): IStoryCredentials {
  const credentials: IStoryCredentials = {};

  const email = text.match(EMAIL_PATTERN);
  if (email) {
    credentials.username = email[0];
  }

  if (CREDENTIAL_HINT.test(text)) {
    for (const pattern of PASSWORD_PATTERNS) {
      const match = text.match(pattern);
      if (match) {
        const password = match[1].replace(/[.;!?)]+$/, '');
        if (password) {
          credentials.password = password;
          break;
        }
      }
    }
  }

  return credentials;
}

export function detectCategory(text: string): StoryCategory {
  for (const [category, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(text)) {
      return category;
    }
  }
  return 'generic';
}

export function detectTestType(text: string): TestType {
  return API_PATTERN.test(text) ? 'API' : 'UI';
}

export function analyzeStory(story: string): IStoryAnalysis {
  const urls = extractUrls(story);
  const prose = story.replace(URL_PATTERN, ' ');

  return {
    urls,
    primaryUrl: urls[0],
    credentials: extractCredentials(prose),
    category: detectCategory(prose),
    mentionedCategories: CATEGORY_PATTERNS.filter(([, pattern]) => pattern.test(prose)).map(([category]) => category),
    testType: detectTestType(prose),
    actionKeywords: ACTION_KEYWORDS.filter(([, pattern]) => pattern.test(prose)).map(([name]) => name),
  };
}
