/**
 * Shapes accepted from a language model. Anything the model omits gets a
 * default; anything it gets wrong fails the parse and triggers the fallback.
 */

import { z } from 'zod';
import type { ParameterValue } from '../types/index.js';
import { TEST_PRIORITIES, TEST_TYPES } from '../constants/index.js';

export const parameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(parameterValueSchema), z.record(parameterValueSchema)])
);

export const parameterMapSchema = z.record(parameterValueSchema);

export const llmStepSchema = z.object({
  order: z.number().int().optional(),
  action: z.string().trim().min(1),
  target: z.string().trim().min(1),
  description: z.string().default(''),
  expectedResult: z.string().default(''),
  parameters: parameterMapSchema.default({}),
  timeout: z.number().positive().optional(),
  waitBefore: z.number().nonnegative().optional(),
  waitAfter: z.number().nonnegative().optional(),
  continueOnFailure: z.boolean().default(false),
  takeScreenshot: z.boolean().default(false),
});

export const llmScenarioSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().default(''),
  type: z.enum(TEST_TYPES).catch('UI'),
  priority: z.enum(TEST_PRIORITIES).catch('Medium'),
  tags: z.array(z.string()).default([]),
  preconditions: z.array(z.string()).default([]),
  expectedOutcomes: z.array(z.string()).default([]),
  steps: z.array(llmStepSchema).min(1),
});

export const llmStepsResponseSchema = z.object({
  steps: z.array(llmStepSchema).min(1),
});

export const llmSuggestionsResponseSchema = z.object({
  scenarios: z.array(llmScenarioSchema),
});

export const llmValidationResponseSchema = z.object({
  qualityScore: z.number().min(0).max(100),
  issues: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
  missingCoverage: z.array(z.string()).default([]),
  recommendedAssertions: z.array(z.string()).default([]),
});

export type LlmStep = z.infer<typeof llmStepSchema>;
export type LlmScenario = z.infer<typeof llmScenarioSchema>;

