/**
 * LLM-backed scenario generator.
 *
 * Prompts a chat-completion provider with Mustache templates and validates the
 * JSON it answers with. Every failure (transport, empty answer, schema mismatch,
 * structurally invalid steps) is logged and answered by the fallback generator
 * instead, so callers see the same guarantees as the rule-based generator.
 */

import { z } from 'zod';
import type { IScenarioGenerator, IScenarioValidationResult } from './index.js';
import type { ITestResult, ITestScenario, ITestStep, ParameterMap } from '../types/index.js';
import { ERROR_MESSAGES, GENERATED_TAG, KNOWN_ACTIONS, TEST_PRIORITIES, TEST_TYPES } from '../constants/index.js';
import { createScenario, createStep, renumberSteps, validateScenario, validateStep } from '../model/index.js';
import { extractJsonBlock, type ILLMProvider } from '../providers/index.js';
import { PromptManager, type PromptView } from '../infra/prompt-manager.js';
import { RetryStrategy } from '../infra/retry-utils.js';
import { ILogger } from '../infra/logger.js';
import { toError } from '../errors/index.js';
import { RuleBasedScenarioGenerator } from './rule-based-generator.js';
import {
  llmScenarioSchema,
  llmStepsResponseSchema,
  llmSuggestionsResponseSchema,
  llmValidationResponseSchema,
  parameterMapSchema,
  type LlmScenario,
  type LlmStep,
} from './schemas.js';

export interface LlmScenarioGeneratorOptions {
  model?: string;
  fallback?: IScenarioGenerator;
  promptManager?: PromptManager;
  retryStrategy?: RetryStrategy;
  maxRetries?: number;
  temperature?: number;
}

export class LlmScenarioGenerator implements IScenarioGenerator {
  readonly name = 'llm';
  private model: string;
  private fallback: IScenarioGenerator;
  private promptManager: PromptManager;
  private retryStrategy: RetryStrategy;
  private maxRetries: number;
  private temperature: number;

  constructor(
    private provider: ILLMProvider,
    private logger: ILogger,
    options: LlmScenarioGeneratorOptions = {}
  ) {
    this.model = options.model ?? provider.getDefaultModel();
    this.fallback = options.fallback ?? new RuleBasedScenarioGenerator(logger);
    this.promptManager = options.promptManager ?? PromptManager.getInstance();
    this.retryStrategy = options.retryStrategy ?? new RetryStrategy(logger);
    this.maxRetries = options.maxRetries ?? 2;
    this.temperature = options.temperature ?? 0;

    this.logger.info(`LlmScenarioGenerator initialized with ${provider.name} provider`, {
      model: this.model,
      fallback: this.fallback.name,
    });
  }

  async generate(userStory: string, projectContext: string, signal?: AbortSignal): Promise<ITestScenario> {
    return this.withFallback(
      'generate',
      async () => {
        const parsed = await this.ask(
          'generate-scenario',
          { userStory, projectContext, types: TEST_TYPES.join(', '), priorities: TEST_PRIORITIES.join(', ') },
          llmScenarioSchema,
          signal
        );
        const scenario = this.toScenario(parsed, userStory, projectContext);
        this.assertStepsValid(scenario.steps);
        return scenario;
      },
      () => this.fallback.generate(userStory, projectContext, signal),
      signal
    );
  }

  async refineSteps(steps: ITestStep[], feedback: string, signal?: AbortSignal): Promise<ITestStep[]> {
    return this.withFallback(
      'refineSteps',
      async () => {
        const parsed = await this.ask(
          'refine-steps',
          { stepsJson: JSON.stringify(steps, null, 2), feedback },
          llmStepsResponseSchema,
          signal
        );
        const refined = this.toSteps(parsed.steps);
        this.assertStepsValid(refined);
        return refined;
      },
      () => this.fallback.refineSteps(steps, feedback, signal),
      signal
    );
  }

  async analyzeFailure(result: ITestResult, signal?: AbortSignal): Promise<string> {
    return this.withFallback(
      'analyzeFailure',
      async () => {
        const failedSteps = result.stepResults.filter(step => !step.passed);
        const content = await this.complete(
          'analyze-failure',
          {
            status: result.passed ? 'PASSED' : 'FAILED',
            duration: result.duration,
            message: result.message,
            failedCount: failedSteps.length,
            failedSteps,
          },
          false,
          signal
        );
        const analysis = content.trim();
        if (!analysis) {
          throw new Error('Empty failure analysis');
        }
        return analysis;
      },
      () => this.fallback.analyzeFailure(result, signal),
      signal
    );
  }

  async generateTestData(scenario: ITestScenario, requirements: string, signal?: AbortSignal): Promise<ParameterMap> {
    return this.withFallback(
      'generateTestData',
      () =>
        this.ask(
          'generate-test-data',
          { title: scenario.title, steps: scenario.steps, requirements },
          parameterMapSchema,
          signal
        ),
      () => this.fallback.generateTestData(scenario, requirements, signal),
      signal
    );
  }

  /**
   * Step clean-up is mechanical; the fallback does it without a model call.
   */
  async optimizeScenarios(scenarios: ITestScenario[], signal?: AbortSignal): Promise<ITestScenario[]> {
    return this.fallback.optimizeScenarios(scenarios, signal);
  }

  async suggestAdditionalTests(
    existing: ITestScenario[],
    projectContext: string,
    signal?: AbortSignal
  ): Promise<ITestScenario[]> {
    return this.withFallback(
      'suggestAdditionalTests',
      async () => {
        const parsed = await this.ask(
          'suggest-tests',
          { existingTitles: existing.map(s => s.title).join(', ') || 'none', projectContext },
          llmSuggestionsResponseSchema,
          signal
        );
        const scenarios = parsed.scenarios.map(s => this.toScenario(s, '', projectContext));
        scenarios.forEach(s => this.assertStepsValid(s.steps));
        return scenarios;
      },
      () => this.fallback.suggestAdditionalTests(existing, projectContext, signal),
      signal
    );
  }

  async validateScenario(scenario: ITestScenario, signal?: AbortSignal): Promise<IScenarioValidationResult> {
    const structural = validateScenario(scenario);
    return this.withFallback(
      'validateScenario',
      async () => {
        const review = await this.ask(
          'validate-scenario',
          { scenarioJson: JSON.stringify(scenario, null, 2) },
          llmValidationResponseSchema,
          signal
        );
        return {
          isValid: structural.length === 0,
          qualityScore: Math.round(review.qualityScore),
          issues: [...structural, ...review.issues],
          suggestions: review.suggestions,
          missingCoverage: review.missingCoverage,
          recommendedAssertions: review.recommendedAssertions,
        };
      },
      () => this.fallback.validateScenario(scenario, signal),
      signal
    );
  }

  private async withFallback<T>(
    operation: string,
    primary: () => Promise<T>,
    fallback: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      return await primary();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn(`LLM ${operation} failed, using ${this.fallback.name} generator`, {
        provider: this.provider.name,
        error: toError(error).message,
      });
      return fallback();
    }
  }

  private async ask<S extends z.ZodTypeAny>(
    template: string,
    view: PromptView,
    schema: S,
    signal?: AbortSignal
  ): Promise<z.infer<S>> {
    const content = await this.complete(template, view, true, signal);
    return schema.parse(JSON.parse(extractJsonBlock(content)));
  }

  private async complete(template: string, view: PromptView, json: boolean, signal?: AbortSignal): Promise<string> {
    const systemPrompt = this.promptManager.render('generator-system', { actions: KNOWN_ACTIONS.join(', ') });
    const userPrompt = this.promptManager.render(template, view);

    const response = await this.retryStrategy.execute(
      () =>
        this.provider.createChatCompletion({
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: this.temperature,
          json: json && this.provider.supportsJsonMode(),
          signal,
        }),
      { maxRetries: this.maxRetries, backoff: 'exponential', initialDelay: 500, signal }
    );

    this.logger.debug(`LLM ${template} answered`, { model: response.model, usage: response.usage });
    return response.content;
  }

  private toSteps(steps: LlmStep[]): ITestStep[] {
    const ordered = steps
      .map((step, index) => ({ step, index }))
      .sort((a, b) => (a.step.order ?? a.index + 1) - (b.step.order ?? b.index + 1) || a.index - b.index);

    return renumberSteps(
      ordered.map(({ step }) =>
        createStep({
          action: step.action.toLowerCase(),
          target: step.target,
          description: step.description,
          expectedResult: step.expectedResult,
          parameters: step.parameters,
          timeout: step.timeout,
          waitBefore: step.waitBefore,
          waitAfter: step.waitAfter,
          continueOnFailure: step.continueOnFailure,
          takeScreenshot: step.takeScreenshot,
        })
      )
    );
  }

  private toScenario(parsed: LlmScenario, userStory: string, projectContext: string): ITestScenario {
    return createScenario({
      title: parsed.title,
      description: parsed.description,
      originalUserStory: userStory,
      type: parsed.type,
      status: 'Generated',
      priority: parsed.priority,
      steps: this.toSteps(parsed.steps),
      tags: parsed.tags.includes(GENERATED_TAG) ? parsed.tags : [...parsed.tags, GENERATED_TAG],
      preconditions: parsed.preconditions,
      expectedOutcomes: parsed.expectedOutcomes,
      createdBy: 'generator',
      metadata: { generator: this.name, provider: this.provider.name, model: this.model, projectContext },
    });
  }

  private assertStepsValid(steps: ITestStep[]): void {
    const errors = steps.flatMap(step => validateStep(step).map(error => ERROR_MESSAGES.STEP_PREFIX(step.action) + error));
    if (errors.length > 0) {
      throw new Error(`Model produced invalid steps: ${errors.join('; ')}`);
    }
  }
}
