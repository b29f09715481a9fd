/**
 * OpenAI chat completions behind ILLMProvider.
 */

import OpenAI from 'openai';
import { ILLMProvider, ILLMProviderConfig, ILLMCompletionOptions, ILLMCompletionResponse, ILLMMessage } from './types.js';
import { classifyApiFailure } from './errors.js';
import { ILogger } from '../infra/logger.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

function toOpenAIMessage(msg: ILLMMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
  }
}

export class OpenAIProvider implements ILLMProvider {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(
    private config: ILLMProviderConfig,
    private logger: ILogger
  ) {
    // Retries are paced by the generator's RetryStrategy
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: config.timeout ?? 60000,
    });

    this.logger.info('OpenAI provider initialized', { defaultModel: this.getDefaultModel() });
  }

  async createChatCompletion(options: ILLMCompletionOptions): Promise<ILLMCompletionResponse> {
    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: options.model,
          messages: options.messages.map(toOpenAIMessage),
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens,
          response_format: options.json ? { type: 'json_object' } : undefined,
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (options.signal?.aborted || !(error instanceof OpenAI.APIError)) {
        throw error;
      }
      this.logger.error('OpenAI API error', { status: error.status, message: error.message });
      throw classifyApiFailure(this.name, error.status, error);
    }

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('OpenAI returned empty response');
    }

    return {
      content,
      model: response.model,
      usage: response.usage
        ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
        : undefined,
    };
  }

  supportsJsonMode(): boolean {
    return true;
  }

  getDefaultModel(): string {
    return this.config.defaultModel || DEFAULT_MODEL;
  }
}
