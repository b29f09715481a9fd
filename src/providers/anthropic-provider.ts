/**
 * Anthropic Messages API behind ILLMProvider.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ILLMProvider, ILLMProviderConfig, ILLMCompletionOptions, ILLMCompletionResponse } from './types.js';
import { classifyApiFailure } from './errors.js';
import { ILogger } from '../infra/logger.js';

const DEFAULT_MODEL = 'claude-3-5-haiku-20241022';
const DEFAULT_MAX_TOKENS = 4096;

/**
 * Claude has no native JSON mode and sometimes fences its JSON in markdown.
 */
export function extractJsonBlock(content: string): string {
  try {
    JSON.parse(content);
    return content;
  } catch {
    const jsonMatch = content.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
    return jsonMatch ? jsonMatch[1].trim() : content;
  }
}

export class AnthropicProvider implements ILLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(
    private config: ILLMProviderConfig,
    private logger: ILogger
  ) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: config.timeout ?? 60000,
    });

    this.logger.info('Anthropic provider initialized', {
      defaultModel: this.getDefaultModel(),
      customEndpoint: config.baseURL !== undefined,
    });
  }

  async createChatCompletion(options: ILLMCompletionOptions): Promise<ILLMCompletionResponse> {
    // System prompt travels outside the message list
    const system = options.messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const messages: Anthropic.MessageParam[] = [];
    for (const msg of options.messages) {
      if (msg.role === 'user' || msg.role === 'assistant') {
        messages.push({ role: msg.role, content: msg.content });
      }
    }

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: options.temperature ?? 0,
          system: system || undefined,
          messages,
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (options.signal?.aborted || !(error instanceof Anthropic.APIError)) {
        throw error;
      }
      this.logger.error('Anthropic API error', { status: error.status, message: error.message });
      throw classifyApiFailure(this.name, error.status, error);
    }

    const text = response.content.map(block => (block.type === 'text' ? block.text : '')).join('');
    if (!text) {
      throw new Error('Anthropic returned empty response');
    }

    return {
      content: options.json ? extractJsonBlock(text) : text,
      model: response.model,
      usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
    };
  }

  /** Emulated through prompting plus fence stripping. */
  supportsJsonMode(): boolean {
    return true;
  }

  getDefaultModel(): string {
    return this.config.defaultModel || DEFAULT_MODEL;
  }
}
