/**
 * LLM Provider Factory
 *
 * Creates LLM provider instances based on configuration
 */

import { ILLMProvider, ILLMProviderConfig, LLMProviderType } from './types.js';
import { OpenAIProvider } from './openai-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { IConfig, readSettings } from '../infra/config.js';
import { ILogger } from '../infra/logger.js';

export class LLMProviderFactory {
  static create(type: LLMProviderType, config: IConfig, logger: ILogger): ILLMProvider {
    switch (type) {
      case 'openai':
        return new OpenAIProvider(LLMProviderFactory.providerConfig(config, 'OPENAI'), logger);
      case 'anthropic':
        return new AnthropicProvider(LLMProviderFactory.providerConfig(config, 'ANTHROPIC'), logger);
    }
  }

  /**
   * Create provider from environment configuration
   */
  static createFromConfig(config: IConfig, logger: ILogger): ILLMProvider {
    const providerType = readSettings(config).llmProvider;
    logger.info(`Creating LLM provider: ${providerType}`);
    return LLMProviderFactory.create(providerType, config, logger);
  }

  private static providerConfig(config: IConfig, prefix: 'OPENAI' | 'ANTHROPIC'): ILLMProviderConfig {
    const apiKey = config.get(`${prefix}_API_KEY`);
    if (!apiKey) {
      throw new Error(`${prefix}_API_KEY is required for ${prefix.toLowerCase()} provider`);
    }

    return {
      apiKey,
      defaultModel: config.get(`${prefix}_MODEL`),
      baseURL: config.get(`${prefix}_BASE_URL`),
      timeout: 60000,
    };
  }
}
