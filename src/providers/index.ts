/**
 * LLM Provider Module
 *
 * Exports provider implementations and factory for creating providers
 */

export * from './types.js';
export * from './errors.js';
export * from './factory.js';
export * from './openai-provider.js';
export * from './anthropic-provider.js';
