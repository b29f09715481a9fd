/**
 * Chat-completion back ends the LLM scenario generator can talk to.
 */

export interface ILLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ILLMCompletionOptions {
  model: string;
  messages: ILLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask for a bare JSON object as the answer. */
  json?: boolean;
  signal?: AbortSignal;
}

export interface ILLMCompletionResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ILLMProvider {
  readonly name: string;

  /**
   * Rejects with RetryableError for transient faults (rate limits, 5xx,
   * connection loss) and FatalError for rejected requests.
   */
  createChatCompletion(options: ILLMCompletionOptions): Promise<ILLMCompletionResponse>;

  supportsJsonMode(): boolean;

  getDefaultModel(): string;
}

export interface ILLMProviderConfig {
  apiKey: string;
  defaultModel?: string;
  timeout?: number;
  baseURL?: string; // e.g. a gateway in front of the public API
}

export type LLMProviderType = 'openai' | 'anthropic';
