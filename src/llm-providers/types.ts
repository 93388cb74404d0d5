import type { ToolDefinition } from '../tools/types.js';
import type { Message, TokenUsage } from '../types.js';

export type ProviderProtocol = 'anthropic' | 'openai' | 'openai-compatible' | 'google';

export interface CompletionOptions {
  maxOutputTokens?: number;
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface ModelResponse {
  message: Message;
  usage?: TokenUsage;
  finishReason?: string;
  /** Model id as reported by the provider, when it differs from the configured one. */
  model?: string;
}

/** What the engine consumes from a language model. */
export interface ModelClient {
  readonly providerName: string;
  readonly modelName: string;
  complete: (messages: readonly Message[], tools?: readonly ToolDefinition[], options?: CompletionOptions) => Promise<ModelResponse>;
}

export interface ProviderConfig {
  protocol: ProviderProtocol;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  headers?: Record<string, string>;
  maxOutputTokens?: number;
  temperature?: number;
  /** Provider label for openai-compatible endpoints. */
  name?: string;
}
