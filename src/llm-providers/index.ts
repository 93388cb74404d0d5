import type { ModelClient, ProviderConfig, ProviderProtocol } from './types.js';

import { AnthropicModelClient } from './anthropic.js';
import { GoogleModelClient } from './google.js';
import { OpenAICompatibleModelClient } from './openai-compatible.js';
import { OpenAIModelClient } from './openai.js';
import { SetupError } from './setup-error.js';

export const SUPPORTED_PROTOCOLS: readonly ProviderProtocol[] = ['anthropic', 'openai', 'openai-compatible', 'google'];

export const isSupportedProtocol = (value: string): value is ProviderProtocol =>
  SUPPORTED_PROTOCOLS.some((protocol) => protocol === value);

// Local endpoints commonly run without a key; every hosted protocol needs one.
const KEY_OPTIONAL: ReadonlySet<ProviderProtocol> = new Set(['openai-compatible']);

export function createModelClient(config: ProviderConfig, fetchImpl?: typeof fetch): ModelClient {
  const protocol: string = config.protocol;
  if (!isSupportedProtocol(protocol)) {
    throw new SetupError('unsupported_provider', `unsupported provider protocol '${protocol}' (expected one of ${SUPPORTED_PROTOCOLS.join(', ')})`);
  }
  const apiKey = config.apiKey?.trim() ?? '';
  if (apiKey.length === 0 && !KEY_OPTIONAL.has(protocol)) {
    throw new SetupError('missing_credential', `no API key configured for provider '${protocol}'`);
  }
  switch (protocol) {
    case 'anthropic':
      return new AnthropicModelClient(config, fetchImpl);
    case 'openai':
      return new OpenAIModelClient(config, fetchImpl);
    case 'openai-compatible':
      return new OpenAICompatibleModelClient(config, fetchImpl);
    case 'google':
      return new GoogleModelClient(config, fetchImpl);
  }
}

export { AiSdkModelClient, convertMessages, convertTools } from './base.js';
export { LlmError, isLlmError, toLlmError, type LlmErrorKind } from './llm-errors.js';
export { SetupError, isSetupError, type SetupErrorKind } from './setup-error.js';
export type { CompletionOptions, ModelClient, ModelResponse, ProviderConfig, ProviderProtocol } from './types.js';
