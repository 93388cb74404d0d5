import { createOpenAICompatible } from '@ai-sdk/openai-compatible';

import type { ProviderConfig } from './types.js';

import { AiSdkModelClient } from './base.js';
import { SetupError } from './setup-error.js';

export class OpenAICompatibleModelClient extends AiSdkModelClient {
  constructor(config: ProviderConfig, fetchImpl?: typeof fetch) {
    const providerId = config.name ?? 'openai-compatible';
    const baseUrl = config.baseUrl;
    if (baseUrl === undefined || baseUrl.length === 0) {
      throw new SetupError('missing_base_url', `openai-compatible provider '${providerId}' missing baseUrl`);
    }
    const prov = createOpenAICompatible({
      apiKey: config.apiKey,
      baseURL: baseUrl,
      headers: config.headers,
      name: providerId,
      fetch: fetchImpl,
      includeUsage: true,
    });
    super({
      providerName: providerId,
      modelName: config.model,
      model: prov.chatModel(config.model),
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
    });
  }
}
