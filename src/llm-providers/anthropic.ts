import { createAnthropic } from '@ai-sdk/anthropic';

import type { ProviderConfig } from './types.js';

import { AiSdkModelClient } from './base.js';

export class AnthropicModelClient extends AiSdkModelClient {
  constructor(config: ProviderConfig, fetchImpl?: typeof fetch) {
    const prov = createAnthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      headers: config.headers,
      fetch: fetchImpl,
    });
    super({
      providerName: 'anthropic',
      modelName: config.model,
      model: prov(config.model),
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
    });
  }
}
