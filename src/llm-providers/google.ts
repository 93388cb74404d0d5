import { createGoogleGenerativeAI } from '@ai-sdk/google';

import type { ProviderConfig } from './types.js';

import { AiSdkModelClient } from './base.js';

export class GoogleModelClient extends AiSdkModelClient {
  constructor(config: ProviderConfig, fetchImpl?: typeof fetch) {
    const prov = createGoogleGenerativeAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      headers: config.headers,
      fetch: fetchImpl,
    });
    super({
      providerName: 'google',
      modelName: config.model,
      model: prov(config.model),
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
    });
  }
}
