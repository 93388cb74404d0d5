import { createOpenAI } from '@ai-sdk/openai';

import type { ProviderConfig } from './types.js';

import { AiSdkModelClient } from './base.js';

export class OpenAIModelClient extends AiSdkModelClient {
  constructor(config: ProviderConfig, fetchImpl?: typeof fetch) {
    const prov = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      headers: config.headers,
      fetch: fetchImpl,
    });
    super({
      providerName: 'openai',
      modelName: config.model,
      // Chat Completions keeps tool-call round trips stateless across requests.
      model: prov.chat(config.model),
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
    });
  }
}
