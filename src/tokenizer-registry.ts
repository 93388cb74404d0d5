import { countTokens as anthropicCountTokens } from '@anthropic-ai/tokenizer';
import { encoding_for_model, get_encoding } from '@dqbd/tiktoken';

import type { Message } from './types.js';
import type { TiktokenModel } from '@dqbd/tiktoken';

export interface Tokenizer {
  countText: (text: string) => number;
}

const APPROXIMATE_ID = 'approximate';
const MESSAGE_OVERHEAD_TOKENS = 4;
const TOOL_USE_OVERHEAD_TOKENS = 2;
const IMAGE_TOKENS = 1_000;

interface Encoding { encode: (input: string) => Uint32Array }

const tokenizerCache = new Map<string, Tokenizer>();

export const approximateTokenizer: Tokenizer = {
  countText: (text: string): number => {
    if (text.length === 0) return 0;
    // Rough heuristic: 4 characters ≈ 1 token, clamp to at least 1.
    return Math.max(1, Math.ceil(text.length / 4));
  },
};

const anthropicTokenizer: Tokenizer = {
  countText: (text: string): number => {
    if (text.length === 0) return 0;
    try {
      return anthropicCountTokens(text);
    } catch {
      return approximateTokenizer.countText(text);
    }
  },
};

const isEncoding = (value: unknown): value is Encoding => (
  value !== null
  && typeof value === 'object'
  && typeof (value as { encode?: unknown }).encode === 'function'
);

const getEncodingForModel = (model: string): Encoding | undefined => {
  try {
    const directCandidate: unknown = encoding_for_model(model as TiktokenModel);
    if (isEncoding(directCandidate)) {
      return directCandidate;
    }
  } catch {
    // unknown model name, use the generic encoding
  }
  try {
    const fallbackCandidate: unknown = get_encoding('cl100k_base');
    if (isEncoding(fallbackCandidate)) {
      return fallbackCandidate;
    }
  } catch {
    // wasm unavailable, defer to approximation
  }
  return undefined;
};

function createTiktokenTokenizer(model: string): Tokenizer {
  const encoding = getEncodingForModel(model);
  if (encoding === undefined) {
    return approximateTokenizer;
  }
  return {
    countText: (text: string): number => {
      if (text.length === 0) return 0;
      return encoding.encode(text).length;
    },
  };
}

function createTokenizer(id: string): Tokenizer {
  const normalized = id.trim();
  const lower = normalized.toLowerCase();
  if (lower.length === 0 || lower === APPROXIMATE_ID) {
    return approximateTokenizer;
  }
  if (lower.startsWith('tiktoken:')) {
    const model = normalized.slice('tiktoken:'.length).trim();
    return createTiktokenTokenizer(model.length > 0 ? model : 'gpt-4o');
  }
  if (lower.startsWith('anthropic') || lower.startsWith('claude')) {
    return anthropicTokenizer;
  }
  return approximateTokenizer;
}

/**
 * Tokenizer ids: `approximate` (default), `tiktoken:<model>`, `anthropic` /
 * `claude*`. Anything else counts approximately.
 */
export function resolveTokenizer(id?: string): Tokenizer {
  const cacheKey = id === undefined || id.trim().length === 0 ? APPROXIMATE_ID : id.trim();
  const cached = tokenizerCache.get(cacheKey);
  if (cached !== undefined) {
    return cached;
  }
  const tokenizer = createTokenizer(cacheKey);
  tokenizerCache.set(cacheKey, tokenizer);
  return tokenizer;
}

/** Tokenizer id implied by a provider/model pair when none is configured. */
export function defaultTokenizerFor(provider: string, model: string): string {
  if (provider === 'anthropic') return 'anthropic';
  if (provider === 'openai') return `tiktoken:${model}`;
  return APPROXIMATE_ID;
}

function serializeMessage(message: Message): { text: string; toolUses: number; images: number } {
  const parts: string[] = [`role:${message.role}`];
  if (typeof message.content === 'string') {
    if (message.content.length > 0) parts.push(message.content);
    return { text: parts.join('\n'), toolUses: 0, images: 0 };
  }
  let toolUses = 0;
  let images = 0;
  // eslint-disable-next-line functional/no-loop-statements
  for (const block of message.content) {
    switch (block.type) {
      case 'text':
        parts.push(block.text);
        break;
      case 'image':
        images += 1;
        break;
      case 'tool_use':
        toolUses += 1;
        try {
          parts.push(`${block.name}:${JSON.stringify(block.input)}`);
        } catch {
          parts.push(`${block.name}:[input]`);
        }
        break;
      case 'tool_result':
        parts.push(`toolUseId:${block.toolUseId}`, block.content);
        break;
    }
  }
  return { text: parts.join('\n'), toolUses, images };
}

export function estimateMessageTokens(tokenizer: Tokenizer, message: Message): number {
  const { text, toolUses, images } = serializeMessage(message);
  return tokenizer.countText(text)
    + MESSAGE_OVERHEAD_TOKENS
    + TOOL_USE_OVERHEAD_TOKENS * toolUses
    + IMAGE_TOKENS * images;
}

export function estimateMessagesTokens(tokenizer: Tokenizer, messages: readonly Message[]): number {
  return messages.reduce((total, message) => total + estimateMessageTokens(tokenizer, message), 0);
}
