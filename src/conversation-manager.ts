/**
 * Conversation Manager - keeps the conversation inside the model's token budget
 *
 * Estimates the history size, and when it crosses the compression threshold
 * replaces the oldest part of the conversation with a summary, keeping the
 * system prompt and a recent tail whose size depends on the compression level.
 */
import { Mutex } from 'async-mutex';

import type { ModelClient } from './llm-providers/types.js';
import type { ExecutionContext, Message } from './types.js';

import { getText, getToolResults, getToolUses, systemMessage, userMessage } from './messages.js';
import { estimateMessageTokens, estimateMessagesTokens, resolveTokenizer, type Tokenizer } from './tokenizer-registry.js';
import { formatToolRequestCompact, truncatePreview } from './utils.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CompressionLevel = 'light' | 'medium' | 'heavy' | 'critical';

export const COMPRESSION_LEVELS: readonly CompressionLevel[] = ['light', 'medium', 'heavy', 'critical'];

export interface CompressionSummary {
  level: CompressionLevel;
  tokensBefore: number;
  tokensAfter: number;
  tokensSaved: number;
  messagesBefore: number;
  messagesAfter: number;
  summary: string;
}

export interface CompressionResult {
  messages: Message[];
  compressionApplied?: CompressionSummary;
}

export interface ConversationSummarizer {
  summarize: (messages: readonly Message[], level: CompressionLevel, context?: ExecutionContext) => Promise<string>;
}

export interface ConversationManagerCallbacks {
  /** Debug logging callback */
  onDebug?: (label: string, data: Record<string, unknown>) => void;
}

export interface ConversationManagerConfig {
  /** Context window budget in tokens. */
  maxTokens: number;
  /** Fraction of maxTokens above which compression starts. */
  threshold?: number;
  tokenizerId?: string;
  summarizer?: ConversationSummarizer;
  callbacks?: ConversationManagerCallbacks;
}

export const DEFAULT_COMPRESSION_THRESHOLD = 0.8;
export const SIMPLE_TRIM_MAX_MESSAGES = 50;
export const SUMMARY_PREFIX = '[Conversation summary]';

// Share of the budget kept verbatim as the recent tail.
const TAIL_RATIO: Record<CompressionLevel, number> = {
  light: 0.7,
  medium: 0.5,
  heavy: 0.3,
  critical: 0.15,
};

// Room reserved for the summary when projecting a level.
const SUMMARY_RATIO = 0.1;

// ---------------------------------------------------------------------------
// ConversationManager Class
// ---------------------------------------------------------------------------

export class ConversationManager {
  private readonly mutex = new Mutex();
  private readonly tokenizer: Tokenizer;
  private readonly maxTokens: number;
  private readonly threshold: number;
  private readonly summarizer: ConversationSummarizer;
  private readonly callbacks?: ConversationManagerCallbacks;

  constructor(config: ConversationManagerConfig) {
    if (!Number.isFinite(config.maxTokens) || config.maxTokens <= 0) {
      throw new Error(`maxTokens must be a positive number, got ${String(config.maxTokens)}`);
    }
    const threshold = config.threshold ?? DEFAULT_COMPRESSION_THRESHOLD;
    if (!(threshold > 0 && threshold <= 1)) {
      throw new Error(`threshold must be within (0, 1], got ${String(threshold)}`);
    }
    this.maxTokens = config.maxTokens;
    this.threshold = threshold;
    this.tokenizer = resolveTokenizer(config.tokenizerId);
    this.summarizer = config.summarizer ?? new DigestSummarizer();
    this.callbacks = config.callbacks;
  }

  public get limit(): number {
    return Math.floor(this.maxTokens * this.threshold);
  }

  public estimateTokens(messages: readonly Message[]): number {
    return estimateMessagesTokens(this.tokenizer, messages);
  }

  public needsCompression(messages: readonly Message[]): boolean {
    return this.estimateTokens(messages) > this.limit;
  }

  /**
   * Returns the history unchanged when it fits the budget. Otherwise returns a
   * compressed copy and a summary of what was done. Summarizer failures
   * propagate; callers fall back to {@link simpleTrim}.
   */
  public async maybeCompress(messages: readonly Message[], context?: ExecutionContext): Promise<CompressionResult> {
    return await this.mutex.runExclusive(async () => await this.compressUnlocked(messages, context));
  }

  private async compressUnlocked(messages: readonly Message[], context?: ExecutionContext): Promise<CompressionResult> {
    const tokensBefore = this.estimateTokens(messages);
    const limit = this.limit;
    if (tokensBefore <= limit) {
      return { messages: [...messages] };
    }

    const leading = messages.length > 0 && messages[0].role === 'system' ? [messages[0]] : [];
    const body = messages.slice(leading.length);
    const leadingTokens = this.estimateTokens(leading);
    const summaryReserve = Math.floor(limit * SUMMARY_RATIO);

    this.callbacks?.onDebug?.('compression:evaluate', { tokensBefore, limit, messages: messages.length });

    const candidates = COMPRESSION_LEVELS
      .map((level) => ({ level, cut: this.findTailStart(body, Math.floor(limit * TAIL_RATIO[level])) }))
      .filter((candidate) => candidate.cut > 0);
    if (candidates.length === 0) {
      // Nothing old enough to summarize.
      return { messages: [...messages] };
    }

    const fitIndex = candidates.findIndex((candidate) => (
      leadingTokens + summaryReserve + this.estimateTokens(body.slice(candidate.cut)) <= limit
    ));
    const startIndex = fitIndex === -1 ? candidates.length - 1 : fitIndex;

    let last: { messages: Message[]; summary: CompressionSummary } | undefined;
    // eslint-disable-next-line functional/no-loop-statements
    for (const candidate of candidates.slice(startIndex)) {
      const dropped = body.slice(0, candidate.cut);
      const tail = body.slice(candidate.cut);
      const summaryText = await this.summarizer.summarize(dropped, candidate.level, context);
      const summaryMessage = userMessage(`${SUMMARY_PREFIX} ${String(dropped.length)} earlier messages condensed (${candidate.level}).\n${summaryText}`);
      const compressed = [...leading, summaryMessage, ...tail];
      const tokensAfter = this.estimateTokens(compressed);
      last = {
        messages: compressed,
        summary: {
          level: candidate.level,
          tokensBefore,
          tokensAfter,
          tokensSaved: Math.max(0, tokensBefore - tokensAfter),
          messagesBefore: messages.length,
          messagesAfter: compressed.length,
          summary: `Compressed ${String(dropped.length)} messages at ${candidate.level} level, saved ${String(Math.max(0, tokensBefore - tokensAfter))} tokens`,
        },
      };
      this.callbacks?.onDebug?.('compression:attempt', { level: candidate.level, tokensAfter, limit });
      if (tokensAfter <= limit) break;
    }

    if (last === undefined) {
      return { messages: [...messages] };
    }
    return { messages: last.messages, compressionApplied: last.summary };
  }

  /**
   * Index into `body` where the kept tail starts. The tail holds as many recent
   * messages as fit `budget` (always at least one) and never starts with a tool
   * result whose tool use would be summarized away.
   */
  private findTailStart(body: readonly Message[], budget: number): number {
    if (body.length === 0) return 0;
    let start = body.length - 1;
    let used = estimateMessageTokens(this.tokenizer, body[start]);
    // eslint-disable-next-line functional/no-loop-statements
    while (start > 0) {
      const cost = estimateMessageTokens(this.tokenizer, body[start - 1]);
      if (used + cost > budget) break;
      used += cost;
      start -= 1;
    }
    // eslint-disable-next-line functional/no-loop-statements
    while (start > 0 && body[start].role === 'tool') {
      start -= 1;
    }
    return start;
  }
}

// ---------------------------------------------------------------------------
// Fallback
// ---------------------------------------------------------------------------

/**
 * Keeps a leading system message and the most recent `maxMessages - 1`
 * messages. Leading tool results that lost their tool use are dropped too.
 */
export function simpleTrim(messages: readonly Message[], maxMessages: number = SIMPLE_TRIM_MAX_MESSAGES): Message[] {
  if (messages.length <= maxMessages) {
    return [...messages];
  }
  const leading = messages.length > 0 && messages[0].role === 'system' ? [messages[0]] : [];
  const keepCount = Math.max(0, maxMessages - 1);
  const startIndex = Math.max(leading.length, messages.length - keepCount);
  const tail = messages.slice(startIndex);
  const firstNonTool = tail.findIndex((message) => message.role !== 'tool');
  return [...leading, ...(firstNonTool === -1 ? [] : tail.slice(firstNonTool))];
}

// ---------------------------------------------------------------------------
// Summarizers
// ---------------------------------------------------------------------------

const DIGEST_LINE_CHARS: Record<CompressionLevel, number> = {
  light: 240,
  medium: 160,
  heavy: 80,
  critical: 40,
};

const DIGEST_MAX_LINES: Record<CompressionLevel, number> = {
  light: 80,
  medium: 40,
  heavy: 20,
  critical: 8,
};

/** Deterministic, model-free digest: one line per message, most recent kept. */
export class DigestSummarizer implements ConversationSummarizer {
  public summarize(messages: readonly Message[], level: CompressionLevel, context?: ExecutionContext): Promise<string> {
    const width = DIGEST_LINE_CHARS[level];
    const lines = messages.map((message) => describeMessage(message, width));
    const maxLines = DIGEST_MAX_LINES[level];
    const kept = lines.length > maxLines ? lines.slice(lines.length - maxLines) : lines;
    const header: string[] = [];
    if (context !== undefined) header.push(`Original goal: ${truncatePreview(context.originalGoal, width * 2)}`);
    if (kept.length < lines.length) header.push(`(${String(lines.length - kept.length)} older messages omitted)`);
    return Promise.resolve([...header, ...kept].join('\n'));
  }
}

function describeMessage(message: Message, width: number): string {
  const parts: string[] = [];
  const text = getText(message);
  if (text.length > 0) parts.push(truncatePreview(text, width));
  getToolUses(message).forEach((use) => {
    parts.push(`called ${truncatePreview(formatToolRequestCompact(use.name, use.input), width)}`);
  });
  getToolResults(message).forEach((result) => {
    parts.push(`${result.isError === true ? 'error' : 'result'}: ${truncatePreview(result.content, width)}`);
  });
  return `- ${message.role}: ${parts.length > 0 ? parts.join(' | ') : '(empty)'}`;
}

const SUMMARIZER_PROMPT = [
  'You condense the earlier part of a coding agent conversation.',
  'Keep decisions, file paths, commands run and their outcomes, open problems and the user goal.',
  'Reply with the summary only.',
].join(' ');

const SUMMARY_WORDS: Record<CompressionLevel, number> = {
  light: 400,
  medium: 250,
  heavy: 150,
  critical: 60,
};

/** Asks the model itself for the summary; any model failure propagates. */
export class ModelSummarizer implements ConversationSummarizer {
  private readonly client: ModelClient;

  constructor(client: ModelClient) {
    this.client = client;
  }

  public async summarize(messages: readonly Message[], level: CompressionLevel, context?: ExecutionContext): Promise<string> {
    const transcript = messages.map((message) => describeMessage(message, 2_000)).join('\n');
    const goal = context !== undefined ? `Goal: ${context.originalGoal}\n\n` : '';
    const response = await this.client.complete([
      systemMessage(SUMMARIZER_PROMPT),
      userMessage(`${goal}Summarize in at most ${String(SUMMARY_WORDS[level])} words:\n\n${transcript}`),
    ]);
    const text = getText(response.message).trim();
    if (text.length === 0) {
      throw new Error('summarizer returned an empty response');
    }
    return text;
  }
}
