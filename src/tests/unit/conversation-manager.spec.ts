import { describe, expect, it, vi } from 'vitest';

import type { Message } from '../../types.js';

import { type CompressionLevel, ConversationManager, DigestSummarizer, SUMMARY_PREFIX, simpleTrim } from '../../conversation-manager.js';
import { assistantMessage, systemMessage, toolResultMessage, userMessage } from '../../messages.js';

const chatter = (count: number, size = 400): Message[] => Array.from({ length: count }, (_, index) => (
  index % 2 === 0
    ? userMessage(`user ${String(index)} ${'u'.repeat(size)}`)
    : assistantMessage(`assistant ${String(index)} ${'a'.repeat(size)}`)
));

// 104 tokens each under the approximate tokenizer ("role:user\n" plus 390 chars).
const blocks = (count: number): Message[] => Array.from({ length: count }, (_, index) => userMessage(String(index).padEnd(390, 'x')));

// 500 tokens ("role:system\n" plus 1972 chars).
const longRules = systemMessage('r'.repeat(1_972));

const scriptedSummarizer = (text: (level: CompressionLevel) => string) => ({
  summarize: vi.fn((_messages: readonly Message[], level: CompressionLevel) => Promise.resolve(text(level))),
});

describe('simpleTrim', () => {
  it('keeps the system message and the most recent messages', () => {
    const history = [systemMessage('rules'), ...chatter(199, 10)];

    const trimmed = simpleTrim(history, 50);

    expect(trimmed).toHaveLength(50);
    expect(trimmed[0]).toEqual(systemMessage('rules'));
    expect(trimmed[1]).toBe(history[151]);
    expect(trimmed[49]).toBe(history[199]);
  });

  it('returns short histories unchanged', () => {
    const history = chatter(5, 10);
    expect(simpleTrim(history, 50)).toEqual(history);
  });

  it('drops tool results whose tool use was trimmed away', () => {
    const history = [
      userMessage('old'),
      assistantMessage('', [{ type: 'tool_use', id: 't1', name: 'bash', input: {} }]),
      toolResultMessage({ toolUseId: 't1', content: 'ok', isError: false }),
      userMessage('next'),
      assistantMessage('done'),
    ];

    expect(simpleTrim(history, 4)).toEqual([userMessage('next'), assistantMessage('done')]);
  });
});

describe('ConversationManager', () => {
  it('rejects a non-positive budget', () => {
    expect(() => new ConversationManager({ maxTokens: 0 })).toThrow('maxTokens must be a positive number, got 0');
  });

  it('rejects a threshold outside (0, 1]', () => {
    expect(() => new ConversationManager({ maxTokens: 100, threshold: 1.5 })).toThrow('threshold must be within (0, 1], got 1.5');
  });

  it('leaves a history within budget untouched', async () => {
    const manager = new ConversationManager({ maxTokens: 10_000 });
    const history = [systemMessage('rules'), ...chatter(4, 20)];

    const result = await manager.maybeCompress(history);

    expect(result.compressionApplied).toBeUndefined();
    expect(result.messages).toEqual(history);
  });

  it('summarizes older messages and keeps the system message and recent tail', async () => {
    const summarize = vi.fn(() => Promise.resolve('earlier work: explored the parser'));
    const manager = new ConversationManager({ maxTokens: 1_000, summarizer: { summarize } });
    const history = [systemMessage('rules'), ...chatter(20)];
    expect(manager.needsCompression(history)).toBe(true);

    const result = await manager.maybeCompress(history);

    expect(summarize).toHaveBeenCalled();
    expect(result.messages[0]).toEqual(systemMessage('rules'));
    const summary = result.messages[1];
    expect(summary.role).toBe('user');
    expect(typeof summary.content === 'string' && summary.content.startsWith(SUMMARY_PREFIX)).toBe(true);
    expect(String(summary.content).endsWith('\nearlier work: explored the parser')).toBe(true);
    expect(result.messages[result.messages.length - 1]).toBe(history[history.length - 1]);

    const applied = result.compressionApplied;
    expect(applied?.messagesBefore).toBe(21);
    expect(applied?.messagesAfter).toBe(result.messages.length);
    expect(applied?.tokensAfter).toBeLessThanOrEqual(manager.limit);
    expect(applied?.tokensSaved).toBe((applied?.tokensBefore ?? 0) - (applied?.tokensAfter ?? 0));
  });

  it('never starts the kept tail with an orphaned tool result', async () => {
    const manager = new ConversationManager({ maxTokens: 600, summarizer: new DigestSummarizer() });
    const history: Message[] = [
      systemMessage('rules'),
      ...chatter(6),
      assistantMessage('', [{ type: 'tool_use', id: 'big', name: 'bash', input: { command: 'ls' } }]),
      toolResultMessage({ toolUseId: 'big', content: 'x'.repeat(3000), isError: false }),
    ];

    const result = await manager.maybeCompress(history);

    const tail = result.messages.slice(2);
    expect(tail[0].role).not.toBe('tool');
  });

  it('picks the light level for a mild overflow', async () => {
    const summarizer = scriptedSummarizer(() => 'short');
    const manager = new ConversationManager({ maxTokens: 1_000, summarizer });

    // 936 tokens against a limit of 800; five blocks fit the light tail.
    const result = await manager.maybeCompress(blocks(9));

    expect(summarizer.summarize.mock.calls.map((call) => call[1])).toEqual(['light']);
    expect(summarizer.summarize.mock.calls[0][0]).toHaveLength(4);
    expect(result.compressionApplied?.level).toBe('light');
    expect(result.messages).toHaveLength(6);
  });

  it('starts at a heavier level when the lighter tails cannot fit', async () => {
    const heavy = scriptedSummarizer(() => 'short');
    const heavyManager = new ConversationManager({ maxTokens: 1_000, summarizer: heavy });

    // 500 system tokens leave room for the two-block heavy tail only.
    const heavyResult = await heavyManager.maybeCompress([longRules, ...blocks(9)]);

    expect(heavy.summarize.mock.calls.map((call) => call[1])).toEqual(['heavy']);
    expect(heavyResult.compressionApplied?.level).toBe('heavy');
    expect(heavyResult.messages).toHaveLength(4);
    expect(heavyResult.messages[0]).toBe(longRules);

    const critical = scriptedSummarizer(() => 'short');
    const criticalManager = new ConversationManager({ maxTokens: 1_000, summarizer: critical });

    const criticalResult = await criticalManager.maybeCompress([systemMessage('r'.repeat(2_372)), ...blocks(9)]);

    expect(critical.summarize.mock.calls.map((call) => call[1])).toEqual(['critical']);
    expect(criticalResult.compressionApplied?.level).toBe('critical');
    expect(criticalResult.messages).toHaveLength(3);
  });

  it('escalates to the next level when a summary is too long', async () => {
    const summarizer = scriptedSummarizer((level) => (level === 'light' ? 'x'.repeat(1_200) : 'short'));
    const manager = new ConversationManager({ maxTokens: 1_000, summarizer });

    const result = await manager.maybeCompress(blocks(9));

    expect(summarizer.summarize.mock.calls.map((call) => call[1])).toEqual(['light', 'medium']);
    expect(result.compressionApplied?.level).toBe('medium');
    expect(result.compressionApplied?.tokensAfter).toBeLessThanOrEqual(manager.limit);
    expect(result.messages).toHaveLength(4);
  });

  it('never returns to a lighter level than the one it started at', async () => {
    const mild = scriptedSummarizer(() => 'x'.repeat(4_000));
    const mildResult = await new ConversationManager({ maxTokens: 1_000, summarizer: mild }).maybeCompress(blocks(9));

    expect(mild.summarize.mock.calls.map((call) => call[1])).toEqual(['light', 'medium', 'heavy', 'critical']);
    expect(mildResult.compressionApplied?.level).toBe('critical');
    expect(mildResult.compressionApplied?.tokensAfter).toBeGreaterThan(800);

    const severe = scriptedSummarizer(() => 'x'.repeat(4_000));
    await new ConversationManager({ maxTokens: 1_000, summarizer: severe }).maybeCompress([longRules, ...blocks(9)]);

    expect(severe.summarize.mock.calls.map((call) => call[1])).toEqual(['heavy', 'critical']);
  });

  it('propagates summarizer failures to the caller', async () => {
    const manager = new ConversationManager({
      maxTokens: 1_000,
      summarizer: { summarize: () => Promise.reject(new Error('model down')) },
    });

    await expect(manager.maybeCompress(chatter(20))).rejects.toThrow('model down');
  });
});

describe('DigestSummarizer', () => {
  it('lists messages one per line under the goal', async () => {
    const digest = await new DigestSummarizer().summarize(
      [userMessage('fix the build'), assistantMessage('', [{ type: 'tool_use', id: 'a', name: 'bash', input: { command: 'make' } }])],
      'light',
      {
        agentId: 'a1',
        originalGoal: 'fix the build',
        currentTask: 'fix the build',
        projectPath: '/p',
        maxSteps: 5,
        currentStep: 2,
        executionTimeMs: 0,
        tokenUsage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      }
    );

    expect(digest.split('\n')[0]).toBe('Original goal: fix the build');
    expect(digest.split('\n')[1]).toBe('- user: fix the build');
    expect(digest.split('\n')[2].startsWith('- assistant: called bash')).toBe(true);
  });
});
