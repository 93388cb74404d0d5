import type { ContentBlock, Message, TextBlock, ToolResultBlock, ToolUseBlock } from './types.js';

export function systemMessage(text: string): Message {
  return { role: 'system', content: text };
}

export function userMessage(text: string): Message {
  return { role: 'user', content: text };
}

export function assistantMessage(text: string, toolUses: readonly ToolUseBlock[] = []): Message {
  if (toolUses.length === 0) {
    return { role: 'assistant', content: text };
  }
  const blocks: ContentBlock[] = [];
  if (text.length > 0) blocks.push({ type: 'text', text });
  blocks.push(...toolUses);
  return { role: 'assistant', content: blocks };
}

export function toolResultMessage(result: { toolUseId: string; content: string; isError: boolean }): Message {
  const block: ToolResultBlock = {
    type: 'tool_result',
    toolUseId: result.toolUseId,
    isError: result.isError,
    content: result.content,
  };
  return { role: 'tool', content: [block] };
}

export function contentBlocks(message: Message): ContentBlock[] {
  if (typeof message.content === 'string') {
    return message.content.length > 0 ? [{ type: 'text', text: message.content }] : [];
  }
  return message.content;
}

// Text blocks only, joined by newlines.
export function getText(message: Message): string {
  if (typeof message.content === 'string') return message.content;
  return message.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('\n');
}

export function getToolUses(message: Message): ToolUseBlock[] {
  if (typeof message.content === 'string') return [];
  return message.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

export function getToolResults(message: Message): ToolResultBlock[] {
  if (typeof message.content === 'string') return [];
  return message.content.filter((block): block is ToolResultBlock => block.type === 'tool_result');
}

export function hasToolUse(message: Message): boolean {
  return getToolUses(message).length > 0;
}

/**
 * Tool-use ids of the most recent assistant message that have no matching
 * tool-role result after it. Empty when anything other than tool results
 * follows that assistant message, since the turn was already closed.
 */
export function findUnresolvedToolUses(history: readonly Message[]): ToolUseBlock[] {
  const assistantIndex = findLastIndex(history, (message) => message.role === 'assistant');
  if (assistantIndex === -1) return [];
  const uses = getToolUses(history[assistantIndex]);
  if (uses.length === 0) return [];
  const trailing = history.slice(assistantIndex + 1);
  if (trailing.some((message) => message.role !== 'tool')) return [];
  const resolved = new Set(trailing.flatMap((message) => getToolResults(message).map((block) => block.toolUseId)));
  return uses.filter((use) => !resolved.has(use.id));
}

export function findLastIndex<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  // eslint-disable-next-line functional/no-loop-statements
  for (let index = items.length - 1; index >= 0; index -= 1) {
    if (predicate(items[index])) return index;
  }
  return -1;
}
