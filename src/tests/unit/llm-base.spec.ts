import { describe, expect, it } from 'vitest';

import { convertMessages } from '../../llm-providers/base.js';
import { assistantMessage, systemMessage, toolResultMessage, userMessage } from '../../messages.js';

describe('convertMessages', () => {
  it('drops assistant turns with neither text nor tool calls', () => {
    const converted = convertMessages([
      systemMessage('rules'),
      userMessage('hi'),
      assistantMessage(''),
      assistantMessage('   '),
      userMessage('again'),
    ]);

    expect(converted).toEqual([
      { role: 'system', content: 'rules' },
      { role: 'user', content: [{ type: 'text', text: 'hi' }] },
      { role: 'user', content: [{ type: 'text', text: 'again' }] },
    ]);
  });

  it('keeps a tool-only assistant turn and names its results', () => {
    const converted = convertMessages([
      userMessage('list files'),
      assistantMessage('', [{ type: 'tool_use', id: 'c1', name: 'bash', input: { command: 'ls' } }]),
      toolResultMessage({ toolUseId: 'c1', content: 'a.txt', isError: false }),
    ]);

    expect(converted.slice(1)).toEqual([
      { role: 'assistant', content: [{ type: 'tool-call', toolCallId: 'c1', toolName: 'bash', input: { command: 'ls' } }] },
      { role: 'tool', content: [{ type: 'tool-result', toolCallId: 'c1', toolName: 'bash', output: { type: 'text', value: 'a.txt' } }] },
    ]);
  });
});
