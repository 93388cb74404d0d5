import { jsonSchema } from '@ai-sdk/provider-utils';
import { generateText, tool } from 'ai';

import type { CompletionOptions, ModelClient, ModelResponse } from './types.js';
import type { ToolDefinition } from '../tools/types.js';
import type { Message, TokenUsage, ToolUseBlock } from '../types.js';
import type { AssistantModelMessage, LanguageModel, ModelMessage, ToolModelMessage, ToolSet, UserModelMessage } from 'ai';

import { assistantMessage, contentBlocks, getText, getToolResults, getToolUses } from '../messages.js';
import { parseJsonRecord, warn } from '../utils.js';

import { toLlmError } from './llm-errors.js';

type UserPart = Exclude<UserModelMessage['content'], string>[number];
type AssistantPart = Exclude<AssistantModelMessage['content'], string>[number];
type ToolPart = ToolModelMessage['content'][number];

export interface AiSdkModelClientOptions {
  providerName: string;
  modelName: string;
  model: LanguageModel;
  maxOutputTokens?: number;
  temperature?: number;
  headers?: Record<string, string>;
}

/**
 * ModelClient over any AI SDK language model. Tools are declared without
 * `execute`, so the SDK returns the requested calls and the engine runs them.
 */
export class AiSdkModelClient implements ModelClient {
  public readonly providerName: string;
  public readonly modelName: string;
  private readonly model: LanguageModel;
  private readonly maxOutputTokens?: number;
  private readonly temperature?: number;
  private readonly headers?: Record<string, string>;

  constructor(options: AiSdkModelClientOptions) {
    this.providerName = options.providerName;
    this.modelName = options.modelName;
    this.model = options.model;
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature;
    this.headers = options.headers;
  }

  public async complete(
    messages: readonly Message[],
    tools: readonly ToolDefinition[] = [],
    options: CompletionOptions = {}
  ): Promise<ModelResponse> {
    try {
      const result = await generateText({
        model: this.model,
        messages: convertMessages(messages),
        tools: tools.length > 0 ? convertTools(tools) : undefined,
        maxOutputTokens: options.maxOutputTokens ?? this.maxOutputTokens,
        temperature: options.temperature ?? this.temperature,
        abortSignal: options.abortSignal,
        headers: this.headers,
        maxRetries: 0,
      });
      const toolUses: ToolUseBlock[] = result.toolCalls.map((call): ToolUseBlock => {
        const input = parseJsonRecord(call.input);
        if (input === undefined) {
          warn(`tool call '${call.toolName}' (${call.toolCallId}) carried non-object input; passing {}`);
        }
        return { type: 'tool_use', id: call.toolCallId, name: call.toolName, input: input ?? {} };
      });
      return {
        message: assistantMessage(result.text, toolUses),
        usage: convertUsage(result.usage),
        finishReason: result.finishReason,
        model: result.response.modelId,
      };
    } catch (error: unknown) {
      throw toLlmError(error, this.providerName);
    }
  }
}

function convertUsage(usage: { inputTokens?: number; outputTokens?: number; totalTokens?: number }): TokenUsage {
  const inputTokens = usage.inputTokens ?? 0;
  const outputTokens = usage.outputTokens ?? 0;
  return { inputTokens, outputTokens, totalTokens: usage.totalTokens ?? inputTokens + outputTokens };
}

export function convertTools(definitions: readonly ToolDefinition[]): ToolSet {
  const tools: ToolSet = {};
  definitions.forEach((definition) => {
    tools[definition.name] = tool({
      description: definition.description,
      inputSchema: jsonSchema(definition.inputSchema),
    });
  });
  return tools;
}

export function convertMessages(messages: readonly Message[]): ModelMessage[] {
  // Tool results need the tool name, which only the originating tool use carries.
  const callIdToName = new Map<string, string>();
  messages.forEach((message) => {
    getToolUses(message).forEach((use) => { callIdToName.set(use.id, use.name); });
  });

  const modelMessages: ModelMessage[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for (const message of messages) {
    const blocks = contentBlocks(message);
    if (message.role === 'system') {
      modelMessages.push({ role: 'system', content: getText(message) });
      continue;
    }
    if (message.role === 'user') {
      const parts: UserPart[] = [];
      // eslint-disable-next-line functional/no-loop-statements
      for (const block of blocks) {
        if (block.type === 'text') parts.push({ type: 'text', text: block.text });
        else if (block.type === 'image') parts.push({ type: 'image', image: block.data, mediaType: block.mimeType });
        else if (block.type === 'tool_result') parts.push({ type: 'text', text: `[tool result ${block.toolUseId}] ${block.content}` });
      }
      modelMessages.push({ role: 'user', content: parts.length > 0 ? parts : '' });
      continue;
    }
    if (message.role === 'assistant') {
      const parts: AssistantPart[] = [];
      // eslint-disable-next-line functional/no-loop-statements
      for (const block of blocks) {
        if (block.type === 'text' && block.text.trim().length > 0) parts.push({ type: 'text', text: block.text });
        else if (block.type === 'tool_use') parts.push({ type: 'tool-call', toolCallId: block.id, toolName: block.name, input: block.input });
      }
      // Providers reject an assistant turn with no content; an empty reply adds nothing to replay.
      if (parts.length > 0) modelMessages.push({ role: 'assistant', content: parts });
      continue;
    }
    const parts = getToolResults(message).map((block): ToolPart => ({
      type: 'tool-result',
      toolCallId: block.toolUseId,
      toolName: callIdToName.get(block.toolUseId) ?? 'unknown',
      output: block.isError === true
        ? { type: 'error-text', value: block.content }
        : { type: 'text', value: block.content },
    }));
    if (parts.length > 0) modelMessages.push({ role: 'tool', content: parts });
  }
  return modelMessages;
}
