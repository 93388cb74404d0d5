import { z } from 'zod';

import type { ToolCall, ToolResult } from '../tools/types.js';
import type { AgentConfig, Message, TokenUsage } from '../types.js';

import { agentConfigSchema, messageSchema, tokenUsageSchema } from '../schemas.js';

export type TrajectoryEntryData =
  | { type: 'task_start'; task: string; agentConfig: AgentConfig }
  | { type: 'llm_request'; messages: Message[]; model: string; provider: string }
  | { type: 'llm_response'; message: Message; usage?: TokenUsage; finishReason?: string }
  | { type: 'tool_call'; call: ToolCall }
  | { type: 'tool_result'; result: ToolResult }
  | { type: 'step_complete'; summary: string; success: boolean }
  | { type: 'error'; error: string; context?: string }
  | { type: 'task_complete'; success: boolean; result: string; totalSteps: number; durationMs: number };

export type TrajectoryEntryType = TrajectoryEntryData['type'];

export interface TrajectoryEntry {
  id: string;
  timestamp: string;      // ISO-8601
  step: number;
  data: TrajectoryEntryData;
}

export interface TrajectoryMetadata {
  id: string;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
  version: string;
  agentType: string;
  task?: string;
  success?: boolean;
  totalSteps: number;
}

export interface Trajectory {
  metadata: TrajectoryMetadata;
  entries: TrajectoryEntry[];
}

// ---------------------------------------------------------------------------
// Document validation
// ---------------------------------------------------------------------------

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  parameters: z.record(z.string(), z.unknown()),
});

const toolResultSchema = z.object({
  toolCallId: z.string(),
  success: z.boolean(),
  content: z.string(),
  data: z.unknown().optional(),
});

const entryDataSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('task_start'), task: z.string(), agentConfig: agentConfigSchema }),
  z.object({ type: z.literal('llm_request'), messages: z.array(messageSchema), model: z.string(), provider: z.string() }),
  z.object({
    type: z.literal('llm_response'),
    message: messageSchema,
    usage: tokenUsageSchema.optional(),
    finishReason: z.string().optional(),
  }),
  z.object({ type: z.literal('tool_call'), call: toolCallSchema }),
  z.object({ type: z.literal('tool_result'), result: toolResultSchema }),
  z.object({ type: z.literal('step_complete'), summary: z.string(), success: z.boolean() }),
  z.object({ type: z.literal('error'), error: z.string(), context: z.string().optional() }),
  z.object({
    type: z.literal('task_complete'),
    success: z.boolean(),
    result: z.string(),
    totalSteps: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
  }),
]);

export const trajectoryEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  step: z.number().int().nonnegative(),
  data: entryDataSchema,
});

export const trajectorySchema = z.object({
  metadata: z.object({
    id: z.string(),
    startedAt: z.string(),
    completedAt: z.string().optional(),
    durationMs: z.number().nonnegative().optional(),
    version: z.string(),
    agentType: z.string(),
    task: z.string().optional(),
    success: z.boolean().optional(),
    totalSteps: z.number().int().nonnegative(),
  }),
  entries: z.array(trajectoryEntrySchema),
});
