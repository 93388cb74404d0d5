import { randomUUID } from 'node:crypto';

import type { TrajectoryEntry, TrajectoryEntryData } from './types.js';
import type { ToolCall, ToolResult } from '../tools/types.js';
import type { AgentConfig, Message, TokenUsage } from '../types.js';

export function createEntry(step: number, data: TrajectoryEntryData): TrajectoryEntry {
  return {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    step,
    data,
  };
}

export const taskStartEntry = (task: string, agentConfig: AgentConfig): TrajectoryEntry =>
  createEntry(0, { type: 'task_start', task, agentConfig });

export const llmRequestEntry = (step: number, messages: Message[], model: string, provider: string): TrajectoryEntry =>
  createEntry(step, { type: 'llm_request', messages, model, provider });

export const llmResponseEntry = (step: number, message: Message, usage?: TokenUsage, finishReason?: string): TrajectoryEntry =>
  createEntry(step, { type: 'llm_response', message, usage, finishReason });

export const toolCallEntry = (step: number, call: ToolCall): TrajectoryEntry =>
  createEntry(step, { type: 'tool_call', call });

export const toolResultEntry = (step: number, result: ToolResult): TrajectoryEntry =>
  createEntry(step, { type: 'tool_result', result });

export const stepCompleteEntry = (step: number, summary: string, success: boolean): TrajectoryEntry =>
  createEntry(step, { type: 'step_complete', summary, success });

export const errorEntry = (step: number, error: string, context?: string): TrajectoryEntry =>
  createEntry(step, { type: 'error', error, context });

export const taskCompleteEntry = (
  step: number,
  outcome: { success: boolean; result: string; totalSteps: number; durationMs: number }
): TrajectoryEntry => createEntry(step, { type: 'task_complete', ...outcome });
