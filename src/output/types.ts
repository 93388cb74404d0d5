import type { CompressionLevel } from '../conversation-manager.js';
import type { ToolCall, ToolResult } from '../tools/types.js';
import type { ExecutionContext, TokenUsage } from '../types.js';

export type ToolExecutionStatus = 'executing' | 'success' | 'error';

export interface ToolExecutionInfo {
  executionId: string;
  toolName: string;
  parameters: Record<string, unknown>;
  status: ToolExecutionStatus;
  result?: ToolResult;
  startedAt: number;
  completedAt?: number;
}

export type MessageLevel = 'debug' | 'info' | 'normal' | 'success' | 'warning' | 'error';

export type AgentEvent =
  | { type: 'execution_started'; context: ExecutionContext }
  | { type: 'execution_completed'; context: ExecutionContext; success: boolean; summary: string }
  | { type: 'execution_interrupted'; context: ExecutionContext; reason: string }
  | { type: 'step_started'; step: number }
  | { type: 'step_completed'; step: number; success: boolean }
  | { type: 'tool_execution_started'; toolInfo: ToolExecutionInfo }
  | { type: 'tool_execution_updated'; toolInfo: ToolExecutionInfo }
  | { type: 'tool_execution_completed'; toolInfo: ToolExecutionInfo }
  | { type: 'agent_thinking'; step: number; thinking: string }
  | { type: 'token_usage_updated'; tokenUsage: TokenUsage }
  | { type: 'status_update'; status: string; metadata?: Record<string, unknown> }
  | { type: 'message'; level: MessageLevel; content: string; metadata?: Record<string, unknown> }
  | { type: 'compression_started'; level: CompressionLevel; currentTokens: number; targetTokens: number; reason: string }
  | { type: 'compression_completed'; summary: string; tokensSaved: number; messagesBefore: number; messagesAfter: number }
  | { type: 'compression_failed'; error: string; fallbackAction: string };

export type AgentEventType = AgentEvent['type'];

export interface ConfirmationRequest {
  id: string;
  kind: 'tool_execution';
  title: string;
  message: string;
  call: ToolCall;
}

export interface ConfirmationDecision {
  approved: boolean;
  note?: string;
}

/** Event sink consumed by the engine. */
export interface AgentOutput {
  emitEvent: (event: AgentEvent) => Promise<void>;
  requestConfirmation: (request: ConfirmationRequest) => Promise<ConfirmationDecision>;
  flush: () => Promise<void>;
}
