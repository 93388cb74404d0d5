// Shared data model for the engine, its capabilities and its persistence formats.

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ImageBlock {
  type: 'image';
  data: string;       // base64 payload
  mimeType: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  isError?: boolean;
  content: string;
}

export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export type MessageContent = string | ContentBlock[];

export interface Message {
  role: MessageRole;
  content: MessageContent;
  metadata?: Record<string, unknown>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ExecutionContext {
  agentId: string;
  originalGoal: string;      // first task this engine ever ran
  currentTask: string;
  projectPath: string;
  maxSteps: number;
  currentStep: number;
  executionTimeMs: number;
  tokenUsage: TokenUsage;
}

export type OutputMode = 'normal' | 'debug';

export interface AgentConfig {
  maxSteps: number;
  // Extended step review (the "lakeview" summaries of the CLI); carried through snapshots.
  enableExtendedView: boolean;
  tools: string[];
  outputMode: OutputMode;
  systemPrompt?: string;
}

export type ExecutionOutcome = 'completed' | 'failed' | 'interrupted';

export interface AgentExecutionResult {
  success: boolean;
  outcome: ExecutionOutcome;
  summary: string;
  steps: number;
  durationMs: number;
  finalMessage?: string;   // content of the completion tool's result
}

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'THK' | 'FIN'; // FIN for end-of-run summary
  step: number;                         // 0 before the first step starts
  direction?: 'request' | 'response';
  type: 'llm' | 'tool' | 'agent';
  remoteIdentifier: string;             // 'provider:model', 'tool:name' or 'agent:<component>'
  fatal: boolean;                       // True if this caused the task to stop
  message: string;
  details?: Record<string, string | number | boolean>;
  stack?: string;
  agentId?: string;
}

export const emptyTokenUsage = (): TokenUsage => ({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });

export const addTokenUsage = (current: TokenUsage, delta: TokenUsage): TokenUsage => ({
  inputTokens: current.inputTokens + delta.inputTokens,
  outputTokens: current.outputTokens + delta.outputTokens,
  totalTokens: current.totalTokens + delta.totalTokens,
});
