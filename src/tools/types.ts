import type { CancellationRegistration } from '../cancellation.js';

export interface ToolCall {
  id: string;
  name: string;
  parameters: Record<string, unknown>;
}

export interface ToolResult {
  toolCallId: string;
  success: boolean;
  content: string;
  data?: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;   // JSON Schema (draft-07 subset)
}

export interface ToolCapabilities {
  /** A successful call ends the task. */
  completesTask?: boolean;
  /** Output carries the model's reasoning and is surfaced as a thinking event. */
  streamsThoughts?: boolean;
}

export interface ToolExecutionContext {
  projectPath: string;
  cancellation?: CancellationRegistration;
}

/** What the engine consumes. */
export interface ToolExecutor {
  execute: (call: ToolCall) => Promise<ToolResult>;
  requiresConfirmation: (name: string) => boolean;
  capabilitiesOf: (name: string) => ToolCapabilities;
  listDefinitions: () => ToolDefinition[];
  listNames: () => string[];
}

/** A single tool as registered by an embedder. */
export interface Tool {
  readonly definition: ToolDefinition;
  readonly capabilities?: ToolCapabilities;
  readonly requiresConfirmation?: boolean;
  execute: (parameters: Record<string, unknown>, context: ToolExecutionContext) => Promise<ToolOutput>;
}

export interface ToolOutput {
  success: boolean;
  content: string;
  data?: unknown;
}
