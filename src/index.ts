// Main library exports for programmatic use
export { AgentCore, DEFAULT_CONTEXT_WINDOW, type AgentCoreOptions, type AgentState } from './agent-core.js';
export { AgentTaskRunner, type CancellationAware } from './agent-runner.js';
export { CancellationController, CancellationRegistration } from './cancellation.js';
export {
  COMPRESSION_LEVELS,
  ConversationManager,
  DigestSummarizer,
  ModelSummarizer,
  simpleTrim,
  type CompressionLevel,
  type CompressionResult,
  type CompressionSummary,
  type ConversationManagerConfig,
  type ConversationSummarizer,
} from './conversation-manager.js';
export { loadConfiguration, parseConfiguration, resolveLlmConfig, type Configuration, type LlmConfig } from './config.js';
export { PersistedAgentContext, SNAPSHOT_VERSION, type PersistedAgentContextData } from './persisted-context.js';
export { PersistenceError, SnapshotError, TrajectoryError, isSnapshotError, isTrajectoryError, type PersistenceErrorKind } from './persistence-errors.js';
export { buildSystemPrompt } from './prompt-builder.js';
export { makeTTYLogCallbacks } from './log-sink-tty.js';
export { StructuredLogger, createStructuredLogger, type LogFormat } from './logging/structured-logger.js';

// Capabilities
export * from './llm-providers/index.js';
export { ToolRegistry, type ToolRegistryOptions } from './tools/registry.js';
export { ToolExecutionError, type ToolErrorKind } from './tools/tool-errors.js';
export { createBuiltinTools, createSequentialThinkingTool, createTaskDoneTool, SEQUENTIAL_THINKING_TOOL, TASK_DONE_TOOL } from './tools/internal-tools.js';
export type { Tool, ToolCall, ToolCapabilities, ToolDefinition, ToolExecutor, ToolOutput, ToolResult } from './tools/types.js';
export { LogOutput } from './output/log-output.js';
export { NullOutput } from './output/null-output.js';
export { RecordingOutput } from './output/recording-output.js';
export type { AgentEvent, AgentEventType, AgentOutput, ConfirmationDecision, ConfirmationRequest, ToolExecutionInfo } from './output/types.js';

// Trajectory
export { TrajectoryRecorder } from './trajectory/recorder.js';
export type { Trajectory, TrajectoryEntry, TrajectoryEntryData, TrajectoryMetadata } from './trajectory/types.js';

export * from './messages.js';
export type {
  AgentConfig,
  AgentExecutionResult,
  ContentBlock,
  ExecutionContext,
  ExecutionOutcome,
  LogEntry,
  Message,
  MessageRole,
  TokenUsage,
} from './types.js';
