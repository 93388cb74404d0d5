import type { AgentEvent, AgentOutput, ConfirmationDecision, ConfirmationRequest, MessageLevel } from './types.js';
import type { LogEntry, OutputMode } from '../types.js';

import { formatToolRequestCompact, truncatePreview } from '../utils.js';

export interface LogOutputOptions {
  onLog: (entry: LogEntry) => void;
  mode?: OutputMode;
  agentId?: string;
  /** Interactive approval. Without one, requests are approved only when `autoApprove` is set. */
  confirm?: (request: ConfirmationRequest) => Promise<ConfirmationDecision>;
  autoApprove?: boolean;
}

const SEVERITY_BY_LEVEL: Record<MessageLevel, LogEntry['severity']> = {
  debug: 'TRC',
  info: 'VRB',
  normal: 'FIN',
  success: 'FIN',
  warning: 'WRN',
  error: 'ERR',
};

/** Renders engine events as structured log entries. */
export class LogOutput implements AgentOutput {
  private readonly onLog: (entry: LogEntry) => void;
  private readonly mode: OutputMode;
  private readonly agentId?: string;
  private readonly confirm?: (request: ConfirmationRequest) => Promise<ConfirmationDecision>;
  private readonly autoApprove: boolean;
  private step = 0;

  constructor(options: LogOutputOptions) {
    this.onLog = options.onLog;
    this.mode = options.mode ?? 'normal';
    this.agentId = options.agentId;
    this.confirm = options.confirm;
    this.autoApprove = options.autoApprove ?? false;
  }

  public emitEvent(event: AgentEvent): Promise<void> {
    const entry = this.toLogEntry(event);
    if (entry !== undefined) this.onLog(entry);
    return Promise.resolve();
  }

  public async requestConfirmation(request: ConfirmationRequest): Promise<ConfirmationDecision> {
    if (this.confirm !== undefined) return await this.confirm(request);
    return { approved: this.autoApprove, note: this.autoApprove ? 'auto-approved' : 'no interactive confirmation available' };
  }

  public flush(): Promise<void> {
    return Promise.resolve();
  }

  private entry(
    severity: LogEntry['severity'],
    type: LogEntry['type'],
    remoteIdentifier: string,
    message: string,
    extra: Partial<Pick<LogEntry, 'direction' | 'details' | 'fatal'>> = {}
  ): LogEntry {
    return {
      timestamp: Date.now(),
      severity,
      step: this.step,
      type,
      remoteIdentifier,
      fatal: extra.fatal ?? false,
      message,
      direction: extra.direction,
      details: extra.details,
      agentId: this.agentId,
    };
  }

  private toLogEntry(event: AgentEvent): LogEntry | undefined {
    const debug = this.mode === 'debug';
    switch (event.type) {
      case 'execution_started':
        this.step = 0;
        return this.entry('VRB', 'agent', 'agent:engine', `task started: ${truncatePreview(event.context.currentTask)}`, {
          details: { project_path: event.context.projectPath, max_steps: event.context.maxSteps },
        });
      case 'execution_completed':
        return this.entry(event.success ? 'FIN' : 'ERR', 'agent', 'agent:engine', event.summary, {
          fatal: !event.success,
          details: {
            success: event.success,
            steps: event.context.currentStep,
            duration_ms: event.context.executionTimeMs,
            input_tokens: event.context.tokenUsage.inputTokens,
            output_tokens: event.context.tokenUsage.outputTokens,
          },
        });
      case 'execution_interrupted':
        return this.entry('WRN', 'agent', 'agent:engine', event.reason, {
          details: { steps: event.context.currentStep, duration_ms: event.context.executionTimeMs },
        });
      case 'step_started':
        this.step = event.step;
        return debug ? this.entry('VRB', 'agent', 'agent:engine', `step ${String(event.step)} started`) : undefined;
      case 'step_completed':
        return debug ? this.entry('VRB', 'agent', 'agent:engine', `step ${String(event.step)} completed`, { details: { success: event.success } }) : undefined;
      case 'tool_execution_started':
        return this.entry('VRB', 'tool', `tool:${event.toolInfo.toolName}`, 'tool call', {
          direction: 'request',
          details: { request_preview: formatToolRequestCompact(event.toolInfo.toolName, event.toolInfo.parameters) },
        });
      case 'tool_execution_updated':
        return debug ? this.entry('TRC', 'tool', `tool:${event.toolInfo.toolName}`, `status ${event.toolInfo.status}`) : undefined;
      case 'tool_execution_completed': {
        const { toolInfo } = event;
        const latency = toolInfo.completedAt !== undefined ? toolInfo.completedAt - toolInfo.startedAt : undefined;
        const content = toolInfo.result?.content ?? '';
        const details: Record<string, string | number | boolean> = { result_chars: content.length };
        if (latency !== undefined) details.latency_ms = latency;
        return this.entry(toolInfo.status === 'success' ? 'VRB' : 'WRN', 'tool', `tool:${toolInfo.toolName}`,
          toolInfo.status === 'success' ? 'ok' : `failed: ${truncatePreview(content)}`,
          { direction: 'response', details });
      }
      case 'agent_thinking':
        return this.entry('THK', 'agent', 'agent:thinking', event.thinking);
      case 'token_usage_updated':
        return debug
          ? this.entry('TRC', 'llm', 'agent:tokens', 'token usage updated', {
            details: {
              input_tokens: event.tokenUsage.inputTokens,
              output_tokens: event.tokenUsage.outputTokens,
              total_tokens: event.tokenUsage.totalTokens,
            },
          })
          : undefined;
      case 'status_update':
        return this.entry('VRB', 'agent', 'agent:status', event.status);
      case 'message':
        if (event.level === 'debug' && !debug) return undefined;
        return this.entry(SEVERITY_BY_LEVEL[event.level], 'agent', 'agent:message', event.content);
      case 'compression_started':
        return this.entry('VRB', 'agent', 'agent:compression', event.reason, {
          details: { level: event.level, current_tokens: event.currentTokens, target_tokens: event.targetTokens },
        });
      case 'compression_completed':
        return this.entry('VRB', 'agent', 'agent:compression', event.summary, {
          details: { tokens_saved: event.tokensSaved, messages_before: event.messagesBefore, messages_after: event.messagesAfter },
        });
      case 'compression_failed':
        return this.entry('WRN', 'agent', 'agent:compression', `compression failed: ${event.error}; ${event.fallbackAction}`);
    }
  }
}
