import { randomUUID } from 'node:crypto';

import type { CompletionOptions, ModelClient } from './llm-providers/types.js';
import type { AgentEvent, AgentOutput, ToolExecutionInfo } from './output/types.js';
import type { ToolCall, ToolExecutor, ToolResult } from './tools/types.js';
import type { TrajectoryEntry } from './trajectory/types.js';
import type {
  AgentConfig,
  AgentExecutionResult,
  ExecutionContext,
  ExecutionOutcome,
  LogEntry,
  Message,
  ToolUseBlock,
} from './types.js';

import { CancellationController, type CancellationRegistration } from './cancellation.js';
import { ConversationManager, SIMPLE_TRIM_MAX_MESSAGES, simpleTrim } from './conversation-manager.js';
import {
  findUnresolvedToolUses,
  getText,
  getToolUses,
  systemMessage,
  toolResultMessage,
  userMessage,
} from './messages.js';
import { NullOutput } from './output/null-output.js';
import { SafeOutput } from './output/safe-output.js';
import { PersistedAgentContext } from './persisted-context.js';
import { buildSystemPrompt } from './prompt-builder.js';
import {
  errorEntry,
  llmRequestEntry,
  llmResponseEntry,
  stepCompleteEntry,
  taskCompleteEntry,
  taskStartEntry,
  toolCallEntry,
  toolResultEntry,
} from './trajectory/entries.js';
import { DEFAULT_AGENT_TYPE, TrajectoryRecorder } from './trajectory/recorder.js';
import { addTokenUsage, emptyTokenUsage } from './types.js';
import { errorMessage, errorStack, formatToolRequestCompact, isPlainObject } from './utils.js';

export const DEFAULT_CONTEXT_WINDOW = 128_000;

export const TASK_COMPLETED_SUMMARY = 'Task completed successfully';
export const INTERRUPTED_SUMMARY = 'Execution interrupted';
export const INTERRUPTED_REASON = 'Execution interrupted by user';
export const INTERRUPTED_TOOL_RESULT = 'Previous task interrupted or incomplete';
export const DENIED_TOOL_RESULT = 'Execution cancelled by user';
export const CONFIRMATION_MESSAGE = 'This tool requires confirmation before execution.';
export const COMPRESSION_FALLBACK_ACTION = 'Simple message trimming applied';

export type AgentState = 'idle' | 'running';

export interface AgentCoreOptions {
  config: AgentConfig;
  model: ModelClient;
  tools: ToolExecutor;
  output?: AgentOutput;
  trajectory?: TrajectoryRecorder;
  conversationManager?: ConversationManager;
  /** Budget for the default conversation manager. */
  contextWindow?: number;
  cancellation?: CancellationController;
  completionOptions?: Omit<CompletionOptions, 'abortSignal'>;
  agentId?: string;
  agentType?: string;
  onLog?: (entry: LogEntry) => void;
}

interface StepOutcome {
  completed: boolean;
  finalMessage?: string;
}

type RunOutcome =
  | { outcome: 'completed'; summary: string; finalMessage?: string }
  | { outcome: 'failed'; summary: string }
  | { outcome: 'interrupted'; summary: string; reason: string };

const extractThought = (result: ToolResult): string | undefined => {
  if (isPlainObject(result.data) && typeof result.data.thought === 'string') {
    return result.data.thought;
  }
  const marker = 'Thought: ';
  const start = result.content.indexOf(marker);
  if (start === -1) return undefined;
  const rest = result.content.slice(start + marker.length);
  const end = rest.indexOf('\n\n');
  const thought = (end === -1 ? rest : rest.slice(0, end)).trim();
  return thought.length > 0 ? thought : undefined;
};

/**
 * The step loop. One task runs at a time; history and the original goal carry
 * over between tasks on the same instance.
 */
export class AgentCore {
  private config: AgentConfig;
  private readonly model: ModelClient;
  private readonly tools: ToolExecutor;
  private readonly output: SafeOutput;
  private readonly trajectory: TrajectoryRecorder;
  private readonly conversationManager: ConversationManager;
  private readonly completionOptions: Omit<CompletionOptions, 'abortSignal'>;
  private readonly agentId: string;
  private readonly agentType: string;
  private readonly onLog?: (entry: LogEntry) => void;
  private cancellation: CancellationController;
  private history: Message[] = [];
  private context?: ExecutionContext;
  private state: AgentState = 'idle';
  private lastOutcome?: ExecutionOutcome;
  private currentStep = 0;
  // A step abandoned by an interrupted task that may still be finishing a tool.
  private pendingStep?: Promise<void>;

  constructor(options: AgentCoreOptions) {
    this.config = { ...options.config, tools: [...options.config.tools] };
    this.model = options.model;
    this.tools = options.tools;
    this.onLog = options.onLog;
    this.output = new SafeOutput(options.output ?? new NullOutput(), (operation, error) => {
      this.log('WRN', 'agent', 'agent:output', `output ${operation} failed: ${errorMessage(error)}`);
    });
    this.trajectory = options.trajectory ?? TrajectoryRecorder.inMemory();
    this.conversationManager = options.conversationManager ?? new ConversationManager({
      maxTokens: options.contextWindow ?? DEFAULT_CONTEXT_WINDOW,
    });
    this.cancellation = options.cancellation ?? new CancellationController();
    this.completionOptions = options.completionOptions ?? {};
    this.agentId = options.agentId ?? randomUUID();
    this.agentType = options.agentType ?? DEFAULT_AGENT_TYPE;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  public getState(): AgentState {
    return this.state;
  }

  public getLastOutcome(): ExecutionOutcome | undefined {
    return this.lastOutcome;
  }

  public getConfig(): AgentConfig {
    return { ...this.config, tools: [...this.config.tools] };
  }

  public getConversationHistory(): readonly Message[] {
    return [...this.history];
  }

  public getExecutionContext(): ExecutionContext | undefined {
    return this.context === undefined ? undefined : { ...this.context, tokenUsage: { ...this.context.tokenUsage } };
  }

  public getTrajectory(): TrajectoryRecorder {
    return this.trajectory;
  }

  public getCancellationController(): CancellationController {
    return this.cancellation;
  }

  /** Work already started under the previous controller stays cancellable through it. */
  public setCancellationController(controller: CancellationController): void {
    this.cancellation = controller;
  }

  public setSystemPrompt(systemPrompt: string | undefined): void {
    this.config = { ...this.config, systemPrompt };
  }

  public getSystemPrompt(projectPath: string): string {
    return buildSystemPrompt({
      projectPath,
      toolNames: this.tools.listNames(),
      customPrompt: this.config.systemPrompt,
    });
  }

  // ---------------------------------------------------------------------------
  // Task execution
  // ---------------------------------------------------------------------------

  public async executeTask(task: string, projectPath: string): Promise<AgentExecutionResult> {
    if (this.state === 'running') {
      throw new Error('agent is already executing a task');
    }
    this.state = 'running';
    try {
      return await this.runTask(task, projectPath);
    } finally {
      this.state = 'idle';
    }
  }

  private async runTask(task: string, projectPath: string): Promise<AgentExecutionResult> {
    const startedAt = Date.now();
    if (this.pendingStep !== undefined) {
      await this.pendingStep;
      this.pendingStep = undefined;
    }
    const registration = this.cancellation.subscribe();
    this.currentStep = 0;

    this.context = this.context === undefined
      ? {
          agentId: this.agentId,
          originalGoal: task,
          currentTask: task,
          projectPath,
          maxSteps: this.config.maxSteps,
          currentStep: 0,
          executionTimeMs: 0,
          tokenUsage: emptyTokenUsage(),
        }
      : { ...this.context, currentTask: task, projectPath, maxSteps: this.config.maxSteps, currentStep: 0 };

    await this.emit({ type: 'execution_started', context: this.snapshotContext() });
    await this.record(taskStartEntry(task, this.getConfig()));
    this.log('VRB', 'agent', 'agent:engine', `task started (max ${String(this.config.maxSteps)} steps)`, {
      details: { project_path: projectPath },
    });

    if (this.history.length === 0) {
      this.history.push(systemMessage(this.getSystemPrompt(projectPath)));
    }
    await this.repairHistory();
    this.history.push(userMessage(task));

    const run = await this.runLoop(projectPath, registration);
    return await this.finish(run, startedAt);
  }

  private async runLoop(projectPath: string, registration: CancellationRegistration): Promise<RunOutcome> {
    const interrupted = (): RunOutcome => ({
      outcome: 'interrupted',
      summary: INTERRUPTED_SUMMARY,
      reason: registration.reason ?? INTERRUPTED_REASON,
    });

    // eslint-disable-next-line functional/no-loop-statements
    while (this.currentStep < this.config.maxSteps) {
      if (registration.isCancelled()) return interrupted();
      await this.compressHistory();
      if (registration.isCancelled()) return interrupted();

      this.currentStep += 1;
      const step = this.currentStep;
      this.updateContext({ currentStep: step });
      await this.emit({ type: 'step_started', step });

      const work = this.executeStep(step, projectPath, registration);
      const settled: Promise<void> = work.then(() => undefined, () => undefined).finally(() => {
        if (this.pendingStep === settled) this.pendingStep = undefined;
      });
      this.pendingStep = settled;
      let raced: { cancelled: true } | { cancelled: false; value: StepOutcome };
      try {
        raced = await registration.race(work);
      } catch (error: unknown) {
        this.pendingStep = undefined;
        const message = errorMessage(error);
        this.log('ERR', 'agent', 'agent:engine', `step ${String(step)} failed: ${message}`, { fatal: true, stack: errorStack(error) });
        await this.record(errorEntry(step, message, `step ${String(step)}`));
        await this.emit({ type: 'step_completed', step, success: false });
        return { outcome: 'failed', summary: `Error in step ${String(step)}: ${message}` };
      }
      if (raced.cancelled) return interrupted();
      this.pendingStep = undefined;

      const outcome = raced.value;
      await this.record(stepCompleteEntry(step, outcome.completed ? 'task completed' : 'step completed', true));
      await this.emit({ type: 'step_completed', step, success: true });
      if (outcome.completed) {
        return { outcome: 'completed', summary: TASK_COMPLETED_SUMMARY, finalMessage: outcome.finalMessage };
      }
    }
    return { outcome: 'failed', summary: `Task incomplete after ${String(this.currentStep)} steps` };
  }

  private async finish(run: RunOutcome, startedAt: number): Promise<AgentExecutionResult> {
    const durationMs = Date.now() - startedAt;
    const steps = this.currentStep;
    this.updateContext({ currentStep: steps, executionTimeMs: durationMs });
    const context = this.snapshotContext();
    const success = run.outcome === 'completed';

    if (run.outcome === 'interrupted') {
      await this.emit({ type: 'execution_interrupted', context, reason: run.reason });
      this.log('WRN', 'agent', 'agent:engine', `${run.reason} after ${String(steps)} steps`);
    } else {
      await this.emit({ type: 'execution_completed', context, success, summary: run.summary });
      this.log(success ? 'FIN' : 'ERR', 'agent', 'agent:engine', run.summary, {
        fatal: !success,
        details: { steps, duration_ms: durationMs },
      });
    }
    await this.record(taskCompleteEntry(steps, { success, result: run.summary, totalSteps: steps, durationMs }));
    await this.output.flush();
    this.lastOutcome = run.outcome;

    const result: AgentExecutionResult = { success, outcome: run.outcome, summary: run.summary, steps, durationMs };
    if (run.outcome === 'completed' && run.finalMessage !== undefined) result.finalMessage = run.finalMessage;
    return result;
  }

  // ---------------------------------------------------------------------------
  // One step
  // ---------------------------------------------------------------------------

  private async executeStep(step: number, projectPath: string, registration: CancellationRegistration): Promise<StepOutcome> {
    const messages = this.history.length > 0 && this.history[0].role === 'system'
      ? [...this.history]
      : [systemMessage(this.getSystemPrompt(projectPath)), ...this.history];
    const remote = `${this.model.providerName}:${this.model.modelName}`;

    await this.record(llmRequestEntry(step, messages, this.model.modelName, this.model.providerName));
    this.log('VRB', 'llm', remote, 'LLM request', { direction: 'request', details: { messages: messages.length } });

    const requestStartedAt = Date.now();
    const response = await this.model.complete(messages, this.tools.listDefinitions(), {
      ...this.completionOptions,
      abortSignal: this.cancellation.signal,
    });
    // A late answer to an interrupted task is kept for the next task's repair and nothing else runs.
    if (registration.isCancelled()) {
      this.history.push(response.message);
      return { completed: false };
    }

    const usage = response.usage;
    if (usage !== undefined) {
      const current = this.context?.tokenUsage ?? emptyTokenUsage();
      const tokenUsage = addTokenUsage(current, usage);
      this.updateContext({ tokenUsage });
      await this.emit({ type: 'token_usage_updated', tokenUsage: { ...tokenUsage } });
    }
    const responseDetails: Record<string, string | number | boolean> = {
      latency_ms: Date.now() - requestStartedAt,
      input_tokens: usage?.inputTokens ?? 0,
      output_tokens: usage?.outputTokens ?? 0,
    };
    if (response.finishReason !== undefined) responseDetails.finish_reason = response.finishReason;
    this.log('VRB', 'llm', remote, 'LLM response received', { direction: 'response', details: responseDetails });
    await this.record(llmResponseEntry(step, response.message, usage, response.finishReason));
    this.history.push(response.message);

    const toolUses = getToolUses(response.message);
    const text = getText(response.message).trim();
    if (toolUses.length === 0) {
      if (text.length > 0) {
        await this.emit({ type: 'message', level: 'normal', content: text });
      }
      return { completed: false };
    }
    if (text.length > 0) {
      await this.emit({ type: 'message', level: 'info', content: text });
    }

    // eslint-disable-next-line functional/no-loop-statements
    for (const use of toolUses) {
      // Stop dispatching; the remaining tool uses are closed out by the next task.
      if (registration.isCancelled()) return { completed: false };
      const outcome = await this.runToolUse(step, use);
      if (outcome.completed) return outcome;
    }
    return { completed: false };
  }

  private async runToolUse(step: number, use: ToolUseBlock): Promise<StepOutcome> {
    const call: ToolCall = { id: use.id, name: use.name, parameters: use.input };
    const info: ToolExecutionInfo = {
      executionId: use.id,
      toolName: use.name,
      parameters: use.input,
      status: 'executing',
      startedAt: Date.now(),
    };
    await this.emit({ type: 'tool_execution_started', toolInfo: { ...info } });
    await this.record(toolCallEntry(step, call));
    this.log('VRB', 'tool', `tool:${use.name}`, 'tool call', {
      direction: 'request',
      details: { request_preview: formatToolRequestCompact(use.name, use.input) },
    });

    let result: ToolResult | undefined;
    if (this.tools.requiresConfirmation(use.name)) {
      const decision = await this.output.confirm({
        id: randomUUID(),
        kind: 'tool_execution',
        title: `Execute tool: ${use.name}`,
        message: CONFIRMATION_MESSAGE,
        call,
      });
      if (!decision.approved) {
        result = { toolCallId: use.id, success: false, content: DENIED_TOOL_RESULT };
        this.log('WRN', 'tool', `tool:${use.name}`, `execution denied${decision.note !== undefined ? `: ${decision.note}` : ''}`);
      } else {
        await this.emit({ type: 'tool_execution_updated', toolInfo: { ...info } });
      }
    }
    result ??= await this.invokeTool(call);

    const completedInfo: ToolExecutionInfo = {
      ...info,
      status: result.success ? 'success' : 'error',
      result,
      completedAt: Date.now(),
    };
    await this.emit({ type: 'tool_execution_completed', toolInfo: completedInfo });
    this.log(result.success ? 'VRB' : 'WRN', 'tool', `tool:${use.name}`, result.success ? 'ok' : 'failed', {
      direction: 'response',
      details: { latency_ms: (completedInfo.completedAt ?? info.startedAt) - info.startedAt, result_chars: result.content.length },
    });

    const capabilities = this.tools.capabilitiesOf(use.name);
    if (capabilities.streamsThoughts === true) {
      const thought = extractThought(result);
      if (thought !== undefined) {
        await this.emit({ type: 'agent_thinking', step, thinking: thought });
      }
    }
    await this.record(toolResultEntry(step, result));
    this.history.push(toolResultMessage({ toolUseId: use.id, content: result.content, isError: !result.success }));

    if (capabilities.completesTask === true && result.success) {
      return { completed: true, finalMessage: result.content };
    }
    return { completed: false };
  }

  private async invokeTool(call: ToolCall): Promise<ToolResult> {
    try {
      const result = await this.tools.execute(call);
      return { ...result, toolCallId: call.id };
    } catch (error: unknown) {
      return { toolCallId: call.id, success: false, content: `Tool execution failed: ${errorMessage(error)}` };
    }
  }

  // ---------------------------------------------------------------------------
  // History maintenance
  // ---------------------------------------------------------------------------

  private async compressHistory(): Promise<void> {
    try {
      const result = await this.conversationManager.maybeCompress(this.history, this.context);
      this.history = result.messages;
      const applied = result.compressionApplied;
      if (applied === undefined) return;
      await this.emit({
        type: 'compression_started',
        level: applied.level,
        currentTokens: applied.tokensBefore,
        targetTokens: applied.tokensAfter,
        reason: `Token usage requires ${applied.level} compression`,
      });
      await this.emit({
        type: 'compression_completed',
        summary: applied.summary,
        tokensSaved: applied.tokensSaved,
        messagesBefore: applied.messagesBefore,
        messagesAfter: applied.messagesAfter,
      });
      this.log('VRB', 'agent', 'agent:compression', applied.summary);
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.log('WRN', 'agent', 'agent:compression', `compression failed: ${message}; falling back to simple trimming`);
      this.history = simpleTrim(this.history, SIMPLE_TRIM_MAX_MESSAGES);
      await this.emit({ type: 'compression_failed', error: message, fallbackAction: COMPRESSION_FALLBACK_ACTION });
    }
  }

  /** Closes tool uses left open by an interrupted or abandoned task. */
  private async repairHistory(): Promise<void> {
    const unresolved = findUnresolvedToolUses(this.history);
    if (unresolved.length === 0) return;
    unresolved.forEach((use) => {
      this.history.push(toolResultMessage({ toolUseId: use.id, content: INTERRUPTED_TOOL_RESULT, isError: true }));
    });
    this.log('WRN', 'agent', 'agent:engine', `closed ${String(unresolved.length)} unresolved tool call(s) from a previous task`);
    await this.emit({ type: 'status_update', status: 'repaired_history', metadata: { toolUseIds: unresolved.map((use) => use.id) } });
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  public exportContextSnapshot(): PersistedAgentContext {
    return PersistedAgentContext.create(this.agentType, this.getConfig(), this.history, this.context);
  }

  public exportContextJson(): string {
    return this.exportContextSnapshot().toJson();
  }

  public async exportContextToFile(filePath: string): Promise<void> {
    await this.exportContextSnapshot().toFile(filePath);
  }

  /** Replaces history and execution context; the config only when the snapshot carries one. */
  public restoreContextFromSnapshot(snapshot: PersistedAgentContext): void {
    this.assertIdle('restore a snapshot');
    if (snapshot.config !== undefined) {
      this.config = { ...snapshot.config, tools: [...snapshot.config.tools] };
    }
    this.history = structuredClone(snapshot.conversationHistory);
    this.context = snapshot.executionContext !== undefined ? structuredClone(snapshot.executionContext) : undefined;
  }

  public restoreContextFromJson(json: string): void {
    this.restoreContextFromSnapshot(PersistedAgentContext.fromJson(json));
  }

  public async restoreContextFromFile(filePath: string): Promise<void> {
    this.restoreContextFromSnapshot(await PersistedAgentContext.fromFile(filePath));
  }

  /** Starts over from a bare message list; the execution context is cleared. */
  public restoreFromHistory(messages: readonly Message[]): void {
    this.assertIdle('restore history');
    this.history = structuredClone([...messages]);
    this.context = undefined;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private assertIdle(action: string): void {
    if (this.state === 'running') {
      throw new Error(`cannot ${action} while a task is running`);
    }
    if (this.pendingStep !== undefined) {
      throw new Error(`cannot ${action} while an interrupted step is still settling`);
    }
  }

  private updateContext(patch: Partial<ExecutionContext>): void {
    if (this.context === undefined) return;
    this.context = { ...this.context, ...patch };
  }

  private snapshotContext(): ExecutionContext {
    const context = this.context;
    if (context === undefined) {
      throw new Error('execution context is not initialized');
    }
    return { ...context, tokenUsage: { ...context.tokenUsage } };
  }

  private async emit(event: AgentEvent): Promise<void> {
    await this.output.emit(event);
  }

  private async record(entry: TrajectoryEntry): Promise<void> {
    try {
      await this.trajectory.record(entry);
    } catch (error: unknown) {
      this.log('ERR', 'agent', 'agent:trajectory', `trajectory write failed: ${errorMessage(error)}`);
    }
  }

  private log(
    severity: LogEntry['severity'],
    type: LogEntry['type'],
    remoteIdentifier: string,
    message: string,
    extra: Partial<Pick<LogEntry, 'direction' | 'details' | 'fatal' | 'stack'>> = {}
  ): void {
    if (this.onLog === undefined) return;
    try {
      this.onLog({
        timestamp: Date.now(),
        severity,
        step: this.currentStep,
        type,
        remoteIdentifier,
        fatal: extra.fatal ?? false,
        message,
        direction: extra.direction,
        details: extra.details,
        stack: extra.stack,
        agentId: this.agentId,
      });
    } catch {
      // log sinks never break the loop
    }
  }
}
