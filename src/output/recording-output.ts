import type { AgentEvent, AgentEventType, AgentOutput, ConfirmationDecision, ConfirmationRequest } from './types.js';

export type ConfirmationHandler = (request: ConfirmationRequest) => Promise<ConfirmationDecision> | ConfirmationDecision;

/** Keeps every event in memory, in order. */
export class RecordingOutput implements AgentOutput {
  public readonly events: AgentEvent[] = [];
  public readonly confirmations: ConfirmationRequest[] = [];
  public flushes = 0;
  private readonly onConfirm: ConfirmationHandler;

  constructor(options: { onConfirm?: ConfirmationHandler } = {}) {
    this.onConfirm = options.onConfirm ?? (() => ({ approved: true }));
  }

  public emitEvent(event: AgentEvent): Promise<void> {
    this.events.push(event);
    return Promise.resolve();
  }

  public async requestConfirmation(request: ConfirmationRequest): Promise<ConfirmationDecision> {
    this.confirmations.push(request);
    return await this.onConfirm(request);
  }

  public flush(): Promise<void> {
    this.flushes += 1;
    return Promise.resolve();
  }

  public ofType<T extends AgentEventType>(type: T): Extract<AgentEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<AgentEvent, { type: T }> => event.type === type);
  }

  public types(): AgentEventType[] {
    return this.events.map((event) => event.type);
  }
}
