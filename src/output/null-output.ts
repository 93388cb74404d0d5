import type { AgentEvent, AgentOutput, ConfirmationDecision, ConfirmationRequest } from './types.js';

/** Discards events. Confirmations are denied unless `approveAll` is set. */
export class NullOutput implements AgentOutput {
  private readonly approveAll: boolean;

  constructor(options: { approveAll?: boolean } = {}) {
    this.approveAll = options.approveAll ?? false;
  }

  public emitEvent(_event: AgentEvent): Promise<void> {
    return Promise.resolve();
  }

  public requestConfirmation(_request: ConfirmationRequest): Promise<ConfirmationDecision> {
    return Promise.resolve({ approved: this.approveAll });
  }

  public flush(): Promise<void> {
    return Promise.resolve();
  }
}
