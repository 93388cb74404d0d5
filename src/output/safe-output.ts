import type { AgentEvent, AgentOutput, ConfirmationDecision, ConfirmationRequest } from './types.js';

import { errorMessage } from '../utils.js';

export type OutputFailureHandler = (operation: string, error: unknown) => void;

/**
 * Wraps an output so that nothing it throws reaches the engine. Emission and
 * flush failures are reported and dropped; a failed confirmation is a denial.
 */
export class SafeOutput {
  private readonly inner: AgentOutput;
  private readonly onFailure: OutputFailureHandler;

  constructor(inner: AgentOutput, onFailure: OutputFailureHandler) {
    this.inner = inner;
    this.onFailure = onFailure;
  }

  public async emit(event: AgentEvent): Promise<void> {
    try {
      await this.inner.emitEvent(event);
    } catch (error: unknown) {
      this.onFailure(`emit ${event.type}`, error);
    }
  }

  public async confirm(request: ConfirmationRequest): Promise<ConfirmationDecision> {
    try {
      return await this.inner.requestConfirmation(request);
    } catch (error: unknown) {
      this.onFailure('request confirmation', error);
      return { approved: false, note: `confirmation failed: ${errorMessage(error)}` };
    }
  }

  public async flush(): Promise<void> {
    try {
      await this.inner.flush();
    } catch (error: unknown) {
      this.onFailure('flush', error);
    }
  }
}
