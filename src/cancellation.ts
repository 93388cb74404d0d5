/**
 * Cooperative cancellation.
 *
 * A controller owns a one-shot stop cell; registrations observe it. Cancelling
 * is idempotent and cannot be undone, and every registration, including
 * ones created afterwards, sees the cancelled state.
 */

export type CancellationListener = (reason: string | undefined) => void;

export class CancellationRegistration {
  private readonly signal: AbortSignal;
  private readonly reasonOf: () => string | undefined;

  constructor(signal: AbortSignal, reasonOf: () => string | undefined) {
    this.signal = signal;
    this.reasonOf = reasonOf;
  }

  public isCancelled(): boolean {
    return this.signal.aborted;
  }

  public get reason(): string | undefined {
    return this.reasonOf();
  }

  /** Resolves once the controller is cancelled; immediately when it already is. */
  public cancelled(): Promise<void> {
    if (this.signal.aborted) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.signal.addEventListener('abort', () => { resolve(); }, { once: true });
    });
  }

  /**
   * First of cancellation and `work`. Resolves to `{ cancelled: true }` when
   * cancellation wins; `work` keeps running and its eventual rejection is
   * observed so it never surfaces as unhandled.
   */
  public async race<T>(work: Promise<T>): Promise<{ cancelled: true } | { cancelled: false; value: T }> {
    if (this.signal.aborted) {
      work.catch(() => undefined);
      return { cancelled: true };
    }
    let onAbort: (() => void) | undefined;
    const cancellation = new Promise<{ cancelled: true }>((resolve) => {
      onAbort = () => { resolve({ cancelled: true }); };
      this.signal.addEventListener('abort', onAbort, { once: true });
    });
    const completion = work.then((value) => ({ cancelled: false as const, value }));
    try {
      const winner = await Promise.race([cancellation, completion]);
      if (winner.cancelled) completion.catch(() => undefined);
      return winner;
    } finally {
      if (onAbort !== undefined) this.signal.removeEventListener('abort', onAbort);
    }
  }

  public onCancel(listener: CancellationListener): () => void {
    if (this.signal.aborted) {
      listener(this.reasonOf());
      return () => undefined;
    }
    const handler = (): void => { listener(this.reasonOf()); };
    this.signal.addEventListener('abort', handler, { once: true });
    return () => {
      this.signal.removeEventListener('abort', handler);
    };
  }
}

export class CancellationController {
  private readonly abortController = new AbortController();
  private cancelReason?: string;

  public static create(): [CancellationController, CancellationRegistration] {
    const controller = new CancellationController();
    return [controller, controller.subscribe()];
  }

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public get reason(): string | undefined {
    return this.cancelReason;
  }

  public isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  public cancel(reason?: string): void {
    if (this.abortController.signal.aborted) return;
    this.cancelReason = reason;
    this.abortController.abort();
  }

  public subscribe(): CancellationRegistration {
    return new CancellationRegistration(this.abortController.signal, () => this.cancelReason);
  }
}
