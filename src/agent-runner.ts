import { Mutex } from 'async-mutex';

import type { AgentCore } from './agent-core.js';
import type { AgentExecutionResult } from './types.js';

import { CancellationController, type CancellationRegistration } from './cancellation.js';

/** Tool executors that want the cancellation of the task they run under. */
export interface CancellationAware {
  setCancellation: (cancellation: CancellationRegistration | undefined) => void;
}

/**
 * Serializes tasks on one engine. Each task gets its own cancellation
 * controller, so interrupting one task never leaks into the next.
 */
export class AgentTaskRunner {
  private readonly agent: AgentCore;
  private readonly toolsCancellation?: CancellationAware;
  private readonly mutex = new Mutex();
  private current?: CancellationController;

  constructor(agent: AgentCore, toolsCancellation?: CancellationAware) {
    this.agent = agent;
    this.toolsCancellation = toolsCancellation;
  }

  public get isRunning(): boolean {
    return this.mutex.isLocked();
  }

  public async executeTask(task: string, projectPath: string): Promise<AgentExecutionResult> {
    return await this.mutex.runExclusive(async () => {
      const controller = new CancellationController();
      this.current = controller;
      this.agent.setCancellationController(controller);
      this.toolsCancellation?.setCancellation(controller.subscribe());
      try {
        return await this.agent.executeTask(task, projectPath);
      } finally {
        this.current = undefined;
        this.toolsCancellation?.setCancellation(undefined);
      }
    });
  }

  /** Cancels the running task; a no-op when idle. */
  public interrupt(reason?: string): boolean {
    const controller = this.current;
    if (controller === undefined || controller.isCancelled()) return false;
    controller.cancel(reason);
    return true;
  }
}
