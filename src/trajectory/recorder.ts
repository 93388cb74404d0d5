import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import { Mutex } from 'async-mutex';

import type { Trajectory, TrajectoryEntry, TrajectoryMetadata } from './types.js';

import { TrajectoryError, isMissingFileError } from '../persistence-errors.js';
import { formatZodIssues } from '../schemas.js';
import { errorMessage, formatFileTimestamp } from '../utils.js';

import { trajectorySchema } from './types.js';

export const TRAJECTORY_VERSION = '1.0';
export const DEFAULT_AGENT_TYPE = 'taskloop_agent';
export const DEFAULT_TRAJECTORY_DIR = 'trajectories';

export interface TrajectoryRecorderOptions {
  filePath?: string;
  /** Rewrite the file after every recorded entry. Defaults to true when a file path is set. */
  autoSave?: boolean;
  agentType?: string;
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => { deepFreeze(child); });
    Object.freeze(value);
  }
  return value;
};

/**
 * Append-only journal of one engine's activity. Appends and file writes share
 * one lock, so concurrent recorders never interleave a half-written document.
 */
export class TrajectoryRecorder {
  private readonly id = randomUUID();
  private readonly mutex = new Mutex();
  private readonly filePath?: string;
  private readonly autoSave: boolean;
  private readonly agentType: string;
  private entries: TrajectoryEntry[] = [];

  constructor(options: TrajectoryRecorderOptions = {}) {
    this.filePath = options.filePath !== undefined ? path.resolve(options.filePath) : undefined;
    this.autoSave = options.autoSave ?? this.filePath !== undefined;
    this.agentType = options.agentType ?? DEFAULT_AGENT_TYPE;
  }

  public static inMemory(): TrajectoryRecorder {
    return new TrajectoryRecorder();
  }

  public static withFile(filePath: string, options: Omit<TrajectoryRecorderOptions, 'filePath'> = {}): TrajectoryRecorder {
    return new TrajectoryRecorder({ ...options, filePath });
  }

  /** `<dir>/trajectory_YYYYMMDD_HHMMSS.json`; the directory is created on first save. */
  public static withAutoFilename(dir: string = DEFAULT_TRAJECTORY_DIR, now: Date = new Date()): TrajectoryRecorder {
    return TrajectoryRecorder.withFile(path.join(dir, `trajectory_${formatFileTimestamp(now)}.json`));
  }

  public get path(): string | undefined {
    return this.filePath;
  }

  public async record(entry: TrajectoryEntry): Promise<void> {
    const frozen = deepFreeze(structuredClone(entry));
    await this.mutex.runExclusive(async () => {
      this.entries.push(frozen);
      if (this.autoSave) {
        await this.writeUnlocked();
      }
    });
  }

  public getEntries(): readonly TrajectoryEntry[] {
    return [...this.entries];
  }

  public entryCount(): number {
    return this.entries.length;
  }

  public async clear(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.entries = [];
    });
  }

  /** Writes the whole document; a recorder without a file path does nothing. */
  public async save(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.writeUnlocked();
    });
  }

  public buildTrajectory(): Trajectory {
    const entries = [...this.entries];
    return { metadata: this.buildMetadata(entries), entries };
  }

  public static async load(filePath: string): Promise<Trajectory> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        throw new TrajectoryError('not_found', `trajectory file not found: ${filePath}`, { path: filePath, cause: error });
      }
      throw new TrajectoryError('read_failed', `failed to read trajectory '${filePath}': ${errorMessage(error)}`, { path: filePath, cause: error });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      throw new TrajectoryError('invalid_format', `trajectory '${filePath}' is not valid JSON: ${errorMessage(error)}`, { path: filePath, cause: error });
    }
    const result = trajectorySchema.safeParse(parsed);
    if (!result.success) {
      throw new TrajectoryError('invalid_format', `trajectory '${filePath}' is malformed: ${formatZodIssues(result.error)}`, { path: filePath });
    }
    return result.data;
  }

  private buildMetadata(entries: readonly TrajectoryEntry[]): TrajectoryMetadata {
    const first = entries.at(0);
    const last = entries.at(-1);
    const startedAt = first?.timestamp ?? new Date().toISOString();
    const completedAt = last?.timestamp;
    const durationMs = completedAt !== undefined
      ? Math.max(0, Date.parse(completedAt) - Date.parse(startedAt))
      : undefined;

    let task: string | undefined;
    let success: boolean | undefined;
    let totalSteps = 0;
    // eslint-disable-next-line functional/no-loop-statements
    for (const entry of entries) {
      switch (entry.data.type) {
        case 'task_start':
          task = entry.data.task;
          success = undefined;
          totalSteps = 0;
          break;
        case 'task_complete':
          success = entry.data.success;
          break;
        default:
          break;
      }
      totalSteps = Math.max(totalSteps, entry.step);
    }

    return {
      id: this.id,
      startedAt,
      completedAt,
      durationMs,
      version: TRAJECTORY_VERSION,
      agentType: this.agentType,
      task,
      success,
      totalSteps,
    };
  }

  private async writeUnlocked(): Promise<void> {
    if (this.filePath === undefined) return;
    const filePath = this.filePath;
    let json: string;
    try {
      json = JSON.stringify(this.buildTrajectory(), null, 2);
    } catch (error: unknown) {
      throw new TrajectoryError('write_failed', `failed to serialize trajectory: ${errorMessage(error)}`, { path: filePath, cause: error });
    }
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      const tmp = `${filePath}.tmp-${String(process.pid)}-${String(Date.now())}`;
      await fs.promises.writeFile(tmp, json, 'utf8');
      await fs.promises.rename(tmp, filePath);
    } catch (error: unknown) {
      throw new TrajectoryError('write_failed', `failed to write trajectory '${filePath}': ${errorMessage(error)}`, { path: filePath, cause: error });
    }
  }
}
