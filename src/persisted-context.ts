import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { AgentConfig, ExecutionContext, Message } from './types.js';

import { SnapshotError, isMissingFileError } from './persistence-errors.js';
import { agentConfigSchema, executionContextSchema, formatZodIssues, messageSchema } from './schemas.js';
import { errorMessage } from './utils.js';

export const SNAPSHOT_VERSION = 1;

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  agentType: z.string().min(1),
  savedAt: z.string(),
  config: agentConfigSchema.optional(),
  conversationHistory: z.array(messageSchema),
  executionContext: executionContextSchema.optional(),
});

export interface PersistedAgentContextData {
  version: number;
  agentType: string;
  savedAt: string;      // ISO-8601
  config?: AgentConfig;
  conversationHistory: Message[];
  executionContext?: ExecutionContext;
}

/** Point-in-time copy of an engine's configuration, history and execution context. */
export class PersistedAgentContext implements PersistedAgentContextData {
  public readonly version: number;
  public readonly agentType: string;
  public readonly savedAt: string;
  public readonly config?: AgentConfig;
  public readonly conversationHistory: Message[];
  public readonly executionContext?: ExecutionContext;

  private constructor(data: PersistedAgentContextData) {
    this.version = data.version;
    this.agentType = data.agentType;
    this.savedAt = data.savedAt;
    this.config = data.config;
    this.conversationHistory = data.conversationHistory;
    this.executionContext = data.executionContext;
  }

  public static create(
    agentType: string,
    config: AgentConfig | undefined,
    conversationHistory: readonly Message[],
    executionContext: ExecutionContext | undefined
  ): PersistedAgentContext {
    return new PersistedAgentContext(structuredClone({
      version: SNAPSHOT_VERSION,
      agentType,
      savedAt: new Date().toISOString(),
      config,
      conversationHistory: [...conversationHistory],
      executionContext,
    }));
  }

  public toData(): PersistedAgentContextData {
    return {
      version: this.version,
      agentType: this.agentType,
      savedAt: this.savedAt,
      config: this.config,
      conversationHistory: this.conversationHistory,
      executionContext: this.executionContext,
    };
  }

  public toJson(): string {
    return JSON.stringify(this.toData(), null, 2);
  }

  public static fromJson(json: string): PersistedAgentContext {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error: unknown) {
      throw new SnapshotError('invalid_format', `snapshot is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      throw new SnapshotError('invalid_format', `snapshot is malformed: ${formatZodIssues(result.error)}`);
    }
    return new PersistedAgentContext(result.data);
  }

  /** Writes pretty-printed JSON, creating parent directories as needed. */
  public async toFile(filePath: string): Promise<void> {
    const target = path.resolve(filePath);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      const tmp = `${target}.tmp-${String(process.pid)}-${String(Date.now())}`;
      await fs.promises.writeFile(tmp, this.toJson(), 'utf8');
      await fs.promises.rename(tmp, target);
    } catch (error: unknown) {
      throw new SnapshotError('write_failed', `failed to write snapshot '${target}': ${errorMessage(error)}`, { path: target, cause: error });
    }
  }

  public static async fromFile(filePath: string): Promise<PersistedAgentContext> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        throw new SnapshotError('not_found', `snapshot file not found: ${filePath}`, { path: filePath, cause: error });
      }
      throw new SnapshotError('read_failed', `failed to read snapshot '${filePath}': ${errorMessage(error)}`, { path: filePath, cause: error });
    }
    try {
      return PersistedAgentContext.fromJson(raw);
    } catch (error: unknown) {
      if (error instanceof SnapshotError) {
        throw new SnapshotError(error.kind, `${filePath}: ${error.message}`, { path: filePath, cause: error });
      }
      throw error;
    }
  }
}
