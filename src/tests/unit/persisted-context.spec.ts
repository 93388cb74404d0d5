import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { AgentConfig, ExecutionContext, Message } from '../../types.js';

import { AgentCore } from '../../agent-core.js';
import { assistantMessage, systemMessage, toolResultMessage, userMessage } from '../../messages.js';
import { PersistedAgentContext, SNAPSHOT_VERSION } from '../../persisted-context.js';
import { SnapshotError } from '../../persistence-errors.js';
import { createBuiltinTools } from '../../tools/internal-tools.js';
import { ToolRegistry } from '../../tools/registry.js';
import { ScriptedModelClient, toolTurn, toolUse } from '../fixtures/scripted-model.js';

const config: AgentConfig = {
  maxSteps: 12,
  enableExtendedView: false,
  tools: ['task_done', 'sequential_thinking'],
  outputMode: 'debug',
  systemPrompt: 'Be brief.',
};

const context: ExecutionContext = {
  agentId: 'agent-7',
  originalGoal: 'upgrade the parser',
  currentTask: 'fix the failing test',
  projectPath: '/srv/repo',
  maxSteps: 12,
  currentStep: 4,
  executionTimeMs: 5120,
  tokenUsage: { inputTokens: 900, outputTokens: 120, totalTokens: 1020 },
};

const history: Message[] = [
  systemMessage('system prompt'),
  userMessage('upgrade the parser'),
  assistantMessage('Looking around.', [{ type: 'tool_use', id: 'u1', name: 'bash', input: { command: 'ls -la' } }]),
  toolResultMessage({ toolUseId: 'u1', content: 'src\ntests', isError: false }),
  { role: 'user', content: [{ type: 'image', data: 'aGVsbG8=', mimeType: 'image/png' }] },
];

const newAgent = (): AgentCore => new AgentCore({
  config: { maxSteps: 3, enableExtendedView: true, tools: ['task_done'], outputMode: 'normal' },
  model: new ScriptedModelClient([toolTurn('', [toolUse('d1', 'task_done')])]),
  tools: new ToolRegistry({ projectPath: '/srv/repo' }, createBuiltinTools()),
});

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'snapshot-'));
});

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true });
});

describe('PersistedAgentContext', () => {
  it('round-trips through JSON', () => {
    const snapshot = PersistedAgentContext.create('taskloop_agent', config, history, context);

    const restored = PersistedAgentContext.fromJson(snapshot.toJson());

    expect(restored.version).toBe(SNAPSHOT_VERSION);
    expect(restored.agentType).toBe('taskloop_agent');
    expect(restored.savedAt).toBe(snapshot.savedAt);
    expect(restored.config).toEqual(config);
    expect(restored.conversationHistory).toEqual(history);
    expect(restored.executionContext).toEqual(context);
  });

  it('copies its inputs', () => {
    const mutable = [...history];
    const snapshot = PersistedAgentContext.create('taskloop_agent', config, mutable, context);
    mutable.push(userMessage('later'));
    expect(snapshot.conversationHistory).toHaveLength(history.length);
  });

  it('omits config and context when absent', () => {
    const snapshot = PersistedAgentContext.create('taskloop_agent', undefined, [], undefined);
    const parsed: unknown = JSON.parse(snapshot.toJson());
    expect(parsed).toEqual({ version: 1, agentType: 'taskloop_agent', savedAt: snapshot.savedAt, conversationHistory: [] });
  });

  it('rejects malformed JSON as invalid_format', () => {
    expect(() => PersistedAgentContext.fromJson('{"version": 1,')).toThrow(SnapshotError);
    try {
      PersistedAgentContext.fromJson('{"version": 1,');
    } catch (error: unknown) {
      expect(error instanceof SnapshotError ? error.kind : undefined).toBe('invalid_format');
    }
  });

  it('rejects an unknown version', () => {
    const json = JSON.stringify({ version: 2, agentType: 'x', savedAt: 'now', conversationHistory: [] });
    expect(() => PersistedAgentContext.fromJson(json)).toThrow('snapshot is malformed: version: Invalid literal value, expected 1');
  });

  it('writes into missing directories and reads back', async () => {
    const file = path.join(tmpDir, 'a', 'b', 'snapshot.json');
    await PersistedAgentContext.create('taskloop_agent', config, history, context).toFile(file);

    const restored = await PersistedAgentContext.fromFile(file);

    expect(restored.conversationHistory).toEqual(history);
    expect(restored.executionContext?.currentStep).toBe(4);
  });

  it('reports a missing file as not_found', async () => {
    await expect(PersistedAgentContext.fromFile(path.join(tmpDir, 'nope.json'))).rejects.toMatchObject({ kind: 'not_found' });
  });
});

describe('AgentCore snapshots', () => {
  it('restores history, context and config from a snapshot', () => {
    const agent = newAgent();
    agent.restoreContextFromSnapshot(PersistedAgentContext.create('taskloop_agent', config, history, context));

    expect(agent.getConversationHistory()).toEqual(history);
    expect(agent.getExecutionContext()).toEqual(context);
    expect(agent.getConfig()).toEqual(config);
  });

  it('keeps its own config when the snapshot has none', () => {
    const agent = newAgent();
    const before = agent.getConfig();
    agent.restoreContextFromSnapshot(PersistedAgentContext.create('taskloop_agent', undefined, history, undefined));

    expect(agent.getConfig()).toEqual(before);
    expect(agent.getExecutionContext()).toBeUndefined();
  });

  it('exports what it restored', async () => {
    const source = newAgent();
    source.restoreContextFromJson(PersistedAgentContext.create('taskloop_agent', config, history, context).toJson());
    const file = path.join(tmpDir, 'export.json');
    await source.exportContextToFile(file);

    const target = newAgent();
    await target.restoreContextFromFile(file);

    expect(target.getConversationHistory()).toEqual(history);
    expect(target.getExecutionContext()).toEqual(context);
  });

  it('continues a restored conversation with the original goal', async () => {
    const agent = newAgent();
    agent.restoreContextFromSnapshot(PersistedAgentContext.create('taskloop_agent', undefined, history, context));

    const result = await agent.executeTask('now update the docs', '/srv/repo');

    expect(result.outcome).toBe('completed');
    const after = agent.getExecutionContext();
    expect(after?.originalGoal).toBe('upgrade the parser');
    expect(after?.currentTask).toBe('now update the docs');
    expect(after?.tokenUsage).toEqual(context.tokenUsage);
    expect(agent.exportContextSnapshot().conversationHistory.slice(0, history.length)).toEqual(history);
  });

  it('clears the execution context when restoring bare history', () => {
    const agent = newAgent();
    agent.restoreContextFromSnapshot(PersistedAgentContext.create('taskloop_agent', config, history, context));
    agent.restoreFromHistory([userMessage('hello')]);

    expect(agent.getConversationHistory()).toEqual([userMessage('hello')]);
    expect(agent.getExecutionContext()).toBeUndefined();
  });
});
