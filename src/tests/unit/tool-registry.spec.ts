import { describe, expect, it } from 'vitest';

import type { ToolExecutionContext } from '../../tools/types.js';

import { CancellationController } from '../../cancellation.js';
import { createSequentialThinkingTool, createTaskDoneTool, TASK_DONE_TOOL } from '../../tools/internal-tools.js';
import { ToolRegistry } from '../../tools/registry.js';
import { ToolExecutionError } from '../../tools/tool-errors.js';
import { fakeTool } from '../fixtures/scripted-model.js';

const readTool = () => ({
  definition: {
    name: 'read_file',
    description: 'Read a file',
    inputSchema: {
      type: 'object',
      properties: { path: { type: 'string' } },
      required: ['path'],
      additionalProperties: false,
    },
  },
  execute: (parameters: Record<string, unknown>, context: ToolExecutionContext) => Promise.resolve({
    success: true,
    content: `${context.projectPath}/${String(parameters.path)}`,
  }),
});

const rejection = async (work: Promise<unknown>): Promise<ToolExecutionError> => {
  const error: unknown = await work.catch((e: unknown) => e);
  if (!(error instanceof ToolExecutionError)) throw new Error('expected a ToolExecutionError');
  return error;
};

describe('ToolRegistry', () => {
  it('executes a registered tool with the project path', async () => {
    const registry = new ToolRegistry({ projectPath: '/repo' }, [readTool()]);

    const result = await registry.execute({ id: 'c1', name: 'read_file', parameters: { path: 'a.ts' } });

    expect(result).toEqual({ toolCallId: 'c1', success: true, content: '/repo/a.ts', data: undefined });
  });

  it('validates parameters against the schema', async () => {
    const registry = new ToolRegistry({ projectPath: '/repo' }, [readTool()]);

    const missing = await rejection(registry.execute({ id: 'c1', name: 'read_file', parameters: {} }));
    const extra = await rejection(registry.execute({ id: 'c2', name: 'read_file', parameters: { path: 'a.ts', mode: 'r' } }));

    expect(missing.kind).toBe('invalid_parameters');
    expect(missing.invoked).toBe(false);
    expect(missing.message).toBe("invalid parameters for 'read_file': / must have required property 'path'");
    expect(extra.message).toBe("invalid parameters for 'read_file': / must NOT have additional properties");
  });

  it('rejects unknown and disabled tools', async () => {
    const registry = new ToolRegistry({ projectPath: '/repo', enabled: [TASK_DONE_TOOL] }, [createTaskDoneTool(), readTool()]);

    expect((await rejection(registry.execute({ id: 'x', name: 'nope', parameters: {} }))).kind).toBe('unknown_tool');
    expect((await rejection(registry.execute({ id: 'y', name: 'read_file', parameters: { path: 'a' } }))).kind).toBe('not_permitted');
    expect(registry.listNames()).toEqual([TASK_DONE_TOOL]);
    expect(registry.has('read_file')).toBe(false);
  });

  it('reports enabled names with no implementation', () => {
    const registry = new ToolRegistry({ projectPath: '/repo', enabled: ['bash', TASK_DONE_TOOL] }, [createTaskDoneTool()]);
    expect(registry.missingTools()).toEqual(['bash']);
  });

  it('wraps tool failures as execution errors', async () => {
    const registry = new ToolRegistry({ projectPath: '/repo' }, [fakeTool('boom', () => { throw new Error('kaput'); })]);

    const error = await rejection(registry.execute({ id: 'b', name: 'boom', parameters: {} }));

    expect(error.kind).toBe('execution_error');
    expect(error.message).toBe('kaput');
    expect(error.toolName).toBe('boom');
    expect(error.invoked).toBe(true);
  });

  it('refuses duplicate registrations', () => {
    const registry = new ToolRegistry({ projectPath: '/repo' }, [createTaskDoneTool()]);
    expect(() => registry.register(createTaskDoneTool())).toThrow("tool 'task_done' is already registered");
  });

  it('exposes declared capabilities and confirmation needs', () => {
    const registry = new ToolRegistry({ projectPath: '/repo' }, [
      createTaskDoneTool(),
      createSequentialThinkingTool(),
      fakeTool('rm', () => ({ success: true, content: '' }), { requiresConfirmation: true }),
    ]);

    expect(registry.capabilitiesOf('task_done')).toEqual({ completesTask: true });
    expect(registry.capabilitiesOf('sequential_thinking')).toEqual({ streamsThoughts: true });
    expect(registry.capabilitiesOf('rm')).toEqual({});
    expect(registry.requiresConfirmation('rm')).toBe(true);
    expect(registry.requiresConfirmation('task_done')).toBe(false);
  });

  it('hands the current cancellation to tools', async () => {
    const seen: boolean[] = [];
    const probe = {
      definition: { name: 'probe', description: 'probe', inputSchema: { type: 'object' } },
      execute: (_parameters: Record<string, unknown>, context: ToolExecutionContext) => {
        seen.push(context.cancellation?.isCancelled() ?? false);
        return Promise.resolve({ success: true, content: '' });
      },
    };
    const registry = new ToolRegistry({ projectPath: '/repo' }, [probe]);
    const [controller, registration] = CancellationController.create();
    registry.setCancellation(registration);
    controller.cancel();

    await registry.execute({ id: 'p', name: 'probe', parameters: {} });

    expect(seen).toEqual([true]);
  });
});

describe('built-in tools', () => {
  it('task_done returns the trimmed summary or a default', async () => {
    const tool = createTaskDoneTool();
    const context = { projectPath: '/repo' };
    await expect(tool.execute({ summary: '  shipped  ' }, context)).resolves.toEqual({ success: true, content: 'shipped' });
    await expect(tool.execute({}, context)).resolves.toEqual({ success: true, content: 'Task completed' });
  });

  it('sequential_thinking echoes the thought and keeps history', async () => {
    const tool = createSequentialThinkingTool();
    const output = await tool.execute({ thought: 'look at the lexer', thoughtNumber: 2, totalThoughts: 1 }, { projectPath: '/repo' });

    expect(output.content).toBe('Thought: look at the lexer\n\nThought 2 of 2; next thought needed: no');
    expect(tool.history()).toEqual([{ thought: 'look at the lexer', thoughtNumber: 2, totalThoughts: 2, nextThoughtNeeded: false }]);
  });
});
