import type { Tool, ToolOutput } from './types.js';

export const TASK_DONE_TOOL = 'task_done';
export const SEQUENTIAL_THINKING_TOOL = 'sequential_thinking';

export function createTaskDoneTool(): Tool {
  return {
    definition: {
      name: TASK_DONE_TOOL,
      description: 'Call this when the task is fully complete. Provide a short summary of what was done and how it was verified.',
      inputSchema: {
        type: 'object',
        properties: {
          summary: { type: 'string', description: 'What was accomplished.' },
        },
        additionalProperties: false,
      },
    },
    capabilities: { completesTask: true },
    execute: (parameters): Promise<ToolOutput> => {
      const summary = typeof parameters.summary === 'string' && parameters.summary.trim().length > 0
        ? parameters.summary.trim()
        : 'Task completed';
      return Promise.resolve({ success: true, content: summary });
    },
  };
}

export interface ThoughtRecord {
  thought: string;
  thoughtNumber: number;
  totalThoughts: number;
  nextThoughtNeeded: boolean;
}

/**
 * Step-by-step reasoning scratchpad. Thoughts are kept per tool instance and
 * echoed back in the `Thought: ...` form the engine surfaces as thinking.
 */
export function createSequentialThinkingTool(): Tool & { history: () => readonly ThoughtRecord[] } {
  const thoughts: ThoughtRecord[] = [];
  return {
    definition: {
      name: SEQUENTIAL_THINKING_TOOL,
      description: 'Think through a problem one step at a time. Use it to plan, revise earlier thoughts, or check a hypothesis before acting.',
      inputSchema: {
        type: 'object',
        properties: {
          thought: { type: 'string', minLength: 1 },
          thoughtNumber: { type: 'integer', minimum: 1 },
          totalThoughts: { type: 'integer', minimum: 1 },
          nextThoughtNeeded: { type: 'boolean' },
        },
        required: ['thought'],
      },
    },
    capabilities: { streamsThoughts: true },
    history: () => [...thoughts],
    execute: (parameters): Promise<ToolOutput> => {
      const thought = typeof parameters.thought === 'string' ? parameters.thought : '';
      const thoughtNumber = typeof parameters.thoughtNumber === 'number' ? parameters.thoughtNumber : thoughts.length + 1;
      const totalThoughts = typeof parameters.totalThoughts === 'number'
        ? Math.max(parameters.totalThoughts, thoughtNumber)
        : thoughtNumber;
      const nextThoughtNeeded = typeof parameters.nextThoughtNeeded === 'boolean' ? parameters.nextThoughtNeeded : false;
      const record: ThoughtRecord = { thought, thoughtNumber, totalThoughts, nextThoughtNeeded };
      thoughts.push(record);
      return Promise.resolve({
        success: true,
        content: `Thought: ${thought}\n\nThought ${String(thoughtNumber)} of ${String(totalThoughts)}; next thought needed: ${nextThoughtNeeded ? 'yes' : 'no'}`,
        data: record,
      });
    },
  };
}

export function createBuiltinTools(): Tool[] {
  return [createTaskDoneTool(), createSequentialThinkingTool()];
}
