import { z } from 'zod';

// Validation for documents read back from disk (snapshots, trajectories, config files).

export const DEFAULT_TOOLS = ['bash', 'str_replace_based_edit_tool', 'sequential_thinking', 'task_done'] as const;

export const agentConfigSchema = z.object({
  maxSteps: z.number().int().positive().default(200),
  enableExtendedView: z.boolean().default(true),
  tools: z.array(z.string().min(1)).default([...DEFAULT_TOOLS]),
  outputMode: z.enum(['normal', 'debug']).default('normal'),
  systemPrompt: z.string().optional(),
}).strict();

const textBlockSchema = z.object({ type: z.literal('text'), text: z.string() });
const imageBlockSchema = z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() });
const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.string(), z.unknown()),
});
const toolResultBlockSchema = z.object({
  type: z.literal('tool_result'),
  toolUseId: z.string(),
  isError: z.boolean().optional(),
  content: z.string(),
});

export const contentBlockSchema = z.discriminatedUnion('type', [
  textBlockSchema,
  imageBlockSchema,
  toolUseBlockSchema,
  toolResultBlockSchema,
]);

export const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.union([z.string(), z.array(contentBlockSchema)]),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export const tokenUsageSchema = z.object({
  inputTokens: z.number().nonnegative(),
  outputTokens: z.number().nonnegative(),
  totalTokens: z.number().nonnegative(),
});

export const executionContextSchema = z.object({
  agentId: z.string(),
  originalGoal: z.string(),
  currentTask: z.string(),
  projectPath: z.string(),
  maxSteps: z.number().int().nonnegative(),
  currentStep: z.number().int().nonnegative(),
  executionTimeMs: z.number().nonnegative(),
  tokenUsage: tokenUsageSchema,
});

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}
