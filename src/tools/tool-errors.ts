import { errorMessage } from '../utils.js';

export type ToolErrorKind =
  | 'unknown_tool'
  | 'not_permitted'
  | 'invalid_parameters'
  | 'execution_error';

// `invoked`: whether the tool body ran before the failure.
export const TOOL_ERROR_KIND_MEANINGS: Record<ToolErrorKind, { invoked: boolean; summary: string }> = {
  unknown_tool: { invoked: false, summary: 'No tool with this name is registered.' },
  not_permitted: { invoked: false, summary: 'The tool exists but the agent configuration does not enable it.' },
  invalid_parameters: { invoked: false, summary: 'Parameters did not match the tool input schema.' },
  execution_error: { invoked: true, summary: 'The tool threw while running.' },
};

export class ToolExecutionError extends Error {
  readonly kind: ToolErrorKind;
  readonly toolName?: string;

  constructor(kind: ToolErrorKind, message: string, opts?: { toolName?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ToolExecutionError';
    this.kind = kind;
    if (opts?.toolName !== undefined) this.toolName = opts.toolName;
  }

  get invoked(): boolean {
    return TOOL_ERROR_KIND_MEANINGS[this.kind].invoked;
  }
}

export const isToolExecutionError = (value: unknown): value is ToolExecutionError =>
  value instanceof ToolExecutionError;

/** Wraps whatever a tool body threw; errors already classified pass through. */
export function toToolExecutionError(value: unknown, toolName: string): ToolExecutionError {
  if (isToolExecutionError(value)) return value;
  return new ToolExecutionError('execution_error', errorMessage(value), { toolName, cause: value });
}
