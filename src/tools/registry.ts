import Ajv from 'ajv';

import type { Tool, ToolCall, ToolCapabilities, ToolDefinition, ToolExecutor, ToolResult } from './types.js';
import type { CancellationRegistration } from '../cancellation.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions, ValidateFunction } from 'ajv';

import { ToolExecutionError, toToolExecutionError } from './tool-errors.js';

type AjvInstance = AjvClass;
type AjvConstructor = new (options?: AjvOptions) => AjvInstance;
// ajv ships CommonJS; under NodeNext the default import is the module namespace.
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

export interface ToolRegistryOptions {
  projectPath: string;
  /** Names the agent may use. Unset means every registered tool. */
  enabled?: readonly string[];
  cancellation?: CancellationRegistration;
}

interface RegisteredTool {
  tool: Tool;
  validate: ValidateFunction;
}

const formatAjvErrors = (errors: ErrorObject[] | null | undefined): string => (
  (errors ?? [])
    .map((error) => `${error.instancePath.length > 0 ? error.instancePath : '/'} ${error.message ?? 'is invalid'}`)
    .join('; ')
);

/**
 * Tool capability backed by in-process tools. Parameters are validated against
 * each tool's JSON schema before the tool runs.
 */
export class ToolRegistry implements ToolExecutor {
  private readonly ajv: AjvInstance = new AjvCtor({ allErrors: true, strict: false });
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly enabled?: ReadonlySet<string>;
  private readonly projectPath: string;
  private cancellation?: CancellationRegistration;

  constructor(options: ToolRegistryOptions, tools: readonly Tool[] = []) {
    this.projectPath = options.projectPath;
    this.enabled = options.enabled !== undefined ? new Set(options.enabled) : undefined;
    this.cancellation = options.cancellation;
    tools.forEach((tool) => { this.register(tool); });
  }

  public register(tool: Tool): this {
    const name = tool.definition.name;
    if (this.tools.has(name)) {
      throw new Error(`tool '${name}' is already registered`);
    }
    this.tools.set(name, { tool, validate: this.ajv.compile(tool.definition.inputSchema) });
    return this;
  }

  /** Cancellation handed to tools that poll it; swapped per task by the runner. */
  public setCancellation(cancellation: CancellationRegistration | undefined): void {
    this.cancellation = cancellation;
  }

  public has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Enabled names without a registered implementation. */
  public missingTools(): string[] {
    if (this.enabled === undefined) return [];
    return [...this.enabled].filter((name) => !this.tools.has(name));
  }

  public requiresConfirmation(name: string): boolean {
    return this.lookup(name)?.tool.requiresConfirmation === true;
  }

  public capabilitiesOf(name: string): ToolCapabilities {
    return this.lookup(name)?.tool.capabilities ?? {};
  }

  public listDefinitions(): ToolDefinition[] {
    return this.activeTools().map((entry) => entry.tool.definition);
  }

  public listNames(): string[] {
    return this.activeTools().map((entry) => entry.tool.definition.name);
  }

  public async execute(call: ToolCall): Promise<ToolResult> {
    const registered = this.tools.get(call.name);
    if (registered === undefined) {
      throw new ToolExecutionError('unknown_tool', `unknown tool '${call.name}'`, { toolName: call.name });
    }
    if (this.enabled !== undefined && !this.enabled.has(call.name)) {
      throw new ToolExecutionError('not_permitted', `tool '${call.name}' is not enabled`, { toolName: call.name });
    }
    if (!registered.validate(call.parameters)) {
      throw new ToolExecutionError(
        'invalid_parameters',
        `invalid parameters for '${call.name}': ${formatAjvErrors(registered.validate.errors)}`,
        { toolName: call.name }
      );
    }
    try {
      const output = await registered.tool.execute(call.parameters, {
        projectPath: this.projectPath,
        cancellation: this.cancellation,
      });
      return { toolCallId: call.id, success: output.success, content: output.content, data: output.data };
    } catch (error: unknown) {
      throw toToolExecutionError(error, call.name);
    }
  }

  private lookup(name: string): RegisteredTool | undefined {
    if (this.enabled !== undefined && !this.enabled.has(name)) return undefined;
    return this.tools.get(name);
  }

  private activeTools(): RegisteredTool[] {
    return [...this.tools.values()].filter((entry) => this.enabled === undefined || this.enabled.has(entry.tool.definition.name));
  }
}
