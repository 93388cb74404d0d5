#!/usr/bin/env node
import path from 'node:path';
import * as readline from 'node:readline';

import { Command, InvalidArgumentError } from 'commander';

import type { ConfirmationDecision, ConfirmationRequest } from './output/types.js';
import type { AgentExecutionResult } from './types.js';
import type { CommanderError } from 'commander';

import { AgentCore, DEFAULT_CONTEXT_WINDOW } from './agent-core.js';
import { AgentTaskRunner } from './agent-runner.js';
import { loadConfiguration, resolveLlmConfig } from './config.js';
import { ConversationManager, ModelSummarizer } from './conversation-manager.js';
import { createModelClient } from './llm-providers/index.js';
import { makeTTYLogCallbacks } from './log-sink-tty.js';
import { LogOutput } from './output/log-output.js';
import { defaultTokenizerFor } from './tokenizer-registry.js';
import { createBuiltinTools } from './tools/internal-tools.js';
import { ToolRegistry } from './tools/registry.js';
import { TrajectoryRecorder } from './trajectory/recorder.js';
import { errorMessage, setWarningSink, warn } from './utils.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

interface RunOptions {
  config?: string;
  project: string;
  maxSteps?: number;
  trajectory?: string | boolean;
  restore?: string;
  save?: string;
  yes?: boolean;
  verbose?: boolean;
  logFormat?: string;
}

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* stderr closed */ }
};

setWarningSink(defaultWarningSink);

export function exitCodeFor(result: AgentExecutionResult): number {
  switch (result.outcome) {
    case 'completed':
      return EXIT_SUCCESS;
    case 'interrupted':
      return EXIT_INTERRUPTED;
    case 'failed':
      return EXIT_FAILURE;
  }
}

const parsePositiveInt = (value: string): number => {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0 || String(n) !== value.trim()) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
};

function askConfirmation(request: ConfirmationRequest): Promise<ConfirmationDecision> {
  if (!process.stdin.isTTY) {
    return Promise.resolve({ approved: false, note: 'stdin is not interactive' });
  }
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  const preview = JSON.stringify(request.call.parameters, null, 2);
  return new Promise<ConfirmationDecision>((resolve) => {
    rl.question(`\n${request.title}\n${request.message}\n${preview}\nApprove? [y/N] `, (answer) => {
      rl.close();
      const approved = /^y(es)?$/i.test(answer.trim());
      resolve(approved ? { approved } : { approved, note: 'declined at prompt' });
    });
  });
}

async function runCommand(task: string, opts: RunOptions): Promise<number> {
  const { config } = loadConfiguration(opts.config);
  const agentConfig = opts.maxSteps !== undefined ? { ...config.agent, maxSteps: opts.maxSteps } : config.agent;
  const projectPath = path.resolve(opts.project);
  const verbose = opts.verbose === true || agentConfig.outputMode === 'debug';

  const { onLog } = makeTTYLogCallbacks({ verbose, explicitFormat: opts.logFormat });
  const model = createModelClient(resolveLlmConfig(config.llm));
  const tools = new ToolRegistry({ projectPath, enabled: agentConfig.tools }, createBuiltinTools());
  const missing = tools.missingTools();
  if (missing.length > 0) {
    warn(`configured tools without an implementation are skipped: ${missing.join(', ')}`);
  }

  let trajectory: TrajectoryRecorder | undefined;
  if (typeof opts.trajectory === 'string') trajectory = TrajectoryRecorder.withFile(opts.trajectory);
  else if (opts.trajectory === true) trajectory = TrajectoryRecorder.withAutoFilename();

  const agent = new AgentCore({
    config: agentConfig,
    model,
    tools,
    trajectory,
    onLog,
    output: new LogOutput({
      onLog,
      mode: agentConfig.outputMode,
      confirm: opts.yes === true ? undefined : askConfirmation,
      autoApprove: opts.yes === true,
    }),
    conversationManager: new ConversationManager({
      maxTokens: config.llm.contextWindow ?? DEFAULT_CONTEXT_WINDOW,
      tokenizerId: config.llm.tokenizer ?? defaultTokenizerFor(model.providerName, model.modelName),
      summarizer: new ModelSummarizer(model),
    }),
  });
  if (opts.restore !== undefined) {
    await agent.restoreContextFromFile(opts.restore);
  }

  const runner = new AgentTaskRunner(agent, tools);
  let interrupts = 0;
  const onSigint = (): void => {
    interrupts += 1;
    if (interrupts > 1) {
      process.exit(EXIT_INTERRUPTED);
    }
    warn('interrupt received; stopping after the current operation (press Ctrl-C again to exit now)');
    runner.interrupt('Execution interrupted by user');
  };
  process.on('SIGINT', onSigint);

  let result: AgentExecutionResult;
  try {
    result = await runner.executeTask(task, projectPath);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (opts.save !== undefined) {
    await agent.exportContextToFile(opts.save);
  }
  if (trajectory?.path !== undefined) {
    process.stderr.write(`trajectory saved to ${trajectory.path}\n`);
  }
  if (result.finalMessage !== undefined) {
    process.stdout.write(`${result.finalMessage}\n`);
  }
  process.stderr.write(`${result.summary} (${String(result.steps)} steps, ${String(result.durationMs)} ms)\n`);
  return exitCodeFor(result);
}

const program = new Command();

program
  .name('taskloop')
  .description('Run a tool-using coding agent against a project')
  .exitOverride((err: CommanderError) => {
    process.exit(err.exitCode);
  });

program
  .command('run')
  .description('Execute a task until it completes, fails, or is interrupted')
  .argument('<task>', 'Task description')
  .option('-c, --config <file>', 'Configuration file (JSON or YAML)')
  .option('-p, --project <dir>', 'Project directory', process.cwd())
  .option('--max-steps <n>', 'Override the configured step limit', parsePositiveInt)
  .option('--trajectory [file]', 'Record the trajectory (auto-named under trajectories/ without a file)')
  .option('--restore <snapshot>', 'Restore conversation state from a snapshot before running')
  .option('--save <snapshot>', 'Save conversation state to a snapshot after the task')
  .option('-y, --yes', 'Approve every tool that asks for confirmation')
  .option('-v, --verbose', 'Verbose logging')
  .option('--log-format <format>', 'Log format: logfmt, json, console or none')
  .action(async (task: string, opts: RunOptions) => {
    try {
      process.exitCode = await runCommand(task, opts);
    } catch (error: unknown) {
      process.stderr.write(`taskloop: ${errorMessage(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  });

await program.parseAsync(process.argv);
