import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { ProviderConfig } from './llm-providers/types.js';
import type { AgentConfig } from './types.js';

import { agentConfigSchema, formatZodIssues } from './schemas.js';
import { errorMessage } from './utils.js';

export const CONFIG_FILE_NAME = '.taskloop.json';

const LlmConfigSchema = z.object({
  protocol: z.enum(['anthropic', 'openai', 'openai-compatible', 'google']),
  model: z.string().min(1),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  contextWindow: z.number().int().positive().optional(),
  tokenizer: z.string().optional(),
}).strict();

const ConfigurationSchema = z.object({
  agent: agentConfigSchema.default({}),
  llm: LlmConfigSchema,
}).strict();

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export interface Configuration {
  agent: AgentConfig;
  llm: LlmConfig;
}

export interface LoadedConfiguration {
  path: string;
  config: Configuration;
}

const API_KEY_ENV: Record<LlmConfig['protocol'], string | undefined> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
  'openai-compatible': undefined,
};

type Env = Record<string, string | undefined>;

// ${NAME} references; unset variables expand to the empty string
function expandEnv(str: string, env: Env): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

function expandDeep(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

export function resolveConfigPath(configPath?: string, cwd: string = process.cwd(), home: string = os.homedir()): string {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(local)) return local;
  const fallback = path.join(home, CONFIG_FILE_NAME);
  if (fs.existsSync(fallback)) return fallback;
  throw new Error(`Configuration file not found. Create ${CONFIG_FILE_NAME} or pass --config`);
}

export function parseConfiguration(raw: string, source: string, env: Env = process.env): Configuration {
  let document: unknown;
  try {
    document = /\.ya?ml$/i.test(source) ? yaml.load(raw) : JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid configuration syntax in ${source}: ${errorMessage(e)}`);
  }
  const parsed = ConfigurationSchema.safeParse(expandDeep(document, env));
  if (!parsed.success) {
    throw new Error(`Configuration validation failed in ${source}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadConfiguration(configPath?: string, env: Env = process.env): LoadedConfiguration {
  const resolved = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${resolved}: ${errorMessage(e)}`);
  }
  return { path: resolved, config: parseConfiguration(raw, resolved, env) };
}

/** Provider settings for the model client; a missing key falls back to the protocol's usual variable. */
export function resolveLlmConfig(llm: LlmConfig, env: Env = process.env): ProviderConfig {
  const envName = API_KEY_ENV[llm.protocol];
  const fromEnv = envName !== undefined ? env[envName] : undefined;
  const apiKey = llm.apiKey !== undefined && llm.apiKey.length > 0 ? llm.apiKey : fromEnv;
  return {
    protocol: llm.protocol,
    model: llm.model,
    apiKey: apiKey !== undefined && apiKey.length > 0 ? apiKey : undefined,
    baseUrl: llm.baseUrl,
    headers: llm.headers,
    maxOutputTokens: llm.maxOutputTokens,
    temperature: llm.temperature,
  };
}
