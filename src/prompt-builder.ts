import os from 'node:os';

import { DEFAULT_SYSTEM_PROMPT_TEMPLATE, SYSTEM_CONTEXT_TEMPLATE } from './prompts/loader.js';

export function buildPromptVars(now: Date = new Date()): Record<string, string> {
  const pad2 = (n: number): string => (n < 10 ? `0${String(n)}` : String(n));
  const formatRFC3339Local = (d: Date): string => {
    const y = d.getFullYear();
    const m = pad2(d.getMonth() + 1);
    const da = pad2(d.getDate());
    const hh = pad2(d.getHours());
    const mm = pad2(d.getMinutes());
    const ss = pad2(d.getSeconds());
    const tzMin = -d.getTimezoneOffset();
    const sign = tzMin >= 0 ? '+' : '-';
    const abs = Math.abs(tzMin);
    const tzh = pad2(Math.floor(abs / 60));
    const tzm = pad2(abs % 60);
    return `${String(y)}-${m}-${da}T${hh}:${mm}:${ss}${sign}${tzh}:${tzm}`;
  };
  const detectTimezone = (): string => {
    try {
      return Intl.DateTimeFormat().resolvedOptions().timeZone;
    } catch {
      return process.env.TZ ?? 'UTC';
    }
  };
  return {
    DATETIME: formatRFC3339Local(now),
    TIMESTAMP: String(Math.floor(now.getTime() / 1000)),
    DAY: now.toLocaleDateString(undefined, { weekday: 'long' }),
    TIMEZONE: detectTimezone(),
    OS: `${os.type()} ${os.release()}`,
    ARCH: os.arch(),
    SHELL: process.env.SHELL ?? (process.platform === 'win32' ? 'cmd.exe' : '/bin/sh'),
    NODE_VERSION: process.version,
  };
}

export function expandVars(text: string, vars: Record<string, string>): string {
  const replace = (s: string, re: RegExp): string => s.replace(re, (match: string, name: string) => (name in vars ? vars[name] : match));
  let out = text;
  out = replace(out, /\$\{([A-Z_]+)\}/g);
  out = replace(out, /\{\{([A-Z_]+)\}\}/g);
  return out;
}

export function buildSystemContext(vars: Record<string, string> = buildPromptVars()): string {
  return expandVars(SYSTEM_CONTEXT_TEMPLATE, vars);
}

export interface SystemPromptInput {
  projectPath: string;
  toolNames: readonly string[];
  /** Replaces the default coding prompt; project details are then left out. */
  customPrompt?: string;
  vars?: Record<string, string>;
}

export function buildSystemPrompt(input: SystemPromptInput): string {
  const vars = { ...(input.vars ?? buildPromptVars()), PROJECT_PATH: input.projectPath };
  const systemContext = buildSystemContext(vars);
  const base = input.customPrompt !== undefined
    ? `${expandVars(input.customPrompt, vars)}\n\n[System Context]:\n${systemContext}`
    : expandVars(DEFAULT_SYSTEM_PROMPT_TEMPLATE, { ...vars, SYSTEM_CONTEXT: systemContext });
  return `${base}\n\nAvailable tools: ${input.toolNames.join(', ')}`;
}
