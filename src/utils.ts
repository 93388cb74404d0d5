import { jsonrepair } from 'jsonrepair';

let warningSink: ((message: string) => void) | undefined;

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

export const errorStack = (error: unknown): string | undefined => (
  error instanceof Error && typeof error.stack === 'string' ? error.stack : undefined
);

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

const stripSurroundingCodeFence = (value: string): string | undefined => {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/iu.exec(value);
  return match !== null ? match[1] : undefined;
};

/**
 * Parses model-produced tool arguments into an object. Accepts objects as-is,
 * strips a surrounding code fence and falls back to jsonrepair for the usual
 * truncation and quoting mistakes.
 */
export const parseJsonRecord = (raw: unknown): Record<string, unknown> | undefined => {
  if (isPlainObject(raw)) return raw;
  if (typeof raw !== 'string') return undefined;
  const text = raw.trim();
  if (text.length === 0) return {};
  const candidates = [text, stripSurroundingCodeFence(text)].filter((v): v is string => v !== undefined);
  // eslint-disable-next-line functional/no-loop-statements
  for (const candidate of candidates) {
    const direct = tryParseJson(candidate);
    if (isPlainObject(direct)) return direct;
    try {
      const repaired = tryParseJson(jsonrepair(candidate));
      if (isPlainObject(repaired)) return repaired;
    } catch {
      // not repairable, try the next candidate
    }
  }
  return undefined;
};

export function formatToolRequestCompact(name: string, parameters: Record<string, unknown>): string {
  const fmtVal = (v: unknown): string => {
    if (v === null) return 'null';
    if (v === undefined) return 'undefined';
    if (typeof v === 'string') {
      const s = v.replace(/[\r\n]+/g, ' ').trim();
      return s.length > 160 ? `${s.slice(0, 160)}…` : s;
    }
    if (typeof v === 'number' || typeof v === 'bigint') return v.toString();
    if (typeof v === 'boolean') return v ? 'true' : 'false';
    if (Array.isArray(v)) return `[${String(v.length)}]`;
    return '{…}';
  };
  const entries = Object.entries(parameters);
  const paramStr = entries.length > 0
    ? '(' + entries.map(([k, v]) => `${k}:${fmtVal(v)}`).join(', ') + ')'
    : '()';
  return `${name}${paramStr}`;
}

export function truncatePreview(text: string, max = 200): string {
  const flat = text.replace(/[\r\n]+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

// Compact local timestamp used in generated file names: YYYYMMDD_HHMMSS
export function formatFileTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

export function getWarningSink(): ((message: string) => void) | undefined {
  return warningSink;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    // a failing sink must not break the caller
  }
}
