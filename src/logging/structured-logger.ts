import type { LogEntry } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export const LOG_FORMATS: readonly LogFormat[] = ['logfmt', 'json', 'console', 'none'];

export const isLogFormat = (value: string): value is LogFormat =>
  LOG_FORMATS.some((format) => format === value);

export interface StructuredLoggerOptions {
  format?: LogFormat;
  /** Attached to every line; per-entry details never override them. */
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

type Renderer = (event: StructuredLogEvent) => string;

/** Renders engine log entries, one line each, in the configured format. */
export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly render?: Renderer;
  private readonly writer: (line: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    const color = options.color ?? false;
    const verbose = options.verbose ?? false;
    const renderers: Record<LogFormat, Renderer | undefined> = {
      logfmt: (event) => formatLogfmt(event, { color }),
      json: (event) => JSON.stringify(jsonPayload(event)),
      console: (event) => formatConsole(event, { color, verbose }),
      none: undefined,
    };
    this.labels = options.labels ?? {};
    this.render = renderers[options.format ?? 'logfmt'];
    this.writer = options.writer ?? writeStderr;
  }

  emit(entry: LogEntry): void {
    if (this.render === undefined) return;
    this.writer(`${this.render(buildStructuredLogEvent(entry, { labels: this.labels }))}\n`);
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

export function writeStderr(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed; nothing left to report to
  }
}

function jsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    ts: event.isoTimestamp,
    timestamp: event.timestamp,
    severity: event.severity,
    level: event.severity.toLowerCase(),
    priority: event.priority,
    type: event.type,
    direction: event.direction,
    step: event.step,
    agent: event.agentId,
    remote: event.remoteIdentifier,
    provider: event.provider,
    model: event.model,
    tool: event.tool,
    component: event.component,
    labels: Object.keys(event.labels).length > 0 ? event.labels : undefined,
    stack: event.stack,
    message: event.message,
  };
  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value !== undefined));
}
