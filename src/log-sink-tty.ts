import type { LogEntry } from './types.js';

import { createStructuredLogger, isLogFormat, writeStderr, type LogFormat } from './logging/structured-logger.js';

export interface LogCallbacks {
  onLog: (entry: LogEntry) => void;
}

export interface TTYLogOptions {
  color?: boolean;
  verbose?: boolean;
  explicitFormat?: string;
  labels?: Record<string, string>;
}

function pickFormat(explicit: string | undefined): LogFormat {
  if (explicit === undefined || explicit.length === 0) {
    return process.stderr.isTTY ? 'console' : 'logfmt';
  }
  if (!isLogFormat(explicit)) throw new Error(`unknown log format '${explicit}'`);
  return explicit;
}

/** Log callback for the CLI: console lines on a terminal, logfmt otherwise. */
export function makeTTYLogCallbacks(opts: TTYLogOptions, write: (line: string) => void = writeStderr): LogCallbacks {
  const verbose = opts.verbose === true;
  const logger = createStructuredLogger({
    format: pickFormat(opts.explicitFormat),
    color: opts.color ?? process.stderr.isTTY,
    verbose,
    writer: write,
    labels: opts.labels,
  });
  const shown = (entry: LogEntry): boolean => {
    switch (entry.severity) {
      case 'VRB':
      case 'THK':
      case 'TRC':
        return verbose;
      default:
        return true;
    }
  };

  return {
    onLog: (entry: LogEntry) => {
      if (shown(entry)) logger.emit(entry);
    },
  };
}
