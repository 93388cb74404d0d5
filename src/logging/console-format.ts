import type { StructuredLogEvent } from './structured-log-event.js';

// Compact single-line rendering for interactive terminals:
//   WRN 3 ← tool bash [12ms, 40 chars] failed: exit 1

const RESET = '\u001B[0m';

const LINE_COLOR: Partial<Record<StructuredLogEvent['severity'], string>> = {
  ERR: '\u001B[31m',
  WRN: '\u001B[33m',
};

const CONTEXT_COLOR: Record<StructuredLogEvent['type'], string> = {
  llm: '\u001B[34m',
  tool: '\u001B[32m',
  agent: '\u001B[36m',
};

const ARROWS = { request: '→', response: '←' } as const;

export interface ConsoleFormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const numberLabel = (event: StructuredLogEvent, key: string): number | undefined => {
  const raw = event.labels[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

const bracketed = (head: string, parts: string[]): string => (parts.length > 0 ? `${head} [${parts.join(', ')}]` : head);

function contextOf(event: StructuredLogEvent): string | undefined {
  const latency = numberLabel(event, 'latency_ms');
  const timing = latency !== undefined ? [`${String(latency)}ms`] : [];

  switch (event.type) {
    case 'llm': {
      if (event.model === undefined) return event.provider;
      const parts = [...timing];
      const input = numberLabel(event, 'input_tokens');
      const output = numberLabel(event, 'output_tokens');
      if (input !== undefined || output !== undefined) parts.push(`in ${String(input ?? 0)}/out ${String(output ?? 0)} tokens`);
      if (event.labels.finish_reason !== undefined) parts.push(`stop=${event.labels.finish_reason}`);
      return bracketed(`${event.provider ?? '?'}/${event.model}`, parts);
    }
    case 'tool': {
      if (event.tool === undefined) return undefined;
      const preview = event.labels.request_preview;
      if (event.direction === 'request' && preview !== undefined) return preview;
      const chars = numberLabel(event, 'result_chars');
      return bracketed(event.tool, chars !== undefined ? [...timing, `${String(chars)} chars`] : timing);
    }
    case 'agent': {
      const saved = numberLabel(event, 'tokens_saved');
      if (event.component === 'compression' && saved !== undefined) return bracketed('compression', [`saved ${String(saved)} tokens`]);
      return undefined;
    }
  }
}

export function formatConsole(event: StructuredLogEvent, options: ConsoleFormatOptions = {}): string {
  const color = options.color === true;
  const arrow = event.direction !== undefined ? ARROWS[event.direction] : '·';
  const who = event.agentId ?? event.component ?? 'engine';
  const lineColor = color ? LINE_COLOR[event.severity] : undefined;

  let line = `${event.severity} ${String(event.step)} ${arrow} ${event.type} ${who}: `;
  const context = contextOf(event);
  if (context !== undefined) {
    line += color && lineColor === undefined ? `${CONTEXT_COLOR[event.type]}${context}${RESET}` : context;
    if (event.message.trim().length > 0) line += ' ';
  }
  line += event.message.trim();

  if ((event.severity === 'ERR' || options.verbose === true) && event.stack !== undefined && event.stack.length > 0) {
    line += `\n${event.stack.split('\n').map((frame) => `    ${frame}`).join('\n')}`;
  }
  return lineColor !== undefined ? `${lineColor}${line}${RESET}` : line;
}
