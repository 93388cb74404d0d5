import type { LogEntry } from '../types.js';

/** A {@link LogEntry} resolved into the fields every formatter renders. */
export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction?: LogEntry['direction'];
  step: number;
  agentId?: string;
  remoteIdentifier?: string;
  provider?: string;
  model?: string;
  tool?: string;
  component?: string;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  THK: 6,
  TRC: 7,
};

const FIELD_NAMES = new Set(['severity', 'type', 'direction', 'step', 'remote', 'tool', 'component', 'agent', 'provider', 'model']);

function labelValue(value: string | number | boolean): string | undefined {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  return String(value);
}

// Static labels win over per-entry details; keys that shadow a field are dropped.
function collectLabels(entry: LogEntry, staticLabels: Record<string, string>): Record<string, string> {
  const labels: Record<string, string> = {};
  const sources: [string, string | number | boolean][] = [
    ...Object.entries(staticLabels),
    ...Object.entries(entry.details ?? {}),
  ];
  sources.forEach(([key, raw]) => {
    if (FIELD_NAMES.has(key) || key in labels) return;
    const value = labelValue(raw);
    if (value !== undefined) labels[key] = value;
  });
  return labels;
}

/**
 * Remote identifiers are `provider:model` for llm entries, `tool:name` for
 * tools and `agent:component` for engine entries.
 */
function splitRemote(entry: LogEntry): Pick<StructuredLogEvent, 'provider' | 'model' | 'tool' | 'component'> {
  const [head, ...rest] = entry.remoteIdentifier.split(':');
  const tail = rest.length > 0 ? rest.join(':') : undefined;
  const name = tail ?? (head.length > 0 ? head : undefined);
  switch (entry.type) {
    case 'llm':
      return { provider: head.length > 0 ? head : undefined, model: tail };
    case 'tool':
      return { tool: name };
    case 'agent':
      return { component: name };
  }
}

export function buildStructuredLogEvent(entry: LogEntry, options: { labels?: Record<string, string> } = {}): StructuredLogEvent {
  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    step: entry.step,
    agentId: entry.agentId,
    remoteIdentifier: entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined,
    ...splitRemote(entry),
    labels: collectLabels(entry, options.labels ?? {}),
    stack: entry.stack,
  };
}
