import type { StructuredLogEvent } from './structured-log-event.js';

// Fixed fields in output order; labels follow, then the message.
const FIELDS: readonly [string, (event: StructuredLogEvent) => string | undefined][] = [
  ['ts', (event) => event.isoTimestamp],
  ['level', (event) => event.severity.toLowerCase()],
  ['priority', (event) => String(event.priority)],
  ['type', (event) => event.type],
  ['direction', (event) => event.direction],
  ['step', (event) => String(event.step)],
  ['remote', (event) => event.remoteIdentifier],
  ['agent', (event) => event.agentId],
  ['provider', (event) => event.provider],
  ['model', (event) => event.model],
  ['tool', (event) => event.tool],
  ['component', (event) => event.component],
];

const SEVERITY_COLOR: Partial<Record<StructuredLogEvent['severity'], string>> = {
  ERR: '\u001B[31m',
  WRN: '\u001B[33m',
  FIN: '\u001B[36m',
  VRB: '\u001B[90m',
  THK: '\u001B[90m',
  TRC: '\u001B[90m',
};

export function encodeLogfmtValue(value: string): string {
  if (value.length === 0) return '""';
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return /[\s="]/.test(value) ? `"${escaped}"` : escaped;
}

export function formatLogfmt(event: StructuredLogEvent, options: { color?: boolean } = {}): string {
  const pairs = new Map<string, string>();
  const add = (key: string, value: string | undefined): void => {
    if (value !== undefined && value.length > 0 && !pairs.has(key)) pairs.set(key, value);
  };

  FIELDS.forEach(([key, read]) => { add(key, read(event)); });
  Object.entries(event.labels).forEach(([key, value]) => { add(key, value); });
  add('message', event.message);

  const line = [...pairs].map(([key, value]) => `${key}=${encodeLogfmtValue(value)}`).join(' ');
  const color = options.color === true ? SEVERITY_COLOR[event.severity] : undefined;
  return color !== undefined ? `${color}${line}\u001B[0m` : line;
}
