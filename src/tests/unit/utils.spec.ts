import { afterEach, describe, expect, it } from 'vitest';

import { formatFileTimestamp, formatToolRequestCompact, parseJsonRecord, setWarningSink, truncatePreview, warn } from '../../utils.js';

afterEach(() => {
  setWarningSink(undefined);
});

describe('parseJsonRecord', () => {
  it('accepts objects and JSON text', () => {
    expect(parseJsonRecord({ a: 1 })).toEqual({ a: 1 });
    expect(parseJsonRecord('{"path": "a.ts"}')).toEqual({ path: 'a.ts' });
    expect(parseJsonRecord('   ')).toEqual({});
  });

  it('strips a code fence', () => {
    expect(parseJsonRecord('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('repairs common mistakes', () => {
    expect(parseJsonRecord("{'command': 'ls'}")).toEqual({ command: 'ls' });
    expect(parseJsonRecord('{"command": "ls"')).toEqual({ command: 'ls' });
  });

  it('rejects values that are not objects', () => {
    expect(parseJsonRecord('[1, 2]')).toBeUndefined();
    expect(parseJsonRecord(42)).toBeUndefined();
  });
});

describe('formatting', () => {
  it('renders a compact tool request', () => {
    expect(formatToolRequestCompact('bash', { command: 'ls\n-la', list: [1, 2], opts: { a: 1 }, force: true })).toBe(
      'bash(command:ls -la, list:[2], opts:{…}, force:true)'
    );
    expect(formatToolRequestCompact('task_done', {})).toBe('task_done()');
  });

  it('flattens and cuts previews', () => {
    expect(truncatePreview('a\nb', 10)).toBe('a b');
    expect(truncatePreview('abcdef', 3)).toBe('abc…');
  });

  it('formats file timestamps in local time', () => {
    expect(formatFileTimestamp(new Date(2024, 10, 9, 8, 7, 6))).toBe('20241109_080706');
  });
});

describe('warn', () => {
  it('routes to the sink and survives a throwing one', () => {
    const seen: string[] = [];
    setWarningSink((message) => { seen.push(message); });
    warn('careful');
    expect(seen).toEqual(['careful']);

    setWarningSink(() => { throw new Error('sink down'); });
    expect(() => { warn('again'); }).not.toThrow();
  });
});
