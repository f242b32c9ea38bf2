import { describe, it, expect } from 'vitest';
import { filterLogs } from '../../../src/ui/hooks/useLogs.js';
import type { LogEntry } from '../../../src/utils/logger.js';

function entry(level: LogEntry['level'], message: string): LogEntry {
  return { timestamp: new Date(0), level, scope: 'test', message };
}

describe('filterLogs', () => {
  const entries = [
    entry('debug', 'd1'),
    entry('info', 'i1'),
    entry('warn', 'w1'),
    entry('error', 'e1'),
    entry('info', 'i2'),
  ];

  it('should drop entries below the minimum level', () => {
    expect(filterLogs(entries, 'warn', 10).map((e) => e.message)).toEqual(['w1', 'e1']);
  });

  it('should keep the newest entries up to the limit', () => {
    expect(filterLogs(entries, 'info', 2).map((e) => e.message)).toEqual(['e1', 'i2']);
  });

  it('should return nothing for a zero limit', () => {
    expect(filterLogs(entries, 'debug', 0)).toEqual([]);
  });
});
