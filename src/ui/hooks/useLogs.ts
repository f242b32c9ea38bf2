import { useState, useEffect } from 'react';
import { getRecentLogs, subscribeToLogs, type LogEntry } from '../../utils/logger.js';
import type { LogLevel } from '../../core/types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Keeps the entries at or above `minLevel`, newest last, at most `limit`.
 */
export function filterLogs(entries: readonly LogEntry[], minLevel: LogLevel, limit: number): LogEntry[] {
  const kept = entries.filter((entry) => LEVEL_ORDER[entry.level] >= LEVEL_ORDER[minLevel]);
  return limit > 0 ? kept.slice(-limit) : [];
}

/**
 * Live view of the in-memory log ring.
 */
export function useLogs(minLevel: LogLevel = 'info', limit = 50): LogEntry[] {
  const [entries, setEntries] = useState<LogEntry[]>(() => getRecentLogs());

  useEffect(() => {
    setEntries(getRecentLogs());
    return subscribeToLogs(() => {
      setEntries(getRecentLogs());
    });
  }, []);

  return filterLogs(entries, minLevel, limit);
}

export default useLogs;
