import React from 'react';
import { Box, Text } from 'ink';
import { colors, borders } from '../theme/index.js';
import { formatTimestamp, truncateText } from '../utils/format.js';
import type { LogEntry } from '../../utils/logger.js';
import type { LogLevel } from '../../core/types.js';

export interface LogViewProps {
  /** Log entries, oldest first */
  logs: LogEntry[];
  /** Maximum number of entries to show (default: 8) */
  maxEntries?: number;
  /** Width available for the message column */
  messageWidth?: number;
}

/**
 * Log level display configuration
 */
const LEVEL_DISPLAY: Record<LogLevel, { color: string; prefix: string }> = {
  debug: { color: colors.dim, prefix: 'DBG' },
  info: { color: colors.primary, prefix: 'INF' },
  warn: { color: colors.warning, prefix: 'WRN' },
  error: { color: colors.error, prefix: 'ERR' },
};

/**
 * Column widths for log display
 */
const COLUMN_WIDTHS = {
  timestamp: 10,
  level: 5,
  scope: 10,
} as const;

const LogViewHeader: React.FC<{ messageWidth: number }> = ({ messageWidth }) => {
  return (
    <Box flexDirection="column">
      <Box flexDirection="row" paddingX={1}>
        <Box width={COLUMN_WIDTHS.timestamp}>
          <Text color={colors.primary} bold>Time</Text>
        </Box>
        <Box width={COLUMN_WIDTHS.level}>
          <Text color={colors.primary} bold>Level</Text>
        </Box>
        <Box width={COLUMN_WIDTHS.scope}>
          <Text color={colors.primary} bold>Scope</Text>
        </Box>
        <Box>
          <Text color={colors.primary} bold>Message</Text>
        </Box>
      </Box>
      <Box paddingX={1}>
        <Text color={colors.muted}>
          {borders.horizontal.repeat(
            COLUMN_WIDTHS.timestamp + COLUMN_WIDTHS.level + COLUMN_WIDTHS.scope + messageWidth
          )}
        </Text>
      </Box>
    </Box>
  );
};

const LogEntryRow: React.FC<{ entry: LogEntry; messageWidth: number }> = ({
  entry,
  messageWidth,
}) => {
  const levelInfo = LEVEL_DISPLAY[entry.level];

  return (
    <Box flexDirection="row" paddingX={1}>
      <Box width={COLUMN_WIDTHS.timestamp}>
        <Text color={colors.muted}>{formatTimestamp(entry.timestamp)}</Text>
      </Box>
      <Box width={COLUMN_WIDTHS.level}>
        <Text color={levelInfo.color}>{levelInfo.prefix}</Text>
      </Box>
      <Box width={COLUMN_WIDTHS.scope}>
        <Text color={colors.dim}>{truncateText(entry.scope, COLUMN_WIDTHS.scope - 1)}</Text>
      </Box>
      <Box flexGrow={1}>
        <Text color={entry.level === 'error' ? colors.error : undefined} wrap="truncate">
          {truncateText(entry.message, messageWidth)}
        </Text>
      </Box>
    </Box>
  );
};

/**
 * LogView component for the activity log
 *
 * Newest entries first, color-coded by level.
 *
 * @example
 * <LogView logs={useLogs('info')} maxEntries={5} />
 *
 * // Output:
 * // Time      Level Scope     Message
 * // ──────────────────────────────────────────────────
 * // 14:32:45  WRN   catalog   Search failed for series
 * // 14:32:15  INF   services  Opened with 42 bootstrap trackers
 */
export const LogView: React.FC<LogViewProps> = ({ logs, maxEntries = 8, messageWidth = 50 }) => {
  if (logs.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>No activity recorded</Text>
      </Box>
    );
  }

  const displayLogs = logs.slice(-maxEntries).reverse();

  return (
    <Box flexDirection="column">
      <LogViewHeader messageWidth={messageWidth} />
      {displayLogs.map((entry, index) => (
        <LogEntryRow
          key={`${entry.timestamp.getTime()}-${index}`}
          entry={entry}
          messageWidth={messageWidth}
        />
      ))}
    </Box>
  );
};

export default LogView;
