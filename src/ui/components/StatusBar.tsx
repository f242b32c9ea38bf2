import React from 'react';
import { Box, Text } from 'ink';
import { colors, borders, getStateColor } from '../theme/index.js';
import { formatStateLabel } from '../utils/format.js';
import type { PlaybackState } from '../../core/types.js';

export interface Shortcut {
  key: string;
  action: string;
}

export interface StatusBarProps {
  /** Shortcuts available in the current view */
  shortcuts: Shortcut[];
  /** Playback state, shown on the right while a playback is active */
  playbackState?: PlaybackState;
  /** Short message shown on the first line */
  message?: string;
  /** Whether the message reports a failure */
  isError?: boolean;
  /** Terminal width in columns */
  width?: number;
}

export const SEARCH_SHORTCUTS: Shortcut[] = [
  { key: '/', action: 'Search' },
  { key: '↑↓', action: 'Select' },
  { key: 'enter', action: 'Open' },
  { key: 'q', action: 'Quit' },
];

export const DETAIL_SHORTCUTS: Shortcut[] = [
  { key: '←→', action: 'Season' },
  { key: '↑↓', action: 'Select' },
  { key: 'tab', action: 'Focus' },
  { key: 'enter', action: 'Play' },
  { key: 'b', action: 'Back' },
  { key: 'q', action: 'Quit' },
];

export const PLAYBACK_SHORTCUTS: Shortcut[] = [
  { key: 'b', action: 'Stop' },
  { key: 'q', action: 'Quit' },
];

/**
 * StatusBar component for the Marquee TUI
 *
 * Displays a status message above the keyboard shortcuts of the current
 * view, with the playback state on the right.
 */
export const StatusBar: React.FC<StatusBarProps> = ({
  shortcuts,
  playbackState,
  message,
  isError = false,
  width = 80,
}) => {
  const innerWidth = Math.max(width - 2, 10);

  return (
    <Box flexDirection="column">
      {/* Top border */}
      <Text color={colors.border}>
        {borders.rounded.topLeft}
        {borders.horizontal.repeat(innerWidth)}
        {borders.rounded.topRight}
      </Text>

      {/* Line 1: Message */}
      <Box>
        <Text color={colors.border}>{borders.vertical}</Text>
        <Box width={innerWidth} paddingX={1}>
          <Text color={isError ? colors.error : colors.muted} wrap="truncate">
            {message ?? 'Ready'}
          </Text>
        </Box>
        <Text color={colors.border}>{borders.vertical}</Text>
      </Box>

      {/* Separator */}
      <Text color={colors.border}>
        {borders.junctions.left}
        {borders.horizontal.repeat(innerWidth)}
        {borders.junctions.right}
      </Text>

      {/* Line 2: Shortcuts and playback state */}
      <Box>
        <Text color={colors.border}>{borders.vertical}</Text>
        <Box width={innerWidth} paddingX={1} justifyContent="space-between">
          <Box>
            {shortcuts.map((s, i) => (
              <React.Fragment key={s.key}>
                {i > 0 && <Text color={colors.dim}>  </Text>}
                <Text color={colors.primary} bold>{s.key}</Text>
                <Text color={colors.muted}>:{s.action}</Text>
              </React.Fragment>
            ))}
          </Box>

          {playbackState && (
            <Box>
              <Text color={getStateColor(playbackState)}>●</Text>
              <Text color={colors.muted}> {formatStateLabel(playbackState)}</Text>
            </Box>
          )}
        </Box>
        <Text color={colors.border}>{borders.vertical}</Text>
      </Box>

      {/* Bottom border */}
      <Text color={colors.border}>
        {borders.rounded.bottomLeft}
        {borders.horizontal.repeat(innerWidth)}
        {borders.rounded.bottomRight}
      </Text>
    </Box>
  );
};

export default StatusBar;
