import React from 'react';
import { Box, Text } from 'ink';
import { colors, symbols } from '../theme/index.js';
import { truncateText } from '../utils/format.js';
import { listWindow } from '../utils/window.js';
import type { Stream } from '../../core/types.js';

export interface StreamListProps {
  streams: Stream[];
  selectedIndex: number;
  /** Lookup still running */
  loading?: boolean;
  /** Providers that failed */
  failedProviders?: number;
  height?: number;
  width?: number;
  focused?: boolean;
}

/**
 * First line of a provider title; titles often carry size and seeders on
 * further lines.
 */
export function streamHeadline(stream: Stream): string {
  const [first] = stream.title.split('\n');
  return first.trim() || stream.filenameHint;
}

/**
 * Candidate streams for the selected movie or episode.
 */
export const StreamList: React.FC<StreamListProps> = ({
  streams,
  selectedIndex,
  loading = false,
  failedProviders = 0,
  height = 8,
  width = 80,
  focused = false,
}) => {
  const footer = [
    loading ? 'Looking up streams…' : `${streams.length} streams`,
    failedProviders > 0 ? `${failedProviders} providers failed` : '',
  ]
    .filter((part) => part.length > 0)
    .join(` ${symbols.bullet} `);

  if (streams.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>{loading ? footer : 'No streams found'}</Text>
      </Box>
    );
  }

  const { start, end } = listWindow(streams.length, selectedIndex, height);
  const titleWidth = Math.max(10, width - 6);

  return (
    <Box flexDirection="column">
      {streams.slice(start, end).map((stream, offset) => {
        const index = start + offset;
        const isSelected = index === selectedIndex;
        return (
          <Box key={`${stream.provider}:${stream.infoHash}:${index}`} paddingX={1}>
            <Text color={colors.primary}>{isSelected && focused ? `${symbols.selected} ` : '  '}</Text>
            <Text color={isSelected ? colors.highlight : colors.text} bold={isSelected} wrap="truncate">
              {truncateText(streamHeadline(stream), titleWidth)}
            </Text>
          </Box>
        );
      })}
      <Box paddingX={1}>
        <Text color={failedProviders > 0 ? colors.warning : colors.dim}>{footer}</Text>
      </Box>
    </Box>
  );
};

export default StreamList;
