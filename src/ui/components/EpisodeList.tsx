import React from 'react';
import { Box, Text } from 'ink';
import { colors, symbols } from '../theme/index.js';
import { formatDate, formatEpisodeCode, truncateText } from '../utils/format.js';
import { listWindow } from '../utils/window.js';
import type { Episode } from '../../core/types.js';

export interface EpisodeListProps {
  episodes: Episode[];
  selectedIndex: number;
  height?: number;
  width?: number;
  focused?: boolean;
}

/**
 * Episodes of the active season with code, name and air date.
 *
 * @example
 * // ▶ S01E01  Pilot                               2008-01-20
 * //   S01E02  Cat's in the Bag...                 2008-01-27
 */
export const EpisodeList: React.FC<EpisodeListProps> = ({
  episodes,
  selectedIndex,
  height = 8,
  width = 80,
  focused = false,
}) => {
  if (episodes.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>No episodes in this season</Text>
      </Box>
    );
  }

  const { start, end } = listWindow(episodes.length, selectedIndex, height);
  const nameWidth = Math.max(10, width - 26);

  return (
    <Box flexDirection="column">
      {episodes.slice(start, end).map((episode, offset) => {
        const index = start + offset;
        const isSelected = index === selectedIndex;
        return (
          <Box key={episode.coordinate} paddingX={1}>
            <Text color={colors.primary}>{isSelected && focused ? `${symbols.selected} ` : '  '}</Text>
            <Text color={colors.secondary}>{formatEpisodeCode(episode.season, episode.episode)}</Text>
            <Text>  </Text>
            <Box width={nameWidth}>
              <Text color={isSelected ? colors.highlight : colors.text} bold={isSelected} wrap="truncate">
                {truncateText(episode.name, nameWidth)}
              </Text>
            </Box>
            <Text color={colors.dim}>{formatDate(episode.releaseDate)}</Text>
          </Box>
        );
      })}
    </Box>
  );
};

export default EpisodeList;
