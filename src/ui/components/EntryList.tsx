import React from 'react';
import { Box, Text } from 'ink';
import { colors, symbols } from '../theme/index.js';
import { truncateText } from '../utils/format.js';
import { listWindow } from '../utils/window.js';
import { ContentType, type Entry } from '../../core/types.js';

export interface EntryListProps {
  /** Entries grouped by content type, see groupByType */
  entries: Entry[];
  selectedIndex: number;
  /** Rows available for entries */
  height?: number;
  width?: number;
  /** Whether the list owns the keyboard */
  focused?: boolean;
  /** Text shown when there are no entries */
  emptyText?: string;
}

const SECTION_TITLES: Record<ContentType, string> = {
  [ContentType.MOVIE]: 'Movies',
  [ContentType.SERIES]: 'Series',
};

/**
 * Orders entries by content type, keeping arrival order inside each type.
 *
 * @example
 * groupByType([series1, movie1, series2], [ContentType.MOVIE, ContentType.SERIES])
 * // [movie1, series1, series2]
 */
export function groupByType(entries: readonly Entry[], order: readonly ContentType[]): Entry[] {
  const rank = (type: ContentType) => {
    const index = order.indexOf(type);
    return index === -1 ? order.length : index;
  };
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => rank(a.entry.type) - rank(b.entry.type) || a.index - b.index)
    .map(({ entry }) => entry);
}

/**
 * Search results, one section per content type.
 */
export const EntryList: React.FC<EntryListProps> = ({
  entries,
  selectedIndex,
  height = 10,
  width = 80,
  focused = true,
  emptyText = 'Press / to search',
}) => {
  if (entries.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>{emptyText}</Text>
      </Box>
    );
  }

  const { start, end } = listWindow(entries.length, selectedIndex, height);
  const nameWidth = Math.max(10, width - 6);

  return (
    <Box flexDirection="column">
      {entries.slice(start, end).map((entry, offset) => {
        const index = start + offset;
        const isSelected = index === selectedIndex;
        const startsSection = index === 0 || entries[index - 1].type !== entry.type;
        return (
          <Box key={`${entry.type}:${entry.id}:${index}`} flexDirection="column">
            {(startsSection || offset === 0) && (
              <Box paddingX={1}>
                <Text color={colors.secondary} bold>
                  {SECTION_TITLES[entry.type]}
                </Text>
              </Box>
            )}
            <Box paddingX={1}>
              <Text color={colors.primary}>{isSelected && focused ? `${symbols.selected} ` : '  '}</Text>
              <Text color={isSelected ? colors.highlight : colors.text} bold={isSelected}>
                {truncateText(entry.name, nameWidth)}
              </Text>
            </Box>
          </Box>
        );
      })}
      {entries.length > height && (
        <Box paddingX={1}>
          <Text color={colors.dim}>
            {selectedIndex + 1}/{entries.length}
          </Text>
        </Box>
      )}
    </Box>
  );
};

export default EntryList;
