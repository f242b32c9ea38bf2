import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme/index.js';
import { formatSeasonLabel } from '../utils/format.js';
import type { Seasons } from '../../core/types.js';

/**
 * A selectable season bucket; `season` is null for specials
 */
export interface SeasonTab {
  season: number | null;
  label: string;
  episodeCount: number;
}

export interface SeasonTabsProps {
  tabs: SeasonTab[];
  /** Index of the active tab */
  activeIndex: number;
}

/**
 * Builds the tab row of a series.
 *
 * Numbered seasons come first in order, empty ones included, followed by a
 * Specials tab when there are any specials. Season 0 is only listed when it
 * has episodes.
 *
 * @example
 * seasonTabs({ numbered: [[], [e1], [], [e3]], specials: [] })
 * // Season 1, Season 2, Season 3
 */
export function seasonTabs(seasons: Seasons): SeasonTab[] {
  const tabs: SeasonTab[] = [];
  seasons.numbered.forEach((episodes, season) => {
    if (season === 0 && episodes.length === 0) {
      return;
    }
    tabs.push({ season, label: formatSeasonLabel(season), episodeCount: episodes.length });
  });
  if (seasons.specials.length > 0) {
    tabs.push({
      season: null,
      label: formatSeasonLabel(null),
      episodeCount: seasons.specials.length,
    });
  }
  return tabs;
}

/**
 * Index of the tab `direction` steps away, wrapping around.
 */
export function adjacentTab(count: number, current: number, direction: 1 | -1): number {
  if (count === 0) return -1;
  return (current + direction + count) % count;
}

/**
 * Horizontal season navigation
 *
 * Keyboard navigation is handled by the parent view.
 *
 * @example
 * <SeasonTabs tabs={seasonTabs(meta.seasons)} activeIndex={0} />
 *
 * // Output:
 * // [Season 1 (7)]  Season 2 (13)  Specials (3)
 */
export const SeasonTabs: React.FC<SeasonTabsProps> = ({ tabs, activeIndex }) => {
  if (tabs.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>No episodes listed</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="row" paddingX={1} flexWrap="wrap">
      {tabs.map((tab, index) => {
        const text = `${tab.label} (${tab.episodeCount})`;
        return (
          <Box key={tab.label} marginRight={2}>
            {index === activeIndex ? (
              <Text>
                <Text color={colors.muted}>[</Text>
                <Text color={colors.primary} bold>{text}</Text>
                <Text color={colors.muted}>]</Text>
              </Text>
            ) : (
              <Text color={tab.episodeCount === 0 ? colors.dim : colors.muted}>{text}</Text>
            )}
          </Box>
        );
      })}
    </Box>
  );
};

export default SeasonTabs;
