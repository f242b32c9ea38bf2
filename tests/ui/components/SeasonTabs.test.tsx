import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { plain } from '../../helpers/frame.js';
import { SeasonTabs, seasonTabs, adjacentTab } from '../../../src/ui/components/SeasonTabs.js';
import type { Episode, Seasons } from '../../../src/core/types.js';

function episode(season: number, number: number): Episode {
  return {
    coordinate: `${season}:${number}`,
    season,
    episode: number,
    name: `Episode ${number}`,
    overview: '',
  };
}

describe('SeasonTabs', () => {
  describe('seasonTabs', () => {
    it('should list numbered seasons and specials', () => {
      const seasons: Seasons = {
        numbered: [[episode(0, 1)], [episode(1, 1), episode(1, 2)], [], [episode(3, 1)]],
        specials: [episode(-1, 1)],
      };

      expect(seasonTabs(seasons)).toEqual([
        { season: 0, label: 'Season 0', episodeCount: 1 },
        { season: 1, label: 'Season 1', episodeCount: 2 },
        { season: 2, label: 'Season 2', episodeCount: 0 },
        { season: 3, label: 'Season 3', episodeCount: 1 },
        { season: null, label: 'Specials', episodeCount: 1 },
      ]);
    });

    it('should leave out an empty season 0 and absent specials', () => {
      const seasons: Seasons = { numbered: [[], [episode(1, 1)]], specials: [] };

      expect(seasonTabs(seasons)).toEqual([{ season: 1, label: 'Season 1', episodeCount: 1 }]);
    });
  });

  describe('adjacentTab', () => {
    it('should wrap in both directions', () => {
      expect(adjacentTab(3, 2, 1)).toBe(0);
      expect(adjacentTab(3, 0, -1)).toBe(2);
      expect(adjacentTab(3, 1, 1)).toBe(2);
    });

    it('should return -1 without tabs', () => {
      expect(adjacentTab(0, 0, 1)).toBe(-1);
    });
  });

  describe('rendering', () => {
    it('should bracket the active tab', () => {
      const tabs = seasonTabs({ numbered: [[], [episode(1, 1)]], specials: [episode(-1, 1)] });
      const { lastFrame } = render(<SeasonTabs tabs={tabs} activeIndex={1} />);

      expect(plain(lastFrame())).toContain('Season 1 (1)');
      expect(plain(lastFrame())).toContain('[Specials (1)]');
    });

    it('should say so when there are no episodes', () => {
      const { lastFrame } = render(<SeasonTabs tabs={[]} activeIndex={-1} />);
      expect(plain(lastFrame())).toContain('No episodes listed');
    });
  });
});
