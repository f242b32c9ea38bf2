import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { plain } from '../../helpers/frame.js';
import { EpisodeList } from '../../../src/ui/components/EpisodeList.js';
import type { Episode } from '../../../src/core/types.js';

const episodes: Episode[] = [
  {
    coordinate: '1:1',
    season: 1,
    episode: 1,
    name: 'Pilot',
    overview: '',
    releaseDate: new Date('2008-01-20T00:00:00.000Z'),
  },
  { coordinate: '1:2', season: 1, episode: 2, name: 'Second Step', overview: '' },
];

describe('EpisodeList', () => {
  it('should render code, name and release date', () => {
    const { lastFrame } = render(<EpisodeList episodes={episodes} selectedIndex={0} width={80} />);
    const frame = plain(lastFrame());

    expect(frame).toContain('S01E01');
    expect(frame).toContain('Pilot');
    expect(frame).toContain('2008-01-20');
    expect(frame).toContain('S01E02');
    expect(frame).toContain('--');
  });

  it('should mark the selection only when focused', () => {
    const focused = render(<EpisodeList episodes={episodes} selectedIndex={1} focused />);
    expect(plain(focused.lastFrame())).toContain('▶ S01E02');

    const unfocused = render(<EpisodeList episodes={episodes} selectedIndex={1} />);
    expect(plain(unfocused.lastFrame())).not.toContain('▶');
  });

  it('should say so for an empty season', () => {
    const { lastFrame } = render(<EpisodeList episodes={[]} selectedIndex={-1} />);
    expect(plain(lastFrame())).toContain('No episodes in this season');
  });
});
