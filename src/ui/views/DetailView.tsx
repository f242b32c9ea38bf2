/**
 * DetailView - metadata, episodes and streams of one entry.
 *
 * Series open on the episode pane; choosing an episode looks up its streams
 * and switches to the stream pane. Movies go straight to the stream pane.
 * Changing episode aborts the previous lookup and discards its results.
 *
 * @module ui/views/DetailView
 */

import React, { useState, useCallback, useEffect, useMemo } from 'react';
import { Box, Text } from 'ink';
import { colors, borders } from '../theme/index.js';
import { useKeyboard } from '../hooks/useKeyboard.js';
import { useSelection } from '../hooks/useSelection.js';
import { useMetadata } from '../hooks/useMetadata.js';
import { useStreamLookup } from '../hooks/useStreamLookup.js';
import { EntryDetails } from '../components/EntryDetails.js';
import { SeasonTabs, seasonTabs, adjacentTab, type SeasonTab } from '../components/SeasonTabs.js';
import { EpisodeList } from '../components/EpisodeList.js';
import { StreamList } from '../components/StreamList.js';
import { formatEpisodeCode } from '../utils/format.js';
import type { MetadataResolver, StreamSource } from '../../core/catalog/index.js';
import {
  ContentType,
  type Entry,
  type Episode,
  type Seasons,
  type Stream,
} from '../../core/types.js';

type Pane = 'episodes' | 'streams';

export interface DetailViewProps {
  entry: Entry;
  resolver: MetadataResolver;
  streams: StreamSource;
  /** Starts playback; `label` names what is being played */
  onPlay: (stream: Stream, label: string) => void;
  onBack: () => void;
  onQuit: () => void;
  width?: number;
  height?: number;
  keyboardEnabled?: boolean;
}

/**
 * Episodes behind a season tab.
 */
export function episodesOf(seasons: Seasons, tab: SeasonTab | undefined): Episode[] {
  if (!tab) return [];
  if (tab.season === null) return seasons.specials;
  return seasons.numbered[tab.season] ?? [];
}

/**
 * Tab a series opens on: season 1 when listed, else the first one.
 */
export function initialTabIndex(tabs: SeasonTab[]): number {
  if (tabs.length === 0) return -1;
  const first = tabs.findIndex((tab) => tab.season === 1);
  return first === -1 ? 0 : first;
}

const EMPTY_SEASONS: Seasons = { numbered: [], specials: [] };

export const DetailView: React.FC<DetailViewProps> = ({
  entry,
  resolver,
  streams: source,
  onPlay,
  onBack,
  onQuit,
  width = 80,
  height = 20,
  keyboardEnabled = true,
}) => {
  const { metadata, loading, error } = useMetadata(resolver, entry);
  const lookup = useStreamLookup(source);
  const [pane, setPane] = useState<Pane>(entry.type === ContentType.SERIES ? 'episodes' : 'streams');
  const [tabIndex, setTabIndex] = useState(-1);
  const [playingLabel, setPlayingLabel] = useState(entry.name);

  const seasons = metadata?.type === ContentType.SERIES ? metadata.seasons : EMPTY_SEASONS;
  const tabs = useMemo(() => seasonTabs(seasons), [seasons]);
  const episodes = episodesOf(seasons, tabs[tabIndex]);

  const episodeSelection = useSelection(episodes);
  const streamSelection = useSelection(lookup.streams);

  const { request } = lookup;

  // Movies look their streams up as soon as the metadata is in
  useEffect(() => {
    if (metadata?.type === ContentType.MOVIE) {
      request({ type: ContentType.MOVIE, id: metadata.id });
    }
  }, [metadata, request]);

  useEffect(() => {
    setTabIndex(initialTabIndex(tabs));
  }, [tabs]);

  const changeSeason = useCallback(
    (direction: 1 | -1) => {
      setTabIndex((current) => adjacentTab(tabs.length, current, direction));
      episodeSelection.selectByIndex(0);
    },
    [tabs.length, episodeSelection]
  );

  const chooseEpisode = useCallback(() => {
    const episode = episodeSelection.selected;
    if (!metadata || !episode) return;
    request({
      type: ContentType.SERIES,
      id: metadata.id,
      season: episode.season,
      episode: episode.episode,
    });
    setPlayingLabel(`${metadata.name} ${formatEpisodeCode(episode.season, episode.episode)}`);
    streamSelection.selectByIndex(0);
    setPane('streams');
  }, [metadata, episodeSelection.selected, request, streamSelection]);

  const chooseStream = useCallback(() => {
    if (streamSelection.selected) {
      onPlay(streamSelection.selected, playingLabel);
    }
  }, [streamSelection.selected, onPlay, playingLabel]);

  const back = useCallback(() => {
    if (entry.type === ContentType.SERIES && pane === 'streams') {
      lookup.cancel();
      setPane('episodes');
    } else {
      onBack();
    }
  }, [entry.type, pane, lookup, onBack]);

  const onEpisodes = pane === 'episodes';
  const up = onEpisodes ? episodeSelection.selectPrev : streamSelection.selectPrev;
  const down = onEpisodes ? episodeSelection.selectNext : streamSelection.selectNext;
  const enter = onEpisodes ? chooseEpisode : chooseStream;

  useKeyboard({
    handlers: {
      up,
      k: up,
      down,
      j: down,
      left: onEpisodes ? () => changeSeason(-1) : undefined,
      h: onEpisodes ? () => changeSeason(-1) : undefined,
      right: onEpisodes ? () => changeSeason(1) : undefined,
      l: onEpisodes ? () => changeSeason(1) : undefined,
      enter,
      b: back,
      escape: back,
      q: onQuit,
    },
    enabled: keyboardEnabled,
  });

  if (loading) {
    return (
      <Box paddingX={1}>
        <Text color={colors.muted}>Loading {entry.name}…</Text>
      </Box>
    );
  }

  if (error || !metadata) {
    return (
      <Box paddingX={1} flexDirection="column">
        <Text color={colors.error}>{error ?? `No details for ${entry.name}`}</Text>
        <Text color={colors.muted}>Press b to go back</Text>
      </Box>
    );
  }

  const overview = onEpisodes ? episodeSelection.selected?.overview : undefined;
  const listHeight = Math.max(3, height - 10);

  return (
    <Box flexDirection="column">
      <EntryDetails
        metadata={overview ? { ...metadata, summary: overview } : metadata}
        width={width}
      />
      <Box paddingX={1}>
        <Text color={colors.borderDim}>{borders.horizontal.repeat(Math.max(0, width - 2))}</Text>
      </Box>

      {onEpisodes ? (
        <Box flexDirection="column">
          <SeasonTabs tabs={tabs} activeIndex={tabIndex} />
          <EpisodeList
            episodes={episodes}
            selectedIndex={episodeSelection.selectedIndex}
            height={listHeight}
            width={width}
            focused
          />
        </Box>
      ) : (
        <Box flexDirection="column">
          <Box paddingX={1}>
            <Text color={colors.primary} bold>
              Streams for {playingLabel}
            </Text>
          </Box>
          <StreamList
            streams={lookup.streams}
            selectedIndex={streamSelection.selectedIndex}
            loading={lookup.loading}
            failedProviders={lookup.failures.length}
            height={listHeight}
            width={width}
            focused
          />
        </Box>
      )}
    </Box>
  );
};

export default DetailView;
