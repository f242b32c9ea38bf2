/**
 * App - Root component for the Marquee TUI.
 *
 * This is the application shell that manages:
 * - View routing (SearchView, DetailView, PlaybackView)
 * - The catalog search, kept across views so results survive going back
 * - The playback hook bound to the shared controller
 * - The activity log strip and status bar
 *
 * @module ui/App
 */

import React, { useState, useCallback, useMemo } from 'react';
import { Box, useApp } from 'ink';
import { useCatalogSearch } from './hooks/useCatalogSearch.js';
import { usePlayback } from './hooks/usePlayback.js';
import { useLogs } from './hooks/useLogs.js';
import { useTerminalSize, visibleRows } from './hooks/useTerminalSize.js';
import { SearchView } from './views/SearchView.js';
import { DetailView } from './views/DetailView.js';
import { PlaybackView } from './views/PlaybackView.js';
import { Header } from './components/Header.js';
import { LogView } from './components/LogView.js';
import {
  StatusBar,
  SEARCH_SHORTCUTS,
  DETAIL_SHORTCUTS,
  PLAYBACK_SHORTCUTS,
} from './components/StatusBar.js';
import type { Services } from '../app/services.js';
import type { Entry, Stream } from '../core/types.js';

/**
 * Route of the application.
 */
export type Route =
  | { view: 'search' }
  | { view: 'detail'; entry: Entry }
  | { view: 'playback'; entry: Entry; stream: Stream; label: string };

export interface AppProps {
  services: Services;
  version?: string;
  /** Rows of log shown under the current view (default: 4) */
  logRows?: number;
}

/** Rows taken by header, status bar and log strip chrome */
const CHROME_ROWS = 12;

/**
 * App component - Root of the Marquee TUI
 *
 * Keyboard shortcuts are owned by the active view; every view quits on q.
 * Quitting aborts a running playback; Services.close() waits for its
 * cleanup before it stops the engine.
 *
 * @example
 * ```tsx
 * import { render } from 'ink';
 * import { App } from './ui/App.js';
 *
 * const { waitUntilExit } = render(<App services={services} />);
 * await waitUntilExit();
 * await services.close();
 * ```
 */
export const App: React.FC<AppProps> = ({ services, version, logRows = 4 }) => {
  const { exit } = useApp();
  const size = useTerminalSize();

  const [route, setRoute] = useState<Route>({ view: 'search' });
  const search = useCatalogSearch(services.catalog);
  const controller = useMemo(
    () => (services.hasPlayback ? services.playback : null),
    [services]
  );
  const playback = usePlayback(controller);
  const logs = useLogs('info', logRows);

  const quit = useCallback(() => {
    playback.abort();
    exit();
  }, [playback, exit]);

  const openEntry = useCallback((entry: Entry) => {
    setRoute({ view: 'detail', entry });
  }, []);

  const backToSearch = useCallback(() => {
    setRoute({ view: 'search' });
  }, []);

  const play = useCallback(
    (entry: Entry, stream: Stream, label: string) => {
      if (!controller) {
        return;
      }
      setRoute({ view: 'playback', entry, stream, label });
      playback.start(stream);
    },
    [controller, playback]
  );

  const bodyRows = visibleRows(size, CHROME_ROWS + logRows);

  const renderView = () => {
    switch (route.view) {
      case 'search':
        return (
          <SearchView
            search={search}
            contentTypes={services.config.contentTypes}
            onOpen={openEntry}
            onQuit={quit}
            width={size.columns}
            height={bodyRows}
          />
        );
      case 'detail':
        return (
          <DetailView
            key={`${route.entry.type}:${route.entry.id}`}
            entry={route.entry}
            resolver={services.metadata}
            streams={services.streams}
            onPlay={(stream, label) => play(route.entry, stream, label)}
            onBack={backToSearch}
            onQuit={quit}
            width={size.columns}
            height={bodyRows}
          />
        );
      case 'playback':
        return (
          <PlaybackView
            playback={playback}
            stream={route.stream}
            label={route.label}
            onBack={() => setRoute({ view: 'detail', entry: route.entry })}
            onQuit={quit}
            width={size.columns}
          />
        );
    }
  };

  const shortcuts =
    route.view === 'search'
      ? SEARCH_SHORTCUTS
      : route.view === 'detail'
        ? DETAIL_SHORTCUTS
        : PLAYBACK_SHORTCUTS;

  const location =
    route.view === 'search'
      ? search.query.trim() || undefined
      : route.view === 'detail'
        ? route.entry.name
        : route.label;

  const lastLog = logs[logs.length - 1];
  const message = !controller
    ? 'Playback unavailable: torrent engine not started'
    : lastLog?.message;

  return (
    <Box flexDirection="column" width={size.columns}>
      <Header version={version} location={location} />
      <Box flexDirection="column" flexGrow={1}>
        {renderView()}
      </Box>
      <Box marginTop={1}>
        <LogView logs={logs} maxEntries={logRows} messageWidth={Math.max(20, size.columns - 30)} />
      </Box>
      <StatusBar
        shortcuts={shortcuts}
        playbackState={playback.active ? playback.state : undefined}
        message={message}
        isError={!controller || lastLog?.level === 'error'}
        width={size.columns}
      />
    </Box>
  );
};

export default App;
