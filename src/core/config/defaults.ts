/**
 * Default configuration values for Marquee.
 *
 * @module core/config/defaults
 */

import { join } from 'path';
import { ContentType } from '../types.js';
import type { AppConfig, PartialAppConfig } from '../types.js';
import { getDefaultDataDir } from '../../utils/platform.js';

/** 50 MiB: enough sequential data for a player to start smoothly */
export const DEFAULT_BUFFER_THRESHOLD = 50 * 1024 * 1024;

/**
 * Default application configuration.
 *
 * - State kept in ~/.marquee
 * - Cinemeta for catalog and metadata, Torrentio as the single stream provider
 * - mpv as the player, kept open at end of stream
 */
export const DEFAULT_CONFIG: AppConfig = {
  dataDir: getDefaultDataDir(),

  catalogUrl: 'https://v3-cinemeta.strem.io',

  metaUrl: 'https://v3-cinemeta.strem.io',

  contentTypes: [ContentType.SERIES, ContentType.MOVIE],

  streamProviders: ['https://torrentio.strem.fun'],

  trackerListUrl:
    'https://cdn.jsdelivr.net/gh/ngosang/trackerslist@master/trackers_best.txt',

  dhtBootstrapNodes: [
    'dht.libtorrent.org:25401',
    'dht.transmissionbt.com:6881',
    'router.bittorrent.com:6881',
    'router.utorrent.com:6881',
    'dht.aelitis.com:6881',
    'router.bt.ouinet.work:6881',
  ],

  http: {
    /** Catalog hosts can be slow on cold caches */
    timeout: 30000,
    userAgent: 'Marquee/0.1',
  },

  playback: {
    bufferThreshold: DEFAULT_BUFFER_THRESHOLD,
    pollInterval: 1000,
    deleteDataOnCleanup: true,
  },

  player: {
    command: 'mpv',
    args: ['--keep-open'],
  },

  logging: {
    level: 'info',
  },
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(partialConfig?: PartialAppConfig): AppConfig {
  const partial = partialConfig ?? {};

  return {
    ...DEFAULT_CONFIG,
    ...partial,
    contentTypes: [...(partial.contentTypes ?? DEFAULT_CONFIG.contentTypes)],
    streamProviders: [
      ...(partial.streamProviders ?? DEFAULT_CONFIG.streamProviders),
    ],
    dhtBootstrapNodes: [
      ...(partial.dhtBootstrapNodes ?? DEFAULT_CONFIG.dhtBootstrapNodes),
    ],
    http: { ...DEFAULT_CONFIG.http, ...partial.http },
    playback: { ...DEFAULT_CONFIG.playback, ...partial.playback },
    player: {
      ...DEFAULT_CONFIG.player,
      ...partial.player,
      args: [...(partial.player?.args ?? DEFAULT_CONFIG.player.args)],
    },
    logging: { ...DEFAULT_CONFIG.logging, ...partial.logging },
  };
}

/**
 * Locations of every file Marquee keeps in its data directory
 */
export interface DataPaths {
  configFile: string;
  trackerCache: string;
  session: string;
  logFile: string;
  downloads: string;
}

/**
 * Resolves the file layout of a configuration's data directory.
 */
export function getDataPaths(config: AppConfig): DataPaths {
  return {
    configFile: join(config.dataDir, 'config.json'),
    trackerCache: join(config.dataDir, 'tracker_cache'),
    session: join(config.dataDir, 'session.dat'),
    logFile: config.logging.file ?? join(config.dataDir, 'marquee.log'),
    downloads: join(config.dataDir, 'downloads'),
  };
}
