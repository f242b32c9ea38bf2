/**
 * Services - the long-lived objects one Marquee process shares.
 *
 * Built once from the configuration, opened at start-up and closed at
 * teardown. Everything that talks to the network or the torrent engine gets
 * its collaborators from here instead of creating its own.
 *
 * @module app/services
 */

import {
  CatalogAggregator,
  MetadataResolver,
  StreamAggregator,
} from '../core/catalog/index.js';
import { getDataPaths, type DataPaths } from '../core/config/index.js';
import { HttpClient } from '../core/http/client.js';
import {
  DownloadPlaybackController,
  MpvPlayer,
  systemClock,
  type Clock,
  type PlayerLauncher,
} from '../core/playback/index.js';
import { SessionStore } from '../core/session/index.js';
import { WebTorrentEngine, type TorrentEngine } from '../core/torrent/index.js';
import { TrackerCache } from '../core/trackers/index.js';
import { MarqueeError, type AppConfig } from '../core/types.js';
import { createLogger, type Logger } from '../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Collaborators that tests replace with in-process fakes
 */
export interface ServicesOptions {
  config: AppConfig;
  engine?: TorrentEngine;
  player?: PlayerLauncher;
  clock?: Clock;

  /** Today's date as YYYY-MM-DD, for the tracker cache */
  today?: () => string;

  logger?: Logger;
}

export interface OpenOptions {
  /** Start the torrent engine too (default: true) */
  engine?: boolean;
}

type ServicesState = 'created' | 'open' | 'closed';

// =============================================================================
// Services
// =============================================================================

/**
 * @example
 * ```typescript
 * const services = new Services({ config: await loadConfig() });
 * await services.open();
 *
 * for await (const result of services.catalog.search('dune')) {
 *   // ...
 * }
 *
 * await services.close();
 * ```
 */
export class Services {
  readonly config: AppConfig;
  readonly paths: DataPaths;
  readonly http: HttpClient;
  readonly engine: TorrentEngine;
  readonly player: PlayerLauncher;
  readonly sessions: SessionStore;
  readonly trackers: TrackerCache;
  readonly catalog: CatalogAggregator;
  readonly metadata: MetadataResolver;
  readonly streams: StreamAggregator;

  private readonly clock: Clock;
  private readonly logger: Logger;
  private state: ServicesState = 'created';
  private engineOpen = false;
  private controller: DownloadPlaybackController | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: ServicesOptions) {
    this.config = options.config;
    this.paths = getDataPaths(options.config);
    this.logger = options.logger ?? createLogger('services');
    this.clock = options.clock ?? systemClock;

    this.http = new HttpClient(options.config.http);
    this.engine = options.engine ?? new WebTorrentEngine();
    this.player = options.player ?? new MpvPlayer(options.config.player);
    this.sessions = new SessionStore(this.paths.session);
    this.trackers = new TrackerCache({
      http: this.http,
      url: options.config.trackerListUrl,
      cacheFile: this.paths.trackerCache,
      today: options.today,
    });
    this.catalog = new CatalogAggregator({
      http: this.http,
      catalogUrl: options.config.catalogUrl,
      contentTypes: options.config.contentTypes,
    });
    this.metadata = new MetadataResolver({
      http: this.http,
      metaUrl: options.config.metaUrl,
    });
    this.streams = new StreamAggregator({
      http: this.http,
      providers: options.config.streamProviders,
    });
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /** Whether open() started the engine and playback can be used */
  get hasPlayback(): boolean {
    return this.controller !== null;
  }

  /**
   * The playback controller; available once the engine has been opened.
   *
   * @throws {MarqueeError} If the engine was not opened
   */
  get playback(): DownloadPlaybackController {
    if (!this.controller) {
      throw new MarqueeError('Playback is not available until the engine is opened');
    }
    return this.controller;
  }

  /**
   * Opens the HTTP client and, unless told otherwise, loads the tracker list
   * and session state and starts the engine.
   *
   * @throws {StorageError} If the tracker cache or session file cannot be read
   * @throws {MarqueeError} If called after close()
   */
  async open(options: OpenOptions = {}): Promise<void> {
    if (this.state === 'closed') {
      throw new MarqueeError('Services have been closed');
    }
    if (this.state === 'open') {
      return;
    }

    this.http.open();
    this.state = 'open';

    if (options.engine === false) {
      this.logger.debug('Opened without engine');
      return;
    }

    const bootstrapTrackers = await this.trackers.getBootstrapTrackers();
    const session = await this.sessions.load();
    await this.engine.open({ state: session, dhtBootstrap: this.config.dhtBootstrapNodes });
    this.engineOpen = true;

    this.controller = new DownloadPlaybackController({
      engine: this.engine,
      player: this.player,
      baseDir: this.paths.downloads,
      bootstrapTrackers,
      bufferThreshold: this.config.playback.bufferThreshold,
      pollInterval: this.config.playback.pollInterval,
      deleteDataOnCleanup: this.config.playback.deleteDataOnCleanup,
      clock: this.clock,
    });

    this.logger.info(`Opened with ${bootstrapTrackers.length} bootstrap trackers`);
  }

  /**
   * Cancels a running playback and waits for its cleanup, then saves session
   * state, stops the engine and closes the HTTP client once its in-flight
   * requests have settled.
   *
   * Every step is attempted; the first failure is rethrown afterwards.
   * Repeated calls return the same promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.state = 'closed';
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    let failure: unknown = null;

    if (this.controller) {
      this.controller.cancel();
      await this.controller.settled();
    }

    if (this.engineOpen) {
      try {
        await this.sessions.save(this.engine.saveState());
      } catch (err) {
        this.logger.error('Failed to save session state', err);
        failure = err;
      }
      try {
        await this.engine.close();
      } catch (err) {
        this.logger.error('Failed to stop engine', err);
        failure ??= err;
      }
      this.engineOpen = false;
    }

    await this.http.close();
    this.logger.info('Closed');

    if (failure !== null) {
      throw failure;
    }
  }
}
