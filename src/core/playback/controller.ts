/**
 * DownloadPlaybackController - turns a selected stream into a running player.
 *
 * A playback walks through a fixed sequence of states:
 *
 * ```
 * Registering → ResolvingMetadata → SelectingFile → Buffering → Playing
 *      └──────────────┴──────────────────┴─────────────┴─────────┴──→ Cleanup
 * ```
 *
 * Cleanup runs whatever way the playback ends (player exit, failure or
 * cancellation) and leaves no transfer or buffer file behind. Only one
 * playback may be active per controller at a time.
 *
 * @module core/playback/controller
 *
 * @example
 * ```typescript
 * const controller = new DownloadPlaybackController({
 *   engine,
 *   player: new MpvPlayer(config.player),
 *   baseDir: paths.downloads,
 *   bootstrapTrackers: trackers,
 * });
 *
 * controller.on('buffer:progress', ({ bufferedBytes, threshold }) => {
 *   console.log(`${bufferedBytes}/${threshold}`);
 * });
 *
 * const outcome = await controller.play(stream, { signal });
 * ```
 */

import { mkdir } from 'fs/promises';
import * as path from 'path';
import { DEFAULT_BUFFER_THRESHOLD } from '../config/defaults.js';
import { magnetLink } from '../catalog/schemas.js';
import {
  TypedEventEmitter,
  type Listener,
  type PlaybackEvents,
  type PlaybackEventEmitter,
} from '../events.js';
import { removeIfExists } from '../storage/atomic.js';
import type { TorrentEngine, TransferDescriptor, TransferHandle } from '../torrent/engine.js';
import { parseMagnetInfoHash } from '../torrent/magnet.js';
import { mergeTrackers } from '../trackers/cache.js';
import {
  CancelledError,
  describeError,
  EngineError,
  FileNotFoundError,
  FilePriority,
  MarqueeError,
  PlaybackBusyError,
  PlaybackState,
  StorageError,
  type PlaybackOutcome,
  type Stream,
} from '../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { systemClock, type Clock } from './clock.js';
import type { PlayerLauncher } from './player.js';

// =============================================================================
// Types
// =============================================================================

/**
 * State of one active playback
 */
export interface DownloadJob {
  readonly stream: Stream;
  handle: TransferHandle | null;
  selectedFileIndex: number | null;
  bufferedBytes: number;
  bufferPath: string | null;
  state: PlaybackState;

  /** Set once cleanup has started; later cleanups are no-ops */
  cleanedUp: boolean;
}

export interface PlayOptions {
  /** Aborts the playback at whatever stage it is in */
  signal?: AbortSignal;
}

export interface PlaybackControllerOptions {
  engine: TorrentEngine;
  player: PlayerLauncher;

  /** Directory transfers are saved under and the buffer file lives in */
  baseDir: string;

  /** Trackers added to every transfer */
  bootstrapTrackers: readonly string[];

  /** Bytes to download before the player starts (default: 50 MiB) */
  bufferThreshold?: number;

  /** Delay between status polls in milliseconds (default: 1000) */
  pollInterval?: number;

  /** Delete the transfer's data on cleanup (default: true) */
  deleteDataOnCleanup?: boolean;

  clock?: Clock;
  logger?: Logger;
}

const DEFAULT_POLL_INTERVAL = 1000;

/** Base name of the file the player reads from */
export const BUFFER_FILE_BASENAME = 'stream_buffer';

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Computes one priority per file: wanted for `selectedIndex`, skipped for
 * everything else.
 *
 * @example
 * filePriorities(2, 1) // [FilePriority.SKIP, FilePriority.WANTED]
 */
export function filePriorities(fileCount: number, selectedIndex: number): FilePriority[] {
  return Array.from({ length: fileCount }, (_, index) =>
    index === selectedIndex ? FilePriority.WANTED : FilePriority.SKIP
  );
}

// =============================================================================
// Controller
// =============================================================================

export class DownloadPlaybackController {
  private readonly engine: TorrentEngine;
  private readonly player: PlayerLauncher;
  private readonly baseDir: string;
  private readonly bootstrapTrackers: readonly string[];
  private readonly bufferThreshold: number;
  private readonly pollInterval: number;
  private readonly deleteDataOnCleanup: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly events: PlaybackEventEmitter = new TypedEventEmitter<PlaybackEvents>();

  private job: DownloadJob | null = null;
  private jobAbort: AbortController | null = null;
  private running: Promise<void> = Promise.resolve();
  private currentState: PlaybackState = PlaybackState.IDLE;

  constructor(options: PlaybackControllerOptions) {
    this.engine = options.engine;
    this.player = options.player;
    this.baseDir = options.baseDir;
    this.bootstrapTrackers = options.bootstrapTrackers;
    this.bufferThreshold = options.bufferThreshold ?? DEFAULT_BUFFER_THRESHOLD;
    this.pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;
    this.deleteDataOnCleanup = options.deleteDataOnCleanup ?? true;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('playback');
  }

  /** State of the current or most recent playback */
  get state(): PlaybackState {
    return this.currentState;
  }

  /** The playback in progress, if any */
  get activeJob(): DownloadJob | null {
    return this.job;
  }

  /**
   * Aborts the playback in progress, if any. Its cleanup still runs; await
   * settled() to know when it has finished.
   */
  cancel(): void {
    this.jobAbort?.abort();
  }

  /**
   * Resolves once the playback in progress, cleanup included, has ended.
   * Never rejects; the playback's own promise carries its outcome.
   */
  settled(): Promise<void> {
    return this.running;
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  on<K extends keyof PlaybackEvents>(event: K, listener: Listener<PlaybackEvents[K]>): this {
    this.events.on(event, listener);
    return this;
  }

  once<K extends keyof PlaybackEvents>(event: K, listener: Listener<PlaybackEvents[K]>): this {
    this.events.once(event, listener);
    return this;
  }

  off<K extends keyof PlaybackEvents>(event: K, listener: Listener<PlaybackEvents[K]>): this {
    this.events.off(event, listener);
    return this;
  }

  // ===========================================================================
  // Playback
  // ===========================================================================

  /**
   * Downloads a stream until enough is buffered, plays it and cleans up.
   *
   * @throws {PlaybackBusyError} If another playback is active
   * @throws {EngineError} If the engine rejects or fails the transfer
   * @throws {FileNotFoundError} If the stream's file is not in the transfer
   * @throws {PlayerError} If the player cannot be started
   * @throws {CancelledError} If the signal aborts the playback
   */
  async play(stream: Stream, options: PlayOptions = {}): Promise<PlaybackOutcome> {
    if (this.job) {
      throw new PlaybackBusyError();
    }

    const job: DownloadJob = {
      stream,
      handle: null,
      selectedFileIndex: null,
      bufferedBytes: 0,
      bufferPath: null,
      state: PlaybackState.IDLE,
      cleanedUp: false,
    };
    this.job = job;

    const abort = new AbortController();
    this.jobAbort = abort;
    const onAbort = () => abort.abort();
    if (options.signal?.aborted) {
      abort.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const outcome = this.execute(job, abort.signal);
    this.running = outcome.then(
      () => undefined,
      () => undefined
    );

    try {
      return await outcome;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async execute(job: DownloadJob, signal: AbortSignal): Promise<PlaybackOutcome> {
    const stream = job.stream;
    try {
      const outcome = await this.run(job, signal);
      await this.cleanup(job);
      this.transition(job, PlaybackState.FINISHED);
      return outcome;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      try {
        await this.cleanup(job);
      } catch (cleanupErr) {
        this.logger.error('Cleanup after failed playback did not complete', cleanupErr);
      }
      this.transition(job, PlaybackState.FAILED);
      if (error instanceof CancelledError) {
        this.logger.info(`Playback of ${stream.infoHash} cancelled`);
      } else {
        this.logger.error(`Playback of ${stream.infoHash} failed`, error);
      }
      if (this.events.listenerCount('error') > 0) {
        this.events.emit('error', { error });
      }
      throw error;
    } finally {
      this.job = null;
      this.jobAbort = null;
    }
  }

  /**
   * Removes a job's transfer and buffer file.
   *
   * Only the first call does any work; a missing buffer file is not an error.
   *
   * @throws {MarqueeError} The first failure, after every step has been tried
   */
  async cleanup(job: DownloadJob): Promise<void> {
    if (job.cleanedUp) {
      return;
    }
    job.cleanedUp = true;
    this.transition(job, PlaybackState.CLEANUP);

    let failure: unknown = null;

    if (job.handle) {
      try {
        await this.engine.removeTransfer(job.handle, { deleteData: this.deleteDataOnCleanup });
      } catch (err) {
        failure = err;
      }
    }

    if (job.bufferPath) {
      try {
        await removeIfExists(job.bufferPath);
      } catch (err) {
        failure ??= err;
      }
    }

    this.events.emit('cleanup', { infoHash: job.stream.infoHash });

    if (failure !== null) {
      throw failure instanceof MarqueeError
        ? failure
        : new EngineError(`Cleanup failed: ${describeError(failure)}`);
    }
  }

  private async run(job: DownloadJob, signal: AbortSignal): Promise<PlaybackOutcome> {
    throwIfAborted(signal);
    const handle = await this.register(job);
    await this.waitForMetadata(job, handle, signal);
    const bufferPath = await this.selectFile(job, handle, signal);
    await this.buffer(job, handle, signal);
    return this.playBuffer(job, handle, bufferPath, signal);
  }

  private async register(job: DownloadJob): Promise<TransferHandle> {
    this.transition(job, PlaybackState.REGISTERING);

    const link = magnetLink(job.stream);
    const descriptor: TransferDescriptor = {
      magnetLink: link,
      infoHash: parseMagnetInfoHash(link),
      trackers: mergeTrackers(this.bootstrapTrackers, job.stream.sources),
      savePath: this.baseDir,
      sequential: true,
      uploadMode: true,
    };

    try {
      await mkdir(this.baseDir, { recursive: true });
    } catch (err) {
      throw new StorageError(`Cannot create ${this.baseDir}: ${describeError(err)}`, this.baseDir);
    }

    try {
      job.handle = await this.engine.addTransfer(descriptor);
    } catch (err) {
      throw err instanceof EngineError
        ? err
        : new EngineError(`Engine rejected ${descriptor.infoHash}: ${describeError(err)}`);
    }
    return job.handle;
  }

  private async waitForMetadata(
    job: DownloadJob,
    handle: TransferHandle,
    signal: AbortSignal | undefined
  ): Promise<void> {
    this.transition(job, PlaybackState.RESOLVING_METADATA);

    for (;;) {
      throwIfAborted(signal);
      const status = handle.status();
      this.events.emit('metadata:progress', {
        infoHash: handle.infoHash,
        peers: status.numPeers,
      });
      if (status.hasMetadata) {
        return;
      }
      await this.clock.sleep(this.pollInterval, signal);
    }
  }

  private async selectFile(
    job: DownloadJob,
    handle: TransferHandle,
    signal: AbortSignal | undefined
  ): Promise<string> {
    this.transition(job, PlaybackState.SELECTING_FILE);

    const files = handle.files();
    const match = files.find((file) => file.name === job.stream.filenameHint);
    if (!match) {
      throw new FileNotFoundError(
        job.stream.filenameHint,
        files.map((file) => file.name)
      );
    }

    handle.prioritizeFiles(filePriorities(files.length, match.index));
    job.selectedFileIndex = match.index;

    const bufferPath = path.join(
      this.baseDir,
      `${BUFFER_FILE_BASENAME}${path.extname(match.name)}`
    );
    await removeIfExists(bufferPath);
    throwIfAborted(signal);
    await handle.relocateFile(match.index, bufferPath);
    job.bufferPath = bufferPath;

    this.logger.info(`Selected ${match.name} (${match.size} bytes) from ${handle.infoHash}`);
    this.events.emit('file:selected', {
      fileIndex: match.index,
      filename: match.name,
      bufferPath,
    });
    return bufferPath;
  }

  private async buffer(
    job: DownloadJob,
    handle: TransferHandle,
    signal: AbortSignal | undefined
  ): Promise<void> {
    this.transition(job, PlaybackState.BUFFERING);
    handle.releaseUploadMode();

    for (;;) {
      throwIfAborted(signal);
      const status = handle.status();
      job.bufferedBytes = status.totalDownload;
      this.events.emit('buffer:progress', {
        infoHash: handle.infoHash,
        bufferedBytes: status.totalDownload,
        threshold: this.bufferThreshold,
        peers: status.numPeers,
        downloadSpeed: status.downloadSpeed,
      });
      if (status.totalDownload >= this.bufferThreshold) {
        return;
      }
      await this.clock.sleep(this.pollInterval, signal);
    }
  }

  private async playBuffer(
    job: DownloadJob,
    handle: TransferHandle,
    bufferPath: string,
    signal: AbortSignal | undefined
  ): Promise<PlaybackOutcome> {
    this.transition(job, PlaybackState.PLAYING);
    throwIfAborted(signal);

    const playerProcess = this.player.launch(bufferPath);
    const onAbort = () => playerProcess.kill();
    signal?.addEventListener('abort', onAbort, { once: true });

    let exitCode: number | null;
    try {
      this.events.emit('player:started', { bufferPath });
      exitCode = await playerProcess.wait();
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    this.events.emit('player:exited', { exitCode });
    throwIfAborted(signal);

    job.bufferedBytes = handle.status().totalDownload;
    return { status: 'completed', exitCode, downloadedBytes: job.bufferedBytes };
  }

  private transition(job: DownloadJob, state: PlaybackState): void {
    const previous = job.state;
    if (previous === state) {
      return;
    }
    job.state = state;
    this.currentState = state;
    this.logger.debug(`${job.stream.infoHash}: ${previous} -> ${state}`);
    this.events.emit('state', { state, previous });
  }
}
