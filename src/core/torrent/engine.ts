/**
 * Torrent engine abstraction.
 *
 * The playback controller drives transfers only through these interfaces;
 * the BitTorrent protocol itself is left to the engine behind them.
 *
 * @module core/torrent/engine
 */

import type { FilePriority } from '../types.js';

/**
 * Everything the engine needs to start a transfer
 */
export interface TransferDescriptor {
  magnetLink: string;

  /** 40-character lower-case hex info hash decoded from the magnet link */
  infoHash: string;

  /** Tracker announce URLs, duplicates already removed */
  trackers: string[];

  /** Directory the transfer's files are written under */
  savePath: string;

  /** Fetch pieces in order so playback can start early */
  sequential: boolean;

  /** Start without fetching payload until released */
  uploadMode: boolean;
}

/**
 * Point-in-time view of a transfer
 */
export interface TransferStatus {
  /** True once the file list and sizes are known */
  hasMetadata: boolean;

  numPeers: number;

  /** Bytes downloaded so far */
  totalDownload: number;

  /** Bytes per second */
  downloadSpeed: number;
}

/**
 * One file inside a transfer
 */
export interface TransferFile {
  index: number;

  /** Base name */
  name: string;

  /** Path relative to the save path */
  path: string;

  /** Size in bytes */
  size: number;
}

/**
 * Handle to a transfer registered with the engine
 */
export interface TransferHandle {
  readonly infoHash: string;

  /**
   * @throws {EngineError} If the transfer has failed
   */
  status(): TransferStatus;

  /** File list; empty until metadata is available */
  files(): TransferFile[];

  /** One priority per file, in file order */
  prioritizeFiles(priorities: readonly FilePriority[]): void;

  /** Makes a file's data reachable at `targetPath` */
  relocateFile(index: number, targetPath: string): Promise<void>;

  /** Starts fetching payload for the wanted files */
  releaseUploadMode(): void;
}

export interface EngineOpenOptions {
  /** Session blob saved by a previous run, null for a cold start */
  state: Buffer | null;

  /** DHT routers ("host:port") */
  dhtBootstrap: string[];
}

export interface RemoveTransferOptions {
  /** Delete the transfer's files from disk */
  deleteData: boolean;
}

/**
 * Long-lived torrent engine shared by every playback
 */
export interface TorrentEngine {
  open(options: EngineOpenOptions): Promise<void>;

  /**
   * @throws {EngineError} If the engine rejects the descriptor
   */
  addTransfer(descriptor: TransferDescriptor): Promise<TransferHandle>;

  removeTransfer(handle: TransferHandle, options: RemoveTransferOptions): Promise<void>;

  /** Serializes what the engine wants to keep for the next run */
  saveState(): Buffer;

  close(): Promise<void>;
}
