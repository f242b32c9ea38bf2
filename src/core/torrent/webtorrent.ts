/**
 * WebTorrent-backed torrent engine.
 *
 * Session state is the list of DHT nodes the client knew at shutdown; they
 * are tried before the configured routers on the next start so the routing
 * table fills quickly.
 *
 * @module core/torrent/webtorrent
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import WebTorrent from 'webtorrent';
import { z } from 'zod';
import { describeError, EngineError, FilePriority } from '../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import type {
  EngineOpenOptions,
  RemoveTransferOptions,
  TorrentEngine,
  TransferDescriptor,
  TransferFile,
  TransferHandle,
  TransferStatus,
} from './engine.js';

// =============================================================================
// Session State
// =============================================================================

const SESSION_VERSION = 1;

const SessionStateSchema = z.object({
  version: z.literal(SESSION_VERSION),
  dhtNodes: z.array(z.string()),
});

const DhtTableSchema = z.object({
  nodes: z.array(z.object({ host: z.string(), port: z.number().int() })),
});

/**
 * Reads the DHT nodes out of a saved session blob.
 *
 * Returns an empty list for blobs written by another version or damaged on
 * disk; a cold start is always possible.
 */
export function decodeSessionState(blob: Buffer | null, logger?: Logger): string[] {
  if (blob === null) {
    return [];
  }
  let json: unknown;
  try {
    json = JSON.parse(blob.toString('utf-8'));
  } catch (err) {
    logger?.warn('Ignoring unreadable session state', err);
    return [];
  }
  const parsed = SessionStateSchema.safeParse(json);
  if (!parsed.success) {
    logger?.warn('Ignoring session state of an unknown format');
    return [];
  }
  return parsed.data.dhtNodes;
}

/**
 * Serializes DHT nodes into a session blob.
 */
export function encodeSessionState(dhtNodes: readonly string[]): Buffer {
  return Buffer.from(JSON.stringify({ version: SESSION_VERSION, dhtNodes }), 'utf-8');
}

// =============================================================================
// Transfer Handle
// =============================================================================

class WebTorrentTransfer implements TransferHandle {
  readonly infoHash: string;
  readonly torrent: WebTorrent.Torrent;
  private readonly savePath: string;
  private readonly logger: Logger;
  private uploadMode: boolean;
  private priorities: FilePriority[] | null = null;
  private hasMetadata = false;
  private failure: Error | null = null;

  constructor(torrent: WebTorrent.Torrent, descriptor: TransferDescriptor, logger: Logger) {
    this.torrent = torrent;
    this.infoHash = descriptor.infoHash;
    this.savePath = descriptor.savePath;
    this.uploadMode = descriptor.uploadMode;
    this.logger = logger;

    torrent.on('metadata', () => {
      this.hasMetadata = true;
      if (this.uploadMode) {
        torrent.deselect(0, torrent.pieces.length - 1, 0);
        for (const file of torrent.files) {
          file.deselect();
        }
      }
      this.logger.debug(`Metadata received for ${this.infoHash}: ${torrent.files.length} files`);
    });

    torrent.on('error', (err) => {
      this.failure = new EngineError(describeError(err));
      this.logger.error(`Transfer ${this.infoHash} failed`, err);
    });
  }

  status(): TransferStatus {
    if (this.failure) {
      throw this.failure;
    }
    return {
      hasMetadata: this.hasMetadata,
      numPeers: this.torrent.numPeers,
      totalDownload: this.torrent.downloaded,
      downloadSpeed: this.torrent.downloadSpeed,
    };
  }

  files(): TransferFile[] {
    if (!this.hasMetadata) {
      return [];
    }
    return this.torrent.files.map((file, index) => ({
      index,
      name: file.name,
      path: file.path,
      size: file.length,
    }));
  }

  prioritizeFiles(priorities: readonly FilePriority[]): void {
    this.priorities = [...priorities];
    if (!this.uploadMode) {
      this.applyPriorities();
    }
  }

  async relocateFile(index: number, targetPath: string): Promise<void> {
    const file = this.torrent.files[index];
    if (!file) {
      throw new EngineError(`Transfer ${this.infoHash} has no file ${index}`);
    }
    const source = path.resolve(this.savePath, file.path);
    await fs.mkdir(path.dirname(source), { recursive: true });
    await fs.symlink(source, targetPath);
  }

  releaseUploadMode(): void {
    if (!this.uploadMode) {
      return;
    }
    this.uploadMode = false;
    this.applyPriorities();
    this.torrent.resume();
  }

  private applyPriorities(): void {
    if (!this.priorities) {
      return;
    }
    this.torrent.files.forEach((file, index) => {
      if (this.priorities?.[index] === FilePriority.WANTED) {
        file.select();
      } else {
        file.deselect();
      }
    });
  }
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Torrent engine running an in-process WebTorrent client.
 *
 * @example
 * ```typescript
 * const engine = new WebTorrentEngine();
 * await engine.open({ state: await sessions.load(), dhtBootstrap: config.dhtBootstrapNodes });
 *
 * const handle = await engine.addTransfer(descriptor);
 * // ...
 * await sessions.save(engine.saveState());
 * await engine.close();
 * ```
 */
export class WebTorrentEngine implements TorrentEngine {
  private client: WebTorrent.Instance | null = null;
  private readonly transfers = new Map<string, WebTorrentTransfer>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('engine');
  }

  async open(options: EngineOpenOptions): Promise<void> {
    if (this.client) {
      return;
    }

    const savedNodes = decodeSessionState(options.state, this.logger);
    const bootstrap = [...new Set([...savedNodes, ...options.dhtBootstrap])];
    const clientOptions = {
      dht: { bootstrap },
      tracker: true,
    };

    this.client = new WebTorrent(clientOptions);
    this.client.on('error', (err) => {
      this.logger.error('WebTorrent client error', err);
    });

    this.logger.info(
      `Engine started with ${savedNodes.length} saved and ${options.dhtBootstrap.length} configured DHT nodes`
    );
  }

  async addTransfer(descriptor: TransferDescriptor): Promise<TransferHandle> {
    const client = this.requireClient();

    if (this.transfers.has(descriptor.infoHash)) {
      throw new EngineError(`Transfer ${descriptor.infoHash} is already registered`);
    }

    const torrentOptions = {
      announce: descriptor.trackers,
      path: descriptor.savePath,
      strategy: descriptor.sequential ? 'sequential' : 'rarest',
    };

    let torrent: WebTorrent.Torrent;
    try {
      torrent = client.add(descriptor.magnetLink, torrentOptions);
    } catch (err) {
      throw new EngineError(`Engine rejected ${descriptor.infoHash}: ${describeError(err)}`);
    }

    const transfer = new WebTorrentTransfer(torrent, descriptor, this.logger);
    this.transfers.set(descriptor.infoHash, transfer);
    this.logger.info(
      `Registered ${descriptor.infoHash} with ${descriptor.trackers.length} trackers`
    );
    return transfer;
  }

  async removeTransfer(handle: TransferHandle, options: RemoveTransferOptions): Promise<void> {
    const transfer = this.transfers.get(handle.infoHash);
    if (!transfer) {
      return;
    }
    this.transfers.delete(handle.infoHash);

    const client = this.requireClient();
    await new Promise<void>((resolve, reject) => {
      client.remove(transfer.torrent, { destroyStore: options.deleteData }, (err) => {
        if (err) {
          reject(new EngineError(`Failed to remove ${handle.infoHash}: ${describeError(err)}`));
        } else {
          resolve();
        }
      });
    });

    this.logger.info(
      `Removed ${handle.infoHash}${options.deleteData ? ' and deleted its data' : ''}`
    );
  }

  saveState(): Buffer {
    const client = this.client;
    if (!client || !('dht' in client)) {
      return encodeSessionState([]);
    }

    const dht: unknown = client.dht;
    if (typeof dht !== 'object' || dht === null || !('toJSON' in dht) || typeof dht.toJSON !== 'function') {
      return encodeSessionState([]);
    }

    const table = DhtTableSchema.safeParse(dht.toJSON());
    if (!table.success) {
      this.logger.warn('DHT routing table has an unexpected shape, not saving it');
      return encodeSessionState([]);
    }
    return encodeSessionState(table.data.nodes.map((node) => `${node.host}:${node.port}`));
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;
    this.transfers.clear();

    await new Promise<void>((resolve, reject) => {
      client.destroy((err) => {
        if (err) {
          reject(new EngineError(`Failed to stop engine: ${describeError(err)}`));
        } else {
          resolve();
        }
      });
    });
    this.logger.info('Engine stopped');
  }

  private requireClient(): WebTorrent.Instance {
    if (!this.client) {
      throw new EngineError('Engine is not open');
    }
    return this.client;
  }
}

