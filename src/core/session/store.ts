/**
 * Torrent engine session state kept between runs.
 *
 * The blob is opaque to Marquee; the engine produces it on shutdown and
 * receives it again on the next start.
 *
 * @module core/session/store
 */

import { readFileIfExists, writeFileAtomic } from '../storage/atomic.js';
import { createLogger, type Logger } from '../../utils/logger.js';

/**
 * Single-file store for the engine session blob.
 *
 * @example
 * ```typescript
 * const store = new SessionStore(paths.session);
 * const state = await store.load(); // null on first run
 * // ...
 * await store.save(engine.saveState());
 * ```
 */
export class SessionStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger?: Logger) {
    this.filePath = filePath;
    this.logger = logger ?? createLogger('session');
  }

  /**
   * Loads the saved session, or null when there is none.
   *
   * @throws {StorageError} If the file exists but cannot be read
   */
  async load(): Promise<Buffer | null> {
    const blob = await readFileIfExists(this.filePath);
    if (blob === null) {
      this.logger.debug('No saved session, starting cold');
    } else {
      this.logger.debug(`Loaded session state (${blob.length} bytes)`);
    }
    return blob;
  }

  /**
   * Replaces the saved session.
   *
   * @throws {StorageError} If the write fails; the previous file is left intact
   */
  async save(blob: Buffer): Promise<void> {
    await writeFileAtomic(this.filePath, blob);
    this.logger.debug(`Saved session state (${blob.length} bytes)`);
  }
}
