/**
 * External media player.
 *
 * @module core/playback/player
 */

import { spawn, type ChildProcess } from 'child_process';
import { PlayerError } from '../types.js';
import type { PlayerConfig } from '../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';

/**
 * A running player
 */
export interface PlayerProcess {
  /** Resolves with the exit code, null when the player was killed by a signal */
  wait(): Promise<number | null>;

  /** Asks the player to quit; has no effect once it has exited */
  kill(): void;
}

/**
 * Starts the player on a file
 */
export interface PlayerLauncher {
  launch(filePath: string): PlayerProcess;
}

class ChildPlayerProcess implements PlayerProcess {
  private readonly child: ChildProcess;
  private readonly exited: Promise<number | null>;
  private done = false;

  constructor(child: ChildProcess, command: string) {
    this.child = child;
    this.exited = new Promise<number | null>((resolve, reject) => {
      child.once('error', (err) => {
        this.done = true;
        reject(new PlayerError(`Failed to start ${command}: ${err.message}`, command));
      });
      child.once('exit', (code) => {
        this.done = true;
        resolve(code);
      });
    });
  }

  wait(): Promise<number | null> {
    return this.exited;
  }

  kill(): void {
    if (!this.done) {
      this.child.kill('SIGTERM');
    }
  }
}

/**
 * Launches mpv, or any player taking the file as its first argument.
 *
 * @example
 * ```typescript
 * const player = new MpvPlayer({ command: 'mpv', args: ['--keep-open'] });
 * const exitCode = await player.launch('/data/stream_buffer.mkv').wait();
 * ```
 */
export class MpvPlayer implements PlayerLauncher {
  private readonly config: PlayerConfig;
  private readonly logger: Logger;

  constructor(config: PlayerConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger ?? createLogger('player');
  }

  launch(filePath: string): PlayerProcess {
    const args = [filePath, ...this.config.args];
    this.logger.info(`Starting ${this.config.command} ${args.join(' ')}`);
    const child = spawn(this.config.command, args, { stdio: 'ignore' });
    return new ChildPlayerProcess(child, this.config.command);
  }
}
