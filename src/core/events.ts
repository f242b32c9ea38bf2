/**
 * Typed Event Emitter System for Marquee
 *
 * Provides type-safe event emission and subscription for playback progress.
 * Wraps Node's EventEmitter with full TypeScript type safety.
 *
 * @module core/events
 */

import { EventEmitter } from 'events';
import type { PlaybackState } from './types.js';

// ============================================================================
// Event Payload Types
// ============================================================================

/**
 * Complete event map of the download-to-playback controller
 */
export interface PlaybackEvents {
  // State machine transitions
  state: { state: PlaybackState; previous: PlaybackState };

  // Emitted on every poll tick while waiting for transfer metadata
  'metadata:progress': { infoHash: string; peers: number };

  // Emitted once the file to play has been chosen and relocated
  'file:selected': { fileIndex: number; filename: string; bufferPath: string };

  // Emitted on every poll tick while buffering
  'buffer:progress': {
    infoHash: string;
    bufferedBytes: number;
    threshold: number;
    peers: number;
    downloadSpeed: number;
  };

  // Player lifecycle
  'player:started': { bufferPath: string };
  'player:exited': { exitCode: number | null };

  // Emitted when the transfer has been removed and the buffer deleted
  cleanup: { infoHash: string };

  // Terminal failure of a playback attempt (cancellation included)
  error: { error: Error };
}

/**
 * Listener signature for an event payload
 */
export type Listener<P> = P extends void ? () => void : (payload: P) => void;

// ============================================================================
// TypedEventEmitter Implementation
// ============================================================================

/**
 * Type-safe event emitter that wraps Node's EventEmitter
 *
 * @template T - Event map type defining event names and their payload types
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter<PlaybackEvents>();
 *
 * emitter.on('buffer:progress', ({ bufferedBytes, threshold }) => {
 *   console.log(`${bufferedBytes}/${threshold}`);
 * });
 *
 * emitter.emit('player:exited', { exitCode: 0 });
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
  }

  /**
   * Subscribe to an event
   *
   * @returns this for chaining
   */
  on<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first emission)
   */
  once<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.once(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof T & string>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T & string>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event, ...args);
  }

  listenerCount<K extends keyof T & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}

/**
 * Pre-configured event emitter type for playback events
 */
export type PlaybackEventEmitter = TypedEventEmitter<PlaybackEvents>;
