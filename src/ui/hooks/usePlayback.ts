/**
 * Playback hook.
 *
 * Mirrors the controller's events into React state and owns the abort
 * controller of the running playback.
 *
 * @module ui/hooks/usePlayback
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import type { DownloadPlaybackController } from '../../core/playback/index.js';
import {
  CancelledError,
  describeError,
  PlaybackState,
  type PlaybackOutcome,
  type Stream,
} from '../../core/types.js';

// =============================================================================
// Types
// =============================================================================

export interface PlaybackProgress {
  state: PlaybackState;
  peers: number;
  bufferedBytes: number;
  threshold: number;
  downloadSpeed: number;
  filename: string | null;
  outcome: PlaybackOutcome | null;
  error: string | null;
}

export interface UsePlaybackResult extends PlaybackProgress {
  /** Stream being played, null when idle */
  stream: Stream | null;

  /** Starts playing a stream; ignored while one is active */
  start: (stream: Stream) => void;

  /** Aborts the active playback */
  abort: () => void;

  /** True between start and the end of cleanup */
  active: boolean;
}

export const INITIAL_PROGRESS: PlaybackProgress = {
  state: PlaybackState.IDLE,
  peers: 0,
  bufferedBytes: 0,
  threshold: 0,
  downloadSpeed: 0,
  filename: null,
  outcome: null,
  error: null,
};

// =============================================================================
// Hook
// =============================================================================

export function usePlayback(controller: DownloadPlaybackController | null): UsePlaybackResult {
  const [progress, setProgress] = useState<PlaybackProgress>(INITIAL_PROGRESS);
  const [stream, setStream] = useState<Stream | null>(null);
  const abortRef = useRef<AbortController | null>(null);
  const mountedRef = useRef(true);

  useEffect(() => {
    if (!controller) {
      return;
    }

    const onState = ({ state }: { state: PlaybackState }) => {
      setProgress((current) => ({ ...current, state }));
    };
    const onMetadata = ({ peers }: { peers: number }) => {
      setProgress((current) => ({ ...current, peers }));
    };
    const onFile = ({ filename }: { filename: string }) => {
      setProgress((current) => ({ ...current, filename }));
    };
    const onBuffer = (event: {
      bufferedBytes: number;
      threshold: number;
      peers: number;
      downloadSpeed: number;
    }) => {
      setProgress((current) => ({
        ...current,
        bufferedBytes: event.bufferedBytes,
        threshold: event.threshold,
        peers: event.peers,
        downloadSpeed: event.downloadSpeed,
      }));
    };

    controller.on('state', onState);
    controller.on('metadata:progress', onMetadata);
    controller.on('file:selected', onFile);
    controller.on('buffer:progress', onBuffer);

    return () => {
      controller.off('state', onState);
      controller.off('metadata:progress', onMetadata);
      controller.off('file:selected', onFile);
      controller.off('buffer:progress', onBuffer);
    };
  }, [controller]);

  useEffect(() => {
    mountedRef.current = true;
    return () => {
      mountedRef.current = false;
      abortRef.current?.abort();
    };
  }, []);

  const start = useCallback(
    (next: Stream) => {
      if (!controller || abortRef.current) {
        return;
      }
      const abortController = new AbortController();
      abortRef.current = abortController;
      setStream(next);
      setProgress(INITIAL_PROGRESS);

      controller
        .play(next, { signal: abortController.signal })
        .then((outcome) => {
          if (mountedRef.current) {
            setProgress((current) => ({ ...current, outcome }));
          }
        })
        .catch((err: unknown) => {
          if (mountedRef.current && !(err instanceof CancelledError)) {
            setProgress((current) => ({ ...current, error: describeError(err) }));
          }
        })
        .finally(() => {
          if (abortRef.current === abortController) {
            abortRef.current = null;
          }
          if (mountedRef.current) {
            setStream(null);
          }
        });
    },
    [controller]
  );

  const abort = useCallback(() => {
    abortRef.current?.abort();
  }, []);

  return { ...progress, stream, start, abort, active: stream !== null };
}

export default usePlayback;
