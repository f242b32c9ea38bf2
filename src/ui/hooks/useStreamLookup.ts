/**
 * React binding of StreamLookup.
 *
 * @module ui/hooks/useStreamLookup
 */

import { useState, useEffect, useCallback, useMemo } from 'react';
import {
  StreamLookup,
  type StreamLookupSnapshot,
  type StreamSource,
} from '../../core/catalog/index.js';
import type { StreamTarget } from '../../core/types.js';

export interface UseStreamLookupResult extends StreamLookupSnapshot {
  /** Looks up streams for a target; a different target discards old results */
  request: (target: StreamTarget) => void;

  /** Stops the running lookup, keeping what it delivered */
  cancel: () => void;
}

/**
 * Keeps one StreamLookup for the lifetime of the component.
 */
export function useStreamLookup(source: StreamSource): UseStreamLookupResult {
  const lookup = useMemo(() => new StreamLookup(source), [source]);
  const [snapshot, setSnapshot] = useState<StreamLookupSnapshot>(() => lookup.snapshot);

  useEffect(() => {
    setSnapshot(lookup.snapshot);
    const unsubscribe = lookup.subscribe(setSnapshot);
    return () => {
      unsubscribe();
      lookup.dispose();
    };
  }, [lookup]);

  const request = useCallback((target: StreamTarget) => lookup.request(target), [lookup]);
  const cancel = useCallback(() => lookup.cancel(), [lookup]);

  return { ...snapshot, request, cancel };
}

export default useStreamLookup;
