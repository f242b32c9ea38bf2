import { useState, useEffect } from 'react';
import type { MetadataResolver } from '../../core/catalog/index.js';
import { describeError, type Entry, type Metadata } from '../../core/types.js';

export interface UseMetadataResult {
  metadata: Metadata | null;
  loading: boolean;
  error: string | null;
}

/**
 * Resolves the metadata of an entry, re-resolving when the entry changes.
 *
 * A response that arrives after the entry changed or the component
 * unmounted is dropped.
 */
export function useMetadata(resolver: MetadataResolver, entry: Entry | null): UseMetadataResult {
  const [metadata, setMetadata] = useState<Metadata | null>(null);
  const [loading, setLoading] = useState(entry !== null);
  const [error, setError] = useState<string | null>(null);

  const type = entry?.type;
  const id = entry?.id;

  useEffect(() => {
    setMetadata(null);
    setError(null);
    if (type === undefined || id === undefined) {
      setLoading(false);
      return;
    }

    let mounted = true;
    const controller = new AbortController();
    setLoading(true);

    resolver
      .resolve(type, id, controller.signal)
      .then((resolved) => {
        if (mounted) {
          setMetadata(resolved);
          setLoading(false);
        }
      })
      .catch((err: unknown) => {
        if (mounted) {
          setError(describeError(err));
          setLoading(false);
        }
      });

    return () => {
      mounted = false;
      controller.abort();
    };
  }, [resolver, type, id]);

  return { metadata, loading, error };
}

export default useMetadata;
