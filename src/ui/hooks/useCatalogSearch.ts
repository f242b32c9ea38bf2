/**
 * Catalog search hook.
 *
 * Each search aborts the one before it. Results are appended per content type
 * in the order the catalog responds.
 *
 * @module ui/hooks/useCatalogSearch
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import type { CatalogAggregator, CatalogResult } from '../../core/catalog/index.js';
import { describeError, type ContentType, type Entry } from '../../core/types.js';

// =============================================================================
// Types
// =============================================================================

export interface CatalogSearchState {
  /** Query of the latest search */
  query: string;

  /** Entries of every content type that answered, in arrival order */
  entries: Entry[];

  /** Content types whose search failed */
  failures: Array<{ contentType: ContentType; message: string }>;

  /** Failure of the search as a whole */
  error: string | null;

  loading: boolean;
}

export interface UseCatalogSearchResult extends CatalogSearchState {
  /** Starts a search, aborting the running one */
  search: (query: string) => void;

  /** Aborts the running search and clears the results */
  clear: () => void;
}

export const EMPTY_SEARCH: CatalogSearchState = {
  query: '',
  entries: [],
  failures: [],
  error: null,
  loading: false,
};

/**
 * Folds one catalog result into the search state.
 */
export function applyCatalogResult(
  state: CatalogSearchState,
  result: CatalogResult
): CatalogSearchState {
  if (result.ok) {
    return { ...state, entries: [...state.entries, ...result.entries] };
  }
  return {
    ...state,
    failures: [
      ...state.failures,
      { contentType: result.contentType, message: describeError(result.error) },
    ],
  };
}

// =============================================================================
// Hook
// =============================================================================

export function useCatalogSearch(catalog: CatalogAggregator): UseCatalogSearchResult {
  const [state, setState] = useState<CatalogSearchState>(EMPTY_SEARCH);
  const controllerRef = useRef<AbortController | null>(null);

  const search = useCallback(
    (query: string) => {
      controllerRef.current?.abort();
      const controller = new AbortController();
      controllerRef.current = controller;

      setState({ ...EMPTY_SEARCH, query, loading: query.trim().length > 0 });

      const consume = async () => {
        for await (const result of catalog.search(query, controller.signal)) {
          if (controller.signal.aborted) {
            return;
          }
          setState((current) => applyCatalogResult(current, result));
        }
      };

      consume()
        .catch((err: unknown) => {
          if (!controller.signal.aborted) {
            setState((current) => ({ ...current, error: describeError(err) }));
          }
        })
        .finally(() => {
          if (controllerRef.current === controller) {
            setState((current) => ({ ...current, loading: false }));
          }
        });
    },
    [catalog]
  );

  const clear = useCallback(() => {
    controllerRef.current?.abort();
    controllerRef.current = null;
    setState(EMPTY_SEARCH);
  }, []);

  // Abort whatever is running on unmount
  useEffect(() => {
    return () => {
      controllerRef.current?.abort();
    };
  }, []);

  return { ...state, search, clear };
}

export default useCatalogSearch;
