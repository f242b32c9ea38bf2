/**
 * UI Hooks index
 *
 * Re-exports all custom hooks for the Marquee TUI.
 *
 * @module ui/hooks
 */

export {
  useKeyboard,
  dispatchKey,
  type KeyName,
  type KeyFlags,
  type KeyboardHandlers,
  type UseKeyboardOptions,
} from './useKeyboard.js';
export {
  useSelection,
  nextIndex,
  prevIndex,
  clampIndex,
  type UseSelectionResult,
} from './useSelection.js';
export { useTerminalSize, visibleRows, type TerminalSize } from './useTerminalSize.js';
export {
  useCatalogSearch,
  applyCatalogResult,
  EMPTY_SEARCH,
  type CatalogSearchState,
  type UseCatalogSearchResult,
} from './useCatalogSearch.js';
export { useMetadata, type UseMetadataResult } from './useMetadata.js';
export { useStreamLookup, type UseStreamLookupResult } from './useStreamLookup.js';
export {
  usePlayback,
  INITIAL_PROGRESS,
  type PlaybackProgress,
  type UsePlaybackResult,
} from './usePlayback.js';
export { useLogs, filterLogs } from './useLogs.js';
