/**
 * UI Components index
 *
 * Re-exports all UI components for the Marquee TUI.
 *
 * @module ui/components
 */

export { Header, type HeaderProps } from './Header.js';
export { ProgressBar, filledCells, type ProgressBarProps } from './ProgressBar.js';
export {
  StatusBar,
  SEARCH_SHORTCUTS,
  DETAIL_SHORTCUTS,
  PLAYBACK_SHORTCUTS,
  type Shortcut,
  type StatusBarProps,
} from './StatusBar.js';
export { SearchInput, editValue, type SearchInputProps } from './SearchInput.js';
export { EntryList, groupByType, type EntryListProps } from './EntryList.js';
export { EntryDetails, detailFacts, type EntryDetailsProps } from './EntryDetails.js';
export {
  SeasonTabs,
  seasonTabs,
  adjacentTab,
  type SeasonTab,
  type SeasonTabsProps,
} from './SeasonTabs.js';
export { EpisodeList, type EpisodeListProps } from './EpisodeList.js';
export { StreamList, streamHeadline, type StreamListProps } from './StreamList.js';
export { LogView, type LogViewProps } from './LogView.js';
