/**
 * UI Views index
 *
 * Re-exports all view components for the Marquee TUI.
 *
 * @module ui/views
 */

export { SearchView, type SearchViewProps } from './SearchView.js';
export { DetailView, episodesOf, initialTabIndex, type DetailViewProps } from './DetailView.js';
export { PlaybackView, stepStatus, type PlaybackViewProps } from './PlaybackView.js';
