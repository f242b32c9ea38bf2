/**
 * CLI Commands Index
 *
 * Exports all CLI command implementations.
 *
 * @module cli/commands
 */

export { executeSearch, type SearchCommandOptions } from './search.js';
export { executeStreams, type StreamsCommandOptions } from './streams.js';
export { executeTrackers, type TrackersCommandOptions } from './trackers.js';
