/**
 * Shared formatting utilities for Marquee UI
 *
 * These functions provide consistent formatting across all UI components
 * for bytes, speeds, episodes, playback states and other common display
 * formats.
 */

import { PlaybackState } from '../../core/types.js';

/**
 * Formats bytes into a human-readable string with appropriate units.
 *
 * @param bytes - The number of bytes to format
 * @returns Formatted string (e.g., "3.1 GB", "256 KB", "0 B")
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytes) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytes / Math.pow(base, unitIndex);

  if (unitIndex === 0) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Formats speed in bytes/second to human-readable string.
 *
 * @param bytesPerSecond - The speed in bytes per second
 * @returns Formatted string (e.g., "2.10 MB/s", "256 KB/s")
 */
export function formatSpeed(bytesPerSecond: number): string {
  if (bytesPerSecond <= 0) return '0 B/s';

  const units = ['B/s', 'KB/s', 'MB/s', 'GB/s'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytesPerSecond) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytesPerSecond / Math.pow(base, unitIndex);

  if (value >= 100) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  } else if (value >= 10) {
    return `${value.toFixed(1)} ${units[unitIndex]}`;
  } else {
    return `${value.toFixed(2)} ${units[unitIndex]}`;
  }
}

/**
 * Formats a timestamp for log display.
 *
 * @returns Formatted timestamp string (HH:MM:SS)
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours().toString().padStart(2, '0');
  const minutes = date.getMinutes().toString().padStart(2, '0');
  const seconds = date.getSeconds().toString().padStart(2, '0');
  return `${hours}:${minutes}:${seconds}`;
}

/**
 * Formats a date as YYYY-MM-DD, or "--" when unknown.
 */
export function formatDate(date: Date | undefined): string {
  if (!date || isNaN(date.getTime())) return '--';
  return date.toISOString().slice(0, 10);
}

/**
 * Truncates a string to a maximum length, adding ellipsis if needed.
 *
 * @param maxLength - Maximum length including ellipsis
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…'; // ellipsis
}

/**
 * Formats an episode position as a compact code.
 *
 * @example
 * formatEpisodeCode(1, 2) // "S01E02"
 * formatEpisodeCode(-1, 3) // "SPE03"
 */
export function formatEpisodeCode(season: number, episode: number): string {
  const episodePart = `E${episode.toString().padStart(2, '0')}`;
  if (season < 0) {
    return `SP${episodePart}`;
  }
  return `S${season.toString().padStart(2, '0')}${episodePart}`;
}

/**
 * Label of a season tab.
 *
 * @param season - Season number, or null for the specials bucket
 */
export function formatSeasonLabel(season: number | null): string {
  return season === null ? 'Specials' : `Season ${season}`;
}

const STATE_LABELS: Record<PlaybackState, string> = {
  [PlaybackState.IDLE]: 'Idle',
  [PlaybackState.REGISTERING]: 'Registering transfer',
  [PlaybackState.RESOLVING_METADATA]: 'Resolving metadata',
  [PlaybackState.SELECTING_FILE]: 'Selecting file',
  [PlaybackState.BUFFERING]: 'Buffering',
  [PlaybackState.PLAYING]: 'Playing',
  [PlaybackState.CLEANUP]: 'Cleaning up',
  [PlaybackState.FINISHED]: 'Finished',
  [PlaybackState.FAILED]: 'Failed',
};

/**
 * Human-readable label of a playback state.
 */
export function formatStateLabel(state: PlaybackState): string {
  return STATE_LABELS[state];
}
