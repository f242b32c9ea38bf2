/**
 * CLI output utilities for Marquee commands.
 *
 * Provides shared formatting and output helpers for consistent
 * command-line output across all CLI commands.
 *
 * @module cli/utils/output
 */

import { ContentType, MarqueeError, type StreamTarget } from '../../core/types.js';
import { truncateText } from '../../ui/utils/format.js';

export { truncateText };

// =============================================================================
// Colors
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Apply ANSI color to text
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Table Formatting
// =============================================================================

/**
 * Column definition for table formatting
 */
export interface TableColumn {
  /** Column header text */
  header: string;
  /** Column width */
  width: number;
  /** Alignment: 'left' | 'right' */
  align?: 'left' | 'right';
}

/**
 * Pad text to a fixed width with alignment
 */
export function padCell(text: string, width: number, align: 'left' | 'right' = 'left'): string {
  const truncated = text.length > width ? truncateText(text, width) : text;
  const padding = ' '.repeat(Math.max(0, width - truncated.length));
  return align === 'right' ? padding + truncated : truncated + padding;
}

/**
 * Format a table header row with its separator
 */
export function formatTableHeader(columns: TableColumn[]): string {
  const header = columns.map((col) => padCell(col.header, col.width, col.align)).join(' | ');
  const separator = columns.map((col) => '-'.repeat(col.width)).join('-+-');
  return `${header}\n${separator}`;
}

/**
 * Format a table row
 */
export function formatTableRow(values: string[], columns: TableColumn[]): string {
  return values
    .map((val, i) => {
      const col = columns[i];
      return col ? padCell(val, col.width, col.align) : val;
    })
    .join(' | ');
}

// =============================================================================
// Input Validation
// =============================================================================

/**
 * Parses a content type argument.
 *
 * @throws {MarqueeError} If the value is neither "movie" nor "series"
 */
export function parseContentType(input: string): ContentType {
  const value = input.toLowerCase().trim();
  if (value === ContentType.MOVIE || value === 'movies') return ContentType.MOVIE;
  if (value === ContentType.SERIES || value === 'show' || value === 'tv') return ContentType.SERIES;
  throw new MarqueeError(`Unknown content type "${input}" (expected movie or series)`);
}

/**
 * Builds a stream target from command arguments.
 *
 * @throws {MarqueeError} If a series target lacks its season or episode
 */
export function parseStreamTarget(
  type: ContentType,
  id: string,
  season?: number,
  episode?: number
): StreamTarget {
  if (type === ContentType.MOVIE) {
    return { type, id };
  }
  if (season === undefined || episode === undefined) {
    throw new MarqueeError('Series lookups need --season and --episode');
  }
  if (!Number.isInteger(season) || !Number.isInteger(episode)) {
    throw new MarqueeError('--season and --episode must be whole numbers');
  }
  return { type, id, season, episode };
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * Format an info message
 */
export function infoMessage(message: string): string {
  return colorize(`[INFO] ${message}`, ansiColors.cyan);
}

/**
 * Format a warning message
 */
export function warnMessage(message: string): string {
  return colorize(`[WARN] ${message}`, ansiColors.yellow);
}

/**
 * Format a section heading
 */
export function heading(text: string): string {
  return colorize(text, ansiColors.bold);
}
