/**
 * Color palette and theme definitions for the Marquee TUI.
 *
 * This module provides color constants for use with Ink components.
 * Uses a warm amber theme after cinema marquee lights.
 *
 * @module ui/theme/colors
 */

import { PlaybackState } from '../../core/types.js';

// =============================================================================
// Base Color Palette
// =============================================================================

/**
 * Primary color palette for the application.
 */
export const colors = {
  /** Primary accent color - marquee amber */
  primary: 'yellow',

  /** Secondary accent color - for highlights */
  secondary: 'cyan',

  /** Success state color for completed operations */
  success: 'greenBright',

  /** Warning state color for attention-needed items */
  warning: 'yellowBright',

  /** Error state color for failures and critical issues */
  error: 'red',

  /** Muted color for secondary/disabled content */
  muted: 'gray',

  /** Dim color for less important UI elements */
  dim: 'blackBright',

  /** Highlight color for focused elements */
  highlight: 'yellowBright',

  /** Text color for normal content */
  text: 'white',

  /** Border color for UI containers */
  border: 'yellow',

  /** Subtle border color */
  borderDim: 'gray',
} as const;

/**
 * Type representing valid color values from the palette.
 */
export type Color = (typeof colors)[keyof typeof colors];

// =============================================================================
// Playback State Colors
// =============================================================================

/**
 * Colors mapped to playback states.
 */
const stateColors: Record<PlaybackState, string> = {
  [PlaybackState.IDLE]: 'gray',
  [PlaybackState.REGISTERING]: 'blue',
  [PlaybackState.RESOLVING_METADATA]: 'blue',
  [PlaybackState.SELECTING_FILE]: 'cyan',
  [PlaybackState.BUFFERING]: 'yellow',
  [PlaybackState.PLAYING]: 'greenBright',
  [PlaybackState.CLEANUP]: 'gray',
  [PlaybackState.FINISHED]: 'green',
  [PlaybackState.FAILED]: 'red',
};

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Get the color for a playback state.
 *
 * @example
 * ```ts
 * getStateColor(PlaybackState.BUFFERING); // 'yellow'
 * ```
 */
export function getStateColor(state: PlaybackState): string {
  return stateColors[state];
}

/**
 * Get color based on a progress percentage.
 *
 * @param progress - Progress value between 0 and 1
 *
 * @example
 * ```ts
 * const color = getProgressColor(0.25); // 'yellow'
 * const color = getProgressColor(1.0);  // 'greenBright'
 * ```
 */
export function getProgressColor(progress: number): string {
  if (progress >= 1) return colors.success;
  if (progress >= 0.5) return colors.warning;
  if (progress >= 0.25) return colors.primary;
  return colors.error;
}

/**
 * Get color based on download speed.
 *
 * @param bytesPerSecond - Speed in bytes per second
 */
export function getSpeedColor(bytesPerSecond: number): string {
  if (bytesPerSecond === 0) return colors.muted;
  if (bytesPerSecond >= 1024 * 1024) return colors.success; // >= 1 MB/s
  if (bytesPerSecond >= 100 * 1024) return colors.primary; // >= 100 KB/s
  return colors.warning;
}
