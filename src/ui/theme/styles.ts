/**
 * Shared style constants for the Marquee TUI.
 *
 * @module ui/theme/styles
 */

// =============================================================================
// Border Characters
// =============================================================================

/**
 * Box-drawing characters for creating borders and frames.
 */
export const borders = {
  /** Horizontal line character */
  horizontal: '─',

  /** Vertical line character */
  vertical: '│',

  /** T-junction characters for complex layouts */
  junctions: {
    left: '├',
    right: '┤',
  },

  /** Rounded corner variants */
  rounded: {
    topLeft: '╭',
    topRight: '╮',
    bottomLeft: '╰',
    bottomRight: '╯',
  },
} as const;

// =============================================================================
// Progress Bar Characters
// =============================================================================

/**
 * Characters for rendering progress bars.
 */
export const progressChars = {
  /** Filled portion of progress bar */
  filled: '█',

  /** Empty portion of progress bar */
  empty: '░',
} as const;

// =============================================================================
// Text Symbols
// =============================================================================

/**
 * Common symbols used throughout the UI.
 */
export const symbols = {
  /** Indicator for selected items */
  selected: '▶',

  /** Bullet point for lists */
  bullet: '•',

  /** Check mark for completed items */
  check: '✓',

  /** Cross mark for failed/error items */
  cross: '✗',

  /** Rating star */
  star: '★',

  /** Spinner frames for loading animation */
  spinner: ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'],

  /** Download indicator */
  download: '↓',
} as const;
