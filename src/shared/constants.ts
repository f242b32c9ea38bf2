/**
 * Constants shared by the CLI and the TUI.
 *
 * @module shared/constants
 */

export const APP_NAME = 'marquee';

export const VERSION = '0.1.0';
