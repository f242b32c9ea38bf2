/**
 * Platform-specific utilities for cross-platform compatibility.
 *
 * Provides abstractions for file paths and per-user data locations that work
 * across Windows, macOS, and Linux.
 *
 * @module utils/platform
 */

import { platform, homedir } from 'os';
import { join, resolve } from 'path';

/** Current platform is Windows */
export const isWindows = platform() === 'win32';

/**
 * Expands a path that may contain ~ to the user's home directory.
 *
 * @param path - Path that may start with ~/ or ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  if (path.startsWith('~')) {
    return resolve(homedir(), path.slice(1));
  }
  return path;
}

/**
 * Gets the platform-appropriate default data directory.
 *
 * - Windows: %LOCALAPPDATA%/marquee
 * - Unix/macOS: ~/.marquee
 */
export function getDefaultDataDir(): string {
  if (isWindows) {
    return join(process.env.LOCALAPPDATA || homedir(), 'marquee');
  }
  return join(homedir(), '.marquee');
}
