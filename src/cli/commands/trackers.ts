/**
 * Trackers command for the Marquee CLI.
 *
 * Prints the bootstrap tracker list, refreshing the daily cache if needed.
 *
 * @module cli/commands/trackers
 */

import type { TrackerCache } from '../../core/trackers/index.js';
import { infoMessage } from '../utils/output.js';

export interface TrackersCommandOptions {
  trackers: TrackerCache;
  /** Line sink (default: console.log) */
  out?: (line: string) => void;
}

/**
 * Execute the trackers command.
 *
 * @returns Number of trackers printed
 */
export async function executeTrackers(options: TrackersCommandOptions): Promise<number> {
  const out = options.out ?? ((line: string) => console.log(line));
  const trackers = await options.trackers.getBootstrapTrackers();

  if (trackers.length === 0) {
    out(infoMessage('No bootstrap trackers available'));
    return 0;
  }
  for (const tracker of trackers) {
    out(tracker);
  }
  return trackers.length;
}

export default executeTrackers;
