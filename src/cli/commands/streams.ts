/**
 * Streams command for the Marquee CLI.
 *
 * Prints the streams every provider offers for a movie or an episode.
 *
 * @module cli/commands/streams
 */

import { StreamLookup, itemIdFor, type StreamSource } from '../../core/catalog/index.js';
import { describeError, type Stream, type StreamTarget } from '../../core/types.js';
import {
  formatTableHeader,
  formatTableRow,
  heading,
  infoMessage,
  warnMessage,
  type TableColumn,
} from '../utils/output.js';

export interface StreamsCommandOptions {
  source: StreamSource;
  target: StreamTarget;
  /** Line sink (default: console.log) */
  out?: (line: string) => void;
  /** Stops the lookup; rows already printed stay */
  signal?: AbortSignal;
}

const TABLE_COLUMNS: TableColumn[] = [
  { header: '#', width: 3, align: 'right' },
  { header: 'Title', width: 48 },
  { header: 'Info hash', width: 40 },
];

/**
 * First line of a provider title
 */
function headline(stream: Stream): string {
  return stream.title.split('\n')[0].trim() || stream.filenameHint;
}

/**
 * Execute the streams command.
 *
 * Rows are printed as each provider answers.
 *
 * @returns Number of streams printed
 */
export async function executeStreams(options: StreamsCommandOptions): Promise<number> {
  const { source, target } = options;
  const out = options.out ?? ((line: string) => console.log(line));

  out(heading(`Streams for ${itemIdFor(target)}`));
  out(formatTableHeader(TABLE_COLUMNS));

  const lookup = new StreamLookup(source);
  let printed = 0;
  let reported = 0;

  lookup.subscribe(({ streams, failures }) => {
    for (; printed < streams.length; printed++) {
      const stream = streams[printed];
      out(formatTableRow([String(printed + 1), headline(stream), stream.infoHash], TABLE_COLUMNS));
    }
    for (; reported < failures.length; reported++) {
      const failure = failures[reported];
      out(warnMessage(`${failure.provider}: ${describeError(failure.error)}`));
    }
  });

  const cancel = () => lookup.cancel();
  options.signal?.addEventListener('abort', cancel, { once: true });

  lookup.request(target);
  await lookup.settled();
  options.signal?.removeEventListener('abort', cancel);
  lookup.dispose();

  out('');
  out(printed === 0 ? infoMessage('No streams found') : `${printed} stream${printed !== 1 ? 's' : ''} total`);
  return printed;
}

export default executeStreams;
