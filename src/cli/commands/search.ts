/**
 * Search command for the Marquee CLI.
 *
 * Prints catalog results per content type as they arrive.
 *
 * @module cli/commands/search
 */

import type { CatalogAggregator } from '../../core/catalog/index.js';
import { ContentType, describeError } from '../../core/types.js';
import {
  formatTableHeader,
  formatTableRow,
  heading,
  infoMessage,
  warnMessage,
  type TableColumn,
} from '../utils/output.js';

export interface SearchCommandOptions {
  catalog: CatalogAggregator;
  query: string;
  /** Line sink (default: console.log) */
  out?: (line: string) => void;
  signal?: AbortSignal;
}

const TABLE_COLUMNS: TableColumn[] = [
  { header: 'ID', width: 12 },
  { header: 'Name', width: 50 },
];

const SECTION_TITLES: Record<ContentType, string> = {
  [ContentType.MOVIE]: 'Movies',
  [ContentType.SERIES]: 'Series',
};

/**
 * Execute the search command.
 *
 * @returns Number of entries printed
 */
export async function executeSearch(options: SearchCommandOptions): Promise<number> {
  const { catalog, query, signal } = options;
  const out = options.out ?? ((line: string) => console.log(line));

  if (!query.trim()) {
    out(infoMessage('Nothing to search for'));
    return 0;
  }

  let total = 0;
  for await (const result of catalog.search(query, signal)) {
    const title = SECTION_TITLES[result.contentType];
    if (!result.ok) {
      out(warnMessage(`${title}: ${describeError(result.error)}`));
      continue;
    }

    out('');
    out(heading(`${title} (${result.entries.length})`));
    if (result.entries.length === 0) {
      continue;
    }
    out(formatTableHeader(TABLE_COLUMNS));
    for (const entry of result.entries) {
      out(formatTableRow([entry.id, entry.name], TABLE_COLUMNS));
    }
    total += result.entries.length;
  }

  out('');
  out(`${total} result${total !== 1 ? 's' : ''} total`);
  return total;
}

export default executeSearch;
