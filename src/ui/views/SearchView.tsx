/**
 * SearchView - catalog search and results.
 *
 * The query field owns the keyboard while focused; once a search is
 * submitted focus moves to the results list.
 *
 * @module ui/views/SearchView
 */

import React, { useState, useCallback, useEffect, useMemo } from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme/index.js';
import { useKeyboard } from '../hooks/useKeyboard.js';
import { useSelection } from '../hooks/useSelection.js';
import type { UseCatalogSearchResult } from '../hooks/useCatalogSearch.js';
import { SearchInput } from '../components/SearchInput.js';
import { EntryList, groupByType } from '../components/EntryList.js';
import { ContentType, type Entry } from '../../core/types.js';

export interface SearchViewProps {
  search: UseCatalogSearchResult;
  /** Order of the result sections */
  contentTypes: readonly ContentType[];
  /** Opens the detail view of an entry */
  onOpen: (entry: Entry) => void;
  onQuit: () => void;
  width?: number;
  /** Rows available for results */
  height?: number;
  keyboardEnabled?: boolean;
}

const SPINNER_INTERVAL = 80;

function emptyText(search: UseCatalogSearchResult): string {
  if (search.loading) return 'Searching…';
  if (search.error) return search.error;
  if (search.query.trim()) return `Nothing found for "${search.query.trim()}"`;
  return 'Press / to search';
}

export const SearchView: React.FC<SearchViewProps> = ({
  search,
  contentTypes,
  onOpen,
  onQuit,
  width = 80,
  height = 10,
  keyboardEnabled = true,
}) => {
  const [query, setQuery] = useState(search.query);
  const [inputFocused, setInputFocused] = useState(search.entries.length === 0);
  const [spinnerFrame, setSpinnerFrame] = useState(0);
  const entries = useMemo(
    () => groupByType(search.entries, contentTypes),
    [search.entries, contentTypes]
  );
  const { selected, selectedIndex, selectNext, selectPrev } = useSelection(entries);

  useEffect(() => {
    if (!search.loading) {
      return;
    }
    const timer = setInterval(() => setSpinnerFrame((frame) => frame + 1), SPINNER_INTERVAL);
    return () => clearInterval(timer);
  }, [search.loading]);

  const submit = useCallback(
    (value: string) => {
      search.search(value);
      setInputFocused(false);
    },
    [search]
  );

  const open = useCallback(() => {
    if (selected) {
      onOpen(selected);
    }
  }, [selected, onOpen]);

  useKeyboard({
    handlers: {
      up: selectPrev,
      k: selectPrev,
      down: selectNext,
      j: selectNext,
      enter: open,
      l: open,
      '/': () => setInputFocused(true),
      q: onQuit,
    },
    enabled: keyboardEnabled && !inputFocused,
  });

  const failures = search.failures
    .map((failure) => `${failure.contentType === ContentType.SERIES ? 'Series' : 'Movies'}: ${failure.message}`)
    .join('  ');

  return (
    <Box flexDirection="column">
      <SearchInput
        value={query}
        onChange={setQuery}
        onSubmit={submit}
        onCancel={() => setInputFocused(false)}
        focused={keyboardEnabled && inputFocused}
        loading={search.loading}
        spinnerFrame={spinnerFrame}
        width={Math.min(width, 60)}
      />
      <Box marginTop={1} flexDirection="column">
        <EntryList
          entries={entries}
          selectedIndex={selectedIndex}
          focused={!inputFocused}
          height={height}
          width={width}
          emptyText={emptyText(search)}
        />
      </Box>
      {failures && (
        <Box paddingX={1}>
          <Text color={colors.warning} wrap="truncate">
            {failures}
          </Text>
        </Box>
      )}
    </Box>
  );
};

export default SearchView;
