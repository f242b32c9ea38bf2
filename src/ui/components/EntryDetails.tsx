import React from 'react';
import { Box, Text } from 'ink';
import { colors, symbols } from '../theme/index.js';
import { truncateText } from '../utils/format.js';
import type { Metadata } from '../../core/types.js';

export interface EntryDetailsProps {
  metadata: Metadata;
  width?: number;
}

const MAX_CAST = 4;

/**
 * One-line facts about an entry: year, runtime and rating, blanks skipped.
 *
 * @example
 * detailFacts({ year: '2008–2013', runtimeLabel: '49 min', imdbRating: '9.5', ... })
 * // '2008–2013 • 49 min • ★ 9.5'
 */
export function detailFacts(metadata: Pick<Metadata, 'year' | 'runtimeLabel' | 'imdbRating'>): string {
  const facts = [metadata.year, metadata.runtimeLabel];
  if (metadata.imdbRating) {
    facts.push(`${symbols.star} ${metadata.imdbRating}`);
  }
  return facts.filter((fact) => fact.length > 0).join(` ${symbols.bullet} `);
}

/**
 * Title block of the detail view.
 */
export const EntryDetails: React.FC<EntryDetailsProps> = ({ metadata, width = 80 }) => {
  const facts = detailFacts(metadata);
  const cast = metadata.cast.slice(0, MAX_CAST).join(', ');

  return (
    <Box flexDirection="column" paddingX={1} marginBottom={1}>
      <Text color={colors.primary} bold>
        {metadata.name}
      </Text>
      {facts && <Text color={colors.muted}>{facts}</Text>}
      {cast && (
        <Text color={colors.muted} wrap="truncate">
          With {cast}
        </Text>
      )}
      {metadata.summary && (
        <Box marginTop={1} width={width - 2}>
          <Text wrap="wrap">{truncateText(metadata.summary, (width - 2) * 3)}</Text>
        </Box>
      )}
    </Box>
  );
};

export default EntryDetails;
