import React from 'react';
import { Box, Text } from 'ink';
import { colors, symbols } from '../theme/index.js';

/**
 * ASCII art logo for MARQUEE
 */
const LOGO_LINES = [
  '█▀▄▀█ ▄▀█ █▀█ █▀█ █ █ █▀▀ █▀▀',
  '█ ▀ █ █▀█ █▀▄ ▀▀█ █▄█ ██▄ ██▄',
];

export interface HeaderProps {
  /** Version shown beside the logo */
  version?: string;
  /** Breadcrumb of the current view, e.g. "Breaking Bad / S01E02" */
  location?: string;
}

/**
 * Header component for the Marquee TUI
 *
 * Left-aligned logo with the version and where the user currently is.
 */
export const Header: React.FC<HeaderProps> = ({ version, location }) => {
  return (
    <Box flexDirection="row" marginBottom={1} gap={2}>
      <Box flexDirection="column">
        {LOGO_LINES.map((line, index) => (
          <Text key={index} color={colors.primary}>
            {line}
          </Text>
        ))}
      </Box>

      <Box flexDirection="column" justifyContent="flex-end">
        {version && <Text color={colors.dim}>v{version}</Text>}
        {location && (
          <Text color={colors.muted}>
            {symbols.selected} {location}
          </Text>
        )}
      </Box>
    </Box>
  );
};

export default Header;
