#!/usr/bin/env node
/**
 * Marquee CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the TUI or the appropriate command implementation.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import { APP_NAME, VERSION } from '../shared/constants.js';
import { Services } from '../app/services.js';
import { getDataPaths, loadConfig } from '../core/config/index.js';
import { describeError, type AppConfig, type PartialAppConfig } from '../core/types.js';
import { configureLogging, flushLogs } from '../utils/logger.js';

// Import the main TUI App
import { App } from '../ui/App.js';

// Import command implementations
import { executeSearch } from './commands/search.js';
import { executeStreams } from './commands/streams.js';
import { executeTrackers } from './commands/trackers.js';
import { errorMessage, parseContentType, parseStreamTarget } from './utils/output.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ marquee [command] [options]

  Commands
    (none)                        Launch the interactive TUI
    search <query>                Search the catalog
    streams <type> <id>           List streams for a movie or an episode
    trackers                      Print the bootstrap tracker list

  Options
    --data-dir <path>             Directory for caches, session and downloads
    --player <command>            Media player executable (default: mpv)
    --season <n>, --episode <n>   Episode to look up (streams, series only)
    --verbose                     Log debug messages
    --version, -v                 Show version
    --help, -h                    Show help

  Examples
    $ marquee
    $ marquee search "the matrix"
    $ marquee streams movie tt0133093
    $ marquee streams series tt0903747 --season 1 --episode 2
    $ marquee trackers
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      dataDir: {
        type: 'string',
      },
      player: {
        type: 'string',
      },
      season: {
        type: 'number',
      },
      episode: {
        type: 'number',
      },
      verbose: {
        type: 'boolean',
        default: false,
      },
    },
  }
);

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">{APP_NAME} --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

// =============================================================================
// Setup
// =============================================================================

/**
 * Configuration overrides taken from flags
 */
function flagOverrides(): PartialAppConfig {
  const overrides: PartialAppConfig = {};
  if (cli.flags.dataDir) {
    overrides.dataDir = cli.flags.dataDir;
  }
  if (cli.flags.player) {
    overrides.player = { command: cli.flags.player };
  }
  if (cli.flags.verbose) {
    overrides.logging = { level: 'debug' };
  }
  return overrides;
}

/**
 * Loads configuration and points logging at the data directory.
 *
 * @param toConsole - Mirror log lines to stderr (commands only; the TUI owns the terminal)
 */
async function setup(toConsole: boolean): Promise<AppConfig> {
  const config = await loadConfig({ overrides: flagOverrides() });
  configureLogging({
    level: config.logging.level,
    file: getDataPaths(config).logFile,
    console: toConsole,
  });
  return config;
}

// =============================================================================
// Runners
// =============================================================================

/**
 * Launch the interactive TUI and tear services down once it exits.
 */
async function runTui(): Promise<number> {
  const config = await setup(false);
  const services = new Services({ config });
  await services.open();

  const instance = render(<App services={services} version={VERSION} />, {
    exitOnCtrlC: false,
  });

  try {
    await instance.waitUntilExit();
  } finally {
    instance.clear();
    await services.close();
  }
  return 0;
}

/**
 * Run a non-interactive command with the catalog side of the services only.
 */
async function runCommand(
  action: (services: Services, signal: AbortSignal) => Promise<unknown>
): Promise<number> {
  const config = await setup(true);
  const services = new Services({ config });
  await services.open({ engine: false });

  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once('SIGINT', interrupt);

  try {
    await action(services, controller.signal);
    return 0;
  } finally {
    process.off('SIGINT', interrupt);
    await services.close();
  }
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Route the command to the appropriate handler
 *
 * @returns Process exit code
 */
async function routeCommand(): Promise<number> {
  const [command, ...args] = cli.input;
  const flags = cli.flags;

  if (flags.version) {
    console.log(VERSION);
    return 0;
  }

  // No command provided - launch interactive TUI
  if (!command) {
    return runTui();
  }

  switch (command.toLowerCase()) {
    case 'search':
    case 's': {
      const query = args.join(' ');
      if (!query.trim()) {
        render(<ErrorDisplay message="Missing search query" />);
        return 1;
      }
      return runCommand((services, signal) =>
        executeSearch({ catalog: services.catalog, query, signal })
      );
    }

    case 'streams': {
      const [type, id] = args;
      if (!type || !id) {
        render(<ErrorDisplay message="Usage: marquee streams <movie|series> <id>" />);
        return 1;
      }
      const target = parseStreamTarget(parseContentType(type), id, flags.season, flags.episode);
      return runCommand((services, signal) =>
        executeStreams({ source: services.streams, target, signal })
      );
    }

    case 'trackers': {
      return runCommand((services) => executeTrackers({ trackers: services.trackers }));
    }

    default: {
      render(<ErrorDisplay message={`Unknown command: ${command}`} />);
      return 1;
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand()
  .catch((err: unknown) => {
    console.error(errorMessage(describeError(err)));
    return 1;
  })
  .then(async (code) => {
    await flushLogs();
    // Explicitly exit to ensure process terminates even if handles remain
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error(errorMessage(describeError(err)));
    process.exit(1);
  });
