#!/usr/bin/env node
/**
 * Print one level of an overmap tile as text.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { createConfig, OMT_SIZE, type MapperConfig } from './lib/core/config.js';
import { combineLoggers, createConsoleLogger, createFileLogger, type Logger } from './lib/core/logger.js';
import { GameData } from './lib/game-data.js';
import { decodeLayers } from './lib/overmap/decoder.js';
import { readTileFile, TileFileError } from './lib/overmap/tile-file.js';
import { isSymbolFailure, resolveSymbols } from './lib/overmap/symbols.js';
import { Z_MAX, Z_MIN, type OvermapTile } from './lib/overmap/overmap-tile.js';
import { projectLevel } from './lib/projector/project.js';
import { renderText } from './lib/renderer/text.js';

export const USAGE = `Usage: overmap-glyphs <tile-file> --game <path> [options]

Options:
  -g, --game <path>   Game directory, or its data/json directory
  -z, --z <level>     Vertical level to print (${Z_MIN}..${Z_MAX}, default 0)
  -s, --size <n>      Tile side length (default ${OMT_SIZE})
  -d, --debug         Show debug messages
  -q, --quiet         Only show errors
  -l, --log-file <p>  Also append log messages to a file
  -h, --help          Show this help`;

export interface CliOptions {
  readonly tileFile: string;
  readonly gamePath: string;
  readonly z: number;
  readonly logFile: string | undefined;
  readonly config: MapperConfig;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseInteger(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`--${flag} expects an integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        game: { type: 'string', short: 'g' },
        z: { type: 'string', short: 'z' },
        size: { type: 'string', short: 's' },
        debug: { type: 'boolean', short: 'd' },
        quiet: { type: 'boolean', short: 'q' },
        'log-file': { type: 'string', short: 'l' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse command line arguments.
 *
 * @returns The options, or 'help' when help was requested
 * @throws UsageError on missing or malformed arguments
 */
export function parseCliArgs(argv: string[]): CliOptions | 'help' {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return 'help';
  }
  if (positionals.length !== 1) {
    throw new UsageError('expected exactly one tile file');
  }
  if (values.game === undefined) {
    throw new UsageError('--game is required');
  }

  const z = parseInteger('z', values.z, 0);
  if (z < Z_MIN || z > Z_MAX) {
    throw new UsageError(`--z must be between ${Z_MIN} and ${Z_MAX}, got ${z}`);
  }

  let config: MapperConfig;
  try {
    config = createConfig({
      tileSize: parseInteger('size', values.size, OMT_SIZE),
      logLevel: values.debug ? 'debug' : values.quiet ? 'error' : 'info',
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  return { tileFile: positionals[0], gamePath: values.game, z, logFile: values['log-file'], config };
}

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const processIo: CliIo = {
  out: text => process.stdout.write(text + '\n'),
  err: text => process.stderr.write(text + '\n'),
};

/**
 * Console logger, plus a file logger at the same level when `--log-file` was
 * given. A log file that cannot be opened is reported and skipped.
 */
function createCliLogger(options: CliOptions): Logger {
  const consoleLogger = createConsoleLogger(options.config.logLevel);
  if (options.logFile === undefined) {
    return consoleLogger;
  }
  try {
    return combineLoggers(consoleLogger, createFileLogger(options.logFile, { level: options.config.logLevel }));
  } catch (error) {
    consoleLogger.warn(`failed to open log file ${options.logFile}: ${error instanceof Error ? error.message : String(error)}`);
    return consoleLogger;
  }
}

/**
 * Run the CLI.
 *
 * @returns Process exit code
 */
export function main(argv: string[], io: CliIo = processIo): number {
  let options: CliOptions | 'help';
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`error: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }
  if (options === 'help') {
    io.out(USAGE);
    return 0;
  }

  const logger = createCliLogger(options);
  const gameData = GameData.load(options.gamePath, options.config, logger);

  let tile: OvermapTile;
  try {
    const file = readTileFile(options.tileFile);
    tile = decodeLayers(file.layers, { size: options.config.tileSize, logger });
  } catch (error) {
    if (error instanceof TileFileError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const result = resolveSymbols(tile, gameData.store, logger);
  if (isSymbolFailure(result)) {
    logger.error(`cannot resolve symbols: ${result.details}`);
    return 1;
  }
  if (result.unmatched > 0) {
    logger.info(`${result.unmatched} cells matched no overmap terrain`);
  }

  io.out(renderText(projectLevel(result.tile, options.z, logger)));
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = main(process.argv.slice(2));
}
