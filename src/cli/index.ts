#!/usr/bin/env node
/**
 * RPS Export - CLI Entry Point
 * ============================
 * One-shot export of session JSON files to a flat CSV table
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { ConfigManager, ConfigOverrides, isSchemaVersion } from '../core/config';
import { ConfigError, EXIT_CODES, FileSystemError } from '../core/errors';
import { runExport, ExportResult } from '../data/exporter';
import { LogLevel, Logger, initLogger } from '../utils/logger';
import { SCHEMA_VERSIONS, SchemaVersion } from '../types';

export type CliOptions = {
  config?: string;
  schema?: SchemaVersion;
  input?: string;
  experiment?: string;
  output?: string;
  expectedRounds?: number;
  logLevel?: LogLevel;
};

export const USAGE_EXIT_CODE = 1;

// ============================================================================
// ARGUMENT PARSERS
// ============================================================================

function parseSchema(value: string): SchemaVersion {
  if (!isSchemaVersion(value)) {
    throw new InvalidArgumentError(`Expected one of ${SCHEMA_VERSIONS.join(', ')}.`);
  }
  return value;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (value !== 'debug' && value !== 'info' && value !== 'warn' && value !== 'error') {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  }
  return value;
}

export function createProgram(): Command {
  return new Command()
    .name('rps-export')
    .description('Flatten RPS session JSON files into a per-player CSV table')
    .option('-c, --config <path>', 'JSON configuration file')
    .option('-s, --schema <version>', `schema version (${SCHEMA_VERSIONS.join(', ')})`, parseSchema)
    .option('-i, --input <dir>', 'directory of session JSON files')
    .option('-e, --experiment <id>', 'experiment id, names the output file')
    .option('-o, --output <path>', 'output CSV path (default <experiment>_data.csv)')
    .option('--expected-rounds <n>', 'round count of a complete game', parsePositiveInt)
    .option('--log-level <level>', 'debug, info, warn or error', parseLogLevel);
}

// ============================================================================
// CONFIG ASSEMBLY
// ============================================================================

/**
 * Build the run configuration: defaults, then the config file, then flags
 */
export function buildConfig(options: CliOptions): ConfigManager {
  const manager = new ConfigManager(options.config);

  const overrides: ConfigOverrides = {};
  if (options.schema !== undefined) overrides.schemaVersion = options.schema;
  if (options.input !== undefined) overrides.inputDir = options.input;
  if (options.experiment !== undefined) overrides.experiment = options.experiment;
  if (options.output !== undefined) overrides.outputPath = options.output;
  if (options.expectedRounds !== undefined) overrides.expectedRounds = options.expectedRounds;
  if (options.logLevel !== undefined) overrides.logging = { level: options.logLevel };

  manager.updateConfig(overrides);
  return manager;
}

export function exitCodeFor(result: ExportResult): number {
  return result.ok ? 0 : EXIT_CODES[result.error.kind];
}

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Run the CLI and return the process exit code
 */
export function main(argv: string[] = process.argv): number {
  const program = createProgram().exitOverride();

  try {
    program.parse(argv);
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    return error.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
  }

  const options = program.opts<CliOptions>();

  let manager: ConfigManager;
  try {
    manager = buildConfig(options);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    initLogger({ level: 'error' }).error(error.message);
    return EXIT_CODES.config;
  }

  const logConfig = manager.getLoggingConfig();
  let logger: Logger;
  try {
    logger = initLogger({
      level: logConfig.level,
      console: logConfig.console,
      file: logConfig.file,
      filePath: logConfig.filePath,
    });
  } catch (error) {
    if (!(error instanceof FileSystemError)) throw error;
    initLogger({ level: 'error' }).error(error.message);
    return EXIT_CODES.filesystem;
  }

  const result = runExport(manager, { logger });
  if (result.ok && result.summary.incompleteSessions.length > 0) {
    logger.warn(`${result.summary.incompleteSessions.length} incomplete sessions`, result.summary.incompleteSessions);
  }
  logger.close();

  return exitCodeFor(result);
}

// Run if executed directly
if (require.main === module) {
  process.exitCode = main();
}
