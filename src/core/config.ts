/**
 * RPS Export - Configuration Manager
 * ==================================
 * Loads, merges and validates the export run configuration
 */

import * as fs from 'fs';
import * as path from 'path';
import { SCHEMA_VERSIONS, SchemaVersion } from '../types';
import { DEFAULT_EXCLUSION_MARKERS } from '../data/scanner';
import { ConfigError } from './errors';

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  console: boolean;
  file: boolean;
  filePath: string;
}

export interface ExportConfig {
  /** Identifier used to name the output file */
  experiment: string;
  schemaVersion: SchemaVersion;
  inputDir: string;
  /** Defaults to `<experiment>_data.csv` in the working directory */
  outputPath: string | null;
  exclusionMarkers: string[];
  /** Round count of a complete game, null to skip the check */
  expectedRounds: number | null;
  logging: LoggingConfig;
}

export type ConfigOverrides = Partial<Omit<ExportConfig, 'logging'>> & {
  logging?: Partial<LoggingConfig>;
};

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  experiment: 'rps_v3',
  schemaVersion: 'v3',
  inputDir: './data/v3',
  outputPath: null,
  exclusionMarkers: [...DEFAULT_EXCLUSION_MARKERS],
  expectedRounds: null,
  logging: {
    level: 'info',
    console: true,
    file: false,
    filePath: './logs/export.log',
  },
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'];

export function isSchemaVersion(value: unknown): value is SchemaVersion {
  return typeof value === 'string' && SCHEMA_VERSIONS.some(v => v === value);
}

// ============================================================================
// CONFIG MANAGER CLASS
// ============================================================================

export class ConfigManager {
  private config: ExportConfig;
  private configPath: string | null = null;

  constructor(configPath?: string) {
    this.config = this.mergeConfig(DEFAULT_EXPORT_CONFIG, {});

    if (configPath) {
      this.loadFromFile(configPath);
    }
  }

  /**
   * Load configuration from a JSON file
   */
  loadFromFile(filePath: string): void {
    const absolutePath = path.resolve(filePath);

    let loaded: unknown;
    try {
      loaded = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigError([`cannot load ${absolutePath}: ${detail}`]);
    }

    this.config = this.mergeConfig(DEFAULT_EXPORT_CONFIG, this.readOverrides(loaded, absolutePath));
    this.configPath = absolutePath;
  }

  /**
   * Merge overrides over a base config
   */
  private mergeConfig(base: ExportConfig, override: ConfigOverrides): ExportConfig {
    return {
      experiment: override.experiment ?? base.experiment,
      schemaVersion: override.schemaVersion ?? base.schemaVersion,
      inputDir: override.inputDir ?? base.inputDir,
      outputPath: override.outputPath !== undefined ? override.outputPath : base.outputPath,
      exclusionMarkers: [...(override.exclusionMarkers ?? base.exclusionMarkers)],
      expectedRounds: override.expectedRounds !== undefined ? override.expectedRounds : base.expectedRounds,
      logging: { ...base.logging, ...override.logging },
    };
  }

  /**
   * Pick the known keys out of a parsed config file, checking their types
   */
  private readOverrides(loaded: unknown, source: string): ConfigOverrides {
    if (typeof loaded !== 'object' || loaded === null || Array.isArray(loaded)) {
      throw new ConfigError([`${source} does not contain a JSON object`]);
    }

    const raw = new Map<string, unknown>(Object.entries(loaded));
    const errors: string[] = [];
    const overrides: ConfigOverrides = {};

    const experiment = raw.get('experiment');
    if (experiment !== undefined) {
      if (typeof experiment === 'string') overrides.experiment = experiment;
      else errors.push('experiment must be a string');
    }

    const schemaVersion = raw.get('schemaVersion');
    if (schemaVersion !== undefined) {
      if (isSchemaVersion(schemaVersion)) overrides.schemaVersion = schemaVersion;
      else errors.push(`schemaVersion must be one of ${SCHEMA_VERSIONS.join(', ')}`);
    }

    const inputDir = raw.get('inputDir');
    if (inputDir !== undefined) {
      if (typeof inputDir === 'string') overrides.inputDir = inputDir;
      else errors.push('inputDir must be a string');
    }

    const outputPath = raw.get('outputPath');
    if (outputPath !== undefined) {
      if (outputPath === null || typeof outputPath === 'string') overrides.outputPath = outputPath;
      else errors.push('outputPath must be a string or null');
    }

    const markers = raw.get('exclusionMarkers');
    if (markers !== undefined) {
      if (Array.isArray(markers) && markers.every((m): m is string => typeof m === 'string')) {
        overrides.exclusionMarkers = markers;
      } else {
        errors.push('exclusionMarkers must be an array of strings');
      }
    }

    const expectedRounds = raw.get('expectedRounds');
    if (expectedRounds !== undefined) {
      if (expectedRounds === null || typeof expectedRounds === 'number') overrides.expectedRounds = expectedRounds;
      else errors.push('expectedRounds must be a number or null');
    }

    const logging = raw.get('logging');
    if (logging !== undefined) {
      if (typeof logging === 'object' && logging !== null && !Array.isArray(logging)) {
        overrides.logging = this.readLoggingOverrides(new Map<string, unknown>(Object.entries(logging)), errors);
      } else {
        errors.push('logging must be an object');
      }
    }

    if (errors.length > 0) {
      throw new ConfigError(errors.map(e => `${source}: ${e}`));
    }
    return overrides;
  }

  private readLoggingOverrides(raw: Map<string, unknown>, errors: string[]): Partial<LoggingConfig> {
    const logging: Partial<LoggingConfig> = {};

    const level = raw.get('level');
    if (level !== undefined) {
      if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') logging.level = level;
      else errors.push(`logging.level must be one of ${LOG_LEVELS.join(', ')}`);
    }

    for (const key of ['console', 'file'] as const) {
      const value = raw.get(key);
      if (value === undefined) continue;
      if (typeof value === 'boolean') logging[key] = value;
      else errors.push(`logging.${key} must be a boolean`);
    }

    const filePath = raw.get('filePath');
    if (filePath !== undefined) {
      if (typeof filePath === 'string') logging.filePath = filePath;
      else errors.push('logging.filePath must be a string');
    }

    return logging;
  }

  /**
   * Get the full configuration
   */
  getConfig(): ExportConfig {
    return this.mergeConfig(this.config, {});
  }

  /**
   * Get logging config
   */
  getLoggingConfig(): LoggingConfig {
    return { ...this.config.logging };
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Apply overrides, e.g. from command-line flags
   */
  updateConfig(updates: ConfigOverrides): void {
    this.config = this.mergeConfig(this.config, updates);
  }

  /**
   * Output file path, absolute
   */
  resolveOutputPath(cwd: string = process.cwd()): string {
    const target = this.config.outputPath ?? `${this.config.experiment}_data.csv`;
    return path.resolve(cwd, target);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const cfg = this.config;

    if (cfg.experiment.trim() === '') {
      errors.push('experiment must not be empty');
    } else if (/[\\/]/.test(cfg.experiment)) {
      errors.push('experiment must not contain path separators');
    }
    if (!isSchemaVersion(cfg.schemaVersion)) {
      errors.push(`schemaVersion must be one of ${SCHEMA_VERSIONS.join(', ')}`);
    }
    if (cfg.inputDir.trim() === '') {
      errors.push('inputDir must not be empty');
    }
    if (cfg.outputPath !== null && cfg.outputPath.trim() === '') {
      errors.push('outputPath must not be empty');
    }
    if (cfg.exclusionMarkers.some(m => m === '')) {
      errors.push('exclusionMarkers must not contain empty strings');
    }
    if (cfg.expectedRounds !== null && (!Number.isInteger(cfg.expectedRounds) || cfg.expectedRounds <= 0)) {
      errors.push('expectedRounds must be a positive integer');
    }

    return { valid: errors.length === 0, errors };
  }
}
