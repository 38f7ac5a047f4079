/**
 * Configuration Manager
 *
 * Responsible for:
 * - Locating and loading the optional draft-gate.yaml
 * - Enforcing the configuration schema
 * - Applying default values and command line overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { GateError } from '../errors/gate-error';
import { isLogLevel, LOG_LEVELS, type GateLogLevel } from '../logging/gate-logger';
import { describeType, isRecord } from '../utils/value-guards';

export type OutputFormat = 'yaml' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['yaml', 'json'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some(format => format === value);
}

export interface ReviewLoopSettings {
  max_review_iterations: number;
  strict_export: boolean;
}

export interface OutputSettings {
  format: OutputFormat;
  markdown_summary: boolean;
  write_revised_drafts: boolean;
}

export interface LoggingSettings {
  level: GateLogLevel;
}

/**
 * Full configuration structure
 */
export interface GateConfiguration {
  review_loop: ReviewLoopSettings;
  output: OutputSettings;
  logging: LoggingSettings;
  /** Path the configuration was read from, or 'defaults' */
  source: string;
}

/**
 * Command line values that take precedence over the file
 */
export interface ConfigurationOverrides {
  max_review_iterations?: number;
  strict_export?: boolean;
  format?: OutputFormat;
  markdown_summary?: boolean;
  write_revised_drafts?: boolean;
  log_level?: GateLogLevel;
}

/**
 * Configuration error
 */
export class ConfigurationError extends GateError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_CONFIG_RELATIVE_PATH = path.join('config', 'draft-gate.yaml');

/**
 * Default configuration values
 */
const DEFAULTS = {
  review_loop: {
    max_review_iterations: 2,
    strict_export: false,
  },
  output: {
    format: 'yaml',
    markdown_summary: false,
    write_revised_drafts: false,
  },
  logging: {
    level: 'info',
  },
} as const;

/**
 * Validation ranges
 */
const RANGES = {
  review_loop: {
    max_review_iterations: { min: 1, max: 10 },
  },
} as const;

function schemaError(field: string, message: string, value: unknown): ConfigurationError {
  return new ConfigurationError(
    ErrorCode.E203_CONFIG_SCHEMA_VALIDATION_FAILURE,
    `${field} ${message}`,
    { field, value }
  );
}

function readSection(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = raw[name];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw schemaError(name, `must be a mapping, got ${describeType(section)}`, section);
  }
  return section;
}

function readBoolean(section: Record<string, unknown>, field: string, fallback: boolean): boolean {
  const value = section[field];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw schemaError(field, `must be a boolean, got ${describeType(value)}`, value);
  }
  return value;
}

/**
 * Configuration Manager class
 */
export class ConfigurationManager {
  private readonly cwd: string;

  constructor(options: { cwd?: string } = {}) {
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Load configuration from an explicit path, the default location, or
   * built-in defaults
   * @throws ConfigurationError if the file is missing, malformed or invalid
   */
  loadConfiguration(configPath?: string): GateConfiguration {
    if (configPath !== undefined) {
      const resolved = path.resolve(this.cwd, configPath);
      if (!fs.existsSync(resolved)) {
        throw new ConfigurationError(
          ErrorCode.E201_CONFIG_FILE_NOT_FOUND,
          resolved,
          { configPath: resolved }
        );
      }
      return this.buildConfiguration(this.loadYaml(resolved), resolved);
    }

    const defaultPath = path.join(this.cwd, DEFAULT_CONFIG_RELATIVE_PATH);
    if (fs.existsSync(defaultPath)) {
      return this.buildConfiguration(this.loadYaml(defaultPath), defaultPath);
    }

    return this.buildConfiguration({}, 'defaults');
  }

  /**
   * Apply command line overrides on top of a loaded configuration
   */
  applyOverrides(config: GateConfiguration, overrides: ConfigurationOverrides): GateConfiguration {
    const merged: GateConfiguration = {
      ...config,
      review_loop: {
        max_review_iterations: overrides.max_review_iterations ?? config.review_loop.max_review_iterations,
        strict_export: overrides.strict_export ?? config.review_loop.strict_export,
      },
      output: {
        format: overrides.format ?? config.output.format,
        markdown_summary: overrides.markdown_summary ?? config.output.markdown_summary,
        write_revised_drafts: overrides.write_revised_drafts ?? config.output.write_revised_drafts,
      },
      logging: {
        level: overrides.log_level ?? config.logging.level,
      },
    };

    this.validateIterationBudget(merged.review_loop.max_review_iterations);
    return merged;
  }

  /**
   * Load and parse a YAML configuration file
   */
  private loadYaml(configPath: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        ErrorCode.E202_CONFIG_PARSE_FAILURE,
        `${configPath}: ${message}`,
        { configPath, parseError: message }
      );
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw schemaError('(root)', `must be a mapping, got ${describeType(parsed)}`, parsed);
    }
    return parsed;
  }

  /**
   * Build and validate configuration
   */
  private buildConfiguration(raw: Record<string, unknown>, source: string): GateConfiguration {
    const reviewLoop = readSection(raw, 'review_loop');
    const output = readSection(raw, 'output');
    const logging = readSection(raw, 'logging');

    const maxIterations = reviewLoop.max_review_iterations ?? DEFAULTS.review_loop.max_review_iterations;
    if (typeof maxIterations !== 'number') {
      throw schemaError(
        'max_review_iterations',
        `must be an integer, got ${describeType(maxIterations)}`,
        maxIterations
      );
    }
    this.validateIterationBudget(maxIterations);

    const format = output.format ?? DEFAULTS.output.format;
    if (!isOutputFormat(format)) {
      throw schemaError('format', `must be one of ${OUTPUT_FORMATS.join(', ')}`, format);
    }

    const level = logging.level ?? DEFAULTS.logging.level;
    if (!isLogLevel(level)) {
      throw schemaError('level', `must be one of ${LOG_LEVELS.join(', ')}`, level);
    }

    return {
      review_loop: {
        max_review_iterations: maxIterations,
        strict_export: readBoolean(reviewLoop, 'strict_export', DEFAULTS.review_loop.strict_export),
      },
      output: {
        format,
        markdown_summary: readBoolean(output, 'markdown_summary', DEFAULTS.output.markdown_summary),
        write_revised_drafts: readBoolean(output, 'write_revised_drafts', DEFAULTS.output.write_revised_drafts),
      },
      logging: { level },
      source,
    };
  }

  /**
   * Validate the iteration budget is an integer within range
   */
  private validateIterationBudget(value: number): void {
    const range = RANGES.review_loop.max_review_iterations;
    if (!Number.isInteger(value) || value < range.min || value > range.max) {
      throw schemaError(
        'max_review_iterations',
        `must be an integer between ${range.min} and ${range.max}, got ${value}`,
        value
      );
    }
  }

  getDefaults(): GateConfiguration {
    return this.buildConfiguration({}, 'defaults');
  }

  getRanges(): typeof RANGES {
    return RANGES;
  }
}
