/**
 * CLI Interface for the Strategy Draft Gate
 */

import * as fs from 'fs';
import * as path from 'path';
import { isOutputFormat, type ConfigurationOverrides } from '../config/configuration-manager';
import { DEFAULT_OUTPUT_DIR, resolveConfiguration, runGate } from '../core/gate-runner';
import { ErrorCode } from '../errors/error-codes';
import { GateError } from '../errors/gate-error';
import type { DraftInput } from '../input/draft-loader';
import { ConsoleLogSubscriber, GateLogger } from '../logging/gate-logger';
import type { ReviewDocument } from '../output/review-report';
import { isRecord } from '../utils/value-guards';

/**
 * CLI Error class
 */
export class CLIError extends GateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.E204_INVALID_ARGUMENTS, message, details);
    this.name = 'CLIError';
  }
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  draftsDir?: string;
  draftPath?: string;
  outputDir?: string;
  format?: string;
  markdownSummary?: boolean;
  strictExport?: boolean;
  maxReviewIterations?: number;
  writeRevisedDrafts?: boolean;
  configPath?: string;
  verbose?: boolean;
  quiet?: boolean;
  help?: boolean;
  version?: boolean;
}

export interface CLIOptions {
  cwd?: string;
  /** Result lines (default: console.log) */
  stdout?: (line: string) => void;
  /** Log and error lines (default: console.error) */
  stderr?: (line: string) => void;
}

export const HELP_TEXT = `
Strategy Draft Gate - CLI

Usage:
  draft-gate --drafts-dir <dir> [options]
  draft-gate --draft <file> [options]

Input (exactly one):
  --drafts-dir <dir>              Directory of draft .yaml/.yml/.json files
  --draft <file>                  A single draft file

Options:
  --output-dir <dir>              Output directory (default: reports)
  --format <yaml|json>            Review document format (default: yaml)
  --markdown-summary              Also write review_summary.md
  --strict-export                 Send export-eligible PASS drafts with warnings back to REVISE
  --max-review-iterations <n>     Review iteration budget, 1-10 (default: 2)
  --write-revised-drafts          Write the final state of every draft to <output-dir>/drafts
  --config <path>                 Configuration file (default: config/draft-gate.yaml if present)
  --verbose                       Log at debug level
  --quiet                         Log errors only
  -h, --help                      Show this help
  -v, --version                   Show version

Exit status:
  0  review document written
  1  input, configuration or output error
`;

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CLIError(`${flag} requires a value`, { flag });
  }
  return value;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};
  let i = 0;

  while (i < args.length) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--drafts-dir') {
      result.draftsDir = requireValue(args, ++i, arg);
    } else if (arg === '--draft') {
      result.draftPath = requireValue(args, ++i, arg);
    } else if (arg === '--output-dir') {
      result.outputDir = requireValue(args, ++i, arg);
    } else if (arg === '--format') {
      result.format = requireValue(args, ++i, arg);
    } else if (arg === '--config') {
      result.configPath = requireValue(args, ++i, arg);
    } else if (arg === '--max-review-iterations') {
      const raw = requireValue(args, ++i, arg);
      if (!/^-?\d+$/.test(raw)) {
        throw new CLIError(`--max-review-iterations must be an integer, got '${raw}'`, { value: raw });
      }
      result.maxReviewIterations = parseInt(raw, 10);
    } else if (arg === '--markdown-summary') {
      result.markdownSummary = true;
    } else if (arg === '--strict-export') {
      result.strictExport = true;
    } else if (arg === '--write-revised-drafts') {
      result.writeRevisedDrafts = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else {
      throw new CLIError(`Unknown argument: ${arg}. Use --help for usage information.`, { argument: arg });
    }

    i++;
  }

  return result;
}

/**
 * Validate parsed arguments
 */
export function validateArgs(args: ParsedArgs): ParsedArgs {
  if (args.help || args.version) {
    return args;
  }

  const hasDir = args.draftsDir !== undefined;
  const hasFile = args.draftPath !== undefined;
  if (hasDir === hasFile) {
    throw new CLIError('Exactly one of --drafts-dir or --draft is required');
  }

  if (args.verbose && args.quiet) {
    throw new CLIError('--verbose and --quiet cannot be combined');
  }

  if (args.format !== undefined && !isOutputFormat(args.format)) {
    throw new CLIError(`--format must be yaml or json, got '${args.format}'`, { format: args.format });
  }

  return args;
}

/**
 * Map parsed arguments onto configuration overrides
 */
export function toOverrides(args: ParsedArgs): ConfigurationOverrides {
  const overrides: ConfigurationOverrides = {};
  if (args.maxReviewIterations !== undefined) overrides.max_review_iterations = args.maxReviewIterations;
  if (args.strictExport) overrides.strict_export = true;
  if (args.format !== undefined && isOutputFormat(args.format)) overrides.format = args.format;
  if (args.markdownSummary) overrides.markdown_summary = true;
  if (args.writeRevisedDrafts) overrides.write_revised_drafts = true;
  if (args.verbose) overrides.log_level = 'debug';
  if (args.quiet) overrides.log_level = 'error';
  return overrides;
}

/**
 * Version from package.json, whether running from sources or from dist
 */
export function readVersion(): string {
  const candidates = [
    path.join(__dirname, '..', '..', 'package.json'),
    path.join(__dirname, '..', '..', '..', 'package.json'),
  ];
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
    if (isRecord(parsed) && typeof parsed.version === 'string') {
      return parsed.version;
    }
  }
  return '0.0.0';
}

export function formatRunSummary(document: ReviewDocument, reviewPath: string): string {
  const { summary } = document;
  return (
    `[OK] Reviewed ${summary.total} drafts: ` +
    `PASS=${summary.PASS} REVISE=${summary.REVISE} REJECT=${summary.REJECT} ` +
    `export_eligible=${summary.export_eligible} failed_loads=${summary.failed_loads} -> ${reviewPath}`
  );
}

/**
 * CLI class
 */
export class CLI {
  private readonly cwd: string;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: CLIOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.stdout = options.stdout ?? (line => console.log(line));
    this.stderr = options.stderr ?? (line => console.error(line));
  }

  /**
   * Run the gate with the given arguments
   * @returns Process exit status
   */
  run(argv: string[]): number {
    try {
      const args = validateArgs(parseArgs(argv));

      if (args.help) {
        this.stdout(HELP_TEXT);
        return 0;
      }
      if (args.version) {
        this.stdout(readVersion());
        return 0;
      }

      const config = resolveConfiguration(args.configPath, toOverrides(args), this.cwd);

      const logger = new GateLogger();
      logger.subscribe(new ConsoleLogSubscriber({ minLevel: config.logging.level, write: this.stderr }));

      const input: DraftInput =
        args.draftsDir !== undefined
          ? { draftsDir: path.resolve(this.cwd, args.draftsDir) }
          : { draftPath: path.resolve(this.cwd, args.draftPath ?? '') };

      const result = runGate({
        input,
        outputDir: path.resolve(this.cwd, args.outputDir ?? DEFAULT_OUTPUT_DIR),
        config,
        logger,
      });

      this.stdout(formatRunSummary(result.document, result.written[0] ?? ''));
      return 0;
    } catch (error) {
      if (error instanceof GateError) {
        this.stderr(`[draft-gate] ${error.message}`);
        return 1;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.stderr(`[draft-gate] Fatal error: ${message}`);
      return 1;
    }
  }
}
