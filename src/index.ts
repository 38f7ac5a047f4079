/**
 * Strategy Draft Gate
 *
 * Deterministic quality gate for generated trading-strategy drafts:
 * C1-C8 scoring, PASS/REVISE/REJECT verdicts, a bounded revision loop
 * and the export eligibility decision.
 */

export * from './models';
export * from './review-loop';
export * from './logging';

export {
  ErrorCode,
  ErrorCategory,
  getErrorCategory,
  getErrorMessage,
} from './errors/error-codes';
export { GateError, MalformedInputError, FatalIOError } from './errors/gate-error';

export {
  ConfigurationManager,
  ConfigurationError,
  OUTPUT_FORMATS,
  type OutputFormat,
  type GateConfiguration,
  type ConfigurationOverrides,
} from './config/configuration-manager';

export {
  loadDrafts,
  loadDraftFile,
  parseDraftDocument,
  parseDraftText,
  serializeDraft,
  type DraftInput,
  type FailedLoad,
  type InputSource,
  type LoadResult,
} from './input/draft-loader';

export {
  buildReviewDocument,
  buildMarkdownSummary,
  serializeReviewDocument,
  writeReviewOutputs,
  type ReviewDocument,
  type ReportReview,
  type ReviewSummary,
} from './output/review-report';

export { runGate, resolveConfiguration, type GateRunOptions, type GateRunResult } from './core/gate-runner';
export { CLI, CLIError, parseArgs, validateArgs } from './cli/cli-interface';
