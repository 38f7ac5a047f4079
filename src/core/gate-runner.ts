/**
 * Gate Runner
 *
 * Responsible for:
 * - Resolving configuration (file, defaults, command line overrides)
 * - Loading the draft batch
 * - Running the review loop and bridging its events to the logger
 * - Writing the review outputs
 */

import {
  ConfigurationManager,
  type ConfigurationOverrides,
  type GateConfiguration,
} from '../config/configuration-manager';
import { loadDrafts, type DraftInput, type LoadResult } from '../input/draft-loader';
import { GateLogger } from '../logging/gate-logger';
import { buildReviewDocument, writeReviewOutputs, type ReviewDocument } from '../output/review-report';
import {
  ReviewLoopController,
  type ReviewLoopEventCallback,
  type ReviewLoopOutcome,
} from '../review-loop/review-loop';
import { isStringArray } from '../utils/value-guards';

export const DEFAULT_OUTPUT_DIR = 'reports';

export interface GateRunOptions {
  input: DraftInput;
  outputDir: string;
  config: GateConfiguration;
  logger?: GateLogger;
  runId?: string;
  now?: Date;
}

export interface GateRunResult {
  document: ReviewDocument;
  outcome: ReviewLoopOutcome;
  written: string[];
}

/**
 * Load the configuration file (or defaults) and apply overrides
 */
export function resolveConfiguration(
  configPath: string | undefined,
  overrides: ConfigurationOverrides = {},
  cwd?: string
): GateConfiguration {
  const manager = new ConfigurationManager({ cwd });
  return manager.applyOverrides(manager.loadConfiguration(configPath), overrides);
}

/**
 * Translate review loop events into log entries
 */
export function createLoopEventBridge(logger: GateLogger): ReviewLoopEventCallback {
  return (eventType, content) => {
    const draftId = typeof content.draft_id === 'string' ? content.draft_id : '';
    const iteration = typeof content.iteration === 'number' ? content.iteration : 0;
    const kinds = isStringArray(content.kinds) ? content.kinds : [];

    switch (eventType) {
      case 'DRAFT_REVIEWED': {
        const confidence = typeof content.confidence_score === 'number' ? content.confidence_score : 0;
        logger.logEvaluation(draftId, iteration, confidence);
        logger.logVerdict(draftId, String(content.verdict), iteration);
        break;
      }
      case 'REVISION_APPLIED':
        logger.logRevision(draftId, true, kinds);
        break;
      case 'REVISION_SKIPPED':
        logger.logRevision(draftId, false, kinds);
        break;
      case 'DRAFT_DOWNGRADED':
        logger.logDowngrade(draftId, String(content.variant));
        break;
      default:
        logger.log('debug', 'EVALUATION', eventType, { details: content });
    }
  };
}

function logLoadResult(logger: GateLogger, loaded: LoadResult): void {
  for (const parsed of loaded.drafts) {
    const defaulted = parsed.kind === 'partial_with_defaults' ? parsed.defaulted_fields : [];
    logger.logDraftLoaded(parsed.draft.draft_id, parsed.source?.file ?? '(inline)', defaulted);
  }
  for (const failed of loaded.failed_loads) {
    logger.logFailedLoad(failed.file, failed.code, failed.reason);
  }
  if (loaded.drafts.length === 0) {
    const inputPath = loaded.source.drafts_dir ?? loaded.source.draft_path ?? '';
    logger.log('warn', 'LOAD', `No reviewable drafts found in ${inputPath}`);
  }
}

/**
 * Run the gate end to end
 * @throws GateError on any fatal condition (input, output, invariant)
 */
export function runGate(options: GateRunOptions): GateRunResult {
  const logger = options.logger ?? new GateLogger();
  const { config } = options;

  logger.logConfig(config.source, {
    max_review_iterations: config.review_loop.max_review_iterations,
    strict_export: config.review_loop.strict_export,
    format: config.output.format,
  });

  const loaded = loadDrafts(options.input);
  logLoadResult(logger, loaded);

  const controller = new ReviewLoopController(config.review_loop, createLoopEventBridge(logger));
  const outcome = controller.run(loaded.drafts);

  for (const { review } of outcome.reviews) {
    logger.logExport(review.draft_id, review.export_eligible);
  }

  const document = buildReviewDocument(outcome, loaded.source, loaded.failed_loads, {
    max_review_iterations: config.review_loop.max_review_iterations,
    runId: options.runId,
    now: options.now,
  });

  const written = writeReviewOutputs(document, {
    outputDir: options.outputDir,
    format: config.output.format,
    markdownSummary: config.output.markdown_summary,
    revisedDrafts: config.output.write_revised_drafts ? outcome.reviews : undefined,
  });
  for (const filePath of written) {
    logger.logOutput(filePath);
  }

  return { document, outcome, written };
}
