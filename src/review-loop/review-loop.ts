/**
 * Review Loop Implementation
 *
 * Evaluate -> Verdict -> Revise over a batch of drafts, bounded by
 * max_review_iterations. The loop is a fold over BatchRunState: every
 * iteration takes the previous state and returns a new one.
 *
 * - PASS and REJECT are terminal and leave the loop for good
 * - REVISE drafts are revised and re-enter evaluation next iteration
 * - Drafts still at REVISE when the budget runs out are downgraded to
 *   research_probe and can never be exported
 * - All REVIEW_* events are reported through the event callback
 */

import { ErrorCode } from '../errors/error-codes';
import { GateError } from '../errors/gate-error';
import { getDefaultedFields, type ParsedDraft, type StrategyDraft } from '../models/draft';
import type { ReviewResult } from '../models/review';
import { evaluateDraft } from './criteria';
import { isExportEligible } from './export-eligibility';
import { applyRevisions } from './revision-applier';
import { buildRevisionInstructions, classify, hasWarning, type VerdictResult } from './verdict-engine';

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface ReviewLoopConfig {
  /** Maximum number of Evaluate/Revise iterations (default: 2) */
  max_review_iterations: number;
  /** Demote an export-eligible PASS that still carries warnings (default: false) */
  strict_export: boolean;
}

export type ReviewLoopEventType =
  | 'REVIEW_LOOP_START'
  | 'REVIEW_ITERATION_START'
  | 'DRAFT_REVIEWED'
  | 'REVISION_APPLIED'
  | 'REVISION_SKIPPED'
  | 'REVIEW_ITERATION_END'
  | 'DRAFT_DOWNGRADED'
  | 'REVIEW_LOOP_END';

/**
 * Event emitter callback for logging
 */
export type ReviewLoopEventCallback = (
  eventType: ReviewLoopEventType,
  content: Record<string, unknown>
) => void;

/**
 * A terminal review paired with the draft state it was decided on
 */
export interface TerminalReview {
  readonly review: ReviewResult;
  readonly parsed: ParsedDraft;
}

/**
 * A draft awaiting (re-)evaluation. `last_review` is the REVISE result
 * that sent it back; absent before the first iteration.
 */
export interface RevisingEntry {
  readonly parsed: ParsedDraft;
  readonly last_review?: ReviewResult;
}

export interface BatchRunState {
  /** Completed iterations */
  readonly iteration: number;
  readonly passed: readonly TerminalReview[];
  readonly rejected: readonly TerminalReview[];
  readonly downgraded: readonly TerminalReview[];
  readonly revising: readonly RevisingEntry[];
}

export interface ReviewLoopOutcome {
  /** Terminal reviews in input order */
  reviews: TerminalReview[];
  state: BatchRunState;
  iterations_run: number;
  downgraded_ids: string[];
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_REVIEW_LOOP_CONFIG: ReviewLoopConfig = {
  max_review_iterations: 2,
  strict_export: false,
};

export const DOWNGRADE_VARIANT = 'research_probe';

// ============================================================================
// Single Draft Review
// ============================================================================

/**
 * Evaluate and classify one draft at the given 0-based iteration
 */
export function reviewDraft(
  parsed: ParsedDraft,
  iteration: number,
  config: Pick<ReviewLoopConfig, 'strict_export'> = DEFAULT_REVIEW_LOOP_CONFIG
): ReviewResult {
  const findings = evaluateDraft(parsed);
  const classified = classify(findings);

  const strictDemotion =
    config.strict_export &&
    isExportEligible(classified, parsed.draft) &&
    hasWarning(findings);

  const verdictResult: VerdictResult = strictDemotion
    ? { ...classified, verdict: 'REVISE', revision_instructions: buildRevisionInstructions(findings) }
    : classified;

  return {
    draft_id: parsed.draft.draft_id,
    verdict: verdictResult.verdict,
    confidence_score: verdictResult.confidence_score,
    findings,
    revision_instructions: verdictResult.revision_instructions,
    export_eligible: isExportEligible(verdictResult, parsed.draft),
    defaulted_fields: [...getDefaultedFields(parsed)],
    iteration,
  };
}

// ============================================================================
// State Transitions
// ============================================================================

function terminalIds(state: BatchRunState): Set<string> {
  return new Set(
    [...state.passed, ...state.rejected, ...state.downgraded].map(entry => entry.review.draft_id)
  );
}

/**
 * Append terminal reviews, refusing any draft id that is already terminal
 */
function appendTerminal(
  existing: readonly TerminalReview[],
  additions: readonly TerminalReview[],
  taken: Set<string>
): readonly TerminalReview[] {
  return additions.reduce<readonly TerminalReview[]>((accumulated, entry) => {
    const draftId = entry.review.draft_id;
    if (taken.has(draftId)) {
      throw new GateError(
        ErrorCode.E401_ACCUMULATOR_INVARIANT_VIOLATION,
        `draft '${draftId}' is already terminal`
      );
    }
    taken.add(draftId);
    return [...accumulated, entry];
  }, existing);
}

function downgradeDraft(draft: StrategyDraft): StrategyDraft {
  return { ...draft, variant: DOWNGRADE_VARIANT, export_ready_v1: false };
}

export function createInitialState(drafts: readonly ParsedDraft[]): BatchRunState {
  const seen = new Set<string>();
  for (const parsed of drafts) {
    if (seen.has(parsed.draft.draft_id)) {
      throw new GateError(
        ErrorCode.E401_ACCUMULATOR_INVARIANT_VIOLATION,
        `duplicate draft id '${parsed.draft.draft_id}' in batch`
      );
    }
    seen.add(parsed.draft.draft_id);
  }

  return {
    iteration: 0,
    passed: [],
    rejected: [],
    downgraded: [],
    revising: drafts.map(parsed => ({ parsed })),
  };
}

/**
 * Run one Evaluate -> Verdict -> Revise pass over the revising set
 */
export function runIteration(
  state: BatchRunState,
  config: ReviewLoopConfig = DEFAULT_REVIEW_LOOP_CONFIG,
  emit?: ReviewLoopEventCallback
): BatchRunState {
  if (state.revising.length === 0) {
    return state;
  }

  const iteration = state.iteration;
  const reviewed: TerminalReview[] = state.revising.map(entry => {
    const review = reviewDraft(entry.parsed, iteration, config);
    emit?.('DRAFT_REVIEWED', {
      iteration,
      draft_id: review.draft_id,
      verdict: review.verdict,
      confidence_score: review.confidence_score,
      export_eligible: review.export_eligible,
    });
    return { review, parsed: entry.parsed };
  });

  const nextRevising: RevisingEntry[] = reviewed
    .filter(entry => entry.review.verdict === 'REVISE')
    .map(({ review, parsed }) => {
      const outcome = applyRevisions(parsed, review.revision_instructions);
      if (outcome.applied.length > 0) {
        emit?.('REVISION_APPLIED', {
          iteration,
          draft_id: review.draft_id,
          kinds: outcome.applied.map(instruction => instruction.kind),
        });
      }
      if (outcome.skipped.length > 0) {
        emit?.('REVISION_SKIPPED', {
          iteration,
          draft_id: review.draft_id,
          kinds: outcome.skipped.map(instruction => instruction.kind),
        });
      }
      return { parsed: outcome.parsed, last_review: review };
    });

  const taken = terminalIds(state);
  const passed = appendTerminal(
    state.passed,
    reviewed.filter(entry => entry.review.verdict === 'PASS'),
    taken
  );
  const rejected = appendTerminal(
    state.rejected,
    reviewed.filter(entry => entry.review.verdict === 'REJECT'),
    taken
  );

  return {
    iteration: iteration + 1,
    passed,
    rejected,
    downgraded: state.downgraded,
    revising: nextRevising,
  };
}

/**
 * Downgrade every draft still at REVISE once the budget is spent
 */
export function finalizeState(
  state: BatchRunState,
  config: ReviewLoopConfig = DEFAULT_REVIEW_LOOP_CONFIG,
  emit?: ReviewLoopEventCallback
): BatchRunState {
  const downgradedEntries: TerminalReview[] = state.revising.map(entry => {
    const parsed = { ...entry.parsed, draft: downgradeDraft(entry.parsed.draft) };
    const lastReview = entry.last_review ?? reviewDraft(entry.parsed, state.iteration, config);
    const review: ReviewResult = { ...lastReview, verdict: 'REVISE', export_eligible: false };

    emit?.('DRAFT_DOWNGRADED', {
      draft_id: review.draft_id,
      variant: parsed.draft.variant,
      confidence_score: review.confidence_score,
    });
    return { review, parsed };
  });

  return {
    ...state,
    downgraded: appendTerminal(state.downgraded, downgradedEntries, terminalIds(state)),
    revising: [],
  };
}

// ============================================================================
// Review Loop Controller
// ============================================================================

export class ReviewLoopController {
  private readonly config: ReviewLoopConfig;
  private readonly eventCallback?: ReviewLoopEventCallback;

  constructor(config: Partial<ReviewLoopConfig> = {}, eventCallback?: ReviewLoopEventCallback) {
    this.config = { ...DEFAULT_REVIEW_LOOP_CONFIG, ...config };
    this.eventCallback = eventCallback;

    const budget = this.config.max_review_iterations;
    if (!Number.isInteger(budget) || budget < 1) {
      throw new GateError(
        ErrorCode.E402_ITERATION_BUDGET_INVALID,
        `max_review_iterations must be a positive integer, got ${budget}`
      );
    }
  }

  getConfig(): ReviewLoopConfig {
    return { ...this.config };
  }

  /**
   * Review a batch of drafts to completion
   */
  run(drafts: readonly ParsedDraft[]): ReviewLoopOutcome {
    const emit: ReviewLoopEventCallback = (eventType, content) => this.emitEvent(eventType, content);

    this.emitEvent('REVIEW_LOOP_START', {
      draft_count: drafts.length,
      max_review_iterations: this.config.max_review_iterations,
      strict_export: this.config.strict_export,
    });

    let state = createInitialState(drafts);
    while (state.revising.length > 0 && state.iteration < this.config.max_review_iterations) {
      this.emitEvent('REVIEW_ITERATION_START', {
        iteration: state.iteration,
        revising_count: state.revising.length,
      });

      state = runIteration(state, this.config, emit);

      this.emitEvent('REVIEW_ITERATION_END', {
        iteration: state.iteration - 1,
        passed_count: state.passed.length,
        rejected_count: state.rejected.length,
        revising_count: state.revising.length,
      });
    }

    state = finalizeState(state, this.config, emit);

    const byId = new Map<string, TerminalReview>(
      [...state.passed, ...state.rejected, ...state.downgraded].map(entry => [entry.review.draft_id, entry])
    );
    const reviews = drafts.flatMap(parsed => {
      const entry = byId.get(parsed.draft.draft_id);
      return entry ? [entry] : [];
    });

    this.emitEvent('REVIEW_LOOP_END', {
      iterations_run: state.iteration,
      passed_count: state.passed.length,
      rejected_count: state.rejected.length,
      downgraded_count: state.downgraded.length,
    });

    return {
      reviews,
      state,
      iterations_run: state.iteration,
      downgraded_ids: state.downgraded.map(entry => entry.review.draft_id),
    };
  }

  /**
   * Emit event through callback
   */
  private emitEvent(eventType: ReviewLoopEventType, content: Record<string, unknown>): void {
    if (this.eventCallback) {
      this.eventCallback(eventType, content);
    }
  }
}

/**
 * Run the review loop over a batch with the given configuration
 */
export function runReviewLoop(
  drafts: readonly ParsedDraft[],
  config: Partial<ReviewLoopConfig> = {},
  eventCallback?: ReviewLoopEventCallback
): ReviewLoopOutcome {
  return new ReviewLoopController(config, eventCallback).run(drafts);
}
