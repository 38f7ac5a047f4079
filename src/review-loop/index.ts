/**
 * Review Loop Module
 *
 * Exports:
 * - ReviewLoopController and the state-fold functions behind it
 * - Criteria checkers (C1-C8) and the confidence score
 * - Verdict engine, revision applier and export eligibility check
 */

export {
  // Main class
  ReviewLoopController,
  runReviewLoop,

  // State fold
  reviewDraft,
  createInitialState,
  runIteration,
  finalizeState,

  // Configuration
  DEFAULT_REVIEW_LOOP_CONFIG,
  DOWNGRADE_VARIANT,

  // Types
  type ReviewLoopConfig,
  type ReviewLoopEventType,
  type ReviewLoopEventCallback,
  type TerminalReview,
  type RevisingEntry,
  type BatchRunState,
  type ReviewLoopOutcome,
} from './review-loop';

export {
  checkC1EdgePlausibility,
  checkC2OverfittingRisk,
  checkC3SampleAdequacy,
  checkC4RegimeDependency,
  checkC5ExitCalibration,
  checkC6RiskConcentration,
  checkC7ExecutionRealism,
  checkC8InvalidationQuality,
  evaluateDraft,
  estimateAnnualOpportunities,
  computeConfidenceScore,
  severityFromScore,
  CRITERION_WEIGHTS,
  CRITERION_NAMES,
  CRITERION_ORDER,
  MECHANISM_KEYWORDS,
} from './criteria';

export {
  classify,
  buildRevisionInstructions,
  hasFailure,
  hasWarning,
  PASS_CONFIDENCE_THRESHOLD,
  REJECT_CONFIDENCE_THRESHOLD,
  type VerdictResult,
} from './verdict-engine';

export {
  applyRevisions,
  REVISION_MUTATIONS,
  VOLUME_FILTER_CONDITION,
  MAX_REVISED_CONDITIONS,
  type DraftMutation,
  type RevisionOutcome,
} from './revision-applier';

export { isExportEligible } from './export-eligibility';
