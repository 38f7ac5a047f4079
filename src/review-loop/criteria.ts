/**
 * Draft Quality Criteria (C1-C8)
 *
 * Each checker is a pure function of the parsed draft and returns one
 * Finding with a score in [0, 100], a severity and the instruction kinds
 * that would address it. Absent numeric fields are treated as the least
 * favourable input, so a draft can never silently skip a criterion.
 */

import {
  type ParsedDraft,
  isDefaulted,
  isExportableFamily,
  isRegimeSpecific,
  type StrategyDraft,
} from '../models/draft';
import type { CriterionId, Finding, InstructionKind, Severity } from '../models/review';

// ============================================================================
// Constants
// ============================================================================

export const CRITERION_WEIGHTS: Readonly<Record<CriterionId, number>> = {
  C1: 20,
  C2: 20,
  C3: 15,
  C4: 10,
  C5: 10,
  C6: 10,
  C7: 10,
  C8: 5,
};

export const CRITERION_NAMES: Readonly<Record<CriterionId, string>> = {
  C1: 'Edge Plausibility',
  C2: 'Overfitting Risk',
  C3: 'Sample Adequacy',
  C4: 'Regime Dependency',
  C5: 'Exit Calibration',
  C6: 'Risk Concentration',
  C7: 'Execution Realism',
  C8: 'Invalidation Quality',
};

export const CRITERION_ORDER: readonly CriterionId[] = ['C1', 'C2', 'C3', 'C4', 'C5', 'C6', 'C7', 'C8'];

export const PASS_SCORE = 80;
export const WARN_SCORE = 40;
export const FAIL_SCORE = 10;
/** C7 uses a softer warning for a missing volume filter */
export const VOLUME_WARN_SCORE = 50;

/**
 * Vocabulary of domain mechanisms a thesis is expected to name (C1)
 */
export const MECHANISM_KEYWORDS: readonly string[] = [
  'momentum',
  'reversion',
  'drift',
  'earnings',
  'breakout',
  'gap',
  'volume',
  'sentiment',
];

const MIN_THESIS_WORDS = 5;
const GENERIC_THESIS_WORDS = 10;

const MAX_FILTERS_FAIL = 12;
const MAX_FILTERS_WARN = 10;
const PRECISE_THRESHOLD_PENALTY = 10;

/** A decimal-point numeric literal inside a condition expression, signed or with a bare leading dot */
export const DECIMAL_LITERAL_PATTERN = /-?\d*\.\d+/;

const TRADING_DAYS_PER_YEAR = 252;
const CONDITION_SELECTIVITY = 0.8;
const TREND_FILTER_SELECTIVITY = 0.85;
const MIN_OPPORTUNITIES_FAIL = 10;
const MIN_OPPORTUNITIES_WARN = 30;

const MAX_STOP_LOSS_PCT = 0.15;
const MIN_TAKE_PROFIT_RR = 1.5;

const MAX_RISK_PER_TRADE_FAIL = 0.02;
const MAX_RISK_PER_TRADE_WARN = 0.015;
const MAX_POSITIONS = 10;

const MIN_INVALIDATION_SIGNALS = 2;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Severity for criteria whose score is adjusted after classification (C2)
 */
export function severityFromScore(score: number): Severity {
  if (score < 30) return 'fail';
  if (score < 60) return 'warn';
  return 'pass';
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

function formatPct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function mentions(values: readonly string[], term: string): boolean {
  return values.some(value => value.toLowerCase().includes(term));
}

function buildFinding(
  criterionId: CriterionId,
  severity: Severity,
  score: number,
  message: string,
  revisionKinds: InstructionKind[] = []
): Finding {
  return {
    criterion_id: criterionId,
    name: CRITERION_NAMES[criterionId],
    severity,
    score,
    message,
    weight: CRITERION_WEIGHTS[criterionId],
    revision_kinds: severity === 'pass' ? [] : revisionKinds,
  };
}

// ============================================================================
// Criteria Checkers (C1-C8)
// ============================================================================

/**
 * C1: Edge Plausibility - the thesis must state a causal mechanism
 */
export function checkC1EdgePlausibility(parsed: ParsedDraft): Finding {
  const thesis = parsed.draft.thesis.trim();
  const wordCount = countWords(thesis);

  if (wordCount < MIN_THESIS_WORDS) {
    const message = isDefaulted(parsed, 'thesis')
      ? 'Thesis missing; must state a causal edge hypothesis'
      : `Thesis too short (${wordCount} words); must state a causal edge hypothesis`;
    return buildFinding('C1', 'fail', FAIL_SCORE, message, ['EXPAND_THESIS']);
  }

  const lower = thesis.toLowerCase();
  const matched = MECHANISM_KEYWORDS.filter(keyword => lower.includes(keyword));

  if (matched.length === 0 && wordCount < GENERIC_THESIS_WORDS) {
    return buildFinding(
      'C1',
      'warn',
      WARN_SCORE,
      `Thesis is generic (${wordCount} words) with no domain mechanism`,
      ['EXPAND_THESIS']
    );
  }

  return buildFinding(
    'C1',
    'pass',
    PASS_SCORE,
    matched.length > 0
      ? `Thesis names a causal mechanism (${matched.join(', ')})`
      : `Thesis articulates a causal hypothesis (${wordCount} words)`
  );
}

/**
 * C2: Overfitting Risk - filter count plus precise-threshold penalty
 */
export function checkC2OverfittingRisk(parsed: ParsedDraft): Finding {
  const { conditions, trend_filter } = parsed.draft;
  const total = conditions.length + trend_filter.length;

  let baseScore = PASS_SCORE;
  if (total > MAX_FILTERS_FAIL) {
    baseScore = FAIL_SCORE;
  } else if (total > MAX_FILTERS_WARN) {
    baseScore = WARN_SCORE;
  }

  const preciseCount = conditions.filter(condition => DECIMAL_LITERAL_PATTERN.test(condition)).length;
  const score = Math.max(baseScore - PRECISE_THRESHOLD_PENALTY * preciseCount, 0);
  const severity = severityFromScore(score);

  const reasons: string[] = [];
  const kinds: InstructionKind[] = [];
  if (total > MAX_FILTERS_WARN) {
    reasons.push(`${total} combined filters (${conditions.length} conditions + ${trend_filter.length} trend filters)`);
    kinds.push('REDUCE_ENTRY_CONDITIONS');
  }
  if (preciseCount > 0) {
    reasons.push(`${preciseCount} condition(s) with precise thresholds`);
    kinds.push('ROUND_PRECISE_THRESHOLDS');
  }

  const message = reasons.length > 0 ? reasons.join('; ') : `${total} filters within acceptable range`;
  return buildFinding('C2', severity, score, message, kinds);
}

/**
 * Estimate yearly trading signals from condition restrictiveness (C3)
 */
export function estimateAnnualOpportunities(draft: StrategyDraft): number {
  let estimate = TRADING_DAYS_PER_YEAR;
  if (mentions(draft.conditions, 'sector')) {
    estimate = Math.floor(estimate / 3);
  }
  if (isRegimeSpecific(draft.regime)) {
    estimate = Math.floor(estimate / 2);
  }
  estimate = Math.trunc(estimate * CONDITION_SELECTIVITY ** draft.conditions.length);
  estimate = Math.trunc(estimate * TREND_FILTER_SELECTIVITY ** draft.trend_filter.length);
  return Math.max(estimate, 1);
}

/**
 * C3: Sample Adequacy
 */
export function checkC3SampleAdequacy(parsed: ParsedDraft): Finding {
  const estimate = estimateAnnualOpportunities(parsed.draft);
  const message = `Estimated ${estimate} annual opportunities`;

  if (estimate < MIN_OPPORTUNITIES_FAIL) {
    return buildFinding('C3', 'fail', FAIL_SCORE, message, ['RELAX_SAMPLE_RESTRICTIONS']);
  }
  if (estimate < MIN_OPPORTUNITIES_WARN) {
    return buildFinding('C3', 'warn', WARN_SCORE, message, ['RELAX_SAMPLE_RESTRICTIONS']);
  }
  return buildFinding('C3', 'pass', PASS_SCORE, message);
}

/**
 * C4: Regime Dependency - a single-regime draft needs cross-regime validation
 */
export function checkC4RegimeDependency(parsed: ParsedDraft): Finding {
  const { regime, validation_plan } = parsed.draft;

  if (!isRegimeSpecific(regime)) {
    return buildFinding('C4', 'pass', PASS_SCORE, 'Strategy not restricted to a single regime');
  }

  // Keys and nested values both count as mentions
  const planText = JSON.stringify(validation_plan).toLowerCase();
  if (planText.includes('regime')) {
    return buildFinding('C4', 'pass', PASS_SCORE, `Single regime (${regime}) with cross-regime validation planned`);
  }

  return buildFinding(
    'C4',
    'warn',
    WARN_SCORE,
    `Restricted to ${regime} with no cross-regime validation plan`,
    ['ADD_CROSS_REGIME_VALIDATION']
  );
}

/**
 * C5: Exit Calibration
 */
export function checkC5ExitCalibration(parsed: ParsedDraft): Finding {
  const { stop_loss_pct, take_profit_rr } = parsed.draft;
  const problems: string[] = [];

  if (isDefaulted(parsed, 'stop_loss_pct')) {
    problems.push('stop_loss_pct missing');
  } else if (stop_loss_pct <= 0) {
    problems.push(`stop_loss_pct=${stop_loss_pct} is not positive`);
  } else if (stop_loss_pct > MAX_STOP_LOSS_PCT) {
    problems.push(`stop_loss_pct=${formatPct(stop_loss_pct)} exceeds 15%`);
  }

  if (isDefaulted(parsed, 'take_profit_rr')) {
    problems.push('take_profit_rr missing');
  } else if (take_profit_rr < MIN_TAKE_PROFIT_RR) {
    problems.push(`take_profit_rr=${take_profit_rr.toFixed(1)} below 1.5`);
  }

  if (problems.length > 0) {
    return buildFinding('C5', 'fail', FAIL_SCORE, problems.join('; '), ['TIGHTEN_EXITS']);
  }

  return buildFinding(
    'C5',
    'pass',
    PASS_SCORE,
    `Exit parameters acceptable (stop=${formatPct(stop_loss_pct)}, RR=${take_profit_rr.toFixed(1)})`
  );
}

/**
 * C6: Risk Concentration - worst triggered outcome wins
 */
export function checkC6RiskConcentration(parsed: ParsedDraft): Finding {
  const { risk_per_trade, max_positions } = parsed.draft;
  const problems: string[] = [];
  let score = PASS_SCORE;

  if (isDefaulted(parsed, 'risk_per_trade')) {
    problems.push('risk_per_trade missing');
    score = Math.min(score, FAIL_SCORE);
  } else if (risk_per_trade > MAX_RISK_PER_TRADE_FAIL) {
    problems.push(`risk_per_trade=${formatPct(risk_per_trade)} exceeds 2%`);
    score = Math.min(score, FAIL_SCORE);
  } else if (risk_per_trade > MAX_RISK_PER_TRADE_WARN) {
    problems.push(`risk_per_trade=${formatPct(risk_per_trade)} exceeds 1.5%`);
    score = Math.min(score, WARN_SCORE);
  }

  if (isDefaulted(parsed, 'max_positions')) {
    problems.push('max_positions missing');
    score = Math.min(score, FAIL_SCORE);
  } else if (max_positions > MAX_POSITIONS) {
    problems.push(`max_positions=${max_positions} exceeds 10`);
    score = Math.min(score, FAIL_SCORE);
  }

  const severity: Severity = score === FAIL_SCORE ? 'fail' : score === WARN_SCORE ? 'warn' : 'pass';
  const message = problems.length > 0 ? problems.join('; ') : 'Risk parameters within acceptable range';
  return buildFinding('C6', severity, score, message, ['REDUCE_RISK']);
}

/**
 * C7: Execution Realism - volume filter and export consistency
 */
export function checkC7ExecutionRealism(parsed: ParsedDraft): Finding {
  const { conditions, export_ready_v1, entry_family } = parsed.draft;
  const reasons: string[] = [];
  const kinds: InstructionKind[] = [];
  let score = PASS_SCORE;

  if (export_ready_v1 && !isExportableFamily(entry_family)) {
    reasons.push(`export_ready_v1=true but entry_family '${entry_family}' is not exportable`);
    kinds.push('ALIGN_EXPORT_FAMILY');
    score = Math.min(score, FAIL_SCORE);
  }

  if (!mentions(conditions, 'volume')) {
    reasons.push('No volume filter in entry conditions');
    kinds.push('ADD_VOLUME_FILTER');
    score = Math.min(score, VOLUME_WARN_SCORE);
  }

  const severity: Severity = score === FAIL_SCORE ? 'fail' : score === VOLUME_WARN_SCORE ? 'warn' : 'pass';
  const message = reasons.length > 0 ? reasons.join('; ') : 'Volume filter present and export settings consistent';
  return buildFinding('C7', severity, score, message, kinds);
}

/**
 * C8: Invalidation Quality
 */
export function checkC8InvalidationQuality(parsed: ParsedDraft): Finding {
  const count = parsed.draft.invalidation_signals.length;

  if (count === 0) {
    return buildFinding('C8', 'fail', FAIL_SCORE, 'No invalidation signals defined', ['ADD_INVALIDATION_SIGNALS']);
  }
  if (count < MIN_INVALIDATION_SIGNALS) {
    return buildFinding(
      'C8',
      'warn',
      WARN_SCORE,
      `Only ${count} invalidation signal; at least 2 expected`,
      ['ADD_INVALIDATION_SIGNALS']
    );
  }
  return buildFinding('C8', 'pass', PASS_SCORE, `${count} invalidation signals defined`);
}

// ============================================================================
// Evaluation
// ============================================================================

const CRITERION_CHECKERS: Readonly<Record<CriterionId, (parsed: ParsedDraft) => Finding>> = {
  C1: checkC1EdgePlausibility,
  C2: checkC2OverfittingRisk,
  C3: checkC3SampleAdequacy,
  C4: checkC4RegimeDependency,
  C5: checkC5ExitCalibration,
  C6: checkC6RiskConcentration,
  C7: checkC7ExecutionRealism,
  C8: checkC8InvalidationQuality,
};

/**
 * Evaluate a draft against all eight criteria, in criterion order
 */
export function evaluateDraft(parsed: ParsedDraft): Finding[] {
  return CRITERION_ORDER.map(criterionId => CRITERION_CHECKERS[criterionId](parsed));
}

/**
 * Weighted confidence score, clamped to [0, 100]
 */
export function computeConfidenceScore(findings: readonly Finding[]): number {
  const weighted = findings.reduce((sum, finding) => sum + finding.weight * finding.score, 0);
  const score = Math.round(weighted / 100);
  return Math.min(100, Math.max(0, score));
}
