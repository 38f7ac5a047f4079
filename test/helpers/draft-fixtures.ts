/**
 * Draft fixtures shared by unit, property and integration tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { DefaultableField, ParsedDraft, StrategyDraft } from '../../src/models/draft';
import { CRITERION_NAMES, CRITERION_WEIGHTS } from '../../src/review-loop/criteria';
import type { CriterionId, Finding, InstructionKind, Severity } from '../../src/models/review';

/**
 * A draft that passes every criterion (confidence 80, export eligible)
 */
export function createDraft(overrides: Partial<StrategyDraft> = {}): StrategyDraft {
  return {
    draft_id: 'draft_base',
    variant: 'core',
    entry_family: 'pivot_breakout',
    conditions: ['close > high_20d', 'rel_volume >= 2', 'close > sma_50'],
    trend_filter: ['price > sma_200'],
    thesis: 'Post-breakout momentum persists as institutions accumulate shares over several sessions',
    invalidation_signals: ['Close back below pivot', 'Volume dries up within 3 sessions'],
    regime: 'Neutral',
    stop_loss_pct: 0.07,
    take_profit_rr: 3.0,
    risk_per_trade: 0.01,
    max_positions: 5,
    validation_plan: { period: '2016-01-01 to latest' },
    export_ready_v1: true,
    ...overrides,
  };
}

export function complete(overrides: Partial<StrategyDraft> = {}): ParsedDraft {
  return { kind: 'complete', draft: createDraft(overrides) };
}

export function partial(overrides: Partial<StrategyDraft>, defaulted: DefaultableField[]): ParsedDraft {
  return { kind: 'partial_with_defaults', draft: createDraft(overrides), defaulted_fields: defaulted };
}

/**
 * Six conditions, a momentum thesis and no volume filter: C7 warns,
 * everything else passes, confidence 77
 */
export function momentumDraftWithoutVolume(draftId = 'momentum_no_volume'): ParsedDraft {
  return complete({
    draft_id: draftId,
    conditions: [
      'close > high_20d',
      'close > sma_50',
      'sma_50 > sma_150',
      'rsi_14 > 50',
      'atr_pct < 5',
      'gap_pct > 2',
    ],
    trend_filter: [],
  });
}

/**
 * Confidence 67 (REVISE) until a volume filter is added, then 70 (PASS)
 */
export function draftFixedByVolumeFilter(draftId = 'needs_volume'): ParsedDraft {
  return complete({
    draft_id: draftId,
    conditions: ['close > high_20d', 'close > sma_50', 'rsi_14 > 50'],
    regime: 'RiskOn',
    validation_plan: { period: '2016-01-01 to latest' },
    risk_per_trade: 0.018,
    invalidation_signals: ['Close back below pivot'],
  });
}

/**
 * A failed exit calibration that no automatic revision can fix
 */
export function draftStuckAtRevise(draftId = 'wide_stop'): ParsedDraft {
  return complete({ draft_id: draftId, stop_loss_pct: 0.2 });
}

export function emptyThesisDraft(draftId = 'empty_thesis'): ParsedDraft {
  return partial({ draft_id: draftId, thesis: '' }, ['thesis']);
}

/**
 * Synthetic finding for verdict tests
 */
export function finding(
  criterionId: CriterionId,
  severity: Severity,
  score: number,
  revisionKinds: InstructionKind[] = []
): Finding {
  return {
    criterion_id: criterionId,
    name: CRITERION_NAMES[criterionId],
    severity,
    score,
    message: `${criterionId} ${severity}`,
    weight: CRITERION_WEIGHTS[criterionId],
    revision_kinds: revisionKinds,
  };
}

/**
 * Eight findings with the same severity and score
 */
export function uniformFindings(severity: Severity, score: number): Finding[] {
  const ids: CriterionId[] = ['C1', 'C2', 'C3', 'C4', 'C5', 'C6', 'C7', 'C8'];
  return ids.map(id => finding(id, severity, score));
}

export function createTempDir(prefix = 'draft-gate-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Flat YAML document for a draft
 */
export function draftDocument(overrides: Partial<StrategyDraft> = {}): Record<string, unknown> {
  const draft = createDraft(overrides);
  return {
    ...draft,
    conditions: [...draft.conditions],
    trend_filter: [...draft.trend_filter],
    invalidation_signals: [...draft.invalidation_signals],
    validation_plan: { ...draft.validation_plan },
  };
}

export function writeDraftFile(dir: string, fileName: string, document: unknown): string {
  const filePath = path.join(dir, fileName);
  const content = fileName.endsWith('.json') ? JSON.stringify(document, null, 2) : yaml.dump(document);
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
