/**
 * Review model: findings, verdicts and tagged revision instructions
 */

import type { DefaultableField } from './draft';

export type CriterionId = 'C1' | 'C2' | 'C3' | 'C4' | 'C5' | 'C6' | 'C7' | 'C8';

export type Severity = 'pass' | 'warn' | 'fail';

export type Verdict = 'PASS' | 'REVISE' | 'REJECT';

/**
 * Revision instruction kinds. Each triggered reason of a non-pass finding
 * maps to exactly one kind.
 */
export type InstructionKind =
  | 'EXPAND_THESIS'
  | 'REDUCE_ENTRY_CONDITIONS'
  | 'ROUND_PRECISE_THRESHOLDS'
  | 'RELAX_SAMPLE_RESTRICTIONS'
  | 'ADD_CROSS_REGIME_VALIDATION'
  | 'TIGHTEN_EXITS'
  | 'REDUCE_RISK'
  | 'ALIGN_EXPORT_FAMILY'
  | 'ADD_VOLUME_FILTER'
  | 'ADD_INVALIDATION_SIGNALS';

export const INSTRUCTION_TEXT: Readonly<Record<InstructionKind, string>> = {
  EXPAND_THESIS: 'Expand thesis to describe the causal mechanism behind the edge',
  REDUCE_ENTRY_CONDITIONS: 'Reduce entry conditions',
  ROUND_PRECISE_THRESHOLDS: 'Round precise thresholds',
  RELAX_SAMPLE_RESTRICTIONS: 'Relax conditions or sector/regime restrictions to increase sample size',
  ADD_CROSS_REGIME_VALIDATION: 'Add cross-regime validation to the validation plan',
  TIGHTEN_EXITS: 'Tighten stop-loss to at most 15% and keep reward-to-risk at 1.5 or above',
  REDUCE_RISK: 'Reduce risk_per_trade to at most 1.5% and max_positions to at most 10',
  ALIGN_EXPORT_FAMILY: 'Set export_ready_v1 to false or use an exportable entry family',
  ADD_VOLUME_FILTER: 'Add volume filter',
  ADD_INVALIDATION_SIGNALS: 'Add at least 2 concrete invalidation signals',
};

export interface RevisionInstruction {
  kind: InstructionKind;
  criterion_id: CriterionId;
  text: string;
}

export interface Finding {
  criterion_id: CriterionId;
  name: string;
  severity: Severity;
  score: number;
  message: string;
  weight: number;
  /** Instruction kinds for the reasons that triggered; empty on pass */
  revision_kinds: InstructionKind[];
}

export interface ReviewResult {
  draft_id: string;
  verdict: Verdict;
  confidence_score: number;
  findings: Finding[];
  revision_instructions: RevisionInstruction[];
  export_eligible: boolean;
  defaulted_fields: DefaultableField[];
  /** 0-based iteration that produced this result */
  iteration: number;
}

export function createInstruction(kind: InstructionKind, criterionId: CriterionId): RevisionInstruction {
  return { kind, criterion_id: criterionId, text: INSTRUCTION_TEXT[kind] };
}
