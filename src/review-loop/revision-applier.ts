/**
 * Revision Applier
 *
 * Applies tagged revision instructions to a draft through a table of pure
 * mutations. Kinds with no mutation need a human (or the upstream
 * designer) and are reported back as skipped.
 */

import { type ParsedDraft, type StrategyDraft, withDraft } from '../models/draft';
import type { InstructionKind, RevisionInstruction } from '../models/review';
import { DECIMAL_LITERAL_PATTERN } from './criteria';

export const MAX_REVISED_CONDITIONS = 5;
export const VOLUME_FILTER_CONDITION = 'avg_volume > 500000';

const DECIMAL_LITERAL_GLOBAL = new RegExp(DECIMAL_LITERAL_PATTERN.source, 'g');

export type DraftMutation = (draft: StrategyDraft) => StrategyDraft;

function reduceEntryConditions(draft: StrategyDraft): StrategyDraft {
  return { ...draft, conditions: draft.conditions.slice(0, MAX_REVISED_CONDITIONS) };
}

function addVolumeFilter(draft: StrategyDraft): StrategyDraft {
  if (draft.conditions.some(condition => condition.toLowerCase().includes('volume'))) {
    return draft;
  }
  return { ...draft, conditions: [...draft.conditions, VOLUME_FILTER_CONDITION] };
}

function roundPreciseThresholds(draft: StrategyDraft): StrategyDraft {
  return {
    ...draft,
    conditions: draft.conditions.map(condition =>
      condition.replace(DECIMAL_LITERAL_GLOBAL, literal => String(Math.round(Number(literal))))
    ),
  };
}

export const REVISION_MUTATIONS: Readonly<Partial<Record<InstructionKind, DraftMutation>>> = {
  REDUCE_ENTRY_CONDITIONS: reduceEntryConditions,
  ADD_VOLUME_FILTER: addVolumeFilter,
  ROUND_PRECISE_THRESHOLDS: roundPreciseThresholds,
};

export interface RevisionOutcome {
  parsed: ParsedDraft;
  applied: RevisionInstruction[];
  skipped: RevisionInstruction[];
}

/**
 * Apply instructions in order. `variant` and `export_ready_v1` are never
 * touched here; only the loop's downgrade changes them.
 */
export function applyRevisions(
  parsed: ParsedDraft,
  instructions: readonly RevisionInstruction[]
): RevisionOutcome {
  const applied: RevisionInstruction[] = [];
  const skipped: RevisionInstruction[] = [];

  const revised = instructions.reduce<StrategyDraft>((draft, instruction) => {
    const mutation = REVISION_MUTATIONS[instruction.kind];
    if (!mutation) {
      skipped.push(instruction);
      return draft;
    }
    applied.push(instruction);
    return mutation(draft);
  }, parsed.draft);

  return { parsed: withDraft(parsed, revised), applied, skipped };
}
