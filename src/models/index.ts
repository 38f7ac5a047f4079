export {
  DRAFT_VARIANTS,
  EXPORTABLE_FAMILIES,
  NEUTRAL_REGIMES,
  getDefaultedFields,
  isDefaulted,
  withDraft,
  isRegimeSpecific,
  isExportableFamily,
  type DraftVariant,
  type ValidationPlan,
  type StrategyDraft,
  type DefaultableField,
  type DraftDocumentShape,
  type DraftSource,
  type CompleteDraft,
  type PartialDraftWithDefaults,
  type ParsedDraft,
} from './draft';

export {
  INSTRUCTION_TEXT,
  createInstruction,
  type CriterionId,
  type Severity,
  type Verdict,
  type InstructionKind,
  type RevisionInstruction,
  type Finding,
  type ReviewResult,
} from './review';
