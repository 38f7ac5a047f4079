/**
 * Strategy Draft model
 *
 * A draft is produced upstream by the strategy designer and reviewed here.
 * Draft values are never mutated in place: revision and downgrade return
 * new objects.
 */

export type DraftVariant = 'core' | 'conservative' | 'research_probe';

export const DRAFT_VARIANTS: readonly DraftVariant[] = ['core', 'conservative', 'research_probe'];

/**
 * Entry families the downstream execution pipeline accepts
 */
export const EXPORTABLE_FAMILIES: ReadonlySet<string> = new Set(['pivot_breakout', 'gap_up_continuation']);

/**
 * Regime tags that do not restrict a draft to one market condition
 */
export const NEUTRAL_REGIMES: ReadonlySet<string> = new Set(['', 'Unknown', 'Neutral']);

export type ValidationPlan = Readonly<Record<string, unknown>>;

export interface StrategyDraft {
  readonly draft_id: string;
  readonly variant: DraftVariant;
  readonly entry_family: string;
  readonly conditions: readonly string[];
  readonly trend_filter: readonly string[];
  readonly thesis: string;
  readonly invalidation_signals: readonly string[];
  readonly regime: string;
  readonly stop_loss_pct: number;
  readonly take_profit_rr: number;
  readonly risk_per_trade: number;
  readonly max_positions: number;
  readonly validation_plan: ValidationPlan;
  readonly export_ready_v1: boolean;
}

/**
 * Optional fields that fall back to a neutral default when absent
 */
export type DefaultableField =
  | 'trend_filter'
  | 'thesis'
  | 'invalidation_signals'
  | 'regime'
  | 'stop_loss_pct'
  | 'take_profit_rr'
  | 'risk_per_trade'
  | 'max_positions'
  | 'validation_plan'
  | 'export_ready_v1';

/**
 * Shape of the source document, kept so revised drafts can be written
 * back the way they were read.
 */
export type DraftDocumentShape = 'flat' | 'nested';

export interface DraftSource {
  readonly file: string;
  readonly shape: DraftDocumentShape;
  readonly document: Readonly<Record<string, unknown>>;
}

export interface CompleteDraft {
  readonly kind: 'complete';
  readonly draft: StrategyDraft;
  readonly source?: DraftSource;
}

export interface PartialDraftWithDefaults {
  readonly kind: 'partial_with_defaults';
  readonly draft: StrategyDraft;
  readonly defaulted_fields: readonly DefaultableField[];
  readonly source?: DraftSource;
}

export type ParsedDraft = CompleteDraft | PartialDraftWithDefaults;

export function getDefaultedFields(parsed: ParsedDraft): readonly DefaultableField[] {
  return parsed.kind === 'partial_with_defaults' ? parsed.defaulted_fields : [];
}

export function isDefaulted(parsed: ParsedDraft, field: DefaultableField): boolean {
  return getDefaultedFields(parsed).includes(field);
}

/**
 * Replace the draft carried by a parsed draft, keeping its kind,
 * defaulted fields and source.
 */
export function withDraft(parsed: ParsedDraft, draft: StrategyDraft): ParsedDraft {
  return { ...parsed, draft };
}

export function isRegimeSpecific(regime: string): boolean {
  return !NEUTRAL_REGIMES.has(regime);
}

export function isExportableFamily(entryFamily: string): boolean {
  return EXPORTABLE_FAMILIES.has(entryFamily);
}
