/**
 * Draft Loader
 *
 * Reads strategy drafts from a single file or a directory of YAML/JSON
 * documents. Two document shapes are accepted:
 *
 *   flat:   every field at the top level, keyed as in StrategyDraft
 *   nested: `id`, `entry.{conditions,trend_filter}`,
 *           `exit.{stop_loss_pct,take_profit_rr}`,
 *           `risk.{risk_per_trade,max_positions}`
 *
 * A document that cannot be scored becomes a failed load; the rest of the
 * batch still runs. Absent optional fields fall back to neutral defaults
 * and are listed on the parsed draft.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { FatalIOError, MalformedInputError } from '../errors/gate-error';
import {
  DRAFT_VARIANTS,
  type DefaultableField,
  type DraftDocumentShape,
  type DraftVariant,
  type ParsedDraft,
  type StrategyDraft,
} from '../models/draft';
import { isFiniteNumber, isNonEmptyString, isRecord, isStringArray } from '../utils/value-guards';

export const DRAFT_FILE_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json'];
export const MANIFEST_PREFIX = 'run_manifest';

export interface FailedLoad {
  file: string;
  code: ErrorCode;
  reason: string;
}

export type DraftInput = { draftsDir: string } | { draftPath: string };

export interface InputSource {
  drafts_dir?: string;
  draft_path?: string;
  draft_count: number;
}

export interface LoadResult {
  drafts: ParsedDraft[];
  failed_loads: FailedLoad[];
  source: InputSource;
}

type DocumentSection = 'entry' | 'exit' | 'risk';

// ============================================================================
// Document Parsing
// ============================================================================

function detectShape(document: Record<string, unknown>): DraftDocumentShape {
  return isRecord(document.entry) || isRecord(document.exit) || isRecord(document.risk) ? 'nested' : 'flat';
}

/**
 * Look a field up in its nested section first, then at the top level
 */
function lookup(document: Record<string, unknown>, section: DocumentSection | null, field: string): unknown {
  if (section !== null) {
    const nested = document[section];
    if (isRecord(nested) && nested[field] !== undefined) {
      return nested[field];
    }
  }
  return document[field];
}

function isDraftVariant(value: unknown): value is DraftVariant {
  return typeof value === 'string' && DRAFT_VARIANTS.some(variant => variant === value);
}

/**
 * Validate a loaded document and convert it into a ParsedDraft
 * @throws MalformedInputError when a required field is missing or invalid
 */
export function parseDraftDocument(document: unknown, file: string): ParsedDraft {
  if (!isRecord(document)) {
    throw new MalformedInputError(ErrorCode.E102_DRAFT_PARSE_FAILURE, file, 'document is not a mapping');
  }

  const shape = detectShape(document);

  const draftId = document.draft_id ?? document.id;
  if (!isNonEmptyString(draftId)) {
    throw new MalformedInputError(ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING, file, 'draft_id (or id)');
  }

  const entryFamily = document.entry_family;
  if (!isNonEmptyString(entryFamily)) {
    throw new MalformedInputError(ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING, file, 'entry_family');
  }

  const variant = document.variant;
  if (variant === undefined) {
    throw new MalformedInputError(ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING, file, 'variant');
  }
  if (!isDraftVariant(variant)) {
    throw new MalformedInputError(
      ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING,
      file,
      `variant must be one of ${DRAFT_VARIANTS.join(', ')}`
    );
  }

  const conditions = lookup(document, 'entry', 'conditions');
  if (conditions === undefined) {
    throw new MalformedInputError(ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING, file, 'conditions');
  }
  if (!isStringArray(conditions)) {
    throw new MalformedInputError(
      ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING,
      file,
      'conditions must be a list of strings'
    );
  }

  const defaulted: DefaultableField[] = [];

  const stringList = (field: DefaultableField, value: unknown): string[] => {
    if (isStringArray(value)) return [...value];
    defaulted.push(field);
    return [];
  };
  const text = (field: DefaultableField, value: unknown): string => {
    if (typeof value === 'string') return value;
    defaulted.push(field);
    return '';
  };
  const numeric = (field: DefaultableField, value: unknown): number => {
    if (isFiniteNumber(value)) return value;
    defaulted.push(field);
    return 0;
  };

  const trendFilter = stringList('trend_filter', lookup(document, 'entry', 'trend_filter'));
  const thesis = text('thesis', document.thesis);
  const invalidationSignals = stringList('invalidation_signals', document.invalidation_signals);
  const regime = text('regime', document.regime);
  const stopLossPct = numeric('stop_loss_pct', lookup(document, 'exit', 'stop_loss_pct'));
  const takeProfitRr = numeric('take_profit_rr', lookup(document, 'exit', 'take_profit_rr'));
  const riskPerTrade = numeric('risk_per_trade', lookup(document, 'risk', 'risk_per_trade'));
  const maxPositions = numeric('max_positions', lookup(document, 'risk', 'max_positions'));

  let validationPlan: Record<string, unknown> = {};
  if (isRecord(document.validation_plan)) {
    validationPlan = { ...document.validation_plan };
  } else {
    defaulted.push('validation_plan');
  }

  let exportReady = false;
  if (typeof document.export_ready_v1 === 'boolean') {
    exportReady = document.export_ready_v1;
  } else {
    defaulted.push('export_ready_v1');
  }

  const draft: StrategyDraft = {
    draft_id: draftId,
    variant,
    entry_family: entryFamily,
    conditions: [...conditions],
    trend_filter: trendFilter,
    thesis,
    invalidation_signals: invalidationSignals,
    regime,
    stop_loss_pct: stopLossPct,
    take_profit_rr: takeProfitRr,
    risk_per_trade: riskPerTrade,
    max_positions: maxPositions,
    validation_plan: validationPlan,
    export_ready_v1: exportReady,
  };

  const source = { file, shape, document };
  return defaulted.length > 0
    ? { kind: 'partial_with_defaults', draft, defaulted_fields: defaulted, source }
    : { kind: 'complete', draft, source };
}

/**
 * Parse draft text by file extension
 * @throws MalformedInputError when the text is not valid YAML/JSON
 */
export function parseDraftText(content: string, file: string): ParsedDraft {
  let document: unknown;
  try {
    document = path.extname(file).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(ErrorCode.E102_DRAFT_PARSE_FAILURE, file, message.split('\n')[0]);
  }
  return parseDraftDocument(document, file);
}

export function loadDraftFile(filePath: string): ParsedDraft {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(ErrorCode.E106_DRAFT_FILE_UNREADABLE, filePath, message);
  }
  return parseDraftText(content, filePath);
}

// ============================================================================
// Batch Loading
// ============================================================================

/**
 * Draft files in a directory, sorted by name; run manifests and
 * subdirectories are skipped. Entries are not stat'ed: a file that
 * cannot be read fails when it is loaded.
 */
export function listDraftFiles(draftsDir: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(draftsDir, { withFileTypes: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FatalIOError(ErrorCode.E105_INPUT_PATH_UNREADABLE, draftsDir, message);
  }

  return entries
    .filter(entry => !entry.isDirectory())
    .map(entry => entry.name)
    .filter(name => DRAFT_FILE_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .filter(name => !name.startsWith(MANIFEST_PREFIX))
    .sort()
    .map(name => path.join(draftsDir, name));
}

function toFailedLoad(error: MalformedInputError): FailedLoad {
  return {
    file: error.file,
    code: error.code,
    reason: error.context ?? error.message,
  };
}

/**
 * Load every draft of the input
 * @throws FatalIOError when the input path is missing or unreadable
 */
export function loadDrafts(input: DraftInput): LoadResult {
  const isDirectory = 'draftsDir' in input;
  const inputPath = isDirectory ? input.draftsDir : input.draftPath;

  if (!fs.existsSync(inputPath)) {
    throw new FatalIOError(ErrorCode.E101_INPUT_PATH_NOT_FOUND, inputPath);
  }

  const stat = fs.statSync(inputPath);
  if (isDirectory && !stat.isDirectory()) {
    throw new FatalIOError(ErrorCode.E105_INPUT_PATH_UNREADABLE, inputPath, `${inputPath} is not a directory`);
  }
  if (!isDirectory && !stat.isFile()) {
    throw new FatalIOError(ErrorCode.E105_INPUT_PATH_UNREADABLE, inputPath, `${inputPath} is not a file`);
  }

  const files = isDirectory ? listDraftFiles(inputPath) : [inputPath];
  const drafts: ParsedDraft[] = [];
  const failed_loads: FailedLoad[] = [];
  const seenIds = new Map<string, string>();

  for (const file of files) {
    try {
      const parsed = loadDraftFile(file);
      const draftId = parsed.draft.draft_id;
      const firstFile = seenIds.get(draftId);
      if (firstFile !== undefined) {
        throw new MalformedInputError(
          ErrorCode.E104_DUPLICATE_DRAFT_ID,
          file,
          `draft_id '${draftId}' already loaded from ${path.basename(firstFile)}`
        );
      }
      seenIds.set(draftId, file);
      drafts.push(parsed);
    } catch (error) {
      if (error instanceof MalformedInputError) {
        failed_loads.push(toFailedLoad(error));
        continue;
      }
      throw error;
    }
  }

  const source: InputSource = isDirectory
    ? { drafts_dir: inputPath, draft_count: drafts.length }
    : { draft_path: inputPath, draft_count: drafts.length };

  return { drafts, failed_loads, source };
}

// ============================================================================
// Write-back
// ============================================================================

/**
 * Document for a revised draft, in the shape it was read in. Only the
 * fields the gate changes are rewritten; everything else is preserved.
 */
export function serializeDraft(parsed: ParsedDraft): Record<string, unknown> {
  const { draft } = parsed;

  if (!parsed.source) {
    return { ...draft, conditions: [...draft.conditions], trend_filter: [...draft.trend_filter] };
  }

  const document: Record<string, unknown> = { ...parsed.source.document };
  document.variant = draft.variant;
  document.export_ready_v1 = draft.export_ready_v1;

  const entry = document.entry;
  if (parsed.source.shape === 'nested' && isRecord(entry) && entry.conditions !== undefined) {
    document.entry = { ...entry, conditions: [...draft.conditions] };
  } else {
    document.conditions = [...draft.conditions];
  }

  return document;
}
