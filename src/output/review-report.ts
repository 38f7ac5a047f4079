/**
 * Review Report
 *
 * Builds the review document for a run and writes it, with the optional
 * markdown summary and revised drafts, into the output directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { v4 as uuidv4 } from 'uuid';
import type { OutputFormat } from '../config/configuration-manager';
import { ErrorCode } from '../errors/error-codes';
import { FatalIOError } from '../errors/gate-error';
import type { FailedLoad, InputSource } from '../input/draft-loader';
import { serializeDraft } from '../input/draft-loader';
import { atomicWriteFileSync } from '../logging/atomic-file-writer';
import type { DefaultableField } from '../models/draft';
import type { CriterionId, InstructionKind, Severity, Verdict } from '../models/review';
import type { ReviewLoopOutcome, TerminalReview } from '../review-loop/review-loop';

export const REVIEW_FILE_BASENAME = 'review';
export const MARKDOWN_SUMMARY_FILE = 'review_summary.md';
export const REVISED_DRAFTS_DIR = 'drafts';

export interface ReportFinding {
  criterion_id: CriterionId;
  name: string;
  severity: Severity;
  score: number;
  message: string;
  weight: number;
}

/** Kind and source criterion of the instruction at the same index */
export interface ReportRevisionKind {
  kind: InstructionKind;
  criterion_id: CriterionId;
}

export interface ReportReview {
  draft_id: string;
  verdict: Verdict;
  confidence_score: number;
  export_eligible: boolean;
  iteration: number;
  defaulted_fields: DefaultableField[];
  findings: ReportFinding[];
  revision_instructions: string[];
  revision_kinds: ReportRevisionKind[];
}

export interface ReviewSummary {
  total: number;
  PASS: number;
  REVISE: number;
  REJECT: number;
  export_eligible: number;
  failed_loads: number;
}

export interface ReviewDocument {
  run_id: string;
  generated_at_utc: string;
  source: InputSource;
  summary: ReviewSummary;
  loop: {
    max_review_iterations: number;
    iterations_run: number;
    downgraded: string[];
  };
  reviews: ReportReview[];
  failed_loads: FailedLoad[];
}

export interface BuildReportOptions {
  max_review_iterations: number;
  runId?: string;
  now?: Date;
}

export interface WriteOutputsOptions {
  outputDir: string;
  format: OutputFormat;
  markdownSummary: boolean;
  /** Terminal draft states to write back; omitted when write-back is off */
  revisedDrafts?: readonly TerminalReview[];
}

// ============================================================================
// Document
// ============================================================================

/**
 * ISO-8601 UTC timestamp truncated to whole seconds
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function toReportReview({ review }: TerminalReview): ReportReview {
  return {
    draft_id: review.draft_id,
    verdict: review.verdict,
    confidence_score: review.confidence_score,
    export_eligible: review.export_eligible,
    iteration: review.iteration,
    defaulted_fields: [...review.defaulted_fields],
    findings: review.findings.map(finding => ({
      criterion_id: finding.criterion_id,
      name: finding.name,
      severity: finding.severity,
      score: finding.score,
      message: finding.message,
      weight: finding.weight,
    })),
    revision_instructions: review.revision_instructions.map(instruction => instruction.text),
    revision_kinds: review.revision_instructions.map(instruction => ({
      kind: instruction.kind,
      criterion_id: instruction.criterion_id,
    })),
  };
}

export function summarizeReviews(reviews: readonly ReportReview[], failedLoads: number): ReviewSummary {
  const count = (verdict: Verdict): number => reviews.filter(review => review.verdict === verdict).length;
  return {
    total: reviews.length,
    PASS: count('PASS'),
    REVISE: count('REVISE'),
    REJECT: count('REJECT'),
    export_eligible: reviews.filter(review => review.export_eligible).length,
    failed_loads: failedLoads,
  };
}

export function buildReviewDocument(
  outcome: ReviewLoopOutcome,
  source: InputSource,
  failedLoads: readonly FailedLoad[],
  options: BuildReportOptions
): ReviewDocument {
  const reviews = outcome.reviews.map(toReportReview);
  const reportSource: InputSource =
    source.drafts_dir !== undefined
      ? { drafts_dir: source.drafts_dir, draft_count: source.draft_count }
      : { draft_path: source.draft_path ?? '', draft_count: source.draft_count };

  return {
    run_id: options.runId ?? uuidv4(),
    generated_at_utc: formatTimestamp(options.now ?? new Date()),
    source: reportSource,
    summary: summarizeReviews(reviews, failedLoads.length),
    loop: {
      max_review_iterations: options.max_review_iterations,
      iterations_run: outcome.iterations_run,
      downgraded: [...outcome.downgraded_ids],
    },
    reviews,
    failed_loads: failedLoads.map(failed => ({ file: failed.file, code: failed.code, reason: failed.reason })),
  };
}

export function serializeReviewDocument(document: ReviewDocument, format: OutputFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(document, null, 2)}\n`;
  }
  return yaml.dump(document, { noRefs: true, lineWidth: -1, sortKeys: false });
}

// ============================================================================
// Markdown Summary
// ============================================================================

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function tableRow(cells: readonly (string | number)[]): string {
  return `| ${cells.map(cell => escapeCell(String(cell))).join(' | ')} |`;
}

export function buildMarkdownSummary(document: ReviewDocument): string {
  const lines: string[] = [];
  const { summary } = document;

  lines.push('# Strategy Draft Review');
  lines.push('');
  lines.push(`- Run: ${document.run_id}`);
  lines.push(`- Generated: ${document.generated_at_utc}`);
  lines.push(
    `- Drafts reviewed: ${summary.total} (PASS ${summary.PASS}, REVISE ${summary.REVISE}, REJECT ${summary.REJECT})`
  );
  lines.push(`- Export eligible: ${summary.export_eligible}`);
  lines.push(`- Failed loads: ${summary.failed_loads}`);
  lines.push(
    `- Iterations: ${document.loop.iterations_run} of ${document.loop.max_review_iterations}`
  );
  if (document.loop.downgraded.length > 0) {
    lines.push(`- Downgraded: ${document.loop.downgraded.join(', ')}`);
  }
  lines.push('');

  lines.push('## Verdicts');
  lines.push('');
  lines.push(tableRow(['Draft', 'Verdict', 'Confidence', 'Export Eligible', 'Iteration']));
  lines.push('|---|---|---|---|---|');
  for (const review of document.reviews) {
    lines.push(
      tableRow([
        review.draft_id,
        review.verdict,
        review.confidence_score,
        review.export_eligible ? 'yes' : 'no',
        review.iteration,
      ])
    );
  }
  lines.push('');

  for (const review of document.reviews) {
    lines.push(`## ${review.draft_id}`);
    lines.push('');
    lines.push(`**Verdict:** ${review.verdict} (confidence ${review.confidence_score})`);
    if (review.defaulted_fields.length > 0) {
      lines.push('');
      lines.push(`Defaulted fields: ${review.defaulted_fields.join(', ')}`);
    }
    lines.push('');
    lines.push(tableRow(['Criterion', 'Severity', 'Score', 'Message']));
    lines.push('|---|---|---|---|');
    for (const finding of review.findings) {
      lines.push(
        tableRow([`${finding.criterion_id} ${finding.name}`, finding.severity, finding.score, finding.message])
      );
    }
    if (review.revision_instructions.length > 0) {
      lines.push('');
      lines.push('Revision instructions:');
      review.revision_instructions.forEach((text, index) => {
        const source = review.revision_kinds[index];
        lines.push(source ? `- [${source.criterion_id}] ${text}` : `- ${text}`);
      });
    }
    lines.push('');
  }

  if (document.failed_loads.length > 0) {
    lines.push('## Failed Loads');
    lines.push('');
    lines.push(tableRow(['File', 'Code', 'Reason']));
    lines.push('|---|---|---|');
    for (const failed of document.failed_loads) {
      lines.push(tableRow([failed.file, failed.code, failed.reason]));
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ============================================================================
// Writing
// ============================================================================

/**
 * File name for a revised draft; path separators and other unsafe
 * characters in the id are replaced. A name already in `taken` (compared
 * case-insensitively) gets a numeric suffix.
 */
export function revisedDraftFileName(draftId: string, taken: ReadonlySet<string> = new Set()): string {
  const stem = draftId.replace(/[^A-Za-z0-9._-]/g, '_');
  let name = `${stem}.yaml`;
  for (let suffix = 2; taken.has(name.toLowerCase()); suffix++) {
    name = `${stem}_${suffix}.yaml`;
  }
  return name;
}

function ensureWritableDirectory(outputDir: string): void {
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.accessSync(outputDir, fs.constants.W_OK);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FatalIOError(ErrorCode.E301_OUTPUT_NOT_WRITABLE, outputDir, message);
  }
}

function writeOrThrow(filePath: string, content: string): void {
  const result = atomicWriteFileSync(filePath, content);
  if (!result.success) {
    throw new FatalIOError(
      ErrorCode.E302_OUTPUT_WRITE_FAILURE,
      filePath,
      result.error ? `${filePath}: ${result.error.message}` : filePath
    );
  }
}

/**
 * Write the review document and optional secondary outputs
 * @returns Paths written, review document first
 * @throws FatalIOError when the directory or a file cannot be written
 */
export function writeReviewOutputs(document: ReviewDocument, options: WriteOutputsOptions): string[] {
  ensureWritableDirectory(options.outputDir);
  const written: string[] = [];

  const reviewPath = path.join(options.outputDir, `${REVIEW_FILE_BASENAME}.${options.format}`);
  writeOrThrow(reviewPath, serializeReviewDocument(document, options.format));
  written.push(reviewPath);

  if (options.markdownSummary) {
    const summaryPath = path.join(options.outputDir, MARKDOWN_SUMMARY_FILE);
    writeOrThrow(summaryPath, buildMarkdownSummary(document));
    written.push(summaryPath);
  }

  if (options.revisedDrafts) {
    const draftsDir = path.join(options.outputDir, REVISED_DRAFTS_DIR);
    const taken = new Set<string>();
    for (const entry of options.revisedDrafts) {
      const fileName = revisedDraftFileName(entry.parsed.draft.draft_id, taken);
      taken.add(fileName.toLowerCase());
      const draftPath = path.join(draftsDir, fileName);
      writeOrThrow(draftPath, yaml.dump(serializeDraft(entry.parsed), { noRefs: true, lineWidth: -1 }));
      written.push(draftPath);
    }
  }

  return written;
}
