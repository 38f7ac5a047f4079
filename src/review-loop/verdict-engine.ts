/**
 * Verdict Engine
 *
 * Turns the eight findings of a draft into PASS / REVISE / REJECT.
 * Fail-Closed: a failed thesis (C1) or an overfit filter set (C2) rejects
 * outright, whatever the weighted score.
 */

import { computeConfidenceScore } from './criteria';
import {
  createInstruction,
  type CriterionId,
  type Finding,
  type RevisionInstruction,
  type Verdict,
} from '../models/review';

export const PASS_CONFIDENCE_THRESHOLD = 70;
export const REJECT_CONFIDENCE_THRESHOLD = 35;

/**
 * Criteria whose failure rejects the draft without revision
 */
export const HARD_REJECT_CRITERIA: readonly CriterionId[] = ['C1', 'C2'];

export interface VerdictResult {
  verdict: Verdict;
  confidence_score: number;
  revision_instructions: RevisionInstruction[];
}

/**
 * One instruction per triggered reason of every non-pass finding,
 * in criterion order
 */
export function buildRevisionInstructions(findings: readonly Finding[]): RevisionInstruction[] {
  return findings
    .filter(finding => finding.severity !== 'pass')
    .flatMap(finding => finding.revision_kinds.map(kind => createInstruction(kind, finding.criterion_id)));
}

export function hasFailure(findings: readonly Finding[]): boolean {
  return findings.some(finding => finding.severity === 'fail');
}

export function hasWarning(findings: readonly Finding[]): boolean {
  return findings.some(finding => finding.severity === 'warn');
}

/**
 * Classify a draft from its findings
 */
export function classify(findings: readonly Finding[]): VerdictResult {
  const confidence_score = computeConfidenceScore(findings);

  const hardReject = findings.some(
    finding => HARD_REJECT_CRITERIA.includes(finding.criterion_id) && finding.severity === 'fail'
  );
  if (hardReject) {
    return { verdict: 'REJECT', confidence_score, revision_instructions: [] };
  }

  if (confidence_score >= PASS_CONFIDENCE_THRESHOLD && !hasFailure(findings)) {
    return { verdict: 'PASS', confidence_score, revision_instructions: [] };
  }

  if (confidence_score < REJECT_CONFIDENCE_THRESHOLD) {
    return { verdict: 'REJECT', confidence_score, revision_instructions: [] };
  }

  return {
    verdict: 'REVISE',
    confidence_score,
    revision_instructions: buildRevisionInstructions(findings),
  };
}
