import { isExportableFamily, type StrategyDraft } from '../models/draft';
import type { ReviewResult } from '../models/review';

/**
 * Terminal export decision, checked against the draft state the verdict
 * was reached on
 */
export function isExportEligible(review: Pick<ReviewResult, 'verdict'>, draft: StrategyDraft): boolean {
  return review.verdict === 'PASS' && draft.export_ready_v1 && isExportableFamily(draft.entry_family);
}
