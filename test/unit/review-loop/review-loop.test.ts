/**
 * Tests for the Review Loop
 *
 * Tests cover:
 * - Single draft review and strict export demotion
 * - State transitions (createInitialState, runIteration, finalizeState)
 * - ReviewLoopController PASS / REJECT / REVISE / downgrade flows
 * - Accumulator invariants and iteration budget
 * - Event emission
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { ErrorCode } from '../../../src/errors/error-codes';
import { GateError } from '../../../src/errors/gate-error';
import {
  ReviewLoopController,
  createInitialState,
  finalizeState,
  reviewDraft,
  runIteration,
  runReviewLoop,
  DEFAULT_REVIEW_LOOP_CONFIG,
  type ReviewLoopEventType,
} from '../../../src/review-loop/review-loop';
import {
  complete,
  draftFixedByVolumeFilter,
  draftStuckAtRevise,
  emptyThesisDraft,
  momentumDraftWithoutVolume,
} from '../../helpers/draft-fixtures';

describe('Review Loop', () => {
  describe('reviewDraft', () => {
    it('should mark an eligible PASS as export eligible', () => {
      const review = reviewDraft(complete(), 0);
      assert.equal(review.verdict, 'PASS');
      assert.equal(review.export_eligible, true);
      assert.equal(review.iteration, 0);
      assert.deepEqual(review.defaulted_fields, []);
      assert.equal(review.findings.length, 8);
    });

    it('should not mark a PASS without the export flag as eligible', () => {
      const review = reviewDraft(complete({ export_ready_v1: false }), 0);
      assert.equal(review.verdict, 'PASS');
      assert.equal(review.export_eligible, false);
    });

    it('should carry defaulted fields into the review', () => {
      const review = reviewDraft(emptyThesisDraft(), 0);
      assert.deepEqual(review.defaulted_fields, ['thesis']);
    });

    describe('strict export', () => {
      const warned = complete({ draft_id: 'one_signal', invalidation_signals: ['Close below pivot'] });

      it('should leave an eligible PASS with warnings alone by default', () => {
        const review = reviewDraft(warned, 0);
        assert.equal(review.verdict, 'PASS');
        assert.equal(review.confidence_score, 78);
        assert.equal(review.export_eligible, true);
      });

      it('should send an eligible PASS with warnings back to REVISE', () => {
        const review = reviewDraft(warned, 0, { strict_export: true });
        assert.equal(review.verdict, 'REVISE');
        assert.equal(review.confidence_score, 78);
        assert.equal(review.export_eligible, false);
        assert.deepEqual(review.revision_instructions.map(i => i.kind), ['ADD_INVALIDATION_SIGNALS']);
      });

      it('should not demote a PASS that is not export eligible', () => {
        const review = reviewDraft(
          complete({ invalidation_signals: ['Close below pivot'], export_ready_v1: false }),
          0,
          { strict_export: true }
        );
        assert.equal(review.verdict, 'PASS');
      });

      it('should not demote a clean PASS', () => {
        const review = reviewDraft(complete(), 0, { strict_export: true });
        assert.equal(review.verdict, 'PASS');
        assert.equal(review.export_eligible, true);
      });
    });
  });

  describe('state transitions', () => {
    it('should start with every draft revising', () => {
      const state = createInitialState([complete({ draft_id: 'a' }), complete({ draft_id: 'b' })]);
      assert.equal(state.iteration, 0);
      assert.equal(state.revising.length, 2);
      assert.deepEqual(state.passed, []);
      assert.deepEqual(state.rejected, []);
      assert.deepEqual(state.downgraded, []);
    });

    it('should refuse duplicate draft ids in a batch', () => {
      assert.throws(
        () => createInitialState([complete({ draft_id: 'a' }), complete({ draft_id: 'a' })]),
        (err: Error) => err instanceof GateError && err.code === ErrorCode.E401_ACCUMULATOR_INVARIANT_VIOLATION
      );
    });

    it('should move PASS and REJECT drafts out of revising', () => {
      const initial = createInitialState([
        complete({ draft_id: 'good' }),
        emptyThesisDraft('bad'),
        draftFixedByVolumeFilter('fixable'),
      ]);
      const next = runIteration(initial);

      assert.equal(next.iteration, 1);
      assert.deepEqual(next.passed.map(e => e.review.draft_id), ['good']);
      assert.deepEqual(next.rejected.map(e => e.review.draft_id), ['bad']);
      assert.deepEqual(next.revising.map(e => e.parsed.draft.draft_id), ['fixable']);
    });

    it('should not modify the previous state', () => {
      const initial = createInitialState([draftFixedByVolumeFilter()]);
      runIteration(initial);
      assert.equal(initial.iteration, 0);
      assert.equal(initial.revising.length, 1);
      assert.equal(initial.revising[0].last_review, undefined);
    });

    it('should apply revisions to drafts that stay revising', () => {
      const next = runIteration(createInitialState([draftFixedByVolumeFilter()]));
      const entry = next.revising[0];
      assert.deepEqual(entry.parsed.draft.conditions, [
        'close > high_20d',
        'close > sma_50',
        'rsi_14 > 50',
        'avg_volume > 500000',
      ]);
      assert.equal(entry.last_review?.verdict, 'REVISE');
      assert.equal(entry.last_review?.confidence_score, 67);
    });

    it('should return the same state when nothing is revising', () => {
      const state = { ...createInitialState([]), iteration: 1 };
      assert.equal(runIteration(state), state);
    });

    it('should downgrade every revising draft on finalize', () => {
      const afterOne = runIteration(createInitialState([draftStuckAtRevise()]));
      const final = finalizeState(afterOne);

      assert.deepEqual(final.revising, []);
      assert.equal(final.downgraded.length, 1);
      const [entry] = final.downgraded;
      assert.equal(entry.parsed.draft.variant, 'research_probe');
      assert.equal(entry.parsed.draft.export_ready_v1, false);
      assert.equal(entry.review.verdict, 'REVISE');
      assert.equal(entry.review.export_eligible, false);
      assert.equal(entry.review.iteration, 0);
    });
  });

  describe('ReviewLoopController', () => {
    it('should use a budget of two iterations by default', () => {
      assert.equal(DEFAULT_REVIEW_LOOP_CONFIG.max_review_iterations, 2);
      assert.equal(new ReviewLoopController().getConfig().max_review_iterations, 2);
    });

    it('should reject an iteration budget below one', () => {
      assert.throws(
        () => new ReviewLoopController({ max_review_iterations: 0 }),
        (err: Error) => err instanceof GateError && err.code === ErrorCode.E402_ITERATION_BUDGET_INVALID
      );
    });

    it('should reject a fractional iteration budget', () => {
      assert.throws(
        () => new ReviewLoopController({ max_review_iterations: 1.5 }),
        (err: Error) => err instanceof GateError && err.code === ErrorCode.E402_ITERATION_BUDGET_INVALID
      );
    });

    it('should reject an empty thesis at iteration 0', () => {
      const outcome = runReviewLoop([emptyThesisDraft()]);
      assert.equal(outcome.reviews.length, 1);
      const { review } = outcome.reviews[0];
      assert.equal(review.verdict, 'REJECT');
      assert.equal(review.iteration, 0);
      assert.equal(review.export_eligible, false);
      assert.equal(outcome.iterations_run, 1);
    });

    it('should pass the momentum draft at 77 without revision', () => {
      const outcome = runReviewLoop([momentumDraftWithoutVolume()]);
      const { review } = outcome.reviews[0];
      assert.equal(review.verdict, 'PASS');
      assert.equal(review.confidence_score, 77);
      assert.equal(review.export_eligible, true);
    });

    it('should pass a draft at iteration 1 once the volume filter is added', () => {
      const outcome = runReviewLoop([draftFixedByVolumeFilter()]);
      const [entry] = outcome.reviews;
      assert.equal(entry.review.verdict, 'PASS');
      assert.equal(entry.review.iteration, 1);
      assert.equal(entry.review.confidence_score, 70);
      assert.equal(entry.review.export_eligible, true);
      assert.ok(entry.parsed.draft.conditions.includes('avg_volume > 500000'));
      assert.equal(outcome.iterations_run, 2);
      assert.deepEqual(outcome.downgraded_ids, []);
    });

    it('should downgrade a draft still at REVISE after the budget', () => {
      const outcome = runReviewLoop([draftStuckAtRevise()]);
      const [entry] = outcome.reviews;
      assert.equal(entry.review.verdict, 'REVISE');
      assert.equal(entry.review.iteration, 1);
      assert.equal(entry.review.export_eligible, false);
      assert.equal(entry.parsed.draft.variant, 'research_probe');
      assert.equal(entry.parsed.draft.export_ready_v1, false);
      assert.equal(outcome.iterations_run, 2);
      assert.deepEqual(outcome.downgraded_ids, ['wide_stop']);
    });

    it('should honour a budget of one', () => {
      const outcome = runReviewLoop([draftFixedByVolumeFilter()], { max_review_iterations: 1 });
      assert.equal(outcome.iterations_run, 1);
      assert.deepEqual(outcome.downgraded_ids, ['needs_volume']);
      assert.equal(outcome.reviews[0].review.iteration, 0);
    });

    it('should report reviews in input order', () => {
      const outcome = runReviewLoop([
        draftStuckAtRevise('z_stuck'),
        complete({ draft_id: 'y_pass' }),
        emptyThesisDraft('x_reject'),
      ]);
      assert.deepEqual(
        outcome.reviews.map(e => [e.review.draft_id, e.review.verdict]),
        [
          ['z_stuck', 'REVISE'],
          ['y_pass', 'PASS'],
          ['x_reject', 'REJECT'],
        ]
      );
    });

    it('should stop early when nothing is left revising', () => {
      const outcome = runReviewLoop([complete()], { max_review_iterations: 5 });
      assert.equal(outcome.iterations_run, 1);
    });

    it('should handle an empty batch', () => {
      const outcome = runReviewLoop([]);
      assert.deepEqual(outcome.reviews, []);
      assert.equal(outcome.iterations_run, 0);
    });

    it('should downgrade strict-export demotions that cannot be fixed', () => {
      const outcome = runReviewLoop(
        [complete({ draft_id: 'one_signal', invalidation_signals: ['Close below pivot'] })],
        { strict_export: true }
      );
      assert.deepEqual(outcome.downgraded_ids, ['one_signal']);
      assert.equal(outcome.reviews[0].review.export_eligible, false);
    });

    it('should emit lifecycle events in order', () => {
      const events: ReviewLoopEventType[] = [];
      runReviewLoop([draftFixedByVolumeFilter()], {}, eventType => events.push(eventType));

      assert.deepEqual(events, [
        'REVIEW_LOOP_START',
        'REVIEW_ITERATION_START',
        'DRAFT_REVIEWED',
        'REVISION_APPLIED',
        'REVISION_SKIPPED',
        'REVIEW_ITERATION_END',
        'REVIEW_ITERATION_START',
        'DRAFT_REVIEWED',
        'REVIEW_ITERATION_END',
        'REVIEW_LOOP_END',
      ]);
    });

    it('should emit DRAFT_DOWNGRADED with the new variant', () => {
      const downgrades: Record<string, unknown>[] = [];
      runReviewLoop([draftStuckAtRevise()], {}, (eventType, content) => {
        if (eventType === 'DRAFT_DOWNGRADED') downgrades.push(content);
      });
      assert.deepEqual(downgrades, [{ draft_id: 'wide_stop', variant: 'research_probe', confidence_score: 73 }]);
    });

    it('should report applied and skipped kinds', () => {
      const payloads: Array<[ReviewLoopEventType, Record<string, unknown>]> = [];
      runReviewLoop([draftFixedByVolumeFilter()], {}, (eventType, content) => {
        if (eventType === 'REVISION_APPLIED' || eventType === 'REVISION_SKIPPED') {
          payloads.push([eventType, content]);
        }
      });
      assert.deepEqual(payloads, [
        ['REVISION_APPLIED', { iteration: 0, draft_id: 'needs_volume', kinds: ['ADD_VOLUME_FILTER'] }],
        [
          'REVISION_SKIPPED',
          {
            iteration: 0,
            draft_id: 'needs_volume',
            kinds: ['ADD_CROSS_REGIME_VALIDATION', 'REDUCE_RISK', 'ADD_INVALIDATION_SIGNALS'],
          },
        ],
      ]);
    });
  });
});
