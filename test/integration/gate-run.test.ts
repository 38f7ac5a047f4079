/**
 * End-to-end gate runs over draft directories on disk
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { resolveConfiguration, runGate } from '../../src/core/gate-runner';
import { ErrorCode } from '../../src/errors/error-codes';
import { FatalIOError } from '../../src/errors/gate-error';
import { GateLogger } from '../../src/logging/gate-logger';
import { isRecord } from '../../src/utils/value-guards';
import {
  createTempDir,
  draftDocument,
  draftFixedByVolumeFilter,
  draftStuckAtRevise,
  writeDraftFile,
} from '../helpers/draft-fixtures';

const NOW = new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 678));

describe('Gate run (integration)', () => {
  let tempDir: string;
  let draftsDir: string;
  let outputDir: string;
  let logger: GateLogger;

  beforeEach(() => {
    tempDir = createTempDir();
    draftsDir = path.join(tempDir, 'drafts');
    outputDir = path.join(tempDir, 'reports');
    fs.mkdirSync(draftsDir);
    logger = new GateLogger();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeMixedBatch(): void {
    writeDraftFile(draftsDir, 'a_base.yaml', draftDocument());
    writeDraftFile(draftsDir, 'b_needs_volume.yaml', draftDocument(draftFixedByVolumeFilter().draft));
    writeDraftFile(draftsDir, 'c_wide_stop.json', draftDocument(draftStuckAtRevise().draft));
    const { variant: _variant, ...withoutVariant } = draftDocument({ draft_id: 'broken' });
    writeDraftFile(draftsDir, 'd_broken.yaml', withoutVariant);
    writeDraftFile(draftsDir, 'run_manifest.json', { run_id: 'upstream' });
  }

  it('should review, revise, downgrade and write every output', () => {
    writeMixedBatch();
    const config = resolveConfiguration(undefined, { markdown_summary: true, write_revised_drafts: true }, tempDir);

    const result = runGate({ input: { draftsDir }, outputDir, config, logger, runId: 'run-int', now: NOW });

    assert.deepEqual(
      result.document.reviews.map(r => [r.draft_id, r.verdict, r.confidence_score, r.export_eligible, r.iteration]),
      [
        ['draft_base', 'PASS', 80, true, 0],
        ['needs_volume', 'PASS', 70, true, 1],
        ['wide_stop', 'REVISE', 73, false, 1],
      ]
    );
    assert.deepEqual(result.document.summary, {
      total: 3,
      PASS: 2,
      REVISE: 1,
      REJECT: 0,
      export_eligible: 2,
      failed_loads: 1,
    });
    assert.deepEqual(result.document.loop, { max_review_iterations: 2, iterations_run: 2, downgraded: ['wide_stop'] });
    assert.deepEqual(result.document.failed_loads, [
      { file: path.join(draftsDir, 'd_broken.yaml'), code: ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING, reason: 'variant' },
    ]);

    assert.deepEqual(result.written, [
      path.join(outputDir, 'review.yaml'),
      path.join(outputDir, 'review_summary.md'),
      path.join(outputDir, 'drafts', 'draft_base.yaml'),
      path.join(outputDir, 'drafts', 'needs_volume.yaml'),
      path.join(outputDir, 'drafts', 'wide_stop.yaml'),
    ]);

    const review = yaml.load(fs.readFileSync(result.written[0], 'utf-8'));
    assert.ok(isRecord(review));
    assert.equal(review.run_id, 'run-int');
    assert.equal(review.generated_at_utc, '2026-01-02T03:04:05Z');

    const revised = yaml.load(fs.readFileSync(path.join(outputDir, 'drafts', 'needs_volume.yaml'), 'utf-8'));
    assert.ok(isRecord(revised));
    assert.deepEqual(revised.conditions, ['close > high_20d', 'close > sma_50', 'rsi_14 > 50', 'avg_volume > 500000']);
    assert.equal(revised.variant, 'core');

    const downgraded = yaml.load(fs.readFileSync(path.join(outputDir, 'drafts', 'wide_stop.yaml'), 'utf-8'));
    assert.ok(isRecord(downgraded));
    assert.equal(downgraded.variant, 'research_probe');
    assert.equal(downgraded.export_ready_v1, false);
  });

  it('should record every decision in the logger', () => {
    writeMixedBatch();
    runGate({ input: { draftsDir }, outputDir, config: resolveConfiguration(undefined, {}, tempDir), logger });

    assert.deepEqual(
      logger.getByCategory('REVISION').map(e => `${e.draftId}: ${e.message}`),
      [
        'needs_volume: Applied: ADD_VOLUME_FILTER',
        'needs_volume: No automatic fix for: ADD_CROSS_REGIME_VALIDATION, REDUCE_RISK, ADD_INVALIDATION_SIGNALS',
        'wide_stop: No automatic fix for: TIGHTEN_EXITS',
        'wide_stop: No automatic fix for: TIGHTEN_EXITS',
      ]
    );
    assert.deepEqual(
      logger.getByCategory('VERDICT').map(e => `${e.draftId}: ${e.message}`),
      [
        'draft_base: PASS at iteration 0',
        'needs_volume: REVISE at iteration 0',
        'wide_stop: REVISE at iteration 0',
        'needs_volume: PASS at iteration 1',
        'wide_stop: REVISE at iteration 1',
      ]
    );
    assert.deepEqual(logger.getByCategory('DOWNGRADE').map(e => e.draftId), ['wide_stop']);
    assert.deepEqual(
      logger.getByCategory('LOAD').filter(e => e.level === 'warn').map(e => e.message),
      [`Skipped ${path.join(draftsDir, 'd_broken.yaml')}: [E103] variant`]
    );
    assert.deepEqual(logger.getByCategory('OUTPUT').map(e => e.message), [`Wrote ${path.join(outputDir, 'review.yaml')}`]);
  });

  it('should downgrade on the first iteration with a budget of one', () => {
    writeDraftFile(draftsDir, 'needs_volume.yaml', draftDocument(draftFixedByVolumeFilter().draft));
    const config = resolveConfiguration(undefined, { max_review_iterations: 1, format: 'json' }, tempDir);

    const result = runGate({ input: { draftsDir }, outputDir, config, logger });

    assert.deepEqual(result.document.loop, { max_review_iterations: 1, iterations_run: 1, downgraded: ['needs_volume'] });
    assert.equal(result.document.reviews[0].verdict, 'REVISE');
    assert.equal(result.document.reviews[0].confidence_score, 67);
    assert.equal(result.document.reviews[0].iteration, 0);
    assert.deepEqual(result.written, [path.join(outputDir, 'review.json')]);
  });

  it('should write an empty report for a directory without drafts', () => {
    writeDraftFile(draftsDir, 'run_manifest.yaml', { run_id: 'upstream' });

    const result = runGate({
      input: { draftsDir },
      outputDir,
      config: resolveConfiguration(undefined, {}, tempDir),
      logger,
    });

    assert.equal(result.document.summary.total, 0);
    assert.deepEqual(result.document.reviews, []);
    assert.deepEqual(result.document.loop, { max_review_iterations: 2, iterations_run: 0, downgraded: [] });
    assert.deepEqual(
      logger.getByCategory('LOAD').map(e => e.message),
      [`No reviewable drafts found in ${draftsDir}`]
    );
  });

  it('should abort when the output directory is not writable', () => {
    writeDraftFile(draftsDir, 'a.yaml', draftDocument());
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'file');

    assert.throws(
      () =>
        runGate({
          input: { draftsDir },
          outputDir: path.join(blocker, 'reports'),
          config: resolveConfiguration(undefined, {}, tempDir),
          logger,
        }),
      (error: unknown) => error instanceof FatalIOError && error.code === ErrorCode.E301_OUTPUT_NOT_WRITABLE
    );
  });
});
