import { describe, it, expect } from '@jest/globals';
import { ResponseSchemaMismatch } from '../src/extraction/errors';
import { runBatch, type BundleExtractor } from '../src/pipeline/runBatch';
import type { EvidenceBundle } from '../src/pipeline/types';
import { parseExtractionResult } from '../src/schema/extraction';
import { silentLogger } from '../src/utils/logger';
import { singleVariantDocument } from './fixtures/extraction';

const bundles: EvidenceBundle[] = [
  { name: 'paper-1', files: ['/batch/p1/main.pdf'] },
  { name: 'paper-2', files: ['/batch/p2/main.pdf', '/batch/p2/supp.xlsx'] },
  { name: 'paper-3', files: ['/batch/p3/main.pdf'] },
];

const sampleIds: Record<string, string> = {
  '/batch/p1/main.pdf': 'LCC',
  '/batch/p2/main.pdf': 'PHL7',
  '/batch/p3/main.pdf': 'FAST',
};

const extractBySample: BundleExtractor = async (files) =>
  parseExtractionResult(singleVariantDocument(sampleIds[files[0] ?? ''] ?? 'unknown'));

describe('runBatch', () => {
  it('records a failing bundle and keeps the others', async () => {
    const extract: BundleExtractor = async (files) => {
      if (files[0] === '/batch/p2/main.pdf') {
        throw new ResponseSchemaMismatch('variants: expected array, received undefined', '{}');
      }
      return extractBySample(files);
    };

    const batch = await runBatch(bundles, extract, { logger: silentLogger, batchId: 'batch-1' });

    expect(batch.batchId).toBe('batch-1');
    expect(batch.succeeded).toBe(2);
    expect(batch.failed).toBe(1);
    expect(batch.table.rows.map((row) => [row.article, row.sample_id])).toEqual([
      ['paper-1', 'LCC'],
      ['paper-3', 'FAST'],
    ]);
    expect(batch.errors).toEqual([
      {
        article: 'paper-2',
        file_count: 2,
        error_kind: 'ResponseSchemaMismatch',
        error_message:
          'Response did not match the extraction schema: variants: expected array, received undefined\nResponse preview:\n{}',
      },
    ]);
  });

  it('puts the article column first', async () => {
    const batch = await runBatch(bundles, extractBySample, { logger: silentLogger });

    expect(batch.table.columns.slice(0, 3)).toEqual(['article', 'sample_id', 'time_h']);
    expect(batch.table.columns).toContain('SpecificActivity');
    expect(batch.errors).toEqual([]);
  });

  it('records unexpected errors under their own kind', async () => {
    const batch = await runBatch(
      [{ name: 'paper-x', files: ['/batch/x.pdf'] }],
      async () => {
        throw new TypeError('cannot read properties of undefined');
      },
      { logger: silentLogger }
    );

    expect(batch.errors).toEqual([
      {
        article: 'paper-x',
        file_count: 1,
        error_kind: 'UnexpectedError',
        error_message: 'cannot read properties of undefined',
      },
    ]);
    expect(batch.table).toEqual({ columns: [], rows: [] });
  });

  it('keeps bundle order when bundles run concurrently', async () => {
    const delays: Record<string, number> = {
      '/batch/p1/main.pdf': 30,
      '/batch/p2/main.pdf': 0,
      '/batch/p3/main.pdf': 10,
    };
    let running = 0;
    let maxRunning = 0;

    const extract: BundleExtractor = async (files) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await new Promise((resolve) => setTimeout(resolve, delays[files[0] ?? ''] ?? 0));
      running--;
      return extractBySample(files);
    };

    const batch = await runBatch(bundles, extract, { logger: silentLogger, concurrency: 2 });

    expect(batch.table.rows.map((row) => row.article)).toEqual(['paper-1', 'paper-2', 'paper-3']);
    expect(maxRunning).toBe(2);
  });

  it('runs one bundle at a time through the shared lane by default', async () => {
    let running = 0;
    let maxRunning = 0;
    const started: string[] = [];

    const extract: BundleExtractor = async (files) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      started.push(files[0] ?? '');
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return extractBySample(files);
    };

    const batch = await runBatch(bundles, extract, { logger: silentLogger });

    expect(maxRunning).toBe(1);
    expect(started).toEqual(['/batch/p1/main.pdf', '/batch/p2/main.pdf', '/batch/p3/main.pdf']);
    expect(batch.succeeded).toBe(3);
  });
});
