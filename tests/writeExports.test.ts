import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { writeBatchExports, writeExtractionExports } from '../src/export/writeExports';
import type { BatchResult } from '../src/pipeline/types';
import { parseExtractionResult } from '../src/schema/extraction';
import { sampleDocument, singleVariantDocument } from './fixtures/extraction';

describe('writeExports', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'write-exports-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes JSON, CSV and the figure list for one extraction', async () => {
    const written = await writeExtractionExports(parseExtractionResult(sampleDocument()), dir, 'main');

    expect(written).toEqual([
      path.join(dir, 'main.json'),
      path.join(dir, 'main.csv'),
      path.join(dir, 'main_figures.csv'),
    ]);
    const json = await fs.readFile(path.join(dir, 'main.json'), 'utf-8');
    expect(JSON.parse(json)).toEqual(sampleDocument());
    expect(json.endsWith('}\n')).toBe(true);
  });

  it('skips the figure list when nothing was flagged', async () => {
    const written = await writeExtractionExports(parseExtractionResult(singleVariantDocument('LCC')), dir, 'lcc');

    expect(written.map((file) => path.basename(file))).toEqual(['lcc.json', 'lcc.csv']);
  });

  it('writes the batch table and its error ledger', async () => {
    const batch: BatchResult = {
      batchId: 'batch-1',
      table: { columns: ['article', 'sample_id'], rows: [{ article: 'paper-1', sample_id: 'LCC' }] },
      errors: [{ article: 'paper-2', file_count: 1, error_kind: 'EmptyResponse', error_message: 'Model returned no text to parse' }],
      succeeded: 1,
      failed: 1,
      processingTimeMs: 5,
    };

    const paths = await writeBatchExports(batch, path.join(dir, 'out'), 'batch');

    expect(paths).toEqual({
      tablePath: path.join(dir, 'out', 'batch.csv'),
      errorsPath: path.join(dir, 'out', 'batch_errors.csv'),
    });
    await expect(fs.readFile(paths.tablePath, 'utf-8')).resolves.toBe('article,sample_id\npaper-1,LCC\n');
    await expect(fs.readFile(path.join(dir, 'out', 'batch_errors.csv'), 'utf-8')).resolves.toBe(
      'article,file_count,error_kind,error_message\npaper-2,1,EmptyResponse,Model returned no text to parse\n'
    );

    const clean = await writeBatchExports({ ...batch, errors: [], failed: 0 }, dir, 'clean');
    expect(clean.errorsPath).toBe(path.join(dir, 'clean_errors.csv'));
    await expect(fs.readFile(clean.errorsPath, 'utf-8')).resolves.toBe(
      'article,file_count,error_kind,error_message\n'
    );
  });
});
