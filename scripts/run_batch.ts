import 'dotenv/config';
import * as path from 'path';
import { createGeminiExtractionDeps, extractFromFiles } from '../src/extraction/runExtraction';
import { writeBatchExports } from '../src/export/writeExports';
import { loadBatchManifest } from '../src/pipeline/manifest';
import { runBatch } from '../src/pipeline/runBatch';
import { createLogger } from '../src/utils/logger';

const logger = createLogger('BatchRun');

async function main() {
  const [manifestPath, outArg] = process.argv.slice(2);
  if (!manifestPath) {
    console.error('Usage: npm run batch -- <manifest.json> [out-dir]');
    console.error('Manifest: { "bundles": [{ "name": "article-1", "files": ["a.pdf", "a_si.xlsx"] }] }');
    process.exit(1);
  }

  const outDir = path.resolve(outArg ?? process.cwd());
  const bundles = await loadBatchManifest(manifestPath);
  const deps = createGeminiExtractionDeps();

  const batch = await runBatch(
    bundles,
    async (files) => (await extractFromFiles(files, deps)).result,
    { logger }
  );

  const stem = `batch_${new Date().toISOString().slice(0, 10)}_${batch.batchId.slice(0, 8)}`;
  const { tablePath, errorsPath } = await writeBatchExports(batch, outDir, stem);

  logger.info(`Batch ${batch.batchId} complete`);
  logger.info(`   Succeeded: ${batch.succeeded}/${bundles.length}`);
  logger.info(`   Failed: ${batch.failed}/${bundles.length}`);
  logger.info(`   Rows: ${batch.table.rows.length}`);
  logger.info(`   Table: ${tablePath}`);
  logger.info(`   Error ledger: ${errorsPath}`);
  for (const entry of batch.errors) {
    logger.warn(`   ${entry.article} (${entry.file_count} files): ${entry.error_kind} - ${entry.error_message}`);
  }
  logger.info(`   Time taken: ${(batch.processingTimeMs / 1000).toFixed(2)}s`);
}

main().catch((error) => {
  logger.error('Batch failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
