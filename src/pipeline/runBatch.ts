import { v4 as uuidv4 } from 'uuid';
import { isExtractionError } from '../extraction/errors';
import { buildTable, flattenExtraction, PREFERRED_COLUMNS, type FlatRow } from '../flatten/flattenResult';
import type { ExtractionResult } from '../schema/extraction';
import { LaneLimiter, sharedLimiter } from '../utils/limiter';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import type { BatchErrorEntry, BatchResult, EvidenceBundle } from './types';

export type BundleExtractor = (files: string[]) => Promise<ExtractionResult>;

export interface BatchOptions {
  logger?: Logger;
  batchId?: string;
  /**
   * Bundles run at most this many at a time; output order is bundle order
   * regardless. Without it, bundles share the process-wide `bundles` lane
   * (`BATCH_CONCURRENCY`, default 1).
   */
  concurrency?: number;
}

export const BATCH_PREFERRED_COLUMNS: readonly string[] = ['article', ...PREFERRED_COLUMNS];

type BundleOutcome =
  | { ok: true; rows: FlatRow[] }
  | { ok: false; error: BatchErrorEntry };

const defaultLogger = createLogger('Batch');

function toErrorEntry(bundle: EvidenceBundle, error: unknown): BatchErrorEntry {
  return {
    article: bundle.name,
    file_count: bundle.files.length,
    error_kind: isExtractionError(error) ? error.kind : 'UnexpectedError',
    error_message: errorMessage(error),
  };
}

async function runBundle(
  bundle: EvidenceBundle,
  extract: BundleExtractor,
  logger: Logger
): Promise<BundleOutcome> {
  const startedAt = Date.now();
  try {
    const result = await extract(bundle.files);
    const rows = flattenExtraction(result).map((row) => ({ article: bundle.name, ...row }));
    logger.info(`[${bundle.name}] ${rows.length} row(s) in ${Date.now() - startedAt}ms`);
    return { ok: true, rows };
  } catch (error) {
    const entry = toErrorEntry(bundle, error);
    logger.error(`[${bundle.name}] ${entry.error_kind}: ${entry.error_message}`, {
      files: bundle.files.length,
    });
    return { ok: false, error: entry };
  }
}

/**
 * Extracts every bundle independently. A failing bundle becomes an entry in
 * the error ledger; the remaining bundles still run.
 */
export async function runBatch(
  bundles: EvidenceBundle[],
  extract: BundleExtractor,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const logger = options.logger ?? defaultLogger;
  const batchId = options.batchId ?? uuidv4();
  const limiter =
    options.concurrency !== undefined ? new LaneLimiter({ bundles: options.concurrency }) : sharedLimiter;
  const concurrency = limiter.capacity('bundles');
  const startedAt = Date.now();

  logger.info(`Starting batch ${batchId}: ${bundles.length} bundle(s), concurrency ${concurrency}`);

  const outcomes = await Promise.all(
    bundles.map((bundle) => limiter.limit('bundles', () => runBundle(bundle, extract, logger)))
  );

  const rows: FlatRow[] = [];
  const errors: BatchErrorEntry[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      rows.push(...outcome.rows);
    } else {
      errors.push(outcome.error);
    }
  }

  const succeeded = outcomes.length - errors.length;
  const processingTimeMs = Date.now() - startedAt;
  logger.info(`Batch ${batchId} finished: ${succeeded} succeeded, ${errors.length} failed`, {
    rows: rows.length,
    processingTimeMs,
  });

  return {
    batchId,
    table: buildTable(rows, BATCH_PREFERRED_COLUMNS),
    errors,
    succeeded,
    failed: errors.length,
    processingTimeMs,
  };
}
