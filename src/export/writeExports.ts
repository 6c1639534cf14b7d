import * as fs from 'fs/promises';
import * as path from 'path';
import { flattenFigures, flattenToTable, type FlatTable } from '../flatten/flattenResult';
import { toStructuredJson, type ExtractionResult } from '../schema/extraction';
import type { BatchResult } from '../pipeline/types';
import { errorLedgerToCsv, tableToCsv } from './csv';

async function writeText(filePath: string, content: string): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

export async function writeTableCsv(filePath: string, table: FlatTable): Promise<string> {
  return writeText(filePath, tableToCsv(table));
}

/**
 * Writes `<stem>.json`, `<stem>.csv` and, when figures were flagged,
 * `<stem>_figures.csv`. Returns the written paths.
 */
export async function writeExtractionExports(
  result: ExtractionResult,
  outDir: string,
  stem: string
): Promise<string[]> {
  const written = [
    await writeText(path.join(outDir, `${stem}.json`), toStructuredJson(result) + '\n'),
    await writeTableCsv(path.join(outDir, `${stem}.csv`), flattenToTable(result)),
  ];

  const figures = flattenFigures(result);
  if (figures.rows.length > 0) {
    written.push(await writeTableCsv(path.join(outDir, `${stem}_figures.csv`), figures));
  }
  return written;
}

/** Writes `<stem>.csv` and `<stem>_errors.csv`; the ledger is header-only when every bundle succeeded. */
export async function writeBatchExports(
  batch: BatchResult,
  outDir: string,
  stem: string
): Promise<{ tablePath: string; errorsPath: string }> {
  const tablePath = await writeTableCsv(path.join(outDir, `${stem}.csv`), batch.table);
  const errorsPath = await writeText(path.join(outDir, `${stem}_errors.csv`), errorLedgerToCsv(batch.errors));
  return { tablePath, errorsPath };
}
