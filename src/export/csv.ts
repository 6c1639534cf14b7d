import type { CellValue, FlatTable } from '../flatten/flattenResult';
import type { BatchErrorEntry } from '../pipeline/types';

export function escapeCsv(val: CellValue | undefined): string {
  if (val == null) return '';
  const s = String(val);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

/** Header plus one line per row; a column a row lacks renders as an empty cell. */
export function tableToCsv(table: FlatTable): string {
  if (table.columns.length === 0) return '';
  const lines = [table.columns.map(escapeCsv).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => escapeCsv(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

export const ERROR_LEDGER_COLUMNS = ['article', 'file_count', 'error_kind', 'error_message'];

export function errorLedgerToCsv(errors: BatchErrorEntry[]): string {
  return tableToCsv({
    columns: ERROR_LEDGER_COLUMNS,
    rows: errors.map((entry) => ({
      article: entry.article,
      file_count: entry.file_count,
      error_kind: entry.error_kind,
      error_message: entry.error_message,
    })),
  });
}
