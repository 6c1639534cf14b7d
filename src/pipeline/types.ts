import type { ExtractionErrorKind } from '../extraction/errors';
import type { FlatTable } from '../flatten/flattenResult';

export interface EvidenceBundle {
  /** Identifies the research artifact; becomes the `article` cell of every row. */
  name: string;
  files: string[];
}

export interface BatchErrorEntry {
  article: string;
  file_count: number;
  error_kind: ExtractionErrorKind | 'UnexpectedError';
  error_message: string;
}

export interface BatchResult {
  batchId: string;
  table: FlatTable;
  errors: BatchErrorEntry[];
  succeeded: number;
  failed: number;
  processingTimeMs: number;
}
