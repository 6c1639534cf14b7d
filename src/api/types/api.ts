import type { SkippedFile } from '../../extraction/errors';
import type { ExtractionResultDocument } from '../../schema/extraction';

export type ExtractionJobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface ExtractionJob {
  jobId: string;
  status: ExtractionJobStatus;
  files: string[];
  createdAt: string;
  completedAt?: string;
  result?: ExtractionResultDocument;
  rowCount?: number;
  skippedFiles?: SkippedFile[];
  error?: {
    kind: string;
    message: string;
  };
}

export type ExportFormat = 'csv' | 'json' | 'figures-csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json', 'figures-csv'];
