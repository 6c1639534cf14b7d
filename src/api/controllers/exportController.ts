import type { FastifyRequest, FastifyReply } from 'fastify';
import { tableToCsv } from '../../export/csv';
import { flattenFigures, flattenToTable } from '../../flatten/flattenResult';
import { parseExtractionResult, toStructuredJson } from '../../schema/extraction';
import { createError } from '../middleware/errorHandler';
import { EXPORT_FORMATS, type ExportFormat } from '../types/api';

function getFormat(format: string | undefined): ExportFormat {
  const match = EXPORT_FORMATS.find((candidate) => candidate === format);
  if (!match) {
    throw createError(
      `format must be one of: ${EXPORT_FORMATS.join(', ')}`,
      400,
      'INVALID_EXPORT_FORMAT'
    );
  }
  return match;
}

function filename(format: ExportFormat): string {
  const stamp = new Date().toISOString().slice(0, 10);
  switch (format) {
    case 'csv':
      return `audit-data-${stamp}.csv`;
    case 'json':
      return `forensic-data-${stamp}.json`;
    case 'figures-csv':
      return `figures-to-digitize-${stamp}.csv`;
  }
}

/**
 * Exports a result document sent by the client, typically after manual
 * edits. The document is validated again before anything is rendered.
 */
export class ExportController {
  async export(
    request: FastifyRequest<{ Body: unknown; Querystring: { format?: string } }>,
    reply: FastifyReply
  ): Promise<void> {
    const format = getFormat(request.query.format);
    const result = parseExtractionResult(request.body);
    const name = filename(format);

    switch (format) {
      case 'csv':
        reply
          .header('Content-Type', 'text/csv; charset=utf-8')
          .header('Content-Disposition', `attachment; filename="${name}"`)
          .send(tableToCsv(flattenToTable(result)));
        return;
      case 'figures-csv':
        reply
          .header('Content-Type', 'text/csv; charset=utf-8')
          .header('Content-Disposition', `attachment; filename="${name}"`)
          .send(tableToCsv(flattenFigures(result)));
        return;
      case 'json':
        reply
          .header('Content-Type', 'application/json; charset=utf-8')
          .header('Content-Disposition', `attachment; filename="${name}"`)
          .send(toStructuredJson(result));
        return;
    }
  }
}
