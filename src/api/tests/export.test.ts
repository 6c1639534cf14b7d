import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import { tableToCsv } from '../../export/csv';
import { flattenToTable } from '../../flatten/flattenResult';
import { parseExtractionResult } from '../../schema/extraction';
import { sampleDocument } from '../../../tests/fixtures/extraction';
import { createTestServer } from './utils/testHelpers';

describe('Export API', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    ({ server } = await createTestServer());
  });

  afterEach(async () => {
    await server.close();
  });

  it('should export the flat table as CSV', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/export?format=csv',
      payload: sampleDocument(),
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(response.headers['content-disposition']).toMatch(/^attachment; filename="audit-data-\d{4}-\d{2}-\d{2}\.csv"$/);
    expect(response.body).toBe(tableToCsv(flattenToTable(parseExtractionResult(sampleDocument()))));
    expect(response.body.split('\n')).toHaveLength(5);
  });

  it('should export the structured document as JSON', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/export?format=json',
      payload: sampleDocument(),
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.json()).toEqual(sampleDocument());
  });

  it('should export flagged figures as CSV', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/export?format=figures-csv',
      payload: sampleDocument(),
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe(
      'figure_id,page_number,data_type,description,why_relevant,estimated_datapoints\n' +
        'Figure 2,3,time_course,Time course of PET hydrolysis,Rates for variants missing from the tables,12\n'
    );
  });

  it('should reject an unknown format', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/export?format=xml',
      payload: sampleDocument(),
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        message: 'format must be one of: csv, json, figures-csv',
        code: 'INVALID_EXPORT_FORMAT',
        statusCode: 400,
      },
    });
  });

  it('should reject a document that breaks the schema', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/export?format=csv',
      payload: { paper_doi: '10.1/x' },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error.code).toBe('SCHEMA_VIOLATION');
    expect(body.error.details).toEqual({ path: 'variants', expected: 'array', received: 'undefined' });
  });
});
