import { describe, it, expect } from '@jest/globals';
import {
  flattenExtraction,
  flattenFigures,
  flattenToTable,
  resolveColumns,
  FIGURE_COLUMNS,
} from '../src/flatten/flattenResult';
import { parseExtractionResult } from '../src/schema/extraction';
import { evidence, sampleDocument } from './fixtures/extraction';

const BASE_COLUMNS = [
  'sample_id',
  'time_h',
  'temperature_c',
  'pH',
  'reaction_volume_ml',
  'enzyme_loading_value',
  'enzyme_loading_unit',
  'substrate_name',
  'substrate_morphology',
  'substrate_crystallinity_pct',
  'substrate_amount_value',
  'substrate_amount_unit',
  'product_yield_raw',
  'product_yield_unit',
];

const TRAILING_COLUMNS = [
  'expression_value',
  'expression_unit',
  'tm_c',
  'seq_aa',
  'seq_nuc',
  'confidence',
  'page',
  'location_type',
  'snippet',
];

describe('flattenExtraction', () => {
  const result = parseExtractionResult(sampleDocument());

  it('emits one row per measurement and none for a variant without measurements', () => {
    const rows = flattenExtraction(result);
    expect(rows.map((row) => row.sample_id)).toEqual(['WT', 'ICCG', 'ICCG']);
  });

  it('copies variant, condition and provenance fields into each row', () => {
    const [wt] = flattenExtraction(result);
    expect(wt).toEqual({
      sample_id: 'WT',
      seq_aa: null,
      seq_nuc: null,
      expression_value: null,
      expression_unit: null,
      tm_c: 84.5,
      time_h: 24,
      temperature_c: 72,
      pH: 8,
      reaction_volume_ml: null,
      enzyme_loading_value: null,
      enzyme_loading_unit: null,
      substrate_name: 'PET',
      substrate_morphology: 'film',
      substrate_crystallinity_pct: null,
      substrate_amount_value: null,
      substrate_amount_unit: null,
      product_yield_raw: '90%',
      product_yield_unit: null,
      Conversion: 90,
      Conversion_unit: '%',
      Conversion_std: 2.5,
      confidence: 0.95,
      page: 4,
      location_type: 'Table 2',
      snippet: 'WT reached 90% conversion after 24 h',
    });
  });

  it('keeps the later value when a metric type repeats', () => {
    const row = flattenExtraction(result)[1];
    expect(row?.kcat).toBe(2.0);
    expect(row?.kcat_unit).toBe('min-1');
  });

  it('treats a standard deviation of zero as reported', () => {
    const row = flattenExtraction(result)[1];
    expect(row).toHaveProperty('kcat_std', 0);
  });

  it('drops an earlier standard deviation when the later metric has none', () => {
    const [row] = flattenExtraction(
      parseExtractionResult({
        variants: [
          {
            sample_id: 'A',
            measurements: [
              {
                reported_metrics: [
                  { type: 'kcat', value: 1.0, unit: 's-1', standard_deviation: 0.1 },
                  { type: 'kcat', value: 2.0, unit: 'min-1' },
                ],
                evidence: evidence(3, 'Table 2', 'kcat 1.0 ± 0.1 s-1; 2.0 min-1'),
              },
            ],
          },
        ],
      })
    );

    expect(row?.kcat).toBe(2.0);
    expect(row?.kcat_unit).toBe('min-1');
    expect(row).not.toHaveProperty('kcat_std');
  });

  it('leaves metric columns out of rows that did not report them', () => {
    const kmRow = flattenExtraction(result)[2];
    expect(kmRow?.Km).toBe(0.5);
    expect(kmRow).not.toHaveProperty('Km_std');
    expect(kmRow).not.toHaveProperty('kcat');
  });

  it('is deterministic for the same input', () => {
    expect(flattenExtraction(result)).toEqual(flattenExtraction(result));
    expect(flattenToTable(result).columns).toEqual(flattenToTable(result).columns);
  });
});

describe('flattenToTable', () => {
  it('orders preferred columns first and includes only those present', () => {
    const table = flattenToTable(parseExtractionResult(sampleDocument()));
    expect(table.columns).toEqual([
      ...BASE_COLUMNS,
      'kcat',
      'kcat_unit',
      'kcat_std',
      'Km',
      'Km_unit',
      'Conversion',
      'Conversion_unit',
      'Conversion_std',
      ...TRAILING_COLUMNS,
    ]);
    expect(table.rows).toHaveLength(3);
  });

  it('has no columns when there are no variants', () => {
    const table = flattenToTable(parseExtractionResult({ variants: [] }));
    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('keeps rows of a measurement without metrics', () => {
    const table = flattenToTable(
      parseExtractionResult({
        variants: [{ sample_id: 'A', measurements: [{ time_h: 2, evidence: evidence(1, 'Text', 'two hours') }] }],
      })
    );
    expect(table.columns).toEqual([...BASE_COLUMNS, ...TRAILING_COLUMNS]);
    expect(table.rows[0]?.time_h).toBe(2);
  });
});

describe('resolveColumns', () => {
  it('appends unknown columns in first-seen order', () => {
    const columns = resolveColumns([
      { zeta: 1, sample_id: 'A' },
      { alpha: 2, sample_id: 'B', zeta: 3 },
    ]);
    expect(columns).toEqual(['sample_id', 'zeta', 'alpha']);
  });

  it('honours a caller-supplied preferred order', () => {
    expect(resolveColumns([{ b: 1, a: 2 }], ['a'])).toEqual(['a', 'b']);
  });
});

describe('flattenFigures', () => {
  it('lists flagged figures', () => {
    const table = flattenFigures(parseExtractionResult(sampleDocument()));
    expect(table.columns).toEqual(FIGURE_COLUMNS);
    expect(table.rows).toEqual([
      {
        figure_id: 'Figure 2',
        page_number: 3,
        data_type: 'time_course',
        description: 'Time course of PET hydrolysis',
        why_relevant: 'Rates for variants missing from the tables',
        estimated_datapoints: 12,
      },
    ]);
  });

  it('is empty when nothing was flagged', () => {
    expect(flattenFigures(parseExtractionResult({ variants: [] }))).toEqual({ columns: [], rows: [] });
  });
});
