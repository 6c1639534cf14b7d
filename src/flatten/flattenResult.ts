import {
  KINETIC_PARAMETER_TYPES,
  type ExtractionResult,
  type Measurement,
  type Variant,
} from '../schema/extraction';

export type CellValue = string | number | null;

/** One row per measurement; metric columns exist only where that metric was reported. */
export type FlatRow = Record<string, CellValue>;

export interface FlatTable {
  columns: string[];
  rows: FlatRow[];
}

const IDENTITY_COLUMNS = ['sample_id'];

const CONDITION_COLUMNS = [
  'time_h',
  'temperature_c',
  'pH',
  'reaction_volume_ml',
  'enzyme_loading_value',
  'enzyme_loading_unit',
];

const SUBSTRATE_COLUMNS = [
  'substrate_name',
  'substrate_morphology',
  'substrate_crystallinity_pct',
  'substrate_amount_value',
  'substrate_amount_unit',
];

const YIELD_COLUMNS = ['product_yield_raw', 'product_yield_unit'];

const METRIC_COLUMNS = KINETIC_PARAMETER_TYPES.flatMap((type) => [type, `${type}_unit`, `${type}_std`]);

const ENZYME_COLUMNS = ['expression_value', 'expression_unit', 'tm_c'];

const SEQUENCE_COLUMNS = ['seq_aa', 'seq_nuc'];

const PROVENANCE_COLUMNS = ['confidence', 'page', 'location_type', 'snippet'];

export const PREFERRED_COLUMNS: readonly string[] = [
  ...IDENTITY_COLUMNS,
  ...CONDITION_COLUMNS,
  ...SUBSTRATE_COLUMNS,
  ...YIELD_COLUMNS,
  ...METRIC_COLUMNS,
  ...ENZYME_COLUMNS,
  ...SEQUENCE_COLUMNS,
  ...PROVENANCE_COLUMNS,
];

function cell(value: string | number | null | undefined): CellValue {
  return value ?? null;
}

function variantFields(variant: Variant): FlatRow {
  return {
    sample_id: variant.sample_id,
    seq_aa: cell(variant.seq_aa),
    seq_nuc: cell(variant.seq_nuc),
    expression_value: cell(variant.expression_value),
    expression_unit: cell(variant.expression_unit),
    tm_c: cell(variant.tm_c),
  };
}

function measurementFields(measurement: Measurement): FlatRow {
  const { evidence } = measurement;
  return {
    time_h: cell(measurement.time_h),
    temperature_c: cell(measurement.temperature_c),
    pH: cell(measurement.ph),
    reaction_volume_ml: cell(measurement.reaction_volume_ml),
    enzyme_loading_value: cell(measurement.enzyme_loading_value),
    enzyme_loading_unit: cell(measurement.enzyme_loading_unit),
    substrate_name: cell(measurement.substrate_name),
    substrate_morphology: cell(measurement.substrate_morphology),
    substrate_crystallinity_pct: cell(measurement.substrate_crystallinity_pct),
    substrate_amount_value: cell(measurement.substrate_amount_value),
    substrate_amount_unit: cell(measurement.substrate_amount_unit),
    product_yield_raw: cell(measurement.product_yield_raw),
    product_yield_unit: cell(measurement.product_yield_unit),
    confidence: evidence.confidence_score,
    page: evidence.page_number,
    location_type: evidence.location_type,
    snippet: evidence.raw_text_snippet,
  };
}

/**
 * One row per measurement. A metric type reported twice in the same
 * measurement keeps the later value, its unit and its std; an earlier std
 * never outlives the metric it belongs to.
 */
export function flattenExtraction(result: ExtractionResult): FlatRow[] {
  const rows: FlatRow[] = [];

  for (const variant of result.variants) {
    const common = variantFields(variant);

    for (const measurement of variant.measurements) {
      const row: FlatRow = { ...common, ...measurementFields(measurement) };

      for (const metric of measurement.reported_metrics ?? []) {
        row[metric.type] = metric.value;
        row[`${metric.type}_unit`] = metric.unit;
        if (metric.standard_deviation !== null && metric.standard_deviation !== undefined) {
          row[`${metric.type}_std`] = metric.standard_deviation;
        } else {
          delete row[`${metric.type}_std`];
        }
      }

      rows.push(row);
    }
  }

  return rows;
}

/**
 * Preferred columns that occur in any row, in preferred order, followed by
 * every other column in first-seen order.
 */
export function resolveColumns(rows: FlatRow[], preferred: readonly string[] = PREFERRED_COLUMNS): string[] {
  const seen: string[] = [];
  const seenSet = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seenSet.has(key)) {
        seenSet.add(key);
        seen.push(key);
      }
    }
  }

  const preferredSet = new Set(preferred);
  return [
    ...preferred.filter((column) => seenSet.has(column)),
    ...seen.filter((column) => !preferredSet.has(column)),
  ];
}

export function buildTable(rows: FlatRow[], preferred: readonly string[] = PREFERRED_COLUMNS): FlatTable {
  return { columns: resolveColumns(rows, preferred), rows };
}

export function flattenToTable(result: ExtractionResult): FlatTable {
  return buildTable(flattenExtraction(result));
}

export const FIGURE_COLUMNS = [
  'figure_id',
  'page_number',
  'data_type',
  'description',
  'why_relevant',
  'estimated_datapoints',
];

export function flattenFigures(result: ExtractionResult): FlatTable {
  const rows: FlatRow[] = (result.figures_requiring_digitization ?? []).map((figure) => ({
    figure_id: figure.figure_id,
    page_number: figure.page_number,
    data_type: figure.data_type,
    description: figure.description,
    why_relevant: figure.why_relevant,
    estimated_datapoints: cell(figure.estimated_datapoints),
  }));
  return { columns: rows.length > 0 ? [...FIGURE_COLUMNS] : [], rows };
}
