import { z } from 'zod';
import { SchemaViolation, formatPath } from '../extraction/errors';

// Absent and null both mean "not reported"; the model emits either.
const optionalNumber = () => z.number().nullable().optional();
const optionalString = () => z.string().nullable().optional();

export const KINETIC_PARAMETER_TYPES = [
  'kcat',
  'Km',
  'Vmax',
  'SpecificActivity',
  'ProductConcentration',
  'Conversion',
  'HalfLife',
  'Other',
] as const;

export type KineticParameterType = (typeof KINETIC_PARAMETER_TYPES)[number];

export const EvidenceSchema = z
  .object({
    raw_text_snippet: z
      .string()
      .describe('Exact text fragment or table row the value was read from. Copy it literally.'),
    page_number: z
      .number()
      .int()
      .min(0)
      .describe('Page of the source document. 0 for spreadsheets, images and other unpaginated sources.'),
    location_type: z.string().describe("Where the value sits, e.g. 'Table 1', 'Figure 3', 'Sheet Activity'."),
    confidence_score: z.number().min(0).max(1).describe('Certainty of the extraction between 0.0 and 1.0.'),
  })
  .strict();

export const KineticParameterSchema = z
  .object({
    type: z.enum(KINETIC_PARAMETER_TYPES).describe('Metric kind. Use Other when none of the listed kinds applies.'),
    value: z.number().describe('Numeric value as reported.'),
    unit: z.string().describe("Unit exactly as reported, e.g. 'min-1', 'mM', 'U/mg', '%'."),
    standard_deviation: optionalNumber().describe('Standard deviation when reported.'),
  })
  .strict();

export const UnextractedFigureSchema = z
  .object({
    figure_id: z.string().describe("Figure label, e.g. 'Figure 1' or 'Fig. S3'."),
    page_number: z.number().int().min(0).describe('Page the figure appears on.'),
    description: z.string().describe('What the figure shows.'),
    data_type: z
      .string()
      .describe("One of 'time_course', 'kinetic_curve', 'inhibition_curve', 'temperature_profile', 'pH_profile', 'other'."),
    why_relevant: z.string().describe('Why a human should digitize it.'),
    estimated_datapoints: z.number().int().min(0).nullable().optional().describe('Approximate number of plotted points.'),
  })
  .strict();

export const MeasurementSchema = z
  .object({
    time_h: optionalNumber().describe('Assay duration in hours.'),
    temperature_c: optionalNumber().describe('Temperature in Celsius.'),
    ph: optionalNumber().describe('Buffer pH.'),
    reaction_volume_ml: optionalNumber().describe('Reaction volume in mL.'),
    enzyme_loading_value: optionalNumber().describe('Amount of enzyme loaded.'),
    enzyme_loading_unit: optionalString().describe("Unit of the enzyme loading, e.g. 'mg/mL', 'nM', 'mg enzyme/g PET'."),
    substrate_name: optionalString().describe("Substrate name, e.g. 'PET'."),
    substrate_morphology: optionalString().describe("Physical form, e.g. 'film', 'powder'."),
    substrate_crystallinity_pct: optionalNumber().describe('Substrate crystallinity in percent.'),
    substrate_amount_value: optionalNumber().describe('Initial substrate amount.'),
    substrate_amount_unit: optionalString().describe("Unit of the substrate amount, e.g. 'mg', 'g', 'mg/mL'."),
    product_yield_raw: optionalString().describe('Product or yield exactly as written in the source.'),
    product_yield_unit: optionalString().describe('Unit of the yield when it can be separated.'),
    reported_metrics: z
      .array(KineticParameterSchema)
      .nullable()
      .optional()
      .describe('Kinetic values reported for this measurement.'),
    evidence: EvidenceSchema.describe('Provenance of this measurement.'),
  })
  .strict();

export const VariantSchema = z
  .object({
    sample_id: z.string().describe("Variant name or identifier, e.g. 'LCC-ICCG'."),
    seq_aa: optionalString().describe('Amino-acid sequence.'),
    seq_nuc: optionalString().describe('Nucleotide sequence.'),
    expression_value: optionalNumber().describe('Expression level.'),
    expression_unit: optionalString().describe("Unit of the expression level, e.g. 'mg/L'."),
    tm_c: optionalNumber().describe('Melting temperature in Celsius.'),
    measurements: z.array(MeasurementSchema).describe('Activity measurements for this variant.'),
  })
  .strict();

export const ExtractionResultSchema = z
  .object({
    paper_doi: optionalString().describe('DOI of the paper.'),
    variants: z.array(VariantSchema).describe('Enzyme variants found in the sources.'),
    figures_requiring_digitization: z
      .array(UnextractedFigureSchema)
      .nullable()
      .optional()
      .describe('Figures holding relevant data that could not be read confidently.'),
  })
  .strict();

export type Evidence = z.infer<typeof EvidenceSchema>;
export type KineticParameter = z.infer<typeof KineticParameterSchema>;
export type UnextractedFigure = z.infer<typeof UnextractedFigureSchema>;
export type Measurement = z.infer<typeof MeasurementSchema>;
export type Variant = z.infer<typeof VariantSchema>;
export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

/** Plain JSON form of an {@link ExtractionResult}. */
export type ExtractionResultDocument = z.input<typeof ExtractionResultSchema>;

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return `string "${value.length > 40 ? `${value.slice(0, 40)}...` : value}"`;
  if (typeof value === 'number') return `number ${value}`;
  return typeof value;
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = root;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function expectationFor(issue: z.ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.expected;
    case 'invalid_enum_value':
      return `one of ${issue.options.map(String).join(', ')}`;
    case 'too_small':
      return `${issue.type} >= ${String(issue.minimum)}`;
    case 'too_big':
      return `${issue.type} <= ${String(issue.maximum)}`;
    case 'unrecognized_keys':
      return `no additional keys (found ${issue.keys.join(', ')})`;
    default:
      return issue.message;
  }
}

export function toSchemaViolation(error: z.ZodError, input: unknown): SchemaViolation {
  const first = error.issues[0];
  if (!first) {
    return new SchemaViolation('(root)', 'ExtractionResult', describeValue(input), []);
  }
  const received =
    first.code === 'invalid_type'
      ? first.received
      : first.code === 'unrecognized_keys'
        ? 'object'
        : describeValue(valueAt(input, first.path));
  return new SchemaViolation(formatPath(first.path), expectationFor(first), received, error.issues);
}

export function parseExtractionResult(document: unknown): ExtractionResult {
  const parsed = ExtractionResultSchema.safeParse(document);
  if (!parsed.success) {
    throw toSchemaViolation(parsed.error, document);
  }
  return parsed.data;
}

// zod rebuilds every object and array it parses, so this is also a deep copy.
export function serializeExtractionResult(result: ExtractionResult): ExtractionResultDocument {
  return ExtractionResultSchema.parse(result);
}

export function cloneExtractionResult(result: ExtractionResult): ExtractionResult {
  return parseExtractionResult(serializeExtractionResult(result));
}

export function toStructuredJson(result: ExtractionResult): string {
  return JSON.stringify(serializeExtractionResult(result), null, 2);
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function measurementCount(result: ExtractionResult): number {
  return result.variants.reduce((sum, variant) => sum + variant.measurements.length, 0);
}
