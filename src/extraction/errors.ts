import type { z } from 'zod';

export type ExtractionErrorKind =
  | 'SchemaViolation'
  | 'RemoteProcessingFailed'
  | 'NoUsableInput'
  | 'GenerationBlocked'
  | 'EmptyResponse'
  | 'ResponseSchemaMismatch';

export abstract class ExtractionError extends Error {
  abstract readonly kind: ExtractionErrorKind;
}

export class SchemaViolation extends ExtractionError {
  readonly kind = 'SchemaViolation';

  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly received: string,
    public readonly issues: z.ZodIssue[]
  ) {
    const details = issues.map((issue) => `- ${formatPath(issue.path)}: ${issue.message}`);
    super(
      `Schema violation at ${path}: expected ${expected}, received ${received}\n${details.join('\n')}`
    );
    this.name = 'SchemaViolation';
  }
}

export class RemoteProcessingFailed extends ExtractionError {
  readonly kind = 'RemoteProcessingFailed';

  constructor(
    public readonly file: string,
    public readonly diagnostic: string,
    cause?: unknown
  ) {
    super(`Remote processing failed for ${file}: ${diagnostic}`);
    this.name = 'RemoteProcessingFailed';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export class NoUsableInput extends ExtractionError {
  readonly kind = 'NoUsableInput';

  constructor(
    public readonly fileCount: number,
    public readonly skipped: SkippedFile[]
  ) {
    const reasons = skipped.map((s) => `${s.file} (${s.reason})`).join('; ');
    super(
      `None of the ${fileCount} input file(s) finished remote processing${reasons ? `: ${reasons}` : ''}`
    );
    this.name = 'NoUsableInput';
  }
}

export interface GenerationFeedback {
  blockReason?: string;
  blockReasonMessage?: string;
  finishReason?: string;
  finishMessage?: string;
}

export class GenerationBlocked extends ExtractionError {
  readonly kind = 'GenerationBlocked';

  constructor(public readonly feedback: GenerationFeedback) {
    super(`Model returned no content. Feedback: ${JSON.stringify(feedback)}`);
    this.name = 'GenerationBlocked';
  }
}

export class EmptyResponse extends ExtractionError {
  readonly kind = 'EmptyResponse';

  constructor() {
    super('Model returned no text to parse');
    this.name = 'EmptyResponse';
  }
}

export class ResponseSchemaMismatch extends ExtractionError {
  readonly kind = 'ResponseSchemaMismatch';

  constructor(
    public readonly reason: string,
    public readonly preview: string,
    cause?: unknown
  ) {
    super(`Response did not match the extraction schema: ${reason}\nResponse preview:\n${preview}`);
    this.name = 'ResponseSchemaMismatch';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return '(root)';
  return path
    .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join('');
}
