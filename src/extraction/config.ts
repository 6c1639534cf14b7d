import * as path from 'path';

export const EXTRACTION_MODEL = process.env.EXTRACTION_MODEL || 'gemini-2.5-pro';

export const EXTRACTION_CONFIG = {
  temperature: 0.0,
  maxTokens: parseInt(process.env.EXTRACTION_MAX_TOKENS || '32000', 10),
  responsePreviewChars: 1000,
} as const;

export const FILE_PROCESSING_CONFIG = {
  pollIntervalMs: parseInt(process.env.FILE_POLL_INTERVAL_MS || '2000', 10),
  maxWaitMs: parseInt(process.env.FILE_POLL_MAX_WAIT_MS || '300000', 10),
} as const;

export const INPUT_CONFIG = {
  /** The API only reads input files under this directory. */
  inputDir: path.resolve(process.env.EXTRACTION_INPUT_DIR || process.cwd()),
} as const;

export type ExtractionConfig = {
  temperature: number;
  maxTokens: number;
  responsePreviewChars: number;
};

export function resolveApiKey(): string {
  const apiKey = process.env.GEMINI_API_KEY || process.env.GOOGLE_API_KEY || '';
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY environment variable is not set');
  }
  return apiKey;
}
