import {
  deepFreeze,
  measurementCount,
  parseExtractionResult,
  type ExtractionResult,
} from '../schema/extraction';
import {
  withRemoteResources,
  type ReadyFile,
  type RemoteResourceOptions,
} from '../remote/remoteResource';
import { GeminiFileService } from '../remote/fileService';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { EXTRACTION_CONFIG, resolveApiKey } from './config';
import {
  EmptyResponse,
  GenerationBlocked,
  NoUsableInput,
  ResponseSchemaMismatch,
  SchemaViolation,
  type SkippedFile,
} from './errors';
import { GeminiExtractionModel, type ExtractionModel } from './model';
import { FORENSIC_AUDIT_PROMPT } from './prompts/forensicAudit';

export interface ExtractionDeps extends RemoteResourceOptions {
  model: ExtractionModel;
  instruction?: string;
  responsePreviewChars?: number;
}

export interface ExtractionRun {
  /** Deep-frozen; use `cloneExtractionResult` for an editable copy. */
  result: ExtractionResult;
  readyFiles: ReadyFile[];
  skippedFiles: SkippedFile[];
}

const defaultLogger = createLogger('Extraction');

function parseResponseText(text: string, previewChars: number): ExtractionResult {
  const preview = text.slice(0, previewChars);

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ResponseSchemaMismatch(`invalid JSON (${errorMessage(error)})`, preview, error);
  }

  try {
    return parseExtractionResult(document);
  } catch (error) {
    if (error instanceof SchemaViolation) {
      throw new ResponseSchemaMismatch(
        `${error.path}: expected ${error.expected}, received ${error.received}`,
        preview,
        error
      );
    }
    throw error;
  }
}

/**
 * Runs one extraction over a set of files that describe a single study.
 * Every uploaded file is released before this resolves or rejects.
 */
export async function extractFromFiles(filePaths: string[], deps: ExtractionDeps): Promise<ExtractionRun> {
  const logger = deps.logger ?? defaultLogger;
  const instruction = deps.instruction ?? FORENSIC_AUDIT_PROMPT;
  const previewChars = deps.responsePreviewChars ?? EXTRACTION_CONFIG.responsePreviewChars;
  const resourceOptions: RemoteResourceOptions = { ...deps, logger };

  return withRemoteResources(filePaths, resourceOptions, async ({ ready, skipped }) => {
    if (ready.length === 0) {
      throw new NoUsableInput(filePaths.length, skipped);
    }

    logger.info(`Extracting from ${ready.length}/${filePaths.length} file(s)`, {
      model: deps.model.modelName,
      files: ready.map((f) => f.displayName),
    });

    const outcome = await deps.model.generate(ready, instruction);

    if (outcome.parts.length === 0) {
      throw new GenerationBlocked(outcome.feedback);
    }

    const text = outcome.parts.join('');
    if (text.trim().length === 0) {
      throw new EmptyResponse();
    }

    const result = parseResponseText(text, previewChars);
    logger.info(
      `Extracted ${result.variants.length} variant(s), ${measurementCount(result)} measurement(s)`
    );

    return {
      result: deepFreeze(result),
      readyFiles: ready,
      skippedFiles: skipped,
    };
  });
}

export function createGeminiExtractionDeps(apiKey: string = resolveApiKey(), logger?: Logger): ExtractionDeps {
  return {
    service: new GeminiFileService(apiKey),
    model: new GeminiExtractionModel(apiKey),
    ...(logger ? { logger } : {}),
  };
}
