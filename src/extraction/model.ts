import { GoogleGenerativeAI, type Part } from '@google/generative-ai';
import { buildResponseSchema } from '../schema/responseSchema';
import type { ReadyFile } from '../remote/remoteResource';
import { limit } from '../utils/limiter';
import { createLogger, type Logger } from '../utils/logger';
import { EXTRACTION_CONFIG, EXTRACTION_MODEL, type ExtractionConfig } from './config';
import type { GenerationFeedback } from './errors';

export interface GenerationOutcome {
  /** Text of each content part of the first candidate, in order. Empty when nothing was generated. */
  parts: string[];
  feedback: GenerationFeedback;
}

/**
 * The structured-extraction call. Implementations receive files that already
 * finished remote processing.
 */
export interface ExtractionModel {
  readonly modelName: string;
  generate(files: ReadyFile[], instruction: string): Promise<GenerationOutcome>;
}

export class GeminiExtractionModel implements ExtractionModel {
  private ai: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    public readonly modelName: string = EXTRACTION_MODEL,
    private config: ExtractionConfig = EXTRACTION_CONFIG,
    private logger: Logger = createLogger('Gemini')
  ) {
    this.ai = new GoogleGenerativeAI(apiKey);
  }

  async generate(files: ReadyFile[], instruction: string): Promise<GenerationOutcome> {
    const model = this.ai.getGenerativeModel({ model: this.modelName });
    const parts: Part[] = [
      ...files.map((file) => ({ fileData: { mimeType: file.mimeType, fileUri: file.uri } })),
      { text: instruction },
    ];

    const startedAt = Date.now();
    const result = await limit('gemini_llm', () =>
      model.generateContent({
        contents: [{ role: 'user', parts }],
        generationConfig: {
          temperature: this.config.temperature,
          maxOutputTokens: this.config.maxTokens,
          responseMimeType: 'application/json',
          responseSchema: buildResponseSchema(),
        },
      })
    );

    const response = result.response;
    const candidate = response.candidates?.[0];
    const usage = response.usageMetadata;
    this.logger.info(`Generation finished in ${Date.now() - startedAt}ms`, {
      model: this.modelName,
      files: files.length,
      finishReason: candidate?.finishReason,
      inputTokens: usage?.promptTokenCount ?? 0,
      outputTokens: usage?.candidatesTokenCount ?? 0,
    });

    const feedback: GenerationFeedback = {
      ...(response.promptFeedback?.blockReason ? { blockReason: response.promptFeedback.blockReason } : {}),
      ...(response.promptFeedback?.blockReasonMessage
        ? { blockReasonMessage: response.promptFeedback.blockReasonMessage }
        : {}),
      ...(candidate?.finishReason ? { finishReason: candidate.finishReason } : {}),
      ...(candidate?.finishMessage ? { finishMessage: candidate.finishMessage } : {}),
    };

    return {
      parts: candidate?.content?.parts?.map((part) => part.text ?? '') ?? [],
      feedback,
    };
  }
}
