import * as path from 'path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { isExtractionError } from '../../extraction/errors';
import type { ExtractionRun } from '../../extraction/runExtraction';
import { flattenExtraction } from '../../flatten/flattenResult';
import { serializeExtractionResult } from '../../schema/extraction';
import { errorMessage } from '../../utils/logger';
import { createError } from '../middleware/errorHandler';
import type { ExtractionJob } from '../types/api';

export type RunExtraction = (files: string[]) => Promise<ExtractionRun>;

const ExtractionRequestSchema = z.object({
  files: z.array(z.string().min(1)).min(1),
});

/** Resolves `file` against `inputDir`; null when it points outside it. */
export function resolveInputPath(inputDir: string, file: string): string | null {
  const resolved = path.resolve(inputDir, file);
  const relative = path.relative(inputDir, resolved);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

interface JobParams {
  jobId: string;
}

// In-memory job store; jobs live as long as the server process.
export class ExtractionController {
  private jobs = new Map<string, ExtractionJob>();

  constructor(
    private readonly runExtraction: RunExtraction,
    private readonly inputDir: string
  ) {}

  async create(request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) {
    const parsed = ExtractionRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw createError('files must be a non-empty array of file paths', 400, 'INVALID_REQUEST');
    }

    const files: string[] = [];
    for (const file of parsed.data.files) {
      const resolved = resolveInputPath(this.inputDir, file);
      if (!resolved) {
        throw createError(`File is outside the input directory: ${file}`, 400, 'INVALID_FILE_PATH');
      }
      files.push(resolved);
    }

    const jobId = uuidv4();
    const job: ExtractionJob = {
      jobId,
      status: 'pending',
      files,
      createdAt: new Date().toISOString(),
    };
    this.jobs.set(jobId, job);

    this.processJob(job).catch((error) => {
      job.status = 'failed';
      job.error = { kind: 'UnexpectedError', message: errorMessage(error) };
      request.log.error({ jobId, error: errorMessage(error) }, 'Extraction job crashed');
    });

    reply.status(202).send({
      data: {
        jobId,
        status: 'pending',
        message: 'Extraction started',
      },
    });
  }

  async getStatus(request: FastifyRequest<{ Params: JobParams }>, reply: FastifyReply) {
    const job = this.jobs.get(request.params.jobId);
    if (!job) {
      throw createError('Job not found', 404, 'JOB_NOT_FOUND');
    }
    reply.send({ data: job });
  }

  private async processJob(job: ExtractionJob): Promise<void> {
    job.status = 'processing';

    try {
      const run = await this.runExtraction(job.files);
      job.result = serializeExtractionResult(run.result);
      job.rowCount = flattenExtraction(run.result).length;
      job.skippedFiles = run.skippedFiles;
      job.status = 'completed';
    } catch (error) {
      job.status = 'failed';
      job.error = {
        kind: isExtractionError(error) ? error.kind : 'UnexpectedError',
        message: errorMessage(error),
      };
    } finally {
      job.completedAt = new Date().toISOString();
    }
  }
}
