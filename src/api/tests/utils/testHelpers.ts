import { jest } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import type { ExtractionJob } from '../../types/api';
import type { RunExtraction } from '../../controllers/extractionController';
import { buildServer } from '../../server';

export const API_KEY_HEADER = { 'x-api-key': 'test-api-key' };

export const TEST_INPUT_DIR = '/papers';

export async function createTestServer(runExtraction?: RunExtraction): Promise<{
  server: FastifyInstance;
  runExtraction: jest.Mock<RunExtraction>;
}> {
  const fake = jest.fn<RunExtraction>(
    runExtraction ?? (async () => Promise.reject(new Error('no extraction configured')))
  );
  const server = await buildServer({ runExtraction: fake, logger: false, inputDir: TEST_INPUT_DIR });
  await server.ready();
  return { server, runExtraction: fake };
}

function isJob(value: unknown): value is { data: ExtractionJob } {
  return typeof value === 'object' && value !== null && 'data' in value;
}

/** Polls the status route until the job leaves the pending/processing states. */
export async function waitForJob(server: FastifyInstance, jobId: string): Promise<ExtractionJob> {
  for (let attempt = 0; attempt < 50; attempt++) {
    const response = await server.inject({
      method: 'GET',
      url: `/api/extractions/${jobId}`,
      headers: API_KEY_HEADER,
    });
    const body: unknown = response.json();
    if (isJob(body) && (body.data.status === 'completed' || body.data.status === 'failed')) {
      return body.data;
    }
    await new Promise((resolve) => setImmediate(resolve));
  }
  throw new Error(`Job ${jobId} did not finish`);
}
