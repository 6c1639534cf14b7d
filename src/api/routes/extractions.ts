import type { FastifyInstance } from 'fastify';
import { ExtractionController, type RunExtraction } from '../controllers/extractionController';
import { requireApiKey } from '../middleware';

export function registerExtractionRoutes(
  fastify: FastifyInstance,
  runExtraction: RunExtraction,
  inputDir: string
): void {
  const controller = new ExtractionController(runExtraction, inputDir);

  // Both routes require the API key
  fastify.post<{ Body: unknown }>(
    '/api/extractions',
    { preHandler: requireApiKey },
    async (request, reply) => {
      await controller.create(request, reply);
    }
  );

  fastify.get<{ Params: { jobId: string } }>(
    '/api/extractions/:jobId',
    { preHandler: requireApiKey },
    async (request, reply) => {
      await controller.getStatus(request, reply);
    }
  );
}
