import type { FastifyInstance } from 'fastify';
import { ExportController } from '../controllers/exportController';

export function registerExportRoutes(fastify: FastifyInstance): void {
  const controller = new ExportController();

  fastify.post<{ Body: unknown; Querystring: { format?: string } }>(
    '/api/export',
    async (request, reply) => {
      await controller.export(request, reply);
    }
  );
}
