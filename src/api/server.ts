import 'dotenv/config';
import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { INPUT_CONFIG } from '../extraction/config';
import { createGeminiExtractionDeps, extractFromFiles } from '../extraction/runExtraction';
import type { RunExtraction } from './controllers/extractionController';
import { errorHandler } from './middleware';
import { registerExportRoutes, registerExtractionRoutes } from './routes';

export interface ServerDeps {
  /** Defaults to a Gemini-backed extraction built from the environment on first use. */
  runExtraction?: RunExtraction;
  logger?: FastifyServerOptions['logger'];
  /** Root that submitted file paths are resolved against; defaults to `EXTRACTION_INPUT_DIR` or the working directory. */
  inputDir?: string;
}

function defaultLogger(): FastifyServerOptions['logger'] {
  return {
    level: process.env.LOG_LEVEL || 'info',
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

const geminiExtraction: RunExtraction = (files) =>
  extractFromFiles(files, createGeminiExtractionDeps());

async function buildServer(deps: ServerDeps = {}) {
  const fastify = Fastify({
    logger: deps.logger ?? defaultLogger(),
    bodyLimit: 10 * 1024 * 1024,
  });

  await fastify.register(cors, {
    origin: process.env.CORS_ORIGIN || '*',
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerExtractionRoutes(
    fastify,
    deps.runExtraction ?? geminiExtraction,
    deps.inputDir ?? INPUT_CONFIG.inputDir
  );
  registerExportRoutes(fastify);

  return fastify;
}

async function start() {
  const server = await buildServer();
  const port = parseInt(process.env.PORT || process.env.API_PORT || '3000', 10);
  const host = process.env.API_HOST || '0.0.0.0';

  await server.listen({ port, host });
  server.log.info(`API server listening on http://${host}:${port}`);
}

if (require.main === module) {
  start().catch((err) => {
    console.error('Error starting server:', err);
    process.exit(1);
  });
}

export { buildServer };
