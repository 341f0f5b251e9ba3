import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import type { AnalysisConfig } from './lib/config/analysis.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { analysisRoutes } from './routes/analysis.js';
import { AnalysisService } from './services/analysis.service.js';

// Ledgers run to a few thousand rows.
const DEFAULT_BODY_LIMIT = 20 * 1024 * 1024;

export interface BuildAppOptions {
  config: AnalysisConfig;
  logger?: FastifyServerOptions['logger'];
  bodyLimit?: number;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
    bodyLimit: options.bodyLimit ?? DEFAULT_BODY_LIMIT,
  });

  registerErrorHandler(fastify);

  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  await fastify.register(analysisRoutes, { service: new AnalysisService(options.config) });

  return fastify;
}
