import type { FastifyInstance } from 'fastify';
import { FLAG_IDS, FLAG_NAMES } from '../engine/rules/flag-catalog.js';
import { NotFoundError } from '../lib/errors.js';
import { analyzeRecordsSchema, analyzeSheetSchema } from '../schemas/analysis.schema.js';
import type { AnalysisService } from '../services/analysis.service.js';

export interface AnalysisRoutesOptions {
  service: AnalysisService;
}

export async function analysisRoutes(
  fastify: FastifyInstance,
  opts: AnalysisRoutesOptions
): Promise<void> {
  const { service } = opts;

  // GET /api/analysis/config - Effective thresholds
  fastify.get('/api/analysis/config', async (_request, reply) => {
    return reply.code(200).send(service.getConfig());
  });

  // GET /api/analysis/flags - Flag catalog
  fastify.get('/api/analysis/flags', async (_request, reply) => {
    const flags = FLAG_IDS.map((flagId) => ({ flagId, flagName: FLAG_NAMES[flagId] }));
    return reply.code(200).send(flags);
  });

  // GET /api/analysis/flags/:flagId - Single flag type
  fastify.get<{ Params: { flagId: string } }>(
    '/api/analysis/flags/:flagId',
    async (request, reply) => {
      const flagId = FLAG_IDS.find((id) => String(id) === request.params.flagId);
      if (flagId === undefined) {
        throw new NotFoundError('Flag type', request.params.flagId);
      }
      return reply.code(200).send({ flagId, flagName: FLAG_NAMES[flagId] });
    }
  );

  // POST /api/analysis - Analyze canonical records
  fastify.post<{ Body: unknown }>('/api/analysis', async (request, reply) => {
    const data = analyzeRecordsSchema.parse(request.body);
    const result = service.analyzeRecords(data, request.log);
    return reply.code(200).send(result);
  });

  // POST /api/analysis/sheet - Analyze header-keyed spreadsheet rows
  fastify.post<{ Body: unknown }>('/api/analysis/sheet', async (request, reply) => {
    const data = analyzeSheetSchema.parse(request.body);
    const result = service.analyzeSheet(data, request.log);
    return reply.code(200).send(result);
  });
}
