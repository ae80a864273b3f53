import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ReputationError } from '../../errors/index.js';
import { parseRequest } from '../validation.js';

const MAX_BULK_IPS = 100;

const AnalyzeQuerySchema = z.object({
  refresh: z.enum(['true', 'false']).optional(),
});

const BulkAnalyzeBodySchema = z.object({
  ips: z.array(z.string().trim().min(1)).min(1).max(MAX_BULK_IPS),
});

const HighRiskQuerySchema = z.object({
  threshold: z.coerce.number().int().optional(),
});

const reputationRoutes: FastifyPluginAsync = async (fastify) => {
  const { orchestrator, config } = fastify;

  // Score one IP
  fastify.post<{ Params: { ip: string } }>('/api/analyze/:ip', async (request, reply) => {
    const query = parseRequest(AnalyzeQuerySchema, request.query);
    const result = await orchestrator.analyzeIp(request.params.ip, { refresh: query.refresh === 'true' });

    if (result.status === 'error') {
      const status = new ReputationError(result.error.kind, result.error.message).statusCode;
      return reply.code(status).send(result);
    }
    return reply.send(result);
  });

  // Score several IPs
  fastify.post('/api/analyze', async (request, reply) => {
    const { ips } = parseRequest(BulkAnalyzeBodySchema, request.body);
    const results = await orchestrator.bulkAnalyze(ips);
    return reply.send({ results });
  });

  fastify.get<{ Params: { ip: string } }>('/api/scores/:ip', async (request, reply) => {
    const score = await orchestrator.getScore(request.params.ip);
    if (!score) {
      throw new ReputationError('NotFound', `No stored score for ${request.params.ip}`);
    }
    return reply.send(score);
  });

  // High risk IPs
  fastify.get('/api/scores', async (request, reply) => {
    const query = parseRequest(HighRiskQuerySchema, request.query);
    const threshold = query.threshold ?? config.reputation.high_risk_threshold;
    const ips = await orchestrator.highRiskIps(threshold);
    return reply.send({ threshold, ips });
  });

  fastify.get('/api/stats', async (_request, reply) => {
    return reply.send(await orchestrator.scoreStats());
  });
};

export default reputationRoutes;
