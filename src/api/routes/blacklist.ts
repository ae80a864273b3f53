import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { BlacklistEntryInputSchema } from '../../blacklist/index.js';
import { ReputationError } from '../../errors/index.js';
import { parseRequest } from '../validation.js';

const MAX_UPLOAD_ENTRIES = 100000;

const UploadBodySchema = z.object({
  entries: z.array(z.string()).max(MAX_UPLOAD_ENTRIES),
});

const blacklistRoutes: FastifyPluginAsync = async (fastify) => {
  const { orchestrator, config } = fastify;

  fastify.get('/api/blacklist/entries', async (_request, reply) => {
    return reply.send({ entries: orchestrator.listBlacklistEntries() });
  });

  fastify.post('/api/blacklist/entries', async (request, reply) => {
    const input = parseRequest(BlacklistEntryInputSchema, request.body);
    const entry = await orchestrator.addBlacklistEntry(input);
    return reply.code(201).send(entry);
  });

  // CIDR entries are passed URL-encoded (10.0.0.0%2F8)
  fastify.delete<{ Params: { ip: string } }>('/api/blacklist/entries/:ip', async (request, reply) => {
    const removed = await orchestrator.removeBlacklistEntry(request.params.ip);
    if (!removed) {
      throw new ReputationError('NotFound', `No blacklist entry for ${request.params.ip}`);
    }
    return reply.send({ removed: true });
  });

  fastify.get<{ Params: { ip: string } }>('/api/blacklist/check/:ip', async (request, reply) => {
    return reply.send({ ip: request.params.ip, ...orchestrator.checkBlacklist(request.params.ip) });
  });

  // Replace the bulk list
  fastify.post('/api/blacklist/upload', async (request, reply) => {
    const { entries } = parseRequest(UploadBodySchema, request.body);
    return reply.send(await orchestrator.uploadBlacklist(entries));
  });

  fastify.get('/api/blacklist/status', async (_request, reply) => {
    return reply.send({ ...orchestrator.blacklistStatus(), manualEntries: orchestrator.listBlacklistEntries().length });
  });

  fastify.post('/api/blacklist/save', async (_request, reply) => {
    await orchestrator.saveBlacklistIndex(config.blacklist.index_path);
    await orchestrator.saveBlacklist(config.blacklist.entries_path);
    return reply.send({ saved: true });
  });

  fastify.post('/api/blacklist/load', async (_request, reply) => {
    const status = await orchestrator.loadBlacklistIndex(config.blacklist.index_path);
    const manualEntries = await orchestrator.loadBlacklist(config.blacklist.entries_path);
    return reply.send({ ...status, manualEntries });
  });
};

export default blacklistRoutes;
