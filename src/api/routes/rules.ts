import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { FactValueSchema } from '../../rules/index.js';
import { parseRequest } from '../validation.js';

const CreateGroupBodySchema = z.object({
  name: z.string(),
  description: z.string().max(500).nullish(),
});

const EvaluateBodySchema = z.object({
  facts: z.record(z.string(), FactValueSchema.nullable()),
});

const rulesRoutes: FastifyPluginAsync = async (fastify) => {
  const { orchestrator, config } = fastify;

  fastify.get('/api/rules', async (_request, reply) => {
    return reply.send(orchestrator.listRules());
  });

  // Rule bodies are validated against the active points policy
  fastify.post('/api/rules', async (request, reply) => {
    return reply.code(201).send(orchestrator.addRule(request.body));
  });

  fastify.post('/api/rules/groups', async (request, reply) => {
    const { name, description } = parseRequest(CreateGroupBodySchema, request.body);
    return reply.code(201).send(orchestrator.createGroup(name, description));
  });

  fastify.post<{ Params: { name: string } }>('/api/rules/groups/:name/rules', async (request, reply) => {
    return reply.code(201).send(orchestrator.addRuleToGroup(request.params.name, request.body));
  });

  // Dry run against caller supplied facts
  fastify.post('/api/rules/evaluate', async (request, reply) => {
    const { facts } = parseRequest(EvaluateBodySchema, request.body);
    return reply.send(orchestrator.evaluateRules(facts));
  });

  fastify.post('/api/rules/save', async (_request, reply) => {
    await orchestrator.saveRules(config.rules.path);
    return reply.send({ saved: true });
  });

  fastify.post('/api/rules/load', async (_request, reply) => {
    const system = await orchestrator.loadRules(config.rules.path);
    return reply.send({ rules: system.ruleCount(), groups: system.listGroups().length });
  });
};

export default rulesRoutes;
