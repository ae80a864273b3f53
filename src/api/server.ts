import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { isReputationError } from '../errors/index.js';
import type { ReputationOrchestrator } from '../reputation/index.js';
import { apiKeyHook } from './auth.js';
import blacklistRoutes from './routes/blacklist.js';
import reputationRoutes from './routes/reputation.js';
import rulesRoutes from './routes/rules.js';

/**
 * Validate CORS origin - must be empty or a valid URL
 */
function validateCorsOrigin(origin: string | undefined): string | false {
  if (!origin) return false;

  try {
    const url = new URL(origin);
    // Only allow http/https protocols
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return origin;
  } catch {
    return false;
  }
}

export interface ApiServerDeps {
  config: Config;
  orchestrator: ReputationOrchestrator;
  logger: Logger;
  // Defaults to API_KEY from the environment
  apiKey?: string;
}

export async function createApiServer(deps: ApiServerDeps): Promise<FastifyInstance> {
  const { config, orchestrator, logger } = deps;
  const apiKey = deps.apiKey ?? process.env.API_KEY;
  const log = logger.child({ module: 'api' });

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 1048576, // 1MB max request body
  });

  // Security headers
  await app.register(helmet, {
    // Enable HSTS only in production to avoid issues on non-HTTPS environments
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  if (!apiKey) {
    log.warn('API_KEY is not set; the API accepts unauthenticated requests');
  }

  await app.register(rateLimit, {
    max: config.server.rate_limit_max,
    timeWindow: 60000,
    allowList: (request) => !request.url.startsWith('/api/'),
  });

  // CORS - restrictive by default, validate origin URL
  await app.register(cors, {
    origin: validateCorsOrigin(process.env.CORS_ORIGIN),
    methods: ['GET', 'POST', 'DELETE'],
  });

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('orchestrator', orchestrator);
  app.decorate('apiLogger', log);

  // Request logging
  app.addHook('onRequest', async (request) => {
    log.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  // Global error handler
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    if (isReputationError(error)) {
      const level = error.statusCode >= 500 ? 'error' : 'debug';
      log[level]({ err: error, method: request.method, url: request.url }, 'Request failed');
      return reply.code(error.statusCode).send({ error: error.message, kind: error.kind });
    }

    log.error({ err: error, method: request.method, url: request.url }, 'Request error');

    // Don't expose internal errors to clients
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    return reply.code(statusCode).send({
      error: statusCode < 500 ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Register routes behind the API key hook
  await app.register(async (api) => {
    api.addHook('onRequest', apiKeyHook(apiKey));
    await api.register(reputationRoutes);
    await api.register(blacklistRoutes);
    await api.register(rulesRoutes);
  });

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    orchestrator: ReputationOrchestrator;
    apiLogger: Logger;
  }
}
