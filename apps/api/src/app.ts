import Fastify, { type FastifyInstance, type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { loadConfig, type AppConfig } from './config.js';
import { rootRoute } from './routes/root.js';
import { schemaRoute } from './routes/schema.js';
import { plantsRoute } from './routes/plants.js';
import { diagnosticsRoute } from './routes/diagnostics.js';
import { createDocumentGateway, type DocumentGateway } from './services/document-gateway.js';
import { AppError, isFastifyError, sendError } from './lib/errors.js';
import { logger } from './lib/logger.js';

export interface AppOptions {
  logger?: boolean;
  /** Defaults to the environment. */
  config?: AppConfig;
  /** Defaults to the gateway the config describes. */
  gateway?: DocumentGateway;
}

export async function createApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const useLogger = options.logger ?? true;
  const config = options.config ?? loadConfig();
  const gateway = options.gateway ?? createDocumentGateway(config);

  const app = Fastify({
    ...(useLogger ? { loggerInstance: logger as unknown as FastifyBaseLogger } : { logger: false }),
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true,
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      request.log.warn({ statusCode: error.statusCode }, error.message);
      return sendError(reply, error.statusCode, error.message);
    }

    // Client errors raised by Fastify itself (bad JSON, unsupported media type)
    if (isFastifyError(error) && error.statusCode !== undefined && error.statusCode < 500) {
      return sendError(reply, error.statusCode, error.message);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return sendError(reply, 500, 'An unexpected error occurred');
  });

  // Routes
  await app.register(rootRoute);
  await app.register(schemaRoute);
  await app.register(plantsRoute, { gateway });
  await app.register(diagnosticsRoute, { gateway, config });

  return app;
}
