import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createDocumentGateway } from './services/document-gateway.js';
import { logger } from './lib/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const gateway = createDocumentGateway(config);

  if (!gateway.configured) {
    logger.warn('DATABASE_URL or DATABASE_NAME not set; serving seed data, writes disabled');
  }

  const app = await createApp({ logger: true, config, gateway });

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err: unknown) {
    app.log.error(String(err));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
