#!/usr/bin/env npx tsx
/**
 * Load the demo plants into the configured datastore.
 *
 * Not idempotent: every run creates new documents with fresh ids.
 *
 * Usage: DATABASE_URL=... DATABASE_NAME=... npx tsx scripts/seed-plants.ts
 */
import { PLANT_COLLECTION, PlantSchema } from '@houseplants/shared';
import { loadConfig } from '../src/config.js';
import { SEED_PLANTS } from '../src/data/seed-plants.js';
import { createDocumentGateway } from '../src/services/document-gateway.js';
import { logger } from '../src/lib/logger.js';

async function main(): Promise<void> {
  const gateway = createDocumentGateway(loadConfig());

  if (!gateway.configured) {
    logger.error('DATABASE_URL and DATABASE_NAME must both be set');
    process.exit(1);
  }

  for (const [index, seed] of SEED_PLANTS.entries()) {
    const result = PlantSchema.safeParse(seed);
    if (!result.success) {
      logger.error({ index, issues: result.error.issues }, 'Seed plant failed validation');
      process.exit(1);
    }
    const id = await gateway.create(PLANT_COLLECTION, result.data);
    logger.info({ id, name: result.data.name }, 'Seeded plant');
  }

  logger.info({ count: SEED_PLANTS.length, table: gateway.databaseName }, 'Seed complete');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Seed failed');
  process.exit(1);
});
