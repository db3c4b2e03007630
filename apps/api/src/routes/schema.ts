import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { PlantSchema } from '@houseplants/shared';

/**
 * GET /schema — JSON Schema of every writable collection, for external tools
 * that build forms or validate documents on their own.
 */
export function schemaRoute(app: FastifyInstance): void {
  // Input view: fields with defaults are optional, as they are on POST.
  const schemas = {
    plant: z.toJSONSchema(PlantSchema, { io: 'input' }),
  };

  app.get('/schema', () => schemas);
}
