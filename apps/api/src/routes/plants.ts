import type { FastifyInstance } from 'fastify';
import {
  PLANT_COLLECTION,
  PlantQuerySchema,
  PlantRecordSchema,
  PlantSchema,
  type PlantCreatedResponse,
  type PlantRecord,
} from '@houseplants/shared';
import { sendValidationError } from '../lib/errors.js';
import type { DocumentGateway, DocumentRecord } from '../services/document-gateway.js';
import { buildPlantPredicate } from '../services/filter-builder.js';

export interface PlantsRouteOptions {
  gateway: DocumentGateway;
}

export function plantsRoute(app: FastifyInstance, options: PlantsRouteOptions): void {
  const { gateway } = options;

  app.get('/plants', async (request, reply) => {
    const parseResult = PlantQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error.issues);
    }

    const { limit, ...criteria } = parseResult.data;
    const predicate = buildPlantPredicate(criteria);
    // Documents written outside this API that no longer fit the schema are
    // skipped while paging, so they never eat into the limit.
    const parsePlant = (document: DocumentRecord): PlantRecord | undefined => {
      const parsed = PlantRecordSchema.safeParse(document);
      if (parsed.success) return parsed.data;
      request.log.warn(
        { id: document.id, issues: parsed.error.issues },
        'Skipping plant document that fails validation',
      );
      return undefined;
    };
    const plants = await gateway.list(PLANT_COLLECTION, predicate, limit, parsePlant);

    request.log.debug(
      { criteria: predicate.length, count: plants.length, seeded: !gateway.configured },
      'Listed plants',
    );
    return reply.send(plants);
  });

  app.post('/plants', async (request, reply) => {
    const parseResult = PlantSchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error.issues);
    }

    const id = await gateway.create(PLANT_COLLECTION, parseResult.data);
    request.log.info({ id, name: parseResult.data.name }, 'Plant created');

    const response: PlantCreatedResponse = { id };
    return reply.send(response);
  });
}
