import type { FastifyInstance } from 'fastify';
import { LIVENESS_MESSAGE, type LivenessResponse } from '@houseplants/shared';

export function rootRoute(app: FastifyInstance): void {
  app.get('/', (): LivenessResponse => {
    return { message: LIVENESS_MESSAGE };
  });
}
