import { z } from 'zod';
import { CONNECTION_STATUS } from '../constants/index.js';

/**
 * GET / response.
 */
export const LivenessResponseSchema = z.object({
  message: z.string().min(1),
});

export type LivenessResponse = z.infer<typeof LivenessResponseSchema>;

/**
 * GET /test response. The status fields are meant for people reading them
 * while troubleshooting a deployment, not for parsing.
 */
export const DiagnosticsResponseSchema = z.object({
  backend: z.string().min(1),
  database: z.string().min(1),
  database_url: z.string().min(1),
  database_name: z.string().min(1),
  connection_status: z.enum([CONNECTION_STATUS.CONNECTED, CONNECTION_STATUS.NOT_CONNECTED]),
  collections: z.array(z.string()).max(10),
});

export type DiagnosticsResponse = z.infer<typeof DiagnosticsResponseSchema>;
