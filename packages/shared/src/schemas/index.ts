export {
  LivenessResponseSchema,
  DiagnosticsResponseSchema,
  type LivenessResponse,
  type DiagnosticsResponse,
} from './diagnostics.js';

export {
  LightLevelSchema,
  WaterNeedSchema,
  CareLevelSchema,
  SizeClassSchema,
  PlantSchema,
  PlantRecordSchema,
  PlantListResponseSchema,
  PlantQuerySchema,
  PlantCreatedResponseSchema,
  type Plant,
  type PlantRecord,
  type PlantListResponse,
  type PlantQuery,
  type PlantCreatedResponse,
} from './plant.js';

export {
  ErrorResponseSchema,
  ValidationErrorResponseSchema,
  type ErrorResponse,
  type ValidationErrorResponse,
} from './error.js';
