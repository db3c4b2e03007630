import { z } from 'zod';
import {
  CARE_LEVELS,
  DEFAULT_LIST_LIMIT,
  LIGHT_LEVELS,
  MAX_LIST_LIMIT,
  SIZE_CLASSES,
  WATER_NEEDS,
} from '../constants/index.js';

export const LightLevelSchema = z.enum(LIGHT_LEVELS);
export const WaterNeedSchema = z.enum(WATER_NEEDS);
export const CareLevelSchema = z.enum(CARE_LEVELS);
export const SizeClassSchema = z.enum(SIZE_CLASSES);

/**
 * A houseplant as submitted by clients. Also published through GET /schema,
 * so every field carries a description.
 */
export const PlantSchema = z
  .object({
    name: z.string().min(1).max(200).describe('Common name'),
    scientific_name: z.string().max(200).optional().describe('Botanical name'),
    description: z.string().max(2000).optional().describe('Short description and care notes'),
    image_url: z
      .url({ protocol: /^https?$/ })
      .optional()
      .describe('Image URL'),

    // Care profile
    light: LightLevelSchema.describe('Preferred light level'),
    water: WaterNeedSchema.describe('Watering needs'),
    care_level: CareLevelSchema.describe('Overall difficulty'),

    pet_friendly: z.boolean().default(false).describe('Safe for pets'),
    size: SizeClassSchema.default('medium').describe('Typical mature size indoors'),

    humidity: z.string().max(200).optional().describe('Humidity preference'),
    placement: z.string().max(200).optional().describe('Best placement e.g., north window'),
    growth_rate: z.string().max(200).optional().describe('Slow / Moderate / Fast'),
    ideal_temp_min_c: z.number().optional().describe('Min ideal temp in °C'),
    ideal_temp_max_c: z.number().optional().describe('Max ideal temp in °C'),

    price: z.number().nonnegative().optional().describe('Typical price in dollars'),
    tags: z.array(z.string().max(50)).max(20).optional().describe('Extra labels for filtering'),
  })
  .meta({ title: 'Plant', description: 'Houseplants collection schema' });

export type Plant = z.infer<typeof PlantSchema>;

/**
 * A plant as returned by GET /plants. Seed records carry no id or timestamps.
 */
export const PlantRecordSchema = PlantSchema.extend({
  id: z.string().min(1).optional(),
  created_at: z.iso.datetime().optional(),
  updated_at: z.iso.datetime().optional(),
});

export type PlantRecord = z.infer<typeof PlantRecordSchema>;

export const PlantListResponseSchema = z.array(PlantRecordSchema);

export type PlantListResponse = z.infer<typeof PlantListResponseSchema>;

/**
 * Query parameters for listing plants. Filters are unbounded plain strings:
 * an unknown or overlong value is not an error, it just matches nothing.
 */
export const PlantQuerySchema = z.object({
  q: z.string().optional(),
  light: z.string().optional(),
  water: z.string().optional(),
  care_level: z.string().optional(),
  pet_friendly: z.stringbool().optional(),
  size: z.string().optional(),
  tag: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
});

export type PlantQuery = z.infer<typeof PlantQuerySchema>;

export const PlantCreatedResponseSchema = z.object({
  id: z.string().min(1),
});

export type PlantCreatedResponse = z.infer<typeof PlantCreatedResponseSchema>;
