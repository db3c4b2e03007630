import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  PlantSchema,
  PlantRecordSchema,
  PlantQuerySchema,
  PlantCreatedResponseSchema,
} from './plant.js';

const validPlant = {
  name: 'Rubber Plant',
  scientific_name: 'Ficus elastica',
  description: 'Broad glossy leaves on an upright stem.',
  image_url: 'https://example.com/plants/rubber-plant.jpg',
  light: 'bright' as const,
  water: 'moderate' as const,
  care_level: 'moderate' as const,
  pet_friendly: false,
  size: 'large' as const,
  humidity: 'Average',
  placement: 'East window',
  growth_rate: 'Moderate',
  ideal_temp_min_c: 15,
  ideal_temp_max_c: 29,
  price: 24.5,
  tags: ['statement', 'upright'],
};

describe('PlantSchema', () => {
  it('accepts a fully populated plant', () => {
    expect(PlantSchema.safeParse(validPlant).success).toBe(true);
  });

  it('accepts the minimal required fields and applies defaults', () => {
    const result = PlantSchema.safeParse({
      name: 'Spider Plant',
      light: 'medium',
      water: 'moderate',
      care_level: 'easy',
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pet_friendly).toBe(false);
      expect(result.data.size).toBe('medium');
      expect(result.data.tags).toBeUndefined();
    }
  });

  it('requires a name', () => {
    const { name: _name, ...withoutName } = validPlant;
    const result = PlantSchema.safeParse(withoutName);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.path[0])).toEqual(['name']);
    }
  });

  it('rejects a light level outside the fixed set', () => {
    const result = PlantSchema.safeParse({ ...validPlant, light: 'full_sun' });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown care level', () => {
    const result = PlantSchema.safeParse({ ...validPlant, care_level: 'expert' });
    expect(result.success).toBe(false);
  });

  it('rejects a negative price', () => {
    const result = PlantSchema.safeParse({ ...validPlant, price: -1 });
    expect(result.success).toBe(false);
  });

  it('accepts a price of zero', () => {
    const result = PlantSchema.safeParse({ ...validPlant, price: 0 });
    expect(result.success).toBe(true);
  });

  it('leaves temperature bounds unconstrained', () => {
    const result = PlantSchema.safeParse({
      ...validPlant,
      ideal_temp_min_c: -5,
      ideal_temp_max_c: -10,
    });
    expect(result.success).toBe(true);
  });

  it('rejects an image URL that is not http(s)', () => {
    const result = PlantSchema.safeParse({ ...validPlant, image_url: 'ftp://example.com/a.jpg' });
    expect(result.success).toBe(false);
  });

  it('allows at most 20 tags', () => {
    const tooManyTags = Array.from({ length: 21 }, (_, i) => `tag-${String(i)}`);
    const result = PlantSchema.safeParse({ ...validPlant, tags: tooManyTags });
    expect(result.success).toBe(false);
  });

  it('strips fields that are not part of the schema', () => {
    const result = PlantSchema.safeParse({ ...validPlant, PK: 'PLANT#1' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect('PK' in result.data).toBe(false);
    }
  });

  it('publishes light as a string enum in its JSON Schema', () => {
    const jsonSchema = z.toJSONSchema(PlantSchema, { io: 'input' });
    expect(jsonSchema.properties?.light).toEqual({
      type: 'string',
      enum: ['low', 'medium', 'bright'],
      description: 'Preferred light level',
    });
    expect(jsonSchema.required).toEqual(['name', 'light', 'water', 'care_level']);
  });
});

describe('PlantRecordSchema', () => {
  it('accepts a stored plant with id and timestamps', () => {
    const result = PlantRecordSchema.safeParse({
      ...validPlant,
      id: '9d1c6b1e-5c4a-4c59-9b3e-2f0b8f9a4c11',
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-01T00:00:00.000Z',
    });
    expect(result.success).toBe(true);
  });

  it('accepts a seed plant without id or timestamps', () => {
    expect(PlantRecordSchema.safeParse(validPlant).success).toBe(true);
  });

  it('rejects a timestamp that is not ISO-8601', () => {
    const result = PlantRecordSchema.safeParse({ ...validPlant, created_at: 'yesterday' });
    expect(result.success).toBe(false);
  });
});

describe('PlantQuerySchema', () => {
  it('accepts empty params and defaults limit to 50', () => {
    const result = PlantQuerySchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ limit: 50 });
    }
  });

  it('coerces limit and pet_friendly from query strings', () => {
    const result = PlantQuerySchema.safeParse({ limit: '3', pet_friendly: 'true' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.limit).toBe(3);
      expect(result.data.pet_friendly).toBe(true);
    }
  });

  it('reads pet_friendly=0 as false', () => {
    const result = PlantQuerySchema.safeParse({ pet_friendly: '0' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pet_friendly).toBe(false);
    }
  });

  it('rejects a pet_friendly value that is not a boolean', () => {
    expect(PlantQuerySchema.safeParse({ pet_friendly: 'maybe' }).success).toBe(false);
  });

  it('rejects a limit below 1', () => {
    expect(PlantQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
  });

  it('rejects a non-numeric limit', () => {
    expect(PlantQuerySchema.safeParse({ limit: 'ten' }).success).toBe(false);
  });

  it('accepts search and tag values of any length', () => {
    const result = PlantQuerySchema.safeParse({ q: 'a'.repeat(500), tag: 'b'.repeat(120) });
    expect(result.success).toBe(true);
  });

  it('accepts light values outside the enum', () => {
    const result = PlantQuerySchema.safeParse({ light: 'purple' });
    expect(result.success).toBe(true);
  });
});

describe('PlantCreatedResponseSchema', () => {
  it('requires a non-empty id', () => {
    expect(PlantCreatedResponseSchema.safeParse({ id: '' }).success).toBe(false);
    expect(PlantCreatedResponseSchema.safeParse({ id: 'abc' }).success).toBe(true);
  });
});
