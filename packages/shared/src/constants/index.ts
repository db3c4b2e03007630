export const PLANT_COLLECTION = 'plant' as const;

export const LIGHT_LEVELS = ['low', 'medium', 'bright'] as const;
export const WATER_NEEDS = ['low', 'moderate', 'high'] as const;
export const CARE_LEVELS = ['easy', 'moderate', 'advanced'] as const;
export const SIZE_CLASSES = ['small', 'medium', 'large'] as const;

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 1000;

export const LIVENESS_MESSAGE = 'Houseplant Comparison Backend is running';

export const CONNECTION_STATUS = {
  CONNECTED: 'Connected',
  NOT_CONNECTED: 'Not Connected',
} as const;
