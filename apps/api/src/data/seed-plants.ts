import type { Plant } from '@houseplants/shared';

/**
 * Demo catalogue served when no datastore is configured, and loaded into a
 * fresh table by scripts/seed-plants.ts.
 */
export const SEED_PLANTS: readonly Plant[] = [
  {
    name: 'Monstera Deliciosa',
    scientific_name: 'Monstera deliciosa',
    description: 'Iconic split leaves, fast grower and forgiving.',
    image_url:
      'https://images.unsplash.com/photo-1519681393784-d120267933ba?q=80&w=1200&auto=format&fit=crop',
    light: 'bright',
    water: 'moderate',
    care_level: 'easy',
    pet_friendly: false,
    size: 'large',
    tags: ['statement', 'fast-growing'],
  },
  {
    name: 'Snake Plant',
    scientific_name: 'Sansevieria trifasciata',
    description: 'Thrives on neglect, great for low light.',
    image_url:
      'https://images.unsplash.com/photo-1587300003388-59208cc962cb?q=80&w=1200&auto=format&fit=crop',
    light: 'low',
    water: 'low',
    care_level: 'easy',
    pet_friendly: false,
    size: 'medium',
    tags: ['air-purifier', 'beginner'],
  },
  {
    name: 'ZZ Plant',
    scientific_name: 'Zamioculcas zamiifolia',
    description: 'Glossy leaves, tolerates low light and infrequent watering.',
    image_url:
      'https://images.unsplash.com/photo-1620916566398-579615a6df65?q=80&w=1200&auto=format&fit=crop',
    light: 'low',
    water: 'low',
    care_level: 'easy',
    pet_friendly: false,
    size: 'medium',
    tags: ['hardy', 'office'],
  },
  {
    name: 'Pothos',
    scientific_name: 'Epipremnum aureum',
    description: 'Vining plant that adapts to many conditions.',
    image_url:
      'https://images.unsplash.com/photo-1601482256584-5f934a95a204?q=80&w=1200&auto=format&fit=crop',
    light: 'medium',
    water: 'moderate',
    care_level: 'easy',
    pet_friendly: false,
    size: 'medium',
    tags: ['trailing', 'versatile'],
  },
  {
    name: 'Parlor Palm',
    scientific_name: 'Chamaedorea elegans',
    description: 'Pet-friendly palm that tolerates low light.',
    image_url:
      'https://images.unsplash.com/photo-1501004318641-b39e6451bec6?q=80&w=1200&auto=format&fit=crop',
    light: 'low',
    water: 'moderate',
    care_level: 'moderate',
    pet_friendly: true,
    size: 'medium',
    tags: ['pet-safe', 'palm'],
  },
];
