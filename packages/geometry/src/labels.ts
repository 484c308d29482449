import { OBJECT_CATEGORIES, type ObjectCategory } from '@roomscan/types'

export const OBJECT_LABELS: Readonly<Record<ObjectCategory, string>> = {
  storage: 'Storage',
  refrigerator: 'Fridge',
  stove: 'Stove',
  bed: 'Bed',
  sink: 'Sink',
  washerDryer: 'Washer',
  toilet: 'Toilet',
  bathtub: 'Bathtub',
  oven: 'Oven',
  dishwasher: 'Dishwasher',
  table: 'Table',
  sofa: 'Sofa',
  chair: 'Chair',
  fireplace: 'Fireplace',
  television: 'TV',
  stairs: 'Stairs',
}

/** Label used for categories missing from the table. */
export const FALLBACK_OBJECT_LABEL = 'Object'

export function isObjectCategory(category: string): category is ObjectCategory {
  return (OBJECT_CATEGORIES as readonly string[]).includes(category)
}

export function labelForCategory(category: string): string {
  return isObjectCategory(category) ? OBJECT_LABELS[category] : FALLBACK_OBJECT_LABEL
}
