/**
 * Surface records handed over by the scanning layer once a capture completes.
 * One record per detected wall, door, window, opening or furniture object.
 */

import type { Transform, Vec3 } from './geometry'

export type StructuralKind = 'wall' | 'door' | 'window' | 'opening'

export type SurfaceKind = StructuralKind | 'object'

/** Traversal order used for the floor-plan element list and every encoder. */
export const SURFACE_KINDS: readonly SurfaceKind[] = ['wall', 'door', 'window', 'opening', 'object']

export const OBJECT_CATEGORIES = [
  'storage',
  'refrigerator',
  'stove',
  'bed',
  'sink',
  'washerDryer',
  'toilet',
  'bathtub',
  'oven',
  'dishwasher',
  'table',
  'sofa',
  'chair',
  'fireplace',
  'television',
  'stairs',
] as const

/** Categories the scanner currently reports. Newer scanners may report others. */
export type ObjectCategory = (typeof OBJECT_CATEGORIES)[number]

interface SurfaceBase {
  transform: Transform
  /** x = width, y = height, z = depth, in meters. */
  dimensions: Vec3
}

export interface StructuralSurface extends SurfaceBase {
  kind: StructuralKind
}

export interface ObjectSurface extends SurfaceBase {
  kind: 'object'
  /** Usually an ObjectCategory; unknown categories are kept as-is. */
  category: string
}

export type SurfaceRecord = StructuralSurface | ObjectSurface
