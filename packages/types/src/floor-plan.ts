/**
 * Normalized 2D floor-plan model produced by the builder and consumed by the
 * SVG and DXF encoders.
 */

import type { Rect, RoomDimensions } from './geometry'

// ─── Element kinds ──────────────────────────────────────────────────────────

export interface WallKind { kind: 'wall' }
export interface DoorKind { kind: 'door' }
export interface WindowKind { kind: 'window' }
export interface OpeningKind { kind: 'opening' }
export interface ObjectKind { kind: 'object'; category: string }

/** Closed set of element kinds. Switches over `kind` must be exhaustive. */
export type ElementKind = WallKind | DoorKind | WindowKind | OpeningKind | ObjectKind

// ─── Model ──────────────────────────────────────────────────────────────────

export interface FloorPlanElement {
  rect: Rect
  /** Radians in (-π, π]. */
  rotation: number
  type: ElementKind
  /** Display name for furniture; absent for structural elements. */
  label?: string
}

export interface FloorPlanModel {
  /** Walls, doors, windows, openings, objects, in that order. */
  elements: readonly FloorPlanElement[]
  boundingBox: Rect
  /** Derived from walls only. */
  roomDimensions: RoomDimensions
}
