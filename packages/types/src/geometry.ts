/**
 * Geometric primitives shared by the builder and the encoders.
 *
 * Units are meters throughout. The floor plan is a top-down projection:
 * plan X is world X, plan Y is world Z, world Y (vertical) is dropped.
 */

// ─── Vectors ────────────────────────────────────────────────────────────────

export interface Vec3 {
  x: number
  y: number
  z: number
}

/** One column of a 4×4 matrix: [x, y, z, w]. */
export type Vec4 = readonly [x: number, y: number, z: number, w: number]

// ─── Transform ──────────────────────────────────────────────────────────────

/**
 * Column-major 4×4 affine transform.
 * Column 0 is the local X axis, column 1 local Y, column 2 local Z,
 * column 3 the world position.
 */
export type Transform = readonly [c0: Vec4, c1: Vec4, c2: Vec4, c3: Vec4]

// ─── 2D ─────────────────────────────────────────────────────────────────────

/** Axis-aligned rectangle, origin at its minimum corner. */
export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

export const RECT_ZERO: Readonly<Rect> = { x: 0, y: 0, width: 0, height: 0 }

export function rectMaxX(r: Rect): number {
  return r.x + r.width
}

export function rectMaxY(r: Rect): number {
  return r.y + r.height
}

export function rectCenter(r: Rect): { x: number; y: number } {
  return { x: r.x + r.width / 2, y: r.y + r.height / 2 }
}

/** Room extent in meters. `height` is the vertical (ceiling) extent. */
export interface RoomDimensions {
  width: number
  height: number
  depth: number
}

export const ROOM_DIMENSIONS_ZERO: Readonly<RoomDimensions> = { width: 0, height: 0, depth: 0 }
