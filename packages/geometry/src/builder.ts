/**
 * Floor-Plan Builder: surface records → normalized 2D floor-plan model.
 *
 * Each surface is projected top-down onto the floor: plan X is world X, plan Y
 * is world Z, and the rectangle is centered on the surface position using its
 * width (dimensions.x) and depth (dimensions.z). Room dimensions come from the
 * walls alone and keep the vertical extent.
 */

import {
  RECT_ZERO,
  SURFACE_KINDS,
  assertNever,
  rectMaxX,
  rectMaxY,
  type ElementKind,
  type FloorPlanElement,
  type FloorPlanModel,
  type Rect,
  type SurfaceKind,
  type SurfaceRecord,
} from '@roomscan/types'
import { MalformedGeometryError } from './errors'
import { labelForCategory } from './labels'
import { roomDimensions } from './room-geometry'
import { planRotation, transformPosition } from './transform'

// ─── Validation ─────────────────────────────────────────────────────────────

const AXES = ['x', 'y', 'z'] as const
const RECT_FIELDS = ['x', 'y', 'width', 'height'] as const
const ROOM_FIELDS = ['width', 'height', 'depth'] as const

/**
 * @throws MalformedGeometryError on the first non-finite number, negative
 * extent, or projected rect coordinate that overflows
 */
export function assertWellFormed(surface: SurfaceRecord, index: number): void {
  surface.transform.forEach((column, c) => {
    column.forEach((value, r) => {
      if (!Number.isFinite(value)) {
        throw new MalformedGeometryError(`transform[${c}][${r}]`, value, index, surface.kind)
      }
    })
  })
  for (const axis of AXES) {
    const value = surface.dimensions[axis]
    if (!Number.isFinite(value) || value < 0) {
      throw new MalformedGeometryError(`dimensions.${axis}`, value, index, surface.kind)
    }
  }
  assertFinite('rect', projectRect(surface), RECT_FIELDS, index, surface.kind)
}

/** @throws MalformedGeometryError naming the first non-finite field as `prefix.key` */
function assertFinite<K extends string>(
  prefix: string,
  values: Readonly<Record<K, number>>,
  keys: readonly K[],
  surfaceIndex?: number,
  surfaceKind?: SurfaceKind,
): void {
  for (const key of keys) {
    const value = values[key]
    if (!Number.isFinite(value)) {
      throw new MalformedGeometryError(`${prefix}.${key}`, value, surfaceIndex, surfaceKind)
    }
  }
}

// ─── Projection ─────────────────────────────────────────────────────────────

// -0 would not survive a JSON round trip
const unsigned = (n: number): number => n + 0

export function projectRect(surface: SurfaceRecord): Rect {
  const p = transformPosition(surface.transform)
  const { x: width, z: depth } = surface.dimensions
  return {
    x: unsigned(p.x - width / 2),
    y: unsigned(p.z - depth / 2),
    width: unsigned(width),
    height: unsigned(depth),
  }
}

function elementKindOf(surface: SurfaceRecord): ElementKind {
  switch (surface.kind) {
    case 'wall':    return { kind: 'wall' }
    case 'door':    return { kind: 'door' }
    case 'window':  return { kind: 'window' }
    case 'opening': return { kind: 'opening' }
    case 'object':  return { kind: 'object', category: surface.category }
    default:        return assertNever(surface, 'surface')
  }
}

/** Project one surface record into a floor-plan element. */
export function projectSurface(surface: SurfaceRecord): FloorPlanElement {
  const rect = Object.freeze(projectRect(surface))
  const type = Object.freeze(elementKindOf(surface))
  const rotation = planRotation(surface.transform)
  const element: FloorPlanElement = surface.kind === 'object'
    ? { rect, rotation, type, label: labelForCategory(surface.category) }
    : { rect, rotation, type }
  return Object.freeze(element)
}

// ─── Bounding box ───────────────────────────────────────────────────────────

/** Smallest rect containing every element rect; all zero for an empty list. */
export function boundingBoxOf(elements: readonly FloorPlanElement[]): Rect {
  if (elements.length === 0) return { ...RECT_ZERO }

  let minX = Infinity, minY = Infinity
  let maxX = -Infinity, maxY = -Infinity
  for (const { rect } of elements) {
    minX = Math.min(minX, rect.x)
    minY = Math.min(minY, rect.y)
    maxX = Math.max(maxX, rectMaxX(rect))
    maxY = Math.max(maxY, rectMaxY(rect))
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY }
}

// ─── Build ──────────────────────────────────────────────────────────────────

function groupByKind(surfaces: readonly SurfaceRecord[]): SurfaceRecord[] {
  const groups = new Map<SurfaceKind, SurfaceRecord[]>(SURFACE_KINDS.map((k) => [k, []]))
  for (const surface of surfaces) {
    groups.get(surface.kind)?.push(surface)
  }
  return SURFACE_KINDS.flatMap((k) => groups.get(k) ?? [])
}

/**
 * Build a floor-plan model from surface records.
 *
 * Elements are ordered walls, doors, windows, openings, objects; input order
 * is kept within each kind. The returned model is frozen.
 *
 * @throws MalformedGeometryError if a record has a non-finite number or a
 * negative extent, or the bounding box or room size overflows
 */
export function buildFloorPlan(surfaces: readonly SurfaceRecord[]): FloorPlanModel {
  surfaces.forEach(assertWellFormed)

  const elements = Object.freeze(groupByKind(surfaces).map(projectSurface))
  const boundingBox = boundingBoxOf(elements)
  assertFinite('boundingBox', boundingBox, RECT_FIELDS)
  const room = roomDimensions(surfaces)
  assertFinite('roomDimensions', room, ROOM_FIELDS)

  return Object.freeze({
    elements,
    boundingBox: Object.freeze(boundingBox),
    roomDimensions: Object.freeze(room),
  })
}
