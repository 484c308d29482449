/**
 * Room-level measurements derived from walls only.
 */

import { ROOM_DIMENSIONS_ZERO, type RoomDimensions, type SurfaceRecord, type Vec3 } from '@roomscan/types'
import { transformPosition } from './transform'

function wallsOf(surfaces: readonly SurfaceRecord[]): SurfaceRecord[] {
  return surfaces.filter((s) => s.kind === 'wall')
}

/** Width (X), height (vertical Y) and depth (Z) of the box enclosing every wall. */
export function roomDimensions(surfaces: readonly SurfaceRecord[]): RoomDimensions {
  const walls = wallsOf(surfaces)
  if (walls.length === 0) return { ...ROOM_DIMENSIONS_ZERO }

  let minX = Infinity, maxX = -Infinity
  let minY = Infinity, maxY = -Infinity
  let minZ = Infinity, maxZ = -Infinity

  for (const wall of walls) {
    const p = transformPosition(wall.transform)
    const half = { x: wall.dimensions.x / 2, y: wall.dimensions.y / 2, z: wall.dimensions.z / 2 }
    minX = Math.min(minX, p.x - half.x)
    maxX = Math.max(maxX, p.x + half.x)
    minY = Math.min(minY, p.y - half.y)
    maxY = Math.max(maxY, p.y + half.y)
    minZ = Math.min(minZ, p.z - half.z)
    maxZ = Math.max(maxZ, p.z + half.z)
  }

  return { width: maxX - minX, height: maxY - minY, depth: maxZ - minZ }
}

/**
 * Approximate floor area in m².
 *
 * Each wall spans half its width around its center on both floor axes, so
 * walls running along X and along Z both widen the footprint.
 */
export function approximateFloorArea(surfaces: readonly SurfaceRecord[]): number {
  const walls = wallsOf(surfaces)
  if (walls.length === 0) return 0

  let minX = Infinity, maxX = -Infinity
  let minZ = Infinity, maxZ = -Infinity

  for (const wall of walls) {
    const p = transformPosition(wall.transform)
    const halfWidth = wall.dimensions.x / 2
    minX = Math.min(minX, p.x - halfWidth)
    maxX = Math.max(maxX, p.x + halfWidth)
    minZ = Math.min(minZ, p.z - halfWidth)
    maxZ = Math.max(maxZ, p.z + halfWidth)
  }

  return (maxX - minX) * (maxZ - minZ)
}

/** Mean wall position, or undefined when there are no walls. */
export function roomCenter(surfaces: readonly SurfaceRecord[]): Vec3 | undefined {
  const walls = wallsOf(surfaces)
  if (walls.length === 0) return undefined

  const sum = { x: 0, y: 0, z: 0 }
  for (const wall of walls) {
    const p = transformPosition(wall.transform)
    sum.x += p.x
    sum.y += p.y
    sum.z += p.z
  }
  const n = walls.length
  return { x: sum.x / n, y: sum.y / n, z: sum.z / n }
}
