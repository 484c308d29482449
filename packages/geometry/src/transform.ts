/**
 * Helpers over column-major 4×4 transforms.
 *
 * Only the parts the floor plan needs are here: the world position
 * (column 3) and the local X axis (column 0).
 */

import type { Transform, Vec3 } from '@roomscan/types'

export function identityTransform(): Transform {
  return [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1],
  ]
}

/**
 * Transform placing a surface at `position`, turned by `yaw` radians about the
 * vertical (Y) axis, right-handed.
 */
export function makeTransform(position: Vec3, yaw = 0): Transform {
  const c = Math.cos(yaw)
  const s = Math.sin(yaw)
  return [
    [c, 0, -s, 0],
    [0, 1, 0, 0],
    [s, 0, c, 0],
    [position.x, position.y, position.z, 1],
  ]
}

export function transformPosition(t: Transform): Vec3 {
  const [x, y, z] = t[3]
  return { x, y, z }
}

export function transformXAxis(t: Transform): Vec3 {
  const [x, y, z] = t[0]
  return { x, y, z }
}

/**
 * Signed angle of the local X axis projected onto the floor,
 * `atan2(xAxis.z, xAxis.x)`, in (-π, π].
 *
 * Measured in plan axes (X right, Z down), so for `makeTransform(p, yaw)`
 * this is `-yaw`.
 */
export function planRotation(t: Transform): number {
  const axis = transformXAxis(t)
  const angle = Math.atan2(axis.z, axis.x)
  if (angle === -Math.PI) return Math.PI
  // collapses -0
  return angle + 0
}
