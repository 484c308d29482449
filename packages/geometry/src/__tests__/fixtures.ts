import type { SurfaceRecord, Vec3 } from '@roomscan/types'
import { makeTransform } from '../transform'

export function wallAt(position: Vec3, dimensions: Vec3, yaw = 0): SurfaceRecord {
  return { kind: 'wall', transform: makeTransform(position, yaw), dimensions }
}

export function doorAt(position: Vec3, dimensions: Vec3, yaw = 0): SurfaceRecord {
  return { kind: 'door', transform: makeTransform(position, yaw), dimensions }
}

export function windowAt(position: Vec3, dimensions: Vec3, yaw = 0): SurfaceRecord {
  return { kind: 'window', transform: makeTransform(position, yaw), dimensions }
}

export function openingAt(position: Vec3, dimensions: Vec3, yaw = 0): SurfaceRecord {
  return { kind: 'opening', transform: makeTransform(position, yaw), dimensions }
}

export function objectAt(category: string, position: Vec3, dimensions: Vec3, yaw = 0): SurfaceRecord {
  return { kind: 'object', category, transform: makeTransform(position, yaw), dimensions }
}

export const v = (x: number, y: number, z: number): Vec3 => ({ x, y, z })
