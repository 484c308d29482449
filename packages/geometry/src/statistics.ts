import type { SurfaceKind, SurfaceRecord } from '@roomscan/types'
import { approximateFloorArea } from './room-geometry'

export interface ScanStatistics {
  wallCount: number
  doorCount: number
  windowCount: number
  openingCount: number
  objectCount: number
  /** m², see approximateFloorArea. */
  floorArea: number
  totalElements: number
}

export const NO_ELEMENTS_DETECTED = 'No elements detected'

function countOf(surfaces: readonly SurfaceRecord[], kind: SurfaceKind): number {
  return surfaces.reduce((n, s) => (s.kind === kind ? n + 1 : n), 0)
}

export function scanStatistics(surfaces: readonly SurfaceRecord[]): ScanStatistics {
  const wallCount = countOf(surfaces, 'wall')
  const doorCount = countOf(surfaces, 'door')
  const windowCount = countOf(surfaces, 'window')
  const openingCount = countOf(surfaces, 'opening')
  const objectCount = countOf(surfaces, 'object')
  return {
    wallCount,
    doorCount,
    windowCount,
    openingCount,
    objectCount,
    floorArea: approximateFloorArea(surfaces),
    totalElements: wallCount + doorCount + windowCount + openingCount + objectCount,
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/** e.g. "4 walls, 1 door, 12.5 m² floor". Openings are not listed. */
export function summarizeScan(stats: ScanStatistics): string {
  const parts: string[] = []
  if (stats.wallCount > 0) parts.push(plural(stats.wallCount, 'wall'))
  if (stats.doorCount > 0) parts.push(plural(stats.doorCount, 'door'))
  if (stats.windowCount > 0) parts.push(plural(stats.windowCount, 'window'))
  if (stats.objectCount > 0) parts.push(plural(stats.objectCount, 'object'))
  if (stats.floorArea > 0) parts.push(`${stats.floorArea.toFixed(1)} m² floor`)
  return parts.length === 0 ? NO_ELEMENTS_DETECTED : parts.join(', ')
}
