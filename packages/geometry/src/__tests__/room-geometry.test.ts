import { describe, it, expect } from 'vitest'
import { roomDimensions, approximateFloorArea, roomCenter } from '../room-geometry'
import { scanStatistics, summarizeScan, NO_ELEMENTS_DETECTED } from '../statistics'
import { wallAt, doorAt, openingAt, objectAt, v } from './fixtures'

// 5 m × 5 m room centered on the origin, walls 2.5 m tall
const SQUARE_ROOM = [
  wallAt(v(0, 1.25, -2.5), v(5, 2.5, 0.1)),
  wallAt(v(0, 1.25, 2.5), v(5, 2.5, 0.1)),
  wallAt(v(-2.5, 1.25, 0), v(5, 2.5, 0.1), Math.PI / 2),
  wallAt(v(2.5, 1.25, 0), v(5, 2.5, 0.1), Math.PI / 2),
]

describe('roomDimensions', () => {
  it('is all zero without walls', () => {
    expect(roomDimensions([objectAt('bed', v(0, 0, 0), v(2, 1, 2))])).toEqual({ width: 0, height: 0, depth: 0 })
  })

  it('spans the wall extents on every axis', () => {
    const dims = roomDimensions(SQUARE_ROOM)
    expect(dims.width).toBeCloseTo(10, 10)
    expect(dims.height).toBeCloseTo(2.5, 10)
    expect(dims.depth).toBeCloseTo(5.1, 10)
  })
})

describe('approximateFloorArea', () => {
  it('is zero without walls', () => {
    expect(approximateFloorArea([])).toBe(0)
  })

  it('squares a single wall width', () => {
    expect(approximateFloorArea([wallAt(v(0, 0, 0), v(3, 2, 0.1))])).toBe(9)
  })

  it('spans half the wall width on both floor axes', () => {
    expect(approximateFloorArea([
      wallAt(v(0, 0, 0), v(4, 2, 0.1)),
      wallAt(v(2, 0, 2), v(2, 2, 0.1)),
    ])).toBe(25)
  })
})

describe('roomCenter', () => {
  it('is undefined without walls', () => {
    expect(roomCenter([doorAt(v(1, 1, 1), v(1, 2, 0.1))])).toBeUndefined()
  })

  it('averages wall positions', () => {
    expect(roomCenter([
      wallAt(v(0, 1, 0), v(1, 2, 0.1)),
      wallAt(v(4, 1, 2), v(1, 2, 0.1)),
    ])).toEqual({ x: 2, y: 1, z: 1 })
  })
})

describe('scanStatistics', () => {
  const surfaces = [
    ...SQUARE_ROOM,
    doorAt(v(0, 1, -2.5), v(0.9, 2, 0.1)),
    openingAt(v(2.5, 1, 1), v(1, 2, 0.1)),
    objectAt('bed', v(0, 0.3, 0), v(1.6, 0.6, 2)),
    objectAt('piano', v(1, 0.5, 1), v(1.5, 1, 0.6)),
  ]

  it('counts surfaces by kind', () => {
    expect(scanStatistics(surfaces)).toEqual({
      wallCount: 4,
      doorCount: 1,
      windowCount: 0,
      openingCount: 1,
      objectCount: 2,
      floorArea: 100,
      totalElements: 8,
    })
  })

  it('summarizes non-zero counts and leaves openings out', () => {
    expect(summarizeScan(scanStatistics(surfaces))).toBe('4 walls, 1 door, 2 objects, 100.0 m² floor')
  })

  it('uses singular nouns for a count of one', () => {
    expect(summarizeScan(scanStatistics([wallAt(v(0, 0, 0), v(3, 2, 0.1))]))).toBe('1 wall, 9.0 m² floor')
  })

  it('reports an empty scan', () => {
    expect(summarizeScan(scanStatistics([]))).toBe(NO_ELEMENTS_DETECTED)
    expect(summarizeScan(scanStatistics([openingAt(v(0, 0, 0), v(1, 2, 0))]))).toBe('No elements detected')
  })
})
