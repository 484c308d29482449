import { describe, it, expect, vi } from 'vitest'
import type { FloorPlanModel } from '@roomscan/types'

import { encodeSvg } from '../svg'
import { encodeDxf } from '../dxf'
import { SINGLE_WALL, ONE_OF_EACH, readDxfPairs, dxfSection, valueOf } from './helpers'

// As if ROOMSCAN_INCLUDE_DIMENSIONS=false and ROOMSCAN_ROTATE_ELEMENTS=true
vi.mock('@roomscan/config', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@roomscan/config')>()
  return {
    ...actual,
    exportDefaults: { ...actual.exportDefaults, includeDimensions: false, rotateElements: true },
  }
})

const rotated: FloorPlanModel = {
  ...SINGLE_WALL,
  elements: [{ ...SINGLE_WALL.elements[0], rotation: Math.PI / 2 }],
}

describe('encoders — environment defaults', () => {
  it('rotates SVG elements when the environment asks for it', () => {
    expect(encodeSvg(rotated).split('\n')).toContain(
      '  <rect class="wall" x="0" y="0" width="200" height="300" transform="rotate(90, 100, 150)"/>',
    )
  })

  it('leaves SVG dimensions out when the environment turns them off', () => {
    expect(encodeSvg(SINGLE_WALL)).not.toContain('class="dimension"')
  })

  it('leaves DXF dimensions out when the environment turns them off', () => {
    const entities = dxfSection(readDxfPairs(encodeDxf(ONE_OF_EACH)), 'ENTITIES')
    expect(entities.filter((e) => valueOf(e, 8) === 'DIMENSIONS')).toEqual([])
  })

  it('still lets explicit options win', () => {
    expect(encodeSvg(rotated, { rotateElements: false, includeDimensions: true })).toContain('>3.00m</text>')
    expect(encodeSvg(rotated, { rotateElements: false })).not.toContain('rotate(90, 100, 150)')
  })
})
