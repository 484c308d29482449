import { describe, it, expect } from 'vitest'
import { createLogger } from '@roomscan/shared'
import { EXPORT_FORMATS } from '@roomscan/types'
import { buildFloorPlan } from '@roomscan/geometry'

import { exportFloorPlan, exportFormatInfo } from '../export'
import { encodeSvg } from '../svg'
import { encodeDxf } from '../dxf'
import { ONE_OF_EACH, assertBalancedXml, readDxfPairs, dxfSection } from './helpers'

function capture() {
  const lines: string[] = []
  const logger = createLogger({ level: 'debug', sink: (line) => lines.push(line) })
  return { logger, lines }
}

describe('exportFloorPlan', () => {
  it('dispatches to the SVG encoder with the configured defaults', () => {
    const { logger } = capture()
    expect(exportFloorPlan(ONE_OF_EACH, 'svg', { logger }))
      .toBe(encodeSvg(ONE_OF_EACH, { includeDimensions: true, rotateElements: false }))
  })

  it('dispatches to the DXF encoder and passes options through', () => {
    const { logger } = capture()
    expect(exportFloorPlan(ONE_OF_EACH, 'dxf', { logger, includeDimensions: false }))
      .toBe(encodeDxf(ONE_OF_EACH, { includeDimensions: false }))
  })

  it('passes rotateElements to the SVG encoder', () => {
    const { logger } = capture()
    expect(exportFloorPlan(ONE_OF_EACH, 'svg', { logger, rotateElements: true }))
      .toBe(encodeSvg(ONE_OF_EACH, { includeDimensions: true, rotateElements: true }))
  })

  it('logs one debug line per export', () => {
    const { logger, lines } = capture()
    const content = exportFloorPlan(ONE_OF_EACH, 'dxf', { logger })
    expect(lines).toHaveLength(1)
    const entry: unknown = JSON.parse(lines[0])
    expect(entry).toMatchObject({
      level: 'debug',
      msg: 'floor plan exported',
      format: 'dxf',
      elements: 5,
      bytes: Buffer.byteLength(content, 'utf8'),
      includeDimensions: true,
    })
    expect(entry).toHaveProperty('ms', expect.any(Number))
  })
})

describe('exportFloorPlan — empty scan', () => {
  it('writes well-formed documents in both formats', () => {
    const { logger } = capture()
    const model = buildFloorPlan([])
    expect(() => assertBalancedXml(exportFloorPlan(model, 'svg', { logger }))).not.toThrow()
    expect(dxfSection(readDxfPairs(exportFloorPlan(model, 'dxf', { logger })), 'ENTITIES')
      .filter((e) => e.type === 'LWPOLYLINE')).toEqual([])
  })
})

describe('exportFormatInfo', () => {
  it('describes SVG', () => {
    expect(exportFormatInfo('svg')).toEqual({
      format: 'svg',
      displayName: 'SVG (Vector Graphics)',
      fileExtension: 'svg',
      mimeType: 'image/svg+xml',
    })
  })

  it('describes DXF', () => {
    expect(exportFormatInfo('dxf')).toEqual({
      format: 'dxf',
      displayName: 'DXF (AutoCAD)',
      fileExtension: 'dxf',
      mimeType: 'application/dxf',
    })
  })

  it('covers every export format', () => {
    expect(EXPORT_FORMATS.map((f) => exportFormatInfo(f).fileExtension)).toEqual(['svg', 'dxf'])
  })
})
