/**
 * Export dispatch: the single entry point the app layers call to turn a
 * floor-plan model into a document of the requested format.
 */

import { exportDefaults } from '@roomscan/config'
import { logger as defaultLogger, type Logger } from '@roomscan/shared'
import { assertNever, type ExportFormat, type ExportFormatInfo, type FloorPlanModel } from '@roomscan/types'
import { encodeDxf } from './dxf'
import { encodeSvg } from './svg'

export interface ExportOptions {
  /** Defaults to ROOMSCAN_INCLUDE_DIMENSIONS (true). */
  includeDimensions?: boolean
  /** SVG only. Defaults to ROOMSCAN_ROTATE_ELEMENTS (false). */
  rotateElements?: boolean
  logger?: Logger
}

export function exportFormatInfo(format: ExportFormat): ExportFormatInfo {
  switch (format) {
    case 'svg':
      return { format, displayName: 'SVG (Vector Graphics)', fileExtension: 'svg', mimeType: 'image/svg+xml' }
    case 'dxf':
      return { format, displayName: 'DXF (AutoCAD)', fileExtension: 'dxf', mimeType: 'application/dxf' }
    default:
      return assertNever(format, 'export format')
  }
}

function encode(
  model: FloorPlanModel,
  format: ExportFormat,
  includeDimensions: boolean,
  rotateElements: boolean,
): string {
  switch (format) {
    case 'svg': return encodeSvg(model, { includeDimensions, rotateElements })
    case 'dxf': return encodeDxf(model, { includeDimensions })
    default:    return assertNever(format, 'export format')
  }
}

/** Serialize `model` as an SVG or DXF document. */
export function exportFloorPlan(
  model: FloorPlanModel,
  format: ExportFormat,
  options: ExportOptions = {},
): string {
  const log = options.logger ?? defaultLogger
  const includeDimensions = options.includeDimensions ?? exportDefaults.includeDimensions
  const rotateElements = options.rotateElements ?? exportDefaults.rotateElements

  const start = performance.now()
  const content = encode(model, format, includeDimensions, rotateElements)
  const ms = (performance.now() - start).toFixed(1)

  log.debug('floor plan exported', {
    format,
    elements: model.elements.length,
    bytes: Buffer.byteLength(content, 'utf8'),
    includeDimensions,
    ms: Number(ms),
  })

  return content
}
