/**
 * DXF encoder: FloorPlanModel → ASCII DXF (AutoCAD 2000, AC1015).
 *
 * A DXF file is a flat sequence of group-code / value line pairs:
 *
 *   HEADER    $ACADVER = AC1015, $INSUNITS = 6 (meters)
 *   TABLES    LAYER table: WALLS, DOORS, WINDOWS, OBJECTS, DIMENSIONS
 *   ENTITIES  one closed LWPOLYLINE per wall, door, window and object,
 *             TEXT for object labels and room dimensions
 *   EOF
 *
 * Coordinates are meters (scale 1.0), shifted so the bounding box minimum
 * lands on the origin. Openings have no layer and are not written.
 */

import { exportDefaults } from '@roomscan/config'
import { assertNever, type FloorPlanElement, type FloorPlanModel } from '@roomscan/types'
import { DRAW_ORDER, partitionByKind, type ElementKindName } from './partition'
import { formatMeters, formatNumber, singleLine } from './format'
import { DocumentWriter } from './writer'

// ─── Group codes ────────────────────────────────────────────────────────────

export const GC_ENTITY_TYPE = 0
export const GC_TEXT = 1
export const GC_NAME = 2
export const GC_LINETYPE = 6
export const GC_LAYER = 8
export const GC_HEADER_VARIABLE = 9
export const GC_X = 10
export const GC_Y = 20
export const GC_TEXT_HEIGHT = 40
export const GC_COLOR = 62
export const GC_FLAGS = 70
export const GC_VERTEX_COUNT = 90

// ─── Layers ─────────────────────────────────────────────────────────────────

export type DxfLayerName = 'WALLS' | 'DOORS' | 'WINDOWS' | 'OBJECTS' | 'DIMENSIONS'

export interface DxfLayer {
  name: DxfLayerName
  /** AutoCAD color index. */
  color: number
}

export const DXF_LAYERS: readonly DxfLayer[] = [
  { name: 'WALLS', color: 7 },
  { name: 'DOORS', color: 3 },
  { name: 'WINDOWS', color: 5 },
  { name: 'OBJECTS', color: 8 },
  { name: 'DIMENSIONS', color: 1 },
]

export const DXF_VERSION = 'AC1015'
/** $INSUNITS code for meters. */
export const DXF_UNITS_METERS = 6

export const LABEL_TEXT_HEIGHT = 0.15
export const DIMENSION_TEXT_HEIGHT = 0.2
/** Distance between the plan edge and a dimension label, in meters. */
export const DIMENSION_OFFSET = 0.3

const FRACTION_DIGITS = 6

/** Layer for an element kind; undefined for kinds that are not written. */
export function layerFor(kind: ElementKindName): DxfLayerName | undefined {
  switch (kind) {
    case 'wall':    return 'WALLS'
    case 'door':    return 'DOORS'
    case 'window':  return 'WINDOWS'
    case 'opening': return undefined
    case 'object':  return 'OBJECTS'
    default:        return assertNever(kind, 'element kind')
  }
}

export interface DxfOptions {
  includeDimensions: boolean
}

// ─── Writer ─────────────────────────────────────────────────────────────────

class DxfWriter extends DocumentWriter {
  pair(code: number, value: string | number): this {
    this.line(String(code))
    this.line(typeof value === 'number' ? formatNumber(value, FRACTION_DIGITS) : singleLine(value))
    return this
  }

  beginSection(name: string): this {
    return this.pair(GC_ENTITY_TYPE, 'SECTION').pair(GC_NAME, name)
  }

  endSection(): this {
    return this.pair(GC_ENTITY_TYPE, 'ENDSEC')
  }

  point(x: number, y: number): this {
    return this.pair(GC_X, x).pair(GC_Y, y)
  }

  text(layer: DxfLayerName, x: number, y: number, height: number, value: string): this {
    return this
      .pair(GC_ENTITY_TYPE, 'TEXT')
      .pair(GC_LAYER, layer)
      .point(x, y)
      .pair(GC_TEXT_HEIGHT, height)
      .pair(GC_TEXT, value)
  }

  /** Closed 4-vertex polyline: (x1,y1) → (x2,y1) → (x2,y2) → (x1,y2). */
  rectangle(layer: DxfLayerName, x1: number, y1: number, x2: number, y2: number): this {
    return this
      .pair(GC_ENTITY_TYPE, 'LWPOLYLINE')
      .pair(GC_LAYER, layer)
      .pair(GC_VERTEX_COUNT, 4)
      .pair(GC_FLAGS, 1)
      .point(x1, y1)
      .point(x2, y1)
      .point(x2, y2)
      .point(x1, y2)
  }
}

// ─── Sections ───────────────────────────────────────────────────────────────

function writeHeader(w: DxfWriter): void {
  w.beginSection('HEADER')
  w.pair(GC_HEADER_VARIABLE, '$ACADVER').pair(GC_TEXT, DXF_VERSION)
  w.pair(GC_HEADER_VARIABLE, '$INSUNITS').pair(GC_FLAGS, DXF_UNITS_METERS)
  w.endSection()
}

function writeTables(w: DxfWriter): void {
  w.beginSection('TABLES')
  w.pair(GC_ENTITY_TYPE, 'TABLE').pair(GC_NAME, 'LAYER').pair(GC_FLAGS, DXF_LAYERS.length)
  for (const layer of DXF_LAYERS) {
    w.pair(GC_ENTITY_TYPE, 'LAYER')
      .pair(GC_NAME, layer.name)
      .pair(GC_FLAGS, 0)
      .pair(GC_COLOR, layer.color)
      .pair(GC_LINETYPE, 'CONTINUOUS')
  }
  w.pair(GC_ENTITY_TYPE, 'ENDTAB')
  w.endSection()
}

function writeEntities(w: DxfWriter, model: FloorPlanModel, options: DxfOptions): void {
  const { boundingBox: bbox } = model
  const tx = (x: number): number => x - bbox.x
  const ty = (y: number): number => y - bbox.y

  w.beginSection('ENTITIES')

  const groups = partitionByKind(model.elements)
  for (const kind of DRAW_ORDER) {
    const layer = layerFor(kind)
    if (layer === undefined) continue
    for (const element of groups[kind]) {
      writeElement(w, element, layer, tx, ty)
    }
  }

  if (options.includeDimensions) {
    const totalWidth = bbox.width
    const totalHeight = bbox.height
    w.text(
      'DIMENSIONS', totalWidth / 2, -DIMENSION_OFFSET, DIMENSION_TEXT_HEIGHT,
      formatMeters(model.roomDimensions.width, ' m'),
    )
    w.text(
      'DIMENSIONS', totalWidth + DIMENSION_OFFSET, totalHeight / 2, DIMENSION_TEXT_HEIGHT,
      formatMeters(model.roomDimensions.depth, ' m'),
    )
  }

  w.endSection()
}

function writeElement(
  w: DxfWriter,
  element: FloorPlanElement,
  layer: DxfLayerName,
  tx: (x: number) => number,
  ty: (y: number) => number,
): void {
  const { rect } = element
  const x1 = tx(rect.x)
  const y1 = ty(rect.y)
  const x2 = tx(rect.x + rect.width)
  const y2 = ty(rect.y + rect.height)

  w.rectangle(layer, x1, y1, x2, y2)

  if (element.type.kind === 'object' && element.label !== undefined) {
    w.text('OBJECTS', (x1 + x2) / 2, (y1 + y2) / 2, LABEL_TEXT_HEIGHT, element.label)
  }
}

// ─── Encoder ────────────────────────────────────────────────────────────────

export function encodeDxf(model: FloorPlanModel, options: Partial<DxfOptions> = {}): string {
  const resolved: DxfOptions = {
    includeDimensions: options.includeDimensions ?? exportDefaults.includeDimensions,
  }
  const w = new DxfWriter()
  writeHeader(w)
  writeTables(w)
  writeEntities(w, model, resolved)
  w.pair(GC_ENTITY_TYPE, 'EOF')
  return w.finish()
}
