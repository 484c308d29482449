import type { FloorPlanModel } from '@roomscan/types'

/** Single 2 m × 3 m wall whose rect is also the bounding box. */
export const SINGLE_WALL: FloorPlanModel = {
  elements: [
    { rect: { x: 0, y: 0, width: 2, height: 3 }, rotation: 0, type: { kind: 'wall' } },
  ],
  boundingBox: { x: 0, y: 0, width: 2, height: 3 },
  roomDimensions: { width: 2, height: 2.4, depth: 3 },
}

export const ONE_OF_EACH: FloorPlanModel = {
  elements: [
    { rect: { x: 0, y: 0, width: 4, height: 0.2 }, rotation: 0, type: { kind: 'wall' } },
    { rect: { x: 1, y: 0, width: 0.5, height: 0.25 }, rotation: 0, type: { kind: 'door' } },
    { rect: { x: 2.5, y: 0, width: 1, height: 0.25 }, rotation: 0, type: { kind: 'window' } },
    { rect: { x: 0, y: 1, width: 1, height: 0.25 }, rotation: 0, type: { kind: 'opening' } },
    {
      rect: { x: 1, y: 1, width: 2, height: 1 },
      rotation: 0,
      type: { kind: 'object', category: 'bed' },
      label: 'Bed',
    },
  ],
  boundingBox: { x: 0, y: 0, width: 4, height: 2 },
  roomDimensions: { width: 4, height: 2.5, depth: 0.2 },
}

export const EMPTY: FloorPlanModel = {
  elements: [],
  boundingBox: { x: 0, y: 0, width: 0, height: 0 },
  roomDimensions: { width: 0, height: 0, depth: 0 },
}

// ─── DXF reading ────────────────────────────────────────────────────────────

export interface DxfPair {
  code: number
  value: string
}

/** Split a DXF document into group-code / value pairs; throws on a malformed code line. */
export function readDxfPairs(text: string): DxfPair[] {
  const lines = text.split('\n')
  if (lines.length % 2 !== 0) throw new Error(`odd line count: ${lines.length}`)
  const pairs: DxfPair[] = []
  for (let i = 0; i < lines.length; i += 2) {
    const code = Number(lines[i])
    if (!Number.isInteger(code) || lines[i].trim() !== lines[i]) {
      throw new Error(`bad group code at line ${i + 1}: ${lines[i]}`)
    }
    pairs.push({ code, value: lines[i + 1] })
  }
  return pairs
}

export interface DxfEntity {
  type: string
  pairs: DxfPair[]
}

/** Entities of one section, each with the pairs that follow its code-0 line. */
export function dxfSection(pairs: DxfPair[], name: string): DxfEntity[] {
  const start = pairs.findIndex((p, i) =>
    p.code === 0 && p.value === 'SECTION' && pairs[i + 1]?.code === 2 && pairs[i + 1]?.value === name)
  if (start === -1) throw new Error(`missing section ${name}`)

  const entities: DxfEntity[] = []
  for (let i = start + 2; i < pairs.length; i++) {
    const pair = pairs[i]
    if (pair.code === 0) {
      if (pair.value === 'ENDSEC') return entities
      entities.push({ type: pair.value, pairs: [] })
    } else {
      entities[entities.length - 1]?.pairs.push(pair)
    }
  }
  throw new Error(`section ${name} is not closed`)
}

export function valueOf(entity: DxfEntity, code: number): string | undefined {
  return entity.pairs.find((p) => p.code === code)?.value
}

export function valuesOf(entity: DxfEntity, code: number): string[] {
  return entity.pairs.filter((p) => p.code === code).map((p) => p.value)
}

// ─── XML shape ──────────────────────────────────────────────────────────────

/** Check that every opened tag is closed in order and there is one root. */
export function assertBalancedXml(xml: string): void {
  const body = xml.replace(/^<\?xml[^?]*\?>\s*/, '')
  const stack: string[] = []
  let roots = 0
  for (const match of body.matchAll(/<(\/?)([A-Za-z][\w:-]*)[^>]*?(\/?)>/g)) {
    const [, closing, name, selfClosing] = match
    if (closing) {
      const open = stack.pop()
      if (open !== name) throw new Error(`</${name}> closes <${open ?? 'nothing'}>`)
    } else if (!selfClosing) {
      if (stack.length === 0) roots++
      stack.push(name)
    } else if (stack.length === 0) {
      roots++
    }
  }
  if (stack.length > 0) throw new Error(`unclosed <${stack.join('>, <')}>`)
  if (roots !== 1) throw new Error(`expected one root element, found ${roots}`)
}
