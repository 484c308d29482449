/**
 * SVG 1.1 encoder: FloorPlanModel → standalone SVG document.
 *
 * Document layout:
 *   prolog, <svg> root sized to the plan plus padding, <title>, <defs>,
 *   <style> with one class per element kind, then a <g> translated by the
 *   padding holding walls, doors, windows, openings, objects and the optional
 *   dimension annotations, in that order.
 *
 * Coordinates: screen = (world - boundingBox.min) × 100, i.e. 1 m = 100 units.
 */

import { exportDefaults } from '@roomscan/config'
import { assertNever, type FloorPlanElement, type FloorPlanModel } from '@roomscan/types'
import { DRAW_ORDER, partitionByKind, type ElementKindName } from './partition'
import { escapeXml, formatMeters, formatNumber, radiansToDegrees } from './format'
import { DocumentWriter } from './writer'

// ─── Constants ──────────────────────────────────────────────────────────────

/** User units per meter. */
export const SVG_SCALE = 100
/** Margin around the plan, in user units. */
export const SVG_PADDING = 50

const DIMENSION_OFFSET = 30
const DIMENSION_LABEL_GAP = 15
const DEPTH_LABEL_GAP = 10
const LABEL_BASELINE_SHIFT = 4
const FRACTION_DIGITS = 4

const STYLE_RULES = [
  '.wall { fill: none; stroke: #333333; stroke-width: 8; }',
  '.door { fill: none; stroke: #8B4513; stroke-width: 4; }',
  '.window { fill: #87CEEB; stroke: #4169E1; stroke-width: 2; fill-opacity: 0.5; }',
  '.opening { fill: none; stroke: #999999; stroke-width: 2; stroke-dasharray: 5,5; }',
  '.object { fill: #E0E0E0; stroke: #666666; stroke-width: 1; }',
  '.dimension { font-family: Arial, sans-serif; font-size: 12px; fill: #666666; }',
  '.dimension-line { stroke: #666666; stroke-width: 1; }',
  '.label { font-family: Arial, sans-serif; font-size: 10px; fill: #333333; text-anchor: middle; }',
] as const

export interface SvgOptions {
  includeDimensions: boolean
  /**
   * Rotate each element about its own center by its plan rotation.
   * Off by default: exports show the unrotated plan view.
   */
  rotateElements: boolean
}

// ─── Helpers ────────────────────────────────────────────────────────────────

type AttrValue = string | number

function num(value: number): string {
  return formatNumber(value, FRACTION_DIGITS)
}

function attrs(values: Record<string, AttrValue>): string {
  return Object.entries(values)
    .map(([name, value]) => `${name}="${typeof value === 'number' ? num(value) : escapeXml(value)}"`)
    .join(' ')
}

function cssClass(kind: ElementKindName): string {
  switch (kind) {
    case 'wall':    return 'wall'
    case 'door':    return 'door'
    case 'window':  return 'window'
    case 'opening': return 'opening'
    case 'object':  return 'object'
    default:        return assertNever(kind, 'element kind')
  }
}

interface ScreenRect {
  x: number
  y: number
  width: number
  height: number
}

// ─── Encoder ────────────────────────────────────────────────────────────────

export function encodeSvg(model: FloorPlanModel, options: Partial<SvgOptions> = {}): string {
  const includeDimensions = options.includeDimensions ?? exportDefaults.includeDimensions
  const rotateElements = options.rotateElements ?? exportDefaults.rotateElements
  const { boundingBox: bbox } = model

  const planWidth = bbox.width * SVG_SCALE
  const planHeight = bbox.height * SVG_SCALE
  const canvasWidth = Math.trunc(planWidth + SVG_PADDING * 2)
  const canvasHeight = Math.trunc(planHeight + SVG_PADDING * 2)

  const toScreen = (element: FloorPlanElement): ScreenRect => ({
    x: (element.rect.x - bbox.x) * SVG_SCALE,
    y: (element.rect.y - bbox.y) * SVG_SCALE,
    width: element.rect.width * SVG_SCALE,
    height: element.rect.height * SVG_SCALE,
  })

  const w = new DocumentWriter()

  w.line('<?xml version="1.0" encoding="UTF-8"?>')
  w.line(`<svg ${attrs({
    xmlns: 'http://www.w3.org/2000/svg',
    version: '1.1',
    width: canvasWidth,
    height: canvasHeight,
    viewBox: `0 0 ${num(canvasWidth)} ${num(canvasHeight)}`,
  })}>`)
  w.line('<title>Floor Plan</title>')
  w.line('<defs>')
  w.line(`  <marker ${attrs({
    id: 'dimension-tick',
    markerWidth: 10,
    markerHeight: 10,
    refX: 5,
    refY: 5,
    orient: 'auto',
  })}>`)
  w.line('    <path d="M 5 0 L 5 10" stroke="#666666" stroke-width="1"/>')
  w.line('  </marker>')
  w.line('</defs>')
  w.line('<style>')
  w.lines(STYLE_RULES.map((rule) => `  ${rule}`))
  w.line('</style>')
  w.line(`<g transform="translate(${num(SVG_PADDING)}, ${num(SVG_PADDING)})">`)

  const groups = partitionByKind(model.elements)
  for (const kind of DRAW_ORDER) {
    for (const element of groups[kind]) {
      const r = toScreen(element)
      const rect: Record<string, AttrValue> = {
        class: cssClass(kind),
        x: r.x,
        y: r.y,
        width: r.width,
        height: r.height,
      }
      if (rotateElements && element.rotation !== 0) {
        const cx = r.x + r.width / 2
        const cy = r.y + r.height / 2
        rect.transform = `rotate(${num(radiansToDegrees(element.rotation))}, ${num(cx)}, ${num(cy)})`
      }
      w.line(`  <rect ${attrs(rect)}/>`)

      if (element.type.kind === 'object' && element.label !== undefined) {
        const label = attrs({
          class: 'label',
          x: r.x + r.width / 2,
          y: r.y + r.height / 2 + LABEL_BASELINE_SHIFT,
        })
        w.line(`  <text ${label}>${escapeXml(element.label)}</text>`)
      }
    }
  }

  if (includeDimensions) {
    const roomWidth = formatMeters(model.roomDimensions.width, 'm')
    const roomDepth = formatMeters(model.roomDimensions.depth, 'm')

    // Width, under the plan
    const bottomY = planHeight + DIMENSION_OFFSET
    w.line(`  <line ${attrs({
      class: 'dimension-line',
      x1: 0,
      y1: bottomY,
      x2: planWidth,
      y2: bottomY,
      'marker-start': 'url(#dimension-tick)',
      'marker-end': 'url(#dimension-tick)',
    })}/>`)
    w.line(`  <text ${attrs({
      class: 'dimension',
      x: planWidth / 2,
      y: bottomY + DIMENSION_LABEL_GAP,
      'text-anchor': 'middle',
    })}>${roomWidth}</text>`)

    // Depth, right of the plan, read top to bottom
    const rightX = planWidth + DIMENSION_OFFSET
    const labelX = rightX + DEPTH_LABEL_GAP
    const labelY = planHeight / 2
    w.line(`  <line ${attrs({
      class: 'dimension-line',
      x1: rightX,
      y1: 0,
      x2: rightX,
      y2: planHeight,
      'marker-start': 'url(#dimension-tick)',
      'marker-end': 'url(#dimension-tick)',
    })}/>`)
    w.line(`  <text ${attrs({
      class: 'dimension',
      x: labelX,
      y: labelY,
      transform: `rotate(90, ${num(labelX)}, ${num(labelY)})`,
    })}>${roomDepth}</text>`)
  }

  w.line('</g>')
  w.line('</svg>')
  return w.finish(true)
}
