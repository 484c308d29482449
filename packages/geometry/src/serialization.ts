/**
 * JSON companion format: a floor-plan model saved next to a room so it can be
 * re-exported later without the source scan.
 */

import type { FloorPlanElement, FloorPlanModel } from '@roomscan/types'
import {
  FLOOR_PLAN_FORMAT_VERSION,
  FloorPlanFormatError,
  floorPlanDocumentSchema,
  type FloorPlanDocument,
} from '@roomscan/shared'

function documentElement(element: FloorPlanElement): FloorPlanDocument['elements'][number] {
  const { rect, rotation, type, label } = element
  const base = {
    rect: { x: rect.x, y: rect.y, width: rect.width, height: rect.height },
    rotation,
    type: { ...type },
  }
  return label === undefined ? base : { ...base, label }
}

export function toFloorPlanDocument(model: FloorPlanModel): FloorPlanDocument {
  const { boundingBox: b, roomDimensions: d } = model
  return {
    version: FLOOR_PLAN_FORMAT_VERSION,
    elements: model.elements.map(documentElement),
    boundingBox: { x: b.x, y: b.y, width: b.width, height: b.height },
    roomDimensions: { width: d.width, height: d.height, depth: d.depth },
  }
}

/**
 * Validate a parsed document and turn it back into a model.
 *
 * @throws FloorPlanFormatError if the value does not match the document schema
 */
export function fromFloorPlanDocument(value: unknown): FloorPlanModel {
  const result = floorPlanDocumentSchema.safeParse(value)
  if (!result.success) {
    throw new FloorPlanFormatError('Invalid floor plan document', result.error.issues)
  }
  const { elements, boundingBox, roomDimensions } = result.data
  return Object.freeze({
    elements: Object.freeze(elements.map((e) => Object.freeze(e))),
    boundingBox: Object.freeze(boundingBox),
    roomDimensions: Object.freeze(roomDimensions),
  })
}

export function serializeFloorPlan(model: FloorPlanModel): string {
  return JSON.stringify(toFloorPlanDocument(model))
}

/** @throws FloorPlanFormatError on malformed JSON or an invalid document */
export function deserializeFloorPlan(json: string): FloorPlanModel {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new FloorPlanFormatError(`Floor plan is not valid JSON (${reason})`)
  }
  return fromFloorPlanDocument(parsed)
}
