import type { ElementKind, FloorPlanElement } from '@roomscan/types'

export type ElementKindName = ElementKind['kind']

/** Draw order shared by both encoders. */
export const DRAW_ORDER: readonly ElementKindName[] = ['wall', 'door', 'window', 'opening', 'object']

export type ElementsByKind = Record<ElementKindName, FloorPlanElement[]>

/** Group elements by kind, keeping their relative order. */
export function partitionByKind(elements: readonly FloorPlanElement[]): ElementsByKind {
  const groups: ElementsByKind = { wall: [], door: [], window: [], opening: [], object: [] }
  for (const element of elements) {
    groups[element.type.kind].push(element)
  }
  return groups
}
