import { z } from 'zod'

const finite = z.number().finite()
const size = finite.nonnegative()

/** Version written into every persisted floor plan. */
export const FLOOR_PLAN_FORMAT_VERSION = 1

export const rectSchema = z.object({
  x: finite,
  y: finite,
  width: size,
  height: size,
})

export const elementKindSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('wall') }),
  z.object({ kind: z.literal('door') }),
  z.object({ kind: z.literal('window') }),
  z.object({ kind: z.literal('opening') }),
  z.object({ kind: z.literal('object'), category: z.string() }),
])

export const floorPlanElementSchema = z.object({
  rect: rectSchema,
  rotation: finite.gt(-Math.PI).lte(Math.PI),
  type: elementKindSchema,
  label: z.string().optional(),
})

export const roomDimensionsSchema = z.object({
  width: size,
  height: size,
  depth: size,
})

/** Persisted companion document, saved next to a room for later re-export. */
export const floorPlanDocumentSchema = z.object({
  version: z.literal(FLOOR_PLAN_FORMAT_VERSION),
  elements: z.array(floorPlanElementSchema),
  boundingBox: rectSchema,
  roomDimensions: roomDimensionsSchema,
})

export type FloorPlanDocument = z.infer<typeof floorPlanDocumentSchema>
