import { z } from 'zod'

const finite = z.number().finite()

export const vec4Schema = z.tuple([finite, finite, finite, finite])

/** Column-major 4×4 transform: four columns of four numbers. */
export const transformSchema = z.tuple([vec4Schema, vec4Schema, vec4Schema, vec4Schema])

export const dimensionsSchema = z.object({
  x: finite.nonnegative(),
  y: finite.nonnegative(),
  z: finite.nonnegative(),
})

export const structuralSurfaceSchema = z.object({
  kind: z.enum(['wall', 'door', 'window', 'opening']),
  transform: transformSchema,
  dimensions: dimensionsSchema,
})

export const objectSurfaceSchema = z.object({
  kind: z.literal('object'),
  transform: transformSchema,
  dimensions: dimensionsSchema,
  category: z.string(),
})

export const surfaceRecordSchema = z.union([structuralSurfaceSchema, objectSurfaceSchema])

export const surfaceRecordListSchema = z.array(surfaceRecordSchema)

export type SurfaceRecordInput = z.infer<typeof surfaceRecordSchema>
