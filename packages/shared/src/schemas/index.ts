export {
  vec4Schema,
  transformSchema,
  dimensionsSchema,
  structuralSurfaceSchema,
  objectSurfaceSchema,
  surfaceRecordSchema,
  surfaceRecordListSchema,
  type SurfaceRecordInput,
} from './surface-records'

export {
  FLOOR_PLAN_FORMAT_VERSION,
  rectSchema,
  elementKindSchema,
  floorPlanElementSchema,
  roomDimensionsSchema,
  floorPlanDocumentSchema,
  type FloorPlanDocument,
} from './floor-plans'
