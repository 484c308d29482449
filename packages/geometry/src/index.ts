// Transforms
export {
  identityTransform, makeTransform, transformPosition, transformXAxis, planRotation,
} from './transform'

// Builder
export {
  buildFloorPlan, projectSurface, projectRect, boundingBoxOf, assertWellFormed,
} from './builder'
export { OBJECT_LABELS, FALLBACK_OBJECT_LABEL, labelForCategory, isObjectCategory } from './labels'
export { MalformedGeometryError } from './errors'

// Room measurements
export { roomDimensions, approximateFloorArea, roomCenter } from './room-geometry'
export { scanStatistics, summarizeScan, NO_ELEMENTS_DETECTED, type ScanStatistics } from './statistics'

// Viewport fit
export {
  fitToViewport, projectToViewport, METERS_TO_POINTS, VIEWPORT_PADDING,
  type ViewportSize, type ViewportFit, type FitOptions,
} from './viewport'

// Persisted companion format
export {
  serializeFloorPlan, deserializeFloorPlan, toFloorPlanDocument, fromFloorPlanDocument,
} from './serialization'
