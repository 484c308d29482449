// Shared type vocabulary for the floor-plan packages.

export {
  RECT_ZERO,
  ROOM_DIMENSIONS_ZERO,
  rectMaxX,
  rectMaxY,
  rectCenter,
  type Vec3,
  type Vec4,
  type Transform,
  type Rect,
  type RoomDimensions,
} from './geometry'

export {
  SURFACE_KINDS,
  OBJECT_CATEGORIES,
  type StructuralKind,
  type SurfaceKind,
  type ObjectCategory,
  type StructuralSurface,
  type ObjectSurface,
  type SurfaceRecord,
} from './surfaces'

export type {
  WallKind,
  DoorKind,
  WindowKind,
  OpeningKind,
  ObjectKind,
  ElementKind,
  FloorPlanElement,
  FloorPlanModel,
} from './floor-plan'

export { EXPORT_FORMATS, type ExportFormat, type ExportFormatInfo } from './export'

export { assertNever } from './assert'
