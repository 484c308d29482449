// Schemas, validation helpers, errors and logging shared by the floor-plan packages.

export * from './schemas/index'

export { parseSurfaceRecords } from './validate'

export {
  SurfaceRecordValidationError,
  FloorPlanFormatError,
  type FieldErrors,
} from './errors'

export {
  createLogger,
  logger,
  type Logger,
  type LoggerOptions,
  type LogFields,
} from './logger'
