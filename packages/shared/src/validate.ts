import type { SurfaceRecord } from '@roomscan/types'
import { surfaceRecordListSchema } from './schemas/index'
import { SurfaceRecordValidationError } from './errors'

/**
 * Validate untrusted surface records (e.g. JSON handed over by the scanning
 * layer) and return them typed.
 *
 * @throws SurfaceRecordValidationError if any record is malformed
 */
export function parseSurfaceRecords(input: unknown): SurfaceRecord[] {
  const result = surfaceRecordListSchema.safeParse(input)
  if (!result.success) {
    throw new SurfaceRecordValidationError(result.error.issues)
  }
  return result.data
}
