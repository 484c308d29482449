import type { SurfaceKind } from '@roomscan/types'

/**
 * A surface record carries a non-finite coordinate or a negative extent, or
 * its coordinates are too large for the derived plan geometry to stay finite.
 * Derived values that span several surfaces carry no surface index.
 */
export class MalformedGeometryError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: number,
    public readonly surfaceIndex?: number,
    public readonly surfaceKind?: SurfaceKind,
  ) {
    const where = surfaceIndex === undefined || surfaceKind === undefined
      ? ''
      : ` in ${surfaceKind} #${surfaceIndex}`
    super(`Malformed geometry${where}: ${field} is ${value}`)
    this.name = 'MalformedGeometryError'
  }
}
