/**
 * Scale-to-fit transform for interactive floor-plan viewers.
 *
 * Maps model meters into a viewport of the given size, centered, keeping the
 * aspect ratio, with a fixed padding on every side.
 */

import type { Rect } from '@roomscan/types'

export const METERS_TO_POINTS = 100
export const VIEWPORT_PADDING = 40

export interface ViewportSize {
  width: number
  height: number
}

export interface ViewportFit {
  /** Viewport points per meter. */
  scale: number
  offsetX: number
  offsetY: number
}

export interface FitOptions {
  padding?: number
  metersToPoints?: number
}

/** Returns undefined when the viewport or the bounding box has no area. */
export function fitToViewport(
  boundingBox: Rect,
  viewport: ViewportSize,
  options: FitOptions = {},
): ViewportFit | undefined {
  const padding = options.padding ?? VIEWPORT_PADDING
  const unit = options.metersToPoints ?? METERS_TO_POINTS

  const availableWidth = viewport.width - padding * 2
  const availableHeight = viewport.height - padding * 2
  if (!(availableWidth > 0 && availableHeight > 0)) return undefined
  if (!(boundingBox.width > 0 && boundingBox.height > 0)) return undefined

  const scale = Math.min(
    availableWidth / (boundingBox.width * unit),
    availableHeight / (boundingBox.height * unit),
  )
  const scaledWidth = boundingBox.width * unit * scale
  const scaledHeight = boundingBox.height * unit * scale

  return {
    scale: scale * unit,
    offsetX: padding + (availableWidth - scaledWidth) / 2 - boundingBox.x * unit * scale,
    offsetY: padding + (availableHeight - scaledHeight) / 2 - boundingBox.y * unit * scale,
  }
}

/** Map a model rect (meters) into viewport coordinates. */
export function projectToViewport(rect: Rect, fit: ViewportFit): Rect {
  return {
    x: rect.x * fit.scale + fit.offsetX,
    y: rect.y * fit.scale + fit.offsetY,
    width: rect.width * fit.scale,
    height: rect.height * fit.scale,
  }
}
