// Export dispatch
export { exportFloorPlan, exportFormatInfo, type ExportOptions } from './export'

// SVG
export { encodeSvg, SVG_SCALE, SVG_PADDING, type SvgOptions } from './svg'

// DXF
export {
  encodeDxf, layerFor,
  DXF_LAYERS, DXF_VERSION, DXF_UNITS_METERS,
  LABEL_TEXT_HEIGHT, DIMENSION_TEXT_HEIGHT, DIMENSION_OFFSET,
  type DxfOptions, type DxfLayer, type DxfLayerName,
} from './dxf'

// Building blocks
export { DocumentWriter } from './writer'
export { formatNumber, formatMeters, escapeXml, singleLine, radiansToDegrees } from './format'
export { partitionByKind, DRAW_ORDER, type ElementKindName, type ElementsByKind } from './partition'
