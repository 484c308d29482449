export type ExportFormat = 'svg' | 'dxf'

export const EXPORT_FORMATS: readonly ExportFormat[] = ['svg', 'dxf']

export interface ExportFormatInfo {
  format: ExportFormat
  displayName: string
  fileExtension: string
  mimeType: string
}
