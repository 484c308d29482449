/**
 * Number and text formatting shared by the encoders.
 */

/**
 * Plain decimal notation with at most `maxFractionDigits` digits, trailing
 * zeros dropped and no negative zero. Non-finite values print as-is.
 */
export function formatNumber(value: number, maxFractionDigits: number): string {
  if (!Number.isFinite(value)) return String(value)
  const rounded = Number(value.toFixed(maxFractionDigits))
  return String(rounded + 0)
}

/** Two-decimal meter reading, e.g. `formatMeters(3.456, ' m')` → "3.46 m". */
export function formatMeters(value: number, suffix: string): string {
  return `${value.toFixed(2)}${suffix}`
}

export function radiansToDegrees(radians: number): number {
  return (radians * 180) / Math.PI
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
}

// C0 controls other than tab, LF and CR, the two non-characters, and unpaired surrogates
const XML_FORBIDDEN =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g

/** Escape markup characters; characters XML 1.0 cannot carry become U+FFFD. */
export function escapeXml(text: string): string {
  return text
    .replace(XML_FORBIDDEN, '\uFFFD')
    .replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch)
}

/** DXF values occupy exactly one line. */
export function singleLine(text: string): string {
  return text.replace(/\r\n|\r|\n/g, ' ')
}
