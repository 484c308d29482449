import type { ZodError } from 'zod'

export type FieldErrors = Record<string, string[] | undefined>

/** Untrusted surface-record input failed schema validation. */
export class SurfaceRecordValidationError extends Error {
  public readonly fields: FieldErrors

  constructor(
    public readonly issues: ZodError['issues'],
  ) {
    super(`Invalid surface records: ${summarizeIssues(issues)}`)
    this.name = 'SurfaceRecordValidationError'
    this.fields = collectFieldErrors(issues)
  }
}

/** A persisted floor-plan document could not be read back. */
export class FloorPlanFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodError['issues'] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${summarizeIssues(issues)}` : message)
    this.name = 'FloorPlanFormatError'
  }
}

function issuePath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.join('.') : '(root)'
}

function summarizeIssues(issues: ZodError['issues']): string {
  const first = issues[0]
  if (!first) return 'no details'
  const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : ''
  return `${issuePath(first.path)}: ${first.message}${more}`
}

function collectFieldErrors(issues: ZodError['issues']): FieldErrors {
  const fields: FieldErrors = {}
  for (const issue of issues) {
    const key = issuePath(issue.path)
    const existing = fields[key]
    if (existing) existing.push(issue.message)
    else fields[key] = [issue.message]
  }
  return fields
}
