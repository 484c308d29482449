/** Export defaults applied when a caller leaves an option unset. */
export interface ExportDefaults {
  includeDimensions: boolean
  rotateElements: boolean
  logLevel: LogLevel
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

/** Environment keys read by `resolveExportDefaults`. */
export const ENV_KEYS = {
  includeDimensions: 'ROOMSCAN_INCLUDE_DIMENSIONS',
  rotateElements: 'ROOMSCAN_ROTATE_ELEMENTS',
  logLevel: 'ROOMSCAN_LOG_LEVEL',
} as const

/** Built-in values: dimensions on, plan view unrotated, info logging. */
export const DEFAULT_EXPORT_DEFAULTS: ExportDefaults = {
  includeDimensions: true,
  rotateElements: false,
  logLevel: 'info',
}

export type EnvRecord = Record<string, string | undefined>

function readEnvFlag(env: EnvRecord, key: string): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

function readLogLevel(env: EnvRecord, key: string): LogLevel | undefined {
  const val = env[key]?.toLowerCase()
  return val !== undefined && isLogLevel(val) ? val : undefined
}

/** Resolve defaults: env override > built-in default. Unrecognized values are ignored. */
export function resolveExportDefaults(env: EnvRecord): ExportDefaults {
  return {
    includeDimensions:
      readEnvFlag(env, ENV_KEYS.includeDimensions) ?? DEFAULT_EXPORT_DEFAULTS.includeDimensions,
    rotateElements:
      readEnvFlag(env, ENV_KEYS.rotateElements) ?? DEFAULT_EXPORT_DEFAULTS.rotateElements,
    logLevel: readLogLevel(env, ENV_KEYS.logLevel) ?? DEFAULT_EXPORT_DEFAULTS.logLevel,
  }
}

function processEnv(): EnvRecord {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

/** Defaults resolved from the process environment at load time. */
export const exportDefaults: ExportDefaults = resolveExportDefaults(processEnv())
