// Shared configuration: export defaults resolved from the environment.

export {
  exportDefaults,
  resolveExportDefaults,
  DEFAULT_EXPORT_DEFAULTS,
  ENV_KEYS,
  LOG_LEVELS,
  type ExportDefaults,
  type LogLevel,
  type EnvRecord,
} from './defaults'
