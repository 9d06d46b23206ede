export {
  driftAuditConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
  validateDriftAuditConfig,
  getDefaultDriftAuditConfig,
  type DriftAuditConfig,
  type DriftAuditConfigInput,
} from "./schema.js";
export { ConfigError, formatZodIssues, loadDriftAuditConfig, CONFIG_PATH_ENV, LOG_LEVEL_ENV } from "./io.js";
