/**
 * Cloud Drift Audit
 *
 * Structural drift detection between configuration snapshots, security
 * classification of the resulting changes, and reconciliation of
 * IaC-declared resources against deployed ones.
 */

export * from "./drift/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export {
  DocumentError,
  parseConfigDocument,
  parseResourceCollection,
  loadConfigDocument,
  loadResourceCollection,
  readDocument,
  resourceDocumentSchema,
  resourceCollectionSchema,
  type ResourceDocument,
} from "./documents/loader.js";
export { createDriftTools } from "./tools/tools.js";
export { registerDriftCli, formatDetection, formatReconciliation, type DriftCliContext } from "./cli/program.js";
export { VERSION } from "./version.js";
