export { fromJson, toJson, configValuesEqual, renderConfigValue, NULL_VALUE } from "./value.js";
export { diffConfig, joinPath, indexPath, type DiffOptions } from "./diff.js";
export { COMPUTED_FIELDS, isComputedField, computedFieldExclusion } from "./computed-fields.js";
export {
  DEFAULT_CLASSIFICATION,
  COMMON_SECURITY_RULES,
  RESOURCE_SECURITY_RULES,
  normalizeResourceType,
  getSecurityRules,
  getCatalogResourceTypes,
  ruleMatches,
  findMatchingRule,
} from "./rules.js";
export * from "./predicates.js";
export {
  DEFAULT_NARRATIVE_LIMIT,
  DRIFT_TYPE_PRIORITY,
  compareSeverity,
  maxSeverity,
  isSeverityAtLeast,
  evaluateChange,
  selectDriftType,
  describeChange,
  renderNarrative,
  classifyChanges,
  detectDrift,
  noDriftResult,
  type ClassifyOptions,
} from "./classifier.js";
export {
  reconcileResources,
  compareResourcePair,
  calculateModifiedSeverity,
  buildRecommendation,
  getSeverityMarkers,
  COMMON_SEVERITY_MARKERS,
  type ReconcileOptions,
  type SeverityMarkers,
} from "./reconciler.js";
export { summarizeVerdicts, summarizeDetections, actionableVerdicts, compareVerdictSeverity } from "./summary.js";
export { serializeFieldChange, serializeDetectionResult, serializeVerdict, serializeRule } from "./serialize.js";
export { DriftEngine, createDriftEngine, type DriftEngineOptions, type ReconciliationReport, type RuleListing } from "./engine.js";
export type * from "./types.js";
