/**
 * Drift Engine: Change Classifier
 *
 * Evaluates field changes against the security rule catalog and folds a
 * batch of changes into a single detection result.
 */

import type {
  Classification,
  ConfigValue,
  DetectionResult,
  DriftType,
  FieldChange,
  SecurityRule,
  Severity,
} from "./types.js";
import { DEFAULT_CLASSIFICATION, findMatchingRule, getSecurityRules } from "./rules.js";
import { diffConfig } from "./diff.js";
import { renderConfigValue } from "./value.js";

/** Number of changes listed in a narrative before truncating */
export const DEFAULT_NARRATIVE_LIMIT = 5;

export const NO_CHANGES_NARRATIVE = "No changes detected";

const SEVERITY_RANK: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

/** Highest priority first; one regression of an earlier type masks the rest */
export const DRIFT_TYPE_PRIORITY: readonly DriftType[] = [
  "encryption",
  "security_group",
  "iam_policy",
  "network_rule",
  "configuration_change",
];

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return compareSeverity(a, b) >= 0 ? a : b;
}

export function isSeverityAtLeast(severity: Severity, threshold: Severity): boolean {
  return compareSeverity(severity, threshold) >= 0;
}

export interface ClassifyOptions {
  /** Rule table override; defaults to the catalog entry for the resource type */
  rules?: readonly SecurityRule[];
  narrativeLimit?: number;
}

/** Severity and drift type for one change: first matching rule, else the default */
export function evaluateChange(
  resourceType: string,
  change: FieldChange,
  rules: readonly SecurityRule[] = getSecurityRules(resourceType),
): Classification {
  const rule = findMatchingRule(rules, change);
  if (!rule) return { ...DEFAULT_CLASSIFICATION };
  return { severity: rule.severity, driftType: rule.driftType, rule: rule.description };
}

/** Pick the batch drift type by fixed priority, not by frequency */
export function selectDriftType(types: Iterable<DriftType>): DriftType {
  const present = new Set(types);
  return DRIFT_TYPE_PRIORITY.find((type) => present.has(type)) ?? DEFAULT_CLASSIFICATION.driftType;
}

function oldOf(change: FieldChange): ConfigValue | undefined {
  return change.kind === "added" ? undefined : change.oldValue;
}

function newOf(change: FieldChange): ConfigValue | undefined {
  return change.kind === "removed" ? undefined : change.newValue;
}

export function describeChange(change: FieldChange): string {
  return `${change.path}: ${change.kind} (was: ${renderConfigValue(oldOf(change))}, now: ${renderConfigValue(newOf(change))})`;
}

/**
 * Render a batch of changes:
 *
 * ```
 * 2 configuration change(s) detected with critical severity:
 * - encryption.enabled: modified (was: true, now: false)
 * - tags.env: added (was: null, now: prod)
 * ```
 */
export function renderNarrative(
  changes: readonly FieldChange[],
  severity: Severity,
  limit = DEFAULT_NARRATIVE_LIMIT,
): string {
  if (changes.length === 0) return NO_CHANGES_NARRATIVE;

  const lines = [`${changes.length} configuration change(s) detected with ${severity} severity:`];
  for (const change of changes.slice(0, limit)) {
    lines.push(`- ${describeChange(change)}`);
  }
  if (changes.length > limit) {
    lines.push(`... and ${changes.length - limit} more changes`);
  }
  return lines.join("\n");
}

/**
 * Classify a non-empty batch of changes. Callers shortcut empty diffs to a
 * no-drift result themselves (see `detectDrift`).
 */
export function classifyChanges(
  resourceType: string,
  changes: FieldChange[],
  options: ClassifyOptions = {},
): DetectionResult {
  const rules = options.rules ?? getSecurityRules(resourceType);

  let severity: Severity = DEFAULT_CLASSIFICATION.severity;
  const driftTypes = new Set<DriftType>();

  for (const change of changes) {
    const verdict = evaluateChange(resourceType, change, rules);
    severity = maxSeverity(severity, verdict.severity);
    driftTypes.add(verdict.driftType);
  }

  return {
    hasDrift: true,
    severity,
    driftType: selectDriftType(driftTypes),
    narrative: renderNarrative(changes, severity, options.narrativeLimit),
    changes,
  };
}

export function noDriftResult(): DetectionResult {
  return { hasDrift: false, narrative: NO_CHANGES_NARRATIVE, changes: [] };
}

/** Diff two snapshots of one resource and classify whatever changed */
export function detectDrift(
  resourceType: string,
  baseline: ConfigValue,
  current: ConfigValue,
  options: ClassifyOptions = {},
): DetectionResult {
  const changes = diffConfig("", baseline, current);
  if (changes.length === 0) return noDriftResult();
  return classifyChanges(resourceType, changes, options);
}
