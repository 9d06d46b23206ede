/**
 * Drift Engine: Serialization
 *
 * JSON-ready shapes of detection results and verdicts. Field names and the
 * severity / drift type / category strings are consumed downstream and must
 * stay stable.
 */

import type {
  DetectionResult,
  FieldChange,
  ReconciliationVerdict,
  SecurityRule,
  SerializedDetectionResult,
  SerializedFieldChange,
  SerializedRule,
  SerializedVerdict,
} from "./types.js";
import { toJson } from "./value.js";

export function serializeFieldChange(change: FieldChange): SerializedFieldChange {
  switch (change.kind) {
    case "added":
      return { path: change.path, kind: change.kind, oldValue: null, newValue: toJson(change.newValue) };
    case "removed":
      return { path: change.path, kind: change.kind, oldValue: toJson(change.oldValue), newValue: null };
    case "modified":
      return {
        path: change.path,
        kind: change.kind,
        oldValue: toJson(change.oldValue),
        newValue: toJson(change.newValue),
      };
  }
}

export function serializeDetectionResult(result: DetectionResult): SerializedDetectionResult {
  if (!result.hasDrift) {
    return { hasDrift: false, driftType: null, severity: null, narrative: result.narrative, changes: [] };
  }
  return {
    hasDrift: true,
    driftType: result.driftType,
    severity: result.severity,
    narrative: result.narrative,
    changes: result.changes.map(serializeFieldChange),
  };
}

export function serializeVerdict(verdict: ReconciliationVerdict): SerializedVerdict {
  return {
    category: verdict.category,
    address: verdict.address,
    declaredResourceRef: verdict.declaredResourceRef ?? null,
    actualResourceRef: verdict.actualResourceRef ?? null,
    severity: verdict.severity,
    changeCount: verdict.changeCount,
    narrative: verdict.narrative,
    recommendation: verdict.recommendation,
    changes: verdict.changes.map(serializeFieldChange),
  };
}

/** Rule rows without their predicate, for listings */
export function serializeRule(rule: SecurityRule): SerializedRule {
  return {
    fieldPattern: rule.fieldPattern,
    severity: rule.severity,
    driftType: rule.driftType,
    description: rule.description,
  };
}
