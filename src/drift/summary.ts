/**
 * Drift Engine: Summaries
 *
 * Roll-ups of detection results and reconciliation verdicts by severity,
 * drift type and category.
 */

import type {
  DetectionResult,
  DetectionSummary,
  DriftCategory,
  ReconciliationSummary,
  ReconciliationVerdict,
  VerdictSeverity,
} from "./types.js";

const VERDICT_SEVERITY_ORDER: readonly VerdictSeverity[] = ["info", "low", "medium", "high", "critical"];

export function compareVerdictSeverity(a: VerdictSeverity, b: VerdictSeverity): number {
  return VERDICT_SEVERITY_ORDER.indexOf(a) - VERDICT_SEVERITY_ORDER.indexOf(b);
}

export function summarizeVerdicts(verdicts: readonly ReconciliationVerdict[]): ReconciliationSummary {
  const byCategory: Record<DriftCategory, number> = { missing: 0, shadow: 0, modified: 0, compliant: 0 };
  const bySeverity: Record<VerdictSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  let worstSeverity: VerdictSeverity = "info";

  for (const verdict of verdicts) {
    byCategory[verdict.category]++;
    bySeverity[verdict.severity]++;
    if (compareVerdictSeverity(verdict.severity, worstSeverity) > 0) {
      worstSeverity = verdict.severity;
    }
  }

  return { totalResources: verdicts.length, byCategory, bySeverity, worstSeverity };
}

export function summarizeDetections(results: readonly DetectionResult[]): DetectionSummary {
  const summary: DetectionSummary = {
    totalResults: results.length,
    drifted: 0,
    bySeverity: { critical: 0, high: 0, medium: 0, low: 0 },
    byDriftType: {
      encryption: 0,
      security_group: 0,
      iam_policy: 0,
      network_rule: 0,
      configuration_change: 0,
    },
  };

  for (const result of results) {
    if (!result.hasDrift) continue;
    summary.drifted++;
    summary.bySeverity[result.severity]++;
    summary.byDriftType[result.driftType]++;
  }

  return summary;
}

/** Verdicts that need attention, most severe first; ties keep their input order */
export function actionableVerdicts(verdicts: readonly ReconciliationVerdict[]): ReconciliationVerdict[] {
  return verdicts
    .filter((verdict) => verdict.category !== "compliant")
    .sort((a, b) => compareVerdictSeverity(b.severity, a.severity));
}
