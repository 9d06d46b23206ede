/**
 * Drift Engine: Type Definitions
 *
 * Configuration values, field-level changes, security classification and
 * IaC reconciliation verdicts.
 */

// ── Configuration Values ────────────────────────────────────────

export type ConfigValue =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "sequence"; items: readonly ConfigValue[] }
  | { kind: "mapping"; entries: ReadonlyMap<string, ConfigValue> };

export type ConfigValueKind = ConfigValue["kind"];

/** Plain JSON shape used on the serialization side. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

// ── Field Changes ───────────────────────────────────────────────

export type ChangeKind = "added" | "removed" | "modified";

export type FieldChange =
  | { kind: "added"; path: string; newValue: ConfigValue }
  | { kind: "removed"; path: string; oldValue: ConfigValue }
  | { kind: "modified"; path: string; oldValue: ConfigValue; newValue: ConfigValue };

export interface SerializedFieldChange {
  path: string;
  kind: ChangeKind;
  oldValue: JsonValue;
  newValue: JsonValue;
}

// ── Classification ──────────────────────────────────────────────

export type Severity = "critical" | "high" | "medium" | "low";

/** Severity of a reconciliation verdict; compliant resources report `info`. */
export type VerdictSeverity = Severity | "info";

export type DriftType =
  | "encryption"
  | "security_group"
  | "iam_policy"
  | "network_rule"
  | "configuration_change";

export type ChangePredicate = (change: FieldChange) => boolean;

export interface SecurityRule {
  /** Case-insensitive substring matched against the change path */
  fieldPattern: string;
  severity: Severity;
  driftType: DriftType;
  predicate: ChangePredicate;
  description: string;
}

export type SerializedRule = Omit<SecurityRule, "predicate">;

export interface Classification {
  severity: Severity;
  driftType: DriftType;
  /** Description of the rule that matched, absent for the default */
  rule?: string;
}

export type DetectionResult =
  | { hasDrift: false; narrative: string; changes: [] }
  | {
      hasDrift: true;
      driftType: DriftType;
      severity: Severity;
      narrative: string;
      changes: FieldChange[];
    };

export interface SerializedDetectionResult {
  hasDrift: boolean;
  driftType: DriftType | null;
  severity: Severity | null;
  narrative: string;
  changes: SerializedFieldChange[];
}

// ── IaC Reconciliation ──────────────────────────────────────────

export type DriftCategory = "missing" | "shadow" | "modified" | "compliant";

export interface ManagedResource {
  /** Stable join key, e.g. `module.vpc.aws_instance.web` */
  address: string;
  resourceType: string;
  provider: string;
  configuration: ConfigValue;
  name?: string;
  id?: string;
}

export type DeclaredResource = ManagedResource;
export type ActualResource = ManagedResource;

export interface ResourceRef {
  address: string;
  resourceType: string;
  provider: string;
  name?: string;
  id?: string;
}

export interface ReconciliationVerdict {
  category: DriftCategory;
  address: string;
  declaredResourceRef?: ResourceRef;
  actualResourceRef?: ResourceRef;
  severity: VerdictSeverity;
  changeCount: number;
  narrative: string;
  recommendation: string;
  changes: FieldChange[];
}

export interface SerializedVerdict {
  category: DriftCategory;
  address: string;
  declaredResourceRef: ResourceRef | null;
  actualResourceRef: ResourceRef | null;
  severity: VerdictSeverity;
  changeCount: number;
  narrative: string;
  recommendation: string;
  changes: SerializedFieldChange[];
}

// ── Summaries ───────────────────────────────────────────────────

export interface ReconciliationSummary {
  totalResources: number;
  byCategory: Record<DriftCategory, number>;
  bySeverity: Record<VerdictSeverity, number>;
  /** Highest severity among non-compliant verdicts */
  worstSeverity: VerdictSeverity;
}

export interface DetectionSummary {
  totalResults: number;
  drifted: number;
  bySeverity: Record<Severity, number>;
  byDriftType: Record<DriftType, number>;
}
