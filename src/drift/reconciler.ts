/**
 * Drift Engine: IaC Reconciliation
 *
 * Reconciles declared resources against deployed resources by address.
 * Every address in the union of both sides receives exactly one verdict:
 * missing, shadow, modified or compliant.
 */

import type {
  ActualResource,
  DeclaredResource,
  FieldChange,
  ManagedResource,
  ReconciliationVerdict,
  ResourceRef,
  Severity,
} from "./types.js";
import { diffConfig } from "./diff.js";
import { computedFieldExclusion } from "./computed-fields.js";
import { normalizeResourceType } from "./rules.js";

/** Modified resources with more changes than this are high severity */
export const DEFAULT_MODIFIED_HIGH_THRESHOLD = 5;

export const MISSING_SEVERITY: Severity = "high";
export const SHADOW_SEVERITY: Severity = "medium";

export const BASE_RECOMMENDATIONS: readonly string[] = [
  "Review the configuration differences",
  "Update IaC definition to match actual state, or",
  "Re-apply IaC to correct the drift",
];

export const ENCRYPTION_CALLOUT = "CRITICAL: Encryption configuration has changed";
export const PUBLIC_ACCESS_CALLOUT = "CRITICAL: Public access configuration has changed";

export interface SeverityMarkers {
  critical: readonly string[];
  high: readonly string[];
}

export const COMMON_SEVERITY_MARKERS: SeverityMarkers = {
  critical: ["encryption", "public_access", "security_group", "iam_policy", "acl"],
  high: ["password", "secret", "key", "network", "firewall"],
};

const RESOURCE_SEVERITY_MARKERS: Readonly<Record<string, SeverityMarkers>> = {
  rds_instance: {
    critical: [...COMMON_SEVERITY_MARKERS.critical, "publicly_accessible"],
    high: [...COMMON_SEVERITY_MARKERS.high, "deletion_protection"],
  },
  ec2_instance: {
    critical: COMMON_SEVERITY_MARKERS.critical,
    high: [...COMMON_SEVERITY_MARKERS.high, "associate_public_ip"],
  },
};

export function getSeverityMarkers(resourceType: string): SeverityMarkers {
  return RESOURCE_SEVERITY_MARKERS[normalizeResourceType(resourceType)] ?? COMMON_SEVERITY_MARKERS;
}

export interface ReconcileOptions {
  /** Field names treated as provider-assigned in addition to the built-in set */
  extraComputedFields?: readonly string[];
  modifiedHighThreshold?: number;
}

/**
 * Severity for a modified resource. Any critical marker wins over any high
 * marker regardless of change order; without markers, the change count
 * decides.
 */
export function calculateModifiedSeverity(
  resourceType: string,
  changes: readonly FieldChange[],
  threshold = DEFAULT_MODIFIED_HIGH_THRESHOLD,
): Severity {
  const markers = getSeverityMarkers(resourceType);
  const paths = changes.map((change) => change.path.toLowerCase());

  if (paths.some((path) => markers.critical.some((marker) => path.includes(marker)))) {
    return "critical";
  }
  if (paths.some((path) => markers.high.some((marker) => path.includes(marker)))) {
    return "high";
  }
  return changes.length > threshold ? "high" : "medium";
}

export function buildRecommendation(changes: readonly FieldChange[]): string {
  if (changes.length === 0) return "No action required";

  const paths = changes.map((change) => change.path.toLowerCase());
  const recommendations = [...BASE_RECOMMENDATIONS];
  if (paths.some((path) => path.includes("encryption"))) {
    recommendations.push(ENCRYPTION_CALLOUT);
  }
  if (paths.some((path) => path.includes("public") && path.includes("access"))) {
    recommendations.push(PUBLIC_ACCESS_CALLOUT);
  }
  return recommendations.join("; ");
}

export function toResourceRef(resource: ManagedResource): ResourceRef {
  const ref: ResourceRef = {
    address: resource.address,
    resourceType: resource.resourceType,
    provider: resource.provider,
  };
  if (resource.name !== undefined) ref.name = resource.name;
  if (resource.id !== undefined) ref.id = resource.id;
  return ref;
}

/** Address-keyed lookup; a repeated address keeps its first position and last value */
function indexByAddress<T extends ManagedResource>(resources: Iterable<T>): Map<string, T> {
  const map = new Map<string, T>();
  for (const resource of resources) {
    map.set(resource.address, resource);
  }
  return map;
}

export function missingVerdict(declared: DeclaredResource): ReconciliationVerdict {
  return {
    category: "missing",
    address: declared.address,
    declaredResourceRef: toResourceRef(declared),
    severity: MISSING_SEVERITY,
    changeCount: 0,
    narrative: `Resource defined in IaC but not deployed: ${declared.address}`,
    recommendation: "Deploy this resource or remove it from IaC definition",
    changes: [],
  };
}

export function shadowVerdict(actual: ActualResource): ReconciliationVerdict {
  return {
    category: "shadow",
    address: actual.address,
    actualResourceRef: toResourceRef(actual),
    severity: SHADOW_SEVERITY,
    changeCount: 0,
    narrative: `Resource deployed but not defined in IaC: ${actual.address}`,
    recommendation: "Add this resource to IaC definition or remove from infrastructure",
    changes: [],
  };
}

/** Compare one declared/deployed pair sharing an address */
export function compareResourcePair(
  declared: DeclaredResource,
  actual: ActualResource,
  options: ReconcileOptions = {},
): ReconciliationVerdict {
  const changes = diffConfig("", declared.configuration, actual.configuration, {
    excludeAdded: computedFieldExclusion(options.extraComputedFields),
  });
  const refs = {
    declaredResourceRef: toResourceRef(declared),
    actualResourceRef: toResourceRef(actual),
  };

  if (changes.length === 0) {
    return {
      category: "compliant",
      address: declared.address,
      ...refs,
      severity: "info",
      changeCount: 0,
      narrative: "Resource configuration matches IaC definition",
      recommendation: "No action required",
      changes: [],
    };
  }

  return {
    category: "modified",
    address: declared.address,
    ...refs,
    severity: calculateModifiedSeverity(declared.resourceType, changes, options.modifiedHighThreshold),
    changeCount: changes.length,
    narrative: `Configuration drift detected for ${declared.address}`,
    recommendation: buildRecommendation(changes),
    changes,
  };
}

/**
 * Reconcile declared against actual resources. Verdicts come out grouped:
 * missing (declared order), shadow (actual order), then addresses present
 * on both sides (declared order).
 */
export function reconcileResources(
  declared: Iterable<DeclaredResource>,
  actual: Iterable<ActualResource>,
  options: ReconcileOptions = {},
): ReconciliationVerdict[] {
  const declaredByAddress = indexByAddress(declared);
  const actualByAddress = indexByAddress(actual);
  const verdicts: ReconciliationVerdict[] = [];

  for (const [address, resource] of declaredByAddress) {
    if (!actualByAddress.has(address)) verdicts.push(missingVerdict(resource));
  }

  for (const [address, resource] of actualByAddress) {
    if (!declaredByAddress.has(address)) verdicts.push(shadowVerdict(resource));
  }

  for (const [address, resource] of declaredByAddress) {
    const deployed = actualByAddress.get(address);
    if (deployed) verdicts.push(compareResourcePair(resource, deployed, options));
  }

  return verdicts;
}
