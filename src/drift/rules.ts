/**
 * Drift Engine: Security Rule Catalog
 *
 * Declarative rule tables keyed by resource type. Every table is evaluated
 * by the classifier with the same first-match iteration, so the order of
 * rows is significant: earlier rows win.
 */

import type { Classification, FieldChange, SecurityRule } from "./types.js";
import {
  isBackupDisabled,
  isEncryptionDisabled,
  isFirewallOpened,
  isLoggingDisabled,
  isMonitoringDisabled,
  isPermissionEscalation,
  isPolicyChanged,
  isProtectionDisabled,
  isPublicAccessEnabled,
  isSecurityGroupOpened,
  isStoragePublicAccessEnabled,
  isValueChanged,
} from "./predicates.js";

/** Classification for changes no rule claims */
export const DEFAULT_CLASSIFICATION: Readonly<Classification> = {
  severity: "low",
  driftType: "configuration_change",
};

// ── Common Rules ────────────────────────────────────────────────

export const COMMON_SECURITY_RULES: readonly SecurityRule[] = [
  // Critical
  {
    fieldPattern: "encryption",
    severity: "critical",
    driftType: "encryption",
    predicate: isEncryptionDisabled,
    description: "Encryption was disabled or removed",
  },
  {
    fieldPattern: "acl",
    severity: "critical",
    driftType: "security_group",
    predicate: isStoragePublicAccessEnabled,
    description: "Public access enabled through ACL",
  },
  {
    fieldPattern: "security_group",
    severity: "critical",
    driftType: "security_group",
    predicate: isSecurityGroupOpened,
    description: "Security group open to the world",
  },
  {
    fieldPattern: "network",
    severity: "critical",
    driftType: "network_rule",
    predicate: isFirewallOpened,
    description: "Firewall rules allow unrestricted access",
  },
  // High
  {
    fieldPattern: "iam",
    severity: "high",
    driftType: "iam_policy",
    predicate: isPermissionEscalation,
    description: "IAM policy changed - potential permission escalation",
  },
  {
    fieldPattern: "policy",
    severity: "high",
    driftType: "iam_policy",
    predicate: isPolicyChanged,
    description: "Resource policy modified",
  },
  {
    fieldPattern: "backup",
    severity: "high",
    driftType: "configuration_change",
    predicate: isBackupDisabled,
    description: "Backup configuration was disabled",
  },
  {
    fieldPattern: "logging",
    severity: "high",
    driftType: "configuration_change",
    predicate: isLoggingDisabled,
    description: "Access logging was disabled",
  },
  // Medium
  {
    fieldPattern: "versioning",
    severity: "medium",
    driftType: "configuration_change",
    predicate: isValueChanged,
    description: "Versioning configuration changed",
  },
  {
    fieldPattern: "ssh",
    severity: "medium",
    driftType: "security_group",
    predicate: isValueChanged,
    description: "SSH configuration changed",
  },
  {
    fieldPattern: "monitoring",
    severity: "medium",
    driftType: "configuration_change",
    predicate: isMonitoringDisabled,
    description: "Monitoring was disabled",
  },
];

// ── Resource-Specific Rules ─────────────────────────────────────
// Appended after the common rows, so they only claim changes the common
// rules leave unmatched.

const STORAGE_RULES: readonly SecurityRule[] = [
  {
    fieldPattern: "block_public",
    severity: "critical",
    driftType: "security_group",
    predicate: isProtectionDisabled,
    description: "Public access block was turned off",
  },
  {
    fieldPattern: "mfa_delete",
    severity: "high",
    driftType: "configuration_change",
    predicate: isProtectionDisabled,
    description: "MFA delete protection was turned off",
  },
];

const COMPUTE_RULES: readonly SecurityRule[] = [
  {
    fieldPattern: "associate_public_ip",
    severity: "high",
    driftType: "network_rule",
    predicate: isPublicAccessEnabled,
    description: "Instance now receives a public IP address",
  },
  {
    fieldPattern: "ingress",
    severity: "critical",
    driftType: "network_rule",
    predicate: isFirewallOpened,
    description: "Ingress rule allows unrestricted access",
  },
];

const DATABASE_RULES: readonly SecurityRule[] = [
  {
    fieldPattern: "publicly_accessible",
    severity: "critical",
    driftType: "network_rule",
    predicate: isPublicAccessEnabled,
    description: "Database endpoint became publicly accessible",
  },
  {
    fieldPattern: "deletion_protection",
    severity: "medium",
    driftType: "configuration_change",
    predicate: isProtectionDisabled,
    description: "Deletion protection was turned off",
  },
];

export const RESOURCE_SECURITY_RULES: Readonly<Record<string, readonly SecurityRule[]>> = {
  s3_bucket: [...COMMON_SECURITY_RULES, ...STORAGE_RULES],
  gcs_bucket: [...COMMON_SECURITY_RULES, ...STORAGE_RULES],
  azure_storage: [...COMMON_SECURITY_RULES, ...STORAGE_RULES],
  ec2_instance: [...COMMON_SECURITY_RULES, ...COMPUTE_RULES],
  gce_instance: [...COMMON_SECURITY_RULES, ...COMPUTE_RULES],
  azure_vm: [...COMMON_SECURITY_RULES, ...COMPUTE_RULES],
  rds_instance: [...COMMON_SECURITY_RULES, ...DATABASE_RULES],
};

/** Provider-native type names mapped onto catalog keys */
const RESOURCE_TYPE_ALIASES: Readonly<Record<string, string>> = {
  aws_s3_bucket: "s3_bucket",
  google_storage_bucket: "gcs_bucket",
  azurerm_storage_account: "azure_storage",
  aws_instance: "ec2_instance",
  google_compute_instance: "gce_instance",
  azurerm_virtual_machine: "azure_vm",
  azurerm_linux_virtual_machine: "azure_vm",
  azurerm_windows_virtual_machine: "azure_vm",
  aws_db_instance: "rds_instance",
};

/** `S3-Bucket`, `s3_bucket` and `aws_s3_bucket` all resolve to `s3_bucket` */
export function normalizeResourceType(resourceType: string): string {
  const key = resourceType.trim().toLowerCase().replace(/-/g, "_");
  return RESOURCE_TYPE_ALIASES[key] ?? key;
}

/** Rule table for a resource type, falling back to the common rules */
export function getSecurityRules(resourceType: string): readonly SecurityRule[] {
  return RESOURCE_SECURITY_RULES[normalizeResourceType(resourceType)] ?? COMMON_SECURITY_RULES;
}

/** Resource types with a dedicated rule table */
export function getCatalogResourceTypes(): string[] {
  return Object.keys(RESOURCE_SECURITY_RULES);
}

export function ruleMatches(rule: SecurityRule, change: FieldChange): boolean {
  return change.path.toLowerCase().includes(rule.fieldPattern.toLowerCase()) && rule.predicate(change);
}

/** First rule that claims the change, if any */
export function findMatchingRule(
  rules: readonly SecurityRule[],
  change: FieldChange,
): SecurityRule | undefined {
  return rules.find((rule) => ruleMatches(rule, change));
}
