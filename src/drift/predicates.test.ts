import { describe, expect, it } from "vitest";
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
import { fromJson } from "./value.js";
import type { FieldChange } from "./types.js";

/* ---------- helpers ---------- */

function modified(path: string, oldValue: unknown, newValue: unknown): FieldChange {
  return { kind: "modified", path, oldValue: fromJson(oldValue), newValue: fromJson(newValue) };
}

function added(path: string, newValue: unknown): FieldChange {
  return { kind: "added", path, newValue: fromJson(newValue) };
}

function removed(path: string, oldValue: unknown): FieldChange {
  return { kind: "removed", path, oldValue: fromJson(oldValue) };
}

describe("isEncryptionDisabled", () => {
  it("detects a boolean switched off or removed", () => {
    expect(isEncryptionDisabled(modified("encryption.enabled", true, false))).toBe(true);
    expect(isEncryptionDisabled(removed("encryption.enabled", true))).toBe(true);
  });

  it("detects string-encoded downgrades case-insensitively", () => {
    expect(isEncryptionDisabled(modified("encryption", "Enabled", "DISABLED"))).toBe(true);
    expect(isEncryptionDisabled(modified("sse_algorithm", "AES256", "none"))).toBe(true);
    expect(isEncryptionDisabled(modified("encryption_mode", "encrypted", "none"))).toBe(true);
  });

  it("ignores upgrades, algorithm swaps and additions", () => {
    expect(isEncryptionDisabled(modified("encryption.enabled", false, true))).toBe(false);
    expect(isEncryptionDisabled(modified("sse_algorithm", "AES256", "aws:kms"))).toBe(false);
    expect(isEncryptionDisabled(added("encryption.enabled", false))).toBe(false);
    expect(isEncryptionDisabled(removed("encryption.enabled", false))).toBe(false);
  });
});

describe("isPublicAccessEnabled", () => {
  it("detects a boolean turned on and public strings", () => {
    expect(isPublicAccessEnabled(modified("publicly_accessible", false, true))).toBe(true);
    expect(isPublicAccessEnabled(added("publicly_accessible", true))).toBe(true);
    expect(isPublicAccessEnabled(modified("acl", "private", "Public-Read"))).toBe(true);
  });

  it("ignores removals and private values", () => {
    expect(isPublicAccessEnabled(removed("acl", "public-read"))).toBe(false);
    expect(isPublicAccessEnabled(modified("acl", "public-read", "private"))).toBe(false);
  });
});

describe("isStoragePublicAccessEnabled", () => {
  it("requires an ACL path for public values", () => {
    expect(isStoragePublicAccessEnabled(modified("acl", "private", "public-read"))).toBe(true);
    expect(isStoragePublicAccessEnabled(modified("grant", "private", "public-read"))).toBe(false);
  });

  it("detects the public access block switched off", () => {
    expect(isStoragePublicAccessEnabled(modified("blockPublicAcls", true, false))).toBe(true);
    expect(isStoragePublicAccessEnabled(modified("block_public_acls", true, false))).toBe(false);
  });
});

describe("isSecurityGroupOpened", () => {
  it("detects open CIDRs in strings and sequences", () => {
    expect(isSecurityGroupOpened(added("cidr", "0.0.0.0/0"))).toBe(true);
    expect(isSecurityGroupOpened(modified("cidrs", ["10.0.0.0/8"], ["10.0.0.0/8", "::/0"]))).toBe(true);
  });

  it("ignores private ranges and removals", () => {
    expect(isSecurityGroupOpened(added("cidr", "10.0.0.0/8"))).toBe(false);
    expect(isSecurityGroupOpened(removed("cidr", "0.0.0.0/0"))).toBe(false);
  });
});

describe("isFirewallOpened", () => {
  it("also accepts catch-all tokens", () => {
    expect(isFirewallOpened(modified("network.source", "10.0.0.0/8", "Any"))).toBe(true);
    expect(isFirewallOpened(added("network.source", "0.0.0.0/0"))).toBe(true);
    expect(isFirewallOpened(added("network.source", "10.1.0.0/16"))).toBe(false);
  });
});

describe("isPermissionEscalation", () => {
  it("detects wildcards and admin grants", () => {
    expect(isPermissionEscalation(modified("iam.action", "s3:GetObject", "s3:*"))).toBe(true);
    expect(isPermissionEscalation(added("iam.role", "AdministratorAccess"))).toBe(true);
    expect(isPermissionEscalation(modified("iam.access", "read", "FullAccess"))).toBe(true);
    expect(isPermissionEscalation(modified("iam.action", "s3:*", "s3:GetObject"))).toBe(false);
  });
});

describe("isPolicyChanged", () => {
  it("matches modified or removed policies only", () => {
    expect(isPolicyChanged(modified("bucket_policy", "a", "b"))).toBe(true);
    expect(isPolicyChanged(removed("bucket_policy", "a"))).toBe(true);
    expect(isPolicyChanged(added("bucket_policy", "a"))).toBe(false);
    expect(isPolicyChanged(modified("policy_free", "a", "b"))).toBe(true);
    expect(isPolicyChanged(modified("rule", "a", "b"))).toBe(false);
  });
});

describe("setting-disabled predicates", () => {
  it("detect switched-off booleans under the matching path", () => {
    expect(isBackupDisabled(modified("backup.enabled", true, false))).toBe(true);
    expect(isLoggingDisabled(modified("access_log.enabled", true, false))).toBe(true);
    expect(isMonitoringDisabled(modified("monitoring", true, false))).toBe(true);
  });

  it("detect disabled strings", () => {
    expect(isBackupDisabled(modified("backup_mode", "daily", "none"))).toBe(true);
    expect(isLoggingDisabled(modified("logging.status", "enabled", "Disabled"))).toBe(true);
    expect(isMonitoringDisabled(added("monitoring.mode", "false"))).toBe(true);
  });

  it("ignore other paths and enabling changes", () => {
    expect(isBackupDisabled(modified("retention.enabled", true, false))).toBe(false);
    expect(isLoggingDisabled(modified("logging.enabled", false, true))).toBe(false);
  });
});

describe("isProtectionDisabled / isValueChanged", () => {
  it("isProtectionDisabled needs a true to false switch", () => {
    expect(isProtectionDisabled(modified("deletion_protection", true, false))).toBe(true);
    expect(isProtectionDisabled(removed("deletion_protection", true))).toBe(false);
  });

  it("isValueChanged accepts modified and removed", () => {
    expect(isValueChanged(modified("versioning", "a", "b"))).toBe(true);
    expect(isValueChanged(removed("versioning", "a"))).toBe(true);
    expect(isValueChanged(added("versioning", "a"))).toBe(false);
  });
});
