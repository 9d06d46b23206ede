/**
 * Drift Engine: Change Predicates
 *
 * Security conditions evaluated against a single field change. Each accepts
 * both boolean and string-encoded representations of the same setting.
 */

import type { ConfigValue, FieldChange } from "./types.js";

const OPEN_CIDRS = ["0.0.0.0/0", "::/0"];
const CATCH_ALL_TOKENS = ["any", "all"];
const DISABLED_STRINGS = new Set(["disabled", "none", "false"]);

function oldValueOf(change: FieldChange): ConfigValue | undefined {
  return change.kind === "added" ? undefined : change.oldValue;
}

function newValueOf(change: FieldChange): ConfigValue | undefined {
  return change.kind === "removed" ? undefined : change.newValue;
}

function boolOf(value: ConfigValue | undefined): boolean | undefined {
  return value?.kind === "bool" ? value.value : undefined;
}

function stringOf(value: ConfigValue | undefined): string | undefined {
  return value?.kind === "string" ? value.value : undefined;
}

/** The value itself when it is a string, or every string element of a sequence */
function stringsOf(value: ConfigValue | undefined): string[] {
  if (value?.kind === "string") return [value.value];
  if (value?.kind === "sequence") {
    return value.items.flatMap((item) => (item.kind === "string" ? [item.value] : []));
  }
  return [];
}

function pathIncludes(change: FieldChange, fragment: string): boolean {
  return change.path.toLowerCase().includes(fragment);
}

/** Boolean setting switched from true to false */
function switchedOff(change: FieldChange): boolean {
  return boolOf(oldValueOf(change)) === true && boolOf(newValueOf(change)) === false;
}

function isAddedOrModified(change: FieldChange): boolean {
  return change.kind === "added" || change.kind === "modified";
}

function isModifiedOrRemoved(change: FieldChange): boolean {
  return change.kind === "modified" || change.kind === "removed";
}

export function isEncryptionDisabled(change: FieldChange): boolean {
  if (!isModifiedOrRemoved(change)) return false;

  if (switchedOff(change)) return true;
  if (change.kind === "removed" && boolOf(change.oldValue) === true) return true;

  const before = stringOf(oldValueOf(change))?.toLowerCase();
  const after = stringOf(newValueOf(change))?.toLowerCase();
  if (before === undefined || after === undefined) return false;

  return (
    (before === "enabled" && after === "disabled") ||
    (before === "aes256" && after === "none") ||
    (before.includes("encrypt") && after === "none")
  );
}

export function isPublicAccessEnabled(change: FieldChange): boolean {
  if (!isAddedOrModified(change)) return false;

  const after = newValueOf(change);
  if (boolOf(after) === true && boolOf(oldValueOf(change)) !== true) return true;

  return stringOf(after)?.toLowerCase().includes("public") ?? false;
}

/** Storage ACL opened to the public, or the public access block switched off */
export function isStoragePublicAccessEnabled(change: FieldChange): boolean {
  if (pathIncludes(change, "acl") && isPublicAccessEnabled(change)) return true;
  return pathIncludes(change, "blockpublic") && switchedOff(change);
}

export function isSecurityGroupOpened(change: FieldChange): boolean {
  if (!isAddedOrModified(change)) return false;
  return stringsOf(newValueOf(change)).some((s) => OPEN_CIDRS.some((cidr) => s.includes(cidr)));
}

/** Like a security group opening, but catch-all tokens such as `any` also count */
export function isFirewallOpened(change: FieldChange): boolean {
  if (!isAddedOrModified(change)) return false;
  return stringsOf(newValueOf(change)).some((raw) => {
    const s = raw.toLowerCase();
    return OPEN_CIDRS.some((cidr) => s.includes(cidr)) || CATCH_ALL_TOKENS.some((token) => s.includes(token));
  });
}

export function isPermissionEscalation(change: FieldChange): boolean {
  if (!isAddedOrModified(change)) return false;
  const after = stringOf(newValueOf(change))?.toLowerCase();
  if (after === undefined) return false;
  return after.includes("*") || after.includes("admin") || after.includes("full");
}

export function isPolicyChanged(change: FieldChange): boolean {
  return pathIncludes(change, "policy") && isModifiedOrRemoved(change);
}

function settingDisabled(fragment: string): (change: FieldChange) => boolean {
  return (change) => {
    if (!pathIncludes(change, fragment)) return false;
    if (switchedOff(change)) return true;
    const after = stringOf(newValueOf(change))?.toLowerCase();
    return after !== undefined && DISABLED_STRINGS.has(after);
  };
}

export const isBackupDisabled = settingDisabled("backup");
export const isLoggingDisabled = settingDisabled("log");
export const isMonitoringDisabled = settingDisabled("monitor");

/** Protection-style boolean (deletion protection, MFA delete) switched off */
export function isProtectionDisabled(change: FieldChange): boolean {
  return switchedOff(change);
}

/** Low-specificity catch-all: any modification or removal */
export function isValueChanged(change: FieldChange): boolean {
  return isModifiedOrRemoved(change);
}
