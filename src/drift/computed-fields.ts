/**
 * Provider-assigned attributes that legitimately differ between a declared
 * resource and its deployed counterpart. Added-on-actual changes for these
 * keys are never drift.
 */

export const COMPUTED_FIELDS: ReadonlySet<string> = new Set([
  "id",
  "arn",
  "self_link",
  "created_at",
  "updated_at",
  "creation_timestamp",
  "uid",
  "resource_version",
  "generation",
  "managed_fields",
  "status",
  "instance_id",
  "public_ip",
  "public_dns",
  "private_ip",
  "private_dns",
]);

export function isComputedField(field: string, extra: Iterable<string> = []): boolean {
  if (COMPUTED_FIELDS.has(field)) return true;
  for (const name of extra) {
    if (name === field) return true;
  }
  return false;
}

/** Build an `excludeAdded` predicate for the diff engine. */
export function computedFieldExclusion(extra: readonly string[] = []): (key: string) => boolean {
  return (key) => isComputedField(key, extra);
}
