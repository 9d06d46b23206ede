/**
 * Drift Engine: Structural Diff
 *
 * Recursive comparison of two configuration trees. One algorithm serves
 * both snapshot drift (baseline vs current) and IaC reconciliation
 * (declared vs actual); the latter passes an `excludeAdded` predicate to
 * suppress provider-assigned fields.
 */

import type { ConfigValue, FieldChange } from "./types.js";
import { configValuesEqual, isNullValue, sortedKeys } from "./value.js";

export interface DiffOptions {
  /**
   * Called for keys absent or null on the baseline side. Returning true
   * drops the `added` change for that key.
   */
  excludeAdded?: (key: string, path: string) => boolean;
}

/** Join a parent path and a mapping key */
export function joinPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

/** Append a sequence index to a path */
export function indexPath(base: string, index: number): string {
  return `${base}[${index}]`;
}

/**
 * Compare `baseline` against `current`, returning field-level changes in a
 * deterministic order: baseline keys (sorted) first, then keys that only
 * exist on the current side (sorted).
 *
 * Sequences of different lengths are reported as one `modified` change for
 * the whole sequence; there is no element alignment across length changes.
 */
export function diffConfig(
  path: string,
  baseline: ConfigValue,
  current: ConfigValue,
  options: DiffOptions = {},
): FieldChange[] {
  const changes: FieldChange[] = [];
  collect(path, baseline, current, options, changes);
  return changes;
}

function collect(
  path: string,
  baseline: ConfigValue,
  current: ConfigValue,
  options: DiffOptions,
  out: FieldChange[],
): void {
  const baselineNull = isNullValue(baseline);
  const currentNull = isNullValue(current);

  if (baselineNull && currentNull) return;
  if (baselineNull) {
    out.push({ kind: "added", path, newValue: current });
    return;
  }
  if (currentNull) {
    out.push({ kind: "removed", path, oldValue: baseline });
    return;
  }

  if (baseline.kind === "mapping" && current.kind === "mapping") {
    for (const key of sortedKeys(baseline.entries)) {
      const keyPath = joinPath(path, key);
      const oldValue = baseline.entries.get(key);
      const newValue = current.entries.get(key);
      if (oldValue === undefined) continue;
      if (newValue === undefined) {
        // Explicit nulls are absences already; nothing was removed
        if (oldValue.kind !== "null") out.push({ kind: "removed", path: keyPath, oldValue });
        continue;
      }
      // A null baseline is an absence, so the key counts as added on the current side
      if (oldValue.kind === "null" && options.excludeAdded?.(key, keyPath)) continue;
      collect(keyPath, oldValue, newValue, options, out);
    }

    for (const key of sortedKeys(current.entries)) {
      if (baseline.entries.has(key)) continue;
      const newValue = current.entries.get(key);
      if (newValue === undefined || newValue.kind === "null") continue;
      const keyPath = joinPath(path, key);
      if (options.excludeAdded?.(key, keyPath)) continue;
      out.push({ kind: "added", path: keyPath, newValue });
    }
    return;
  }

  if (baseline.kind === "sequence" && current.kind === "sequence") {
    if (baseline.items.length !== current.items.length) {
      out.push({ kind: "modified", path, oldValue: baseline, newValue: current });
      return;
    }
    baseline.items.forEach((item, i) => {
      const other = current.items[i];
      if (other !== undefined) collect(indexPath(path, i), item, other, options, out);
    });
    return;
  }

  if (!configValuesEqual(baseline, current)) {
    out.push({ kind: "modified", path, oldValue: baseline, newValue: current });
  }
}
