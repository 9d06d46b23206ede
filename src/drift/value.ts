/**
 * Drift Engine: Configuration Values
 *
 * Decoding of JSON-like documents into the `ConfigValue` union, deep strict
 * equality, and rendering for narratives.
 */

import type { ConfigValue, JsonValue } from "./types.js";

export const NULL_VALUE: ConfigValue = { kind: "null" };

/**
 * Decode a JSON-compatible value. Anything `JSON.parse` cannot produce
 * (functions, `undefined`, non-finite numbers, class instances) is rejected
 * with a TypeError naming the offending location.
 */
export function fromJson(input: unknown, location = "$"): ConfigValue {
  if (input === null) return NULL_VALUE;

  switch (typeof input) {
    case "boolean":
      return { kind: "bool", value: input };
    case "number":
      if (!Number.isFinite(input)) {
        throw new TypeError(`Non-finite number at ${location}`);
      }
      return { kind: "number", value: input };
    case "string":
      return { kind: "string", value: input };
    case "object": {
      if (Array.isArray(input)) {
        return { kind: "sequence", items: input.map((item, i) => fromJson(item, `${location}[${i}]`)) };
      }
      const proto: unknown = Object.getPrototypeOf(input);
      if (proto !== Object.prototype && proto !== null) {
        throw new TypeError(`Unsupported object at ${location}`);
      }
      const entries = new Map<string, ConfigValue>();
      for (const [key, value] of Object.entries(input)) {
        entries.set(key, fromJson(value, `${location}.${key}`));
      }
      return { kind: "mapping", entries };
    }
    default:
      throw new TypeError(`Unsupported ${typeof input} value at ${location}`);
  }
}

/** Encode back into plain JSON, with mapping keys in insertion order. */
export function toJson(value: ConfigValue): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "sequence":
      return value.items.map(toJson);
    case "mapping": {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, entry] of value.entries) {
        // Plain assignment would hit the `__proto__` setter
        Object.defineProperty(out, key, { value: toJson(entry), enumerable: true, writable: true, configurable: true });
      }
      return out;
    }
  }
}

/**
 * Deep equality. Scalars must agree in both kind and value, so the number
 * `1` never equals the string `"1"`. Mapping key order is irrelevant.
 */
export function configValuesEqual(a: ConfigValue, b: ConfigValue): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && a.value === b.value;
    case "number":
      return b.kind === "number" && a.value === b.value;
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "sequence": {
      if (b.kind !== "sequence" || a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => {
        const other = b.items[i];
        return other !== undefined && configValuesEqual(item, other);
      });
    }
    case "mapping": {
      if (b.kind !== "mapping" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !configValuesEqual(value, other)) return false;
      }
      return true;
    }
  }
}

export function isNullValue(value: ConfigValue | undefined): boolean {
  return value === undefined || value.kind === "null";
}

/** Mapping keys in a stable order, independent of decode order. */
export function sortedKeys(entries: ReadonlyMap<string, ConfigValue>): string[] {
  return [...entries.keys()].sort();
}

/**
 * Render for human-readable output: strings unquoted, containers as
 * compact JSON, absent values as `null`.
 */
export function renderConfigValue(value: ConfigValue | undefined): string {
  if (value === undefined) return "null";
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
    case "number":
      return String(value.value);
    case "string":
      return value.value;
    case "sequence":
    case "mapping":
      return JSON.stringify(toJson(value));
  }
}
