import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, formatZodIssues, loadDriftAuditConfig } from "./io.js";
import { getDefaultDriftAuditConfig, validateDriftAuditConfig } from "./schema.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "drift-audit-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeConfig(contents: string): string {
  const file = path.join(dir, "drift-audit.json");
  fs.writeFileSync(file, contents);
  return file;
}

describe("driftAuditConfigSchema", () => {
  it("fills every default from an empty document", () => {
    expect(getDefaultDriftAuditConfig()).toEqual({
      narrativeLimit: 5,
      modifiedHighThreshold: 5,
      extraComputedFields: [],
      logging: { level: "info", timestamps: true },
    });
  });

  it("rejects out-of-range values", () => {
    const result = validateDriftAuditConfig({ narrativeLimit: 0, extraComputedFields: [""] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(formatZodIssues(result.error.issues).map((issue) => issue.split(":")[0])).toEqual([
      "narrativeLimit",
      "extraComputedFields.0",
    ]);
  });

  it("names the root for whole-document issues", () => {
    const result = validateDriftAuditConfig("nope");
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(formatZodIssues(result.error.issues)[0]?.startsWith("<root>: ")).toBe(true);
  });
});

describe("loadDriftAuditConfig", () => {
  it("returns defaults without a file", () => {
    expect(loadDriftAuditConfig(undefined, {})).toEqual(getDefaultDriftAuditConfig());
  });

  it("reads the file given as argument", () => {
    const file = writeConfig(JSON.stringify({ narrativeLimit: 2, extraComputedFields: ["etag"] }));
    const config = loadDriftAuditConfig(file, {});
    expect(config.narrativeLimit).toBe(2);
    expect(config.extraComputedFields).toEqual(["etag"]);
    expect(config.modifiedHighThreshold).toBe(5);
  });

  it("falls back to the DRIFT_AUDIT_CONFIG path", () => {
    const file = writeConfig(JSON.stringify({ modifiedHighThreshold: 1 }));
    expect(loadDriftAuditConfig(undefined, { DRIFT_AUDIT_CONFIG: file }).modifiedHighThreshold).toBe(1);
  });

  it("lets DRIFT_AUDIT_LOG_LEVEL override the file", () => {
    const file = writeConfig(JSON.stringify({ logging: { level: "warn", timestamps: false } }));
    const config = loadDriftAuditConfig(file, { DRIFT_AUDIT_LOG_LEVEL: "DEBUG" });
    expect(config.logging).toEqual({ level: "debug", timestamps: false });
  });

  it("rejects an unknown env log level", () => {
    expect(() => loadDriftAuditConfig(undefined, { DRIFT_AUDIT_LOG_LEVEL: "loud" })).toThrow(
      "Invalid DRIFT_AUDIT_LOG_LEVEL: loud",
    );
  });

  it("reports unreadable and malformed files", () => {
    expect(() => loadDriftAuditConfig(path.join(dir, "absent.json"), {})).toThrow(ConfigError);
    const bad = writeConfig("{ not json");
    expect(() => loadDriftAuditConfig(bad, {})).toThrow(/^Config file is not valid JSON: /);
    const list = writeConfig("[]");
    expect(() => loadDriftAuditConfig(list, {})).toThrow("Config must be a JSON object");
  });

  it("lists schema issues on the error", () => {
    const file = writeConfig(JSON.stringify({ narrativeLimit: "five" }));
    try {
      loadDriftAuditConfig(file, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.source).toBe(file);
      expect(err.issues).toEqual(["narrativeLimit: Expected number, received string"]);
      expect(err.message).toBe("Invalid drift audit configuration\n  narrativeLimit: Expected number, received string");
    }
  });
});
