import { describe, expect, it } from "vitest";
import { DriftEngine, createDriftEngine } from "./engine.js";
import { fromJson } from "./value.js";
import { DriftLoggerImpl, MemoryTransport } from "../logging/logger.js";
import type { FieldChange, ManagedResource } from "./types.js";

function resource(address: string, configuration: unknown, resourceType = "aws_s3_bucket"): ManagedResource {
  return { address, resourceType, provider: "aws", configuration: fromJson(configuration) };
}

function memoryLogger(level: "debug" | "info" = "debug") {
  const transport = new MemoryTransport();
  const logger = new DriftLoggerImpl({ subsystem: "test", level, transports: [transport] });
  return { transport, logger };
}

describe("DriftEngine", () => {
  it("uses the default narrative limit", () => {
    const engine = createDriftEngine();
    expect(engine.narrativeLimit).toBe(5);
    expect(engine.modifiedHighThreshold).toBe(5);
    expect(engine.extraComputedFields).toEqual([]);
  });

  it("applies a configured narrative limit to detection", () => {
    const engine = new DriftEngine({ config: { narrativeLimit: 1 } });
    const result = engine.detect("s3_bucket", fromJson({}), fromJson({ a: 1, b: 2 }));
    expect(result.narrative.split("\n").at(-1)).toBe("... and 1 more changes");
  });

  it("logs detections at debug with the resource type", () => {
    const { transport, logger } = memoryLogger();
    const engine = new DriftEngine({ logger });
    engine.detect("s3_bucket", fromJson({ a: 1 }), fromJson({ a: 2 }));
    engine.detect("s3_bucket", fromJson({ a: 1 }), fromJson({ a: 1 }));
    expect(transport.messages("debug")).toEqual(["Drift detected", "No drift"]);
    expect(transport.entries[0]?.resourceType).toBe("s3_bucket");
    expect(transport.entries[0]?.metadata).toMatchObject({ changes: 1, severity: "low" });
  });

  it("classifies an empty batch as no drift", () => {
    expect(createDriftEngine().classify("s3_bucket", [])).toEqual({
      hasDrift: false,
      narrative: "No changes detected",
      changes: [],
    });
  });

  it("classifies externally produced changes", () => {
    const changes: FieldChange[] = [
      { kind: "added", path: "ingress.cidr", newValue: fromJson("0.0.0.0/0") },
    ];
    expect(createDriftEngine().classify("aws_instance", changes)).toMatchObject({
      hasDrift: true,
      severity: "critical",
      driftType: "network_rule",
    });
  });

  it("reconciles with configured options and warns on critical verdicts", () => {
    const { transport, logger } = memoryLogger("info");
    const engine = new DriftEngine({
      logger,
      config: { extraComputedFields: ["etag"], modifiedHighThreshold: 0 },
    });
    const report = engine.reconcile(
      [resource("tags", { env: "dev" }), resource("enc", { encryption: "AES256" }), resource("etag", {})],
      [resource("tags", { env: "prod" }), resource("enc", { encryption: "none" }), resource("etag", { etag: "x" })],
    );
    expect(report.verdicts.map((v) => `${v.address}:${v.category}:${v.severity}`)).toEqual([
      "tags:modified:high",
      "enc:modified:critical",
      "etag:compliant:info",
    ]);
    expect(report.summary.worstSeverity).toBe("critical");
    expect(transport.messages("warn")).toEqual(["Configuration drift detected for enc"]);
    expect(transport.entries[0]?.resourceAddress).toBe("enc");
    expect(transport.messages("debug")).toEqual([]);
  });

  it("lists rules for a type or the common table", () => {
    const engine = createDriftEngine();
    const common = engine.listRules();
    expect(common.resourceType).toBeNull();
    expect(common.rules).toHaveLength(11);
    const bucket = engine.listRules("aws_s3_bucket");
    expect(bucket.resourceType).toBe("s3_bucket");
    expect(bucket.rules.map((r) => r.fieldPattern).slice(-2)).toEqual(["block_public", "mfa_delete"]);
    expect(bucket.catalogResourceTypes).toContain("rds_instance");
  });
});
