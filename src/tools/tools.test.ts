import { describe, expect, it } from "vitest";
import { createDriftTools } from "./tools.js";
import { createDriftEngine } from "../drift/engine.js";

/* ---------- helpers ---------- */

function textOf(result: { content: Array<{ type: "text"; text: string }> }): string {
  const [first] = result.content;
  if (!first) throw new Error("empty tool result");
  return first.text;
}

const bucket = (configuration: unknown, address = "aws_s3_bucket.logs") => ({
  address,
  resourceType: "aws_s3_bucket",
  provider: "aws",
  configuration,
});

describe("createDriftTools", () => {
  it("exposes three tools with object schemas", () => {
    const tools = createDriftTools();
    expect(tools.map((t) => t.name)).toEqual(["drift_detect", "drift_reconcile", "drift_rules"]);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe("object");
    }
    expect(tools[0].inputSchema.required).toEqual(["resourceType", "baselineJson", "currentJson"]);
  });
});

describe("drift_detect", () => {
  it("returns the serialized detection result", async () => {
    const [detect] = createDriftTools();
    const result = await detect.execute({
      resourceType: "s3_bucket",
      baselineJson: JSON.stringify({ encryption: { enabled: true } }),
      currentJson: JSON.stringify({ encryption: { enabled: false } }),
    });
    expect(JSON.parse(textOf(result))).toEqual({
      hasDrift: true,
      driftType: "encryption",
      severity: "critical",
      narrative:
        "1 configuration change(s) detected with critical severity:\n- encryption.enabled: modified (was: true, now: false)",
      changes: [{ path: "encryption.enabled", kind: "modified", oldValue: true, newValue: false }],
    });
  });

  it("reports malformed JSON as an error message", async () => {
    const [detect] = createDriftTools();
    const result = await detect.execute({ resourceType: "s3_bucket", baselineJson: "{", currentJson: "{}" });
    expect(textOf(result).startsWith("Error: baselineJson: Invalid JSON: ")).toBe(true);
  });
});

describe("drift_reconcile", () => {
  const declaredJson = JSON.stringify([bucket({ acl: "private" }), bucket({}, "aws_s3_bucket.gone")]);
  const actualJson = JSON.stringify({ resources: [bucket({ acl: "private", arn: "placeholder" })] });
  const [, reconcile] = createDriftTools();

  it("returns summary and verdicts", async () => {
    const result = await reconcile.execute({ declaredJson, actualJson });
    const parsed: unknown = JSON.parse(textOf(result));
    expect(parsed).toMatchObject({
      summary: { totalResources: 2, worstSeverity: "high" },
      verdicts: [
        { category: "missing", address: "aws_s3_bucket.gone", actualResourceRef: null },
        { category: "compliant", address: "aws_s3_bucket.logs", severity: "info" },
      ],
    });
  });

  it("filters to actionable verdicts on request", async () => {
    const result = await reconcile.execute({ declaredJson, actualJson, actionableOnly: true });
    const parsed: unknown = JSON.parse(textOf(result));
    expect(parsed).toMatchObject({ verdicts: [{ address: "aws_s3_bucket.gone" }] });
    expect(textOf(result)).not.toContain('"category": "compliant"');
  });

  it("reports invalid collections", async () => {
    const result = await reconcile.execute({ declaredJson: "{}", actualJson: "[]" });
    expect(textOf(result).startsWith("Error: declaredJson: Not a valid resource collection")).toBe(true);
  });
});

describe("drift_rules", () => {
  it("lists a type's rules through the given engine", async () => {
    const [, , rules] = createDriftTools(createDriftEngine());
    const result = await rules.execute({ resourceType: "aws_db_instance" });
    const parsed: unknown = JSON.parse(textOf(result));
    expect(parsed).toMatchObject({ resourceType: "rds_instance" });
    expect(textOf(result)).toContain('"fieldPattern": "publicly_accessible"');
  });
});
