// ─── Drift Audit Agent Tools ───────────────────────────────────────────
//
// 3 agent tools:
// 1. drift_detect    - Diff two snapshots of one resource and classify the changes
// 2. drift_reconcile - Reconcile declared resources against deployed ones
// 3. drift_rules     - List the security rule table for a resource type
// ───────────────────────────────────────────────────────────────────────

import { Type } from "@sinclair/typebox";
import { createDriftEngine, type DriftEngine } from "../drift/engine.js";
import { serializeDetectionResult, serializeVerdict } from "../drift/serialize.js";
import { actionableVerdicts } from "../drift/summary.js";
import { DocumentError, parseConfigDocument, parseResourceCollection } from "../documents/loader.js";

function ok(data: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }] };
}
function err(message: string) {
  return { content: [{ type: "text" as const, text: `Error: ${message}` }] };
}

/** Malformed documents are reported to the agent; anything else propagates */
function guard<T>(run: () => T): T | ReturnType<typeof err> {
  try {
    return run();
  } catch (error) {
    if (error instanceof DocumentError) return err(error.message);
    throw error;
  }
}

export function createDriftTools(engine: DriftEngine = createDriftEngine()) {
  const detect = {
    name: "drift_detect",
    description:
      "Compare a baseline configuration snapshot with the current one and classify the drift by security severity.",
    inputSchema: Type.Object({
      resourceType: Type.String({ description: "Resource type, e.g. s3_bucket or aws_instance" }),
      baselineJson: Type.String({ description: "Baseline configuration as JSON string" }),
      currentJson: Type.String({ description: "Current configuration as JSON string" }),
    }),
    execute: async (input: { resourceType: string; baselineJson: string; currentJson: string }) =>
      guard(() => {
        const baseline = parseConfigDocument(input.baselineJson, "baselineJson");
        const current = parseConfigDocument(input.currentJson, "currentJson");
        return ok(serializeDetectionResult(engine.detect(input.resourceType, baseline, current)));
      }),
  };

  const reconcile = {
    name: "drift_reconcile",
    description:
      "Reconcile IaC-declared resources against deployed resources by address, reporting missing, shadow, modified and compliant resources.",
    inputSchema: Type.Object({
      declaredJson: Type.String({ description: "Declared resources: array, or object with a resources array" }),
      actualJson: Type.String({ description: "Deployed resources: array, or object with a resources array" }),
      actionableOnly: Type.Optional(
        Type.Boolean({ description: "Only return non-compliant verdicts, most severe first" }),
      ),
    }),
    execute: async (input: { declaredJson: string; actualJson: string; actionableOnly?: boolean }) =>
      guard(() => {
        const declared = parseResourceCollection(input.declaredJson, "declaredJson");
        const actual = parseResourceCollection(input.actualJson, "actualJson");
        const report = engine.reconcile(declared, actual);
        const verdicts = input.actionableOnly ? actionableVerdicts(report.verdicts) : report.verdicts;
        return ok({ summary: report.summary, verdicts: verdicts.map(serializeVerdict) });
      }),
  };

  const rules = {
    name: "drift_rules",
    description: "List the security classification rules applied to a resource type, in evaluation order.",
    inputSchema: Type.Object({
      resourceType: Type.Optional(Type.String({ description: "Resource type; omit for the common rules" })),
    }),
    execute: async (input: { resourceType?: string }) => ok(engine.listRules(input.resourceType)),
  };

  return [detect, reconcile, rules] as const;
}
