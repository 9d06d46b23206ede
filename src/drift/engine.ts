/**
 * Drift Engine
 *
 * Binds the pure drift operations to an audit configuration and a logger.
 * Holds no state between calls; instances can be shared freely.
 */

import type {
  ActualResource,
  ConfigValue,
  DeclaredResource,
  DetectionResult,
  FieldChange,
  ReconciliationSummary,
  ReconciliationVerdict,
  SerializedRule,
} from "./types.js";
import { classifyChanges, detectDrift, noDriftResult } from "./classifier.js";
import { reconcileResources } from "./reconciler.js";
import { summarizeVerdicts } from "./summary.js";
import { COMMON_SECURITY_RULES, getCatalogResourceTypes, getSecurityRules, normalizeResourceType } from "./rules.js";
import { serializeRule } from "./serialize.js";
import { getDefaultDriftAuditConfig, type DriftAuditConfig } from "../config/schema.js";
import { createSilentLogger, type DriftLogger } from "../logging/index.js";

export interface DriftEngineOptions {
  config?: Partial<Pick<DriftAuditConfig, "narrativeLimit" | "modifiedHighThreshold" | "extraComputedFields">>;
  logger?: DriftLogger;
}

export interface ReconciliationReport {
  verdicts: ReconciliationVerdict[];
  summary: ReconciliationSummary;
}

export interface RuleListing {
  /** Normalized type, or null for the common table */
  resourceType: string | null;
  rules: SerializedRule[];
  catalogResourceTypes: string[];
}

export class DriftEngine {
  readonly narrativeLimit: number;
  readonly modifiedHighThreshold: number;
  readonly extraComputedFields: readonly string[];
  private logger: DriftLogger;

  constructor(options: DriftEngineOptions = {}) {
    const defaults = getDefaultDriftAuditConfig();
    this.narrativeLimit = options.config?.narrativeLimit ?? defaults.narrativeLimit;
    this.modifiedHighThreshold = options.config?.modifiedHighThreshold ?? defaults.modifiedHighThreshold;
    this.extraComputedFields = options.config?.extraComputedFields ?? defaults.extraComputedFields;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Compare two snapshots of one resource */
  detect(resourceType: string, baseline: ConfigValue, current: ConfigValue): DetectionResult {
    const started = Date.now();
    const result = detectDrift(resourceType, baseline, current, { narrativeLimit: this.narrativeLimit });

    if (result.hasDrift) {
      this.logger.withContext({ resourceType }).debug("Drift detected", {
        changes: result.changes.length,
        severity: result.severity,
        driftType: result.driftType,
        durationMs: Date.now() - started,
      });
    } else {
      this.logger.withContext({ resourceType }).debug("No drift", { durationMs: Date.now() - started });
    }
    return result;
  }

  /** Classify changes produced elsewhere; an empty batch means no drift */
  classify(resourceType: string, changes: FieldChange[]): DetectionResult {
    if (changes.length === 0) return noDriftResult();
    return classifyChanges(resourceType, changes, { narrativeLimit: this.narrativeLimit });
  }

  reconcile(declared: Iterable<DeclaredResource>, actual: Iterable<ActualResource>): ReconciliationReport {
    const started = Date.now();
    const verdicts = reconcileResources(declared, actual, {
      extraComputedFields: this.extraComputedFields,
      modifiedHighThreshold: this.modifiedHighThreshold,
    });
    const summary = summarizeVerdicts(verdicts);

    this.logger.debug("Reconciliation complete", {
      resources: summary.totalResources,
      ...summary.byCategory,
      durationMs: Date.now() - started,
    });
    for (const verdict of verdicts) {
      if (verdict.severity === "critical") {
        this.logger.withContext({ resourceAddress: verdict.address }).warn(verdict.narrative, {
          category: verdict.category,
          changeCount: verdict.changeCount,
        });
      }
    }

    return { verdicts, summary };
  }

  /** Rule table in evaluation order for a resource type, or the common rules */
  listRules(resourceType?: string): RuleListing {
    const rules = resourceType ? getSecurityRules(resourceType) : COMMON_SECURITY_RULES;
    return {
      resourceType: resourceType ? normalizeResourceType(resourceType) : null,
      rules: rules.map(serializeRule),
      catalogResourceTypes: getCatalogResourceTypes(),
    };
  }
}

export function createDriftEngine(options?: DriftEngineOptions): DriftEngine {
  return new DriftEngine(options);
}
