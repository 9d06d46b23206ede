/**
 * Drift Audit: CLI Commands
 *
 * Registers `detect`, `reconcile` and `rules` on a commander program. The
 * root `--config` and `--log-level` options are resolved per invocation, so
 * the same registration serves the standalone runner and tests.
 */

import { Option, type Command } from "commander";
import type { DetectionResult, ReconciliationVerdict, Severity } from "../drift/types.js";
import { createDriftEngine, type DriftEngine, type ReconciliationReport } from "../drift/engine.js";
import { serializeDetectionResult, serializeVerdict } from "../drift/serialize.js";
import { compareVerdictSeverity } from "../drift/summary.js";
import { ConfigError, loadDriftAuditConfig } from "../config/io.js";
import { DocumentError, loadConfigDocument, loadResourceCollection } from "../documents/loader.js";
import { createDriftLogger, isLogLevel, LOG_LEVELS, type DriftLogger } from "../logging/index.js";

// =============================================================================
// Types
// =============================================================================

export type DriftCliContext = {
  program: Command;
  /** Receives the resolved level; a console logger is created when absent */
  logger?: DriftLogger;
  env?: NodeJS.ProcessEnv;
};

type RootOptions = {
  config?: string;
  logLevel?: string;
};

type Runtime = {
  engine: DriftEngine;
  logger: DriftLogger;
};

const FAIL_ON_SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

function isSeverity(value: string): value is Severity {
  return FAIL_ON_SEVERITIES.some((severity) => severity === value);
}

// =============================================================================
// Output
// =============================================================================

export function formatDetection(label: string, result: DetectionResult): string[] {
  if (!result.hasDrift) return [`${label}: no drift`];
  return [`${label}: ${result.severity.toUpperCase()} ${result.driftType} drift`, ...result.narrative.split("\n")];
}

function formatVerdict(verdict: ReconciliationVerdict): string[] {
  const lines = [`  [${verdict.severity.toUpperCase()}] ${verdict.category.padEnd(9)} ${verdict.address}`];
  if (verdict.category === "compliant") return lines;
  lines.push(`      ${verdict.narrative}`);
  for (const change of verdict.changes) {
    lines.push(`      ~ ${change.path} (${change.kind})`);
  }
  lines.push(`      → ${verdict.recommendation}`);
  return lines;
}

export function formatReconciliation(report: ReconciliationReport): string[] {
  const { summary } = report;
  const counts = Object.entries(summary.byCategory)
    .map(([category, count]) => `${category} ${count}`)
    .join(", ");
  return [
    `Reconciliation: ${summary.totalResources} resources (${counts})`,
    `Worst severity: ${summary.worstSeverity}`,
    ...report.verdicts.flatMap(formatVerdict),
  ];
}

// =============================================================================
// CLI Registration
// =============================================================================

export function registerDriftCli(ctx: DriftCliContext): void {
  const { program } = ctx;
  const env = ctx.env ?? process.env;

  program
    .option("--config <path>", "Path to a drift audit config file (JSON)")
    .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS));

  function resolveRuntime(): Runtime {
    const opts = program.opts<RootOptions>();
    const config = loadDriftAuditConfig(opts.config, env);
    let level = config.logging.level;
    if (opts.logLevel !== undefined) {
      if (!isLogLevel(opts.logLevel)) {
        throw new ConfigError(`Unknown log level: ${opts.logLevel}`, "--log-level");
      }
      level = opts.logLevel;
    }

    let logger: DriftLogger;
    if (ctx.logger) {
      logger = ctx.logger;
      logger.setLevel(level);
    } else {
      logger = createDriftLogger("cli", { ...config.logging, level });
    }
    return { logger, engine: createDriftEngine({ config, logger: logger.child("engine") }) };
  }

  /** Document and config failures end the command with exit code 1 */
  function run(action: (runtime: Runtime) => void): void {
    try {
      action(resolveRuntime());
    } catch (error) {
      if (error instanceof DocumentError || error instanceof ConfigError) {
        (ctx.logger ?? createDriftLogger("cli")).error(error.message);
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // detect
  // ---------------------------------------------------------------------------
  program
    .command("detect")
    .description("Compare a baseline snapshot with the current one and classify the drift")
    .argument("<baseline>", "Path to the baseline configuration (JSON)")
    .argument("<current>", "Path to the current configuration (JSON)")
    .requiredOption("-t, --type <resourceType>", "Resource type, e.g. s3_bucket")
    .option("--json", "Output as JSON")
    .action((baselinePath: string, currentPath: string, opts: { type: string; json?: boolean }) => {
      run(({ engine, logger }) => {
        const baseline = loadConfigDocument(baselinePath);
        const current = loadConfigDocument(currentPath);
        logger.debug("Comparing snapshots", { baseline: baselinePath, current: currentPath });
        const result = engine.detect(opts.type, baseline, current);

        if (opts.json) {
          console.log(JSON.stringify(serializeDetectionResult(result), null, 2));
          return;
        }
        for (const line of formatDetection(opts.type, result)) console.log(line);
      });
    });

  // ---------------------------------------------------------------------------
  // reconcile
  // ---------------------------------------------------------------------------
  program
    .command("reconcile")
    .description("Reconcile declared resources against deployed resources")
    .argument("<declared>", "Path to the declared resources (JSON)")
    .argument("<actual>", "Path to the deployed resources (JSON)")
    .option("--json", "Output as JSON")
    .addOption(
      new Option("--fail-on <severity>", "Exit with code 1 when any verdict reaches this severity").choices(
        FAIL_ON_SEVERITIES,
      ),
    )
    .action((declaredPath: string, actualPath: string, opts: { json?: boolean; failOn?: string }) => {
      run(({ engine, logger }) => {
        const declared = loadResourceCollection(declaredPath);
        const actual = loadResourceCollection(actualPath);
        const report = engine.reconcile(declared, actual);

        if (opts.json) {
          console.log(
            JSON.stringify({ summary: report.summary, verdicts: report.verdicts.map(serializeVerdict) }, null, 2),
          );
        } else {
          for (const line of formatReconciliation(report)) console.log(line);
        }

        const failOn = opts.failOn;
        if (failOn !== undefined && isSeverity(failOn)) {
          const failing = report.verdicts.filter((v) => compareVerdictSeverity(v.severity, failOn) >= 0);
          if (failing.length > 0) {
            logger.warn(`${failing.length} verdict(s) at or above ${failOn} severity`);
            process.exitCode = 1;
          }
        }
      });
    });

  // ---------------------------------------------------------------------------
  // rules
  // ---------------------------------------------------------------------------
  program
    .command("rules")
    .description("List security classification rules in evaluation order")
    .option("-t, --type <resourceType>", "Resource type; omit for the common rules")
    .option("--json", "Output as JSON")
    .action((opts: { type?: string; json?: boolean }) => {
      run(({ engine }) => {
        const listing = engine.listRules(opts.type);
        if (opts.json) {
          console.log(JSON.stringify(listing, null, 2));
          return;
        }
        console.log(`Rules for ${listing.resourceType ?? "all resource types"} (${listing.rules.length}):`);
        for (const rule of listing.rules) {
          console.log(`  ${rule.severity.padEnd(8)} ${rule.driftType.padEnd(20)} ${rule.fieldPattern}: ${rule.description}`);
        }
        console.log(`Catalog types: ${listing.catalogResourceTypes.join(", ")}`);
      });
    });
}
