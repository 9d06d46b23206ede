/**
 * Drift Audit Configuration Loading
 *
 * Reads an optional JSON config file, applies environment overrides and
 * validates the result.
 */

import * as fs from "node:fs";
import type { ZodIssue } from "zod";
import { driftAuditConfigSchema, logLevelSchema, type DriftAuditConfig } from "./schema.js";

export const CONFIG_PATH_ENV = "DRIFT_AUDIT_CONFIG";
export const LOG_LEVEL_ENV = "DRIFT_AUDIT_LOG_LEVEL";

export class ConfigError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(message: string, source: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
    this.source = source;
    this.issues = issues;
  }
}

export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`);
}

function readConfigFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file: ${String(err)}`, filePath);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve the effective configuration. The file path comes from the
 * argument or `DRIFT_AUDIT_CONFIG`; `DRIFT_AUDIT_LOG_LEVEL` overrides the
 * logging level from the file.
 */
export function loadDriftAuditConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): DriftAuditConfig {
  const source = filePath ?? env[CONFIG_PATH_ENV];
  const raw = source ? readConfigFile(source) : {};
  if (!isPlainRecord(raw)) {
    throw new ConfigError("Config must be a JSON object", source ?? "<defaults>");
  }

  const envLevel = env[LOG_LEVEL_ENV];
  let input: Record<string, unknown> = raw;
  if (envLevel) {
    const level = logLevelSchema.safeParse(envLevel.toLowerCase());
    if (!level.success) {
      throw new ConfigError(`Invalid ${LOG_LEVEL_ENV}: ${envLevel}`, "env");
    }
    const logging = isPlainRecord(raw.logging) ? raw.logging : {};
    input = { ...raw, logging: { ...logging, level: level.data } };
  }

  const parsed = driftAuditConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid drift audit configuration", source ?? "<defaults>", formatZodIssues(parsed.error.issues));
  }
  return parsed.data;
}
