/**
 * Drift Audit Configuration Schema
 *
 * Schema-based validation of the audit configuration using Zod. Every field
 * has a default, so an empty document yields the standard behaviour.
 */

import { z } from "zod";

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  timestamps: z.boolean().default(true),
  colors: z.boolean().optional(),
});

export const driftAuditConfigSchema = z.object({
  /** Changes listed in a detection narrative before "... and N more" */
  narrativeLimit: z.number().int().positive().default(5),
  /** Modified resources with more changes than this are high severity */
  modifiedHighThreshold: z.number().int().nonnegative().default(5),
  /** Field names treated as provider-assigned on top of the built-in set */
  extraComputedFields: z.array(z.string().min(1)).default([]),
  logging: loggingConfigSchema.default({}),
});

export type DriftAuditConfig = z.infer<typeof driftAuditConfigSchema>;
export type DriftAuditConfigInput = z.input<typeof driftAuditConfigSchema>;

export function validateDriftAuditConfig(
  config: unknown,
): ReturnType<typeof driftAuditConfigSchema.safeParse> {
  return driftAuditConfigSchema.safeParse(config);
}

export function getDefaultDriftAuditConfig(): DriftAuditConfig {
  return driftAuditConfigSchema.parse({});
}
