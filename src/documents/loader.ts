/**
 * Drift Audit: Document Loading
 *
 * The decoding boundary: JSON text becomes `ConfigValue` trees and resource
 * collections here, and malformed documents are rejected before anything
 * reaches the drift engine.
 */

import * as fs from "node:fs";
import { z } from "zod";
import type { ConfigValue, ManagedResource } from "../drift/types.js";
import { fromJson } from "../drift/value.js";
import { formatZodIssues } from "../config/io.js";

export class DocumentError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(message: string, source: string, issues: string[] = []) {
    super(
      issues.length > 0
        ? `${source}: ${message}\n  ${issues.join("\n  ")}`
        : `${source}: ${message}`,
    );
    this.name = "DocumentError";
    this.source = source;
    this.issues = issues;
  }
}

export const resourceDocumentSchema = z.object({
  address: z.string().min(1),
  resourceType: z.string().min(1),
  provider: z.string().min(1),
  configuration: z.unknown(),
  name: z.string().optional(),
  id: z.string().optional(),
});

/** A bare array of resources, or an object with a `resources` array */
export const resourceCollectionSchema = z.union([
  z.array(resourceDocumentSchema),
  z.object({ resources: z.array(resourceDocumentSchema) }),
]);

export type ResourceDocument = z.infer<typeof resourceDocumentSchema>;

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DocumentError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, source);
  }
}

function decode(value: unknown, source: string, location = "$"): ConfigValue {
  try {
    return fromJson(value, location);
  } catch (err) {
    if (err instanceof TypeError) throw new DocumentError(err.message, source);
    throw err;
  }
}

/** Decode one configuration snapshot */
export function parseConfigDocument(text: string, source = "<inline>"): ConfigValue {
  return decode(parseJson(text, source), source);
}

function toManagedResource(doc: ResourceDocument, index: number, source: string): ManagedResource {
  const resource: ManagedResource = {
    address: doc.address,
    resourceType: doc.resourceType,
    provider: doc.provider,
    configuration: decode(doc.configuration ?? null, source, `$[${index}].configuration`),
  };
  if (doc.name !== undefined) resource.name = doc.name;
  if (doc.id !== undefined) resource.id = doc.id;
  return resource;
}

/** Validate and decode a declared or deployed resource collection */
export function parseResourceCollection(text: string, source = "<inline>"): ManagedResource[] {
  const parsed = resourceCollectionSchema.safeParse(parseJson(text, source));
  if (!parsed.success) {
    throw new DocumentError("Not a valid resource collection", source, formatZodIssues(parsed.error.issues));
  }
  const docs = Array.isArray(parsed.data) ? parsed.data : parsed.data.resources;
  return docs.map((doc, i) => toManagedResource(doc, i, source));
}

export function readDocument(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new DocumentError(`Cannot read file: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }
}

export function loadConfigDocument(filePath: string): ConfigValue {
  return parseConfigDocument(readDocument(filePath), filePath);
}

export function loadResourceCollection(filePath: string): ManagedResource[] {
  return parseResourceCollection(readDocument(filePath), filePath);
}
