import { createRequire } from "node:module";

const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

// Single source of truth for the current drift-audit version.
// - Bundled builds: env var.
// - Source and dist runs: package.json (one or two levels up).
export const VERSION = process.env.DRIFT_AUDIT_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
