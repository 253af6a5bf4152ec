import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  // src/ when run from sources, dist/src/ when built
  for (const candidate of ["../package.json", "../../package.json"]) {
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

// Single source of truth for the current policy-gate version.
export const VERSION = process.env.POLICY_GATE_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
