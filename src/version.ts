import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

export const PACKAGE_NAME = "stratus-atc";

let cached: string | null = null;

/** Read version from package.json. */
export function readVersion(): string {
  if (cached) return cached;
  const selfDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(selfDir, "..", "package.json"),       // from dist/ or src/
    join(selfDir, "..", "..", "package.json"),
  ];
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
      if (
        typeof pkg === "object" && pkg !== null &&
        "name" in pkg && pkg.name === PACKAGE_NAME &&
        "version" in pkg && typeof pkg.version === "string"
      ) {
        cached = pkg.version;
        return cached;
      }
    } catch {
      continue; // unreadable candidate
    }
  }
  return "unknown";
}
