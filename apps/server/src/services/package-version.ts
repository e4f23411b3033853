import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

/**
 * Version of the nearest package.json at or above `startDir`
 *
 * Works from both `src/` and the compiled `dist/` tree, where the nearest
 * manifest is the workspace root's.
 */
export function readPackageVersion(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const manifest = path.join(dir, "package.json");
    if (existsSync(manifest)) {
      const parsed: unknown = JSON.parse(readFileSync(manifest, "utf-8"));
      if (
        parsed &&
        typeof parsed === "object" &&
        "version" in parsed &&
        typeof parsed.version === "string"
      ) {
        return parsed.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}
