import * as fs from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({ name: z.string(), version: z.string() });

function readVersionFromPackageJson(): string | null {
  // Sources sit one level below package.json; the build output two
  for (const relative of ["../package.json", "../../package.json"]) {
    try {
      const text = fs.readFileSync(new URL(relative, import.meta.url), "utf-8");
      const parsed = packageJsonSchema.safeParse(JSON.parse(text));
      if (parsed.success && parsed.data.name === "converge") return parsed.data.version;
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
    }
  }
  return null;
}

// Single source of truth for the current converge version.
// - Release builds: env var.
// - Dev/npm builds: package.json.
export const VERSION = process.env.CONVERGE_VERSION || readVersionFromPackageJson() || "0.0.0";
