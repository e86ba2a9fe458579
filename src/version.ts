import { createRequire } from "node:module";
import { z } from "zod";

const packageSchema = z.object({ version: z.string() });

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    const parsed = packageSchema.safeParse(require("../package.json"));
    return parsed.success ? parsed.data.version : null;
  } catch {
    return null;
  }
}

// Read from package.json; FLEET_BOOTSTRAP_VERSION overrides it for repackaged builds.
export const VERSION = process.env.FLEET_BOOTSTRAP_VERSION || readVersionFromPackageJson() || "0.0.0";
