import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageManifestSchema = z.object({
  name: z.string(),
  version: z.string().min(1),
});

const MAX_PARENT_HOPS = 5;

/** Nearest directory at or above the module whose package.json is this CLI's. */
export function findCliPackageRoot(fromUrl: string = import.meta.url, packageName = "@keysweep/cli"): string | null {
  let dir = path.dirname(fileURLToPath(fromUrl));
  for (let i = 0; i <= MAX_PARENT_HOPS; i += 1) {
    const candidate = path.join(dir, "package.json");
    if (fs.existsSync(candidate)) {
      const parsed = PackageManifestSchema.safeParse(JSON.parse(fs.readFileSync(candidate, "utf8")));
      if (parsed.success && parsed.data.name === packageName) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

export function readCliVersion(rootDir: string | null = findCliPackageRoot()): string {
  if (!rootDir) throw new Error("cannot locate the keysweep package.json");
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(rootDir, "package.json"), "utf8"));
  const parsed = PackageManifestSchema.safeParse(raw);
  if (!parsed.success) throw new Error("missing version in package.json");
  return parsed.data.version;
}
