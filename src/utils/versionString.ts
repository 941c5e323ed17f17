import * as fs from "node:fs";
import * as path from "node:path";

type PackageInfoLike = {
  name?: unknown;
  version?: unknown;
};

let cachedVersion: string | undefined;

// version comes from the package.json next to src/ (or dist/).
export function getAppVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  try {
    const packagePath = path.resolve(__dirname, "..", "..", "package.json");
    const info: PackageInfoLike = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    cachedVersion = typeof info.version === "string" ? info.version : "unknown";
  } catch {
    cachedVersion = "unknown";
  }
  return cachedVersion;
}
