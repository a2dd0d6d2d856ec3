import { readFileSync } from "node:fs";

function readVersionFromPackageJson(): string | null {
  try {
    // Same relative location from src/ and from dist/
    const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

export const VERSION = process.env.GUARDDUTY_EXPORT_VERSION || readVersionFromPackageJson() || "0.0.0";
