import { readFileSync } from "node:fs";

// Resolved from both src/shared (tsx, vitest) and dist/src/shared (build output).
const CANDIDATES = ["../../package.json", "../../../package.json"];

function loadPackageVersion(): string {
  for (const candidate of CANDIDATES) {
    try {
      const contents = readFileSync(new URL(candidate, import.meta.url), "utf-8");
      const metadata: unknown = JSON.parse(contents);
      if (metadata && typeof metadata === "object" && "version" in metadata && typeof metadata.version === "string") {
        return metadata.version;
      }
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        continue;
      }
      throw error;
    }
  }
  throw new Error("Failed to read package metadata: package.json not found");
}

export const PACKAGE_VERSION = loadPackageVersion();
