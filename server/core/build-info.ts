import { execSync } from "child_process";
import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import type { BuildInfo } from "@shared/schema";

const packageJsonSchema = z.object({ version: z.string() });

function execGitCommand(command: string, fallback: string): string {
  if (process.env.NODE_ENV === "production") {
    return fallback;
  }

  try {
    return execSync(command, { encoding: "utf-8", stdio: ["pipe", "pipe", "ignore"] }).trim();
  } catch {
    return fallback;
  }
}

function readPackageVersion(): string {
  try {
    const pkg = packageJsonSchema.safeParse(
      JSON.parse(readFileSync(path.resolve(process.cwd(), "package.json"), "utf-8"))
    );
    return pkg.success ? pkg.data.version : "unknown";
  } catch {
    // package.json fehlt z.B. im Container-Image ohne Quellen
    return "unknown";
  }
}

const STARTUP_TIME = new Date().toISOString();
let cachedBuildInfo: BuildInfo | null = null;

/**
 * Version aus package.json, Branch/Commit/Zeit aus BUILD_* oder git.
 */
export function getBuildInfo(): BuildInfo {
  if (cachedBuildInfo) {
    return cachedBuildInfo;
  }

  cachedBuildInfo = {
    version: readPackageVersion(),
    branch: process.env.BUILD_BRANCH || execGitCommand("git rev-parse --abbrev-ref HEAD", "production"),
    commit: process.env.BUILD_COMMIT || execGitCommand("git rev-parse --short HEAD", "n/a"),
    buildTime: process.env.BUILD_TIME || STARTUP_TIME,
  };

  return cachedBuildInfo;
}
