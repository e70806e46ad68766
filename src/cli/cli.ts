/**
 * CLI configuration
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { createDescribeCommand } from "./commands/describe.js";

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      packageJson &&
      typeof packageJson === "object" &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  return createDescribeCommand().version(getVersion());
}
