/**
 * Environment variables loader
 * Loads .env files from the working directory
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

const ENV_FILES = ['.env.local', '.env'];

/**
 * Load environment variables from .env files
 *
 * Priority (highest to lowest):
 * 1. Variables already set in the environment
 * 2. .env.local
 * 3. .env
 *
 * @param configDir - Directory containing .env files (defaults to process.cwd())
 * @returns the files that were loaded
 */
export function loadEnvFiles(configDir: string = process.cwd()): string[] {
  const loadedFiles: string[] = [];

  // dotenv never overrides a variable that is already set,
  // so loading from highest to lowest priority keeps the order above
  for (const file of ENV_FILES) {
    const filePath = resolve(configDir, file);

    if (existsSync(filePath)) {
      dotenvConfig({ path: filePath });
      loadedFiles.push(file);
    }
  }

  if (process.env.DESCRIBE_AWS_DEBUG === 'true' && loadedFiles.length > 0) {
    console.error(`[describe-aws-resource] Loaded environment files: ${loadedFiles.join(', ')}`);
  }

  return loadedFiles;
}

/**
 * Get the list of .env files that would be loaded
 * Useful for debugging and documentation
 */
export function getEnvFilePaths(
  configDir: string = process.cwd()
): { path: string; exists: boolean; priority: number }[] {
  return ENV_FILES.map((file, index) => ({
    path: resolve(configDir, file),
    exists: existsSync(resolve(configDir, file)),
    priority: ENV_FILES.length - index, // Higher number = higher priority
  }));
}
