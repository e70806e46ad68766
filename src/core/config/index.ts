/**
 * Config system entry point
 */

import type { RunConfig } from '../../types/config.js';
import { ConfigError } from '../errors.js';
import { validateCliOptionsSafe } from './schema.js';

/**
 * Build the run configuration from command-line options and the environment
 *
 * Region falls back to AWS_REGION then AWS_DEFAULT_REGION, profile to AWS_PROFILE.
 * Left unset, the SDK resolves them itself.
 *
 * @example
 * ```ts
 * const config = loadRunConfig({ identifier: 'i-0123456789abcdef0', full: true });
 * ```
 *
 * @throws ConfigError when an option is invalid
 */
export function loadRunConfig(
  options: unknown,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const result = validateCliOptionsSafe(options);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid options:\n${details}`, { cause: result.error });
  }

  const parsed = result.data;

  return {
    identifier: parsed.identifier,
    region: parsed.region ?? (env.AWS_REGION || env.AWS_DEFAULT_REGION || undefined),
    profile: parsed.profile ?? (env.AWS_PROFILE || undefined),
    full: parsed.full,
    verbose: parsed.verbose,
    dryRun: parsed.dryRun,
  };
}

export { loadEnvFiles, getEnvFilePaths } from './env-loader.js';
export { cliOptionsSchema, validateCliOptionsSafe, type ParsedCliOptions } from './schema.js';
