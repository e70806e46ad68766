/**
 * AWS Credentials resolution
 */

import {
  fromEnv,
  fromIni,
  fromNodeProviderChain,
} from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type {
  AwsClientConfig,
  CredentialSource,
  CredentialResolution,
} from '../../types/aws.js';
import { CredentialError, errorMessage } from '../errors.js';

/**
 * Pick the credential provider for a run, in priority order:
 * 1. Profile given explicitly (--profile or AWS_PROFILE)
 * 2. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)
 * 3. SDK default chain (SSO, shared files, container and instance metadata)
 */
export function selectCredentialProvider(
  config: Pick<AwsClientConfig, 'profile'>,
  env: NodeJS.ProcessEnv = process.env
): { provider: AwsCredentialIdentityProvider; source: CredentialSource } {
  if (config.profile) {
    return { provider: fromIni({ profile: config.profile }), source: 'profile' };
  }
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    return { provider: fromEnv(), source: 'environment' };
  }
  return { provider: fromNodeProviderChain(), source: 'default-chain' };
}

/**
 * Resolve credentials for the run
 *
 * @throws CredentialError when no provider yields credentials
 */
export async function getCredentials(
  config: Pick<AwsClientConfig, 'profile'>
): Promise<CredentialResolution> {
  const { provider, source } = selectCredentialProvider(config);

  try {
    const credentials = await provider();
    return {
      credentials,
      source,
      profile: config.profile,
    };
  } catch (error) {
    throw new CredentialError(
      `Failed to resolve AWS credentials.\n` +
        `Set up AWS credentials or a profile in your environment:\n` +
        `  1. --profile <name> or AWS_PROFILE\n` +
        `  2. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)\n` +
        `  3. AWS shared files (~/.aws/credentials, ~/.aws/config)\n` +
        `  4. IAM role (EC2/ECS instance metadata)\n\n` +
        `Original error: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
