/**
 * AWS Credentials verification using STS
 */

import { GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { AwsClientConfig, AWSAccountInfo } from '../../types/aws.js';
import { CredentialError, errorMessage } from '../errors.js';
import { createSTSClient } from './client.js';

/**
 * Verify AWS credentials by calling STS GetCallerIdentity
 *
 * @returns AWS account information
 * @throws CredentialError if the identity check fails
 */
export async function verifyCredentials(
  config: AwsClientConfig
): Promise<AWSAccountInfo> {
  const client = createSTSClient(config);

  try {
    const response = await client.send(new GetCallerIdentityCommand({}));

    if (!response.Account || !response.Arn || !response.UserId) {
      throw new Error('Invalid STS response: missing required fields');
    }

    return {
      accountId: response.Account,
      arn: response.Arn,
      userId: response.UserId,
    };
  } catch (error) {
    throw new CredentialError(
      `AWS credentials verification failed: ${errorMessage(error)}\n` +
        `Set up AWS credentials or a profile in your environment.`,
      { cause: error }
    );
  }
}

/**
 * Format AWS account info for display
 */
export function formatAccountInfo(info: AWSAccountInfo): string {
  return `account ${info.accountId} as ${info.arn}`;
}
