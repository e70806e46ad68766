/**
 * AWS-related type definitions
 */

import type { AwsCredentialIdentity } from "@aws-sdk/types";

/**
 * AWS credentials (from AWS SDK)
 */
export type AWSCredentials = AwsCredentialIdentity;

/**
 * AWS account information from STS
 */
export interface AWSAccountInfo {
  /** AWS Account ID */
  accountId: string;

  /** Caller ARN */
  arn: string;

  /** User ID */
  userId: string;
}

/**
 * Credential source type
 */
export type CredentialSource = "profile" | "environment" | "default-chain";

/**
 * Credential resolution result
 */
export interface CredentialResolution {
  /** Resolved credentials */
  credentials: AWSCredentials;

  /** Source of credentials */
  source: CredentialSource;

  /** Profile name (if using profile) */
  profile?: string;
}

/**
 * Settings shared by every SDK client the tool builds
 */
export interface AwsClientConfig {
  /** Region override; the SDK resolves one from the environment when absent */
  region?: string;

  /** Shared config/credentials profile */
  profile?: string;

  /** Credentials already resolved by the pre-flight check */
  credentials?: AWSCredentials;
}
