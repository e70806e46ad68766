/**
 * AWS Client creation helpers
 */

import { EC2Client } from '@aws-sdk/client-ec2';
import { Route53Client } from '@aws-sdk/client-route-53';
import { S3Client } from '@aws-sdk/client-s3';
import { STSClient } from '@aws-sdk/client-sts';
import type { AwsClientConfig } from '../../types/aws.js';

/**
 * Region used for global endpoints (Route 53, STS without a configured region)
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Create EC2 client
 */
export function createEC2Client(config: AwsClientConfig): EC2Client {
  return new EC2Client({
    region: config.region,
    profile: config.profile,
    credentials: config.credentials,
  });
}

/**
 * Create S3 client
 * Note: region redirects are followed so buckets in any region can be read
 */
export function createS3Client(config: AwsClientConfig): S3Client {
  return new S3Client({
    region: config.region,
    profile: config.profile,
    credentials: config.credentials,
    followRegionRedirects: true,
  });
}

/**
 * Create Route53 client
 * Note: Route53 is a global service served from us-east-1
 */
export function createRoute53Client(config: AwsClientConfig): Route53Client {
  return new Route53Client({
    region: DEFAULT_REGION,
    profile: config.profile,
    credentials: config.credentials,
  });
}

/**
 * Create STS client
 */
export function createSTSClient(config: AwsClientConfig): STSClient {
  return new STSClient({
    region: config.region ?? DEFAULT_REGION,
    profile: config.profile,
    credentials: config.credentials,
  });
}
