/**
 * AWS integration module
 *
 * Credentials, client creation and the per-service lookups
 */

// Credentials
export {
  getCredentials,
  selectCredentialProvider,
} from './credentials.js';

// Verification
export {
  verifyCredentials,
  formatAccountInfo,
} from './verify.js';

// Client creation
export {
  DEFAULT_REGION,
  createEC2Client,
  createS3Client,
  createRoute53Client,
  createSTSClient,
} from './client.js';

// EC2
export {
  INSTANCE_SUMMARY_ATTRIBUTES,
  describeInstance,
  describeSubnet,
  describeVpc,
  describeVolume,
  describeSnapshot,
} from './ec2-resources.js';

// S3
export {
  getBucketRegion,
  getBucketVersioningStatus,
  getBucketTags,
  describeBucket,
  describeObject,
} from './s3-resources.js';

// Route53
export {
  Route53ZoneLookup,
  extractHostedZoneId,
  isZoneSuffix,
  toFqdn,
  type Route53ZoneLookupOptions,
  type ZoneRecord,
} from './route53-zones.js';

export { toDescribedResource, pickAttributes } from './records.js';

// Re-export types
export type {
  AWSCredentials,
  AWSAccountInfo,
  AwsClientConfig,
  CredentialSource,
  CredentialResolution,
} from '../../types/aws.js';
