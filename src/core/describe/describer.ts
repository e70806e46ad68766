/**
 * Resource describer
 * Dispatches a descriptor to the lookup for its type and sub-type
 */

import type { AwsClientConfig } from '../../types/aws.js';
import type {
  ArnPassthroughDescriptor,
  DescribedResource,
  Ec2ResourceDescriptor,
  ResourceDescriptor,
  S3Descriptor,
  Route53Descriptor,
} from '../../types/resource.js';
import {
  DescribeError,
  UnsupportedResourceTypeError,
  errorMessage,
} from '../errors.js';
import { createEC2Client, createS3Client } from '../aws/client.js';
import {
  describeInstance,
  describeSnapshot,
  describeSubnet,
  describeVolume,
  describeVpc,
} from '../aws/ec2-resources.js';
import { describeBucket, describeObject } from '../aws/s3-resources.js';
import { Route53ZoneLookup } from '../aws/route53-zones.js';
import { toDescribedResource } from '../aws/records.js';

/**
 * Describe options
 */
export interface DescribeOptions extends AwsClientConfig {
  /** Whole EC2 instance record instead of the summary attributes */
  full?: boolean;

  /** Receives progress messages */
  log?: (message: string) => void;
}

function isPassthrough(
  descriptor: ResourceDescriptor
): descriptor is ArnPassthroughDescriptor {
  return descriptor.subType === null;
}

async function describeEc2(
  descriptor: Ec2ResourceDescriptor,
  options: DescribeOptions
): Promise<DescribedResource> {
  const client = createEC2Client(options);
  const log = options.log ?? (() => undefined);

  switch (descriptor.subType) {
    case 'instance':
      log(`Querying EC2 instance ${descriptor.name}`);
      return describeInstance(client, descriptor.name, options.full ?? false);
    case 'subnet':
      log(`Querying subnet ${descriptor.name}`);
      return describeSubnet(client, descriptor.name);
    case 'vpc':
      log(`Querying VPC ${descriptor.name}`);
      return describeVpc(client, descriptor.name);
    case 'volume':
      log(`Querying EBS volume ${descriptor.name}`);
      return describeVolume(client, descriptor.name);
    case 'snapshot':
      log(`Querying EBS snapshot ${descriptor.name}`);
      return describeSnapshot(client, descriptor.name);
    default:
      throw new UnsupportedResourceTypeError(descriptor.type, descriptor.subType);
  }
}

async function describeS3(
  descriptor: S3Descriptor,
  options: DescribeOptions
): Promise<DescribedResource> {
  const client = createS3Client(options);
  const log = options.log ?? (() => undefined);

  if (descriptor.subType === 'bucket') {
    log(`Querying S3 bucket ${descriptor.name}`);
    return describeBucket(client, descriptor.name);
  }

  const [bucket, key] = descriptor.name;
  log(`Querying S3 object ${key} in ${bucket}`);
  return describeObject(client, bucket, key);
}

async function describeRoute53(
  descriptor: Route53Descriptor,
  options: DescribeOptions
): Promise<DescribedResource> {
  if (descriptor.subType === 'record') {
    return toDescribedResource(descriptor.data);
  }

  options.log?.(`Querying hosted zone ${descriptor.name}`);
  return new Route53ZoneLookup(options).describeHostedZone(descriptor.name);
}

/**
 * Label used in error messages
 */
function resourceLabel(descriptor: ResourceDescriptor): string {
  const name =
    typeof descriptor.name === 'string' ? descriptor.name : descriptor.name.join('/');
  return `${descriptor.type} ${descriptor.subType ?? 'resource'} ${name}`;
}

async function dispatch(
  descriptor: ResourceDescriptor,
  options: DescribeOptions
): Promise<DescribedResource> {
  if (isPassthrough(descriptor)) {
    throw new UnsupportedResourceTypeError(descriptor.type, null);
  }

  switch (descriptor.type) {
    case 'ec2':
      return describeEc2(descriptor, options);
    case 's3':
      return describeS3(descriptor, options);
    case 'route53':
      return describeRoute53(descriptor, options);
    default:
      throw new UnsupportedResourceTypeError(descriptor.type, descriptor.subType);
  }
}

/**
 * Describe a classified resource
 *
 * @throws DescribeError wrapping any lookup failure
 */
export async function describe(
  descriptor: ResourceDescriptor,
  options: DescribeOptions = {}
): Promise<DescribedResource> {
  try {
    return await dispatch(descriptor, options);
  } catch (error) {
    if (error instanceof DescribeError) {
      throw error;
    }
    throw new DescribeError(
      `Failed to describe ${resourceLabel(descriptor)}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
