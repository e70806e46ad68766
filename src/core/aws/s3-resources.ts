/**
 * S3 bucket and object lookups
 */

import {
  S3Client,
  GetBucketLocationCommand,
  GetBucketVersioningCommand,
  GetBucketTaggingCommand,
  HeadObjectCommand,
} from '@aws-sdk/client-s3';
import type { DescribedResource } from '../../types/resource.js';
import { isNotFoundError } from '../errors.js';
import { DEFAULT_REGION } from './client.js';
import { toDescribedResource } from './records.js';

/**
 * Get bucket region
 * GetBucketLocation reports us-east-1 as an empty constraint and eu-west-1 as the legacy "EU"
 */
export async function getBucketRegion(
  client: S3Client,
  bucketName: string
): Promise<string> {
  const { LocationConstraint } = await client.send(
    new GetBucketLocationCommand({ Bucket: bucketName })
  );

  if (!LocationConstraint) {
    return DEFAULT_REGION;
  }
  return LocationConstraint === 'EU' ? 'eu-west-1' : LocationConstraint;
}

/**
 * Get bucket versioning status ("Enabled", "Suspended" or "Disabled")
 */
export async function getBucketVersioningStatus(
  client: S3Client,
  bucketName: string
): Promise<string> {
  const { Status } = await client.send(
    new GetBucketVersioningCommand({ Bucket: bucketName })
  );
  return Status ?? 'Disabled';
}

/**
 * Get bucket tags
 * A bucket without a tag set yields an empty mapping; other failures are thrown
 */
export async function getBucketTags(
  client: S3Client,
  bucketName: string
): Promise<Record<string, string>> {
  try {
    const result = await client.send(
      new GetBucketTaggingCommand({
        Bucket: bucketName,
      })
    );

    const tags: Record<string, string> = {};
    for (const tag of result.TagSet ?? []) {
      if (tag.Key) {
        tags[tag.Key] = tag.Value ?? '';
      }
    }
    return tags;
  } catch (error: unknown) {
    if (isNotFoundError(error, ['NoSuchTagSet', 'NoSuchTagSetError'])) {
      return {};
    }
    throw error;
  }
}

/**
 * Describe a bucket: region, versioning status and tags
 */
export async function describeBucket(
  client: S3Client,
  bucketName: string
): Promise<DescribedResource> {
  const region = await getBucketRegion(client, bucketName);
  const status = await getBucketVersioningStatus(client, bucketName);
  const tags = await getBucketTags(client, bucketName);

  return {
    name: bucketName,
    region,
    versioning: { status },
    tags,
  };
}

/**
 * Describe an object: HEAD metadata merged over its bucket, key and region
 */
export async function describeObject(
  client: S3Client,
  bucketName: string,
  key: string
): Promise<DescribedResource> {
  const region = await getBucketRegion(client, bucketName);
  const head = await client.send(
    new HeadObjectCommand({ Bucket: bucketName, Key: key })
  );

  return {
    bucket: bucketName,
    key,
    region,
    ...toDescribedResource(head),
  };
}
