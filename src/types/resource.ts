/**
 * Resource descriptor types
 */

import type { ResourceRecordSet } from "@aws-sdk/client-route-53";

/**
 * EC2 sub-types recognised from bare resource IDs
 */
export type Ec2SubType = "instance" | "subnet" | "snapshot" | "volume" | "vpc";

/**
 * EC2 resource. ARNs may carry sub-types outside {@link Ec2SubType}.
 */
export interface Ec2ResourceDescriptor {
  readonly type: "ec2";
  readonly subType: string;
  readonly name: string;
}

/**
 * RDS resource parsed from an ARN (`db`, `cluster`, `snapshot`, ...)
 */
export interface RdsResourceDescriptor {
  readonly type: "rds";
  readonly subType: string;
  readonly name: string;
}

export interface S3BucketDescriptor {
  readonly type: "s3";
  readonly subType: "bucket";
  readonly name: string;
}

export interface S3ObjectDescriptor {
  readonly type: "s3";
  readonly subType: "object";
  readonly name: readonly [bucket: string, key: string];
}

export interface Route53ZoneDescriptor {
  readonly type: "route53";
  readonly subType: "hosted_zone";
  /** Hosted zone ID as Route 53 returns it, e.g. `/hostedzone/Z123` */
  readonly name: string;
}

export interface Route53RecordDescriptor {
  readonly type: "route53";
  readonly subType: "record";
  readonly name: string;
  /** Record set found while classifying; describing it needs no further call */
  readonly data: ResourceRecordSet;
}

/**
 * Any other ARN service, passed through with no sub-type
 */
export interface ArnPassthroughDescriptor {
  readonly type: string;
  readonly subType: null;
  readonly name: string;
}

export type S3Descriptor = S3BucketDescriptor | S3ObjectDescriptor;

export type Route53Descriptor = Route53ZoneDescriptor | Route53RecordDescriptor;

/**
 * Classification result
 */
export type ResourceDescriptor =
  | Ec2ResourceDescriptor
  | RdsResourceDescriptor
  | S3Descriptor
  | Route53Descriptor
  | ArnPassthroughDescriptor;

/**
 * Final output document
 */
export type DescribedResource = Record<string, unknown>;
