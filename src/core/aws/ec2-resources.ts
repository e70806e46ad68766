/**
 * EC2 resource lookups
 */

import {
  EC2Client,
  DescribeInstancesCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
  DescribeVolumesCommand,
  DescribeSnapshotsCommand,
} from '@aws-sdk/client-ec2';
import type { DescribedResource } from '../../types/resource.js';
import { DescribeError } from '../errors.js';
import { pickAttributes, toDescribedResource } from './records.js';

/**
 * Instance attributes kept unless the full record is requested
 */
export const INSTANCE_SUMMARY_ATTRIBUTES: ReadonlySet<string> = new Set([
  'InstanceType',
  'PrivateIpAddress',
  'SecurityGroups',
  'SubnetId',
  'VpcId',
]);

function firstOrNotFound<T>(
  items: T[] | undefined,
  label: string,
  id: string
): T {
  const [item] = items ?? [];
  if (item === undefined) {
    throw new DescribeError(`No ${label} found with ID ${id}`);
  }
  return item;
}

/**
 * Describe an EC2 instance
 *
 * @param full - return the whole record instead of {@link INSTANCE_SUMMARY_ATTRIBUTES}
 */
export async function describeInstance(
  client: EC2Client,
  instanceId: string,
  full: boolean = false
): Promise<DescribedResource> {
  const response = await client.send(
    new DescribeInstancesCommand({ InstanceIds: [instanceId] })
  );

  const reservation = firstOrNotFound(response.Reservations, 'EC2 instance', instanceId);
  const instance = firstOrNotFound(reservation.Instances, 'EC2 instance', instanceId);

  return full
    ? toDescribedResource(instance)
    : pickAttributes(instance, INSTANCE_SUMMARY_ATTRIBUTES);
}

export async function describeSubnet(
  client: EC2Client,
  subnetId: string
): Promise<DescribedResource> {
  const response = await client.send(
    new DescribeSubnetsCommand({ SubnetIds: [subnetId] })
  );
  return toDescribedResource(firstOrNotFound(response.Subnets, 'subnet', subnetId));
}

export async function describeVpc(
  client: EC2Client,
  vpcId: string
): Promise<DescribedResource> {
  const response = await client.send(new DescribeVpcsCommand({ VpcIds: [vpcId] }));
  return toDescribedResource(firstOrNotFound(response.Vpcs, 'VPC', vpcId));
}

export async function describeVolume(
  client: EC2Client,
  volumeId: string
): Promise<DescribedResource> {
  const response = await client.send(
    new DescribeVolumesCommand({ VolumeIds: [volumeId] })
  );
  return toDescribedResource(firstOrNotFound(response.Volumes, 'EBS volume', volumeId));
}

export async function describeSnapshot(
  client: EC2Client,
  snapshotId: string
): Promise<DescribedResource> {
  const response = await client.send(
    new DescribeSnapshotsCommand({ SnapshotIds: [snapshotId] })
  );
  return toDescribedResource(
    firstOrNotFound(response.Snapshots, 'EBS snapshot', snapshotId)
  );
}
