/**
 * ARN parsing
 *
 * arn:aws:<service>:<region>:<account>:<resource>
 * e.g. arn:aws:ec2:us-east-2:123456789012:subnet/subnet-0abc1234
 *      arn:aws:s3:::my-bucket
 */

import type { ResourceDescriptor } from '../../types/resource.js';
import { MalformedArnError } from '../errors.js';

const ARN_PATTERN =
  /^arn:aws:(?<service>[^:]+):(?<region>[^:]*):(?<account>\d*):(?<resource>\S+)$/;

/**
 * ARN components
 */
export interface ArnParts {
  service: string;
  region: string;
  account: string;
  resource: string;
}

/**
 * Split an ARN into its components, or null when it does not match the ARN shape
 */
export function splitArn(arn: string): ArnParts | null {
  const groups = ARN_PATTERN.exec(arn)?.groups;
  if (!groups) {
    return null;
  }
  return {
    service: groups.service,
    region: groups.region,
    account: groups.account,
    resource: groups.resource,
  };
}

function splitResource(
  arn: string,
  resource: string,
  separator: string
): { subType: string; name: string } {
  const index = resource.indexOf(separator);
  const subType = resource.slice(0, index);
  const name = resource.slice(index + 1);

  if (index === -1 || !subType || !name) {
    throw new MalformedArnError(
      arn,
      `expected <type>${separator}<name> in resource '${resource}'`
    );
  }
  return { subType, name };
}

/**
 * Parse an ARN into a resource descriptor
 *
 * ec2 resources split on the first "/", rds resources on the first ":".
 * s3 ARNs always name the bucket. Other services pass through without a sub-type.
 */
export function parseArn(arn: string): ResourceDescriptor {
  const parts = splitArn(arn);
  if (!parts) {
    throw new MalformedArnError(
      arn,
      'expected arn:aws:<service>:<region>:<account>:<resource>'
    );
  }

  const { service, resource } = parts;

  switch (service) {
    case 'ec2':
      return { type: 'ec2', ...splitResource(arn, resource, '/') };
    case 'rds':
      return { type: 'rds', ...splitResource(arn, resource, ':') };
    case 's3':
      return { type: 's3', subType: 'bucket', name: resource };
    default:
      return { type: service, subType: null, name: resource };
  }
}
