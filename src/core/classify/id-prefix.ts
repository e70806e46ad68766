/**
 * Bare AWS resource IDs
 */

import type { Ec2ResourceDescriptor, Ec2SubType } from '../../types/resource.js';

/**
 * ID prefixes, tested in order
 */
export const EC2_ID_PREFIXES: ReadonlyArray<readonly [prefix: string, subType: Ec2SubType]> = [
  ['i-', 'instance'],
  ['subnet-', 'subnet'],
  ['snap-', 'snapshot'],
  ['vol-', 'volume'],
  ['vpc-', 'vpc'],
];

/**
 * Match a bare EC2 ID such as i-0123456789abcdef0 or vpc-0abc
 */
export function matchIdPrefix(identifier: string): Ec2ResourceDescriptor | null {
  const match = EC2_ID_PREFIXES.find(([prefix]) => identifier.startsWith(prefix));
  return match ? { type: 'ec2', subType: match[1], name: identifier } : null;
}

const DNS_NAME_PATTERN = /^[-\w]+(\.[-\w]+)+\.?$/;

/**
 * True for dotted host names like www.example.com or example.com.
 */
export function looksLikeDnsName(identifier: string): boolean {
  return DNS_NAME_PATTERN.test(identifier);
}
