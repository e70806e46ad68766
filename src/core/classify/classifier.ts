/**
 * Identifier classification
 */

import type { ResourceDescriptor } from '../../types/resource.js';
import { UnrecognizedIdentifierError } from '../errors.js';
import { Route53ZoneLookup } from '../aws/route53-zones.js';
import { parseArn } from './arn.js';
import { parseS3Url, S3_URL_SCHEME } from './s3-url.js';
import { matchIdPrefix, looksLikeDnsName } from './id-prefix.js';

/**
 * Classification options
 */
export interface ClassifyOptions {
  /** Route53 lookup for DNS names; a default one is built on demand */
  route53?: Route53ZoneLookup;

  /** Receives progress messages */
  log?: (message: string) => void;
}

/**
 * Determine what type of AWS resource an identifier names
 *
 * Rules, first match wins:
 * 1. `arn:` prefix - parsed as an ARN, never falls through
 * 2. `s3://` prefix - bucket or object URL
 * 3. EC2 ID prefixes (`i-`, `subnet-`, `snap-`, `vol-`, `vpc-`)
 * 4. Dotted host name - Route53 hosted zone or record set
 *
 * @throws ClassificationError when no rule matches
 */
export async function classify(
  identifier: string,
  options: ClassifyOptions = {}
): Promise<ResourceDescriptor> {
  const log = options.log ?? (() => undefined);
  const trimmed = identifier.trim();

  if (!trimmed) {
    throw new UnrecognizedIdentifierError(trimmed);
  }

  log(`Parsing ${trimmed}`);

  if (trimmed.startsWith('arn:')) {
    log("It's an ARN.");
    return parseArn(trimmed);
  }

  if (trimmed.startsWith(S3_URL_SCHEME)) {
    log("It's an S3 URL.");
    return parseS3Url(trimmed);
  }

  const byPrefix = matchIdPrefix(trimmed);
  if (byPrefix) {
    return byPrefix;
  }

  if (looksLikeDnsName(trimmed)) {
    log("It looks like a DNS name, checking Route53.");
    const route53 = options.route53 ?? new Route53ZoneLookup({ log });
    const resolved = await route53.resolve(trimmed);
    if (resolved) {
      return resolved;
    }
  }

  throw new UnrecognizedIdentifierError(trimmed);
}

/**
 * One-line summary of a descriptor
 */
export function formatDescriptor(descriptor: ResourceDescriptor): string {
  const name =
    typeof descriptor.name === 'string' ? descriptor.name : descriptor.name.join('/');
  return `Resource : type = ${descriptor.type}, sub type = ${descriptor.subType ?? 'none'}, name = ${name}`;
}
