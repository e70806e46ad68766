/**
 * S3 URL parsing
 */

import type { S3Descriptor } from '../../types/resource.js';
import { MalformedS3UrlError } from '../errors.js';

export const S3_URL_SCHEME = 's3://';

/**
 * Parse s3://<bucket>[/<key>]
 *
 * Without a key (or with only a trailing slash) the URL names the bucket.
 */
export function parseS3Url(url: string): S3Descriptor {
  const path = url.slice(S3_URL_SCHEME.length);
  const slash = path.indexOf('/');
  const bucket = slash === -1 ? path : path.slice(0, slash);
  const key = slash === -1 ? '' : path.slice(slash + 1);

  if (!bucket) {
    throw new MalformedS3UrlError(url, 'bucket name is empty');
  }

  if (!key) {
    return { type: 's3', subType: 'bucket', name: bucket };
  }
  return { type: 's3', subType: 'object', name: [bucket, key] };
}
