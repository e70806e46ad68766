/**
 * Identifier classification module
 */

export { classify, formatDescriptor, type ClassifyOptions } from './classifier.js';
export { parseArn, splitArn, type ArnParts } from './arn.js';
export { parseS3Url } from './s3-url.js';
export { matchIdPrefix, looksLikeDnsName, EC2_ID_PREFIXES } from './id-prefix.js';
