/**
 * describe-aws-resource
 *
 * Main library exports
 */

// Export types
export * from './types/aws.js';
export * from './types/config.js';
export * from './types/resource.js';

// Export core functionality
export * from './core/errors.js';
export * from './core/config/index.js';
export * from './core/aws/index.js';
export * from './core/classify/index.js';
export * from './core/describe/index.js';
export { formatJson } from './core/output/json.js';
