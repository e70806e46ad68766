/**
 * Resource describer module
 */

export { describe, type DescribeOptions } from './describer.js';
