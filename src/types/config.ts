/**
 * Run configuration types
 */

/**
 * Options as they arrive from the command line
 */
export interface DescribeCliOptions {
  identifier: string;
  region?: string;
  profile?: string;
  full?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
}

/**
 * Validated configuration for a single invocation
 */
export interface RunConfig {
  /** Trimmed resource identifier */
  identifier: string;

  /** Region from --region or the AWS_REGION / AWS_DEFAULT_REGION variables */
  region?: string;

  /** Profile from --profile or AWS_PROFILE */
  profile?: string;

  /** Return the whole EC2 instance record instead of the summary */
  full: boolean;

  /** Print classification steps on stderr */
  verbose: boolean;

  /** Classify only, skip the describe step */
  dryRun: boolean;
}
