/**
 * Describe command
 */

import { Command } from 'commander';
import ora from 'ora';
import * as logger from '../utils/logger.js';
import { loadEnvFiles, loadRunConfig } from '../../core/config/index.js';
import {
  formatAccountInfo,
  getCredentials,
  Route53ZoneLookup,
  verifyCredentials,
} from '../../core/aws/index.js';
import { classify, formatDescriptor } from '../../core/classify/index.js';
import { describe } from '../../core/describe/index.js';
import { formatJson } from '../../core/output/json.js';
import { CliError, EXIT_CODES, errorMessage } from '../../core/errors.js';
import type { DescribeCliOptions, RunConfig } from '../../types/config.js';
import type { AwsClientConfig } from '../../types/aws.js';

/**
 * Create describe command
 */
export function createDescribeCommand(): Command {
  const command = new Command('describe-aws-resource');

  command
    .description('Describe an AWS resource given its ID, ARN, S3 URL or DNS name')
    .requiredOption(
      '-i, --identifier <identifier>',
      'identifier for the resource, a name or ARN'
    )
    .option(
      '-r, --region <region>',
      'region the resource is in (defaults to the environment or profile region)'
    )
    .option('-p, --profile <profile>', 'AWS CLI profile to use for this query')
    .option('--full', 'return all info about the resource (EC2 instances)')
    .option('--verbose', 'print classification steps on stderr')
    .option('--dry-run', 'classify the identifier without describing it')
    .action(async (options: DescribeCliOptions) => {
      const exitCode = await runDescribe(options);
      if (exitCode !== EXIT_CODES.success) {
        process.exit(exitCode);
      }
    });

  return command;
}

/**
 * Describe command handler
 *
 * @returns process exit code
 */
export async function runDescribe(options: DescribeCliOptions): Promise<number> {
  try {
    await describeCommand(options);
    return EXIT_CODES.success;
  } catch (error: unknown) {
    logger.error(errorMessage(error));
    return error instanceof CliError ? error.exitCode : 1;
  }
}

/**
 * Pre-flight identity check; returns the client settings every later call uses
 */
async function authenticate(config: RunConfig): Promise<AwsClientConfig> {
  const spinner = ora({
    text: 'Verifying AWS credentials...',
    isSilent: !config.verbose,
  }).start();

  try {
    const { credentials } = await getCredentials(config);
    const clientConfig: AwsClientConfig = {
      region: config.region,
      profile: config.profile,
      credentials,
    };
    const account = await verifyCredentials(clientConfig);
    spinner.succeed(`Authenticated to ${formatAccountInfo(account)}`);
    return clientConfig;
  } catch (error) {
    spinner.fail('AWS credentials check failed');
    throw error;
  }
}

async function describeCommand(options: DescribeCliOptions): Promise<void> {
  loadEnvFiles();
  const config = loadRunConfig(options);
  const log = (message: string): void => logger.verbose(message, config.verbose);

  const clientConfig = await authenticate(config);

  const descriptor = await classify(config.identifier, {
    route53: new Route53ZoneLookup({ ...clientConfig, log }),
    log,
  });

  if (config.dryRun) {
    console.log(formatDescriptor(descriptor));
    return;
  }
  log(formatDescriptor(descriptor));

  const result = await describe(descriptor, {
    ...clientConfig,
    full: config.full,
    log,
  });

  console.log(formatJson(result));
}
