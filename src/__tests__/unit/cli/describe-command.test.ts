/**
 * Describe command tests
 */

import { describe, it, expect, beforeEach, afterEach, afterAll, jest } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { EC2Client, DescribeInstancesCommand } from '@aws-sdk/client-ec2';
import { Route53Client, ListHostedZonesCommand } from '@aws-sdk/client-route-53';
import { runDescribe } from '../../../cli/commands/describe.js';
import { createProgram } from '../../../cli/cli.js';

function spyOnLog() {
  return jest.spyOn(console, 'log').mockImplementation(() => undefined);
}

function spyOnError() {
  return jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

describe('describe command', () => {
  const stsMock = mockClient(STSClient);
  const ec2Mock = mockClient(EC2Client);
  const route53Mock = mockClient(Route53Client);
  let logSpy: ReturnType<typeof spyOnLog>;
  let errorSpy: ReturnType<typeof spyOnError>;

  beforeEach(() => {
    stsMock.reset();
    ec2Mock.reset();
    route53Mock.reset();
    stsMock.on(GetCallerIdentityCommand).resolves({
      Account: '123456789012',
      Arn: 'arn:aws:iam::123456789012:user/auditor',
      UserId: 'AIDAEXAMPLEUSERID',
    });
    logSpy = spyOnLog();
    errorSpy = spyOnError();
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  afterAll(() => {
    stsMock.restore();
    ec2Mock.restore();
    route53Mock.restore();
  });

  it('should print the descriptor and skip describe calls on dry run', async () => {
    const exitCode = await runDescribe({ identifier: 'i-0123456789abcdef0', dryRun: true });

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(
      'Resource : type = ec2, sub type = instance, name = i-0123456789abcdef0'
    );
    expect(ec2Mock.calls()).toHaveLength(0);
    expect(stsMock.commandCalls(GetCallerIdentityCommand)).toHaveLength(1);
  });

  it('should only make classification-time calls on a dry run of a DNS name', async () => {
    route53Mock.on(ListHostedZonesCommand).resolves({
      HostedZones: [{ Id: '/hostedzone/Z111', Name: 'example.com.', CallerReference: 'ref-1' }],
      IsTruncated: false,
    });

    const exitCode = await runDescribe({ identifier: 'example.com', dryRun: true });

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(
      'Resource : type = route53, sub type = hosted_zone, name = /hostedzone/Z111'
    );
    expect(route53Mock.calls()).toHaveLength(1);
  });

  it('should print the described resource as sorted JSON', async () => {
    ec2Mock.on(DescribeInstancesCommand).resolves({
      Reservations: [
        {
          Instances: [
            {
              VpcId: 'vpc-0123abcd',
              InstanceType: 't3.small',
              SubnetId: 'subnet-0abc1234',
              PrivateIpAddress: '10.0.1.15',
              SecurityGroups: [{ GroupName: 'web', GroupId: 'sg-0123' }],
              ImageId: 'ami-0abcdef1234567890',
            },
          ],
        },
      ],
    });

    const exitCode = await runDescribe({ identifier: 'i-0123456789abcdef0' });

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(
      [
        '{',
        '  "InstanceType": "t3.small",',
        '  "PrivateIpAddress": "10.0.1.15",',
        '  "SecurityGroups": [',
        '    {',
        '      "GroupId": "sg-0123",',
        '      "GroupName": "web"',
        '    }',
        '  ],',
        '  "SubnetId": "subnet-0abc1234",',
        '  "VpcId": "vpc-0123abcd"',
        '}',
      ].join('\n')
    );
  });

  it('should exit 1 when the identity check fails', async () => {
    stsMock.on(GetCallerIdentityCommand).rejects(new Error('ExpiredToken'));

    const exitCode = await runDescribe({ identifier: 'i-0123456789abcdef0' });

    expect(exitCode).toBe(1);
    expect(logSpy).not.toHaveBeenCalled();
    expect(ec2Mock.calls()).toHaveLength(0);
  });

  it('should exit 2 for an unrecognized identifier', async () => {
    const exitCode = await runDescribe({ identifier: 'not-a-recognized-id' });

    expect(exitCode).toBe(2);
    expect(errorSpy.mock.calls[0][1]).toBe(
      "Cannot determine what type of resource 'not-a-recognized-id' is."
    );
  });

  it('should exit 2 for a malformed ARN', async () => {
    await expect(runDescribe({ identifier: 'arn:aws:ec2:us-east-1:123456789012:vpc-1' })).resolves.toBe(2);
  });

  it('should exit 3 when describing fails', async () => {
    ec2Mock.on(DescribeInstancesCommand).rejects(new Error('UnauthorizedOperation'));

    await expect(runDescribe({ identifier: 'i-0123456789abcdef0' })).resolves.toBe(3);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should exit 1 for an invalid region option', async () => {
    await expect(
      runDescribe({ identifier: 'i-0123456789abcdef0', region: 'mars' })
    ).resolves.toBe(1);
    expect(stsMock.calls()).toHaveLength(0);
  });

  describe('createProgram', () => {
    it('should expose the package name and version', () => {
      const program = createProgram();

      expect(program.name()).toBe('describe-aws-resource');
      expect(program.version()).toBe('0.1.0');
    });

    it('should wire command-line flags to the handler', async () => {
      await createProgram().parseAsync(['--identifier', 'vol-0a1b2c3d', '--dry-run'], {
        from: 'user',
      });

      expect(logSpy).toHaveBeenCalledWith(
        'Resource : type = ec2, sub type = volume, name = vol-0a1b2c3d'
      );
      expect(ec2Mock.calls()).toHaveLength(0);
    });
  });
});
