/**
 * Run configuration tests
 */

import { describe, it, expect } from '@jest/globals';
import { loadRunConfig } from '../../../core/config/index.js';
import { validateCliOptionsSafe } from '../../../core/config/schema.js';
import { ConfigError } from '../../../core/errors.js';

describe('validateCliOptionsSafe', () => {
  it('should apply defaults for boolean flags', () => {
    const result = validateCliOptionsSafe({ identifier: 'i-0123' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        identifier: 'i-0123',
        full: false,
        verbose: false,
        dryRun: false,
      });
    }
  });

  it('should reject an invalid region', () => {
    const result = validateCliOptionsSafe({ identifier: 'i-0123', region: 'moon-1' });

    expect(result.success).toBe(false);
  });

  it('should accept partition-style regions', () => {
    expect(
      validateCliOptionsSafe({ identifier: 'i-0123', region: 'us-gov-west-1' }).success
    ).toBe(true);
  });
});

describe('loadRunConfig', () => {
  it('should trim the identifier and keep explicit options', () => {
    const config = loadRunConfig(
      {
        identifier: '  s3://my-bucket  ',
        region: 'eu-west-1',
        profile: 'audit',
        full: true,
        dryRun: true,
      },
      { AWS_REGION: 'us-west-2', AWS_PROFILE: 'default' }
    );

    expect(config).toEqual({
      identifier: 's3://my-bucket',
      region: 'eu-west-1',
      profile: 'audit',
      full: true,
      verbose: false,
      dryRun: true,
    });
  });

  it('should fall back to the environment for region and profile', () => {
    const config = loadRunConfig(
      { identifier: 'vpc-0123abcd' },
      { AWS_DEFAULT_REGION: 'ca-central-1', AWS_PROFILE: 'readonly' }
    );

    expect(config.region).toBe('ca-central-1');
    expect(config.profile).toBe('readonly');
  });

  it('should prefer AWS_REGION over AWS_DEFAULT_REGION', () => {
    const config = loadRunConfig(
      { identifier: 'vpc-0123abcd' },
      { AWS_REGION: 'us-west-1', AWS_DEFAULT_REGION: 'ca-central-1' }
    );

    expect(config.region).toBe('us-west-1');
  });

  it('should leave region and profile unset when nothing provides them', () => {
    const config = loadRunConfig({ identifier: 'vpc-0123abcd' }, {});

    expect(config.region).toBeUndefined();
    expect(config.profile).toBeUndefined();
  });

  it('should throw ConfigError listing invalid options', () => {
    expect(() => loadRunConfig({ identifier: 'i-0123', region: 'nowhere' }, {})).toThrow(
      ConfigError
    );
    expect(() => loadRunConfig({ identifier: 'i-0123', region: 'nowhere' }, {})).toThrow(
      'region: Must be a valid AWS region (e.g., us-east-1)'
    );
  });
});
