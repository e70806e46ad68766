/**
 * Environment loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getEnvFilePaths, loadEnvFiles } from '../../../core/config/env-loader.js';

describe('Environment Loader', () => {
  describe('getEnvFilePaths', () => {
    it('should return file paths in priority order', () => {
      const testDir = '/test/project';
      const paths = getEnvFilePaths(testDir);

      expect(paths).toHaveLength(2);

      expect(paths[0].path).toBe(`${testDir}/.env.local`);
      expect(paths[0].priority).toBe(2);

      expect(paths[1].path).toBe(`${testDir}/.env`);
      expect(paths[1].priority).toBe(1);
    });

    it('should use process.cwd() as default directory', () => {
      const cwd = process.cwd();
      const paths = getEnvFilePaths();

      expect(paths[0].path).toBe(`${cwd}/.env.local`);
      expect(paths[1].path).toBe(`${cwd}/.env`);
    });
  });

  describe('loadEnvFiles', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'describe-env-'));
      delete process.env.DESCRIBE_TEST_PROFILE;
      delete process.env.DESCRIBE_TEST_REGION;
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
      delete process.env.DESCRIBE_TEST_PROFILE;
      delete process.env.DESCRIBE_TEST_REGION;
    });

    it('should load nothing when no files exist', () => {
      expect(loadEnvFiles(testDir)).toEqual([]);
    });

    it('should let .env.local win over .env', () => {
      writeFileSync(
        join(testDir, '.env'),
        'DESCRIBE_TEST_PROFILE=from-env\nDESCRIBE_TEST_REGION=eu-west-1\n'
      );
      writeFileSync(join(testDir, '.env.local'), 'DESCRIBE_TEST_PROFILE=from-local\n');

      expect(loadEnvFiles(testDir)).toEqual(['.env.local', '.env']);
      expect(process.env.DESCRIBE_TEST_PROFILE).toBe('from-local');
      expect(process.env.DESCRIBE_TEST_REGION).toBe('eu-west-1');
    });

    it('should not override variables already set', () => {
      process.env.DESCRIBE_TEST_PROFILE = 'from-shell';
      writeFileSync(join(testDir, '.env'), 'DESCRIBE_TEST_PROFILE=from-env\n');

      loadEnvFiles(testDir);

      expect(process.env.DESCRIBE_TEST_PROFILE).toBe('from-shell');
    });
  });
});
