/**
 * Tests for job set discovery and parsing.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { StartupError } from './errors.js';
import { findJobSetFile, loadJobSet, parseJobSet } from './job-set-loader.js';

describe('findJobSetFile', () => {
  let homeDir: string;

  beforeEach(() => {
    homeDir = mkdtempSync(join(tmpdir(), 'cronbox-jobs-'));
  });

  afterEach(() => {
    rmSync(homeDir, { recursive: true, force: true });
  });

  it('should prefer config.json, then config.yml, then config.yaml', () => {
    writeFileSync(join(homeDir, 'config.yaml'), '{}');
    expect(findJobSetFile(homeDir)).toBe(join(homeDir, 'config.yaml'));

    writeFileSync(join(homeDir, 'config.yml'), '{}');
    expect(findJobSetFile(homeDir)).toBe(join(homeDir, 'config.yml'));

    writeFileSync(join(homeDir, 'config.json'), '{}');
    expect(findJobSetFile(homeDir)).toBe(join(homeDir, 'config.json'));
  });

  it('should fail when no job set file exists', () => {
    expect(() => findJobSetFile(homeDir)).toThrow(StartupError);
  });

  it('should use an explicit path and fail when it is missing', () => {
    const path = join(homeDir, 'jobs.yml');
    expect(() => findJobSetFile(homeDir, path)).toThrow(
      `Job set file not found: ${path}`,
    );

    writeFileSync(path, '');
    expect(findJobSetFile(homeDir, path)).toBe(path);
  });

  it('should load and parse the file it finds', () => {
    writeFileSync(
      join(homeDir, 'config.json'),
      JSON.stringify({ ping: { schedule: '@hourly', command: 'true' } }),
    );

    expect(loadJobSet(homeDir)).toEqual({
      path: join(homeDir, 'config.json'),
      jobSet: { ping: { schedule: '@hourly', command: 'true' } },
    });
  });
});

describe('parseJobSet', () => {
  it('should parse YAML', () => {
    const text = [
      '~~shared-settings:',
      '  image: alpine',
      'backup:',
      "  schedule: '@daily'",
      '  command: echo hi',
      '  volumes:',
      '    - a:/a',
      '',
    ].join('\n');

    expect(parseJobSet(text, 'config.yml')).toEqual({
      '~~shared-settings': { image: 'alpine' },
      backup: { schedule: '@daily', command: 'echo hi', volumes: ['a:/a'] },
    });
  });

  it('should treat an empty document as an empty job set', () => {
    expect(parseJobSet('', 'config.yaml')).toEqual({});
  });

  it('should reject a list', () => {
    expect(() => parseJobSet('- a\n- b\n', 'config.yml')).toThrow(
      'Job set config.yml must be a mapping of job definitions',
    );
  });

  it('should reject malformed JSON', () => {
    expect(() => parseJobSet('{ nope', 'config.json')).toThrow(StartupError);
  });
});
