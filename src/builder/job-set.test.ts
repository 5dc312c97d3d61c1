/**
 * Tests for the job set builder.
 */

import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { SHARED_SETTINGS_KEY } from '../schemas/job.js';
import { buildJobSet, jobKeys, mergeSharedSettings } from './job-set.js';

const logger = pino({ level: 'silent' });

describe('mergeSharedSettings', () => {
  it('should let job fields win and default the name to the key', () => {
    expect(
      mergeSharedSettings(
        'web',
        { image: 'nginx' },
        { image: 'alpine', comment: 'shared' },
      ),
    ).toEqual({ name: 'web', image: 'nginx', comment: 'shared' });
  });
});

describe('jobKeys', () => {
  it('should sort by code point and drop the shared settings key', () => {
    expect(
      jobKeys({ zeta: {}, [SHARED_SETTINGS_KEY]: {}, beta: {}, Alpha: {} }),
    ).toEqual(['Alpha', 'beta', 'zeta']);
  });
});

describe('buildJobSet', () => {
  it('should merge shared settings into every job', () => {
    const build = buildJobSet(
      {
        [SHARED_SETTINGS_KEY]: {
          image: 'alpine',
          dockerargs: '--rm',
          comment: 'shared',
        },
        a: { schedule: '@hourly', command: 'echo a' },
        b: {
          schedule: '@daily',
          command: 'echo b',
          comment: 'own',
          image: 'busybox',
        },
      },
      { logger, env: {} },
    );

    expect(build.skipped).toEqual([]);
    expect(build.units.map((unit) => unit.id)).toEqual(['a', 'b']);
    expect(build.units[0]?.comment).toBe('shared');
    expect(build.units[0]?.primary).toEqual({
      kind: 'run',
      dockerArgs: ['--rm'],
      flags: ['--name', 'a'],
      image: 'alpine',
      command: ['echo', 'a'],
    });
    expect(build.units[1]?.comment).toBe('own');
    expect(build.units[1]?.primary).toMatchObject({ image: 'busybox' });
  });

  it('should give colliding names distinct identifiers', () => {
    let next = 0;
    const build = buildJobSet(
      {
        backup: { schedule: '@daily', command: 'true' },
        Backup: { schedule: '@daily', command: 'true' },
        x: { name: 'Sync', schedule: '@daily', command: 'true' },
        y: { name: 'sync', schedule: '@daily', command: 'true' },
      },
      { logger, generateId: () => `job-${String(++next)}` },
    );

    expect(build.units.map((unit) => [unit.name, unit.id])).toEqual([
      ['Backup', 'backup'],
      ['backup', 'job-1'],
      ['Sync', 'sync'],
      ['sync', 'job-2'],
    ]);
  });

  it('should skip broken jobs and keep compiling the rest', () => {
    const warn = vi.spyOn(logger, 'warn');
    const build = buildJobSet(
      {
        broken: { command: 'echo x' },
        fine: { schedule: '@hourly', command: 'true' },
        idle: { schedule: '@hourly' },
        oops: 'not a job',
        shaped: { schedule: '@hourly', command: 'true', volumes: 'a:/a' },
      },
      { logger },
    );

    expect(build.units.map((unit) => unit.id)).toEqual(['fine']);
    expect(build.skipped.map((skip) => [skip.key, skip.reason])).toEqual([
      ['broken', 'schedule missing'],
      ['idle', 'command missing'],
      ['oops', 'definition is not an object'],
      ['shaped', expect.stringMatching(/^invalid definition \(volumes: /)],
    ]);
    expect(warn).toHaveBeenCalledWith(
      {
        job: 'broken',
        definition: expect.objectContaining({ name: 'broken', command: 'echo x' }),
      },
      "'broken' skipped: schedule missing",
    );
    warn.mockRestore();
  });

  it('should collect onstart jobs in build order', () => {
    const build = buildJobSet(
      {
        c: { schedule: '@daily', command: 'true', onstart: true },
        a: { schedule: '@daily', command: 'true', onstart: true },
        b: { schedule: '@daily', command: 'true' },
      },
      { logger },
    );

    expect(build.onstart.map((unit) => unit.id)).toEqual(['a', 'c']);
  });

  it('should fix @random draws at build time', () => {
    const build = buildJobSet(
      { jitter: { schedule: '@random @m @h', command: 'true' } },
      { logger, random: () => 0.5 },
    );

    expect(build.units[0]?.cron).toBe('30 12 * * *');
  });

  it('should log skipped triggers without dropping the job', () => {
    const warn = vi.spyOn(logger, 'warn');
    const build = buildJobSet(
      {
        report: {
          schedule: '@daily',
          command: 'true',
          trigger: [{ image: 'alpine' }, { command: 'notify' }],
        },
      },
      { logger },
    );

    expect(build.units[0]?.triggers).toEqual([
      { kind: 'command', command: 'notify' },
    ]);
    expect(warn).toHaveBeenCalledWith(
      { job: 'report', trigger: { image: 'alpine' } },
      "'report' trigger skipped: trigger command missing",
    );
    warn.mockRestore();
  });
});
