/**
 * Runner lifecycle tests: build, onstart, API, reload, startup failures.
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Action } from './compiler/actions.js';
import { StartupError } from './config/errors.js';
import { loadRunnerConfig } from './config/runner-config.js';
import { httpRequest } from './lib/http.js';
import type { Runner } from './runner.js';
import { createRunner } from './runner.js';
import type { Executor } from './scheduler/executor.js';
import type { RunnerConfig } from './schemas/config.js';

const logger = pino({ level: 'silent' });

describe('Runner', () => {
  let homeDir: string;
  let config: RunnerConfig;
  let runner: Runner;
  let executed: string[];
  let executor: Executor;

  const writeJobSet = (jobSet: Record<string, unknown>) => {
    writeFileSync(join(homeDir, 'config.json'), JSON.stringify(jobSet));
  };

  beforeEach(() => {
    homeDir = mkdtempSync(join(tmpdir(), 'cronbox-runner-'));
    config = {
      ...loadRunnerConfig(undefined, { HOME_DIR: homeDir }),
      port: 0,
      shutdownGraceMs: 1000,
      log: { level: 'silent' },
    };
    executed = [];
    executor = {
      run: vi.fn((action: Action) => {
        executed.push(action.kind === 'command' ? action.command : action.kind);
        return Promise.resolve({
          exitCode: 0,
          stdout: 'ok\n',
          stderr: '',
          stdoutSize: 3,
          stderrSize: 0,
        });
      }),
    };
    runner = createRunner(config, { executor, logger, handleSignals: false });
  });

  afterEach(async () => {
    await runner.stop();
    rmSync(homeDir, { recursive: true, force: true });
  });

  it('should build the schedule, run onstart jobs once and serve the API', async () => {
    writeJobSet({
      boot: { schedule: '0 0 1 1 *', command: 'warm-cache', onstart: true },
      report: { schedule: '0 0 1 1 *', command: 'make-report' },
    });

    await runner.start();

    expect(readFileSync(join(homeDir, 'crontab'), 'utf-8')).toBe(
      [
        `0 0 1 1 * ${join(homeDir, 'jobs', 'boot.sh')}`,
        `0 0 1 1 * ${join(homeDir, 'jobs', 'report.sh')}`,
        '',
      ].join('\n'),
    );
    expect(existsSync(join(homeDir, 'cronbox.sqlite'))).toBe(true);

    await vi.waitFor(() => {
      expect(runner.getTracker()?.query('boot', 10)[0]?.exitCode).toBe(0);
    });
    expect(executed).toEqual(['warm-cache']);
    expect(runner.getTracker()?.query('boot', 10)[0]?.triggeredBy).toBe('onstart');

    const address = runner.address();
    if (!address) throw new Error('not listening');
    const response = await httpRequest('GET', `${address}/jobs`);
    expect(response.statusCode).toBe(200);
    expect(
      Array.isArray(response.body) &&
        response.body.map((job: { name: string }) => job.name),
    ).toEqual(['boot', 'report']);
  });

  it('should reload without re-running onstart jobs', async () => {
    writeJobSet({
      boot: { schedule: '0 0 1 1 *', command: 'warm-cache', onstart: true },
    });
    await runner.start();
    await vi.waitFor(() => {
      expect(runner.getScheduler()?.getRunningCount()).toBe(0);
    });

    writeJobSet({
      boot: { schedule: '0 0 1 1 *', command: 'warm-cache', onstart: true },
      extra: { schedule: '@hourly', command: 'true' },
      broken: { command: 'true' },
    });

    expect(runner.reload()).toEqual({ jobs: 2, skipped: 1 });
    expect(executed).toEqual(['warm-cache']);
    expect(runner.getScheduler()?.getTable().get('extra')?.cron).toBe('0 * * * *');
    expect(runner.getTracker()?.listJobs().map((job) => job.name)).toEqual([
      'boot',
      'extra',
    ]);
  });

  it('should dispatch manual triggers through the API', async () => {
    writeJobSet({ report: { schedule: '0 0 1 1 *', command: 'make-report' } });
    await runner.start();

    const address = runner.address();
    if (!address) throw new Error('not listening');
    const response = await httpRequest('POST', `${address}/trigger/report`);

    expect(response.statusCode).toBe(200);
    await vi.waitFor(() => {
      expect(executed).toEqual(['make-report']);
    });
  });

  it('should fail to start without a job set file', async () => {
    await expect(runner.start()).rejects.toThrow(StartupError);
    expect(runner.address()).toBeNull();
  });

  it('should refuse to reload before start', () => {
    expect(() => runner.reload()).toThrow('Runner not started');
  });
});
