#!/usr/bin/env node
/**
 * CLI entry point for cronbox.
 *
 * @module
 */

import { Command } from '@commander-js/extra-typings';

import { StartupError } from '../../config/errors.js';
import { loadRunnerConfig } from '../../config/runner-config.js';
import { createLogger, createRunner } from '../../runner.js';
import type { RunnerConfig } from '../../schemas/config.js';
import { callApi, validateJobSet } from './commands.js';

/** Load config and apply the --home override. */
function resolveConfig(options: { config?: string; home?: string }): RunnerConfig {
  const config = loadRunnerConfig(options.config);
  if (options.home) config.homeDir = options.home;
  return config;
}

/** Print an error and exit non-zero. */
function fail(err: unknown): never {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

const program = new Command();

program
  .name('cronbox')
  .description('Declarative job scheduler for shell commands and containers')
  .version('0.1.0');

program
  .command('start')
  .description('Start the scheduler daemon')
  .option('-c, --config <path>', 'Path to runner config file')
  .option('--home <dir>', 'Home directory (job set, scripts, schedule file)')
  .action(async (options) => {
    let config: RunnerConfig;
    try {
      config = resolveConfig(options);
    } catch (err) {
      fail(err);
    }
    const logger = createLogger(config);
    const runner = createRunner(config, { logger });
    try {
      await runner.start();
    } catch (err) {
      if (err instanceof StartupError) {
        logger.fatal({ err }, 'Startup failed');
      } else {
        logger.fatal({ err }, 'Runner crashed during startup');
      }
      process.exit(1);
    }
  });

program
  .command('validate')
  .description('Compile the job set and print the schedule without writing anything')
  .option('-c, --config <path>', 'Path to runner config file')
  .option('--home <dir>', 'Home directory')
  .action((options) => {
    try {
      const config = resolveConfig(options);
      const report = validateJobSet(config, createLogger(config));
      console.log(`# ${report.path}: ${String(report.jobs)} job(s)`);
      for (const skipped of report.skipped) console.log(`# skipped ${skipped}`);
      process.stdout.write(report.schedule);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('status')
  .description('Show daemon statistics')
  .option('-c, --config <path>', 'Path to runner config file')
  .action(async (options) => {
    try {
      const stats = await callApi(resolveConfig(options), 'GET', '/stats');
      console.log(JSON.stringify(stats, null, 2));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('trigger')
  .description('Manually trigger a job')
  .argument('<name>', 'Job name')
  .option('-c, --config <path>', 'Path to runner config file')
  .action(async (name, options) => {
    try {
      const result = await callApi(
        resolveConfig(options),
        'POST',
        `/trigger/${encodeURIComponent(name)}`,
      );
      console.log(JSON.stringify(result, null, 2));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('reload')
  .description('Rebuild the schedule from the job set')
  .option('-c, --config <path>', 'Path to runner config file')
  .action(async (options) => {
    try {
      const result = await callApi(resolveConfig(options), 'POST', '/reload');
      console.log(JSON.stringify(result, null, 2));
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
