/**
 * Tests for the schedule table and its due check.
 */

import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';

import type { ExecutableUnit } from '../compiler/compiler.js';
import {
  compilePattern,
  createScheduleTable,
  isDue,
  nextRun,
} from './schedule-table.js';

const logger = pino({ level: 'silent' });

function unit(id: string, cron: string): ExecutableUnit {
  return {
    id,
    name: id,
    schedule: cron,
    cron,
    comment: null,
    onstart: false,
    primary: { kind: 'command', command: `run ${id}` },
    triggers: [],
  };
}

const table = (...units: ExecutableUnit[]) =>
  createScheduleTable(units, { scriptPath: (u) => `/jobs/${u.id}.sh`, logger });

describe('compilePattern', () => {
  it('should accept 5-field expressions', () => {
    expect(compilePattern('*/5 * * * *')).not.toBeNull();
  });

  it('should reject other field counts', () => {
    expect(compilePattern('* * *')).toBeNull();
    expect(compilePattern('0 * * * * *')).toBeNull();
  });

  it('should reject unparseable expressions', () => {
    expect(compilePattern('60 * * * *')).toBeNull();
    expect(compilePattern('@reboot a b c d')).toBeNull();
  });
});

describe('isDue', () => {
  const entry = table(unit('every5', '*/5 * * * *')).entries[0];

  it('should match any instant within a matching minute', () => {
    if (!entry) throw new Error('missing entry');
    expect(isDue(entry, new Date(2026, 0, 1, 10, 5, 0, 0))).toBe(true);
    expect(isDue(entry, new Date(2026, 0, 1, 10, 5, 59, 999))).toBe(true);
  });

  it('should not match other minutes', () => {
    if (!entry) throw new Error('missing entry');
    expect(isDue(entry, new Date(2026, 0, 1, 10, 6, 0, 0))).toBe(false);
    expect(isDue(entry, new Date(2026, 0, 1, 10, 4, 59, 999))).toBe(false);
  });

  it('should never match an unschedulable entry', () => {
    const broken = table(unit('broken', '60 * * * *')).entries[0];
    if (!broken) throw new Error('missing entry');
    expect(isDue(broken, new Date(2026, 0, 1, 10, 0))).toBe(false);
  });
});

describe('nextRun', () => {
  it('should return the next fire time', () => {
    const entry = table(unit('hourly', '0 * * * *')).entries[0];
    if (!entry) throw new Error('missing entry');
    expect(nextRun(entry, new Date(2026, 0, 1, 10, 30))).toEqual(
      new Date(2026, 0, 1, 11, 0),
    );
  });
});

describe('createScheduleTable', () => {
  it('should keep build order and index entries by name', () => {
    const t = table(unit('b', '@x'), unit('a', '0 * * * *'));

    expect(t.entries.map((entry) => entry.name)).toEqual(['b', 'a']);
    expect(t.get('a')?.scriptPath).toBe('/jobs/a.sh');
    expect(t.get('missing')).toBeUndefined();
    expect(Object.isFrozen(t.entries)).toBe(true);
  });

  it('should list and log unschedulable entries', () => {
    const warn = vi.spyOn(logger, 'warn');
    const t = table(unit('ok', '0 * * * *'), unit('bad', 'not a cron at all'));

    expect(t.unschedulable).toEqual(['bad']);
    expect(warn).toHaveBeenCalledWith(
      { job: 'bad', cron: 'not a cron at all' },
      'Cron expression cannot be parsed, job will never fire on schedule',
    );
    warn.mockRestore();
  });
});
