/**
 * Tests for action resolution.
 */

import { describe, expect, it } from 'vitest';

import {
  containerArgs,
  describeAction,
  resolveAction,
  splitWords,
  substituteEnv,
} from './actions.js';

describe('substituteEnv', () => {
  it('should replace bare and braced references', () => {
    expect(substituteEnv('$HOME/${USER}x', { HOME: '/h', USER: 'u' })).toBe(
      '/h/ux',
    );
  });

  it('should replace unset variables with nothing', () => {
    expect(substituteEnv('a-$MISSING-b', {})).toBe('a--b');
  });
});

describe('splitWords', () => {
  it('should honour quoting', () => {
    expect(splitWords('--rm -e "A=1 2"', {})).toEqual(['--rm', '-e', 'A=1 2']);
  });

  it('should expand variables', () => {
    expect(splitWords('--network $NET', { NET: 'host' })).toEqual([
      '--network',
      'host',
    ]);
  });

  it('should return nothing for empty input', () => {
    expect(splitWords(undefined, {})).toEqual([]);
    expect(splitWords('', {})).toEqual([]);
  });
});

describe('resolveAction', () => {
  it('should build a run action with volumes before the image and command', () => {
    const result = resolveAction(
      { image: 'nginx', volumes: ['a:/a', 'b:/b'], command: 'echo hi' },
      {},
    );

    expect(result).toEqual({
      ok: true,
      action: {
        kind: 'run',
        dockerArgs: [],
        flags: ['--volume', 'a:/a', '--volume', 'b:/b'],
        image: 'nginx',
        command: ['echo', 'hi'],
      },
    });
    if (result.ok) {
      expect(describeAction(result.action)).toBe(
        'docker run --volume a:/a --volume b:/b nginx echo hi',
      );
    }
  });

  it('should order flags: dockerargs, env, expose, name, network, publish, volume', () => {
    const result = resolveAction(
      {
        name: 'web',
        image: 'nginx',
        dockerargs: '--rm',
        environment: ['A=1'],
        expose: ['80'],
        networks: ['net'],
        ports: ['8080:80'],
        volumes: ['v:/v'],
      },
      {},
    );

    expect(result.ok).toBe(true);
    if (result.ok && result.action.kind !== 'command') {
      expect(containerArgs(result.action)).toEqual([
        'run',
        '--rm',
        '--env',
        'A=1',
        '--expose',
        '80',
        '--name',
        'web',
        '--network',
        'net',
        '--publish',
        '8080:80',
        '--volume',
        'v:/v',
        'nginx',
      ]);
    }
  });

  it('should substitute variables in the image and flag values', () => {
    const result = resolveAction(
      { image: '${REG}/app', environment: ['TOKEN=$TOKEN'] },
      { REG: 'registry.local', TOKEN: 'test-secret' },
    );

    expect(result).toMatchObject({
      ok: true,
      action: {
        image: 'registry.local/app',
        flags: ['--env', 'TOKEN=test-secret'],
      },
    });
  });

  it('should prefer image over container', () => {
    const result = resolveAction(
      { image: 'alpine', container: 'db', command: 'true' },
      {},
    );
    expect(result.ok && result.action.kind).toBe('run');
  });

  it('should build an exec action for a container', () => {
    const result = resolveAction(
      { container: 'db', dockerargs: '-u postgres', command: 'pg_dump app' },
      {},
    );

    expect(result.ok).toBe(true);
    if (result.ok && result.action.kind !== 'command') {
      expect(containerArgs(result.action)).toEqual([
        'exec',
        '-u',
        'postgres',
        'db',
        'pg_dump',
        'app',
      ]);
    }
  });

  it('should reject a container action without a command', () => {
    expect(resolveAction({ container: 'db' }, {})).toEqual({
      ok: false,
      reason: 'command missing for container',
    });
  });

  it('should reject an image that resolves to empty', () => {
    expect(resolveAction({ image: '$MISSING' }, {})).toEqual({
      ok: false,
      reason: 'command missing (image resolved to empty)',
    });
  });

  it('should keep a plain command verbatim', () => {
    expect(resolveAction({ command: 'echo "$HOME" | wc -c' }, {})).toEqual({
      ok: true,
      action: { kind: 'command', command: 'echo "$HOME" | wc -c' },
    });
  });

  it('should reject a missing or blank command', () => {
    expect(resolveAction({}, {})).toEqual({ ok: false, reason: 'command missing' });
    expect(resolveAction({ command: '   ' }, {})).toEqual({
      ok: false,
      reason: 'command missing',
    });
  });
});
