/**
 * Tests for the process executor (real child processes).
 */

import { describe, expect, it } from 'vitest';

import { createProcessExecutor, OutputBuffer } from './executor.js';

describe('OutputBuffer', () => {
  it('should keep leading bytes and mark truncation', () => {
    const buffer = new OutputBuffer(4);
    buffer.append(Buffer.from('abc'));
    buffer.append(Buffer.from('defgh'));

    expect(buffer.size).toBe(8);
    expect(buffer.toString()).toBe('abcd\n... (truncated, 8 bytes total)');
  });

  it('should not split a multi-byte character at the cut', () => {
    const buffer = new OutputBuffer(4);
    buffer.append(Buffer.from('ab\u20acc'));

    expect(buffer.size).toBe(6);
    expect(buffer.toString()).toBe('ab\n... (truncated, 6 bytes total)');
  });

  it('should keep a character that ends exactly at the cut', () => {
    const buffer = new OutputBuffer(5);
    buffer.append(Buffer.from('ab\u20acc'));

    expect(buffer.toString()).toBe('ab\u20ac\n... (truncated, 6 bytes total)');
  });

  it('should not mark output within the limit', () => {
    const buffer = new OutputBuffer(16);
    buffer.append(Buffer.from('short'));
    expect(buffer.toString()).toBe('short');
  });
});

describe('createProcessExecutor', () => {
  const executor = createProcessExecutor({ shell: 'sh', docker: 'echo' });

  it('should run a command through the shell', async () => {
    const result = await executor.run({ kind: 'command', command: 'echo hello' });

    expect(result).toEqual({
      exitCode: 0,
      stdout: 'hello\n',
      stderr: '',
      stdoutSize: 6,
      stderrSize: 0,
    });
  });

  it('should capture stderr and the exit code', async () => {
    const result = await executor.run({
      kind: 'command',
      command: 'echo oops >&2; exit 3',
    });

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('oops\n');
  });

  it('should truncate long output to the preview size', async () => {
    const small = createProcessExecutor({ shell: 'sh', previewBytes: 4 });
    const result = await small.run({ kind: 'command', command: 'printf abcdefgh' });

    expect(result.stdout).toBe('abcd\n... (truncated, 8 bytes total)');
    expect(result.stdoutSize).toBe(8);
  });

  it('should pass container actions to the container CLI as arguments', async () => {
    const result = await executor.run({
      kind: 'run',
      dockerArgs: ['--rm'],
      flags: ['--name', 'x'],
      image: 'alpine',
      command: ['echo', 'a b'],
    });

    expect(result.stdout).toBe('run --rm --name x alpine echo a b\n');
  });

  it('should stop a fail-fast command at its first failing line', async () => {
    const script = { kind: 'command', command: 'false\necho after' } as const;

    const strict = await executor.run(script, { failFast: true });
    expect(strict.exitCode).toBe(1);
    expect(strict.stdout).toBe('');

    const lenient = await executor.run(script);
    expect(lenient.exitCode).toBe(0);
    expect(lenient.stdout).toBe('after\n');
  });

  it('should report a spawn failure as exit code 127', async () => {
    const broken = createProcessExecutor({ shell: '/nonexistent/shell' });
    const result = await broken.run({ kind: 'command', command: 'true' });

    expect(result.exitCode).toBe(127);
    expect(result.stderr).toBe('spawn /nonexistent/shell ENOENT');
  });
});
