/**
 * runCommand Tests
 *
 * Uses the running Node binary as the child process.
 */

import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { runCommand, splitCommand } from './runCommand.js';

const node = process.execPath;

describe('splitCommand', () => {
  it('should separate the executable from its leading arguments', () => {
    expect(splitCommand('  python3 -m pylint ')).toEqual({ executable: 'python3', args: ['-m', 'pylint'] });
  });
});

describe('runCommand', () => {
  it('should collect output and the exit code', async () => {
    const outcome = await runCommand(
      node,
      ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      { cwd: tmpdir(), timeoutMs: 10000 }
    );

    expect(outcome).toEqual({ status: 'completed', exitCode: 3, stdout: 'out', stderr: 'err' });
  });

  it('should feed input on stdin', async () => {
    const outcome = await runCommand(
      node,
      ['-e', 'let s = ""; process.stdin.on("data", d => { s += d; }); process.stdin.on("end", () => process.stdout.write(s.toUpperCase()));'],
      { cwd: tmpdir(), timeoutMs: 10000, input: 'hello' }
    );

    expect(outcome).toEqual({ status: 'completed', exitCode: 0, stdout: 'HELLO', stderr: '' });
  });

  it('should kill the child when the timeout expires', async () => {
    const outcome = await runCommand(node, ['-e', 'setTimeout(() => {}, 60000)'], { cwd: tmpdir(), timeoutMs: 200 });

    expect(outcome.status).toBe('timed_out');
  });

  it('should report an executable that does not exist', async () => {
    const outcome = await runCommand('codemender-no-such-binary', [], { cwd: tmpdir(), timeoutMs: 1000 });

    expect(outcome.status).toBe('spawn_failed');
  });

  it('should resolve an empty executable as a spawn failure instead of rejecting', async () => {
    const outcome = await runCommand('', [], { cwd: tmpdir(), timeoutMs: 1000 });

    expect(outcome.status).toBe('spawn_failed');
  });

  it('should keep a multi-byte character split across two writes', async () => {
    const outcome = await runCommand(
      node,
      ['-e', 'process.stdout.write(Buffer.from([0xe2, 0x82])); setTimeout(() => process.stdout.write(Buffer.from([0xac])), 50);'],
      { cwd: tmpdir(), timeoutMs: 10000 }
    );

    expect(outcome).toEqual({ status: 'completed', exitCode: 0, stdout: '\u20ac', stderr: '' });
  });
});
