/**
 * runCommand
 *
 * Spawns an external tool without a shell, collects its output and
 * enforces a timeout. Never rejects: every way a run can end is a
 * ProcessOutcome value.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { errorMessage } from '../../core/errors.js';

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
  /** Written to stdin, which is then closed */
  input?: string;
}

export type ProcessOutcome =
  | { status: 'completed'; exitCode: number; stdout: string; stderr: string }
  | { status: 'timed_out'; stdout: string; stderr: string }
  | { status: 'spawn_failed'; message: string };

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunOptions
) => Promise<ProcessOutcome>;

/**
 * Split a configured command such as "python3 -m pylint" into
 * executable and leading arguments
 */
export function splitCommand(command: string): { executable: string; args: string[] } {
  const [executable = '', ...args] = command.trim().split(/\s+/);
  return { executable, args };
}

export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve) => {
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let stdout = '';
    let stderr = '';

    const settle = (outcome: ProcessOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    // spawn throws synchronously on an empty executable or invalid arguments
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command, args, { cwd: options.cwd, shell: false });
    } catch (error) {
      settle({ status: 'spawn_failed', message: `${command || '(empty command)'}: ${errorMessage(error)}` });
      return;
    }

    timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    // Decode as a stream so multi-byte characters split across chunks survive
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (data: string) => {
      stdout += data;
    });
    child.stderr.on('data', (data: string) => {
      stderr += data;
    });

    child.on('error', (error) => {
      settle({ status: 'spawn_failed', message: `${command}: ${error.message}` });
    });

    child.on('close', (code, signal) => {
      if (timedOut) {
        settle({ status: 'timed_out', stdout, stderr });
        return;
      }
      settle({
        status: 'completed',
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr
      });
    });

    // A child that exits before reading stdin closes the pipe under us (EPIPE);
    // the exit status still reports what happened
    child.stdin.on('error', (error) => {
      stderr += `\n[stdin] ${error.message}`;
    });
    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });
};
