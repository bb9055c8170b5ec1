/**
 * TestRunner Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { SandboxFileStore } from '../../services/SandboxFileStore.js';
import type { CommandRunner, ProcessOutcome, RunOptions } from '../process/runCommand.js';
import { parseTestStatistics } from './parsing.js';
import { TestRunner } from './TestRunner.js';

describe('parseTestStatistics', () => {
  it('should read the summary counts', () => {
    expect(parseTestStatistics('===== 3 passed, 1 failed in 0.12s =====')).toEqual({
      passed: 3,
      failed: 1,
      errors: 0,
      skipped: 0,
      total: 4
    });
  });

  it('should count errors but leave skipped tests out of the total', () => {
    expect(parseTestStatistics('1 passed, 2 skipped, 1 error in 0.50s')).toEqual({
      passed: 1,
      failed: 0,
      errors: 1,
      skipped: 2,
      total: 2
    });
  });

  it('should report zeros when no summary is printed', () => {
    expect(parseTestStatistics('no tests ran in 0.01s').total).toBe(0);
  });
});

describe('TestRunner', () => {
  let sandboxDir: string;
  let store: SandboxFileStore;
  let calls: Array<{ command: string; args: string[]; options: RunOptions }>;

  function runner(outcome: ProcessOutcome): CommandRunner {
    return async (command, args, options) => {
      calls.push({ command, args, options });
      return outcome;
    };
  }

  beforeEach(() => {
    sandboxDir = mkdtempSync(path.join(tmpdir(), 'codemender-tests-'));
    mkdirSync(path.join(sandboxDir, 'tests'));
    writeFileSync(path.join(sandboxDir, 'tests', 'test_calc.py'), 'def test_ok():\n    assert True\n');
    store = new SandboxFileStore(sandboxDir);
    calls = [];
  });

  afterEach(() => {
    rmSync(sandboxDir, { recursive: true, force: true });
  });

  it('should run the whole sandbox verbosely from its root by default', async () => {
    const testRunner = new TestRunner(store, {
      command: 'pytest',
      timeoutMs: 5000,
      runner: runner({ status: 'completed', exitCode: 0, stdout: '2 passed in 0.01s\n', stderr: '' })
    });

    const result = await testRunner.runTests();

    expect(calls).toEqual([{
      command: 'pytest',
      args: [store.root, '-v'],
      options: { cwd: store.root, timeoutMs: 5000 }
    }]);
    expect(result).toEqual({
      success: true,
      value: {
        passed: true,
        statistics: { passed: 2, failed: 0, errors: 0, skipped: 0, total: 2 },
        output: '2 passed in 0.01s\n',
        exitCode: 0
      }
    });
  });

  it('should derive the verdict from the exit status and join both streams', async () => {
    const testRunner = new TestRunner(store, {
      command: 'pytest',
      timeoutMs: 5000,
      runner: runner({ status: 'completed', exitCode: 1, stdout: '1 passed, 1 failed in 0.02s\n', stderr: 'warning\n' })
    });

    const result = await testRunner.runTests('tests/test_calc.py');

    expect(calls[0].args).toEqual([path.join(store.root, 'tests', 'test_calc.py'), '-v']);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.passed).toBe(false);
    expect(result.value.output).toBe('1 passed, 1 failed in 0.02s\nwarning\n');
    expect(result.value.statistics.total).toBe(2);
  });

  it('should report a missing target without running anything', async () => {
    const testRunner = new TestRunner(store, {
      command: 'pytest',
      timeoutMs: 5000,
      runner: runner({ status: 'completed', exitCode: 0, stdout: '', stderr: '' })
    });

    expect(await testRunner.runTests('tests/test_missing.py')).toEqual({
      success: false,
      failure: { kind: 'not_found', message: 'Test target not found: tests/test_missing.py' }
    });
    expect(calls).toHaveLength(0);
  });

  it('should report timeouts and spawn failures as failures', async () => {
    const timedOut = new TestRunner(store, {
      command: 'pytest',
      timeoutMs: 5000,
      runner: runner({ status: 'timed_out', stdout: '', stderr: '' })
    });
    const missing = new TestRunner(store, {
      command: 'pytest',
      timeoutMs: 5000,
      runner: runner({ status: 'spawn_failed', message: 'pytest: spawn pytest ENOENT' })
    });

    expect(await timedOut.runTests(undefined, 100)).toEqual({
      success: false,
      failure: { kind: 'timed_out', message: 'Test execution timed out after 100ms' }
    });
    expect(await missing.runTests()).toEqual({
      success: false,
      failure: { kind: 'tool_error', message: 'Test runner error: pytest: spawn pytest ENOENT' }
    });
  });
});
