/**
 * CLI option handling tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { ConfigurationError } from '../core/errors.js';
import { loadConfig, toOverrides } from './options.js';

function problemsOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.problems;
    throw error;
  }
  return [];
}

describe('toOverrides', () => {
  it('should leave unset options undefined', () => {
    expect(toOverrides({})).toEqual({
      targetDir: undefined,
      maxIterations: undefined,
      extensions: undefined,
      auditLogPath: undefined,
      provider: { provider: undefined, model: undefined }
    });
  });

  it('should reject a non-numeric iteration limit', () => {
    expect(problemsOf(() => toOverrides({ maxIterations: 'many' })))
      .toEqual(['--max-iterations must be a positive integer, got "many"']);
  });

  it('should reject an unknown provider', () => {
    expect(problemsOf(() => toOverrides({ provider: 'palm' })))
      .toEqual(['Unknown provider "palm". Expected one of: claude, openai, ollama']);
  });
});

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(path.join(tmpdir(), 'codemender-cli-'));
    mkdirSync(path.join(cwd, 'sandbox'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('should apply overrides and resolve the target against cwd', () => {
    const config = loadConfig(
      { targetDir: 'sandbox', provider: 'openai', maxIterations: '4', extensions: 'py,pyi' },
      {},
      { OPENAI_API_KEY: 'test-secret' },
      cwd
    );

    expect(config.targetDir).toBe(path.join(cwd, 'sandbox'));
    expect(config.maxIterations).toBe(4);
    expect(config.extensions).toEqual(['.py', '.pyi']);
    expect(config.provider).toMatchObject({ provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-secret' });
  });

  it('should let the environment pick the target directory', () => {
    const config = loadConfig({}, { requireCredential: false }, { CODEMENDER_TARGET_DIR: 'sandbox' }, cwd);

    expect(config.targetDir).toBe(path.join(cwd, 'sandbox'));
  });

  it('should collect every validation problem', () => {
    const problems = problemsOf(() => loadConfig({ targetDir: 'absent' }, {}, {}, cwd));

    expect(problems).toEqual([
      'ANTHROPIC_API_KEY environment variable is required for the claude provider',
      `Directory '${path.join(cwd, 'absent')}' does not exist`
    ]);
  });

  it('should wrap a bad provider variable in a configuration error', () => {
    expect(problemsOf(() => loadConfig({}, {}, { CODEMENDER_PROVIDER: 'palm' }, cwd)))
      .toEqual(['Unknown provider "palm". Expected one of: claude, openai, ollama']);
  });
});
