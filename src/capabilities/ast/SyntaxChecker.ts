/**
 * SyntaxChecker
 *
 * Parses a sandbox file without running it and reports the first syntax
 * error. Python goes through the interpreter's own `ast` module (source on
 * stdin, nothing executed); JavaScript and TypeScript are parsed in process
 * with Babel.
 */

import * as path from 'path';
import * as parser from '@babel/parser';
import type { ParserPlugin } from '@babel/parser';

import type { SandboxFileStore } from '../../services/SandboxFileStore.js';
import { fail, failed, ok, type Outcome, type SyntaxCheck } from '../../core/types.js';
import { errorMessage } from '../../core/errors.js';
import { runCommand, splitCommand, type CommandRunner } from '../process/runCommand.js';
import { BABEL_EXTENSIONS, PythonParseReportSchema, type SyntaxCheckerOptions } from './types.js';

const PYTHON_PARSE_SCRIPT = [
  'import ast, json, sys',
  'source = sys.stdin.read()',
  'try:',
  '    ast.parse(source, filename=sys.argv[1])',
  'except SyntaxError as e:',
  '    print(json.dumps({"valid": False, "line": e.lineno or 0, "column": e.offset or 0, "message": e.msg}))',
  'else:',
  '    print(json.dumps({"valid": True}))'
].join('\n');

function babelPlugins(extension: string): ParserPlugin[] {
  switch (extension) {
    case '.ts':
    case '.mts':
    case '.cts':
      return ['typescript'];
    case '.tsx':
      return ['typescript', 'jsx'];
    default:
      return ['jsx'];
  }
}

/**
 * Babel attaches `loc` ({ line, column }) to the SyntaxError it throws
 */
function babelErrorLocation(error: unknown): { line: number; column: number } | undefined {
  if (typeof error !== 'object' || error === null || !('loc' in error)) return undefined;
  const loc = error.loc;
  if (typeof loc !== 'object' || loc === null || !('line' in loc) || !('column' in loc)) return undefined;
  const { line, column } = loc;
  if (typeof line !== 'number' || typeof column !== 'number') return undefined;
  return { line, column };
}

export class SyntaxChecker {
  private store: SandboxFileStore;
  private pythonCommand: string;
  private timeoutMs: number;
  private runner: CommandRunner;

  constructor(store: SandboxFileStore, options: SyntaxCheckerOptions = {}) {
    this.store = store;
    this.pythonCommand = options.pythonCommand ?? 'python3';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Check a file. An unreadable or rejected file is a failure, distinct from
   * an invalid-syntax result.
   */
  async check(filePath: string): Promise<Outcome<SyntaxCheck>> {
    const content = await this.store.read(filePath);
    if (!content.success) return failed(content.failure);

    const extension = path.extname(filePath).toLowerCase();

    if (extension === '.py' || extension === '.pyi') {
      return this.checkPython(filePath, content.value);
    }
    if (BABEL_EXTENSIONS.some(ext => ext === extension)) {
      return ok(this.checkWithBabel(content.value, extension));
    }
    return fail('unsupported', `No syntax parser for '${extension || path.basename(filePath)}' files`);
  }

  /**
   * Parse JavaScript/TypeScript source. Columns are reported 1-based.
   */
  checkWithBabel(source: string, extension: string): SyntaxCheck {
    try {
      parser.parse(source, {
        sourceType: 'unambiguous',
        plugins: babelPlugins(extension)
      });
      return { valid: true };
    } catch (error) {
      const loc = babelErrorLocation(error);
      return {
        valid: false,
        line: loc?.line ?? 0,
        column: loc ? loc.column + 1 : 0,
        message: errorMessage(error)
      };
    }
  }

  private async checkPython(filePath: string, source: string): Promise<Outcome<SyntaxCheck>> {
    const { executable, args } = splitCommand(this.pythonCommand);
    const outcome = await this.runner(
      executable,
      [...args, '-c', PYTHON_PARSE_SCRIPT, path.basename(filePath)],
      { cwd: this.store.root, timeoutMs: this.timeoutMs, input: source }
    );

    if (outcome.status === 'spawn_failed') {
      return fail('tool_error', `Syntax check error: ${outcome.message}`);
    }
    if (outcome.status === 'timed_out') {
      return fail('timed_out', `Syntax check timed out after ${this.timeoutMs}ms`);
    }

    const lastLine = outcome.stdout.trim().split('\n').pop() ?? '';
    let report: unknown;
    try {
      report = JSON.parse(lastLine);
    } catch {
      return fail('tool_error', `Unexpected parser output (exit ${outcome.exitCode}): ${(outcome.stderr || outcome.stdout).slice(0, 500)}`);
    }

    const parsed = PythonParseReportSchema.safeParse(report);
    if (!parsed.success) {
      return fail('tool_error', `Unexpected parser report: ${lastLine.slice(0, 500)}`);
    }
    return ok(parsed.data);
  }
}
