/**
 * StaticAnalyzer
 *
 * Runs the external linter (pylint by default) on sandbox files and turns
 * its report into an AnalysisResult: a 0-10 score plus issues grouped by
 * severity.
 */

import * as path from 'path';

import type { SandboxFileStore } from '../../services/SandboxFileStore.js';
import {
  fail,
  failed,
  ok,
  type AnalysisResult,
  type DirectoryAnalysis,
  type FileRecord,
  type Outcome
} from '../../core/types.js';
import { runCommand, splitCommand, type CommandRunner } from '../process/runCommand.js';
import { averageScore, categorizeIssues, parseIssues, parseScore } from './parsing.js';
import type { AnalyzerOptions } from './types.js';

/**
 * StaticAnalyzer - score and issue extraction
 */
export class StaticAnalyzer {
  private store: SandboxFileStore;
  private command: string;
  private timeoutMs: number;
  private runner: CommandRunner;

  constructor(store: SandboxFileStore, options: AnalyzerOptions) {
    this.store = store;
    this.command = options.command;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Analyze one file
   */
  async analyze(filePath: string, timeoutMs: number = this.timeoutMs): Promise<Outcome<AnalysisResult>> {
    const located = await this.store.locate(filePath);
    if (!located.success) return failed(located.failure);

    const { executable, args } = splitCommand(this.command);
    const outcome = await this.runner(
      executable,
      [...args, located.value, '--output-format=json'],
      { cwd: this.store.root, timeoutMs }
    );

    switch (outcome.status) {
      case 'spawn_failed':
        return fail('tool_error', `Analyzer error: ${outcome.message}`);
      case 'timed_out':
        return fail('timed_out', `Analyzer timed out after ${timeoutMs}ms on ${path.basename(located.value)}`);
      case 'completed': {
        // The analyzer exits non-zero whenever it reports messages; that is not a failure
        const issues = parseIssues(outcome.stdout);
        return ok({
          file: located.value,
          score: parseScore(outcome.stderr) ?? parseScore(outcome.stdout),
          issues,
          categorized: categorizeIssues(issues),
          totalIssues: issues.length
        });
      }
    }
  }

  /**
   * Analyze every source file under a directory (the whole sandbox by default)
   */
  async analyzeDirectory(
    subdirectory?: string,
    include: (record: FileRecord) => boolean = () => true
  ): Promise<Outcome<DirectoryAnalysis>> {
    const files = await this.store.enumerate(subdirectory);
    if (!files.success) return failed(files.failure);

    const results: AnalysisResult[] = [];
    for (const file of files.value.filter(include)) {
      const result = await this.analyze(file.path);
      if (result.success) {
        results.push(result.value);
      } else {
        console.warn(`[StaticAnalyzer] ${file.relativePath}: ${result.failure.message}`);
      }
    }

    const scores = results.map(r => r.score);
    return ok({
      results,
      averageScore: averageScore(scores),
      filesAnalyzed: scores.filter(s => s !== undefined).length
    });
  }
}

export default StaticAnalyzer;
