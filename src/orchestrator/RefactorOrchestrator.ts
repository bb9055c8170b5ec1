/**
 * RefactorOrchestrator
 *
 * Drives a run in three phases:
 *   1. Discovery - analyze every non-test source file, select the weak ones
 *      and get a repair plan for each from the auditor.
 *   2. Repair - per file, a bounded loop of
 *      fix -> write -> syntax check -> test -> judge.
 *   3. Final validation - whole-suite test run and average score.
 *
 * Files are processed one at a time; nothing runs in parallel.
 */

import type { AuditorRole } from '../agents/AuditorRole.js';
import type { FixerRole } from '../agents/FixerRole.js';
import type { JudgeRole } from '../agents/JudgeRole.js';
import type { AuditSink } from '../audit/types.js';
import type { StaticAnalyzer } from '../capabilities/analysis/StaticAnalyzer.js';
import { averageScore } from '../capabilities/analysis/parsing.js';
import type { SyntaxChecker } from '../capabilities/ast/SyntaxChecker.js';
import type { TestRunner } from '../capabilities/testing/TestRunner.js';
import { errorMessage } from '../core/errors.js';
import type { AnalysisResult, FileRecord } from '../core/types.js';
import type { SandboxFileStore } from '../services/SandboxFileStore.js';
import type {
  DiscoveryReport,
  FileOutcome,
  FinalValidation,
  IterationState,
  IterationStep,
  OrchestratorDependencies,
  OrchestratorOptions,
  RunReport,
  SelectedFile
} from './types.js';

type Phase = 'discovery' | 'repair' | 'final_validation';

/**
 * Substring match against the relative path with a leading slash, so a
 * top-level "tests/" directory matches the "/tests/" marker
 */
export function isTestFile(relativePath: string, markers: string[]): boolean {
  const candidate = `/${relativePath}`;
  return markers.some(marker => candidate.includes(marker));
}

export function needsRepair(analysis: AnalysisResult, options: OrchestratorOptions['selection']): boolean {
  const score = analysis.score ?? 10;
  return score < options.scoreThreshold || analysis.totalIssues > options.issueThreshold;
}

export class RefactorOrchestrator {
  private store: SandboxFileStore;
  private analyzer: StaticAnalyzer;
  private testRunner: TestRunner;
  private syntaxChecker: SyntaxChecker;
  private auditor: AuditorRole;
  private fixer: FixerRole;
  private judge: JudgeRole;
  private audit: AuditSink;
  private options: OrchestratorOptions;

  private iterationsRun = 0;
  private processed: string[] = [];

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions) {
    this.store = deps.store;
    this.analyzer = deps.analyzer;
    this.testRunner = deps.testRunner;
    this.syntaxChecker = deps.syntaxChecker;
    this.auditor = deps.auditor;
    this.fixer = deps.fixer;
    this.judge = deps.judge;
    this.audit = deps.audit;
    this.options = options;
  }

  /** Iterations run across every file so far */
  get totalIterations(): number {
    return this.iterationsRun;
  }

  /** Relative paths of files repaired successfully so far */
  get filesProcessed(): readonly string[] {
    return this.processed;
  }

  async run(): Promise<RunReport> {
    const startedAt = new Date().toISOString();
    let phase: Phase = 'discovery';

    try {
      console.log(`[Orchestrator] Starting run in ${this.store.root}`);
      const discovery = await this.discover();

      phase = 'repair';
      const files: FileOutcome[] = [];
      for (const selected of discovery.selected) {
        files.push(await this.repairFile(selected));
      }

      let finalValidation: FinalValidation | undefined;
      if (discovery.selected.length > 0) {
        phase = 'final_validation';
        finalValidation = await this.validate();
        this.audit.record({
          agent: 'Orchestrator',
          model: 'n/a',
          action: 'debug',
          status: finalValidation.testsPassed === true ? 'SUCCESS' : 'PARTIAL',
          details: {
            phase,
            tests_passed: finalValidation.testsPassed,
            average_score: finalValidation.averageScore,
            files_processed: [...this.processed],
            total_iterations: this.iterationsRun
          }
        });
      } else {
        console.log('[Orchestrator] No files selected for repair; skipping final validation');
      }

      return {
        startedAt,
        finishedAt: new Date().toISOString(),
        discovery,
        files,
        totalIterations: this.iterationsRun,
        filesProcessed: [...this.processed],
        finalValidation
      };
    } catch (error) {
      console.error(`[Orchestrator] Run aborted during ${phase}: ${errorMessage(error)}`);
      this.audit.record({
        agent: 'Orchestrator',
        model: 'n/a',
        action: 'debug',
        status: 'FAILURE',
        details: {
          phase,
          error: errorMessage(error),
          total_iterations: this.iterationsRun,
          files_processed: [...this.processed]
        }
      });
      throw error;
    }
  }

  // ==========================================
  // Discovery
  // ==========================================

  async discover(): Promise<DiscoveryReport> {
    const enumerated = await this.store.enumerate();
    if (!enumerated.success) {
      throw new Error(`Cannot enumerate sandbox: ${enumerated.failure.message}`);
    }

    const { selection } = this.options;
    const testFiles: string[] = [];
    const candidates: FileRecord[] = [];
    for (const record of enumerated.value) {
      if (isTestFile(record.relativePath, selection.testFileMarkers)) {
        testFiles.push(record.relativePath);
      } else {
        candidates.push(record);
      }
    }
    console.log(`[Orchestrator] Found ${enumerated.value.length} files (${testFiles.length} test files skipped)`);

    const analyzed: Array<{ record: FileRecord; analysis: AnalysisResult }> = [];
    for (const record of candidates) {
      const result = await this.analyzer.analyze(record.path);
      if (!result.success) {
        console.warn(`[Orchestrator] Skipping ${record.relativePath}: ${result.failure.message}`);
        continue;
      }
      analyzed.push({ record, analysis: result.value });
    }

    const selected: SelectedFile[] = [];
    const dropped: string[] = [];
    for (const { record, analysis } of analyzed) {
      if (!needsRepair(analysis, selection)) continue;

      const content = await this.store.read(record.path);
      if (!content.success) {
        console.warn(`[Orchestrator] Dropping ${record.relativePath}: ${content.failure.message}`);
        dropped.push(record.relativePath);
        continue;
      }

      const audit = await this.auditor.analyzeFileWithFallback(record.relativePath, content.value, analysis);
      if (!audit.success || audit.report.plan.length === 0) {
        console.warn(`[Orchestrator] Dropping ${record.relativePath}: no usable plan`);
        dropped.push(record.relativePath);
        continue;
      }

      selected.push({ record, analysis, plan: audit.report.plan, usedFallback: audit.usedFallback });
    }

    const average = averageScore(analyzed.map(a => a.analysis.score));
    console.log(`[Orchestrator] Selected ${selected.length} of ${analyzed.length} analyzed files (average score ${average.toFixed(2)})`);

    return {
      filesFound: enumerated.value.length,
      testFiles,
      analyzed: analyzed.map(a => a.analysis),
      selected,
      dropped,
      averageScore: average
    };
  }

  // ==========================================
  // Per-file loop
  // ==========================================

  async repairFile(file: SelectedFile): Promise<FileOutcome> {
    const { relativePath } = file.record;
    let state: IterationState = {
      iteration: 0,
      failure: undefined,
      initialScore: file.analysis.score,
      currentScore: file.analysis.score
    };

    while (state.iteration < this.options.maxIterations) {
      const step = await this.runIteration(file, { ...state, iteration: state.iteration + 1 });
      this.iterationsRun++;
      state = step.state;

      if (step.next === 'success') {
        console.log(`[Orchestrator] ${relativePath} repaired in ${state.iteration} iteration(s)`);
        this.processed.push(relativePath);
        return this.outcome(relativePath, 'success', state);
      }
      if (step.next === 'error') {
        console.error(`[Orchestrator] ${relativePath} failed: ${step.reason}`);
        return this.outcome(relativePath, 'error', state, step.reason);
      }
    }

    console.warn(`[Orchestrator] ${relativePath} not repaired after ${this.options.maxIterations} iterations`);
    return this.outcome(relativePath, 'exhausted', state, `Reached ${this.options.maxIterations} iterations`);
  }

  /**
   * One fix -> write -> syntax -> test -> judge pass
   */
  async runIteration(file: SelectedFile, state: IterationState): Promise<IterationStep> {
    const { path: filePath, relativePath } = file.record;
    console.log(`[Orchestrator] ${relativePath}: iteration ${state.iteration}/${this.options.maxIterations}`);

    const current = await this.store.read(filePath);
    if (!current.success) {
      return { next: 'error', state, reason: `Read failed: ${current.failure.message}` };
    }

    const fix = state.failure
      ? await this.fixer.repairFromFailure(relativePath, current.value, state.failure)
      : await this.fixer.applyPlan(relativePath, current.value, file.plan);
    if (!fix.success) {
      return { next: 'error', state, reason: `Fixer failed: ${fix.error}` };
    }

    const written = await this.store.write(filePath, fix.code);
    if (!written.success) {
      return { next: 'error', state, reason: `Write failed: ${written.failure.message}` };
    }

    const syntax = await this.syntaxChecker.check(filePath);
    if (!syntax.success) {
      return { next: 'error', state, reason: `Syntax check failed: ${syntax.failure.message}` };
    }
    if (!syntax.value.valid) {
      const { line, column, message } = syntax.value;
      console.warn(`[Orchestrator] ${relativePath}: syntax error at ${line}:${column}: ${message}`);
      return { next: 'retry', state: { ...state, failure: { kind: 'syntax', message, line, column } } };
    }

    const tests = await this.testRunner.runTests();
    const reanalysis = await this.analyzer.analyze(filePath);
    if (!reanalysis.success) {
      console.warn(`[Orchestrator] ${relativePath}: re-analysis failed: ${reanalysis.failure.message}`);
    }
    const scored: IterationState = {
      ...state,
      currentScore: reanalysis.success ? reanalysis.value.score : undefined
    };

    if (!tests.success) {
      console.warn(`[Orchestrator] ${relativePath}: test run failed: ${tests.failure.message}`);
      return {
        next: 'retry',
        state: { ...scored, failure: { kind: 'tool', step: 'tests', message: tests.failure.message } }
      };
    }

    const { output, statistics } = tests.value;
    const evaluation = await this.judge.evaluate({
      output,
      statistics,
      initialScore: scored.initialScore,
      currentScore: scored.currentScore
    });

    if (!this.judge.shouldContinue(evaluation)) {
      return { next: 'success', state: { ...scored, failure: undefined } };
    }

    return { next: 'retry', state: { ...scored, failure: { kind: 'tests', output, statistics } } };
  }

  // ==========================================
  // Final validation
  // ==========================================

  async validate(): Promise<FinalValidation> {
    console.log('[Orchestrator] Final validation...');
    const tests = await this.testRunner.runTests();

    const markers = this.options.selection.testFileMarkers;
    const analysis = await this.analyzer.analyzeDirectory(undefined, record => !isTestFile(record.relativePath, markers));
    if (!analysis.success) {
      console.warn(`[Orchestrator] Cannot analyze sandbox: ${analysis.failure.message}`);
    }

    const validation: FinalValidation = {
      testsPassed: tests.success ? tests.value.passed : undefined,
      statistics: tests.success ? tests.value.statistics : undefined,
      testError: tests.success ? undefined : tests.failure.message,
      averageScore: analysis.success ? analysis.value.averageScore : 0,
      filesAnalyzed: analysis.success ? analysis.value.filesAnalyzed : 0
    };

    console.log(`[Orchestrator] Final: tests ${validation.testsPassed === undefined ? 'not run' : validation.testsPassed ? 'passed' : 'failed'}, average score ${validation.averageScore.toFixed(2)}`);
    return validation;
  }

  private outcome(relativePath: string, status: FileOutcome['status'], state: IterationState, reason?: string): FileOutcome {
    return {
      relativePath,
      status,
      iterations: state.iteration,
      initialScore: state.initialScore,
      finalScore: state.currentScore,
      ...(reason ? { reason } : {})
    };
  }
}
