/**
 * Orchestrator Types
 */

import type { AuditorRole } from '../agents/AuditorRole.js';
import type { FixerRole } from '../agents/FixerRole.js';
import type { JudgeRole } from '../agents/JudgeRole.js';
import type { FailureContext, PlanStep } from '../agents/types.js';
import type { AuditSink } from '../audit/types.js';
import type { StaticAnalyzer } from '../capabilities/analysis/StaticAnalyzer.js';
import type { SyntaxChecker } from '../capabilities/ast/SyntaxChecker.js';
import type { TestRunner } from '../capabilities/testing/TestRunner.js';
import type { SelectionConfig } from '../core/config.js';
import type { AnalysisResult, FileRecord, TestStatistics } from '../core/types.js';
import type { SandboxFileStore } from '../services/SandboxFileStore.js';

export interface OrchestratorDependencies {
  store: SandboxFileStore;
  analyzer: StaticAnalyzer;
  testRunner: TestRunner;
  syntaxChecker: SyntaxChecker;
  auditor: AuditorRole;
  fixer: FixerRole;
  judge: JudgeRole;
  audit: AuditSink;
}

export interface OrchestratorOptions {
  maxIterations: number;
  selection: SelectionConfig;
}

// ==========================================
// Discovery
// ==========================================

export interface SelectedFile {
  record: FileRecord;
  analysis: AnalysisResult;
  plan: PlanStep[];
  /** Plan came from analyzer output because the auditor response was unusable */
  usedFallback: boolean;
}

export interface DiscoveryReport {
  /** Source files found, test files included */
  filesFound: number;
  /** Relative paths skipped as test files */
  testFiles: string[];
  analyzed: AnalysisResult[];
  selected: SelectedFile[];
  /** Selected by the thresholds but dropped for lack of a plan */
  dropped: string[];
  /** Mean score over analyzed files; the "before" signal */
  averageScore: number;
}

// ==========================================
// Per-file loop
// ==========================================

/**
 * Accumulator threaded through a file's iterations
 */
export interface IterationState {
  /** 1-based number of the iteration about to run or just run */
  iteration: number;
  failure: FailureContext | undefined;
  /** Fixed at discovery time */
  initialScore: number | undefined;
  /** Latest re-analysis; undefined when the analyzer failed */
  currentScore: number | undefined;
}

export type IterationStep =
  | { next: 'success'; state: IterationState }
  | { next: 'error'; state: IterationState; reason: string }
  | { next: 'retry'; state: IterationState };

export type FileStatus = 'success' | 'exhausted' | 'error';

export interface FileOutcome {
  relativePath: string;
  status: FileStatus;
  iterations: number;
  initialScore: number | undefined;
  finalScore: number | undefined;
  reason?: string;
}

// ==========================================
// Final validation and report
// ==========================================

export interface FinalValidation {
  testsPassed: boolean | undefined;
  statistics: TestStatistics | undefined;
  /** Why the suite could not be run, when it could not */
  testError?: string;
  averageScore: number;
  filesAnalyzed: number;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  discovery: DiscoveryReport;
  files: FileOutcome[];
  totalIterations: number;
  filesProcessed: string[];
  /** Undefined when discovery selected nothing */
  finalValidation?: FinalValidation;
}
