/**
 * Core Types
 *
 * Result shapes shared by the sandbox, the tool adapters, the decision
 * roles and the orchestrator.
 */

// ==========================================
// Outcomes
// ==========================================

/**
 * Failure categories an adapter can report instead of a value
 */
export type FailureKind =
  | 'sandbox_violation'
  | 'not_found'
  | 'io_error'
  | 'timed_out'
  | 'tool_error'
  | 'unsupported';

export interface Failure {
  kind: FailureKind;
  /** Human-readable description */
  message: string;
}

/**
 * Tagged result returned by every adapter. Expected failures are values,
 * not exceptions.
 */
export type Outcome<T> =
  | { success: true; value: T }
  | { success: false; failure: Failure };

export function ok<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail<T>(kind: FailureKind, message: string): Outcome<T> {
  return { success: false, failure: { kind, message } };
}

/**
 * Re-type a failure for a caller whose success value differs
 */
export function failed<T>(failure: Failure): Outcome<T> {
  return { success: false, failure };
}

// ==========================================
// Sandbox
// ==========================================

export interface FileRecord {
  /** Canonical absolute path */
  path: string;
  /** Path relative to the sandbox root, always with forward slashes */
  relativePath: string;
  /** Size in bytes */
  size: number;
}

export interface BackupRecord {
  /** Absolute path of the backup file */
  path: string;
  /** File name inside the backup directory */
  name: string;
  /** Stem of the file that was backed up */
  originalStem: string;
  /** Extension of the file that was backed up (with the dot) */
  extension: string;
  /** Timestamp parsed from the name */
  createdAt: Date;
  size: number;
}

export interface WriteReceipt {
  path: string;
  /** Where the prior content went, when a backup was made */
  backupPath?: string;
}

export interface SandboxInfo {
  root: string;
  backupDir: string;
  exists: boolean;
  sourceFileCount: number;
}

// ==========================================
// Static analysis
// ==========================================

export const SEVERITIES = ['error', 'warning', 'convention', 'refactor'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface Issue {
  line: number;
  column: number;
  severity: Severity;
  /** Analyzer rule name, e.g. "unused-import" */
  symbol: string;
  message: string;
}

export interface AnalysisResult {
  /** Absolute path of the analyzed file */
  file: string;
  /** Score in [0, 10]; undefined when the analyzer printed none */
  score: number | undefined;
  issues: Issue[];
  categorized: Record<Severity, Issue[]>;
  totalIssues: number;
}

export interface DirectoryAnalysis {
  results: AnalysisResult[];
  /** Mean over files with a score; 0 when no file produced one */
  averageScore: number;
  /** Number of files that produced a score */
  filesAnalyzed: number;
}

// ==========================================
// Tests
// ==========================================

export interface TestStatistics {
  passed: number;
  failed: number;
  errors: number;
  skipped: number;
  /** passed + failed + errors; skipped tests are not counted */
  total: number;
}

export interface TestRunResult {
  /** Derived from the exit status alone */
  passed: boolean;
  statistics: TestStatistics;
  /** stdout followed by stderr */
  output: string;
  exitCode: number;
}

// ==========================================
// Syntax
// ==========================================

export type SyntaxCheck =
  | { valid: true }
  | { valid: false; line: number; column: number; message: string };
