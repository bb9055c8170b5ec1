/**
 * Decision Role Types
 */

import type { TestStatistics } from '../core/types.js';

export const PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;

export type Priority = (typeof PRIORITIES)[number];

/**
 * One instruction of a repair plan. Order is presentation priority, not
 * execution dependency.
 */
export interface PlanStep {
  step: string;
  rationale: string;
  priority: Priority;
}

export interface ReportedIssue {
  line?: number;
  type: string;
  message: string;
}

export interface AuditReport {
  /** Relative path of the audited file */
  file: string;
  summary?: string;
  issues: ReportedIssue[];
  plan: PlanStep[];
}

export type AuditOutcome =
  | { success: true; report: AuditReport; usedFallback: boolean }
  | {
      success: false;
      error: string;
      /** 1 when the response mentions errors or issues, else 0 */
      estimatedIssues: number;
      /** First 200 characters of the raw response */
      responsePreview: string;
    };

export interface CodebaseFileSummary {
  relativePath: string;
  score: number | undefined;
  totalIssues: number;
  size: number;
}

export interface CodebasePriority {
  file: string;
  priority: Priority;
  reason: string;
}

export type CodebaseOverview =
  | { success: true; summary: string; priorities: CodebasePriority[]; filesAnalyzed: number }
  | { success: false; error: string; filesAnalyzed: number };

/**
 * What went wrong in the previous iteration of a file's loop
 */
export type FailureContext =
  | { kind: 'syntax'; message: string; line: number; column: number }
  | { kind: 'tests'; output: string; statistics: TestStatistics }
  | { kind: 'tool'; step: string; message: string };

export type FixResult =
  | { success: true; code: string }
  | { success: false; error: string };

export interface JudgeInput {
  output: string;
  statistics: TestStatistics;
  initialScore: number | undefined;
  currentScore: number | undefined;
}

export type Evaluation =
  | { success: true; testsPassed: boolean; errors: string[]; summary?: string }
  | { success: false; error: string };

/**
 * Result of a single language-model call made by a role
 */
export type CallResult =
  | { success: true; text: string }
  | { success: false; error: string };
