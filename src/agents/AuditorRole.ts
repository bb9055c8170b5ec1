/**
 * AuditorRole - turns a file plus its static analysis into a repair plan
 */

import type { AnalysisResult } from '../core/types.js';
import { extractJson } from '../prompts/responseParsing.js';
import { BaseRole, type RoleDependencies } from './BaseRole.js';
import { AuditorResponseSchema, CodebaseOverviewSchema } from './schemas.js';
import type {
  AuditOutcome,
  AuditReport,
  CodebaseFileSummary,
  CodebaseOverview,
  PlanStep
} from './types.js';

export interface FallbackOptions {
  /** Scores below this get a leading critical step */
  scoreThreshold: number;
  /** Number of analyzer issues turned into steps */
  issueLimit: number;
}

const DEFAULT_FALLBACK: FallbackOptions = { scoreThreshold: 8, issueLimit: 5 };

/**
 * Rough issue estimate for a response that could not be parsed
 */
function estimateIssues(text: string): number {
  const lower = text.toLowerCase();
  return lower.includes('error') || lower.includes('issue') ? 1 : 0;
}

/**
 * Plan synthesized from analyzer output alone
 */
export function buildFallbackPlan(analysis: AnalysisResult | undefined, options: FallbackOptions): PlanStep[] {
  if (!analysis) return [];

  const plan: PlanStep[] = [];
  if (analysis.score !== undefined && analysis.score < options.scoreThreshold) {
    plan.push({
      step: `Raise the static analysis score above ${options.scoreThreshold}`,
      rationale: `Current score is ${analysis.score.toFixed(2)}/10`,
      priority: 'critical'
    });
  }

  for (const issue of analysis.issues.slice(0, options.issueLimit)) {
    plan.push({
      step: `Fix ${issue.severity} at line ${issue.line}`,
      rationale: issue.message,
      priority: issue.severity === 'error' ? 'high' : 'medium'
    });
  }

  return plan;
}

export class AuditorRole extends BaseRole {
  protected readonly role = 'Auditor';
  private fallback: FallbackOptions;

  constructor(deps: RoleDependencies, fallback: Partial<FallbackOptions> = {}) {
    super(deps);
    this.fallback = { ...DEFAULT_FALLBACK, ...fallback };
  }

  /**
   * Ask the model for a plan. An unusable response is a failure, not a throw.
   */
  async analyzeFile(relativePath: string, content: string, analysis?: AnalysisResult): Promise<AuditOutcome> {
    const prompt = this.prompts.buildAuditorPrompt(relativePath, content, analysis);
    console.log(`[${this.role}] Analyzing ${relativePath}...`);

    const response = await this.call(prompt);
    const text = response.success ? response.text : `ERROR: ${response.error}`;
    const parsed = response.success
      ? AuditorResponseSchema.safeParse(extractJson(response.text))
      : undefined;

    if (!parsed?.success) {
      this.record('analysis', 'FAILURE', prompt, response, {
        file_analyzed: relativePath,
        analysis_score: analysis?.score ?? null,
        analysis_success: false
      });
      console.warn(`[${this.role}] Failed to parse analysis for ${relativePath}`);
      return {
        success: false,
        error: response.success ? 'Failed to parse JSON response from LLM' : response.error,
        estimatedIssues: estimateIssues(text),
        responsePreview: text ? text.slice(0, 200) : 'Empty response'
      };
    }

    const report: AuditReport = {
      file: relativePath,
      summary: parsed.data.summary,
      issues: parsed.data.issues,
      plan: parsed.data.refactoring_plan
    };

    this.record('analysis', 'SUCCESS', prompt, response, {
      file_analyzed: relativePath,
      analysis_score: analysis?.score ?? null,
      issues_found: report.issues.length,
      plan_steps: report.plan.length,
      analysis_success: true
    });
    console.log(`[${this.role}] ${relativePath}: ${report.issues.length} issues, ${report.plan.length} plan steps`);

    return { success: true, report, usedFallback: false };
  }

  /**
   * Same as analyzeFile, but an unusable response degrades to a plan built
   * from the analyzer's issue list
   */
  async analyzeFileWithFallback(relativePath: string, content: string, analysis?: AnalysisResult): Promise<AuditOutcome> {
    const result = await this.analyzeFile(relativePath, content, analysis);
    if (result.success) return result;

    console.warn(`[${this.role}] Using fallback plan for ${relativePath}`);
    const plan = buildFallbackPlan(analysis, this.fallback);

    return {
      success: true,
      usedFallback: true,
      report: {
        file: relativePath,
        summary: 'Plan derived from static analysis after an unusable auditor response',
        issues: (analysis?.issues ?? []).slice(0, this.fallback.issueLimit).map(issue => ({
          line: issue.line,
          type: issue.severity,
          message: issue.message
        })),
        plan
      }
    };
  }

  /**
   * One-call ranking of every file in the sandbox
   */
  async analyzeCodebase(files: CodebaseFileSummary[]): Promise<CodebaseOverview> {
    const prompt = this.prompts.buildCodebasePrompt(files);
    console.log(`[${this.role}] Analyzing ${files.length} files...`);

    const response = await this.call(prompt);
    const parsed = response.success
      ? CodebaseOverviewSchema.safeParse(extractJson(response.text))
      : undefined;

    const details = {
      files_analyzed: files.map(f => f.relativePath),
      total_files: files.length,
      analysis_success: parsed?.success === true
    };

    if (!parsed?.success) {
      this.record('analysis', 'FAILURE', prompt, response, details);
      return {
        success: false,
        error: response.success ? 'Failed to parse JSON response for codebase analysis' : response.error,
        filesAnalyzed: files.length
      };
    }

    this.record('analysis', 'SUCCESS', prompt, response, details);
    return {
      success: true,
      summary: parsed.data.summary,
      priorities: parsed.data.priorities,
      filesAnalyzed: files.length
    };
  }
}
