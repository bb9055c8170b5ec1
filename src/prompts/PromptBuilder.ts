/**
 * PromptBuilder
 *
 * Formats the auditor, fixer and judge prompts. Each prompt is a system
 * instruction plus a user message carrying the file and tool context.
 */

import * as path from 'path';
import type { AnalysisResult, TestStatistics } from '../core/types.js';
import type { CodebaseFileSummary, FailureContext, JudgeInput, PlanStep } from '../agents/types.js';
import { truncateMiddle } from './responseParsing.js';

export interface Prompt {
  system: string;
  user: string;
}

const FENCE_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.pyi': 'python',
  '.js': 'javascript',
  '.jsx': 'jsx',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'tsx',
  '.mts': 'typescript',
  '.cts': 'typescript'
};

const TOP_ISSUES = 5;
const MAX_OUTPUT_LINES = 200;

export function fenceLanguage(filePath: string): string {
  return FENCE_LANGUAGES[path.extname(filePath).toLowerCase()] ?? '';
}

function formatScore(score: number | undefined): string {
  return score === undefined ? 'N/A' : `${score.toFixed(2)}/10`;
}

function formatStatistics(statistics: TestStatistics): string {
  return [
    `- Tests Passed: ${statistics.passed}`,
    `- Tests Failed: ${statistics.failed}`,
    `- Errors: ${statistics.errors}`,
    `- Total Tests: ${statistics.total}`
  ].join('\n');
}

const AUDITOR_SYSTEM = `You are the AUDITOR of an automated code repair loop.
Read the file and the static analysis summary, then produce a prioritized refactoring plan.
DO NOT write code.

Respond with a single JSON object and nothing else:
{
  "summary": "one paragraph",
  "issues": [{ "line": 12, "type": "error", "message": "..." }],
  "refactoring_plan": [
    { "step": "what to change", "rationale": "why", "priority": "critical|high|medium|low" }
  ]
}`;

const FIXER_SYSTEM = `You are the FIXER of an automated code repair loop.
You receive a file and either a refactoring plan or the failure of your previous attempt.
Return ONLY the complete corrected file. No explanations, no markdown outside a single optional code fence.
Keep the public behaviour the tests rely on.`;

const JUDGE_SYSTEM = `You are the JUDGE of an automated code repair loop.
Decide from the test results whether the repair is complete.

Respond with a single JSON object and nothing else:
{
  "tests_passed": true,
  "errors": ["critical problem, if any"],
  "summary": "one sentence"
}`;

export class PromptBuilder {
  /**
   * Auditor prompt for one file
   */
  buildAuditorPrompt(relativePath: string, content: string, analysis?: AnalysisResult): Prompt {
    const sections = [
      `FILE PATH: ${relativePath}`,
      '',
      'FILE CONTENT:',
      '```' + fenceLanguage(relativePath),
      content,
      '```'
    ];

    if (analysis) {
      sections.push(
        '',
        'STATIC ANALYSIS:',
        `- Current Score: ${formatScore(analysis.score)}`,
        `- Errors: ${analysis.categorized.error.length}`,
        `- Warnings: ${analysis.categorized.warning.length}`,
        `- Conventions: ${analysis.categorized.convention.length}`,
        `- Refactor suggestions: ${analysis.categorized.refactor.length}`,
        '',
        'TOP ISSUES:',
        ...analysis.issues
          .slice(0, TOP_ISSUES)
          .map((issue, i) => `${i + 1}. Line ${issue.line}: [${issue.symbol}] ${issue.message}`)
      );
    }

    sections.push('', 'Provide your analysis as JSON:');
    return { system: AUDITOR_SYSTEM, user: sections.join('\n') };
  }

  /**
   * Auditor prompt for a whole-codebase overview
   */
  buildCodebasePrompt(files: CodebaseFileSummary[]): Prompt {
    const entries = files.map(file => [
      `FILE: ${file.relativePath}`,
      `- Score: ${formatScore(file.score)}`,
      `- Total Issues: ${file.totalIssues}`,
      `- Size: ${file.size} bytes`
    ].join('\n'));

    return {
      system: `You are the AUDITOR of an automated code repair loop.
Rank the files of a codebase by how urgently they need repair.

Respond with a single JSON object and nothing else:
{
  "summary": "overall assessment",
  "priorities": [{ "file": "relative/path", "priority": "critical|high|medium|low", "reason": "..." }]
}`,
      user: `CODEBASE ANALYSIS:\n\n${entries.join('\n\n')}\n\nProvide a prioritized refactoring plan as JSON:`
    };
  }

  /**
   * Fixer prompt in plan mode
   */
  buildFixerPlanPrompt(relativePath: string, content: string, plan: PlanStep[]): Prompt {
    const steps = plan.map((step, i) =>
      `${i + 1}. [${step.priority}] ${step.step}${step.rationale ? `\n   Rationale: ${step.rationale}` : ''}`
    );

    return {
      system: FIXER_SYSTEM,
      user: [
        `FILE TO FIX: ${relativePath}`,
        '',
        'CURRENT CODE:',
        '```' + fenceLanguage(relativePath),
        content,
        '```',
        '',
        'REFACTORING PLAN:',
        ...steps,
        '',
        'Provide the complete fixed code:'
      ].join('\n')
    };
  }

  /**
   * Fixer prompt in repair mode, driven by the previous iteration's failure
   */
  buildFixerRepairPrompt(relativePath: string, content: string, failure: FailureContext): Prompt {
    return {
      system: FIXER_SYSTEM,
      user: [
        `FILE TO FIX: ${relativePath}`,
        '',
        'CURRENT CODE:',
        '```' + fenceLanguage(relativePath),
        content,
        '```',
        '',
        ...this.describeFailure(failure),
        '',
        'Provide the complete fixed code:'
      ].join('\n')
    };
  }

  /**
   * Judge prompt
   */
  buildJudgePrompt(input: JudgeInput): Prompt {
    const { initialScore, currentScore } = input;
    const improvement = initialScore !== undefined && currentScore !== undefined
      ? `${currentScore - initialScore >= 0 ? '+' : ''}${(currentScore - initialScore).toFixed(2)} points`
      : 'N/A';

    return {
      system: JUDGE_SYSTEM,
      user: [
        'TEST EXECUTION RESULTS:',
        '',
        'STATISTICS:',
        formatStatistics(input.statistics),
        '',
        'CODE QUALITY METRICS:',
        `- Initial Score: ${formatScore(initialScore)}`,
        `- Current Score: ${formatScore(currentScore)}`,
        `- Improvement: ${improvement}`,
        '',
        'TEST OUTPUT:',
        '```',
        truncateMiddle(input.output, MAX_OUTPUT_LINES),
        '```',
        '',
        'Provide your evaluation as JSON:'
      ].join('\n')
    };
  }

  private describeFailure(failure: FailureContext): string[] {
    switch (failure.kind) {
      case 'syntax':
        return [
          'PREVIOUS ATTEMPT HAD A SYNTAX ERROR:',
          `- Line ${failure.line}, column ${failure.column}: ${failure.message}`,
          '',
          'Fix the syntax error and keep the intended changes.'
        ];
      case 'tests':
        return [
          'TEST RESULTS:',
          formatStatistics(failure.statistics),
          '',
          'TEST OUTPUT:',
          '```',
          truncateMiddle(failure.output, MAX_OUTPUT_LINES),
          '```',
          '',
          'Analyze the test failures and fix the code so that all tests pass.'
        ];
      case 'tool':
        return [
          `THE ${failure.step.toUpperCase()} STEP FAILED:`,
          failure.message,
          '',
          'Make sure the code can be imported and executed by the test suite.'
        ];
    }
  }
}
