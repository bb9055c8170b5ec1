/**
 * JudgeRole - decides from test results whether a file's repair is done
 */

import { extractJson } from '../prompts/responseParsing.js';
import { BaseRole } from './BaseRole.js';
import { JudgeResponseSchema } from './schemas.js';
import type { Evaluation, JudgeInput } from './types.js';

export class JudgeRole extends BaseRole {
  protected readonly role = 'Judge';

  async evaluate(input: JudgeInput): Promise<Evaluation> {
    const prompt = this.prompts.buildJudgePrompt(input);
    console.log(`[${this.role}] Evaluating test results...`);

    const response = await this.call(prompt);
    const parsed = response.success
      ? JudgeResponseSchema.safeParse(extractJson(response.text))
      : undefined;

    const { initialScore, currentScore } = input;
    this.record('debug', parsed?.success ? 'SUCCESS' : 'FAILURE', prompt, response, {
      tests_passed: input.statistics.passed,
      tests_failed: input.statistics.failed,
      quality_improvement: initialScore !== undefined && currentScore !== undefined
        ? currentScore - initialScore
        : null
    });

    if (!parsed?.success) {
      console.warn(`[${this.role}] Failed to parse evaluation`);
      return {
        success: false,
        error: response.success ? 'Failed to parse JSON response' : response.error
      };
    }

    console.log(`[${this.role}] Verdict: ${parsed.data.tests_passed ? 'PASS' : 'NEEDS MORE WORK'}`);
    return {
      success: true,
      testsPassed: parsed.data.tests_passed,
      errors: parsed.data.errors,
      summary: parsed.data.summary
    };
  }

  /**
   * An evaluation that failed to parse never counts as success
   */
  shouldContinue(evaluation: Evaluation): boolean {
    return !evaluation.success || !evaluation.testsPassed;
  }
}
