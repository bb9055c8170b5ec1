/**
 * FixerRole - produces replacement file content
 *
 * Two modes: apply the auditor's plan, or repair the failure reported by
 * the previous iteration. The response is raw code, optionally fenced.
 */

import type { Prompt } from '../prompts/PromptBuilder.js';
import { stripCodeFences } from '../prompts/responseParsing.js';
import type { AuditDetails } from '../audit/types.js';
import { BaseRole } from './BaseRole.js';
import type { FailureContext, FixResult, PlanStep } from './types.js';

export class FixerRole extends BaseRole {
  protected readonly role = 'Fixer';

  async applyPlan(relativePath: string, content: string, plan: PlanStep[]): Promise<FixResult> {
    console.log(`[${this.role}] Applying ${plan.length}-step plan to ${relativePath}...`);
    const prompt = this.prompts.buildFixerPlanPrompt(relativePath, content, plan);
    return this.fix(prompt, {
      file_fixed: relativePath,
      mode: 'plan',
      refactoring_steps: plan.length
    });
  }

  async repairFromFailure(relativePath: string, content: string, failure: FailureContext): Promise<FixResult> {
    console.log(`[${this.role}] Repairing ${failure.kind} failure in ${relativePath}...`);
    const prompt = this.prompts.buildFixerRepairPrompt(relativePath, content, failure);
    return this.fix(prompt, {
      file_fixed: relativePath,
      mode: 'repair',
      failure_kind: failure.kind,
      tests_failed: failure.kind === 'tests' ? failure.statistics.failed : null
    });
  }

  private async fix(prompt: Prompt, details: AuditDetails): Promise<FixResult> {
    const response = await this.call(prompt);
    if (!response.success) {
      this.record('fix', 'FAILURE', prompt, response, details);
      return { success: false, error: response.error };
    }

    const code = stripCodeFences(response.text);
    if (!code) {
      this.record('fix', 'FAILURE', prompt, response, details);
      return { success: false, error: 'Fixer returned no code' };
    }

    this.record('fix', 'SUCCESS', prompt, response, details);
    return { success: true, code: `${code}\n` };
  }
}
