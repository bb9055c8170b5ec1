/**
 * BaseRole - shared plumbing for the auditor, fixer and judge
 *
 * A role makes one language-model call per operation and records exactly
 * one audit event for it. Provider errors come back as a failed CallResult.
 */

import type { AuditAction, AuditDetails, AuditSink, AuditStatus } from '../audit/types.js';
import { errorMessage } from '../core/errors.js';
import type { LLMClient } from '../providers/types.js';
import { PromptBuilder, type Prompt } from '../prompts/PromptBuilder.js';
import type { CallResult } from './types.js';

export interface RoleDependencies {
  client: LLMClient;
  audit: AuditSink;
  prompts?: PromptBuilder;
}

export abstract class BaseRole {
  /** Console prefix and audit agent name stem, e.g. "Auditor" */
  protected abstract readonly role: string;

  protected client: LLMClient;
  protected audit: AuditSink;
  protected prompts: PromptBuilder;

  constructor(deps: RoleDependencies) {
    this.client = deps.client;
    this.audit = deps.audit;
    this.prompts = deps.prompts ?? new PromptBuilder();
  }

  get agentName(): string {
    return `${this.role}_Agent`;
  }

  protected async call(prompt: Prompt): Promise<CallResult> {
    try {
      const response = await this.client.generate([
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user }
      ]);
      return { success: true, text: response.content };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[${this.role}] LLM call failed: ${message}`);
      return { success: false, error: message };
    }
  }

  protected record(
    action: AuditAction,
    status: AuditStatus,
    prompt: Prompt,
    response: CallResult,
    details: AuditDetails = {}
  ): void {
    this.audit.record({
      agent: this.agentName,
      model: this.client.model,
      action,
      status,
      details: {
        input_prompt: `${prompt.system}\n\n${prompt.user}`,
        output_response: response.success ? response.text : `ERROR: ${response.error}`,
        ...details
      }
    });
  }
}
