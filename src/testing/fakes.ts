/**
 * In-process stand-ins used by the test suites
 */

import type { AuditEntry, AuditSink } from '../audit/types.js';
import { categorizeIssues } from '../capabilities/analysis/parsing.js';
import type { AnalysisResult, Issue } from '../core/types.js';
import type { LLMClient, LLMResponse, Message } from '../providers/types.js';

/**
 * Answers each generate() call with the next scripted reply. An Error in the
 * script is thrown instead of returned.
 */
export class ScriptedClient implements LLMClient {
  readonly model: string;
  readonly calls: Message[][] = [];
  private replies: Array<string | Error>;

  constructor(replies: Array<string | Error> = [], model: string = 'test-model') {
    this.replies = [...replies];
    this.model = model;
  }

  push(...replies: Array<string | Error>): void {
    this.replies.push(...replies);
  }

  get remaining(): number {
    return this.replies.length;
  }

  async generate(messages: Message[]): Promise<LLMResponse> {
    this.calls.push(messages);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedClient: no reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply, stopReason: 'end_turn' };
  }

  /** User message of the n-th call */
  userPrompt(index: number): string {
    return this.calls[index]?.find(m => m.role === 'user')?.content ?? '';
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];

  record(entry: AuditEntry): void {
    this.entries.push(entry);
  }
}

export function makeIssue(line: number, severity: Issue['severity'], message: string = `problem on line ${line}`): Issue {
  return { line, column: 0, severity, symbol: 'test-symbol', message };
}

export function makeAnalysis(file: string, score: number | undefined, issues: Issue[] = []): AnalysisResult {
  return {
    file,
    score,
    issues,
    categorized: categorizeIssues(issues),
    totalIssues: issues.length
  };
}
