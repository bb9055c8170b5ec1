/**
 * Audit Types
 *
 * One event per language-model call (plus orchestrator failures), written
 * as a JSON line for later analysis of the run.
 */

export type AuditAction = 'analysis' | 'fix' | 'debug';

export type AuditStatus = 'SUCCESS' | 'FAILURE' | 'PARTIAL';

/**
 * Free-form event payload. Role events carry `input_prompt` and
 * `output_response`.
 */
export type AuditDetails = Record<string, unknown>;

export interface AuditEntry {
  /** Emitting component, e.g. "Auditor_Agent" */
  agent: string;
  /** Model identifier, or "n/a" for non-LLM events */
  model: string;
  action: AuditAction;
  status: AuditStatus;
  details: AuditDetails;
}

export interface AuditEvent extends AuditEntry {
  id: string;
  runId: string;
  /** ISO-8601 */
  timestamp: string;
}

/**
 * Destination for audit events. Recording never fails the caller.
 */
export interface AuditSink {
  record(entry: AuditEntry): void;
}
