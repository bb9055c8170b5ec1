/**
 * JsonlAuditLog - append-only audit trail of language-model interactions.
 *
 * Every event is one JSON object per line in `logs/experiment_data.jsonl`
 * (configurable).
 *
 * SECURITY: All string content is sanitized before it is written.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getSanitizer } from '../core/OutputSanitizer.js';
import type { AuditEntry, AuditEvent, AuditSink } from './types.js';

export class JsonlAuditLog implements AuditSink {
  readonly filePath: string;
  readonly runId: string;
  private directoryReady = false;

  constructor(filePath: string, runId: string = uuidv4()) {
    this.filePath = filePath;
    this.runId = runId;
  }

  record(entry: AuditEntry): void {
    const sanitizer = getSanitizer();

    const event: AuditEvent = {
      id: uuidv4(),
      runId: this.runId,
      timestamp: new Date().toISOString(),
      agent: entry.agent,
      model: entry.model,
      action: entry.action,
      status: entry.status,
      details: {}
    };

    const details = sanitizer.sanitizeValue(entry.details);
    const line = JSON.stringify({ ...event, details });

    try {
      this.ensureDirectory();
      fs.appendFileSync(this.filePath, `${line}\n`, 'utf-8');
    } catch (err) {
      console.error(`[AuditLog] Failed to write event: ${err}`);
    }
  }

  private ensureDirectory(): void {
    if (this.directoryReady) return;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.directoryReady = true;
  }
}
