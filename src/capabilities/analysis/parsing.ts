/**
 * Analyzer output parsing
 *
 * Grammar of what the analyzer prints: a JSON array of messages on stdout
 * and a "rated at X/10" line for the score.
 */

import { z } from 'zod';
import { SEVERITIES, type Issue, type Severity } from '../../core/types.js';
import { AnalyzerMessageSchema } from './types.js';

const SCORE_PATTERN = /rated at (-?\d+(?:\.\d+)?)\/10/;

/**
 * Score from the analyzer's report text, clamped to [0, 10].
 * Undefined when the phrase is absent.
 */
export function parseScore(text: string): number | undefined {
  const match = text.match(SCORE_PATTERN);
  if (!match) return undefined;
  const score = parseFloat(match[1]);
  return Math.min(10, Math.max(0, score));
}

/**
 * Fold analyzer message types onto the four severities
 */
export function toSeverity(type: string): Severity {
  const normalized = type.toLowerCase();
  if (normalized === 'fatal') return 'error';
  return SEVERITIES.find(s => s === normalized) ?? 'convention';
}

/**
 * Issues from the JSON report. Unparseable output yields no issues;
 * malformed entries are skipped.
 */
export function parseIssues(stdout: string): Issue[] {
  if (!stdout.trim()) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    return [];
  }

  const entries = z.array(z.unknown()).safeParse(raw);
  if (!entries.success) return [];

  const issues: Issue[] = [];
  for (const entry of entries.data) {
    const parsed = AnalyzerMessageSchema.safeParse(entry);
    if (!parsed.success) continue;
    const message = parsed.data;
    issues.push({
      line: message.line ?? 0,
      column: message.column ?? 0,
      severity: toSeverity(message.type),
      symbol: message.symbol ?? message['message-id'] ?? 'unknown',
      message: message.message
    });
  }
  return issues;
}

export function categorizeIssues(issues: Issue[]): Record<Severity, Issue[]> {
  return {
    error: issues.filter(i => i.severity === 'error'),
    warning: issues.filter(i => i.severity === 'warning'),
    convention: issues.filter(i => i.severity === 'convention'),
    refactor: issues.filter(i => i.severity === 'refactor')
  };
}

/**
 * Mean of the defined scores; 0 when no score is defined.
 */
export function averageScore(scores: Array<number | undefined>): number {
  const defined = scores.filter((s): s is number => s !== undefined);
  if (defined.length === 0) return 0;
  return defined.reduce((sum, s) => sum + s, 0) / defined.length;
}
