/**
 * Analysis Types
 *
 * Type definitions specific to static analysis.
 */

import { z } from 'zod';
import type { CommandRunner } from '../process/runCommand.js';

/**
 * One entry of the analyzer's JSON report (pylint `--output-format=json`).
 * Only the fields the adapter reads are checked.
 */
export const AnalyzerMessageSchema = z.object({
  type: z.string(),
  line: z.number().nullable().optional(),
  column: z.number().nullable().optional(),
  symbol: z.string().optional(),
  'message-id': z.string().optional(),
  message: z.string()
});

export type AnalyzerMessage = z.infer<typeof AnalyzerMessageSchema>;

export interface AnalyzerOptions {
  /** Analyzer executable, optionally with leading arguments */
  command: string;
  /** Default per-call timeout */
  timeoutMs: number;
  /** Process runner (swapped for a fake in tests) */
  runner?: CommandRunner;
}
