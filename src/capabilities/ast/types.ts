/**
 * AST Types
 */

import { z } from 'zod';
import type { CommandRunner } from '../process/runCommand.js';

export interface SyntaxCheckerOptions {
  /** Interpreter used to parse Python sources (default: python3) */
  pythonCommand?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * The JSON line the Python parse helper prints
 */
export const PythonParseReportSchema = z.union([
  z.object({ valid: z.literal(true) }),
  z.object({
    valid: z.literal(false),
    line: z.number(),
    column: z.number(),
    message: z.string()
  })
]);

export const BABEL_EXTENSIONS = ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'] as const;
