/**
 * Response schemas for the JSON-speaking roles
 */

import { z } from 'zod';
import { PRIORITIES } from './types.js';

export const PrioritySchema = z.enum(PRIORITIES).catch('medium');

export const PlanStepSchema = z.object({
  step: z.string().min(1),
  rationale: z.string().default(''),
  priority: PrioritySchema.default('medium')
});

export const AuditorResponseSchema = z.object({
  summary: z.string().optional(),
  issues: z
    .array(
      z.object({
        line: z.number().int().optional(),
        type: z.string().default('issue'),
        message: z.string()
      })
    )
    .default([]),
  refactoring_plan: z.array(PlanStepSchema).default([])
});

export const CodebaseOverviewSchema = z.object({
  summary: z.string().default(''),
  priorities: z
    .array(
      z.object({
        file: z.string(),
        priority: PrioritySchema.default('medium'),
        reason: z.string().default('')
      })
    )
    .default([])
});

export const JudgeResponseSchema = z.object({
  tests_passed: z.boolean(),
  errors: z
    .array(z.unknown())
    .default([])
    .transform(items => items.map(item => (typeof item === 'string' ? item : JSON.stringify(item)))),
  summary: z.string().optional()
});
