import { z } from 'zod';
import { fixSafetySchema } from './config.js';
import type { Violation } from './types.js';

const positionSchema = z.object({
  line: z.number().int(),
  column: z.number().int().default(0),
});

export const locationSchema = z.object({
  file: z.string().min(1),
  start: positionSchema,
  end: positionSchema,
});

export const textEditSchema = z.object({
  location: locationSchema,
  newText: z.string(),
});

const resolverRequestSchema = z.discriminatedUnion('resolverId', [
  z.object({
    resolverId: z.literal('prefer-run-heredoc'),
    data: z.object({
      kind: z.enum(['consecutive', 'chained']),
      stageIndex: z.number().int().nonnegative(),
      minCommands: z.number().int().positive().optional(),
    }),
  }),
  z.object({
    resolverId: z.literal('epilogue-order'),
    data: z.record(z.string(), z.never()).default({}),
  }),
  z.object({
    resolverId: z.literal('newline-between-instructions'),
    data: z.object({ mode: z.enum(['always', 'never', 'grouped']) }),
  }),
]);

export const suggestedFixSchema = z.object({
  description: z.string(),
  safety: fixSafetySchema.default('safe'),
  priority: z.number().int().default(0),
  isPreferred: z.boolean().optional(),
  edits: z.array(textEditSchema).default([]),
  needsResolve: z.boolean().optional(),
  resolver: resolverRequestSchema.optional(),
});

export const violationSchema = z.object({
  location: locationSchema,
  ruleCode: z.string().min(1),
  message: z.string(),
  severity: z.enum(['error', 'warning', 'info', 'style']).default('warning'),
  detail: z.string().optional(),
  docUrl: z.string().optional(),
  suggestedFix: suggestedFixSchema.optional(),
});

export const violationReportSchema = z.object({
  violations: z.array(violationSchema),
});

export function parseViolationReport(input: unknown): Violation[] {
  return violationReportSchema.parse(input).violations;
}
