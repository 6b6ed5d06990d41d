import { normalize } from 'node:path';
import { z } from 'zod';
import type { FixMode } from './types.js';

export const DEFAULT_CONCURRENCY = 4;

export const fixSafetySchema = z.enum(['safe', 'suggestion', 'unsafe']);

// Modes stay plain strings here: unknown ones fall back to 'always' at lookup.
const fixModesSchema = z.record(z.string(), z.record(z.string(), z.string()));

export const fixerOptionsSchema = z.object({
  safetyThreshold: fixSafetySchema.default('safe'),
  fixRules: z.array(z.string().min(1)).default([]),
  fixModes: fixModesSchema.default({}),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
});

export type FixerOptionsInput = z.input<typeof fixerOptionsSchema>;
export type FixerSettings = z.output<typeof fixerOptionsSchema>;

export function parseFixerOptions(input: unknown): FixerSettings {
  const settings = fixerOptionsSchema.parse(input ?? {});
  const fixModes: Record<string, Record<string, string>> = {};
  for (const [file, modes] of Object.entries(settings.fixModes)) {
    fixModes[normalize(file)] = { ...fixModes[normalize(file)], ...modes };
  }
  return { ...settings, fixModes };
}

export function toFixMode(raw: string | undefined): FixMode {
  switch (raw) {
    case 'never':
    case 'explicit':
    case 'unsafe-only':
    case 'always':
      return raw;
    default:
      return 'always';
  }
}

const ruleConfigSchema = z.object({ fix: z.string().optional() }).passthrough();

export const rulesConfigSchema = z.object({
  rules: z.record(z.string(), z.record(z.string(), ruleConfigSchema)).default({}),
});

export type RulesConfig = z.input<typeof rulesConfigSchema>;

/**
 * Per-rule fix modes from a rules config. Keys are `<namespace>/<rule>`;
 * rules without a `fix` setting are left out.
 */
export function buildFixModes(config: RulesConfig | undefined): Record<string, string> {
  if (!config) return {};
  const { rules } = rulesConfigSchema.parse(config);
  const modes: Record<string, string> = {};
  for (const [namespace, ruleConfigs] of Object.entries(rules)) {
    for (const [name, cfg] of Object.entries(ruleConfigs)) {
      if (!cfg.fix) continue;
      modes[`${namespace}/${name}`] = cfg.fix;
    }
  }
  return modes;
}

export function fixModesForFiles(paths: Iterable<string>, modes: Record<string, string>): Record<string, Record<string, string>> {
  const out: Record<string, Record<string, string>> = {};
  for (const p of paths) out[normalize(p)] = { ...modes };
  return out;
}
