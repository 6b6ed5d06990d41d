import { rangeLocation } from '../src/core/edits.js';
import type { FixSafety, SuggestedFix, TextEdit, Violation } from '../src/core/types.js';

export function edit(file: string, sl: number, sc: number, el: number, ec: number, newText: string): TextEdit {
  return { location: rangeLocation(file, sl, sc, el, ec), newText };
}

export function fix(edits: TextEdit[], overrides: Partial<SuggestedFix> = {}): SuggestedFix {
  return { description: 'test fix', safety: 'safe', priority: 0, edits, ...overrides };
}

export function violation(ruleCode: string, suggestedFix: SuggestedFix | undefined, file = 'Dockerfile', line = 1): Violation {
  return {
    location: rangeLocation(file, line, 0, line, 0),
    ruleCode,
    message: `${ruleCode} violated`,
    severity: 'warning',
    ...(suggestedFix ? { suggestedFix } : {}),
  };
}

export function safeFix(edits: TextEdit[], safety: FixSafety = 'safe', priority = 0): SuggestedFix {
  return fix(edits, { safety, priority });
}
