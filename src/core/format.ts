import { describeSkipReason, type FileChange, type FixResult } from './result.js';
import type { Location } from './types.js';

export type OutputFormat = 'text' | 'json';

function at(path: string, loc: Location): string {
  return `${path}:${loc.start.line}:${loc.start.column + 1}`;
}

function sortedChanges(result: FixResult): FileChange[] {
  return [...result.changes.values()].sort((a, b) => a.path.localeCompare(b.path));
}

export function textReport(result: FixResult): string {
  const lines: string[] = [];
  for (const fc of sortedChanges(result)) {
    if (fc.applied.length === 0 && fc.skipped.length === 0) continue;
    lines.push(`\x1b[1m${fc.path}\x1b[0m`);
    for (const a of fc.applied) {
      lines.push(`  \x1b[32mfixed\x1b[0m[${a.ruleCode}]: ${a.description}`);
      lines.push(`    at ${at(fc.path, a.location)}`);
    }
    for (const s of fc.skipped) {
      const why = s.error ? `${describeSkipReason(s.reason)}: ${s.error}` : describeSkipReason(s.reason);
      lines.push(`  \x1b[33mskipped\x1b[0m[${s.ruleCode}]: ${why}`);
      lines.push(`    at ${at(fc.path, s.location)}`);
    }
    lines.push('');
  }

  const applied = result.totalApplied();
  const skipped = result.totalSkipped();
  const files = result.filesModified();
  lines.push(`Fixed ${applied} issue${applied === 1 ? '' : 's'} in ${files} file${files === 1 ? '' : 's'}` +
    (skipped > 0 ? ` (${skipped} skipped)` : ''));
  return lines.join('\n');
}

export function toJsonResult(result: FixResult) {
  return {
    applied: result.totalApplied(),
    skipped: result.totalSkipped(),
    filesModified: result.filesModified(),
    files: sortedChanges(result).map(fc => ({
      file: fc.path,
      modified: fc.hasChanges(),
      appliedCount: fc.applied.length,
      skippedCount: fc.skipped.length,
      applied: fc.applied.map(a => ({
        rule: a.ruleCode,
        description: a.description,
        safety: a.safety,
        location: a.location,
      })),
      skipped: fc.skipped.map(s => ({
        rule: s.ruleCode,
        reason: s.reason,
        message: describeSkipReason(s.reason),
        location: s.location,
        ...(s.error ? { error: s.error } : {}),
      })),
    })),
  };
}
