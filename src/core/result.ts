import { normalize } from 'node:path';
import type { FixSafety, Location, TextEdit } from './types.js';

export type SkipReason =
  | 'conflict'
  | 'safety'
  | 'rule-filter'
  | 'fix-mode'
  | 'resolve-error'
  | 'no-edits'
  | 'invalid-range';

const SKIP_REASON_TEXT: Record<SkipReason, string> = {
  'conflict': 'conflicts with another fix',
  'safety': 'above safety threshold',
  'rule-filter': 'rule not in fix-rule list',
  'fix-mode': 'disabled by fix mode config',
  'resolve-error': 'resolver failed',
  'no-edits': 'no edits in fix',
  'invalid-range': 'edit range outside the file',
};

export function describeSkipReason(reason: SkipReason): string {
  return SKIP_REASON_TEXT[reason];
}

export interface AppliedFix {
  ruleCode: string;
  description: string;
  safety: FixSafety;
  location: Location;
  // As proposed, before any drift adjustment
  edits: readonly TextEdit[];
}

export interface SkippedFix {
  ruleCode: string;
  reason: SkipReason;
  location: Location;
  error?: string;
}

export class FileChange {
  readonly applied: AppliedFix[] = [];
  readonly skipped: SkippedFix[] = [];
  content: string;

  constructor(readonly path: string, readonly originalContent: string) {
    this.content = originalContent;
  }

  hasChanges(): boolean {
    return this.content !== this.originalContent;
  }
}

export class FixResult {
  constructor(readonly changes: Map<string, FileChange>) {}

  get(path: string): FileChange | undefined {
    return this.changes.get(normalize(path));
  }

  totalApplied(): number {
    let n = 0;
    for (const fc of this.changes.values()) n += fc.applied.length;
    return n;
  }

  totalSkipped(): number {
    let n = 0;
    for (const fc of this.changes.values()) n += fc.skipped.length;
    return n;
  }

  filesModified(): number {
    return this.modifiedFiles().length;
  }

  modifiedFiles(): FileChange[] {
    return [...this.changes.values()].filter(fc => fc.hasChanges());
  }
}
