import { applyEdit, editInRange } from './edits.js';
import { adjustForShifts, columnShiftOf, compareEdits, editsOverlap, isWellFormed, type ColumnShift } from './conflict.js';
import type { FileChange, SkipReason } from './result.js';
import type { SuggestedFix, TextEdit, Violation } from './types.js';

// One violation with its fix: all of its edits land together or none do.
export interface FixCandidate {
  violation: Violation;
  fix: SuggestedFix;
}

interface QueuedEdit {
  edit: TextEdit;
  candidate: FixCandidate;
}

export function recordSkip(fc: FileChange, candidate: FixCandidate, reason: SkipReason, error?: string): void {
  const { violation } = candidate;
  fc.skipped.push({
    ruleCode: violation.ruleCode,
    reason,
    location: violation.location,
    ...(error ? { error } : {}),
  });
}

function vet(candidate: FixCandidate, reserved: readonly TextEdit[], baseline: string): SkipReason | undefined {
  const edits = candidate.fix.edits;
  if (edits.some(e => !isWellFormed(e) || !editInRange(baseline, e))) return 'invalid-range';
  if (edits.some(e => reserved.some(r => editsOverlap(e, r)))) return 'conflict';
  return undefined;
}

/**
 * Commit the candidates of one file into its content.
 *
 * Edits run by fix priority (lower first), bottom of the file to the top
 * within a priority. A candidate is vetted as a whole the first time one of
 * its edits comes up; once accepted, all of its edits are reserved so later
 * candidates cannot interleave with it. Edits landing on a line that a
 * fix of an earlier priority resized are shifted by that edit's length change.
 */
export function commitCandidates(fc: FileChange, candidates: readonly FixCandidate[]): void {
  const baseline = fc.content;
  const queue: QueuedEdit[] = candidates.flatMap(candidate => candidate.fix.edits.map(edit => ({ edit, candidate })));
  queue.sort((a, b) => a.candidate.fix.priority - b.candidate.fix.priority || compareEdits(b.edit, a.edit));

  const reserved: TextEdit[] = [];
  const accepted = new Set<FixCandidate>();
  const rejected = new Set<FixCandidate>();
  const shifts: ColumnShift[] = [];
  let content = baseline;

  for (const { edit, candidate } of queue) {
    if (rejected.has(candidate)) continue;
    if (!accepted.has(candidate)) {
      const reason = vet(candidate, reserved, baseline);
      if (reason) {
        rejected.add(candidate);
        recordSkip(fc, candidate, reason);
        continue;
      }
      reserved.push(...candidate.fix.edits);
      accepted.add(candidate);
    }

    const { priority } = candidate.fix;
    content = applyEdit(content, adjustForShifts(edit, shifts, priority));
    const shift = columnShiftOf(edit, priority);
    if (shift) shifts.push(shift);
  }

  fc.content = content;
  for (const c of candidates) {
    if (!accepted.has(c)) continue;
    fc.applied.push({
      ruleCode: c.violation.ruleCode,
      description: c.fix.description,
      safety: c.fix.safety,
      location: c.violation.location,
      edits: c.fix.edits,
    });
  }
}
