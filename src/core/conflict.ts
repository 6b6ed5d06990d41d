import { normalize } from 'node:path';
import type { Position, TextEdit } from './types.js';

function atOrBefore(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.column <= b.column);
}

/**
 * Two edits overlap unless one ends at or before the other starts.
 * Edits in different files never overlap.
 */
export function editsOverlap(a: TextEdit, b: TextEdit): boolean {
  if (normalize(a.location.file) !== normalize(b.location.file)) return false;
  if (atOrBefore(a.location.end, b.location.start)) return false;
  if (atOrBefore(b.location.end, a.location.start)) return false;
  return true;
}

function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

/** Document order by start, then end: negative when `a` comes first. */
export function compareEdits(a: TextEdit, b: TextEdit): number {
  return comparePositions(a.location.start, b.location.start) || comparePositions(a.location.end, b.location.end);
}

export function isWellFormed(edit: TextEdit): boolean {
  return atOrBefore(edit.location.start, edit.location.end);
}

// A length change left behind on one line by an already applied edit.
export interface ColumnShift {
  line: number;
  // Original columns at or past this one move by delta
  afterColumn: number;
  delta: number;
  // Priority of the fix that made the change
  priority: number;
}

/**
 * Record the drift of a single-line edit that keeps the line structure.
 * Shifts are kept in the original coordinate space; multi-line edits and
 * replacements containing newlines are not tracked.
 */
export function columnShiftOf(edit: TextEdit, priority: number): ColumnShift | undefined {
  const { start, end } = edit.location;
  if (start.line !== end.line) return undefined;
  if (edit.newText.includes('\n')) return undefined;
  const delta = edit.newText.length - (end.column - start.column);
  if (delta === 0) return undefined;
  return { line: start.line, afterColumn: end.column, delta, priority };
}

/**
 * Translate an edit's columns past the drift left by fixes of a lower
 * priority. Same-priority edits run right to left and need no translation.
 * A span ending exactly at the drift point lies before the change and keeps
 * its end; an insertion there lands after it.
 */
export function adjustForShifts(edit: TextEdit, shifts: readonly ColumnShift[], priority: number): TextEdit {
  const { start, end } = edit.location;
  const empty = start.line === end.line && start.column === end.column;
  let startDelta = 0;
  let endDelta = 0;
  for (const s of shifts) {
    if (s.priority >= priority) continue;
    if (s.line === start.line && start.column >= s.afterColumn) startDelta += s.delta;
    if (s.line === end.line && (end.column > s.afterColumn || (empty && end.column === s.afterColumn))) endDelta += s.delta;
  }
  if (startDelta === 0 && endDelta === 0) return edit;
  return {
    location: {
      file: edit.location.file,
      start: { line: start.line, column: start.column + startDelta },
      end: { line: end.line, column: end.column + endDelta },
    },
    newText: edit.newText,
  };
}
