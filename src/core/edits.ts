import { compareEdits } from './conflict.js';
import type { Location, TextEdit } from './types.js';

export type LineEnding = '\n' | '\r\n';

export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

export function splitLines(text: string): string[] {
  return text.split(detectLineEnding(text));
}

function normalizeNewlines(text: string, eol: LineEnding): string {
  if (eol === '\n') return text;
  return text.replace(/\r\n/g, '\n').replace(/\n/g, eol);
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

/** True when both ends of the edit address an existing line. */
export function editInRange(text: string, edit: TextEdit): boolean {
  const count = splitLines(text).length;
  const { start, end } = edit.location;
  return start.line >= 1 && start.line <= count && end.line >= 1 && end.line <= count;
}

/**
 * Replace `[start, end)` of the edit with its new text.
 * Replacement newlines follow the buffer's own line endings. Lines outside
 * the buffer leave it untouched; columns past either end of a line are clamped.
 */
export function applyEdit(text: string, edit: TextEdit): string {
  const eol = detectLineEnding(text);
  const lines = text.split(eol);
  const { start, end } = edit.location;

  const startIdx = start.line - 1;
  const endIdx = end.line - 1;
  if (startIdx < 0 || startIdx >= lines.length) return text;
  if (endIdx < 0 || endIdx >= lines.length) return text;

  const startLine = lines[startIdx] ?? '';
  const endLine = lines[endIdx] ?? '';
  const startCol = clamp(start.column, 0, startLine.length);
  const endCol = clamp(end.column, 0, endLine.length);

  const before = lines.slice(0, startIdx);
  const after = lines.slice(endIdx + 1);
  const middle = startLine.slice(0, startCol) + normalizeNewlines(edit.newText, eol) + endLine.slice(endCol);

  return [...before, middle, ...after].join(eol);
}

/**
 * Splice a set of edits that are known not to overlap, bottom of the text
 * first. No conflict, priority or drift handling: for previewing a single
 * resolver's output, not for combining fixes (use `Fixer` for that).
 */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  let out = text;
  for (const e of [...edits].sort((a, b) => compareEdits(b, a))) out = applyEdit(out, e);
  return out;
}

export function rangeLocation(file: string, startLine: number, startCol: number, endLine: number, endCol: number): Location {
  return { file, start: { line: startLine, column: startCol }, end: { line: endLine, column: endCol } };
}

export function lineTextAt(text: string, line: number): string {
  const lines = splitLines(text);
  return lines[clamp(line - 1, 0, lines.length - 1)] ?? '';
}

export function inferIndentFromLine(lineText: string): string {
  const m = /^([ \t]*)/.exec(lineText);
  return m ? (m[1] ?? '') : '';
}
