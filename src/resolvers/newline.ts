import { rangeLocation } from '../core/edits.js';
import type { ResolveContext, Resolver } from '../core/resolver.js';
import type { NewlineMode, NewlineResolveData, TextEdit } from '../core/types.js';
import { parseDockerfile, type Instruction } from '../dockerfile/instructions.js';

export const NEWLINE_RESOLVER_ID = 'newline-between-instructions';

function wantedGap(mode: NewlineMode, prev: Instruction, curr: Instruction, gap: number): number {
  switch (mode) {
    case 'always':
      return Math.max(gap, 1);
    case 'never':
      return 0;
    case 'grouped':
      return prev.name === curr.name ? 0 : 1;
  }
}

/**
 * Normalizes blank lines between instructions. Only gaps made of blank lines
 * are touched; a gap holding a detached comment is left alone.
 */
export class NewlineResolver implements Resolver<'newline-between-instructions'> {
  readonly id = NEWLINE_RESOLVER_ID;

  resolve(ctx: ResolveContext, data: NewlineResolveData): TextEdit[] {
    const { lines, instructions } = parseDockerfile(ctx.content);
    const edits: TextEdit[] = [];

    for (let i = 1; i < instructions.length; i++) {
      const prev = instructions[i - 1];
      const curr = instructions[i];
      if (!prev || !curr) continue;

      const gapLines = lines.slice(prev.endLine, curr.commentStartLine - 1);
      if (gapLines.some(l => l.trim() !== '')) continue;

      const gap = gapLines.length;
      const want = wantedGap(data.mode, prev, curr, gap);
      const firstGapLine = prev.endLine + 1;

      if (gap < want) {
        edits.push({
          location: rangeLocation(ctx.filePath, firstGapLine, 0, firstGapLine, 0),
          newText: '\n'.repeat(want - gap),
        });
      } else if (gap > want) {
        edits.push({
          location: rangeLocation(ctx.filePath, firstGapLine + want, 0, curr.commentStartLine, 0),
          newText: '',
        });
      }
    }

    return edits;
  }
}
