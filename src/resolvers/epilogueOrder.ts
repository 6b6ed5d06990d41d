import { rangeLocation } from '../core/edits.js';
import type { ResolveContext, Resolver } from '../core/resolver.js';
import type { TextEdit } from '../core/types.js';
import { instructionText, parseDockerfile, type DockerfileModel, type Instruction } from '../dockerfile/instructions.js';
import { buildDependents, splitStages, type Stage } from '../dockerfile/stages.js';

export const EPILOGUE_ORDER_RESOLVER_ID = 'epilogue-order';

// Canonical order at the end of an output stage
export const EPILOGUE_RANK: Readonly<Record<string, number>> = {
  stopsignal: 0,
  healthcheck: 1,
  entrypoint: 2,
  cmd: 3,
};

export function isEpilogue(instr: Instruction): boolean {
  return EPILOGUE_RANK[instr.name] !== undefined;
}

function rankOf(instr: Instruction): number {
  return EPILOGUE_RANK[instr.name] ?? Number.MAX_SAFE_INTEGER;
}

export function hasDuplicateEpilogues(commands: readonly Instruction[]): boolean {
  const seen = new Set<string>();
  for (const c of commands) {
    if (!isEpilogue(c)) continue;
    if (seen.has(c.name)) return true;
    seen.add(c.name);
  }
  return false;
}

/** Epilogues trail the stage in canonical order. ONBUILD is ignored. */
export function epiloguesInOrder(commands: readonly Instruction[]): boolean {
  const relevant = commands.filter(c => c.name !== 'onbuild');
  const first = relevant.findIndex(isEpilogue);
  if (first < 0) return true;
  let prevRank = -1;
  for (const c of relevant.slice(first)) {
    if (!isEpilogue(c)) return false;
    const rank = rankOf(c);
    if (rank < prevRank) return false;
    prevRank = rank;
  }
  return true;
}

function stageEdit(model: DockerfileModel, stage: Stage, file: string): TextEdit | undefined {
  const { commands } = stage;
  const start = commands.findIndex(isEpilogue);
  if (start < 0 || hasDuplicateEpilogues(commands) || epiloguesInOrder(commands)) return undefined;

  const region = commands.slice(start);
  const first = region[0];
  const last = region[region.length - 1];
  if (!first || !last) return undefined;

  // Whatever sits between two instructions stays at its position
  const separators = region.slice(1).map((next, i) => {
    const prev = region[i];
    return prev ? model.lines.slice(prev.endLine, next.commentStartLine - 1) : [];
  });

  const reordered = [
    ...region.filter(c => !isEpilogue(c)),
    ...region.filter(isEpilogue).sort((a, b) => rankOf(a) - rankOf(b)),
  ];

  const parts: string[] = [];
  reordered.forEach((instr, i) => {
    parts.push(instructionText(model, instr));
    parts.push(...(separators[i] ?? []));
  });

  const endText = model.lines[last.endLine - 1] ?? '';
  return {
    location: rangeLocation(file, first.commentStartLine, 0, last.endLine, endText.length),
    newText: parts.join('\n'),
  };
}

/**
 * Moves STOPSIGNAL, HEALTHCHECK, ENTRYPOINT and CMD to the end of each output
 * stage (the last stage, or one nothing builds on or copies from).
 * Stages repeating an epilogue kind have no single canonical order and are
 * left as they are.
 */
export class EpilogueOrderResolver implements Resolver<'epilogue-order'> {
  readonly id = EPILOGUE_ORDER_RESOLVER_ID;

  resolve(ctx: ResolveContext): TextEdit[] {
    const model = parseDockerfile(ctx.content);
    const stages = splitStages(model);
    const dependents = buildDependents(stages);

    const edits: TextEdit[] = [];
    for (const stage of stages) {
      const isLast = stage.index === stages.length - 1;
      if (!isLast && (dependents.get(stage.index)?.length ?? 0) > 0) continue;
      const edit = stageEdit(model, stage, ctx.filePath);
      if (edit) edits.push(edit);
    }
    return edits;
  }
}
