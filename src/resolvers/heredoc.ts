import { inferIndentFromLine, rangeLocation } from '../core/edits.js';
import type { ResolveContext, Resolver } from '../core/resolver.js';
import type { HeredocResolveData, TextEdit } from '../core/types.js';
import { parseDockerfile, type DockerfileModel, type Instruction } from '../dockerfile/instructions.js';
import { extractCommands, hasExitCommand, isPosixShell, isSimpleScript, splitChain } from '../dockerfile/shell.js';
import { splitStages, type Stage } from '../dockerfile/stages.js';

export const HEREDOC_RESOLVER_ID = 'prefer-run-heredoc';

// A heredoc adds two lines (<<EOF and EOF), so merging two commands saves nothing.
export const HEREDOC_DEFAULT_MIN_COMMANDS = 3;

interface RunSequence {
  runs: Instruction[];
  commands: string[];
  flags: string;
}

function withoutFlags(instr: Instruction): string {
  let rest = instr.args;
  for (const flag of instr.flags) rest = rest.slice(rest.indexOf(flag) + flag.length).trimStart();
  return rest;
}

function isShellForm(run: Instruction): boolean {
  return !withoutFlags(run).startsWith('[');
}

/** Commands of a RUN, or undefined when it cannot be merged. */
export function runCommands(run: Instruction): string[] | undefined {
  if (run.heredocs.length > 0) {
    const [doc] = run.heredocs;
    if (!doc || run.heredocs.length > 1) return undefined;
    const body = doc.body.map(l => l.trim()).filter(l => l && !l.startsWith('#'));
    if (body.length === 0 || !body.every(isSimpleScript)) return undefined;
    return extractCommands(body.join('\n'));
  }
  const script = withoutFlags(run);
  if (!script || !isSimpleScript(script)) return undefined;
  return splitChain(script);
}

export function formatHeredoc(commands: readonly string[], flags: readonly string[]): string {
  const out = [`RUN ${flags.length > 0 ? `${flags.join(' ')} ` : ''}<<EOF`, 'set -e'];
  // `set -e` is already first; variants like `set -ex` carry extra flags and stay
  for (const cmd of commands) if (cmd.trim() !== 'set -e') out.push(cmd);
  out.push('EOF');
  return out.join('\n');
}

function replaceRuns(model: DockerfileModel, file: string, first: Instruction, last: Instruction, commands: readonly string[]): TextEdit {
  // Only the RUN line is indented: the closing delimiter has to start its line
  const indent = inferIndentFromLine(model.lines[first.startLine - 1] ?? '');
  const endText = model.lines[last.endLine - 1] ?? '';
  return {
    location: rangeLocation(file, first.startLine, 0, last.endLine, endText.length),
    newText: indent + formatHeredoc(commands, first.flags),
  };
}

function consecutiveRunsEdit(model: DockerfileModel, stage: Stage, file: string, minCommands: number): TextEdit | undefined {
  let seq: RunSequence = { runs: [], commands: [], flags: '' };

  const flush = (): TextEdit | undefined => {
    const { runs, commands } = seq;
    seq = { runs: [], commands: [], flags: '' };
    const first = runs[0];
    const last = runs[runs.length - 1];
    if (!first || !last || runs.length < 2 || commands.length < minCommands) return undefined;
    return replaceRuns(model, file, first, last, commands);
  };

  for (const cmd of stage.commands) {
    const commands = cmd.name === 'run' && isShellForm(cmd) ? runCommands(cmd) : undefined;
    if (!commands || commands.length === 0 || hasExitCommand(commands)) {
      const edit = flush();
      if (edit) return edit;
      continue;
    }
    const flags = cmd.flags.join(' ');
    if (seq.runs.length > 0 && seq.flags !== flags) {
      const edit = flush();
      if (edit) return edit;
    }
    seq.flags = flags;
    seq.runs.push(cmd);
    seq.commands.push(...commands);
  }
  return flush();
}

function chainedRunEdit(model: DockerfileModel, stage: Stage, file: string, minCommands: number): TextEdit | undefined {
  for (const cmd of stage.commands) {
    if (cmd.name !== 'run' || cmd.heredocs.length > 0 || !isShellForm(cmd)) continue;
    const commands = runCommands(cmd);
    if (!commands || commands.length < minCommands) continue;
    return replaceRuns(model, file, cmd, cmd, commands);
  }
  return undefined;
}

/**
 * Rewrites RUN instructions into a single heredoc RUN.
 * Detection runs again on the current content, so earlier rewrites of the
 * same commands (casing, apt to apt-get, ...) are picked up.
 */
export class HeredocResolver implements Resolver<'prefer-run-heredoc'> {
  readonly id = HEREDOC_RESOLVER_ID;

  resolve(ctx: ResolveContext, data: HeredocResolveData): TextEdit[] {
    const model = parseDockerfile(ctx.content);
    const stage = splitStages(model)[data.stageIndex];
    if (!stage) return [];
    if (stage.commands.some(c => c.name === 'shell' && !isPosixShell(c.args))) return [];

    const minCommands = data.minCommands ?? HEREDOC_DEFAULT_MIN_COMMANDS;
    const edit = data.kind === 'consecutive'
      ? consecutiveRunsEdit(model, stage, ctx.filePath, minCommands)
      : chainedRunEdit(model, stage, ctx.filePath, minCommands);
    return edit ? [edit] : [];
  }
}
