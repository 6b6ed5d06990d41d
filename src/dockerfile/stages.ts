import type { DockerfileModel, Instruction } from './instructions.js';

export interface Stage {
  index: number;
  from: Instruction;
  baseName: string;
  name?: string;
  // Instructions after FROM, up to the next FROM
  commands: Instruction[];
}

function positional(instr: Instruction): string[] {
  return instr.args.split(/\s+/).filter(w => w && !w.startsWith('--'));
}

export function flagValue(instr: Instruction, flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const hit = instr.flags.find(f => f.startsWith(prefix));
  return hit?.slice(prefix.length);
}

export function splitStages(model: DockerfileModel): Stage[] {
  const stages: Stage[] = [];
  for (const instr of model.instructions) {
    if (instr.name === 'from') {
      const words = positional(instr);
      const asIdx = words.findIndex(w => w.toLowerCase() === 'as');
      stages.push({
        index: stages.length,
        from: instr,
        baseName: words[0] ?? '',
        ...(asIdx >= 0 && words[asIdx + 1] ? { name: words[asIdx + 1] } : {}),
        commands: [],
      });
      continue;
    }
    stages[stages.length - 1]?.commands.push(instr);
  }
  return stages;
}

/** Stage index → indexes of the stages that build on it or copy from it. */
export function buildDependents(stages: readonly Stage[]): Map<number, number[]> {
  const byName = new Map<string, number>();
  for (const s of stages) if (s.name) byName.set(s.name.toLowerCase(), s.index);

  const lookup = (ref: string): number | undefined => {
    const named = byName.get(ref.toLowerCase());
    if (named !== undefined) return named;
    if (!/^\d+$/.test(ref)) return undefined;
    const idx = Number(ref);
    return idx < stages.length ? idx : undefined;
  };

  const dependents = new Map<number, number[]>();
  const link = (target: number | undefined, from: number) => {
    if (target === undefined || target === from) return;
    const list = dependents.get(target);
    if (!list) dependents.set(target, [from]);
    else if (!list.includes(from)) list.push(from);
  };

  for (const stage of stages) {
    if (stage.baseName) link(byName.get(stage.baseName.toLowerCase()), stage.index);
    for (const cmd of stage.commands) {
      if (cmd.name !== 'copy') continue;
      const from = flagValue(cmd, 'from');
      if (from) link(lookup(from), stage.index);
    }
  }
  return dependents;
}
