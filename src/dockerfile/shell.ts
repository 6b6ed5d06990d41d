import { z } from 'zod';

const RESERVED_WORDS = new Set([
  'if', 'then', 'elif', 'else', 'fi', 'for', 'while', 'until', 'do', 'done',
  'case', 'esac', 'function', 'select', '!', '{', '}',
]);

const POSIX_SHELLS = new Set(['sh', 'bash', 'ash', 'dash', 'zsh', 'ksh', 'mksh']);

/** Split a script on top-level `&&`, leaving quoted text alone. */
export function splitChain(script: string): string[] {
  const parts: string[] = [];
  let quote: '"' | "'" | undefined;
  let current = '';
  for (let i = 0; i < script.length; i++) {
    const ch = script[i] ?? '';
    if (ch === '\\' && quote !== "'") {
      current += ch + (script[i + 1] ?? '');
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote) quote = undefined;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }
    if (ch === '&' && script[i + 1] === '&') {
      parts.push(current);
      current = '';
      i++;
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map(p => p.trim()).filter(Boolean);
}

function firstWord(command: string): string {
  return command.trim().split(/\s+/)[0] ?? '';
}

/**
 * A script is simple when it is a plain `&&` chain: no pipes, lists,
 * subshells, substitutions, background jobs or compound commands.
 */
export function isSimpleScript(script: string): boolean {
  let quote: '"' | "'" | undefined;
  for (let i = 0; i < script.length; i++) {
    const ch = script[i] ?? '';
    const next = script[i + 1];
    if (ch === '\\' && quote !== "'") {
      i++;
      continue;
    }
    if (quote === "'") {
      if (ch === "'") quote = undefined;
      continue;
    }
    if (ch === '`' || (ch === '$' && next === '(')) return false;
    if (quote === '"') {
      if (ch === '"') quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      continue;
    }
    if (ch === '&') {
      // `&&` chains and redirections like `2>&1` or `&>file` are fine
      const prev = script[i - 1];
      if (next === '&') i++;
      else if (prev !== '>' && prev !== '<' && next !== '>') return false;
      continue;
    }
    if (ch === ';' || ch === '|' || ch === '(' || ch === ')' || ch === '\n') return false;
  }
  if (quote) return false;
  return splitChain(script).every(cmd => !RESERVED_WORDS.has(firstWord(cmd)));
}

/** Commands of a script: one per line, each line split on `&&`. */
export function extractCommands(script: string): string[] {
  return script
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l && !l.startsWith('#'))
    .flatMap(splitChain);
}

export function hasExitCommand(commands: readonly string[]): boolean {
  return commands.some(c => firstWord(c) === 'exit');
}

const shellFormSchema = z.array(z.string()).min(1);

/** Whether a `SHELL` instruction's JSON argument names a POSIX shell. */
export function isPosixShell(shellArgs: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(shellArgs);
  } catch {
    return false;
  }
  const form = shellFormSchema.safeParse(parsed);
  if (!form.success) return false;
  const exe = (form.data[0] ?? '').split(/[\\/]/).pop() ?? '';
  return POSIX_SHELLS.has(exe.replace(/\.exe$/i, ''));
}
