import type { IToken } from 'chevrotain';
import { Comment, HeredocOpen, LineContinuation, Newline, tokenize } from './lexer.js';

export class DockerfileSyntaxError extends Error {
  constructor(message: string, readonly line: number, readonly column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'DockerfileSyntaxError';
  }
}

export interface Heredoc {
  delimiter: string;
  body: string[];
  // Line of the closing delimiter
  endLine: number;
}

export interface Instruction {
  keyword: string;
  // Lowercased keyword
  name: string;
  startLine: number;
  // Last line, counting continuations and heredoc bodies
  endLine: number;
  // First line of the comment block directly above, or startLine
  commentStartLine: number;
  // Arguments with continuations joined by single spaces
  args: string;
  flags: string[];
  heredocs: Heredoc[];
}

export interface DockerfileModel {
  lines: string[];
  instructions: Instruction[];
}

interface Segment {
  line: number;
  tokens: IToken[];
}

function endsWithContinuation(tokens: readonly IToken[]): boolean {
  return tokens[tokens.length - 1]?.tokenType === LineContinuation;
}

function segmentText(lines: readonly string[], seg: Segment, fromColumn: number): string {
  const text = lines[seg.line - 1] ?? '';
  const last = seg.tokens[seg.tokens.length - 1];
  const until = last && last.tokenType === LineContinuation ? (last.startColumn ?? 1) - 1 : text.length;
  return text.slice(fromColumn, until).trim();
}

function leadingFlags(args: string): string[] {
  const flags: string[] = [];
  for (const word of args.split(/\s+/)) {
    if (!word.startsWith('--')) break;
    flags.push(word);
  }
  return flags;
}

function readHeredoc(lines: readonly string[], opener: string, afterLine: number): Heredoc {
  const chomp = opener.startsWith('<<-');
  const delimiter = opener.replace(/^<<-?/, '').replace(/^["']|["']$/g, '');
  for (let i = afterLine; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    const candidate = chomp ? raw.replace(/^\t+/, '') : raw;
    if (candidate === delimiter) {
      return { delimiter, body: lines.slice(afterLine, i), endLine: i + 1 };
    }
  }
  // Unterminated: the body runs to the end of the file
  return { delimiter, body: lines.slice(afterLine), endLine: lines.length };
}

function groupByLine(tokens: readonly IToken[]): Map<number, IToken[]> {
  const byLine = new Map<number, IToken[]>();
  for (const tok of tokens) {
    if (tok.tokenType === Newline) continue;
    const ln = tok.startLine ?? 1;
    const list = byLine.get(ln);
    if (list) list.push(tok);
    else byLine.set(ln, [tok]);
  }
  return byLine;
}

/**
 * Read a Dockerfile into its physical lines and instructions.
 * Comment and blank lines inside a continuation are skipped, as BuildKit does.
 */
export function parseDockerfile(text: string): DockerfileModel {
  const lexed = tokenize(text);
  const firstError = lexed.errors[0];
  if (firstError) {
    throw new DockerfileSyntaxError(firstError.message, firstError.line ?? 1, firstError.column ?? 1);
  }

  const lines = text.split(/\r?\n/);
  const byLine = groupByLine(lexed.tokens);
  const instructions: Instruction[] = [];
  let commentStart: number | undefined;
  let ln = 1;

  while (ln <= lines.length) {
    const tokens = byLine.get(ln) ?? [];
    const head = tokens[0];
    if (!head) {
      commentStart = undefined;
      ln++;
      continue;
    }
    if (head.tokenType === Comment) {
      commentStart ??= ln;
      ln++;
      continue;
    }

    const segments: Segment[] = [{ line: ln, tokens }];
    let end = ln;
    let continued = endsWithContinuation(tokens);
    while (continued && end < lines.length) {
      end++;
      const next = byLine.get(end) ?? [];
      const first = next[0];
      if (!first || first.tokenType === Comment) continue;
      segments.push({ line: end, tokens: next });
      continued = endsWithContinuation(next);
    }

    const args = segments
      .map((seg, i) => segmentText(lines, seg, i === 0 ? head.endColumn ?? head.image.length : 0))
      .filter(Boolean)
      .join(' ');

    const heredocs: Heredoc[] = [];
    for (const seg of segments) {
      for (const tok of seg.tokens) {
        if (tok.tokenType !== HeredocOpen) continue;
        const doc = readHeredoc(lines, tok.image, end);
        heredocs.push(doc);
        end = doc.endLine;
      }
    }

    instructions.push({
      keyword: head.image,
      name: head.image.toLowerCase(),
      startLine: ln,
      endLine: end,
      commentStartLine: commentStart ?? ln,
      args,
      flags: leadingFlags(args),
      heredocs,
    });
    commentStart = undefined;
    ln = end + 1;
  }

  return { lines, instructions };
}

/** Source lines of an instruction, including its leading comments. */
export function instructionText(model: DockerfileModel, instr: Instruction): string {
  return model.lines.slice(instr.commentStartLine - 1, instr.endLine).join('\n');
}
