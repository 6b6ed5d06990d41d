import { createToken, Lexer, type CustomPatternMatcherReturn } from 'chevrotain';

// Blanks other than line breaks, NBSP and a byte order mark included
const BLANK = /[^\S\r\n]/;

function isBlank(ch: string | undefined): boolean {
  return ch !== undefined && BLANK.test(ch);
}

function isLineStart(text: string, offset: number): boolean {
  let i = offset - 1;
  while (i >= 0 && isBlank(text[i])) i--;
  return i < 0 || text[i] === '\n';
}

function lineEndFrom(text: string, offset: number): number {
  let i = offset;
  while (i < text.length && text[i] !== '\n' && text[i] !== '\r') i++;
  return i;
}

// `#` only starts a comment when nothing but blanks precede it on the line
function matchComment(text: string, offset: number): CustomPatternMatcherReturn | null {
  if (text[offset] !== '#' || !isLineStart(text, offset)) return null;
  return [text.slice(offset, lineEndFrom(text, offset))];
}

// A backslash followed only by blanks up to the end of the line
function matchContinuation(text: string, offset: number): CustomPatternMatcherReturn | null {
  if (text[offset] !== '\\') return null;
  let i = offset + 1;
  while (i < text.length && isBlank(text[i])) i++;
  if (i < text.length && text[i] !== '\n' && !(text[i] === '\r' && text[i + 1] === '\n')) return null;
  return [text.slice(offset, i)];
}

export const Newline = createToken({ name: 'Newline', pattern: /\r?\n/, line_breaks: true });
export const LineContinuation = createToken({
  name: 'LineContinuation',
  pattern: { exec: matchContinuation },
  line_breaks: false,
  start_chars_hint: ['\\'],
});
export const Comment = createToken({
  name: 'Comment',
  pattern: { exec: matchComment },
  line_breaks: false,
  start_chars_hint: ['#'],
});
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[^\S\r\n]+/, group: Lexer.SKIPPED });
// <<EOF, <<-EOF, <<"EOF", <<'EOF'
export const HeredocOpen = createToken({
  name: 'HeredocOpen',
  pattern: /<<-?(?:"[A-Za-z_]\w*"|'[A-Za-z_]\w*'|[A-Za-z_]\w*)/,
});
export const Backslash = createToken({ name: 'Backslash', pattern: /\\/ });
export const Word = createToken({ name: 'Word', pattern: /[^\s\\]+/ });

export const allTokens = [
  Newline,
  LineContinuation,
  Comment,
  WhiteSpace,
  HeredocOpen,
  Backslash,
  Word,
];

export const DockerfileLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return DockerfileLexer.tokenize(text);
}
