import { ExpressionSyntaxError } from './ast';

export type TokenType = 'number' | 'string' | 'name' | 'op' | 'eof';

export interface Token {
  type: TokenType;
  text: string;
  /** Decoded value for number and string tokens. */
  value?: number | string;
  pos: number;
}

// Longest operators first so "//" wins over "/"
const OPERATORS = ['==', '!=', '<=', '>=', '//', '<', '>', '+', '-', '*', '/', '%', '~', '|', '(', ')', '[', ']', ',', '.'];

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '\\': '\\', "'": "'", '"': '"' };

function readString(source: string, start: number): { value: string; end: number } {
  const quote = source[start];
  let value = '';
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === quote) return { value, end: i + 1 };
    if (ch === '\\') {
      const next = source[i + 1];
      if (next === undefined) break;
      value += ESCAPES[next] ?? next;
      i += 2;
      continue;
    }
    value += ch;
    i += 1;
  }
  throw new ExpressionSyntaxError('Unterminated string literal', start);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const { value, end } = readString(source, i);
      tokens.push({ type: 'string', text: source.slice(i, end), value, pos: i });
      i = end;
      continue;
    }

    const numberMatch = /^\d+(\.\d+)?([eE][+-]?\d+)?/.exec(source.slice(i));
    if (numberMatch) {
      tokens.push({ type: 'number', text: numberMatch[0], value: Number(numberMatch[0]), pos: i });
      i += numberMatch[0].length;
      continue;
    }

    const nameMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (nameMatch) {
      tokens.push({ type: 'name', text: nameMatch[0], pos: i });
      i += nameMatch[0].length;
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ type: 'op', text: op, pos: i });
      i += op.length;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character '${ch}'`, i);
  }

  tokens.push({ type: 'eof', text: '', pos: source.length });
  return tokens;
}
