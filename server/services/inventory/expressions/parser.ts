// =============================================================================
// Compose Expression Parser
// Recursive descent, lowest precedence first:
//   conditional < or < and < not < comparison/is < ~ < + - < * / // % < unary < | < postfix
// =============================================================================

import {
  ArithmeticOperator,
  ComparisonOperator,
  Expr,
  ExpressionSyntaxError,
  FILTER_ARITY,
  isFilterName,
  isTestName,
} from './ast';
import { Token, tokenize } from './lexer';

const KEYWORD_LITERALS: Record<string, boolean | null> = {
  true: true,
  True: true,
  false: false,
  False: false,
  none: null,
  None: null,
  null: null,
};

const RESERVED = new Set(['and', 'or', 'not', 'in', 'is', 'if', 'else']);

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['==', '!=', '<', '<=', '>', '>='];
const MULTIPLICATIVE_OPERATORS: readonly ArithmeticOperator[] = ['*', '/', '//', '%'];

function isOneOf<T extends string>(options: readonly T[], text: string): text is T {
  return options.some((option) => option === text);
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expr {
    const expr = this.parseConditional();
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      throw new ExpressionSyntaxError(`Unexpected '${trailing.text}'`, trailing.pos);
    }
    return expr;
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.index += 1;
    return token;
  }

  private isOp(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'op' && token.text === text;
  }

  private isKeyword(word: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'name' && token.text === word;
  }

  private expectOp(text: string): Token {
    const token = this.peek();
    if (token.type !== 'op' || token.text !== text) {
      throw new ExpressionSyntaxError(`Expected '${text}' but found ${describe(token)}`, token.pos);
    }
    return this.advance();
  }

  private expectName(): Token {
    const token = this.peek();
    if (token.type !== 'name') {
      throw new ExpressionSyntaxError(`Expected a name but found ${describe(token)}`, token.pos);
    }
    return this.advance();
  }

  // ---------------------------------------------------------------------------
  // Grammar
  // ---------------------------------------------------------------------------

  private parseConditional(): Expr {
    const consequent = this.parseOr();
    if (!this.isKeyword('if')) return consequent;
    this.advance();
    const test = this.parseOr();
    if (!this.isKeyword('else')) {
      return { kind: 'conditional', test, consequent };
    }
    this.advance();
    const alternate = this.parseConditional();
    return { kind: 'conditional', test, consequent, alternate };
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.isKeyword('or')) {
      this.advance();
      left = { kind: 'logical', op: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.isKeyword('and')) {
      this.advance();
      left = { kind: 'logical', op: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.isKeyword('not')) {
      this.advance();
      return { kind: 'unary', op: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    let left = this.parseConcat();
    for (;;) {
      const { type, text } = this.peek();
      if (type === 'op' && isOneOf(COMPARISON_OPERATORS, text)) {
        this.advance();
        left = { kind: 'binary', op: text, left, right: this.parseConcat() };
      } else if (this.isKeyword('in')) {
        this.advance();
        left = { kind: 'binary', op: 'in', left, right: this.parseConcat() };
      } else if (this.isKeyword('not') && this.isKeyword('in', 1)) {
        this.advance();
        this.advance();
        left = { kind: 'binary', op: 'not in', left, right: this.parseConcat() };
      } else if (this.isKeyword('is')) {
        this.advance();
        left = this.parseTest(left);
      } else {
        return left;
      }
    }
  }

  private parseTest(subject: Expr): Expr {
    let negated = false;
    if (this.isKeyword('not')) {
      this.advance();
      negated = true;
    }
    const nameToken = this.peek();
    // "is none" may be written with any of the null keywords
    const name = nameToken.type === 'name' && KEYWORD_LITERALS[nameToken.text] === null ? 'none' : nameToken.text;
    if (nameToken.type !== 'name' || !isTestName(name)) {
      throw new ExpressionSyntaxError(`Unknown test ${describe(nameToken)}`, nameToken.pos);
    }
    this.advance();
    return { kind: 'test', name, subject, negated };
  }

  private parseConcat(): Expr {
    let left = this.parseAdditive();
    while (this.isOp('~')) {
      this.advance();
      left = { kind: 'binary', op: '~', left, right: this.parseAdditive() };
    }
    return left;
  }

  private parseAdditive(): Expr {
    let left = this.parseMultiplicative();
    while (this.isOp('+') || this.isOp('-')) {
      const op = this.advance().text === '+' ? '+' : '-';
      left = { kind: 'binary', op, left, right: this.parseMultiplicative() };
    }
    return left;
  }

  private parseMultiplicative(): Expr {
    let left = this.parseUnary();
    for (;;) {
      const { type, text } = this.peek();
      if (type !== 'op' || !isOneOf(MULTIPLICATIVE_OPERATORS, text)) return left;
      this.advance();
      left = { kind: 'binary', op: text, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): Expr {
    if (this.isOp('-') || this.isOp('+')) {
      const op = this.advance().text === '-' ? '-' : '+';
      return { kind: 'unary', op, operand: this.parseUnary() };
    }
    return this.parseFilters();
  }

  private parseFilters(): Expr {
    let input = this.parsePostfix();
    while (this.isOp('|')) {
      this.advance();
      const nameToken = this.expectName();
      const name = nameToken.text;
      if (!isFilterName(name)) {
        throw new ExpressionSyntaxError(`Unknown filter '${name}'`, nameToken.pos);
      }
      const args = this.isOp('(') ? this.parseArguments() : [];
      const [min, max] = FILTER_ARITY[name];
      if (args.length < min || args.length > max) {
        throw new ExpressionSyntaxError(
          `Filter '${name}' takes at most ${max} argument(s), got ${args.length}`,
          nameToken.pos
        );
      }
      input = { kind: 'filter', name, input, args };
    }
    return input;
  }

  private parseArguments(): Expr[] {
    this.expectOp('(');
    const args: Expr[] = [];
    if (!this.isOp(')')) {
      args.push(this.parseConditional());
      while (this.isOp(',')) {
        this.advance();
        args.push(this.parseConditional());
      }
    }
    this.expectOp(')');
    return args;
  }

  private parsePostfix(): Expr {
    let object = this.parsePrimary();
    for (;;) {
      if (this.isOp('.')) {
        this.advance();
        const nameToken = this.peek();
        // list.0 is accepted as an index
        if (nameToken.type === 'number' && Number.isInteger(nameToken.value)) {
          this.advance();
          object = { kind: 'index', object, index: { kind: 'literal', value: Number(nameToken.value) } };
          continue;
        }
        object = { kind: 'attribute', object, name: this.expectName().text };
      } else if (this.isOp('[')) {
        this.advance();
        const index = this.parseConditional();
        this.expectOp(']');
        object = { kind: 'index', object, index };
      } else {
        return object;
      }
    }
  }

  private parsePrimary(): Expr {
    const token = this.peek();

    switch (token.type) {
      case 'number':
      case 'string':
        this.advance();
        return { kind: 'literal', value: token.value ?? null };

      case 'name': {
        if (Object.prototype.hasOwnProperty.call(KEYWORD_LITERALS, token.text)) {
          this.advance();
          return { kind: 'literal', value: KEYWORD_LITERALS[token.text] };
        }
        if (RESERVED.has(token.text)) {
          throw new ExpressionSyntaxError(`Unexpected keyword '${token.text}'`, token.pos);
        }
        this.advance();
        return { kind: 'name', name: token.text };
      }

      case 'op':
        if (token.text === '(') {
          this.advance();
          const inner = this.parseConditional();
          this.expectOp(')');
          return inner;
        }
        if (token.text === '[') {
          return this.parseList();
        }
        throw new ExpressionSyntaxError(`Unexpected '${token.text}'`, token.pos);

      case 'eof':
        throw new ExpressionSyntaxError('Unexpected end of expression', token.pos);
    }
  }

  private parseList(): Expr {
    this.expectOp('[');
    const items: Expr[] = [];
    if (!this.isOp(']')) {
      items.push(this.parseConditional());
      while (this.isOp(',')) {
        this.advance();
        // trailing comma
        if (this.isOp(']')) break;
        items.push(this.parseConditional());
      }
    }
    this.expectOp(']');
    return { kind: 'list', items };
  }
}

function describe(token: Token): string {
  return token.type === 'eof' ? 'end of expression' : `'${token.text}'`;
}

export function parseExpression(source: string): Expr {
  if (source.trim() === '') {
    throw new ExpressionSyntaxError('Empty expression', 0);
  }
  return new Parser(tokenize(source)).parse();
}
