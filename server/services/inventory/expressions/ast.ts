// =============================================================================
// Compose Expression AST
// =============================================================================

import { HostValue } from '../types';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | '~';

export type Expr =
  | { kind: 'literal'; value: HostValue }
  | { kind: 'list'; items: Expr[] }
  | { kind: 'name'; name: string }
  | { kind: 'attribute'; object: Expr; name: string }
  | { kind: 'index'; object: Expr; index: Expr }
  | { kind: 'unary'; op: '-' | '+' | 'not'; operand: Expr }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: 'logical'; op: 'and' | 'or'; left: Expr; right: Expr }
  | { kind: 'conditional'; test: Expr; consequent: Expr; alternate?: Expr }
  | { kind: 'filter'; name: FilterName; input: Expr; args: Expr[] }
  | { kind: 'test'; name: TestName; subject: Expr; negated: boolean };

export const FILTER_ARITY = {
  default: [0, 2],
  d: [0, 2],
  string: [0, 0],
  int: [0, 1],
  float: [0, 1],
  bool: [0, 0],
  lower: [0, 0],
  upper: [0, 0],
  length: [0, 0],
  count: [0, 0],
} as const satisfies Record<string, readonly [number, number]>;

export type FilterName = keyof typeof FILTER_ARITY;

export const TEST_NAMES = ['defined', 'undefined', 'none'] as const;

export type TestName = (typeof TEST_NAMES)[number];

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(FILTER_ARITY, name);
}

export function isTestName(name: string): name is TestName {
  return TEST_NAMES.some((test) => test === name);
}

export class ExpressionSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'ExpressionSyntaxError';
  }
}

export class ExpressionEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionEvaluationError';
  }
}
