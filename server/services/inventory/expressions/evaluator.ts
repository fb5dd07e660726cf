// =============================================================================
// Compose Expression Evaluator
// Pure evaluation of a parsed expression against one host's variables.
// =============================================================================

import { HostValue, HostVars } from '../types';
import { BinaryOperator, Expr, ExpressionEvaluationError, FilterName, TestName } from './ast';

/** A missing name or attribute; only `default` and the definedness tests accept it. */
export class UndefinedValue {
  constructor(readonly path: string) {}
}

type Value = HostValue | UndefinedValue;

type HostObject = { [key: string]: HostValue };

function isObject(value: Value): value is HostObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof UndefinedValue);
}

function typeName(value: Value): string {
  if (value instanceof UndefinedValue) return 'undefined';
  if (value === null) return 'none';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') return 'mapping';
  return typeof value;
}

function defined(value: Value): HostValue {
  if (value instanceof UndefinedValue) {
    throw new ExpressionEvaluationError(`'${value.path}' is undefined`);
  }
  return value;
}

// -----------------------------------------------------------------------------
// Conversions
// -----------------------------------------------------------------------------

export function isTruthy(value: Value): boolean {
  const v = defined(value);
  if (v === null) return false;
  if (Array.isArray(v)) return v.length > 0;
  if (typeof v === 'object') return Object.keys(v).length > 0;
  return Boolean(v);
}

/** String form used by `~` and `| string`. */
export function toText(value: Value): string {
  const v = defined(value);
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return JSON.stringify(v);
}

export function valuesEqual(left: HostValue, right: HostValue): boolean {
  if (left === right) return true;
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) return false;
    return left.every((item, i) => valuesEqual(item, right[i]));
  }
  if (isObject(left) && isObject(right)) {
    const keys = Object.keys(left);
    if (keys.length !== Object.keys(right).length) return false;
    return keys.every(
      (key) => Object.prototype.hasOwnProperty.call(right, key) && valuesEqual(left[key], right[key])
    );
  }
  return false;
}

function toNumber(value: Value, filter: 'int' | 'float', fallback: number): number {
  const v = defined(value);
  if (typeof v === 'number') return filter === 'int' ? Math.trunc(v) : v;
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (typeof v === 'string' && /^\s*[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?\s*$/.test(v)) {
    const parsed = Number(v.trim());
    return filter === 'int' ? Math.trunc(parsed) : parsed;
  }
  return fallback;
}

function toBool(value: Value): boolean {
  const v = defined(value);
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v === 1;
  if (typeof v === 'string') return ['yes', 'on', '1', 'true', 'y'].includes(v.trim().toLowerCase());
  return false;
}

// -----------------------------------------------------------------------------
// Operators
// -----------------------------------------------------------------------------

function numericOperands(op: string, left: Value, right: Value): [number, number] {
  const l = defined(left);
  const r = defined(right);
  if (typeof l !== 'number' || typeof r !== 'number') {
    throw new ExpressionEvaluationError(`Unsupported operand types for ${op}: ${typeName(l)} and ${typeName(r)}`);
  }
  return [l, r];
}

function add(left: Value, right: Value): HostValue {
  const l = defined(left);
  const r = defined(right);
  if (typeof l === 'number' && typeof r === 'number') return l + r;
  if (typeof l === 'string' && typeof r === 'string') return l + r;
  if (Array.isArray(l) && Array.isArray(r)) return [...l, ...r];
  throw new ExpressionEvaluationError(`Unsupported operand types for +: ${typeName(l)} and ${typeName(r)}`);
}

function divide(op: '/' | '//' | '%', left: Value, right: Value): number {
  const [l, r] = numericOperands(op, left, right);
  if (r === 0) throw new ExpressionEvaluationError('Division by zero');
  if (op === '/') return l / r;
  if (op === '//') return Math.floor(l / r);
  // Result takes the sign of the divisor
  return l - r * Math.floor(l / r);
}

function order(op: '<' | '<=' | '>' | '>=', left: Value, right: Value): boolean {
  const l = defined(left);
  const r = defined(right);
  let sign: number;
  if (typeof l === 'number' && typeof r === 'number') {
    sign = l < r ? -1 : l > r ? 1 : 0;
  } else if (typeof l === 'string' && typeof r === 'string') {
    sign = l < r ? -1 : l > r ? 1 : 0;
  } else {
    throw new ExpressionEvaluationError(`Cannot compare ${typeName(l)} with ${typeName(r)}`);
  }
  switch (op) {
    case '<':
      return sign < 0;
    case '<=':
      return sign <= 0;
    case '>':
      return sign > 0;
    case '>=':
      return sign >= 0;
  }
}

function contains(container: Value, item: Value): boolean {
  const haystack = defined(container);
  const needle = defined(item);
  if (Array.isArray(haystack)) return haystack.some((entry) => valuesEqual(entry, needle));
  if (typeof haystack === 'string') {
    if (typeof needle !== 'string') {
      throw new ExpressionEvaluationError(`'in <string>' requires a string, not ${typeName(needle)}`);
    }
    return haystack.includes(needle);
  }
  if (isObject(haystack)) {
    return typeof needle === 'string' && Object.prototype.hasOwnProperty.call(haystack, needle);
  }
  throw new ExpressionEvaluationError(`Cannot test membership in ${typeName(haystack)}`);
}

function binary(op: BinaryOperator, left: Value, right: Value): HostValue {
  switch (op) {
    case '+':
      return add(left, right);
    case '-': {
      const [l, r] = numericOperands(op, left, right);
      return l - r;
    }
    case '*': {
      const [l, r] = numericOperands(op, left, right);
      return l * r;
    }
    case '/':
    case '//':
    case '%':
      return divide(op, left, right);
    case '~':
      return toText(left) + toText(right);
    case '==':
      return valuesEqual(defined(left), defined(right));
    case '!=':
      return !valuesEqual(defined(left), defined(right));
    case '<':
    case '<=':
    case '>':
    case '>=':
      return order(op, left, right);
    case 'in':
      return contains(right, left);
    case 'not in':
      return !contains(right, left);
  }
}

// -----------------------------------------------------------------------------
// Member access
// -----------------------------------------------------------------------------

function getAttribute(object: Value, name: string, path: string): Value {
  if (isObject(object) && Object.prototype.hasOwnProperty.call(object, name)) {
    return object[name];
  }
  return new UndefinedValue(path);
}

function getIndex(object: Value, key: Value, path: string): Value {
  if (key instanceof UndefinedValue) return new UndefinedValue(path);
  if (typeof key === 'string') return getAttribute(object, key, path);
  if (typeof key === 'number' && Number.isInteger(key)) {
    if (Array.isArray(object) || typeof object === 'string') {
      const position = key < 0 ? object.length + key : key;
      if (position >= 0 && position < object.length) return object[position];
    }
    return new UndefinedValue(path);
  }
  throw new ExpressionEvaluationError(`Invalid index of type ${typeName(key)}`);
}

function describePath(expr: Expr): string {
  switch (expr.kind) {
    case 'name':
      return expr.name;
    case 'attribute':
      return `${describePath(expr.object)}.${expr.name}`;
    case 'index':
      return `${describePath(expr.object)}[...]`;
    default:
      return 'expression';
  }
}

// -----------------------------------------------------------------------------
// Filters and tests
// -----------------------------------------------------------------------------

function applyFilter(name: FilterName, input: Value, args: Value[]): Value {
  switch (name) {
    case 'default':
    case 'd': {
      const fallback = args.length > 0 ? args[0] : '';
      const orFalsy = args.length > 1 && isTruthy(args[1]);
      if (input instanceof UndefinedValue) return fallback;
      if (orFalsy && !isTruthy(input)) return fallback;
      return input;
    }
    case 'string':
      return toText(input);
    case 'int':
      return toNumber(input, 'int', args.length > 0 ? toNumber(args[0], 'int', 0) : 0);
    case 'float':
      return toNumber(input, 'float', args.length > 0 ? toNumber(args[0], 'float', 0) : 0);
    case 'bool':
      return toBool(input);
    case 'lower':
      return toText(input).toLowerCase();
    case 'upper':
      return toText(input).toUpperCase();
    case 'length':
    case 'count': {
      const v = defined(input);
      if (typeof v === 'string' || Array.isArray(v)) return v.length;
      if (isObject(v)) return Object.keys(v).length;
      throw new ExpressionEvaluationError(`Object of type ${typeName(v)} has no length`);
    }
  }
}

function applyTest(name: TestName, subject: Value): boolean {
  switch (name) {
    case 'defined':
      return !(subject instanceof UndefinedValue);
    case 'undefined':
      return subject instanceof UndefinedValue;
    case 'none':
      return subject === null;
  }
}

// -----------------------------------------------------------------------------
// Evaluation
// -----------------------------------------------------------------------------

function evaluateNode(expr: Expr, vars: HostVars): Value {
  switch (expr.kind) {
    case 'literal':
      return expr.value;

    case 'list':
      return expr.items.map((item) => defined(evaluateNode(item, vars)));

    case 'name':
      return Object.prototype.hasOwnProperty.call(vars, expr.name)
        ? vars[expr.name]
        : new UndefinedValue(expr.name);

    case 'attribute':
      return getAttribute(evaluateNode(expr.object, vars), expr.name, describePath(expr));

    case 'index':
      return getIndex(evaluateNode(expr.object, vars), evaluateNode(expr.index, vars), describePath(expr));

    case 'unary': {
      const operand = evaluateNode(expr.operand, vars);
      if (expr.op === 'not') return !isTruthy(operand);
      const value = defined(operand);
      if (typeof value !== 'number') {
        throw new ExpressionEvaluationError(`Bad operand type for unary ${expr.op}: ${typeName(value)}`);
      }
      return expr.op === '-' ? -value : value;
    }

    case 'binary':
      return binary(expr.op, evaluateNode(expr.left, vars), evaluateNode(expr.right, vars));

    case 'logical': {
      const left = evaluateNode(expr.left, vars);
      if (expr.op === 'and') return isTruthy(left) ? evaluateNode(expr.right, vars) : left;
      return isTruthy(left) ? left : evaluateNode(expr.right, vars);
    }

    case 'conditional':
      if (isTruthy(evaluateNode(expr.test, vars))) return evaluateNode(expr.consequent, vars);
      return expr.alternate ? evaluateNode(expr.alternate, vars) : new UndefinedValue('else branch');

    case 'filter':
      return applyFilter(
        expr.name,
        evaluateNode(expr.input, vars),
        expr.args.map((arg) => evaluateNode(arg, vars))
      );

    case 'test':
      return applyTest(expr.name, evaluateNode(expr.subject, vars)) !== expr.negated;
  }
}

/**
 * Evaluates a parsed expression. A result that is still undefined is an error.
 * @throws ExpressionEvaluationError
 */
export function evaluateExpression(expr: Expr, vars: HostVars): HostValue {
  const result = defined(evaluateNode(expr, vars));
  if (typeof result === 'number' && !Number.isFinite(result)) {
    throw new ExpressionEvaluationError('Result is not a finite number');
  }
  return result;
}
