import { Expr } from './ast';
import { evaluateExpression } from './evaluator';
import { parseExpression } from './parser';
import { HostValue, HostVars } from '../types';

export { ExpressionEvaluationError, ExpressionSyntaxError } from './ast';
export type { Expr } from './ast';
export { UndefinedValue, isTruthy, toText, valuesEqual } from './evaluator';

/**
 * A parsed compose expression, ready to be evaluated once per host.
 */
export interface CompiledExpression {
  readonly source: string;
  evaluate(vars: HostVars): HostValue;
}

/**
 * @throws ExpressionSyntaxError
 */
export function compileExpression(source: string): CompiledExpression {
  const ast: Expr = parseExpression(source);
  return {
    source,
    evaluate: (vars) => evaluateExpression(ast, vars),
  };
}
