// =============================================================================
// Variable Composer
// Compiles compose expressions once and evaluates them per host. A failure for
// one host drops that variable for that host only.
// =============================================================================

import { ConfigurationError, PerHostComposeError, describeCause } from '../../lib/errors';
import { CompiledExpression, compileExpression } from './expressions';
import { ComposeSpec, HostVars } from './types';

export interface CompositionResult {
  /** Host variables with composed values applied on top. */
  variables: HostVars;
  errors: PerHostComposeError[];
}

export class VariableComposer {
  private readonly compiled: Array<[string, CompiledExpression]>;

  /**
   * @throws ConfigurationError listing every expression that fails to parse
   */
  constructor(spec: ComposeSpec) {
    const issues: string[] = [];
    const compiled: Array<[string, CompiledExpression]> = [];

    for (const [variable, source] of Object.entries(spec)) {
      try {
        compiled.push([variable, compileExpression(source)]);
      } catch (err) {
        issues.push(`compose.${variable}: ${describeCause(err)}`);
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid compose expressions', issues);
    }
    this.compiled = compiled;
  }

  get variableNames(): string[] {
    return this.compiled.map(([variable]) => variable);
  }

  /**
   * Every expression sees the same input variables; composed values are not
   * visible to each other.
   */
  compose(hostname: string, attributes: HostVars): CompositionResult {
    const variables: HostVars = { ...attributes };
    const errors: PerHostComposeError[] = [];

    for (const [variable, expression] of this.compiled) {
      try {
        variables[variable] = expression.evaluate(attributes);
      } catch (err) {
        errors.push(new PerHostComposeError(hostname, variable, expression.source, err));
      }
    }

    return { variables, errors };
  }
}
