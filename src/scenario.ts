/**
 * Runnable expressions and scenarios
 *
 * Turns static definitions into functions of the turn context, the same
 * way for conditions, slot checks, node responses and slot prompts.
 */

import type {
  Command,
  ExpressionDefinition,
  ExpressionFn,
  ExpressionParams,
  ScenarioDefinition,
  ScenarioFn,
  ScenarioParams,
} from './types/scenario.types';
import type { TurnContext } from './context/turn-context';
import { isTruthy } from './context/recognition';
import { FlowError, describeError } from './errors';
import { CommandListSchema } from './schema/definition-schema';
import { formatIssues } from './schema/format-issues';

/**
 * Collapse whitespace of a function source to get a readable title
 */
function sourceOf(definition: ExpressionDefinition | ScenarioDefinition) {
  if (typeof definition === 'function') {
    return definition.toString().replace(/\s+/g, ' ').trim();
  }
  if (typeof definition === 'string' || typeof definition === 'boolean') {
    return String(definition);
  }
  return JSON.stringify(definition);
}

function wrapError(error: unknown, source: string): FlowError {
  if (error instanceof FlowError) {
    return error;
  }
  return new FlowError(`${describeError(error)} (in ${source})`, {
    cause: error,
  });
}

/**
 * A condition or a value evaluated against the turn context
 */
export class Expression {
  /**
   * Create an expression from its definition
   */
  static compile(definition: ExpressionDefinition): Expression {
    if (typeof definition === 'function') {
      return new Expression(sourceOf(definition), definition);
    }
    return new Expression(sourceOf(definition), () => definition);
  }

  private constructor(
    /** Printable source used in logs and journal events */
    readonly source: string,
    private readonly fn: ExpressionFn
  ) {}

  /**
   * Evaluate the expression
   *
   * @throws FlowError wrapping any error thrown by the definition
   */
  evaluate(ctx: TurnContext, params: ExpressionParams = {}): unknown {
    try {
      return this.fn(ctx, params);
    } catch (error) {
      throw wrapError(error, this.source);
    }
  }

  /**
   * Evaluate the expression as a condition
   */
  test(ctx: TurnContext, params: ExpressionParams = {}): boolean {
    return isTruthy(this.evaluate(ctx, params));
  }
}

/**
 * Resolve a dotted path like `slots.name` in nested objects
 */
function resolvePath(scope: unknown, path: string): unknown {
  let current = scope;
  for (const key of path.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Interpolates variables in text using {{path}} syntax
 */
export function interpolate(
  text: string,
  ctx: TurnContext,
  params: ScenarioParams = {}
): string {
  const scope = {
    slots: ctx.state.slots,
    user: ctx.state.user,
    message: ctx.message,
    params,
  };
  return text.replace(/\{\{\s*([\w.]+)\s*\}\}/g, (_, path: string) => {
    const value = resolvePath(scope, path);
    return value === undefined || value === null ? '' : String(value);
  });
}

/**
 * A scenario producing an ordered list of commands
 */
export class Scenario {
  /**
   * Create a scenario from its definition
   *
   * A string becomes a single text command, a list of commands is
   * returned as is on every execution.
   */
  static compile(definition: ScenarioDefinition): Scenario {
    const source = sourceOf(definition);
    if (typeof definition === 'function') {
      return new Scenario(source, definition);
    }
    if (typeof definition === 'string') {
      return new Scenario(source, (ctx, params) => [
        { text: interpolate(definition, ctx, params) },
      ]);
    }
    return new Scenario(source, () => definition.map((c) => ({ ...c })));
  }

  private constructor(
    readonly source: string,
    private readonly fn: ScenarioFn
  ) {}

  /**
   * Execute the scenario
   *
   * @throws FlowError wrapping any error thrown by the definition or
   * when the result is not a list of commands
   */
  async execute(
    ctx: TurnContext,
    params: ScenarioParams = {}
  ): Promise<Command[]> {
    let result: unknown;
    try {
      result = await this.fn(ctx, params);
    } catch (error) {
      throw wrapError(error, this.source);
    }
    const parsed = CommandListSchema.safeParse(result);
    if (!parsed.success) {
      throw new FlowError(
        `Scenario must produce a list of commands: ${formatIssues(parsed.error)} (in ${this.source})`
      );
    }
    return parsed.data;
  }
}

/**
 * Find which control command of the vocabulary the command is
 *
 * @returns the control command key, or null for an ordinary command
 * @throws FlowError when the command holds several control keys
 */
export function matchControlCommand<K extends string>(
  command: Command,
  vocabulary: readonly K[]
): K | null {
  const keys = vocabulary.filter((key) => Object.hasOwn(command, key));
  if (keys.length > 1) {
    throw new FlowError(
      `Ambiguous control command: ${keys.map((k) => `'${k}'`).join(', ')} in one command`
    );
  }
  return keys[0] ?? null;
}
