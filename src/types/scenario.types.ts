import type { TurnContext } from '../context/turn-context';

/**
 * A command produced by a scenario
 *
 * Each command is an object with a single key, e.g. `{ text: 'Hello!' }`.
 * Control commands (`jump_to`, `listen`, `move_on`, ...) change the flow,
 * all the others are sent to the user as is.
 */
export type Command = Record<string, unknown>;

/**
 * Extra variables passed to expressions
 */
export type ExpressionParams = {
  /** The expression is evaluated while looking for a digression */
  digressing?: boolean;
  /** The slot being checked is the one the user was asked about */
  slotInFocus?: boolean;
};

export type ExpressionFn = (
  ctx: TurnContext,
  params: ExpressionParams
) => unknown;

/**
 * A condition or a value: either a constant or a function of the turn
 */
export type ExpressionDefinition = boolean | ExpressionFn;

/**
 * Extra variables passed to scenarios
 */
export type ScenarioParams = {
  /** The node response is executed when returning after a digression */
  returning?: boolean;
  /** Slot value before it was found during the turn */
  previousValue?: unknown;
  /** Slot value found during the turn */
  currentValue?: unknown;
};

export type ScenarioFn = (
  ctx: TurnContext,
  params: ScenarioParams
) => Command[] | Promise<Command[]>;

/**
 * A scenario producing a list of commands
 *
 * A string is a text reply with `{{path}}` placeholders resolved against
 * `slots`, `user` and `params`.
 */
export type ScenarioDefinition = string | readonly Command[] | ScenarioFn;
