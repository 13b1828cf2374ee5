import type { z } from 'zod';
import { DigressionResult, FlowResult } from '../constants';
import type { TurnContext } from '../context/turn-context';
import { FlowError } from '../errors';
import { formatIssues } from '../schema/format-issues';

/**
 * A flow model making turns over its own persisted state
 */
export interface FlowModel<S> {
  /** Validates the state loaded from the dialog state variables */
  readonly stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>;

  /**
   * Make a turn, mutating the given state in place
   *
   * @param digressionResult - set when the flow is resumed after a digression
   */
  turn(
    ctx: TurnContext,
    state: S,
    digressionResult?: DigressionResult
  ): Promise<FlowResult>;
}

/**
 * Provides a named slot of the dialog state to a flow model
 *
 * The state is removed as soon as the flow reports that it is done.
 */
export class FlowComponent<S> {
  constructor(
    /** Key of the state variable */
    readonly name: string,
    readonly flow: FlowModel<S>
  ) {}

  async run(
    ctx: TurnContext,
    digressionResult?: DigressionResult
  ): Promise<FlowResult> {
    const state = this.loadState(ctx);
    const result = await this.flow.turn(ctx, state, digressionResult);
    if (result === FlowResult.DONE) {
      ctx.deleteStateVariable(this.name);
    } else {
      ctx.setStateVariable(this.name, state);
    }
    return result;
  }

  private loadState(ctx: TurnContext): S {
    const parsed = this.flow.stateSchema.safeParse(
      ctx.getStateVariable(this.name) ?? {}
    );
    if (!parsed.success) {
      throw new FlowError(
        `Invalid state of component '${this.name}': ${formatIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }
}
