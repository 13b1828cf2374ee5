/**
 * Dialog flow: the outermost orchestrator of a turn
 */

import { FlowResult, ROOT_COMPONENT } from '../constants';
import type { TurnContext } from '../context/turn-context';
import { FlowError } from '../errors';
import { logger } from '../logger';
import type { DialogTreeState } from '../schema/state-schema';
import { Tree } from '../tree/tree';
import { DialogTree } from './dialog-tree';
import { FlowComponent } from './flow-component';

/**
 * Outcome of a dialog turn
 */
export type TurnOutcome =
  | { status: 'listen' }
  | { status: 'done' }
  | { status: 'failed'; error: FlowError };

export type BeforeTurnHook = (ctx: TurnContext) => void | Promise<void>;

export type AfterTurnHook = (
  ctx: TurnContext,
  info: { listening: boolean }
) => void | Promise<void>;

export interface DialogFlowOptions {
  /** Called before each turn, in order */
  beforeTurn?: BeforeTurnHook[];
  /** Called after each turn, including failed ones */
  afterTurn?: AfterTurnHook[];
}

/**
 * Runs the dialog tree over the state variables of a dialog
 *
 * @example
 * ```typescript
 * const flow = new DialogFlow();
 * flow.load({
 *   dialog: [{ condition: true, response: 'Hello!' }],
 * });
 * const ctx = new TurnContext({ dialog, message: { text: 'hi' } });
 * const outcome = await flow.turn(ctx);
 * ```
 */
export class DialogFlow {
  private readonly beforeTurnHooks: BeforeTurnHook[];
  private readonly afterTurnHooks: AfterTurnHook[];
  private root: FlowComponent<DialogTreeState> | null = null;

  constructor(options: DialogFlowOptions = {}) {
    this.beforeTurnHooks = [...(options.beforeTurn ?? [])];
    this.afterTurnHooks = [...(options.afterTurn ?? [])];
  }

  /**
   * Build the dialog tree, replacing the one loaded before
   *
   * @throws TreeError when the definition is malformed or inconsistent
   */
  load(definition: unknown): void {
    const tree = Tree.fromDefinition(definition);
    this.root = new FlowComponent(ROOT_COMPONENT, new DialogTree(tree));
  }

  get isLoaded(): boolean {
    return this.root !== null;
  }

  beforeTurn(hook: BeforeTurnHook): this {
    this.beforeTurnHooks.push(hook);
    return this;
  }

  afterTurn(hook: AfterTurnHook): this {
    this.afterTurnHooks.push(hook);
    return this;
  }

  /**
   * Make a turn of the dialog
   *
   * A FlowError ends the conversation: the error is recorded in the
   * context and all component state and slots are cleared.
   */
  async turn(ctx: TurnContext): Promise<TurnOutcome> {
    if (!this.root) {
      throw new FlowError('Dialog flow is not loaded');
    }
    for (const hook of this.beforeTurnHooks) {
      await hook(ctx);
    }

    let outcome: TurnOutcome;
    try {
      const result = await this.root.run(ctx);
      outcome =
        result === FlowResult.LISTEN ? { status: 'listen' } : { status: 'done' };
    } catch (error) {
      if (!(error instanceof FlowError)) {
        throw error;
      }
      ctx.setError(error);
      logger.error({
        event: 'turn_failed',
        dialog: `${ctx.dialog.channelName}:${ctx.dialog.userId}`,
        error: error.detailedMessage,
      });
      outcome = { status: 'failed', error };
    }

    if (outcome.status !== 'listen') {
      ctx.clearStateVariables();
    }

    for (const hook of this.afterTurnHooks) {
      await hook(ctx, { listening: outcome.status === 'listen' });
    }
    return outcome;
  }
}
