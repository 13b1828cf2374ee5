/**
 * Dialog tree conversation flow
 */

import {
  DigressionResult,
  FlowResult,
  NODE_COMMANDS,
  Transition,
} from '../constants';
import type { TurnContext } from '../context/turn-context';
import { FlowError } from '../errors';
import { logger } from '../logger';
import { matchControlCommand } from '../scenario';
import { JumpToSchema } from '../schema/definition-schema';
import { formatIssues } from '../schema/format-issues';
import {
  DialogTreeState,
  DialogTreeStateSchema,
} from '../schema/state-schema';
import type { DialogNode } from '../tree/node';
import { NodeStack } from '../tree/node-stack';
import type { Tree } from '../tree/tree';
import type { FlowModel } from './flow-component';

export class DialogTree implements FlowModel<DialogTreeState> {
  readonly stateSchema = DialogTreeStateSchema;

  constructor(readonly tree: Tree) {}

  async turn(ctx: TurnContext, state: DialogTreeState): Promise<FlowResult> {
    if (!state.node_stack) {
      state.node_stack = [];
    }
    const stack = new NodeStack(state.node_stack, this.tree);
    stack.gc();
    const turn = new DialogTreeTurn(this.tree, stack, ctx);
    return turn.run();
  }
}

/**
 * A turn of the dialog tree flow
 */
class DialogTreeTurn {
  constructor(
    private readonly tree: Tree,
    private readonly stack: NodeStack,
    private readonly ctx: TurnContext
  ) {}

  async run(): Promise<FlowResult> {
    const focused = this.stack.peek();
    if (!focused) {
      return this.rootNodes();
    }
    const { node, transition } = focused;
    logger.debug({ event: 'peek', node: node.title, transition });
    switch (transition) {
      case Transition.FOLLOWUP:
        return this.focusFollowup(node);
      case Transition.SLOT_FILLING:
        return this.trigger(node);
      case Transition.CONDITION:
        return this.focusCondition(node);
      default:
        throw new FlowError(`Unknown focus transition '${String(transition)}'`);
    }
  }

  /**
   * Traverse the root nodes of the tree
   */
  private async rootNodes(): Promise<FlowResult> {
    for (const node of this.tree.rootNodes.nodes(this.ctx)) {
      if (node.condition.test(this.ctx)) {
        return this.trigger(node);
      }
    }
    return FlowResult.DONE;
  }

  /**
   * Traverse the focused node and its right siblings after receiving user input
   */
  private async focusCondition(focused: DialogNode): Promise<FlowResult> {
    for (const node of focused.meAndRightSiblings().nodes(this.ctx)) {
      if (node.condition.test(this.ctx)) {
        this.stack.remove(focused);
        return this.trigger(node);
      }
    }
    if (focused.parent) {
      return this.digression(focused);
    }
    logger.warn({ event: 'nothing_matched', node: focused.title });
    return (await this.returnAfterDigression()) ?? this.commandEnd();
  }

  /**
   * Traverse followup nodes after receiving user input
   */
  private async focusFollowup(parent: DialogNode): Promise<FlowResult> {
    for (const node of parent.followup.nodes(this.ctx)) {
      if (node.condition.test(this.ctx)) {
        this.stack.remove(parent);
        return this.trigger(node);
      }
    }
    return this.digression(parent);
  }

  /**
   * Traverse followup nodes without waiting for user input
   */
  private async commandFollowup(parent: DialogNode): Promise<FlowResult> {
    logger.debug({ event: 'followup', node: parent.title });
    for (const node of parent.followup.nodes(this.ctx)) {
      if (node.condition.test(this.ctx)) {
        return this.triggerMaybeDigressed(node);
      }
    }
    this.ctx.warning(`Nothing matched from followup nodes of ${parent.title}.`);
    return FlowResult.LISTEN;
  }

  /**
   * Wait for the user to provide new input
   *
   * The input is processed by followup nodes if the node has any.
   */
  private async commandListen(node: DialogNode): Promise<FlowResult> {
    if (!node.followup.isEmpty) {
      this.stack.push(node, Transition.FOLLOWUP);
      return FlowResult.LISTEN;
    }
    return (await this.returnAfterDigression()) ?? FlowResult.LISTEN;
  }

  /**
   * End the conversation and reset its state
   */
  private commandEnd(): FlowResult {
    this.stack.clear();
    return FlowResult.DONE;
  }

  /**
   * Go directly to a different node
   */
  private async commandJumpTo(
    from: DialogNode,
    payload: unknown
  ): Promise<FlowResult> {
    logger.debug({ event: 'jump_to', node: from.title, payload });
    const parsed = JumpToSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FlowError(
        `Invalid jump_to command in ${from.title}: ${formatIssues(parsed.error)}`
      );
    }
    const { node: label, transition } = parsed.data;
    const target = this.tree.catalog.get(label);
    if (!target) {
      throw new FlowError(`Unknown jump_to node '${label}'`);
    }
    switch (transition) {
      case 'response':
        return this.triggerMaybeDigressed(target);
      case 'condition':
        return this.jumpToCondition(target);
      case 'listen':
        this.stack.push(target, Transition.CONDITION);
        return FlowResult.LISTEN;
    }
  }

  private async jumpToCondition(target: DialogNode): Promise<FlowResult> {
    for (const node of target.meAndRightSiblings().nodes(this.ctx)) {
      if (node.condition.test(this.ctx)) {
        return this.triggerMaybeDigressed(node);
      }
    }
    this.ctx.warning(
      `Nothing matched when jumping to ${target.title} and its siblings.`
    );
    return (await this.returnAfterDigression()) ?? this.commandEnd();
  }

  /**
   * Switch to a root node initiated by the user
   */
  private async digression(from: DialogNode): Promise<FlowResult> {
    logger.debug({ event: 'digression', node: from.title });
    this.journalEvent('digression_from', from);
    for (const node of this.tree.rootNodes.nodes(this.ctx)) {
      if (node === from) {
        continue;
      }
      if (node.condition.test(this.ctx, { digressing: true })) {
        return this.triggerMaybeDigressed(node);
      }
    }
    if (this.ctx.rpc.active) {
      return FlowResult.LISTEN;
    }
    if (from.followupAllowReturn) {
      return (
        (await this.returnAfterDigression(DigressionResult.NOT_FOUND)) ??
        this.commandEnd()
      );
    }
    this.ctx.warning(
      `Nothing matched digressing from ${from.title}, the conversation is ended.`
    );
    return this.commandEnd();
  }

  /**
   * Return to the node that was interrupted when the digression occurred
   *
   * @returns null when there is nowhere to return
   */
  private async returnAfterDigression(
    result: DigressionResult = DigressionResult.FOUND
  ): Promise<FlowResult | null> {
    const focused = this.stack.pop();
    if (!focused) {
      return null;
    }
    const { node, transition } = focused;
    logger.debug({ event: 'return_after_digression', node: node.title, transition });
    switch (transition) {
      case Transition.SLOT_FILLING:
        return this.trigger(node, result);
      case Transition.FOLLOWUP:
        if (node.followupAllowReturn) {
          return this.trigger(node, result);
        }
        return this.returnAfterDigression(result);
      case Transition.CONDITION:
        return this.returnAfterDigression(result);
      default:
        throw new FlowError(`Unknown focus transition '${String(transition)}'`);
    }
  }

  /**
   * Trigger the node or return to it after a digression
   */
  private async triggerMaybeDigressed(node: DialogNode): Promise<FlowResult> {
    if (this.stack.remove(node)) {
      return this.trigger(node, DigressionResult.FOUND);
    }
    return this.trigger(node);
  }

  /**
   * Go through the node's slot filling (if any) and execute its response
   */
  private async trigger(
    node: DialogNode,
    digressionResult?: DigressionResult
  ): Promise<FlowResult> {
    this.journalEvent('node_triggered', node);
    if (!node.slotFilling) {
      return this.response(node, digressionResult);
    }
    const result = await node.slotFilling.run(this.ctx, digressionResult);
    switch (result) {
      case FlowResult.DONE:
        this.stack.remove(node);
        return this.response(node, digressionResult);
      case FlowResult.LISTEN:
        this.stack.push(node, Transition.SLOT_FILLING);
        return FlowResult.LISTEN;
      case FlowResult.DIGRESS:
        return this.digression(node);
      default:
        throw new FlowError(`Unknown flow result '${String(result)}'`);
    }
  }

  /**
   * Execute the node's response scenario
   *
   * The first control command decides what happens next, the commands
   * after it are ignored.
   */
  private async response(
    node: DialogNode,
    digressionResult?: DigressionResult
  ): Promise<FlowResult> {
    const payload = this.journalEvent('response', node);
    const commands = await node.response.execute(this.ctx, {
      returning: digressionResult !== undefined,
    });
    for (const command of commands) {
      const control = matchControlCommand(command, NODE_COMMANDS);
      if (control) {
        payload.control_command = control;
      }
      switch (control) {
        case 'jump_to':
          return this.commandJumpTo(node, command.jump_to);
        case 'listen':
          return this.commandListen(node);
        case 'end':
          return this.commandEnd();
        case 'followup':
          return this.commandFollowup(node);
      }
      this.ctx.commands.push(command);
    }
    if (!node.followup.isEmpty) {
      payload.followup = {};
      return this.commandListen(node);
    }
    const result = await this.returnAfterDigression();
    if (result) {
      payload.return_after_digression = {};
      return result;
    }
    payload.end = {};
    return this.commandEnd();
  }

  private journalEvent(type: string, node: DialogNode): Record<string, unknown> {
    const info: Record<string, unknown> = { condition: node.condition.source };
    if (node.label !== undefined) {
      info.label = node.label;
    }
    return this.ctx.journalEvent(type, { node: info });
  }
}
