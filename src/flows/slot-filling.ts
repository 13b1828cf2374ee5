/**
 * Slot filling conversation flow
 *
 * Collects several values from the user before the node gives its
 * response. The user may provide any number of values in one message,
 * the flow asks only for the missing ones.
 */

import {
  DigressionResult,
  FOUND_COMMANDS,
  FlowResult,
  HANDLER_COMMANDS,
  NOT_FOUND_COMMANDS,
  PROMPT_COMMANDS,
} from '../constants';
import type { TurnContext } from '../context/turn-context';
import { isTruthy, unwrapSlotValue } from '../context/recognition';
import { logger } from '../logger';
import { Expression, Scenario, matchControlCommand } from '../scenario';
import {
  SlotFillingState,
  SlotFillingStateSchema,
} from '../schema/state-schema';
import type {
  HandlerDefinition,
  SlotDefinition,
} from '../types/dialog.types';
import type { FlowModel } from './flow-component';

/**
 * A slot with runnable expressions and scenarios
 */
export class Slot {
  readonly name: string;
  readonly checkFor: Expression;
  readonly value: Expression | null;
  readonly condition: Expression | null;
  readonly prompt: Scenario | null;
  readonly found: Scenario | null;
  readonly notFound: Scenario | null;

  constructor(definition: SlotDefinition) {
    this.name = definition.name;
    this.checkFor = Expression.compile(definition.checkFor);
    this.value =
      definition.value !== undefined ? Expression.compile(definition.value) : null;
    this.condition =
      definition.condition !== undefined
        ? Expression.compile(definition.condition)
        : null;
    this.prompt = definition.prompt ? Scenario.compile(definition.prompt) : null;
    this.found = definition.found ? Scenario.compile(definition.found) : null;
    this.notFound = definition.notFound
      ? Scenario.compile(definition.notFound)
      : null;
  }
}

/**
 * Responds to questions tangential to the slots being filled
 */
export class Handler {
  readonly condition: Expression;
  readonly response: Scenario;

  constructor(definition: HandlerDefinition) {
    this.condition = Expression.compile(definition.condition);
    this.response = Scenario.compile(definition.response);
  }
}

export class SlotFilling implements FlowModel<SlotFillingState> {
  readonly stateSchema = SlotFillingStateSchema;
  readonly slots: readonly Slot[];
  readonly handlers: readonly Handler[];

  constructor(
    slots: readonly SlotDefinition[],
    handlers: readonly HandlerDefinition[] = []
  ) {
    this.slots = slots.map((s) => new Slot(s));
    this.handlers = handlers.map((h) => new Handler(h));
  }

  async turn(
    ctx: TurnContext,
    state: SlotFillingState,
    digressionResult?: DigressionResult
  ): Promise<FlowResult> {
    const turn = new SlotFillingTurn(
      this.slots,
      this.handlers,
      ctx,
      state,
      digressionResult
    );
    return turn.run();
  }
}

type FoundSlot = {
  slot: Slot;
  previousValue: unknown;
  currentValue: unknown;
};

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * A turn of the slot filling flow
 */
class SlotFillingTurn {
  /** Slots elicited during the turn */
  private readonly foundSlots: FoundSlot[] = [];
  /** Slots we were asked not to prompt for */
  private readonly skipPrompt = new Set<Slot>();
  /** Skip the remaining slots and give the node response */
  private wantResponse = false;

  constructor(
    private readonly slots: readonly Slot[],
    private readonly handlers: readonly Handler[],
    private readonly ctx: TurnContext,
    private readonly state: SlotFillingState,
    private readonly digressionResult?: DigressionResult
  ) {}

  async run(): Promise<FlowResult> {
    for (const slot of this.enabledSlots()) {
      this.elicit(slot);
    }

    for (const found of this.foundSlots) {
      if (found.slot.found) {
        await this.found(found.slot.found, found);
      }
    }

    if (this.state.slot_in_focus && this.foundSlots.length === 0) {
      // try in order: slot handlers, digression, not found response
      if (this.digressionResult === undefined) {
        const handler = this.handlers.find((h) => h.condition.test(this.ctx));
        if (!handler) {
          return FlowResult.DIGRESS;
        }
        await this.handler(handler);
      }

      if (this.digressionResult === DigressionResult.NOT_FOUND) {
        const focused = this.focusedSlot(this.state.slot_in_focus);
        if (focused?.notFound) {
          await this.notFound(focused, focused.notFound);
        }
      }
    }

    if (!this.wantResponse) {
      await this.promptNext();
    }

    if (this.wantResponse) {
      this.state.slot_in_focus = null;
    }
    return this.state.slot_in_focus ? FlowResult.LISTEN : FlowResult.DONE;
  }

  /**
   * Slots whose condition holds, conditions are evaluated lazily
   */
  private *enabledSlots(): Generator<Slot, void, undefined> {
    for (const slot of this.slots) {
      if (!slot.condition || slot.condition.test(this.ctx)) {
        yield slot;
      }
    }
  }

  private focusedSlot(name: string): Slot | undefined {
    for (const slot of this.enabledSlots()) {
      if (slot.name === name) {
        return slot;
      }
    }
    return undefined;
  }

  /**
   * Capture and store the slot value from the user input
   */
  private elicit(slot: Slot): void {
    const found = slot.checkFor.evaluate(this.ctx, {
      slotInFocus: this.state.slot_in_focus === slot.name,
    });
    if (!isTruthy(found)) {
      return;
    }
    const value = unwrapSlotValue(
      slot.value ? slot.value.evaluate(this.ctx) : found
    );
    logger.debug({ event: 'elicit', slot: slot.name, value });

    const slots = this.ctx.state.slots;
    const previousValue = slots[slot.name];
    slots[slot.name] = value;
    this.ctx.journalEvent('assign', { slot: slot.name, value });
    this.foundSlots.push({ slot, previousValue, currentValue: value });
  }

  private clearSlot(slot: Slot): void {
    delete this.ctx.state.slots[slot.name];
    this.ctx.journalEvent('delete', { slot: slot.name });
  }

  /**
   * Execute the `found` scenario and its control commands
   */
  private async found(scenario: Scenario, found: FoundSlot): Promise<void> {
    const { slot, previousValue, currentValue } = found;
    const payload = this.ctx.journalEvent('found', { slot: slot.name });
    const commands = await scenario.execute(this.ctx, {
      previousValue,
      currentValue,
    });
    for (const command of commands) {
      const control = matchControlCommand(command, FOUND_COMMANDS);
      if (control) {
        payload.control_command = control;
        if (control === 'response') {
          this.wantResponse = true;
        } else if (control === 'prompt_again') {
          this.clearSlot(slot);
        } else if (control === 'listen_again') {
          this.clearSlot(slot);
          this.skipPrompt.add(slot);
        }
        return;
      }
      this.ctx.commands.push(command);
    }
  }

  /**
   * Execute the `not_found` scenario and its control commands
   *
   * Without a control command the slot is prompted again.
   */
  private async notFound(slot: Slot, scenario: Scenario): Promise<void> {
    const payload = this.ctx.journalEvent('not_found', { slot: slot.name });
    for (const command of await scenario.execute(this.ctx)) {
      const control = matchControlCommand(command, NOT_FOUND_COMMANDS);
      if (control) {
        payload.control_command = control;
        if (control === 'response') {
          this.wantResponse = true;
        } else if (control === 'listen_again') {
          this.skipPrompt.add(slot);
        }
        return;
      }
      this.ctx.commands.push(command);
    }
  }

  /**
   * Execute the `prompt` scenario and its control commands
   */
  private async prompt(slot: Slot, scenario: Scenario): Promise<void> {
    const payload = this.ctx.journalEvent('prompt', { slot: slot.name });
    for (const command of await scenario.execute(this.ctx)) {
      const control = matchControlCommand(command, PROMPT_COMMANDS);
      if (control) {
        payload.control_command = control;
        if (control === 'response') {
          this.wantResponse = true;
        }
        return;
      }
      this.ctx.commands.push(command);
    }
  }

  /**
   * Execute the handler response and its control commands
   */
  private async handler(handler: Handler): Promise<void> {
    const payload = this.ctx.journalEvent('slot_handler', {
      condition: handler.condition.source,
    });
    for (const command of await handler.response.execute(this.ctx)) {
      const control = matchControlCommand(command, HANDLER_COMMANDS);
      if (control) {
        payload.control_command = control;
        if (control === 'response') {
          this.wantResponse = true;
        }
        return;
      }
      this.ctx.commands.push(command);
    }
  }

  /**
   * Focus on the first empty slot that has a prompt and ask for it
   */
  private async promptNext(): Promise<void> {
    for (const slot of this.enabledSlots()) {
      if (slot.prompt && isEmpty(this.ctx.state.slots[slot.name])) {
        this.state.slot_in_focus = slot.name;
        if (!this.skipPrompt.has(slot)) {
          await this.prompt(slot, slot.prompt);
        }
        return;
      }
    }
    this.state.slot_in_focus = null;
  }
}
