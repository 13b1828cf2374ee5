import { DigressionResult, FlowResult } from '../src/constants';
import { IntentsResult, RecognizedIntent } from '../src/context/recognition';
import { SlotFilling } from '../src/flows/slot-filling';
import type { SlotFillingState } from '../src/schema/state-schema';
import type { SlotDefinition } from '../src/types/dialog.types';
import {
  dateEntity,
  entities,
  messageContext,
  numberEntity,
  texts,
} from './helpers';

const guests: SlotDefinition = {
  name: 'guests',
  checkFor: (ctx) => ctx.entities.get('number'),
  prompt: 'How many guests?',
};

const date: SlotDefinition = {
  name: 'date',
  checkFor: (ctx) => ctx.entities.get('date'),
  prompt: 'What date?',
};

describe('SlotFilling', () => {
  describe('Prompt', () => {
    it('should prompt for an empty slot without storing a value', async () => {
      const flow = new SlotFilling([
        { name: 'slot1', checkFor: false, prompt: 'prompt triggered' },
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(ctx.commands).toEqual([{ text: 'prompt triggered' }]);
      expect(state).toEqual({ slot_in_focus: 'slot1' });
      expect(ctx.state.slots).toEqual({});
    });

    it('should digress when the focused slot is not found and no handler matches', async () => {
      const flow = new SlotFilling([
        { name: 'slot1', checkFor: false, prompt: 'prompt triggered' },
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = { slot_in_focus: 'slot1' };

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DIGRESS);
      expect(ctx.commands).toEqual([]);
      expect(state).toEqual({ slot_in_focus: 'slot1' });
    });

    it('should skip disabled slots', async () => {
      const flow = new SlotFilling([
        { ...guests, condition: false },
        date,
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['What date?']);
      expect(state).toEqual({ slot_in_focus: 'date' });
    });

    it('should not prompt for slots without a prompt', async () => {
      const flow = new SlotFilling([{ name: 'note', checkFor: false }]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DONE);
      expect(ctx.commands).toEqual([]);
      expect(state).toEqual({ slot_in_focus: null });
    });

    it('should give the response at once on the response command of a prompt', async () => {
      const flow = new SlotFilling([
        { ...guests, prompt: [{ text: 'Skipping' }, { response: {} }] },
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DONE);
      expect(texts(ctx)).toEqual(['Skipping']);
      expect(state).toEqual({ slot_in_focus: null });
    });
  });

  describe('Elicit', () => {
    it('should store found values and prompt for the next slot', async () => {
      const flow = new SlotFilling([guests, date]);
      const ctx = messageContext('four', { entities: entities(numberEntity(4)) });
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['What date?']);
      expect(state).toEqual({ slot_in_focus: 'date' });
      expect(ctx.state.slots).toEqual({ guests: 4 });
      expect(ctx.journalEvents[0]).toEqual({
        type: 'assign',
        payload: { slot: 'guests', value: 4 },
      });
    });

    it('should be done when all slots are filled', async () => {
      const flow = new SlotFilling([guests, date]);
      const ctx = messageContext('friday', {
        entities: entities(dateEntity('friday')),
      });
      ctx.state.slots.guests = 4;
      const state: SlotFillingState = { slot_in_focus: 'date' };

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DONE);
      expect(ctx.commands).toEqual([]);
      expect(state).toEqual({ slot_in_focus: null });
      expect(ctx.state.slots).toEqual({ guests: 4, date: 'friday' });
    });

    it('should fill several slots from one message', async () => {
      const flow = new SlotFilling([guests, date]);
      const ctx = messageContext('four on friday', {
        entities: entities(numberEntity(4), dateEntity('friday')),
      });
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DONE);
      expect(ctx.state.slots).toEqual({ guests: 4, date: 'friday' });
    });

    it('should overwrite a filled slot', async () => {
      const flow = new SlotFilling([
        {
          ...guests,
          found: (_ctx, { previousValue, currentValue }) => [
            { text: `${String(previousValue)} -> ${String(currentValue)}` },
          ],
        },
      ]);
      const ctx = messageContext('six', { entities: entities(numberEntity(6)) });
      ctx.state.slots.guests = 4;

      expect(await flow.turn(ctx, {})).toBe(FlowResult.DONE);
      expect(texts(ctx)).toEqual(['4 -> 6']);
      expect(ctx.state.slots).toEqual({ guests: 6 });
    });

    it('should store the value expression result instead of the check', async () => {
      const flow = new SlotFilling([
        { name: 'confirmed', checkFor: true, value: () => 'yes' },
      ]);
      const ctx = messageContext('ok');

      await flow.turn(ctx, {});

      expect(ctx.state.slots).toEqual({ confirmed: 'yes' });
    });

    it('should store true for a recognized intent', async () => {
      const flow = new SlotFilling([
        { name: 'agreed', checkFor: (ctx) => ctx.intents.get('affirm') },
      ]);
      const ctx = messageContext('sure', {
        intents: IntentsResult.resolve([new RecognizedIntent('affirm', 0.9)]),
      });

      await flow.turn(ctx, {});

      expect(ctx.state.slots).toEqual({ agreed: true });
    });

    it('should tell the check whether the slot is in focus', async () => {
      const flow = new SlotFilling([
        {
          name: 'answer',
          checkFor: (ctx, { slotInFocus }) =>
            slotInFocus === true && ctx.message?.text,
          prompt: 'Your answer?',
        },
      ]);

      const fresh = messageContext('maybe');
      const state: SlotFillingState = {};
      expect(await flow.turn(fresh, state)).toBe(FlowResult.LISTEN);
      expect(fresh.state.slots).toEqual({});

      const focused = messageContext('maybe');
      expect(await flow.turn(focused, state)).toBe(FlowResult.DONE);
      expect(focused.state.slots).toEqual({ answer: 'maybe' });
    });
  });

  describe('Found', () => {
    const checked: SlotDefinition = {
      ...guests,
      found: (_ctx, { currentValue }) =>
        Number(currentValue) > 10
          ? [{ text: 'Too many guests' }, { prompt_again: {} }]
          : [{ text: 'Fine' }],
    };

    it('should send the found output and go on', async () => {
      const flow = new SlotFilling([checked, date]);
      const ctx = messageContext('two', { entities: entities(numberEntity(2)) });
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['Fine', 'What date?']);
    });

    it('should clear the slot and prompt again', async () => {
      const flow = new SlotFilling([checked]);
      const ctx = messageContext('twenty', {
        entities: entities(numberEntity(20)),
      });
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['Too many guests', 'How many guests?']);
      expect(ctx.state.slots).toEqual({});
      expect(state).toEqual({ slot_in_focus: 'guests' });
      expect(ctx.journalEvents.map((e) => e.type)).toEqual([
        'assign',
        'found',
        'delete',
        'prompt',
      ]);
    });

    it('should clear the slot and listen without prompting', async () => {
      const flow = new SlotFilling([
        { ...guests, found: [{ text: 'Again?' }, { listen_again: {} }] },
      ]);
      const ctx = messageContext('one', { entities: entities(numberEntity(1)) });
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['Again?']);
      expect(ctx.state.slots).toEqual({});
      expect(state).toEqual({ slot_in_focus: 'guests' });
    });

    it('should give the response early on the response command', async () => {
      const flow = new SlotFilling([
        { ...guests, found: [{ text: 'Got it' }, { response: {} }] },
        date,
      ]);
      const ctx = messageContext('one', { entities: entities(numberEntity(1)) });
      const state: SlotFillingState = {};

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DONE);
      expect(texts(ctx)).toEqual(['Got it']);
      expect(state).toEqual({ slot_in_focus: null });
      expect(ctx.journalEvents[1]).toEqual({
        type: 'found',
        payload: { slot: 'guests', control_command: 'response' },
      });
    });

    it('should go on with the next slot on move_on', async () => {
      const flow = new SlotFilling([
        { ...guests, found: [{ move_on: {} }, { text: 'ignored' }] },
        date,
      ]);
      const ctx = messageContext('one', { entities: entities(numberEntity(1)) });

      expect(await flow.turn(ctx, {})).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['What date?']);
    });
  });

  describe('Handlers', () => {
    it('should answer with the first matching handler and prompt again', async () => {
      const flow = new SlotFilling(
        [guests],
        [
          { condition: false, response: 'never' },
          {
            condition: (ctx) => ctx.message?.text === 'what is this?',
            response: 'A table reservation.',
          },
        ]
      );
      const ctx = messageContext('what is this?');
      const state: SlotFillingState = { slot_in_focus: 'guests' };

      expect(await flow.turn(ctx, state)).toBe(FlowResult.LISTEN);
      expect(texts(ctx)).toEqual(['A table reservation.', 'How many guests?']);
      expect(ctx.journalEvents[0]).toEqual({
        type: 'slot_handler',
        payload: { condition: expect.stringContaining("'what is this?'") },
      });
    });

    it('should give the response early on the response command of a handler', async () => {
      const flow = new SlotFilling(
        [guests],
        [{ condition: true, response: [{ text: 'Cancelled' }, { response: {} }] }]
      );
      const ctx = messageContext('cancel');
      const state: SlotFillingState = { slot_in_focus: 'guests' };

      expect(await flow.turn(ctx, state)).toBe(FlowResult.DONE);
      expect(texts(ctx)).toEqual(['Cancelled']);
      expect(state).toEqual({ slot_in_focus: null });
    });

    it('should not run handlers when returning after a digression', async () => {
      const handler = jest.fn(() => [{ text: 'handled' }]);
      const flow = new SlotFilling([guests], [{ condition: true, response: handler }]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = { slot_in_focus: 'guests' };

      expect(await flow.turn(ctx, state, DigressionResult.FOUND)).toBe(
        FlowResult.LISTEN
      );
      expect(handler).not.toHaveBeenCalled();
      expect(texts(ctx)).toEqual(['How many guests?']);
    });
  });

  describe('Not found', () => {
    it('should give the not found output and prompt again', async () => {
      const flow = new SlotFilling([
        { ...guests, notFound: 'Sorry, I need a number.' },
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = { slot_in_focus: 'guests' };

      expect(await flow.turn(ctx, state, DigressionResult.NOT_FOUND)).toBe(
        FlowResult.LISTEN
      );
      expect(texts(ctx)).toEqual(['Sorry, I need a number.', 'How many guests?']);
    });

    it('should listen without prompting on listen_again', async () => {
      const flow = new SlotFilling([
        { ...guests, notFound: [{ text: 'Hm?' }, { listen_again: {} }] },
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = { slot_in_focus: 'guests' };

      expect(await flow.turn(ctx, state, DigressionResult.NOT_FOUND)).toBe(
        FlowResult.LISTEN
      );
      expect(texts(ctx)).toEqual(['Hm?']);
      expect(state).toEqual({ slot_in_focus: 'guests' });
    });

    it('should give the response early on the response command', async () => {
      const flow = new SlotFilling([
        { ...guests, notFound: [{ text: 'Never mind' }, { response: {} }] },
      ]);
      const ctx = messageContext('hello');
      const state: SlotFillingState = { slot_in_focus: 'guests' };

      expect(await flow.turn(ctx, state, DigressionResult.NOT_FOUND)).toBe(
        FlowResult.DONE
      );
      expect(texts(ctx)).toEqual(['Never mind']);
      expect(state).toEqual({ slot_in_focus: null });
    });
  });
});
