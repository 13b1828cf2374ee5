import * as readline from 'readline';
import {
  DialogDefinition,
  DialogManager,
  EntitiesResult,
  IntentsResult,
  MemoryStorageAdapter,
  RecognizedEntity,
  RecognizedIntent,
  Recognizer,
  StateTracker,
} from '../src';

/**
 * Interactive demo of the dialog tree engine
 * A table reservation bot with slot filling, followups and digressions
 */

const INTENT_KEYWORDS: Record<string, string[]> = {
  greeting: ['hi', 'hello', 'hey'],
  reservation: ['book', 'reserve', 'table'],
  opening_hours: ['hours', 'open'],
  cancel: ['cancel', 'stop'],
  affirm: ['yes', 'sure'],
  deny: ['no', 'nope'],
};

const DAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

/**
 * Keyword based recognizer, good enough to play with the dialog
 */
const recognizer: Recognizer = async (message) => {
  const text = (message.text ?? '').toLowerCase();
  const words = text.split(/\W+/).filter(Boolean);

  const intents = Object.entries(INTENT_KEYWORDS)
    .filter(([, keywords]) => keywords.some((k) => words.includes(k)))
    .map(([name]) => new RecognizedIntent(name, 0.9));

  const entities: RecognizedEntity[] = [];
  for (const match of text.matchAll(/\d+/g)) {
    const start = match.index ?? 0;
    entities.push(
      new RecognizedEntity('number', Number(match[0]), match[0], start, start + match[0].length)
    );
  }
  for (const day of DAYS) {
    const start = text.indexOf(day);
    if (start >= 0) {
      entities.push(new RecognizedEntity('day', day, day, start, start + day.length));
    }
  }

  return {
    intents: IntentsResult.resolve(intents, {
      definitions: Object.keys(INTENT_KEYWORDS).map((name) => ({ name })),
    }),
    entities: EntitiesResult.resolve(entities, [{ name: 'number' }, { name: 'day' }]),
  };
};

const definition: DialogDefinition = {
  dialog: [
    {
      condition: (ctx) => ctx.intents.get('greeting') !== null,
      response: 'Hello! I can book a table or tell you our opening hours.',
    },
    {
      label: 'reservation',
      condition: (ctx) => ctx.intents.get('reservation') !== null,
      slotFilling: [
        {
          name: 'guests',
          checkFor: (ctx) => ctx.entities.get('number'),
          prompt: 'For how many guests?',
          found: (_ctx, { currentValue }) =>
            Number(currentValue) > 12
              ? [{ text: 'We can seat at most 12 guests.' }, { prompt_again: {} }]
              : [],
          notFound: 'Please tell me a number of guests.',
        },
        {
          name: 'day',
          checkFor: (ctx) => ctx.entities.get('day'),
          prompt: 'Which day would you like to come?',
        },
      ],
      slotHandlers: [
        {
          condition: (ctx) => ctx.intents.get('cancel') !== null,
          response: [{ text: 'Okay, no reservation then.' }, { response: {} }],
        },
      ],
      response: (ctx) =>
        ctx.state.slots.guests && ctx.state.slots.day
          ? [
              {
                text: `Table for ${String(ctx.state.slots.guests)} on ${String(ctx.state.slots.day)}. Shall I confirm?`,
              },
            ]
          : [{ end: {} }],
      followup: [
        {
          condition: (ctx) => ctx.intents.get('affirm') !== null,
          response: 'Confirmed, see you soon!',
        },
        {
          condition: (ctx) => ctx.intents.get('deny') !== null,
          response: 'The reservation is dropped.',
        },
      ],
    },
    {
      condition: (ctx) => ctx.intents.get('opening_hours') !== null,
      response: 'We are open from noon to midnight every day.',
    },
    {
      condition: (_ctx, { digressing }) => !digressing,
      response: "Sorry, I didn't get that.",
    },
  ],
};

async function demo() {
  console.log('=== Dialog Tree Interactive Demo ===\n');

  const manager = new DialogManager({
    recognizer,
    stateTracker: new StateTracker(new MemoryStorageAdapter()),
  });
  manager.load(definition);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const askUser = (prompt: string): Promise<string> => {
    return new Promise((resolve) => {
      rl.question(prompt, (answer) => {
        resolve(answer);
      });
    });
  };

  const dialog = { channelName: 'console', userId: 'demo' };

  // Conversation loop, an empty line quits
  for (;;) {
    const userInput = await askUser('You: ');
    if (!userInput.trim()) {
      break;
    }

    const result = await manager.processMessage({ text: userInput }, dialog);
    for (const command of result.commands) {
      if (typeof command.text === 'string') {
        console.log(`Bot: ${command.text}`);
      }
    }
    if (result.error) {
      console.log(`(turn failed: ${result.error.message})`);
    }
  }

  console.log('\nFinal state:', JSON.stringify(await manager.stateTracker.load('console:demo')));
  rl.close();
}

demo().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
