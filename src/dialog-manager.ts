/**
 * Dialog manager: processes user messages and RPC requests
 *
 * Loads the state variables of the dialog, runs one turn of the dialog
 * flow and saves the state back.
 */

import type { Command } from './types/scenario.types';
import {
  JournalEvent,
  TurnContext,
  TurnContextInit,
} from './context/turn-context';
import { EntitiesResult, IntentsResult } from './context/recognition';
import { FlowError } from './errors';
import { logger } from './logger';
import { DialogFlow, TurnOutcome } from './flows/dialog-flow';
import { RpcManager, RpcMethodDefinition } from './rpc';
import {
  DialogInfo,
  DialogInfoSchema,
  Message,
  MessageSchema,
  RpcRequestInput,
  RpcRequestSchema,
} from './schema/message-schema';
import type { StateVariables } from './schema/state-schema';
import { formatIssues } from './schema/format-issues';
import { StateTracker } from './state-tracker';
import type { z } from 'zod';

/**
 * Recognizes intents and entities in a user message
 */
export type Recognizer = (
  message: Message
) => Promise<{ intents: IntentsResult; entities: EntitiesResult }>;

/**
 * Receives the context of each finished turn
 */
export type Journal = (ctx: TurnContext) => void;

export interface DialogManagerOptions {
  dialogFlow?: DialogFlow;
  /** Defaults to a tracker with in-memory storage */
  stateTracker?: StateTracker;
  recognizer?: Recognizer;
  /** Defaults to writing `log` journal events to the logger */
  journal?: Journal;
  /** Save the state after each turn (default true) */
  autoSave?: boolean;
}

export type ProcessResult = {
  status: TurnOutcome['status'];
  /** Commands to send to the user */
  commands: Command[];
  error?: FlowError;
  journalEvents: JournalEvent[];
  /** State variables after the turn */
  state: StateVariables;
};

/**
 * Dialog key used by the state tracker
 */
export function dialogKey(dialog: DialogInfo): string {
  return `${dialog.channelName}:${dialog.userId}`;
}

/**
 * Default journal: replays `log` events of the turn through the logger
 */
export function logJournal(ctx: TurnContext): void {
  const log = logger.child({ dialog: dialogKey(ctx.dialog) });
  for (const event of ctx.journalEvents) {
    const record = TurnContext.extractLogEvent(event);
    if (record) {
      log.log(record.level === 'WARNING' ? 'warn' : 'debug', {
        event: 'journal',
        message: record.message,
      });
    }
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new FlowError(`Invalid ${what}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Processes messages and RPC requests of many dialogs with one dialog flow
 *
 * @example
 * ```typescript
 * const manager = new DialogManager();
 * manager.load({ dialog: [{ condition: true, response: 'Hello!' }] });
 * const { commands } = await manager.processMessage(
 *   { text: 'hi' },
 *   { channelName: 'telegram', userId: '42' }
 * );
 * ```
 */
export class DialogManager {
  readonly dialogFlow: DialogFlow;
  readonly stateTracker: StateTracker;
  private rpc = new RpcManager();
  private readonly recognizer?: Recognizer;
  private readonly journal: Journal;
  private readonly autoSave: boolean;

  constructor(options: DialogManagerOptions = {}) {
    this.dialogFlow = options.dialogFlow ?? new DialogFlow();
    this.stateTracker = options.stateTracker ?? new StateTracker();
    this.recognizer = options.recognizer;
    this.journal = options.journal ?? logJournal;
    this.autoSave = options.autoSave ?? true;
  }

  /**
   * Build the dialog tree of the flow and declare the RPC methods
   *
   * @throws TreeError when the definition or the methods are malformed
   * or inconsistent
   */
  load(
    definition: unknown,
    rpcMethods: readonly RpcMethodDefinition[] = []
  ): void {
    const rpc = new RpcManager();
    rpc.load(rpcMethods);
    this.dialogFlow.load(definition);
    this.rpc = rpc;
  }

  get isReady(): boolean {
    return this.dialogFlow.isLoaded;
  }

  async processMessage(
    message: Message,
    dialog: DialogInfo
  ): Promise<ProcessResult> {
    const validMessage = validate(MessageSchema, message, 'message');
    const validDialog = validate(DialogInfoSchema, dialog, 'dialog info');
    const recognized = this.recognizer
      ? await this.recognizer(validMessage)
      : {};
    return this.process(validDialog, {
      message: validMessage,
      ...recognized,
    });
  }

  async processRpc(
    request: RpcRequestInput,
    dialog: DialogInfo
  ): Promise<ProcessResult> {
    const validDialog = validate(DialogInfoSchema, dialog, 'dialog info');
    // Methods are declared on load, until then the turn is skipped anyway
    const validRequest = this.isReady
      ? this.rpc.parseRequest(request)
      : validate(RpcRequestSchema, request, 'RPC request');
    return this.process(validDialog, { rpc: validRequest });
  }

  private async process(
    dialog: DialogInfo,
    input: Omit<TurnContextInit, 'dialog' | 'state'>
  ): Promise<ProcessResult> {
    const key = dialogKey(dialog);
    const log = logger.child({ dialog: key });
    const state = await this.stateTracker.load(key);
    if (!this.isReady) {
      log.warn({
        event: 'not_ready',
        message: 'The dialog flow is not loaded, the turn is skipped',
      });
      return { status: 'done', commands: [], journalEvents: [], state };
    }

    const ctx = new TurnContext({ ...input, dialog, state });
    const outcome = await this.dialogFlow.turn(ctx);
    this.journal(ctx);

    if (this.autoSave) {
      await this.stateTracker.save(key, ctx.state);
    }
    log.debug({
      event: 'turn_processed',
      status: outcome.status,
      commands: ctx.commands.length,
    });

    return {
      status: outcome.status,
      commands: ctx.commands,
      ...(outcome.status === 'failed' ? { error: outcome.error } : {}),
      journalEvents: ctx.journalEvents,
      state: ctx.state,
    };
  }
}
