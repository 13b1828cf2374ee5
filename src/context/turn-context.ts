/**
 * The context of a dialog turn
 */

import { FlowError } from '../errors';
import type { Command } from '../types/scenario.types';
import type {
  DialogInfo,
  Message,
  RpcRequest,
  RpcRequestInput,
} from '../schema/message-schema';
import { StateVariables, createEmptyState } from '../schema/state-schema';
import { EntitiesResult, IntentsResult } from './recognition';

/**
 * The context of the RPC request being processed
 */
export class RpcContext {
  constructor(readonly request: RpcRequest | null = null) {}

  get method(): string | null {
    return this.request ? this.request.method : null;
  }

  get params(): Record<string, unknown> {
    return this.request ? this.request.params : {};
  }

  /** Whether an RPC request is processed during the turn */
  get active(): boolean {
    return this.request !== null;
  }

  /**
   * Return the request if the given method is called
   */
  is(method: string): RpcRequest | null {
    return this.request && this.request.method === method
      ? this.request
      : null;
  }
}

/**
 * An event of the turn journal
 */
export type JournalEvent = {
  type: string;
  payload: Record<string, unknown>;
};

export type JournalSink = (event: JournalEvent) => void;

export type LogJournalLevel = 'DEBUG' | 'WARNING';

export type TurnContextInit = {
  /** Information about the dialog */
  dialog: DialogInfo;
  /** State variables of the dialog, mutated during the turn */
  state?: StateVariables;
  /** User message, mutually exclusive with `rpc` */
  message?: Message;
  /** RPC request, mutually exclusive with `message` */
  rpc?: RpcRequestInput;
  intents?: IntentsResult;
  entities?: EntitiesResult;
  /** Date and time of the turn, defaults to now */
  utcTime?: Date;
  /** Receives each journal event as soon as it is recorded */
  onJournalEvent?: JournalSink;
};

/**
 * The context used by the engine when processing a message or an RPC request
 */
export class TurnContext {
  readonly dialog: DialogInfo;
  readonly state: StateVariables;
  readonly message: Message | null;
  readonly rpc: RpcContext;
  readonly intents: IntentsResult;
  readonly entities: EntitiesResult;
  readonly utcTime: Date;

  /** Commands to respond to the user */
  readonly commands: Command[] = [];

  /** Journal of the turn */
  readonly journalEvents: JournalEvent[] = [];

  private turnError: FlowError | null = null;
  private readonly onJournalEvent?: JournalSink;

  constructor(init: TurnContextInit) {
    if (Boolean(init.message) === Boolean(init.rpc)) {
      throw new FlowError(
        'A turn processes exactly one of a message or an RPC request'
      );
    }
    this.dialog = init.dialog;
    this.state = init.state ?? createEmptyState();
    this.message = init.message ?? null;
    this.rpc = new RpcContext(
      init.rpc ? { method: init.rpc.method, params: init.rpc.params ?? {} } : null
    );
    this.intents = init.intents ?? new IntentsResult();
    this.entities = init.entities ?? new EntitiesResult();
    this.utcTime = init.utcTime ?? new Date();
    this.onJournalEvent = init.onJournalEvent;
  }

  /** The error occurred during the turn */
  get error(): FlowError | null {
    return this.turnError;
  }

  setError(error: FlowError): void {
    this.turnError = error;
  }

  /**
   * Get the state variable of a component
   */
  getStateVariable(key: string): unknown {
    return this.state.components[key];
  }

  /**
   * Set the state variable of a component
   *
   * @param value - a JSON-serializable value
   */
  setStateVariable(key: string, value: unknown): void {
    this.state.components[key] = value;
  }

  deleteStateVariable(key: string): void {
    delete this.state.components[key];
  }

  /**
   * Clear the state of all components and the slots
   */
  clearStateVariables(): void {
    for (const key of Object.keys(this.state.components)) {
      delete this.state.components[key];
    }
    for (const key of Object.keys(this.state.slots)) {
      delete this.state.slots[key];
    }
  }

  /**
   * Add a journal event
   *
   * @returns the payload of the event, callers may add details to it later
   */
  journalEvent(
    type: string,
    payload: Record<string, unknown> = {}
  ): Record<string, unknown> {
    const event: JournalEvent = { type, payload };
    this.journalEvents.push(event);
    this.onJournalEvent?.(event);
    return event.payload;
  }

  log(level: LogJournalLevel, message: string): void {
    this.journalEvent('log', { level, message });
  }

  debug(message: string): void {
    this.log('DEBUG', message);
  }

  warning(message: string): void {
    this.log('WARNING', message);
  }

  /**
   * Level and message of a `log` journal event
   */
  static extractLogEvent(
    event: JournalEvent
  ): { level: LogJournalLevel; message: string } | null {
    if (event.type !== 'log') {
      return null;
    }
    const { level, message } = event.payload;
    if ((level === 'DEBUG' || level === 'WARNING') && typeof message === 'string') {
      return { level, message };
    }
    return null;
  }
}
