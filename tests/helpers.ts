import { TurnContext, TurnContextInit } from '../src/context/turn-context';
import {
  EntitiesResult,
  RecognizedEntity,
} from '../src/context/recognition';
import type { DialogInfo } from '../src/schema/message-schema';
import type { DialogNodeDefinition } from '../src/types/dialog.types';
import { Tree } from '../src/tree/tree';
import { DialogTree } from '../src/flows/dialog-tree';

export const dialog: DialogInfo = { channelName: 'test', userId: '1' };

/** Entity names known to the test dialogs */
export const entityDefinitions = [{ name: 'number' }, { name: 'date' }];

export function entities(...found: RecognizedEntity[]): EntitiesResult {
  return EntitiesResult.resolve(found, entityDefinitions);
}

export function numberEntity(value: number): RecognizedEntity {
  return new RecognizedEntity('number', value, String(value), 0, 1);
}

export function dateEntity(value: string): RecognizedEntity {
  return new RecognizedEntity('date', value, value, 0, value.length);
}

/**
 * Context of a turn processing a user message
 */
export function messageContext(
  text: string,
  init: Omit<TurnContextInit, 'dialog' | 'message' | 'rpc'> = {}
): TurnContext {
  return new TurnContext({
    dialog,
    message: { text },
    entities: entities(),
    ...init,
  });
}

/**
 * Context of a turn processing an RPC request
 */
export function rpcContext(
  method: string,
  params: Record<string, unknown> = {},
  init: Omit<TurnContextInit, 'dialog' | 'message' | 'rpc'> = {}
): TurnContext {
  return new TurnContext({
    dialog,
    rpc: { method, params },
    entities: entities(),
    ...init,
  });
}

export function buildDialogTree(
  nodes: readonly DialogNodeDefinition[]
): DialogTree {
  return new DialogTree(Tree.fromDefinition({ dialog: nodes }));
}

/**
 * Text of the commands sent to the user
 */
export function texts(ctx: TurnContext): unknown[] {
  return ctx.commands.map((c) => c.text);
}

export function isText(text: string) {
  return (ctx: TurnContext) => ctx.message?.text === text;
}
