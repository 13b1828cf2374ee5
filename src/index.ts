/**
 * Dialog Tree Flow
 *
 * A conversation flow engine: a dialog tree of scripted nodes with
 * digressions, followups and slot filling, persisted between turns.
 *
 * @packageDocumentation
 */

export * from './constants';
export * from './errors';
export * from './logger';

export type * from './types/dialog.types';
export type * from './types/scenario.types';

export * from './context/recognition';
export * from './context/turn-context';

// Schemas of definitions, inputs and persisted state
export * from './schema/definition-schema';
export * from './schema/message-schema';
export * from './schema/state-schema';

export * from './scenario';

export * from './tree/branch';
export * from './tree/node';
export * from './tree/node-stack';
export * from './tree/tree';

export * from './flows/flow-component';
export * from './flows/dialog-tree';
export * from './flows/slot-filling';
export * from './flows/dialog-flow';

export * from './rpc';
export * from './dialog-manager';

// State tracker and persistence
export * from './state-tracker';
export * from './persistence/storage-adapter';
export * from './persistence/memory-adapter';
export * from './persistence/mongo-adapter';
