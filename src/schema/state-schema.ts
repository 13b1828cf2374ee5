/**
 * Schemas of the state persisted between turns
 *
 * Unknown keys are stripped on read: a stored blob written by another
 * version of the dialog is never rejected for having extra data.
 */

import { z } from 'zod';
import { FlowError, InvalidStateError } from '../errors';
import { Transition } from '../constants';
import { formatIssues } from './format-issues';

/**
 * State variables of a dialog
 */
export const StateVariablesSchema = z.object({
  /** User variables that live forever */
  user: z.record(z.unknown()).default({}),
  /** Variables that live while a topic is discussed, cleared at the end of the conversation */
  slots: z.record(z.unknown()).default({}),
  /** Private state of flow components, keyed by component name */
  components: z.record(z.unknown()).default({}),
});

export type StateVariables = z.infer<typeof StateVariablesSchema>;

/**
 * Create empty state variables
 */
export function createEmptyState(): StateVariables {
  return { user: {}, slots: {}, components: {} };
}

/**
 * Validate state variables loaded from a storage
 *
 * @param snapshot - the stored snapshot the value comes from
 * @throws FlowError when the value is not a state object,
 *   InvalidStateError when it comes from a snapshot
 */
export function parseStateVariables(
  value: unknown,
  snapshot?: { dialogId: string; version: number }
): StateVariables {
  const parsed = StateVariablesSchema.safeParse(value ?? {});
  if (!parsed.success) {
    const message = `Invalid state variables: ${formatIssues(parsed.error)}`;
    if (snapshot) {
      throw new InvalidStateError(message, snapshot.dialogId, snapshot.version);
    }
    throw new FlowError(message);
  }
  return parsed.data;
}

export const TransitionSchema = z.nativeEnum(Transition);

/**
 * `[label, transition]` pair of the node stack
 */
export const NodeStackEntrySchema = z.tuple([z.string(), TransitionSchema]);

export type NodeStackEntry = z.infer<typeof NodeStackEntrySchema>;

/**
 * State of the dialog tree flow
 */
export const DialogTreeStateSchema = z.object({
  node_stack: z.array(NodeStackEntrySchema).optional(),
});

export type DialogTreeState = z.infer<typeof DialogTreeStateSchema>;

/**
 * State of the slot filling flow of a node
 */
export const SlotFillingStateSchema = z.object({
  slot_in_focus: z.string().nullable().optional(),
});

export type SlotFillingState = z.infer<typeof SlotFillingStateSchema>;
