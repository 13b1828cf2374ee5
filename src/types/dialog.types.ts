import type { AfterDigressionPolicy } from '../constants';
import type { ExpressionDefinition, ScenarioDefinition } from './scenario.types';

/**
 * Settings that change the behavior of an individual node
 */
export type NodeSettings = {
  /**
   * For nodes with `followup` children, when a digression is triggered
   * after the node's response:
   *   * `allow_return` - return from the digression and continue to process followup nodes
   *   * `never_return` - never return to the node
   */
  afterDigressionFollowup: AfterDigressionPolicy;
};

/**
 * Gathers a piece of information from the user input
 */
export type SlotDefinition = {
  /** Name of the slot to store the value in */
  name: string;
  /** Information to extract from the user input, the result is the slot value */
  checkFor: ExpressionDefinition;
  /** Stored instead of the `checkFor` result when given */
  value?: ExpressionDefinition;
  /** The slot is enabled only when the condition holds */
  condition?: ExpressionDefinition;
  /** Asks the user for the value. A slot without a prompt is optional. */
  prompt?: ScenarioDefinition;
  /** Executed after the value is found */
  found?: ScenarioDefinition;
  /** Executed when nothing was understood while the slot is in focus */
  notFound?: ScenarioDefinition;
};

/**
 * Answers a question tangential to the slots being filled
 */
export type HandlerDefinition = {
  condition: ExpressionDefinition;
  response: ScenarioDefinition;
};

/**
 * A node of the dialog tree
 */
export type NodeDefinition = {
  /**
   * Unique node label. Required for nodes with followup children or
   * slot filling, those use it to store their state. Also used as a
   * `jump_to` target.
   */
  label?: string;
  /** Determines whether the node is triggered */
  condition: ExpressionDefinition;
  /** Defines how to reply to the user */
  response: ScenarioDefinition;
  followup?: readonly DialogNodeDefinition[];
  slotFilling?: readonly SlotDefinition[];
  slotHandlers?: readonly HandlerDefinition[];
  settings?: Partial<NodeSettings>;
};

/**
 * A link to a named subtree in place of a node
 */
export type SubtreeRefDefinition = {
  subtree: string;
};

export type DialogNodeDefinition = NodeDefinition | SubtreeRefDefinition;

/**
 * A named group of nodes that is inserted by a subtree link
 */
export type SubtreeDefinition = {
  name: string;
  /** The whole group is skipped when the guard does not hold */
  guard?: ExpressionDefinition;
  nodes: readonly DialogNodeDefinition[];
};

/**
 * Everything needed to build a dialog tree
 */
export type DialogDefinition = {
  dialog: readonly DialogNodeDefinition[];
  subtrees?: readonly SubtreeDefinition[];
};
