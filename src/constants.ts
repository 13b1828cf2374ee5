/**
 * Name of the component that stores the dialog tree state
 */
export const ROOT_COMPONENT = 'ROOT' as const;

/**
 * Result of the turn of a flow
 */
export const FlowResult = {
  DIGRESS: 'digress',
  LISTEN: 'listen',
  DONE: 'done',
} as const;
export type FlowResult = (typeof FlowResult)[keyof typeof FlowResult];

/**
 * Result with which a flow is resumed after a digression
 */
export const DigressionResult = {
  FOUND: 'found',
  NOT_FOUND: 'not_found',
} as const;
export type DigressionResult =
  (typeof DigressionResult)[keyof typeof DigressionResult];

/**
 * How a focused node continues on the next turn
 */
export const Transition = {
  CONDITION: 'condition',
  FOLLOWUP: 'followup',
  SLOT_FILLING: 'slot_filling',
} as const;
export type Transition = (typeof Transition)[keyof typeof Transition];

/** Control commands of node `response` scenarios */
export const NODE_COMMANDS = ['jump_to', 'listen', 'end', 'followup'] as const;

/** Control commands of slot `found` scenarios */
export const FOUND_COMMANDS = [
  'move_on',
  'prompt_again',
  'listen_again',
  'response',
] as const;

/** Control commands of slot `not_found` scenarios */
export const NOT_FOUND_COMMANDS = [
  'prompt_again',
  'listen_again',
  'response',
] as const;

/** Control commands of slot `prompt` scenarios */
export const PROMPT_COMMANDS = ['listen_again', 'response'] as const;

/** Control commands of slot handler responses */
export const HANDLER_COMMANDS = ['move_on', 'response'] as const;

/**
 * Policies for nodes with followup children when a digression occurred
 * after the node's response
 */
export const AFTER_DIGRESSION_POLICIES = ['allow_return', 'never_return'] as const;
export type AfterDigressionPolicy = (typeof AFTER_DIGRESSION_POLICIES)[number];
