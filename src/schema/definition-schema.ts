/**
 * Schemas of dialog definitions
 *
 * Definitions usually come from TypeScript code, but they may also be
 * assembled from JSON at runtime, so they are validated before a tree is
 * built. Unknown keys are rejected, a misspelled key would otherwise
 * silently load as a different node.
 */

import { z } from 'zod';
import { AFTER_DIGRESSION_POLICIES } from '../constants';
import type {
  Command,
  ExpressionDefinition,
  ExpressionFn,
  ScenarioDefinition,
  ScenarioFn,
} from '../types/scenario.types';
import type {
  DialogDefinition,
  DialogNodeDefinition,
  HandlerDefinition,
  NodeDefinition,
  SlotDefinition,
  SubtreeDefinition,
  SubtreeRefDefinition,
} from '../types/dialog.types';

const isFunction = (value: unknown) => typeof value === 'function';

export const ExpressionSchema: z.ZodType<ExpressionDefinition> = z.union([
  z.boolean(),
  z.custom<ExpressionFn>(isFunction, { message: 'Expected a function' }),
]);

export const CommandSchema: z.ZodType<Command> = z.record(z.unknown());

export const CommandListSchema = z.array(CommandSchema);

export const ScenarioSchema: z.ZodType<ScenarioDefinition> = z.union([
  z.string(),
  CommandListSchema,
  z.custom<ScenarioFn>(isFunction, { message: 'Expected a function' }),
]);

export const SlotSchema: z.ZodType<SlotDefinition> = z.object({
  name: z.string().min(1),
  checkFor: ExpressionSchema,
  value: ExpressionSchema.optional(),
  condition: ExpressionSchema.optional(),
  prompt: ScenarioSchema.optional(),
  found: ScenarioSchema.optional(),
  notFound: ScenarioSchema.optional(),
}).strict();

export const HandlerSchema: z.ZodType<HandlerDefinition> = z.object({
  condition: ExpressionSchema,
  response: ScenarioSchema,
}).strict();

export const NodeSettingsSchema = z.object({
  afterDigressionFollowup: z.enum(AFTER_DIGRESSION_POLICIES).optional(),
}).strict();

export const SubtreeRefSchema: z.ZodType<SubtreeRefDefinition> = z.object({
  subtree: z.string().min(1),
}).strict();

/**
 * A node or a subtree link
 */
export const DialogNodeSchema: z.ZodType<DialogNodeDefinition> = z.lazy(() =>
  z.union([NodeSchema, SubtreeRefSchema])
);

export const NodeSchema: z.ZodType<NodeDefinition> = z.object({
  label: z.string().min(1).optional(),
  condition: ExpressionSchema,
  response: ScenarioSchema,
  followup: z.array(DialogNodeSchema).optional(),
  slotFilling: z.array(SlotSchema).optional(),
  slotHandlers: z.array(HandlerSchema).optional(),
  settings: NodeSettingsSchema.optional(),
}).strict();

export const SubtreeSchema: z.ZodType<SubtreeDefinition> = z.object({
  name: z.string().min(1),
  guard: ExpressionSchema.optional(),
  nodes: z.array(DialogNodeSchema),
}).strict();

export const DialogDefinitionSchema: z.ZodType<DialogDefinition> = z.object({
  dialog: z.array(DialogNodeSchema),
  subtrees: z.array(SubtreeSchema).optional(),
}).strict();

/**
 * Payload of the `jump_to` control command
 */
export const JumpToSchema = z.object({
  /** Label of the node to jump to */
  node: z.string(),
  /**
   * When the target node is processed:
   *   * `condition` - the first of the target node and its next siblings whose condition holds
   *   * `response` - the response of the target node, its condition is not checked
   *   * `listen` - wait for the user input, then process it starting from the target node
   */
  transition: z.enum(['condition', 'response', 'listen']),
});

export type JumpTo = z.infer<typeof JumpToSchema>;
