/**
 * Schemas of the inputs of a turn
 */

import { z } from 'zod';

/**
 * Information about the dialog a message came from
 */
export const DialogInfoSchema = z.object({
  channelName: z.string().min(1),
  userId: z.string().min(1),
});

export type DialogInfo = z.infer<typeof DialogInfoSchema>;

/**
 * A message received from the user
 *
 * Channel specific fields (images, locations, ...) pass through as is.
 */
export const MessageSchema = z
  .object({
    text: z.string().optional(),
  })
  .passthrough();

export type Message = z.infer<typeof MessageSchema>;

/**
 * A request received from an RPC client
 */
export const RpcRequestSchema = z.object({
  method: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export type RpcRequest = z.infer<typeof RpcRequestSchema>;

export type RpcRequestInput = z.input<typeof RpcRequestSchema>;
