/**
 * RPC methods accepted by the dialog
 *
 * A request is accepted only for a declared method, with declared params.
 * Error codes follow JSON-RPC 2.0.
 */

import { z } from 'zod';
import { FlowError, TreeError } from './errors';
import { formatIssues } from './schema/format-issues';
import { RpcRequest, RpcRequestSchema } from './schema/message-schema';

export const RpcParamSchema = z
  .object({
    name: z.string().min(1),
    required: z.boolean().optional(),
  })
  .strict();

export const RpcMethodSchema = z
  .object({
    method: z.string().min(1),
    params: z.array(RpcParamSchema).optional(),
  })
  .strict();

/**
 * A declared RPC method and its formal parameters
 */
export type RpcMethodDefinition = z.infer<typeof RpcMethodSchema>;

export const RpcErrorCode = {
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

/**
 * A request rejected before the turn
 */
export class RpcError extends FlowError {
  constructor(
    message: string,
    readonly code: RpcErrorCode,
    readonly data: unknown
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

const required = z.custom<unknown>((value) => value !== undefined, {
  message: 'Required',
});

function paramsSchema(params: readonly z.infer<typeof RpcParamSchema>[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of params) {
    shape[param.name] = param.required ? required : z.unknown();
  }
  return z.object(shape).strict();
}

export class RpcManager {
  private schemas = new Map<string, z.ZodTypeAny>();

  /** Names of the declared methods */
  get methods(): string[] {
    return [...this.schemas.keys()];
  }

  /**
   * Replace the declared methods
   *
   * @throws TreeError for a malformed declaration or a duplicate method
   */
  load(methods: unknown): void {
    const parsed = z.array(RpcMethodSchema).safeParse(methods);
    if (!parsed.success) {
      throw new TreeError(`Invalid RPC methods: ${formatIssues(parsed.error)}`);
    }
    const schemas = new Map<string, z.ZodTypeAny>();
    for (const definition of parsed.data) {
      if (schemas.has(definition.method)) {
        throw new TreeError(`Duplicate method '${definition.method}'`);
      }
      schemas.set(definition.method, paramsSchema(definition.params ?? []));
    }
    this.schemas = schemas;
  }

  /**
   * Validate an incoming request against the declared methods
   *
   * @throws RpcError when the request is malformed, the method is not
   * declared, or the params do not match its declaration
   */
  parseRequest(request: unknown): RpcRequest {
    const parsed = RpcRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new RpcError(
        `Invalid Request: ${formatIssues(parsed.error)}`,
        RpcErrorCode.INVALID_REQUEST,
        parsed.error.issues
      );
    }
    const { method, params } = parsed.data;
    const schema = this.schemas.get(method);
    if (!schema) {
      throw new RpcError(
        `Method not found: '${method}'`,
        RpcErrorCode.METHOD_NOT_FOUND,
        method
      );
    }
    const checked = schema.safeParse(params);
    if (!checked.success) {
      throw new RpcError(
        `Invalid params: ${formatIssues(checked.error)}`,
        RpcErrorCode.INVALID_PARAMS,
        checked.error.issues
      );
    }
    return parsed.data;
  }
}
