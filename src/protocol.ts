import { z } from "zod";
import { unknownObjectReference } from "./object-handle-table.ts";
import {
  type Failure,
  failure,
  type InvocationResult,
  success,
} from "./result.ts";

const nullable = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? null);

export const invocationInfoSchema = z.object({
  operationIdentifier: z.string().min(1),
  callerContextId: nullable(z.string()),
  targetHandle: nullable(z.number().int().positive()),
  correlationId: nullable(z.string()),
});

/**
 * Addresses one inbound call. `callerContextId` names the declaring module of
 * a static operation; `targetHandle` the instance of an instance operation.
 * `correlationId` is null when the caller wants no completion.
 */
export type InvocationInfo = z.output<typeof invocationInfoSchema>;

export function invocationInfo(
  info: Pick<InvocationInfo, "operationIdentifier"> & Partial<InvocationInfo>,
): InvocationInfo {
  return {
    operationIdentifier: info.operationIdentifier,
    callerContextId: info.callerContextId ?? null,
    targetHandle: info.targetHandle ?? null,
    correlationId: info.correlationId ?? null,
  };
}

export const BeginInvokeTag = "BeginInvoke";
export const EndInvokeTag = "EndInvoke";

const beginInvokeSchema = z
  .tuple([z.literal(BeginInvokeTag), invocationInfoSchema, z.string()])
  .transform(([type, info, argsJson]) => ({ type, info, argsJson }));

const endInvokeSchema = z
  .tuple([z.literal(EndInvokeTag), z.string()])
  .transform(([type, completionJson]) => ({ type, completionJson }));

const messageSchema = z.union([beginInvokeSchema, endInvokeSchema]);

// Enough of a call request to answer it when the rest does not validate.
const answerableSchema = z
  .tuple([
    z.literal(BeginInvokeTag),
    z.object({ correlationId: z.string(), targetHandle: z.unknown() }),
  ])
  .rest(z.unknown());

/**
 * A call request that did not validate but names the correlation id its
 * caller is waiting on.
 */
export interface RejectedInvocation {
  readonly type: "RejectedInvoke";
  readonly correlationId: string;
  readonly failure: Failure;
}

/**
 * Every message on the channel is a tagged tuple:
 *
 * - `["BeginInvoke", info, argsJson]` asks the receiver to run an operation.
 * - `["EndInvoke", completionJson]` completes a call the receiver issued.
 */
export type BridgeMessage = z.output<typeof messageSchema> | RejectedInvocation;

export function encodeBeginInvoke(
  info: InvocationInfo,
  argsJson: string,
): string {
  return JSON.stringify([BeginInvokeTag, info, argsJson]);
}

export function encodeEndInvoke(completionJson: string): string {
  return JSON.stringify([EndInvokeTag, completionJson]);
}

export function decodeMessage(raw: string): InvocationResult<BridgeMessage> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return failure("MalformedPayload", "Invalid JSON message", err);
  }
  const message = messageSchema.safeParse(parsed);
  if (message.success) {
    return success(message.data);
  }
  const malformed = failure(
    "MalformedPayload",
    `Unrecognized message: ${message.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ")}`,
    message.error,
  );

  const answerable = answerableSchema.safeParse(parsed);
  if (!answerable.success) {
    return malformed;
  }
  const [, { correlationId, targetHandle }] = answerable.data;
  const rejected: RejectedInvocation = {
    type: "RejectedInvoke",
    correlationId,
    // A handle that could never have been issued cannot refer to an object.
    failure:
      typeof targetHandle === "number" &&
      !invocationInfoSchema.shape.targetHandle.safeParse(targetHandle).success
        ? unknownObjectReference(targetHandle)
        : malformed,
  };
  return success(rejected);
}
