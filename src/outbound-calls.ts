import type { z } from "zod";
import {
  type ArgumentCodec,
  OBJECT_REFERENCE_KEY,
  type RemoteReference,
} from "./argument-codec.ts";
import { BridgeError } from "./errors.ts";
import { LOG_CONTEXT, type LoggerAdapter } from "./logger.ts";
import {
  failure,
  type InvocationResult,
  success,
  toBridgeError,
} from "./result.ts";

type SlotWrite<T> =
  | { readonly type: "resolve"; readonly value: T }
  | { readonly type: "reject"; readonly reason: unknown };

/**
 * A single-assignment completion slot. The first write settles the promise;
 * every later write is refused.
 */
export class CompletionSlot<T> {
  public readonly promise: Promise<T>;

  private settle: ((write: SlotWrite<T>) => void) | undefined;

  public constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.settle = (write) => {
        if (write.type === "resolve") {
          resolve(write.value);
        } else {
          reject(write.reason);
        }
      };
    });
  }

  public get isSettled(): boolean {
    return this.settle === undefined;
  }

  public resolve(value: T): boolean {
    return this.write({ type: "resolve", value });
  }

  public reject(reason: unknown): boolean {
    return this.write({ type: "reject", reason });
  }

  private write(write: SlotWrite<T>): boolean {
    const settle = this.settle;
    if (!settle) {
      return false;
    }
    this.settle = undefined;
    settle(write);
    return true;
  }
}

interface PendingCall {
  readonly correlationId: string;
  readonly identifier: string;
  readonly slot: CompletionSlot<unknown>;
  readonly returns: z.ZodType<unknown, z.ZodTypeDef, unknown> | undefined;
  readonly timer: NodeJS.Timeout | undefined;
}

export interface OutboundCallOptions<T> {
  /** Validates the success value. Without it the value is passed through. */
  readonly returns?: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Overrides the default timeout; 0 waits forever. */
  readonly timeoutMs?: number;
  /**
   * Calls an instance operation on an object the other side returned instead
   * of a static operation.
   */
  readonly target?: RemoteReference;
}

export interface OutboundRequest {
  readonly correlationId: string;
  readonly identifier: string;
  /** Handle of the target object, null for static operations. */
  readonly targetHandle: number | null;
  readonly argsJson: string;
}

/** Issues the request of an outbound call. */
export type CallSender = (request: OutboundRequest) => Promise<void>;

/**
 * Calls issued by this side and awaiting their completion message.
 *
 * Correlation ids are the decimal strings of a per-table counter.
 */
export class OutboundCalls {
  private readonly codec: ArgumentCodec;
  private readonly sendCall: CallSender;
  private readonly logger: LoggerAdapter;
  private readonly timeoutMs: number;
  private readonly pending = new Map<string, PendingCall>();
  private lastId = 0;

  public constructor(
    codec: ArgumentCodec,
    sendCall: CallSender,
    logger: LoggerAdapter,
    timeoutMs: number,
  ) {
    this.codec = codec;
    this.sendCall = sendCall;
    this.logger = logger;
    this.timeoutMs = timeoutMs;
  }

  public get size(): number {
    return this.pending.size;
  }

  public invoke<T>(
    identifier: string,
    args: readonly unknown[],
    options: OutboundCallOptions<T> & {
      returns: z.ZodType<T, z.ZodTypeDef, unknown>;
    },
  ): Promise<T>;
  public invoke(
    identifier: string,
    args: readonly unknown[],
    options?: OutboundCallOptions<unknown>,
  ): Promise<unknown>;
  public async invoke(
    identifier: string,
    args: readonly unknown[],
    options: OutboundCallOptions<unknown> = {},
  ): Promise<unknown> {
    const argsJson = this.codec.encodeArguments(args);
    const correlationId = String(++this.lastId);
    const slot = new CompletionSlot<unknown>();
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => this.expire(correlationId), timeoutMs).unref()
        : undefined;

    this.pending.set(correlationId, {
      correlationId,
      identifier,
      slot,
      returns: options.returns,
      timer,
    });

    const sent = this.sendCall({
      correlationId,
      identifier,
      targetHandle: options.target?.[OBJECT_REFERENCE_KEY] ?? null,
      argsJson,
    }).catch(
      (err: unknown) => {
        this.settle(correlationId);
        throw err;
      },
    );
    const [, value] = await Promise.all([sent, slot.promise]);
    return value;
  }

  /**
   * Routes a completion message to the call it answers. The matching call is
   * removed from the table before its slot is written, so a repeated
   * completion finds nothing and is reported as `UnknownCorrelationId`.
   */
  public complete(completionJson: string): InvocationResult<void> {
    const decoded = this.codec.decodeCompletion(completionJson);
    if (decoded.type === "failure") {
      this.logger.error(
        LOG_CONTEXT.OUTBOUND,
        "Discarding malformed completion",
        decoded,
      );
      return decoded;
    }
    const { correlationId, result } = decoded.value;

    const call = this.settle(correlationId);
    if (!call) {
      const missing = failure(
        "UnknownCorrelationId",
        `There is no pending call with id '${correlationId}'.`,
      );
      this.logger.warn(LOG_CONTEXT.OUTBOUND, missing.message, {
        correlationId,
      });
      return missing;
    }

    switch (result.type) {
      case "success": {
        if (!call.returns) {
          call.slot.resolve(result.value);
          break;
        }
        const parsed = call.returns.safeParse(result.value);
        if (parsed.success) {
          call.slot.resolve(parsed.data);
        } else {
          call.slot.reject(
            new BridgeError(
              "MalformedPayload",
              `The result of '${call.identifier}' does not have the expected shape`,
              parsed.error,
            ),
          );
        }
        break;
      }
      case "failure": {
        call.slot.reject(toBridgeError(result));
        break;
      }
      default: {
        const _: never = result; // exhaustiveness check
      }
    }
    return success(undefined);
  }

  /**
   * Rejects every pending call, e.g. when the channel is torn down.
   */
  public rejectAll(reason: BridgeError): void {
    for (const correlationId of [...this.pending.keys()]) {
      this.settle(correlationId)?.slot.reject(reason);
    }
  }

  private expire(correlationId: string): void {
    const call = this.settle(correlationId);
    if (!call) {
      return;
    }
    this.logger.warn(
      LOG_CONTEXT.OUTBOUND,
      `Call '${correlationId}' to '${call.identifier}' timed out`,
    );
    call.slot.reject(
      new BridgeError(
        "Timeout",
        `The call to '${call.identifier}' did not complete in time.`,
      ),
    );
  }

  private settle(correlationId: string): PendingCall | undefined {
    const call = this.pending.get(correlationId);
    if (!call) {
      return undefined;
    }
    this.pending.delete(correlationId);
    clearTimeout(call.timer);
    return call;
  }
}
