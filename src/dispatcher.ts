import type { ArgumentCodec } from "./argument-codec.ts";
import { LOG_CONTEXT, type LoggerAdapter } from "./logger.ts";
import type {
  ObjectHandleTable,
  ObjectReference,
} from "./object-handle-table.ts";
import { DISPOSE_OPERATION } from "./operation-registry.ts";
import {
  checkAddressing,
  type OperationResolver,
} from "./operation-resolver.ts";
import type { InvocationInfo } from "./protocol.ts";
import {
  type Failure,
  failure,
  invocationFailure,
  type InvocationResult,
  success,
} from "./result.ts";

export interface DispatcherContext {
  readonly handles: ObjectHandleTable;
  readonly resolver: OperationResolver;
  readonly codec: ArgumentCodec;
  readonly logger: LoggerAdapter;
}

/**
 * Delivers an encoded completion (`[correlationId, success, value]`) to the
 * caller side.
 */
export type CompletionNotifier = (completionJson: string) => Promise<void>;

function hold(held: Set<Promise<void>>, work: Promise<void>): void {
  const tracked: Promise<void> = work.then(() => {
    held.delete(tracked);
  });
  held.add(tracked);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Runs inbound calls against the operations of one channel.
 */
export class Dispatcher {
  private readonly context: DispatcherContext;
  private readonly notify: CompletionNotifier;
  /** Completions being handed to the notifier. */
  private readonly inflight = new Set<Promise<void>>();
  /** Asynchronous targets that have not settled yet. */
  private readonly running = new Set<Promise<void>>();
  private closed = false;

  public constructor(context: DispatcherContext, notify: CompletionNotifier) {
    this.context = context;
    this.notify = notify;
  }

  /**
   * Runs a call whose caller waits for the outcome. A target that returns a
   * promise cannot be awaited here and is rejected as an invalid invocation.
   */
  public invoke(info: InvocationInfo, argsJson: string): InvocationResult {
    const outcome = this.execute(info, argsJson);
    if (outcome.type === "success" && isPromiseLike(outcome.value)) {
      this.observe(info, outcome.value);
      return failure(
        "InvalidInvocation",
        `The operation '${info.operationIdentifier}' completes asynchronously; use beginInvoke to call it.`,
      );
    }
    return outcome;
  }

  /**
   * Starts a call and reports its outcome through the notifier once it
   * settles. Returns as soon as the call is started.
   *
   * Without a correlation id the caller declined notification: nothing is
   * sent, failures are only logged.
   */
  public beginInvoke(info: InvocationInfo, argsJson: string): void {
    const outcome = this.execute(info, argsJson);
    const { correlationId } = info;

    if (correlationId === null) {
      if (outcome.type === "failure") {
        this.context.logger.debug(
          LOG_CONTEXT.DISPATCH,
          `Call to '${info.operationIdentifier}' failed without a correlation id`,
          outcome,
        );
      } else if (isPromiseLike(outcome.value)) {
        this.observe(info, outcome.value);
      }
      return;
    }

    if (outcome.type === "success" && isPromiseLike(outcome.value)) {
      const settled = Promise.resolve(outcome.value).then(
        (value): InvocationResult => success(value),
        (err: unknown): InvocationResult => invocationFailure(err),
      );
      hold(
        this.running,
        settled.then((result) => {
          hold(this.inflight, this.complete(correlationId, result));
        }),
      );
      return;
    }
    hold(this.inflight, this.complete(correlationId, outcome));
  }

  /**
   * Completes a call that failed before it could be dispatched, such as a
   * request whose addressing did not validate.
   */
  public reject(correlationId: string, reason: Failure): void {
    hold(this.inflight, this.complete(correlationId, reason));
  }

  /** Number of asynchronous targets that have not settled. */
  public get pending(): number {
    return this.running.size;
  }

  /**
   * Resolves once every call started so far has settled and its completion
   * has been handed to the notifier. Never resolves while a target is stuck.
   */
  public async drain(): Promise<void> {
    while (this.running.size || this.inflight.size) {
      await Promise.all([...this.running, ...this.inflight]);
    }
  }

  /**
   * Resolves once every completion already produced has been handed to the
   * notifier. Targets still running are not waited for.
   */
  public async flush(): Promise<void> {
    while (this.inflight.size) {
      await Promise.all(this.inflight);
    }
  }

  /**
   * Stops sending completions. Targets that settle afterwards are only
   * logged.
   */
  public close(): void {
    this.closed = true;
  }

  private execute(info: InvocationInfo, argsJson: string): InvocationResult {
    const { handles, resolver, codec } = this.context;

    let target: ObjectReference | undefined;
    if (info.targetHandle !== null) {
      const resolved = handles.resolve(info.targetHandle);
      if (resolved.type === "failure") {
        return resolved;
      }
      target = resolved.value;
    }

    const addressing = checkAddressing(info, target);
    if (addressing.type === "failure") {
      return addressing;
    }

    if (
      info.targetHandle !== null &&
      info.operationIdentifier === DISPOSE_OPERATION
    ) {
      const disposed = handles.dispose(info.targetHandle);
      if (disposed.type === "success") {
        this.context.logger.debug(
          LOG_CONTEXT.HANDLES,
          `Disposed object '${info.targetHandle}'`,
        );
      }
      return disposed;
    }

    const operation = resolver.resolve(info, target);
    if (operation.type === "failure") {
      return operation;
    }
    const args = codec.decodeArguments(
      info.operationIdentifier,
      argsJson,
      operation.value.parameterTypes,
    );
    if (args.type === "failure") {
      return args;
    }

    try {
      return success(operation.value.invoke(target?.value, args.value));
    } catch (err) {
      return invocationFailure(err);
    }
  }

  private async complete(
    correlationId: string,
    result: InvocationResult,
  ): Promise<void> {
    const { codec, logger } = this.context;
    if (this.closed) {
      logger.debug(
        LOG_CONTEXT.DISPATCH,
        `Dropping the completion of call '${correlationId}': the channel is closed`,
        result,
      );
      return;
    }
    const encoded = codec.encodeCompletion(correlationId, result);
    if (encoded.type === "failure") {
      logger.error(
        LOG_CONTEXT.DISPATCH,
        `Could not encode the completion of call '${correlationId}'`,
        encoded,
      );
      return;
    }
    try {
      await this.notify(encoded.value);
    } catch (err) {
      logger.error(
        LOG_CONTEXT.TRANSPORT,
        `Could not send the completion of call '${correlationId}'`,
        err,
      );
    }
  }

  private observe(info: InvocationInfo, pending: PromiseLike<unknown>): void {
    hold(
      this.running,
      Promise.resolve(pending).then(
        () => undefined,
        (err: unknown) => {
          this.context.logger.debug(
            LOG_CONTEXT.DISPATCH,
            `Unobserved call to '${info.operationIdentifier}' failed`,
            invocationFailure(err),
          );
        },
      ),
    );
  }
}
