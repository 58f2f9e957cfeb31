import {
  ArgumentCodec,
  type Json,
  type RemoteReference,
} from "./argument-codec.ts";
import { type BridgeConfig, parseConfig } from "./config.ts";
import { Dispatcher } from "./dispatcher.ts";
import { BridgeError } from "./errors.ts";
import { createLogger, LOG_CONTEXT, type LoggerAdapter } from "./logger.ts";
import { ObjectHandleTable } from "./object-handle-table.ts";
import {
  DISPOSE_OPERATION,
  type OperationLookup,
} from "./operation-registry.ts";
import { CachingOperationResolver } from "./operation-resolver.ts";
import {
  OutboundCalls,
  type OutboundCallOptions,
} from "./outbound-calls.ts";
import {
  decodeMessage,
  encodeBeginInvoke,
  encodeEndInvoke,
  type InvocationInfo,
} from "./protocol.ts";
import { toBridgeError } from "./result.ts";
import { BridgeShutdownSymbol } from "./symbol.ts";
import type { Subscriber, Transport } from "./transport.ts";

export interface BridgeOptions
  extends Partial<Pick<BridgeConfig, "outboundTimeoutMs" | "logLevel">> {
  readonly logger?: LoggerAdapter;
  readonly json?: Json;
  /**
   * Module the other side declares its static operations on. Outbound static
   * calls are addressed to it.
   */
  readonly remoteModule?: string | null;
}

/**
 * One end of a call channel.
 *
 * Owns everything scoped to the channel: the handle table, the resolver cache,
 * the inbound dispatcher and the table of outbound calls in flight.
 */
export class Bridge {
  public readonly handles = new ObjectHandleTable();
  public readonly codec: ArgumentCodec;
  public readonly dispatcher: Dispatcher;
  public readonly outbound: OutboundCalls;
  public readonly logger: LoggerAdapter;

  private readonly transport: Transport;
  private readonly remoteModule: string | null;
  private closed = false;

  public constructor(
    transport: Transport,
    operations: OperationLookup,
    options: BridgeOptions = {},
  ) {
    const config = parseConfig({
      outboundTimeoutMs: options.outboundTimeoutMs,
      logLevel: options.logLevel,
    });
    this.transport = transport;
    this.remoteModule = options.remoteModule ?? null;
    this.logger = options.logger ?? createLogger({ minLevel: config.logLevel });
    this.codec = new ArgumentCodec(this.handles, options.json);
    this.dispatcher = new Dispatcher(
      {
        handles: this.handles,
        resolver: new CachingOperationResolver(operations),
        codec: this.codec,
        logger: this.logger,
      },
      (completionJson) => this.transport.send(encodeEndInvoke(completionJson)),
    );
    this.outbound = new OutboundCalls(
      this.codec,
      ({ correlationId, identifier, targetHandle, argsJson }) =>
        this.transport.send(
          encodeBeginInvoke(
            {
              operationIdentifier: identifier,
              callerContextId: targetHandle === null ? this.remoteModule : null,
              targetHandle,
              correlationId,
            },
            argsJson,
          ),
        ),
      this.logger,
      config.outboundTimeoutMs,
    );
  }

  /**
   * Handles one raw channel message. Never throws: malformed messages and
   * failed calls are reported through the logger or the channel.
   */
  public async receive(message: string): Promise<void> {
    if (this.closed) {
      this.logger.warn(LOG_CONTEXT.PROTOCOL, "Message received after close");
      return;
    }
    const decoded = decodeMessage(message);
    if (decoded.type === "failure") {
      this.logger.error(LOG_CONTEXT.PROTOCOL, decoded.message, { message });
      return;
    }
    const received = decoded.value;
    switch (received.type) {
      case "BeginInvoke": {
        this.dispatcher.beginInvoke(received.info, received.argsJson);
        break;
      }
      case "EndInvoke": {
        this.outbound.complete(received.completionJson);
        break;
      }
      case "RejectedInvoke": {
        this.logger.error(LOG_CONTEXT.PROTOCOL, received.failure.message, {
          message,
        });
        this.dispatcher.reject(received.correlationId, received.failure);
        break;
      }
      default: {
        const _: never = received; // exhaustiveness check
      }
    }
  }

  /**
   * Runs an inbound call synchronously. Returns the encoded result, or
   * `undefined` when the operation returns nothing.
   *
   * @throws {BridgeError} when the call fails
   */
  public invoke(info: InvocationInfo, argsJson: string): string | undefined {
    this.assertOpen();
    const result = this.dispatcher.invoke(info, argsJson);
    if (result.type === "failure") {
      throw toBridgeError(result);
    }
    const encoded = this.codec.encodeValue(result.value);
    if (encoded.type === "failure") {
      throw toBridgeError(encoded);
    }
    return encoded.value;
  }

  /**
   * Calls an operation on the other side: a static operation of
   * `remoteModule`, or an instance operation when `options.target` is given.
   */
  public call<T>(
    identifier: string,
    args: readonly unknown[],
    options: OutboundCallOptions<T> & Required<Pick<OutboundCallOptions<T>, "returns">>,
  ): Promise<T>;
  public call(
    identifier: string,
    args: readonly unknown[],
    options?: OutboundCallOptions<unknown>,
  ): Promise<unknown>;
  public async call(
    identifier: string,
    args: readonly unknown[],
    options?: OutboundCallOptions<unknown>,
  ): Promise<unknown> {
    this.assertOpen();
    return this.outbound.invoke(identifier, args, options);
  }

  /**
   * Releases an object the other side returned. Its handle is unusable
   * afterwards.
   */
  public async disposeRemote(reference: RemoteReference): Promise<void> {
    await this.call(DISPOSE_OPERATION, [], { target: reference });
  }

  /**
   * Feeds every message pushed by `transport` into {@link receive}.
   */
  public subscribe(transport: Subscriber): void {
    transport.on((message) => this.receive(message));
  }

  /**
   * Pulls messages until `getMessage` yields {@link BridgeShutdownSymbol}.
   * `undefined` means nothing arrived in time and polling continues.
   */
  public async loop(
    getMessage: () => Promise<string | typeof BridgeShutdownSymbol | undefined>,
  ): Promise<void> {
    while (!this.closed) {
      const message = await getMessage();
      if (message === undefined) {
        continue;
      }
      if (message === BridgeShutdownSymbol) {
        break;
      }
      await this.receive(message);
    }
  }

  /**
   * Tears the channel down: rejects pending outbound calls, waits for
   * completions already being sent and forgets every object handle. Targets
   * still running are not waited for; their completions are dropped.
   */
  public async dispose(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.dispatcher.close();
    this.outbound.rejectAll(
      new BridgeError("ChannelClosed", "The channel was closed."),
    );
    await this.dispatcher.flush();
    this.handles.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BridgeError("ChannelClosed", "The channel was closed.");
    }
  }
}
