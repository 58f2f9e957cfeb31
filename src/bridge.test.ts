import { afterEach, beforeEach, suite, test } from "node:test";
import {
  deepStrictEqual,
  ok,
  rejects,
  strictEqual,
  throws,
} from "node:assert/strict";
import { setTimeout } from "node:timers/promises";
import { z } from "zod";
import { objectReferenceLiteral } from "./argument-codec.ts";
import { InMemoryTransport } from "./backends/in-memory.ts";
import { Bridge } from "./bridge.ts";
import { createLogger, type LogLevel } from "./logger.ts";
import { ObjectReference } from "./object-handle-table.ts";
import { OperationRegistry } from "./operation-registry.ts";
import { objectReference, value } from "./parameter-types.ts";
import {
  encodeBeginInvoke,
  encodeEndInvoke,
  invocationInfo,
} from "./protocol.ts";
import { BridgeShutdownSymbol } from "./symbol.ts";

class Greeter {
  public constructor(private readonly greeting: string) {}

  public say(name: string): string {
    return `${this.greeting}, ${name}`;
  }
}

class Counter {
  private count = 0;

  public increment(by: number): number {
    this.count += by;
    return this.count;
  }
}

const int = value("int", z.number().int());
const text = value("string", z.string());

// Operations offered by the "managed" end.
const managed = new OperationRegistry()
  .registerStatic("Calculator", "Add", [int, int], (a: number, b: number) => a + b)
  .registerStatic("Calculator", "Delay", [int], async (ms: number) => {
    await setTimeout(ms);
    return ms;
  })
  .registerStatic("Calculator", "CreateCounter", [], () =>
    ObjectReference.create(new Counter()),
  )
  .registerStatic(
    "Calculator",
    "Read",
    [objectReference(Counter)],
    (counter: ObjectReference<Counter>) => counter.value.increment(0),
  )
  .registerInstance(Counter, "Increment", [int], (counter: Counter, by: number) =>
    counter.increment(by),
  );

// Operations offered by the "host" end.
const host = new OperationRegistry()
  .registerStatic("Host", "Greet", [text], (name: string) => `Hello, ${name}`)
  .registerStatic("Host", "CreateGreeter", [text], (greeting: string) =>
    ObjectReference.create(new Greeter(greeting)),
  )
  .registerInstance(Greeter, "Say", [text], (greeter: Greeter, name: string) =>
    greeter.say(name),
  );

const completionMessage = z.tuple([z.literal("EndInvoke"), z.string()]);

await suite(import.meta.filename, async () => {
  let entries: { level: LogLevel; context: string; message: string }[];
  let managedBridge: Bridge;
  let hostBridge: Bridge;

  const logger = createLogger({
    minLevel: "debug",
    log: (level, context, message) => entries.push({ level, context, message }),
  });

  beforeEach(() => {
    entries = [];
    const [managedTransport, hostTransport] = InMemoryTransport.pair();
    managedBridge = new Bridge(managedTransport, managed, {
      logger,
      remoteModule: "Host",
    });
    hostBridge = new Bridge(hostTransport, host, {
      logger,
      remoteModule: "Calculator",
    });
    managedBridge.subscribe(managedTransport);
    hostBridge.subscribe(hostTransport);
  });

  afterEach(async () => {
    await managedBridge.dispose();
    await hostBridge.dispose();
  });

  await test("calls in both directions", async () => {
    strictEqual(await hostBridge.call("Add", [2, 3]), 5);
    strictEqual(
      await managedBridge.call("Greet", ["world"], { returns: z.string() }),
      "Hello, world",
    );
  });

  await test("asynchronous operations", async () => {
    deepStrictEqual(
      await Promise.all([
        hostBridge.call("Delay", [5]),
        hostBridge.call("Delay", [1]),
      ]),
      [5, 1],
    );
  });

  await test("failures reach the caller", async () => {
    await rejects(hostBridge.call("Add", [1]), {
      name: "BridgeError",
      kind: "ArityMismatch",
      message: "The call to 'Add' expects '2' parameters, but received '1'.",
    });
    await rejects(hostBridge.call("Subtract", [1, 2]), {
      kind: "MethodNotFound",
      message:
        "The module 'Calculator' does not contain a public invokable operation named 'Subtract'.",
    });
  });

  await test("object references held by the managed end", async () => {
    const counter = await hostBridge.call("CreateCounter", [], {
      returns: objectReferenceLiteral,
    });
    deepStrictEqual(counter, { __dotNetObject: 1 });
    strictEqual(managedBridge.handles.size, 1);

    strictEqual(await hostBridge.call("Increment", [4], { target: counter }), 4);
    strictEqual(await hostBridge.call("Read", [counter]), 4);

    await hostBridge.disposeRemote(counter);
    strictEqual(managedBridge.handles.size, 0);
    const disposed = {
      kind: "UnknownObjectReference",
      message:
        "There is no tracked object with id '1'. Perhaps the object reference was disposed?",
    };
    await rejects(hostBridge.call("Read", [counter]), disposed);
    await rejects(
      hostBridge.call("Increment", [1], { target: counter }),
      disposed,
    );
    await rejects(hostBridge.disposeRemote(counter), disposed);
  });

  await test("object references held by the host end", async () => {
    const greeter = await managedBridge.call("CreateGreeter", ["Hi"], {
      returns: objectReferenceLiteral,
    });
    deepStrictEqual(greeter, { __dotNetObject: 1 });
    strictEqual(hostBridge.handles.size, 1);

    strictEqual(
      await managedBridge.call("Say", ["world"], { target: greeter }),
      "Hi, world",
    );

    await managedBridge.disposeRemote(greeter);
    strictEqual(hostBridge.handles.size, 0);
    await rejects(managedBridge.call("Say", ["again"], { target: greeter }), {
      kind: "UnknownObjectReference",
    });
  });

  await test("synchronous dispose of a tracked object", async () => {
    const counter = await hostBridge.call("CreateCounter", [], {
      returns: objectReferenceLiteral,
    });
    const increment = invocationInfo({
      operationIdentifier: "Increment",
      targetHandle: counter.__dotNetObject,
    });
    strictEqual(managedBridge.invoke(increment, "[4]"), "4");
    strictEqual(
      managedBridge.invoke(
        invocationInfo({
          operationIdentifier: "__Dispose",
          targetHandle: counter.__dotNetObject,
        }),
        "",
      ),
      undefined,
    );
    strictEqual(managedBridge.handles.size, 0);
    throws(() => managedBridge.invoke(increment, "[1]"), {
      kind: "UnknownObjectReference",
    });
  });

  await test("invalid call requests are answered", async () => {
    const transport = new InMemoryTransport();
    const bridge = new Bridge(transport, managed, { logger });
    await bridge.receive(
      '["BeginInvoke",{"operationIdentifier":"Increment","targetHandle":-1,"correlationId":"5"},"[]"]',
    );
    await bridge.receive(
      '["BeginInvoke",{"operationIdentifier":"","correlationId":"6"},"[]"]',
    );
    await bridge.dispatcher.flush();
    strictEqual(transport.sent.length, 2);
    strictEqual(
      transport.sent[0],
      encodeEndInvoke(
        `["5",false,{"kind":"UnknownObjectReference","message":"There is no tracked object with id '-1'. Perhaps the object reference was disposed?"}]`,
      ),
    );

    const [, completion] = completionMessage.parse(
      JSON.parse(transport.sent[1] ?? ""),
    );
    const decoded = bridge.codec.decodeCompletion(completion);
    ok(
      decoded.type === "success" &&
        decoded.value.correlationId === "6" &&
        decoded.value.result.type === "failure" &&
        decoded.value.result.kind === "MalformedPayload",
    );
    deepStrictEqual(
      entries.map(({ level, context }) => [level, context]),
      [
        ["error", "protocol"],
        ["error", "protocol"],
      ],
    );
    await bridge.dispose();
  });

  await test("synchronous invoke", async () => {
    const add = invocationInfo({
      operationIdentifier: "Add",
      callerContextId: "Calculator",
    });
    strictEqual(managedBridge.invoke(add, "[2, 3]"), "5");
    throws(() => managedBridge.invoke(add, "[2]"), {
      name: "BridgeError",
      kind: "ArityMismatch",
    });
    throws(
      () =>
        managedBridge.invoke(
          invocationInfo({
            operationIdentifier: "Delay",
            callerContextId: "Calculator",
          }),
          "[1]",
        ),
      { kind: "InvalidInvocation" },
    );
  });

  await test("malformed messages are logged", async () => {
    await managedBridge.receive("not json");
    await managedBridge.receive('["Ping"]');
    deepStrictEqual(
      entries.map(({ level, context }) => [level, context]),
      [
        ["error", "protocol"],
        ["error", "protocol"],
      ],
    );
    strictEqual(entries[0]?.message, "Invalid JSON message");
  });

  await test("loop", async () => {
    const transport = new InMemoryTransport();
    const bridge = new Bridge(transport, managed, { logger });
    const messages: (string | typeof BridgeShutdownSymbol | undefined)[] = [
      encodeBeginInvoke(
        invocationInfo({
          operationIdentifier: "Add",
          callerContextId: "Calculator",
          correlationId: "9",
        }),
        "[2, 3]",
      ),
      undefined,
      "",
      encodeBeginInvoke(
        invocationInfo({
          operationIdentifier: "Add",
          callerContextId: "Calculator",
        }),
        "[1, 1]",
      ),
      BridgeShutdownSymbol,
      encodeBeginInvoke(
        invocationInfo({
          operationIdentifier: "Add",
          callerContextId: "Calculator",
          correlationId: "10",
        }),
        "[4, 4]",
      ),
    ];
    await bridge.loop(async () => messages.shift());
    await bridge.dispose();
    deepStrictEqual(transport.sent, [encodeEndInvoke('["9",true,5]')]);
    strictEqual(messages.length, 1);
    deepStrictEqual(
      entries.filter(({ level }) => level === "error"),
      [{ level: "error", context: "protocol", message: "Invalid JSON message" }],
    );
  });

  await test("dispose", async () => {
    const transport = new InMemoryTransport();
    const bridge = new Bridge(transport, new OperationRegistry(), { logger });
    const pending = rejects(bridge.call("Anything", []), {
      kind: "ChannelClosed",
      message: "The channel was closed.",
    });
    await bridge.dispose();
    await pending;
    await rejects(bridge.call("Anything", []), { kind: "ChannelClosed" });
    throws(
      () =>
        bridge.invoke(invocationInfo({ operationIdentifier: "Anything" }), ""),
      { kind: "ChannelClosed" },
    );
    await bridge.receive(encodeEndInvoke('["1",true,null]'));
    deepStrictEqual(entries.at(-1), {
      level: "warn",
      context: "protocol",
      message: "Message received after close",
    });
  });

  await test("dispose while calls are still running", async () => {
    const transport = new InMemoryTransport();
    const operations = new OperationRegistry()
      .registerStatic("Relay", "Forward", [text], (name: string) =>
        bridge.call("Greet", [name]),
      )
      .registerStatic("Relay", "Forever", [], () => new Promise<never>(() => {}));
    const bridge: Bridge = new Bridge(transport, operations, {
      logger,
      remoteModule: "Host",
      outboundTimeoutMs: 0,
    });
    const relay = (operationIdentifier: string, correlationId: string) =>
      invocationInfo({
        operationIdentifier,
        callerContextId: "Relay",
        correlationId,
      });

    await bridge.receive(encodeBeginInvoke(relay("Forward", "1"), '["world"]'));
    await bridge.receive(encodeBeginInvoke(relay("Forever", "2"), "[]"));
    strictEqual(bridge.outbound.size, 1);
    strictEqual(bridge.dispatcher.pending, 2);

    await bridge.dispose();
    strictEqual(bridge.outbound.size, 0);
    await setTimeout(5);
    deepStrictEqual(transport.sent, [
      encodeBeginInvoke(
        invocationInfo({
          operationIdentifier: "Greet",
          callerContextId: "Host",
          correlationId: "1",
        }),
        '["world"]',
      ),
    ]);
    deepStrictEqual(
      entries
        .filter(({ context }) => context === "dispatch")
        .map(({ message }) => message),
      ["Dropping the completion of call '1': the channel is closed"],
    );
  });
});
