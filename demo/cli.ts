#!/usr/bin/env node --unhandled-rejections=strict
import { createClientPool } from "redis";
import { z } from "zod";
import {
  Bridge,
  BridgeShutdownSymbol,
  configFromEnv,
  LOG_CONTEXT,
  ObjectReference,
  objectReference,
  OperationRegistry,
  value,
} from "../src/index.ts";
import { RedisTransport } from "../src/backends/redis.ts";

// The demo is the managed side only; a caller pushes BeginInvoke messages onto
// the inbox list and reads completions from the outbox list.
const config = configFromEnv();

function createRedis(): RedisTransport {
  const client = createClientPool({
    RESP: 3,
    ...(config.redisUrl && { url: config.redisUrl }),
  });
  return new RedisTransport(client, config.inboxTopic, config.outboxTopic);
}

class Counter {
  private count = 0;

  public increment(by: number): number {
    this.count += by;
    return this.count;
  }
}

const int = value("int", z.number().int());

const registry = new OperationRegistry()
  .registerStatic("Calculator", "Add", [int, int], (a: number, b: number) => {
    return a + b;
  })
  .registerStatic(
    "Calculator",
    "Delay",
    [value("milliseconds", z.number().int().nonnegative())],
    async (ms: number): Promise<number> => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return ms;
    },
  )
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

const redis = createRedis();
await redis.connect();

const bridge = new Bridge(redis, registry, config);

bridge.logger.info(LOG_CONTEXT.TRANSPORT, "Waiting for calls", {
  inbox: redis.inbox,
  outbox: redis.outbox,
});

let stopping = false;
process.once("SIGINT", () => {
  stopping = true;
});

await bridge.loop(async () => (stopping ? BridgeShutdownSymbol : redis.pop(1_000)));
await bridge.dispose();
await redis.close();
