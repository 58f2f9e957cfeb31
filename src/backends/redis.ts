import {
  type RedisClientPoolType,
  type RedisFunctions,
  type RedisModules,
  type RedisScripts,
} from "redis";
import type { Transport } from "../transport.ts";

/**
 * A channel over two Redis lists: messages are pushed onto the outbox list and
 * popped from the inbox list. The other side uses the same lists swapped.
 */
export class RedisTransport implements Transport {
  public readonly client: RedisClientPoolType<
    RedisModules,
    RedisFunctions,
    RedisScripts,
    3
  >;
  public readonly inbox: string;
  public readonly outbox: string;

  public constructor(
    client: typeof this.client,
    inbox: string,
    outbox: string,
  ) {
    this.client = client;
    this.inbox = inbox;
    this.outbox = outbox;
  }

  public async connect(): Promise<void> {
    await this.client.connect();
  }

  public async send(message: string): Promise<void> {
    await this.client.rPush(`bridge/messages/${this.outbox}`, message);
  }

  public async pop(timeoutMs: number = 20_000): Promise<string | undefined> {
    const response = await this.client.blPop(
      `bridge/messages/${this.inbox}`,
      timeoutMs / 1000,
    );
    return response?.element;
  }

  public async close(): Promise<void> {
    await this.client.close();
  }
}
