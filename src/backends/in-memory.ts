import type { Subscriber, Transport } from "../transport.ts";

/**
 * One end of an in-process channel. Messages sent on one end are delivered
 * to the listeners of its peer; every sent message is also kept in `sent`.
 */
export class InMemoryTransport implements Transport, Subscriber {
  public readonly sent: string[] = [];

  private peer: InMemoryTransport | undefined;
  private readonly listeners: ((message: string) => Promise<void>)[] = [];

  public static pair(): [InMemoryTransport, InMemoryTransport] {
    const left = new InMemoryTransport();
    const right = new InMemoryTransport();
    left.peer = right;
    right.peer = left;
    return [left, right];
  }

  public async send(message: string): Promise<void> {
    this.sent.push(message);
    await this.peer?.deliver(message);
  }

  public on(listener: (message: string) => Promise<void>): void {
    this.listeners.push(listener);
  }

  private async deliver(message: string): Promise<void> {
    await Promise.all(this.listeners.map((listener) => listener(message)));
  }
}
