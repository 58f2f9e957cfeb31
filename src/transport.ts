/**
 * Moves messages to the other side of the channel. Delivery is assumed
 * reliable and ordered per direction.
 */
export interface Transport {
  send(message: string): Promise<void>;
}

/**
 * A transport that pushes inbound messages to a listener.
 */
export interface Subscriber {
  on(listener: (message: string) => Promise<void>): void;
}
