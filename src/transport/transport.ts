/**
 * MessageTransport Interface
 *
 * Publish/subscribe channel carrying serialized state messages between
 * streaming and listening instances. Delivery is at-least-once and may be
 * out of order; the listener and the aggregator cope with both.
 */

export interface IncomingMessage {
  data: Buffer;
  /** Epoch ms the transport saw the message arrive */
  receivedAt: number;
}

export type MessageHandler = (message: IncomingMessage) => void;

export interface MessageTransport {
  /** Human-readable name, e.g. "mqtt", "loopback" */
  readonly name: string;

  /** Publish one serialized message; resolves once the transport accepted it */
  publish(payload: string): Promise<void>;

  /** Start delivering messages on the channel to the handler */
  subscribe(handler: MessageHandler): Promise<void>;

  /** Stop delivery and release the connection. Safe to call twice. */
  close(): Promise<void>;
}
