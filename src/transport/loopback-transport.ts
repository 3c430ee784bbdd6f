/**
 * LoopbackTransport: in-process message bus
 *
 * Publishes straight to every subscriber in the same process. Backs the
 * single-machine "local" mode, where one process both polls the hardware
 * and drives the light, and stands in for the broker in tests.
 *
 * Delivery is deferred to a later tick, like a real broker would deliver
 * it, so publish() never re-enters the subscriber synchronously.
 */

import { EventEmitter } from 'events';
import { MessageHandler, MessageTransport } from './transport';

export class LoopbackTransport extends EventEmitter implements MessageTransport {
  readonly name = 'loopback';

  private handlers: MessageHandler[] = [];
  private closed = false;
  private published = 0;

  async publish(payload: string): Promise<void> {
    if (this.closed) {
      throw new Error('[Loopback] Transport is closed');
    }
    this.published++;
    const data = Buffer.from(payload, 'utf-8');
    setImmediate(() => this.deliver(data));
  }

  async subscribe(handler: MessageHandler): Promise<void> {
    this.handlers.push(handler);
  }

  /** Deliver raw bytes to subscribers as if they came off the wire */
  inject(data: Buffer | string): void {
    this.deliver(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data);
  }

  /** Number of messages published since creation */
  get publishedCount(): number {
    return this.published;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers = [];
  }

  private deliver(data: Buffer): void {
    if (this.closed) return;
    const receivedAt = Date.now();
    for (const handler of this.handlers) {
      handler({ data, receivedAt });
    }
    this.emit('delivered', data);
  }
}
