/**
 * State Listener
 *
 * Ingestion boundary between the transport and the display:
 *   - decodes and validates each message (invalid -> logged, dropped)
 *   - drops messages whose sentAt is older than the staleness window
 *   - hands the rest to OnAirDisplay, which serializes them
 *
 * A bad message never takes the listener down.
 */

import { Logger } from 'pino';
import { OnAirDisplay } from './display/on-air-display';
import { InvalidPayloadError } from './errors';
import { getLogger } from './logger';
import { decodeStateMessage, toSourceState } from './state/message';
import { IncomingMessage, MessageTransport } from './transport/transport';

export const DEFAULT_STALE_AFTER_MS = 60_000;

export type MessageOutcome = 'applied' | 'unchanged' | 'stale' | 'invalid';

export interface StateListenerOptions {
  display: OnAirDisplay;
  staleAfterMs?: number;
}

export class StateListener {
  private display: OnAirDisplay;
  private staleAfterMs: number;
  private transport: MessageTransport | null = null;
  private counts: Record<MessageOutcome, number> = { applied: 0, unchanged: 0, stale: 0, invalid: 0 };
  private log: Logger = getLogger('Listener');

  constructor(options: StateListenerOptions) {
    this.display = options.display;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
  }

  /** Subscribe to the transport and start feeding the display */
  async listen(transport: MessageTransport): Promise<void> {
    this.transport = transport;
    await transport.subscribe((message) => {
      this.handleMessage(message).catch((err: unknown) => {
        this.log.error({ err }, 'Failed to apply message');
      });
    });
    this.log.info({ transport: transport.name }, 'Listening for published updates');
  }

  /** Process one transport message; resolves once the display has applied it */
  async handleMessage(message: IncomingMessage): Promise<MessageOutcome> {
    const outcome = await this.process(message);
    this.counts[outcome]++;
    return outcome;
  }

  /** Per-outcome message counts since start */
  get stats(): Readonly<Record<MessageOutcome, number>> {
    return { ...this.counts };
  }

  /** Stop listening and turn the light off. Safe to call twice. */
  async close(): Promise<void> {
    this.display.close();
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.close();
    }
  }

  private async process(message: IncomingMessage): Promise<MessageOutcome> {
    const decoded = decodeStateMessage(message.data);
    if (!decoded.ok) {
      this.log.warn({ issues: decoded.error.issues }, 'Dropping invalid message');
      return 'invalid';
    }

    const { sentAt } = decoded.message;
    if (sentAt !== undefined && sentAt < message.receivedAt - this.staleAfterMs) {
      this.log.debug({ sentAt, receivedAt: message.receivedAt }, 'Discarding stale message');
      return 'stale';
    }

    this.log.info({ message: decoded.message }, 'Received message');
    try {
      const update = await this.display.update(toSourceState(decoded.message));
      return update.changed ? 'applied' : 'unchanged';
    } catch (err) {
      if (err instanceof InvalidPayloadError) {
        this.log.warn({ issues: err.issues }, 'Dropping invalid message');
        return 'invalid';
      }
      throw err;
    }
  }
}
