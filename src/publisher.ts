/**
 * State Publisher
 *
 * Polls the local hardware probe on a fixed interval and publishes this
 * source's state whenever it differs from the last one sent. Polls never
 * overlap: the next one is scheduled after the previous one finishes.
 *
 * A failed probe read or publish is logged and retried on the next poll;
 * the last-sent state is only advanced after a successful publish.
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from './logger';
import { HardwareProbe } from './probe/hardware-probe';
import { encodeStateMessage } from './state/message';
import { SourceState, describeState, sameSourceState } from './state/types';
import { MessageTransport } from './transport/transport';

export interface StatePublisherOptions {
  sourceName: string;
  pollIntervalMs: number;
  probe: HardwareProbe;
  transport: MessageTransport;
  now?: () => number;
}

export type PollOutcome = 'published' | 'unchanged' | 'failed';

export class StatePublisher extends EventEmitter {
  private sourceName: string;
  private pollIntervalMs: number;
  private probe: HardwareProbe;
  private transport: MessageTransport;
  private now: () => number;
  private lastSent: SourceState | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight: Promise<PollOutcome> | null = null;
  private log: Logger = getLogger('Publisher');

  constructor(options: StatePublisherOptions) {
    super();
    this.sourceName = options.sourceName;
    this.pollIntervalMs = options.pollIntervalMs;
    this.probe = options.probe;
    this.transport = options.transport;
    this.now = options.now ?? Date.now;
  }

  /** State most recently published, or null before the first publish */
  get lastPublished(): SourceState | null {
    return this.lastSent ? { ...this.lastSent } : null;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.info({ source: this.sourceName, intervalMs: this.pollIntervalMs }, 'Watching for changes in local audio/video state');
    this.schedule(0);
  }

  /** Stop polling; resolves once any poll in progress has finished */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /** Read the probe once and publish if the state changed */
  async poll(): Promise<PollOutcome> {
    this.log.debug('Polling local audio/video state');

    let state: SourceState;
    try {
      const hardware = await this.probe.read();
      state = { source: this.sourceName, audio: hardware.audio, video: hardware.video };
    } catch (err) {
      this.log.error({ err }, 'Hardware probe failed');
      this.emit('pollFailed', err);
      return 'failed';
    }

    if (this.lastSent && sameSourceState(this.lastSent, state)) {
      return 'unchanged';
    }

    const payload = encodeStateMessage(state, this.now());
    try {
      await this.transport.publish(payload);
    } catch (err) {
      this.log.error({ err }, 'Publish failed');
      this.emit('pollFailed', err);
      return 'failed';
    }

    this.lastSent = state;
    this.log.info({ payload, state: describeState(state) }, 'Published state');
    this.emit('published', state);
    return 'published';
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.poll();
      void this.inFlight.finally(() => {
        this.inFlight = null;
        if (this.running) {
          this.schedule(this.pollIntervalMs);
        }
      });
    }, delayMs);
  }
}
