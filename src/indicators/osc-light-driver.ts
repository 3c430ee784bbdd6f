/**
 * OSC Light Driver
 *
 * Sends indicator colours to a light controller as OSC over UDP:
 *
 *   <address> int r, int g, int b      e.g. /light/color 255 0 0
 *
 * off() sends the same address with 0 0 0. Any controller that maps an OSC
 * message to an RGB output (a blink(1) bridge, a DMX node, a TouchDesigner
 * patch) can act as the light.
 *
 * UDP has no connection: "connected" means the local socket is bound.
 * A colour set before then is kept (latest only) and sent once bound;
 * older colours are dropped because only the last one matters.
 */

import { EventEmitter, once } from 'events';
import * as dgram from 'dgram';
import * as osc from 'osc';
import { Logger } from 'pino';
import { IndicatorUnavailableError } from '../errors';
import { getLogger } from '../logger';
import { IndicatorDriver, toByte } from './indicator-device';

export interface OscLightConfig {
  host: string;
  port: number;
  /** OSC address the controller listens on */
  address?: string;
  name?: string;
}

export const DEFAULT_LIGHT_ADDRESS = '/light/color';

export class OscLightDriver implements IndicatorDriver {
  readonly name: string;
  readonly events = new EventEmitter();

  private host: string;
  private port: number;
  private address: string;
  private socket: dgram.Socket | null = null;
  private connected = false;
  private pending: [number, number, number] | null = null;
  private inFlight = 0;
  private closing: Promise<void> | null = null;
  private log: Logger;

  constructor(config: OscLightConfig) {
    this.name = config.name ?? 'osc-light';
    this.host = config.host;
    this.port = config.port;
    this.address = config.address ?? DEFAULT_LIGHT_ADDRESS;
    this.log = getLogger('OscLight');
  }

  connect(): void {
    if (this.socket) return;

    let socket: dgram.Socket;
    try {
      socket = dgram.createSocket('udp4');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new IndicatorUnavailableError(this.name, reason);
    }
    this.socket = socket;

    socket.on('error', (err: Error) => {
      this.log.error({ err }, 'UDP error');
      this.events.emit('error', err);
    });

    socket.on('listening', () => {
      this.connected = true;
      this.log.info({ host: this.host, port: this.port, address: this.address }, 'Ready to send');
      this.events.emit('connected');
      if (this.pending) {
        const [r, g, b] = this.pending;
        this.pending = null;
        this.send(r, g, b);
      }
    });

    // Bind to any available port for sending
    socket.bind(0);
  }

  /**
   * Close the socket. Resolves once every datagram already handed to the
   * driver (such as a final off()) has been sent, including a colour held
   * while the socket was still binding.
   */
  disconnect(): Promise<void> {
    if (!this.closing) {
      const socket = this.socket;
      if (!socket) return Promise.resolve();
      this.closing = this.closeSocket(socket).finally(() => {
        this.closing = null;
      });
    }
    return this.closing;
  }

  isConnected(): boolean {
    return this.connected;
  }

  setColor(r: number, g: number, b: number): void {
    this.send(toByte(r), toByte(g), toByte(b));
  }

  off(): void {
    this.send(0, 0, 0);
  }

  private async closeSocket(socket: dgram.Socket): Promise<void> {
    if (!this.connected) {
      try {
        // The 'listening' handler in connect() runs first and sends the held colour
        await once(socket, 'listening');
      } catch (err) {
        this.socket = null;
        this.pending = null;
        const reason = err instanceof Error ? err.message : String(err);
        throw new IndicatorUnavailableError(this.name, reason);
      }
    }

    this.socket = null;
    if (this.inFlight > 0) {
      await new Promise<void>((resolve) => socket.once('flushed', resolve));
    }
    socket.close();

    this.pending = null;
    if (this.connected) {
      this.connected = false;
      this.events.emit('disconnected');
    }
  }

  private send(r: number, g: number, b: number): void {
    if (!this.socket || !this.connected) {
      this.pending = [r, g, b];
      this.log.debug({ rgb: [r, g, b] }, 'Not connected, holding colour until ready');
      return;
    }

    const packet = osc.writeMessage({
      address: this.address,
      args: [
        { type: 'i', value: r },
        { type: 'i', value: g },
        { type: 'i', value: b },
      ],
    });

    const socket = this.socket;
    this.inFlight++;
    socket.send(packet, this.port, this.host, (err) => {
      this.inFlight--;
      if (err) {
        this.log.error({ err }, 'Send error');
        this.events.emit('error', err);
      }
      if (this.inFlight === 0) {
        socket.emit('flushed');
      }
    });

    this.log.trace({ address: this.address, rgb: [r, g, b] }, 'Colour sent');
  }
}
