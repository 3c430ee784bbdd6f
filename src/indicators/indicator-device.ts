/**
 * IndicatorDevice Interface
 *
 * The display state machine only needs a light it can colour and turn off.
 * Commands are fire-and-forget: no return value, no feedback.
 *
 * Concrete drivers carry an `events` emitter, which emits:
 *   'connected'    - transport ready
 *   'disconnected' - transport closed
 *   'error' (err: Error) - non-fatal send error
 *
 * Drivers must not extend EventEmitter: its off(event, listener) collides
 * with IndicatorDevice.off().
 */

import { EventEmitter } from 'events';

export interface IndicatorDevice {
  setColor(r: number, g: number, b: number): void;
  off(): void;
}

export interface IndicatorDriver extends IndicatorDevice {
  /** Human-readable name, e.g. "osc-light", "emulated" */
  readonly name: string;

  readonly events: EventEmitter;

  /** Open the transport to the light */
  connect(): void;

  /** Close the transport once commands already issued have gone out */
  disconnect(): Promise<void>;

  isConnected(): boolean;
}

/** Clamp a colour channel into 0-255 */
export function toByte(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(255, Math.round(value)));
}
