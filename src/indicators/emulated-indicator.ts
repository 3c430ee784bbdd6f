/**
 * EmulatedIndicator: virtual light
 *
 * Stands in for a physical light: connects instantly, logs each command
 * and keeps a bounded command log with timestamps. Used for the
 * "emulated" indicator type and by tests that assert blink sequences.
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { IndicatorDriver, toByte } from './indicator-device';

export type EmulatedCommand =
  | { action: 'set'; rgb: [number, number, number] }
  | { action: 'off' };

export interface EmulatorLogEntry {
  timestamp: number;
  command: EmulatedCommand;
}

export class EmulatedIndicator implements IndicatorDriver {
  readonly name: string;
  readonly events = new EventEmitter();

  private _connected = false;
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize: number;
  private current: [number, number, number] = [0, 0, 0];
  private logger: Logger;

  constructor(name = 'emulated', maxLogSize = 200) {
    this.name = name;
    this.maxLogSize = maxLogSize;
    this.logger = getLogger(`Emulator:${name}`);
  }

  connect(): void {
    this._connected = true;
    this.logger.info('Emulated light connected (virtual)');
    this.events.emit('connected');
  }

  async disconnect(): Promise<void> {
    this._connected = false;
    this.logger.info('Emulated light disconnected');
    this.events.emit('disconnected');
  }

  isConnected(): boolean {
    return this._connected;
  }

  setColor(r: number, g: number, b: number): void {
    const rgb: [number, number, number] = [toByte(r), toByte(g), toByte(b)];
    this.current = rgb;
    this.record({ action: 'set', rgb });
  }

  off(): void {
    this.current = [0, 0, 0];
    this.record({ action: 'off' });
  }

  /** Colour the virtual light is showing right now */
  get color(): [number, number, number] {
    return [...this.current];
  }

  /** Commands received, oldest first */
  get commandLog(): EmulatedCommand[] {
    return this._log.map((entry) => entry.command);
  }

  get entries(): EmulatorLogEntry[] {
    return [...this._log];
  }

  clearLog(): void {
    this._log = [];
  }

  private record(command: EmulatedCommand): void {
    this._log.push({ timestamp: Date.now(), command });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    const details = command.action === 'set' ? command.rgb.join(',') : 'off';
    this.logger.debug({ color: details }, 'Light command');
    this.events.emit('command', command);
  }
}
