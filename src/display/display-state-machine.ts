/**
 * Display State Machine
 *
 * Drives the indicator through a blink-then-hold protocol whenever the
 * combined on-air state changes:
 *
 *   1. Pick the target colour by priority (video > audio > clear).
 *   2. If the light already holds the colour it would settle on, do nothing.
 *   3. Blink: target, previous, target, previous ... (blinkRepeat pairs),
 *      holding each for blinkDurationMs.
 *   4. Settle on the target solid. Clear settles on off instead.
 *
 * Blinking against the previously held colour (not black) means a
 * video -> audio change flashes red/blue rather than through darkness.
 *
 * With no device attached every command is a no-op, but the commands are
 * still returned and the held colour still advances.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { Logger } from 'pino';
import { IndicatorDevice } from '../indicators/indicator-device';
import { getLogger } from '../logger';
import { CombinedState, describeState } from '../state/types';
import {
  DEFAULT_PALETTE,
  IndicatorColor,
  Palette,
  Rgb,
  colorForState,
  settledColor,
} from './colors';

export const DEFAULT_BLINK_REPEAT = 3;
export const DEFAULT_BLINK_DURATION_MS = 100;

export type IndicatorCommand =
  | { kind: 'set'; color: IndicatorColor; rgb: Rgb }
  | { kind: 'off' };

export interface DisplayStateMachineOptions {
  device: IndicatorDevice | null;
  palette?: Palette;
  blinkRepeat?: number;
  blinkDurationMs?: number;
  /** Hold between blink steps. Tests swap this for an instant resolver. */
  sleep?: (ms: number) => Promise<void>;
}

export class DisplayStateMachine {
  private device: IndicatorDevice | null;
  private palette: Palette;
  private blinkRepeat: number;
  private blinkDurationMs: number;
  private sleep: (ms: number) => Promise<void>;
  private held: IndicatorColor = 'off';
  private closed = false;
  private log: Logger = getLogger('Display');

  constructor(options: DisplayStateMachineOptions) {
    this.device = options.device;
    this.palette = options.palette ?? DEFAULT_PALETTE;
    this.blinkRepeat = options.blinkRepeat ?? DEFAULT_BLINK_REPEAT;
    this.blinkDurationMs = options.blinkDurationMs ?? DEFAULT_BLINK_DURATION_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Colour the light currently holds */
  get heldColor(): IndicatorColor {
    return this.held;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run the transition for a new combined state.
   * Resolves with the commands issued, in order.
   */
  async onCombinedStateChange(state: CombinedState): Promise<IndicatorCommand[]> {
    if (this.closed) return [];

    const target = colorForState(state);
    const settled = settledColor(target);
    if (settled === this.held) {
      this.log.debug({ state: describeState(state), color: settled }, 'Indicator already holds colour');
      return [];
    }

    const previous = this.held;
    const commands: IndicatorCommand[] = [];
    this.log.info({ state: describeState(state), from: previous, to: settled }, 'Indicator transition');

    for (let i = 0; i < this.blinkRepeat; i++) {
      commands.push(this.show(target));
      await this.sleep(this.blinkDurationMs);
      // Closed mid-sequence: the light is already off, stop here
      if (this.closed) return commands;
      commands.push(this.show(previous));
      await this.sleep(this.blinkDurationMs);
      if (this.closed) return commands;
    }

    commands.push(this.show(settled));
    this.held = settled;
    return commands;
  }

  /**
   * Turn the light off and stop issuing commands.
   * Safe to call more than once; only the first call touches the device.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.held = 'off';
    if (this.device) {
      this.device.off();
    }
    this.log.debug('Indicator released');
  }

  private show(color: IndicatorColor): IndicatorCommand {
    const command: IndicatorCommand = color === 'off'
      ? { kind: 'off' }
      : { kind: 'set', color, rgb: this.palette[color] };

    if (!this.device) {
      return command;
    }

    if (command.kind === 'off') {
      this.device.off();
    } else {
      const [r, g, b] = command.rgb;
      this.device.setColor(r, g, b);
    }
    this.log.trace({ color }, 'Colour set');
    return command;
  }
}
