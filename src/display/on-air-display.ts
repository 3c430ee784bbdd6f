/**
 * OnAirDisplay
 *
 * Owns the aggregator and the display state machine as one unit. Every
 * update runs through a single-consumer queue, so a combined-state change
 * and its blink sequence never interleave with another message's update.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { SerialQueue } from '../serial-queue';
import { StateAggregator } from '../state/aggregator';
import { CombinedState, SourceState, describeState } from '../state/types';
import {
  DisplayStateMachine,
  DisplayStateMachineOptions,
  IndicatorCommand,
} from './display-state-machine';

export interface DisplayUpdate {
  /** Combined state after the update, or null if it did not change */
  changed: CombinedState | null;
  commands: IndicatorCommand[];
}

export class OnAirDisplay {
  readonly aggregator: StateAggregator;
  readonly machine: DisplayStateMachine;
  private queue = new SerialQueue();
  private log: Logger = getLogger('OnAirDisplay');

  constructor(options: DisplayStateMachineOptions) {
    this.aggregator = new StateAggregator();
    this.machine = new DisplayStateMachine(options);
  }

  /**
   * Apply one source report. Rejects with InvalidPayloadError for a
   * malformed payload; the queue keeps running either way.
   */
  update(payload: SourceState): Promise<DisplayUpdate> {
    return this.queue.run(async () => {
      const changed = this.aggregator.update(payload);
      if (!changed) {
        return { changed: null, commands: [] };
      }
      this.log.info({ source: payload.source, state: describeState(changed) }, 'On-air state changed');
      const commands = await this.machine.onCombinedStateChange(changed);
      return { changed, commands };
    });
  }

  /** Updates queued or in flight */
  get backlog(): number {
    return this.queue.size;
  }

  /** Wait for queued updates to finish */
  drain(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Turn the light off now, even mid-blink. Idempotent.
   */
  close(): void {
    this.machine.close();
  }
}
