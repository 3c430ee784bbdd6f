/**
 * State Aggregator
 *
 * Folds per-source audio/video reports into one combined on-air state.
 * Emits a combined state only when it actually changes, so duplicate or
 * redundant source reports (at-least-once delivery) never reach the light.
 *
 * Source entries are never evicted: a source that goes away keeps
 * contributing its last reported state until the process restarts.
 */

import { Logger } from 'pino';
import { InvalidPayloadError } from '../errors';
import { getLogger } from '../logger';
import { formatIssues, sourceStateSchema } from './message';
import {
  CombinedState,
  IDLE_STATE,
  SourceState,
  combineSourceStates,
  describeState,
  sameCombinedState,
  sameSourceState,
} from './types';

export class StateAggregator {
  private sourceStates: Map<string, SourceState> = new Map();
  private combined: CombinedState = { ...IDLE_STATE };
  private log: Logger = getLogger('Aggregator');

  /**
   * Record a source report.
   * Returns the new combined state, or null when nothing changed.
   * Throws InvalidPayloadError if the payload is structurally wrong.
   */
  update(payload: SourceState): CombinedState | null {
    const parsed = sourceStateSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidPayloadError(formatIssues(parsed.error));
    }
    const next = parsed.data;

    const previous = this.sourceStates.get(next.source);
    if (previous && sameSourceState(previous, next)) {
      this.log.debug({ source: next.source }, 'Source state is unchanged');
      return null;
    }
    this.sourceStates.set(next.source, next);

    const combined = combineSourceStates(this.sourceStates.values());
    if (sameCombinedState(combined, this.combined)) {
      this.log.debug({ source: next.source, state: describeState(combined) }, 'Combined state is unchanged');
      return null;
    }

    this.combined = combined;
    this.log.debug({ source: next.source, state: describeState(combined) }, 'Combined state updated');
    return { ...combined };
  }

  /** Last computed combined state */
  get state(): CombinedState {
    return { ...this.combined };
  }

  /** Snapshot of every known source's last report */
  get sources(): SourceState[] {
    return Array.from(this.sourceStates.values(), (s) => ({ ...s }));
  }
}
