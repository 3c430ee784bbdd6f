/**
 * Core on-air state types.
 */

/** Activity reported by a single source machine */
export interface SourceState {
  source: string;
  audio: boolean;
  video: boolean;
}

/** Logical OR of every known source's activity */
export interface CombinedState {
  audio: boolean;
  video: boolean;
}

export const IDLE_STATE: Readonly<CombinedState> = Object.freeze({ audio: false, video: false });

export function sameSourceState(a: SourceState, b: SourceState): boolean {
  return a.source === b.source && a.audio === b.audio && a.video === b.video;
}

export function sameCombinedState(a: CombinedState, b: CombinedState): boolean {
  return a.audio === b.audio && a.video === b.video;
}

export function combineSourceStates(states: Iterable<SourceState>): CombinedState {
  let audio = false;
  let video = false;
  for (const state of states) {
    if (state.audio) audio = true;
    if (state.video) video = true;
  }
  return { audio, video };
}

/** Short form for log lines, e.g. "audio+video", "audio", "idle" */
export function describeState(state: CombinedState): string {
  const parts: string[] = [];
  if (state.audio) parts.push('audio');
  if (state.video) parts.push('video');
  return parts.length > 0 ? parts.join('+') : 'idle';
}
