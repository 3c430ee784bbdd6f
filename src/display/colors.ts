/**
 * Indicator colours and the priority that maps a combined state to one.
 *
 *   video active  -> video (red)
 *   audio active  -> audio (blue)
 *   neither       -> clear (green pulse, then off)
 */

import { CombinedState } from '../state/types';

export type Rgb = readonly [number, number, number];

export type IndicatorColor = 'video' | 'audio' | 'clear' | 'off';

export type Palette = Readonly<Record<IndicatorColor, Rgb>>;

export const DEFAULT_PALETTE: Palette = {
  video: [255, 0, 0],
  audio: [0, 0, 255],
  clear: [0, 255, 0],
  off: [0, 0, 0],
};

/** Merge user overrides over the default palette. Off is always black. */
export function buildPalette(overrides: Partial<Record<'video' | 'audio' | 'clear', Rgb>> = {}): Palette {
  return {
    video: overrides.video ?? DEFAULT_PALETTE.video,
    audio: overrides.audio ?? DEFAULT_PALETTE.audio,
    clear: overrides.clear ?? DEFAULT_PALETTE.clear,
    off: DEFAULT_PALETTE.off,
  };
}

export function colorForState(state: CombinedState): IndicatorColor {
  if (state.video) return 'video';
  if (state.audio) return 'audio';
  return 'clear';
}

/** Colour the light holds after the blink sequence. Clear is only a pulse. */
export function settledColor(target: IndicatorColor): IndicatorColor {
  return target === 'clear' ? 'off' : target;
}
