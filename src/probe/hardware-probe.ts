/**
 * HardwareProbe Interface
 *
 * Reports whether the local microphone or camera is in use right now.
 */

export interface HardwareState {
  audio: boolean;
  video: boolean;
}

export interface HardwareProbe {
  read(): Promise<HardwareState>;
}
