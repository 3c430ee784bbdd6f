/**
 * State message wire format
 *
 * JSON object: { source, audio, video, sentAt? }
 * sentAt is epoch milliseconds stamped by the publisher and only used by
 * the listener's staleness filter. Unknown fields are dropped.
 */

import { z } from 'zod';
import { InvalidPayloadError } from '../errors';
import { SourceState } from './types';

export const sourceStateSchema = z.object({
  source: z.string().min(1, 'source must be a non-empty string'),
  audio: z.boolean(),
  video: z.boolean(),
});

export const stateMessageSchema = sourceStateSchema.extend({
  sentAt: z.number().int().nonnegative().optional(),
});

export type StateMessage = z.output<typeof stateMessageSchema>;

export type DecodeResult =
  | { ok: true; message: StateMessage }
  | { ok: false; error: InvalidPayloadError };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'payload';
    return `${path}: ${issue.message}`;
  });
}

/** Validate an already-parsed value against the message schema */
export function validateStateMessage(value: unknown): DecodeResult {
  const result = stateMessageSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, error: new InvalidPayloadError(formatIssues(result.error)) };
  }
  return { ok: true, message: result.data };
}

/** Decode raw transport bytes into a state message */
export function decodeStateMessage(data: Buffer | string): DecodeResult {
  const text = typeof data === 'string' ? data : data.toString('utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new InvalidPayloadError([`payload: not valid JSON (${reason})`]) };
  }
  return validateStateMessage(parsed);
}

export function encodeStateMessage(state: SourceState, sentAt: number = Date.now()): string {
  const message: StateMessage = {
    source: state.source,
    audio: state.audio,
    video: state.video,
    sentAt,
  };
  return JSON.stringify(message);
}

/** Strip a message down to the fields the core consumes */
export function toSourceState(message: StateMessage): SourceState {
  return { source: message.source, audio: message.audio, video: message.video };
}
