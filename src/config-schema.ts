/**
 * Config Schema Validation
 *
 * Zod schemas for the on-air configuration file. Every section is
 * optional and filled with defaults, so an empty file is a valid config.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const channelSchema = z.number().int().min(0).max(255);

const rgbSchema = z.tuple([channelSchema, channelSchema, channelSchema]);

// --- Transport ---

const transportConfigSchema = z.object({
  type: z.enum(['mqtt', 'loopback']).default('mqtt'),
  brokerUrl: z.string().regex(/^(mqtts?|wss?|tcp|ssl):\/\//, 'brokerUrl must be an mqtt://, mqtts://, ws:// or wss:// URL').default('mqtt://localhost:1883'),
  topic: z.string().min(1).refine((val) => !/[+#]/.test(val), { message: 'Topic must not contain wildcards' }).default('on-air/state'),
  clientId: z.string().min(1).optional(),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(1),
  reconnectPeriodMs: z.number().int().min(100).optional(),
});

// --- Stream (publisher) ---

const streamConfigSchema = z.object({
  pollIntervalMs: z.number().int().min(100).default(2000),
  sourceName: z.string().min(1).optional(),
});

// --- Listen (subscriber) ---

const listenConfigSchema = z.object({
  staleAfterMs: z.number().int().min(0).default(60_000),
});

// --- Indicator ---

const indicatorConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('osc'),
    host: hostSchema.default('127.0.0.1'),
    port: portSchema.default(12000),
    address: z.string().startsWith('/').default('/light/color'),
  }),
  z.object({ type: z.literal('emulated') }),
  z.object({ type: z.literal('none') }),
]);

// --- Display ---

const displayConfigSchema = z.object({
  blinkRepeat: z.number().int().min(0).max(20).default(3),
  blinkDurationMs: z.number().int().min(0).max(5000).default(100),
  palette: z.object({
    video: rgbSchema.optional(),
    audio: rgbSchema.optional(),
    clear: rgbSchema.optional(),
  }).optional(),
});

// --- Logging ---

const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const onAirConfigSchema = z.object({
  transport: transportConfigSchema.default({}),
  stream: streamConfigSchema.default({}),
  listen: listenConfigSchema.default({}),
  indicator: indicatorConfigSchema.default({ type: 'emulated' }),
  display: displayConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type OnAirConfigOutput = z.output<typeof onAirConfigSchema>;
export type IndicatorConfig = z.output<typeof indicatorConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validateConfig(data: unknown): OnAirConfigOutput {
  return onAirConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
