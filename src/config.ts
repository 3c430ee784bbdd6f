/**
 * Configuration loader
 *
 * Reads the YAML config file, validates it with the Zod schema and fills
 * in defaults. A missing file is not an error: every setting has one.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { ConfigError } from './errors';
import { LogLevel } from './logger';
import { IndicatorConfig, validateConfig, formatZodError } from './config-schema';
import { Palette, buildPalette } from './display/colors';
import { MqttTransportConfig } from './transport/mqtt-transport';

export const DEFAULT_CONFIG_FILE = 'on-air.yml';

/** Runtime config used by the CLI */
export interface Config {
  transport: { type: 'mqtt' | 'loopback' } & MqttTransportConfig;
  stream: {
    pollIntervalMs: number;
    sourceName: string;
  };
  listen: {
    staleAfterMs: number;
  };
  indicator: IndicatorConfig;
  display: {
    blinkRepeat: number;
    blinkDurationMs: number;
    palette: Palette;
  };
  logging: {
    level?: LogLevel;
    pretty?: boolean;
  };
}

/** Command-line settings that take precedence over the file */
export interface ConfigOverrides {
  sourceName?: string;
  pollIntervalMs?: number;
  noIndicator?: boolean;
  verbose?: boolean;
}

/**
 * Load and normalize config from YAML.
 * Falls back to defaults when no file exists at the resolved path.
 */
export function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  let parsed: unknown = {};
  if (fs.existsSync(resolvedPath)) {
    const raw = fs.readFileSync(resolvedPath, 'utf-8');
    try {
      // An empty file parses to null
      parsed = parse(raw) ?? {};
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`[Config] Cannot parse ${resolvedPath}: ${reason}`);
    }
  } else if (configPath) {
    throw new ConfigError(`[Config] Config file not found: ${configPath}`);
  }

  return buildConfig(parsed, overrides);
}

/** Validate a parsed document and apply overrides */
export function buildConfig(document: unknown, overrides: ConfigOverrides = {}): Config {
  let validated;
  try {
    validated = validateConfig(document);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  const config: Config = {
    transport: {
      type: validated.transport.type,
      brokerUrl: validated.transport.brokerUrl,
      topic: validated.transport.topic,
      clientId: validated.transport.clientId,
      qos: validated.transport.qos,
      reconnectPeriodMs: validated.transport.reconnectPeriodMs,
    },
    stream: {
      pollIntervalMs: validated.stream.pollIntervalMs,
      sourceName: validated.stream.sourceName ?? os.hostname(),
    },
    listen: {
      staleAfterMs: validated.listen.staleAfterMs,
    },
    indicator: validated.indicator,
    display: {
      blinkRepeat: validated.display.blinkRepeat,
      blinkDurationMs: validated.display.blinkDurationMs,
      palette: buildPalette(validated.display.palette),
    },
    logging: {
      level: validated.logging.level,
      pretty: validated.logging.pretty,
    },
  };

  if (overrides.sourceName) config.stream.sourceName = overrides.sourceName;
  if (overrides.pollIntervalMs !== undefined) config.stream.pollIntervalMs = overrides.pollIntervalMs;
  if (overrides.noIndicator) config.indicator = { type: 'none' };
  if (overrides.verbose) config.logging.level = 'debug';

  return config;
}
