#!/usr/bin/env node

/**
 * On-Air Light
 *
 * Lights up a room indicator while any machine's microphone or camera is in use.
 *
 *   on-air stream   Poll local audio/video hardware and publish changes
 *   on-air listen   Subscribe to published changes and drive the light
 *   on-air local    Both in one process, over an in-process bus
 *
 * Usage:
 *   on-air listen                          # Use on-air.yml in current directory
 *   on-air stream --config ./desk.yml      # Use a specific config file
 *   on-air stream --source-name studio-pc  # Override the reported source name
 *   on-air listen --no-indicator           # Track state without a light attached
 */

import { Logger } from 'pino';
import { Config, ConfigOverrides, loadConfig } from './config';
import { OnAirDisplay } from './display/on-air-display';
import { IndicatorUnavailableError } from './errors';
import { EmulatedIndicator } from './indicators/emulated-indicator';
import { IndicatorDriver } from './indicators/indicator-device';
import { OscLightDriver } from './indicators/osc-light-driver';
import { StateListener } from './listener';
import { getLogger, initLogger } from './logger';
import { LsofProbe } from './probe/lsof-probe';
import { StatePublisher } from './publisher';
import { LoopbackTransport } from './transport/loopback-transport';
import { MqttTransport } from './transport/mqtt-transport';
import { MessageTransport } from './transport/transport';

export const COMMANDS = ['stream', 'listen', 'local'] as const;

export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: Command | null;
  configPath?: string;
  overrides: ConfigOverrides;
  help: boolean;
  errors: string[];
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: null, overrides: {}, help: false, errors: [] };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        parsed.configPath = argv[++i];
        if (!parsed.configPath) parsed.errors.push('--config requires a file path');
        break;
      case '--source-name':
        parsed.overrides.sourceName = argv[++i];
        if (!parsed.overrides.sourceName) parsed.errors.push('--source-name requires a name');
        break;
      case '--poll-interval':
        {
          const ms = parseInt(argv[++i] ?? '', 10);
          if (Number.isNaN(ms) || ms < 100) {
            parsed.errors.push('--poll-interval requires milliseconds (>= 100)');
          } else {
            parsed.overrides.pollIntervalMs = ms;
          }
        }
        break;
      case '--no-indicator':
        parsed.overrides.noIndicator = true;
        break;
      case '--verbose':
      case '-v':
        parsed.overrides.verbose = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        if (!parsed.command && isCommand(arg)) {
          parsed.command = arg;
        } else {
          parsed.errors.push(`Unknown argument: ${arg}`);
        }
    }
  }

  if (!parsed.command && !parsed.help) {
    parsed.errors.push(`A command is required: ${COMMANDS.join(' | ')}`);
  }
  return parsed;
}

function printUsage(): void {
  console.log('');
  console.log('  On-Air Light');
  console.log('');
  console.log('  Commands:');
  console.log('    stream                Poll local audio/video and publish changes');
  console.log('    listen                Drive the light from published changes');
  console.log('    local                 Poll and drive the light in one process');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./on-air.yml)');
  console.log('    --source-name <name>  Name reported for this machine (default hostname)');
  console.log('    --poll-interval <ms>  Interval between hardware polls');
  console.log('    --no-indicator        Run without a light attached');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --help, -h            Show this help');
  console.log('');
}

export function createTransport(config: Config): MessageTransport {
  if (config.transport.type === 'loopback') {
    return new LoopbackTransport();
  }
  return new MqttTransport(config.transport);
}

function openIndicator(config: Config): IndicatorDriver | null {
  switch (config.indicator.type) {
    case 'none':
      return null;
    case 'emulated':
      return new EmulatedIndicator();
    case 'osc':
      return new OscLightDriver({
        host: config.indicator.host,
        port: config.indicator.port,
        address: config.indicator.address,
      });
  }
}

/**
 * Open the configured light. Returns null for "none", and also when the
 * light cannot be opened: the display then runs without a device.
 */
export function createIndicator(config: Config, log: Logger): IndicatorDriver | null {
  const driver = openIndicator(config);
  if (!driver) return null;

  driver.events.on('error', (err: Error) => {
    log.warn({ err, indicator: driver.name }, 'Indicator error');
  });

  try {
    driver.connect();
  } catch (err) {
    if (err instanceof IndicatorUnavailableError) {
      log.warn({ err }, 'Continuing without a light');
      return null;
    }
    throw err;
  }
  driver.off();
  return driver;
}

export function createDisplay(config: Config, indicator: IndicatorDriver | null): OnAirDisplay {
  return new OnAirDisplay({
    device: indicator,
    palette: config.display.palette,
    blinkRepeat: config.display.blinkRepeat,
    blinkDurationMs: config.display.blinkDurationMs,
  });
}

export interface Running {
  /** Stop, resolving once the light has been sent its last command */
  stop(): Promise<void>;
  /** Synchronous release: turns the light off without waiting */
  release(): void;
}

export function runStream(config: Config, transport: MessageTransport): Running {
  const publisher = new StatePublisher({
    sourceName: config.stream.sourceName,
    pollIntervalMs: config.stream.pollIntervalMs,
    probe: new LsofProbe(),
    transport,
  });
  publisher.start();
  return {
    stop: () => publisher.stop(),
    release: () => undefined,
  };
}

export async function runListen(config: Config, transport: MessageTransport, log: Logger): Promise<Running> {
  const indicator = createIndicator(config, log);
  const display = createDisplay(config, indicator);
  const listener = new StateListener({ display, staleAfterMs: config.listen.staleAfterMs });

  const disconnect = async (): Promise<void> => {
    if (indicator) await indicator.disconnect();
  };

  try {
    await listener.listen(transport);
  } catch (err) {
    display.close();
    await disconnect();
    throw err;
  }

  return {
    stop: async () => {
      await listener.close();
      await disconnect();
    },
    release: () => display.close(),
  };
}

/**
 * Build the shutdown sequence shared by signals and fatal errors: release
 * every light, stop every loop and wait for the lights to flush, then
 * close the transport. Later calls return the first call's promise.
 */
export function createShutdown(
  running: Running[],
  transport: MessageTransport,
  log: Logger,
): (reason: string) => Promise<void> {
  let stopping: Promise<void> | null = null;
  return (reason) => {
    if (!stopping) {
      log.info({ reason }, 'Shutting down');
      for (const r of running) r.release();
      stopping = Promise.all(running.map((r) => r.stop())).then(() => transport.close());
    }
    return stopping;
  };
}

let terminate: ((reason: string, code: number) => void) | null = null;

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help) {
    printUsage();
    process.exit(0);
  }
  if (args.errors.length > 0 || !args.command) {
    for (const error of args.errors) console.error(`[Error] ${error}`);
    printUsage();
    process.exit(1);
  }

  const config = loadConfig(args.configPath, args.overrides);
  initLogger(config.logging);
  const log = getLogger('Main');
  const command = args.command;

  if (command === 'local') {
    config.transport.type = 'loopback';
  }

  const transport = createTransport(config);
  const running: Running[] = [];
  const shutdown = createShutdown(running, transport, log);

  let exiting = false;
  terminate = (reason, code) => {
    if (exiting) return;
    exiting = true;
    shutdown(reason)
      .catch((err: unknown) => log.error({ err }, 'Error during shutdown'))
      .finally(() => process.exit(code));
  };

  // Best effort only: nothing asynchronous runs once 'exit' fires
  process.on('exit', () => {
    for (const r of running) r.release();
  });

  process.on('SIGINT', () => terminate?.('SIGINT', 0));
  process.on('SIGTERM', () => terminate?.('SIGTERM', 0));
  process.on('uncaughtException', (err) => {
    log.fatal({ err }, 'Uncaught exception');
    terminate?.('uncaughtException', 1);
  });
  process.on('unhandledRejection', (reason) => {
    log.fatal({ err: reason }, 'Unhandled rejection');
    terminate?.('unhandledRejection', 1);
  });

  if (command === 'listen' || command === 'local') {
    running.push(await runListen(config, transport, log));
  }
  if (command === 'stream' || command === 'local') {
    running.push(runStream(config, transport));
  }
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Fatal] ${err instanceof Error ? err.message : String(err)}`);
    if (terminate) {
      terminate('startup failure', 1);
    } else {
      process.exit(1);
    }
  });
}
