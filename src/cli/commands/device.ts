import path from 'node:path';
import { Command } from 'commander';

import { loadConfigFromEnv, type BridgeConfig } from '../../config.js';
import { validateDevice, type ValidateDeviceOptions } from '../../device/handshake.js';
import { MicDevice, type MicDeviceOptions } from '../../device/mic-device.js';
import { RecordingPipeline } from '../../pipeline/recording-pipeline.js';
import type { PipelineRunContext, SpeechPipeline } from '../../pipeline/types.js';
import { describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

type ExitFn = (code: number) => never;

export interface DeviceHandle {
  start(): void;
  stop(): Promise<void>;
  addConnectionObserver: MicDevice['addConnectionObserver'];
}

export interface DeviceDependencies {
  env: NodeJS.ProcessEnv;
  validateDevice: (options: ValidateDeviceOptions) => Promise<string>;
  createDevice: (options: MicDeviceOptions) => DeviceHandle;
  onSignal: (signal: NodeJS.Signals, listener: () => void | Promise<void>) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function withDefaults(overrides: Partial<DeviceDependencies> = {}): DeviceDependencies {
  return {
    env: process.env,
    validateDevice,
    createDevice: (options) => new MicDevice(options),
    onSignal: (signal, listener) => {
      process.on(signal, () => void listener());
    },
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

/** Drains the audio queue without keeping anything, for listen without --record */
class DiscardPipeline implements SpeechPipeline {
  async run({ audio }: PipelineRunContext): Promise<void> {
    for await (const _chunk of audio) {
      // drop it
    }
  }
}

export function registerDeviceCommands(program: Command, overrides: Partial<DeviceDependencies> = {}): void {
  const deps = withDefaults(overrides);

  const loadConfig = (host: string, port: string | undefined, extra: Partial<BridgeConfig> = {}): BridgeConfig | undefined => {
    try {
      return loadConfigFromEnv(deps.env, {
        host,
        ...(port !== undefined ? { port: Number(port) } : {}),
        ...extra,
      });
    } catch (err) {
      deps.error(describeError(err));
      deps.exit(1);
    }
    return undefined;
  };

  program
    .command('validate')
    .description('Check that a host is a microphone client and print its uuid')
    .argument('<host>', 'Device hostname or IP address')
    .argument('[port]', 'Device port')
    .option('--timeout <ms>', 'Handshake timeout in milliseconds')
    .action(async (host: string, port: string | undefined, options: { timeout?: string }) => {
      const config = loadConfig(
        host,
        port,
        options.timeout !== undefined ? { handshakeTimeoutMs: Number(options.timeout) } : {}
      );
      if (!config) return;

      try {
        const uuid = await deps.validateDevice({
          host: config.host,
          port: config.port,
          timeoutMs: config.handshakeTimeoutMs,
          logger: createLogger('handshake', { level: config.logLevel }),
        });
        deps.log(uuid);
      } catch (err) {
        deps.error(`Validation failed: ${describeError(err)}`);
        deps.exit(1);
      }
    });

  program
    .command('listen')
    .description('Connect to a microphone client and keep the connection alive')
    .argument('<host>', 'Device hostname or IP address')
    .argument('[port]', 'Device port')
    .option('--record <file>', 'Append received PCM audio to a file')
    .option('--tts-url-base <url>', 'Base URL for TTS audio sent to the device')
    .option('--watchdog-timeout <ms>', 'Drop the connection after this much silence')
    .action(
      async (
        host: string,
        port: string | undefined,
        options: { record?: string; ttsUrlBase?: string; watchdogTimeout?: string }
      ) => {
        const config = loadConfig(host, port, {
          ...(options.ttsUrlBase !== undefined ? { ttsUrlBase: options.ttsUrlBase } : {}),
          ...(options.watchdogTimeout !== undefined ? { watchdogTimeoutMs: Number(options.watchdogTimeout) } : {}),
        });
        if (!config) return;

        const logger = createLogger('mic-bridge', { level: config.logLevel });
        const pipeline = options.record
          ? new RecordingPipeline(path.resolve(options.record), logger.child('recording'))
          : new DiscardPipeline();

        const device = deps.createDevice({ config, pipeline, logger });
        device.addConnectionObserver({
          onConnectionStateChange: (connected) => {
            deps.log(connected ? `Connected to ${config.host}:${config.port}` : `Disconnected from ${config.host}:${config.port}`);
          },
        });

        let stopping = false;
        const shutdown = async (): Promise<void> => {
          if (stopping) return;
          stopping = true;
          deps.log('Stopping...');
          try {
            await device.stop();
          } catch (err) {
            deps.error(`Shutdown failed: ${describeError(err)}`);
            deps.exit(1);
          }
          deps.exit(0);
        };
        deps.onSignal('SIGINT', shutdown);
        deps.onSignal('SIGTERM', shutdown);

        deps.log(`Listening to ${config.host}:${config.port}${options.record ? ` (recording to ${options.record})` : ''}`);
        device.start();
      }
    );
}
