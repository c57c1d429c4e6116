/**
 * Bridge configuration.
 *
 * Defaults, overrides from code, and MIC_BRIDGE_* environment variables are
 * merged and validated in one place; components receive plain values.
 */

import { z } from 'zod';

import { DEFAULT_AUDIO_QUEUE_CAPACITY } from './audio/audio-bridge.js';
import { DEFAULT_CONNECTION_CONFIG } from './connection/connection-manager.js';
import { DEFAULT_HANDSHAKE_TIMEOUT_MS } from './device/handshake.js';
import { DEFAULT_PIPELINE_RESTART_DELAY_MS } from './pipeline/pipeline-runner.js';
import { ConfigError } from './utils/errors.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

/** Port the microphone app listens on out of the box */
export const DEFAULT_PORT = 11700;

const positiveInt = z.coerce.number().int().positive();

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && LOG_LEVELS.some((level) => level === value),
  { message: `Expected one of ${LOG_LEVELS.join(', ')}` }
);

const bridgeConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  connectTimeoutMs: positiveInt.default(DEFAULT_CONNECTION_CONFIG.connectTimeoutMs),
  reconnectDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_CONNECTION_CONFIG.reconnectDelayMs),
  watchdogTimeoutMs: positiveInt.default(DEFAULT_CONNECTION_CONFIG.watchdogTimeoutMs),
  watchdogIntervalMs: positiveInt.optional(),
  maxConsecutiveBadMessages: positiveInt.default(DEFAULT_CONNECTION_CONFIG.maxConsecutiveBadMessages),
  extensionTimeoutMs: positiveInt.default(DEFAULT_CONNECTION_CONFIG.extensionTimeoutMs),
  maxLineBytes: positiveInt.default(DEFAULT_CONNECTION_CONFIG.maxLineBytes),
  outboxCapacity: positiveInt.default(DEFAULT_CONNECTION_CONFIG.outboxCapacity),
  audioQueueCapacity: positiveInt.default(DEFAULT_AUDIO_QUEUE_CAPACITY),
  handshakeTimeoutMs: positiveInt.default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  pipelineRestartDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_PIPELINE_RESTART_DELAY_MS),
  /** Base URL prepended to TTS output paths sent to the device */
  ttsUrlBase: z.string().url().optional(),
  logLevel: logLevelSchema.default('info'),
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;

/** Overrides accepted from code: host is required, everything else optional */
export type BridgeConfigInput = { host: string } & Partial<Omit<BridgeConfig, 'host'>>;

const ENV_KEYS: Record<keyof BridgeConfig, string> = {
  host: 'MIC_BRIDGE_HOST',
  port: 'MIC_BRIDGE_PORT',
  connectTimeoutMs: 'MIC_BRIDGE_CONNECT_TIMEOUT_MS',
  reconnectDelayMs: 'MIC_BRIDGE_RECONNECT_DELAY_MS',
  watchdogTimeoutMs: 'MIC_BRIDGE_WATCHDOG_TIMEOUT_MS',
  watchdogIntervalMs: 'MIC_BRIDGE_WATCHDOG_INTERVAL_MS',
  maxConsecutiveBadMessages: 'MIC_BRIDGE_MAX_BAD_MESSAGES',
  extensionTimeoutMs: 'MIC_BRIDGE_EXTENSION_TIMEOUT_MS',
  maxLineBytes: 'MIC_BRIDGE_MAX_LINE_BYTES',
  outboxCapacity: 'MIC_BRIDGE_OUTBOX_CAPACITY',
  audioQueueCapacity: 'MIC_BRIDGE_AUDIO_QUEUE_CAPACITY',
  handshakeTimeoutMs: 'MIC_BRIDGE_HANDSHAKE_TIMEOUT_MS',
  pipelineRestartDelayMs: 'MIC_BRIDGE_PIPELINE_RESTART_DELAY_MS',
  ttsUrlBase: 'MIC_BRIDGE_TTS_URL_BASE',
  logLevel: 'MIC_BRIDGE_LOG_LEVEL',
};

function parseConfig(raw: Record<string, unknown>): BridgeConfig {
  const parsed = bridgeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** Validate overrides from code and fill in defaults. Throws ConfigError. */
export function resolveConfig(input: BridgeConfigInput): BridgeConfig {
  return parseConfig({ ...input });
}

/**
 * Build configuration from MIC_BRIDGE_* variables. Explicit overrides win
 * over the environment; unset or empty variables fall back to defaults.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<BridgeConfig> = {}
): BridgeConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return parseConfig(raw);
}
