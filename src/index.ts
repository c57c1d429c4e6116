/**
 * mic-bridge
 * Connects a networked microphone client to a voice-assistant pipeline.
 */

// Protocol
export {
  MESSAGE_KINDS,
  createMessage,
  createPlayTtsMessage,
  describeMessage,
  isJsonObject,
  toMessageKind,
  type JsonObject,
  type JsonValue,
  type KnownMessageKind,
  type Message,
  type MessageData,
  type MessageKind,
  type OutboundMessage,
  type PlayTtsMessage,
} from './protocol/types.js';
export { EXTENSION_TIMEOUT_MS, decodeMessage, encodeMessage, type DecodeOptions } from './protocol/codec.js';
export { DEFAULT_MAX_LINE_BYTES, StreamReader, type StreamReaderOptions } from './protocol/stream-reader.js';

// Connection
export {
  ConnectionManager,
  DEFAULT_CONNECTION_CONFIG,
  type ConnectionManagerConfig,
  type ConnectionManagerDependencies,
  type ConnectionState,
  type ConnectionStateListener,
  type MessageSink,
} from './connection/connection-manager.js';
export {
  CLOSE_GRACE_MS,
  closeSocket,
  connectTcp,
  formatTarget,
  type CloseSocketOptions,
  type ConnectOptions,
  type SocketFactory,
  type TransportTarget,
} from './connection/transport.js';

// Audio, dispatch, pipeline
export { AudioBridge, DEFAULT_AUDIO_QUEUE_CAPACITY } from './audio/audio-bridge.js';
export { Dispatcher, type AudioSink, type ConnectionStateObserver } from './dispatcher/dispatcher.js';
export { PipelineRunner, DEFAULT_PIPELINE_RESTART_DELAY_MS, type PipelineRunnerOptions } from './pipeline/pipeline-runner.js';
export { RecordingPipeline } from './pipeline/recording-pipeline.js';
export {
  DEVICE_AUDIO_METADATA,
  type AudioMetadata,
  type PipelineEvent,
  type PipelineEventObserver,
  type PipelineEventType,
  type PipelineRunContext,
  type SpeechPipeline,
} from './pipeline/types.js';

// Device
export { DEFAULT_HANDSHAKE_TIMEOUT_MS, validateDevice, type ValidateDeviceOptions } from './device/handshake.js';
export { MicDevice, resolveTtsUrl, ttsOutputPath, type MicDeviceOptions } from './device/mic-device.js';

// Configuration, errors, logging
export {
  DEFAULT_PORT,
  loadConfigFromEnv,
  resolveConfig,
  type BridgeConfig,
  type BridgeConfigInput,
} from './config.js';
export {
  BadMessageError,
  BridgeError,
  ConfigError,
  ConnectionTimeoutError,
  HandshakeError,
  ReadTimeoutError,
  TransportError,
  describeError,
  isAbortError,
} from './utils/errors.js';
export { BoundedQueue, type OverflowHandler } from './utils/bounded-queue.js';
export { Logger, LOG_LEVELS, createLogger, type LogContext, type LogLevel, type LoggerConfig } from './utils/logger.js';
