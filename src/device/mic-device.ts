/**
 * Mic Device
 *
 * Everything the host runs for one microphone client: the connection to
 * the device, the dispatcher that routes its messages, the audio bridge,
 * and the speech pipeline consuming that audio. Spoken responses from the
 * pipeline are sent back to the device as play-tts messages.
 */

import { AudioBridge } from '../audio/audio-bridge.js';
import type { BridgeConfig } from '../config.js';
import { ConnectionManager, type ConnectionState } from '../connection/connection-manager.js';
import type { SocketFactory } from '../connection/transport.js';
import { Dispatcher, type ConnectionStateObserver } from '../dispatcher/dispatcher.js';
import { PipelineRunner } from '../pipeline/pipeline-runner.js';
import type { PipelineEvent, PipelineEventObserver, SpeechPipeline } from '../pipeline/types.js';
import { createPlayTtsMessage, isJsonObject, type MessageData } from '../protocol/types.js';
import { describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface MicDeviceOptions {
  config: BridgeConfig;
  pipeline: SpeechPipeline;
  transport?: SocketFactory;
  logger?: Logger;
}

/** Pull the TTS output path out of a tts-end event, if it carries one */
export function ttsOutputPath(event: PipelineEvent): string | undefined {
  const output = event.data?.tts_output;
  if (!isJsonObject(output)) {
    return undefined;
  }
  return typeof output.url === 'string' && output.url.length > 0 ? output.url : undefined;
}

function isAbsoluteUrl(path: string): boolean {
  return /^https?:\/\//i.test(path);
}

/**
 * Resolve a TTS path against the host's base URL. Absolute URLs pass
 * through; a relative path without a base cannot be resolved.
 */
export function resolveTtsUrl(base: string | undefined, path: string): string | undefined {
  if (isAbsoluteUrl(path)) {
    return path;
  }
  if (!base) {
    return undefined;
  }
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export class MicDevice {
  readonly audio: AudioBridge;
  private readonly connection: ConnectionManager;
  private readonly dispatcher: Dispatcher;
  private readonly runner: PipelineRunner;
  private readonly logger: Logger;
  private readonly ttsUrlBase?: string;
  private tasks?: Promise<void>;

  constructor(options: MicDeviceOptions) {
    const { config } = options;
    this.ttsUrlBase = config.ttsUrlBase;
    this.logger = (options.logger ?? createLogger('device', { level: config.logLevel })).child(
      `${config.host}:${config.port}`
    );

    this.audio = new AudioBridge(config.audioQueueCapacity, this.logger.child('audio'));
    this.dispatcher = new Dispatcher(this.audio, this.logger.child('dispatcher'));
    this.connection = new ConnectionManager(config, {
      sink: this.dispatcher,
      transport: options.transport,
      logger: this.logger.child('connection'),
    });
    this.connection.onStateChange((state) => this.dispatcher.handleConnectionStateChange(state));

    this.runner = new PipelineRunner(options.pipeline, this.audio, {
      restartDelayMs: config.pipelineRestartDelayMs,
      logger: this.logger.child('pipeline'),
    });
    this.runner.addObserver({ onPipelineEvent: (event) => this.handlePipelineEvent(event) });
  }

  get connectionState(): ConnectionState {
    return this.connection.state;
  }

  get clientInfo(): Readonly<MessageData> | undefined {
    return this.dispatcher.clientInfo;
  }

  addConnectionObserver(observer: ConnectionStateObserver): () => void {
    return this.dispatcher.addObserver(observer);
  }

  addPipelineObserver(observer: PipelineEventObserver): () => void {
    return this.runner.addObserver(observer);
  }

  /** Launch the connection loop and the pipeline runner in the background. */
  start(): void {
    if (this.tasks) {
      return;
    }
    this.logger.info('Starting device');
    this.tasks = Promise.all([
      this.connection.run().catch((err: unknown) => {
        this.logger.error('Connection loop failed', { error: describeError(err) });
      }),
      this.runner.start().catch((err: unknown) => {
        this.logger.error('Pipeline runner failed', { error: describeError(err) });
      }),
    ]).then(() => undefined);
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping device');
    await Promise.all([this.connection.close(), this.runner.stop()]);
    await this.tasks;
  }

  /** Ask the device to play audio from a URL. */
  playTts(url: string): void {
    this.connection.enqueueSend(createPlayTtsMessage(url));
  }

  private handlePipelineEvent(event: PipelineEvent): void {
    if (event.type !== 'tts-end') {
      return;
    }

    const path = ttsOutputPath(event);
    const url = path ? resolveTtsUrl(this.ttsUrlBase, path) : undefined;
    if (url) {
      this.logger.debug('Play URL', { url });
      this.playTts(url);
    } else {
      this.logger.warn("Can't play TTS: output path or URL base not found", {
        path,
        urlBase: this.ttsUrlBase,
      });
    }
  }
}
