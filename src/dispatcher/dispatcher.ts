/**
 * Message Dispatcher
 *
 * Routes decoded messages to their handlers and tells observers when the
 * device comes and goes.
 */

import type { AudioBridge } from '../audio/audio-bridge.js';
import type { ConnectionState, MessageSink } from '../connection/connection-manager.js';
import { describeMessage, type Message, type MessageData } from '../protocol/types.js';
import { describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Notified synchronously whenever the device connects or disconnects */
export interface ConnectionStateObserver {
  onConnectionStateChange(connected: boolean): void;
}

export type AudioSink = Pick<AudioBridge, 'enqueue'>;

export class Dispatcher implements MessageSink {
  private readonly observers = new Set<ConnectionStateObserver>();
  private readonly logger: Logger;
  private connected = false;
  private _clientInfo?: Readonly<MessageData>;

  constructor(
    private readonly audio: AudioSink,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('dispatcher');
  }

  /** Data from the most recent client-info message, if any */
  get clientInfo(): Readonly<MessageData> | undefined {
    return this._clientInfo;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  addObserver(observer: ConnectionStateObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  dispatch(message: Message): void {
    switch (message.kind) {
      case 'audio-chunk':
        if (message.payload.length === 0) {
          this.logger.debug('Ignoring audio chunk without payload');
          break;
        }
        this.audio.enqueue(message.payload);
        break;

      case 'client-info':
        this._clientInfo = message.data;
        this.logger.debug('Got client info', { data: message.data });
        break;

      case 'ping':
        break;

      case 'play-tts':
        this.logger.warn('Ignoring play-tts sent by the device; it is a host-to-device message');
        break;

      case 'unknown':
        this.logger.warn('Got an unknown message; ignoring it', { message: describeMessage(message) });
        break;
    }
  }

  handleConnectionStateChange(state: ConnectionState): void {
    const connected = state === 'connected';
    if (connected === this.connected) {
      return;
    }
    this.connected = connected;
    this.logger.debug('Connection state change', { connected });

    for (const observer of this.observers) {
      try {
        observer.onConnectionStateChange(connected);
      } catch (err) {
        this.logger.error('Connection state observer failed', { error: describeError(err) });
      }
    }
  }
}
