/**
 * Connection Manager
 *
 * Owns the socket to one microphone client and keeps it alive unattended:
 * reconnects with a fixed backoff, drops a connection that has gone quiet,
 * and tolerates a few malformed messages before forcing a fresh socket.
 *
 * States:
 *   disconnected -> connecting -> connected
 *        ^              |            |
 *        +--------------+------------+
 *
 * Each connected period runs one session: a read loop, a send loop and a
 * watchdog sharing one AbortController. Whichever exits first ends the
 * session and the others are cancelled.
 */

import type { Duplex } from 'node:stream';
import { setTimeout as sleep } from 'node:timers/promises';

import { decodeMessage, encodeMessage, EXTENSION_TIMEOUT_MS } from '../protocol/codec.js';
import { DEFAULT_MAX_LINE_BYTES, StreamReader } from '../protocol/stream-reader.js';
import type { Message, OutboundMessage } from '../protocol/types.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { BadMessageError, TransportError, describeError, isAbortError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { closeSocket, connectTcp, formatTarget, type SocketFactory, type TransportTarget } from './transport.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface ConnectionManagerConfig extends TransportTarget {
  /** Give up on a connection attempt after this long */
  connectTimeoutMs: number;
  /** Pause between a session ending and the next connection attempt */
  reconnectDelayMs: number;
  /** Silence longer than this marks the connection dead */
  watchdogTimeoutMs: number;
  /** How often the watchdog checks; defaults to watchdogTimeoutMs */
  watchdogIntervalMs?: number;
  /** Consecutive bad messages that force a reconnect */
  maxConsecutiveBadMessages: number;
  /** Window for each extra-data or payload block to arrive */
  extensionTimeoutMs: number;
  maxLineBytes: number;
  /** Outbound messages held while the send loop catches up */
  outboxCapacity: number;
}

export const DEFAULT_CONNECTION_CONFIG: Omit<ConnectionManagerConfig, 'host' | 'port'> = {
  connectTimeoutMs: 5000,
  reconnectDelayMs: 2000,
  watchdogTimeoutMs: 15_000,
  maxConsecutiveBadMessages: 5,
  extensionTimeoutMs: EXTENSION_TIMEOUT_MS,
  maxLineBytes: DEFAULT_MAX_LINE_BYTES,
  outboxCapacity: 256,
};

/** Receives every successfully decoded message, in arrival order */
export interface MessageSink {
  dispatch(message: Message): void;
}

export type ConnectionStateListener = (state: ConnectionState) => void;

export interface ConnectionManagerDependencies {
  sink: MessageSink;
  transport?: SocketFactory;
  logger?: Logger;
  now?: () => number;
}

export class ConnectionManager {
  private readonly config: ConnectionManagerConfig;
  private readonly sink: MessageSink;
  private readonly transport: SocketFactory;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly outbox: BoundedQueue<OutboundMessage>;
  private readonly stateListeners = new Set<ConnectionStateListener>();

  private socket?: Duplex;
  private reader?: StreamReader;
  private _state: ConnectionState = 'disconnected';
  private _lastMessageAt: number;
  private shouldClose = false;
  private readonly closeController = new AbortController();
  private session?: AbortController;
  private replacing?: Promise<void>;
  private running?: Promise<void>;
  private closing?: Promise<void>;

  constructor(config: TransportTarget & Partial<ConnectionManagerConfig>, deps: ConnectionManagerDependencies) {
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
    this.sink = deps.sink;
    this.transport = deps.transport ?? connectTcp;
    this.logger = deps.logger ?? createLogger('connection');
    this.now = deps.now ?? Date.now;
    this._lastMessageAt = this.now();
    this.outbox = new BoundedQueue<OutboundMessage>(this.config.outboxCapacity, (dropped) => {
      this.logger.error('Outbound queue full, dropping queued messages', {
        target: this.target,
        dropped,
      });
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  /** Timestamp (ms) of the last line received from the device */
  get lastMessageAt(): number {
    return this._lastMessageAt;
  }

  get pendingSends(): number {
    return this.outbox.size;
  }

  get target(): string {
    return formatTarget(this.config);
  }

  onStateChange(listener: ConnectionStateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Connect, or replace the current socket with a fresh one. Failure is
   * routine here: it is logged and reflected in `state`, never thrown.
   * A running session carries on over the new socket. Concurrent calls
   * share one attempt.
   */
  reconnect(): Promise<void> {
    this.replacing ??= this.replaceSocket().finally(() => {
      this.replacing = undefined;
    });
    return this.replacing;
  }

  private async replaceSocket(): Promise<void> {
    if (this.socket) {
      if (this.isConnected) {
        this.logger.debug('Already connected, reconnecting', { target: this.target });
      }
      await this.destroySocket();
    }

    this.setState('connecting');
    try {
      this.logger.debug('Trying connection', { target: this.target });
      const socket = await this.transport(this.config, { timeoutMs: this.config.connectTimeoutMs });

      if (this.shouldClose) {
        await closeSocket(socket, { logger: this.logger });
        this.setState('disconnected');
        return;
      }

      this.socket = socket;
      this.reader = new StreamReader(socket, { maxLineBytes: this.config.maxLineBytes });
      this._lastMessageAt = this.now();
      this.setState('connected');
      this.logger.info('Connected', { target: this.target });
    } catch (err) {
      this.setState('disconnected');
      this.logger.error('Failed to connect', { target: this.target, error: describeError(err) });
    }
  }

  /**
   * Run the connect / session / backoff loop until close() is called.
   * Calling run() again while it is running returns the same promise.
   */
  run(): Promise<void> {
    if (this.shouldClose) {
      return this.closing ?? Promise.resolve();
    }
    this.running ??= this.runLoop();
    return this.running;
  }

  /**
   * Request shutdown. Cancels the active session and any backoff sleep,
   * and resolves once the run loop has exited. Safe to call repeatedly.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  /**
   * Write one message immediately. Resolves true once it has been flushed,
   * false when there is no socket to write to.
   */
  async send(data: OutboundMessage): Promise<boolean> {
    const socket = this.socket;
    if (!socket || !socket.writable) {
      this.logger.warn('Tried to write data to dead socket', { target: this.target, type: data.type });
      return false;
    }

    const frame = encodeMessage(data);
    await new Promise<void>((resolve, reject) => {
      socket.write(frame, (err) => {
        if (err) {
          reject(new TransportError(`Write to ${this.target} failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
    return true;
  }

  /**
   * Queue a message for the send loop. Never blocks; messages queued while
   * disconnected go out once a session is running.
   */
  enqueueSend(data: OutboundMessage): void {
    this.outbox.push(data);
  }

  private async runLoop(): Promise<void> {
    this.logger.info('Starting network tasks', { target: this.target });
    try {
      while (!this.shouldClose) {
        // reconnect() may already have been called from outside during the backoff
        if (!this.isConnected) {
          await this.reconnect();
        }

        if (this.isConnected && !this.shouldClose) {
          await this.runSession();
        }
        if (this.shouldClose) {
          break;
        }

        this.logger.warn('Disconnected; will reconnect', {
          target: this.target,
          delayMs: this.config.reconnectDelayMs,
        });
        await this.backoff();
      }
    } finally {
      this.logger.info('Shutting down connection', { target: this.target });
      await this.destroySocket();
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.debug('Closing connection manager', { target: this.target });
    this.shouldClose = true;
    this.closeController.abort();
    this.session?.abort();

    if (this.running) {
      await this.running;
    } else {
      await this.destroySocket();
    }
  }

  private async backoff(): Promise<void> {
    try {
      await sleep(this.config.reconnectDelayMs, undefined, { signal: this.closeController.signal });
    } catch (err) {
      if (!isAbortError(err)) {
        throw err;
      }
    }
  }

  private async runSession(): Promise<void> {
    const scope = new AbortController();
    this.session = scope;

    const activities = [
      this.supervise('read loop', this.readLoop(scope.signal)),
      this.supervise('send loop', this.sendLoop(scope.signal)),
      this.supervise('watchdog', this.watchdog(scope.signal)),
    ];

    try {
      await Promise.race(activities);
    } finally {
      scope.abort();
      await Promise.all(activities);
      this.session = undefined;
      await this.replacing;
      await this.destroySocket();
    }
  }

  /**
   * Await one session activity, turning its failure into a log entry so the
   * session can end cleanly.
   */
  private async supervise(name: string, activity: Promise<void>): Promise<void> {
    try {
      await activity;
    } catch (err) {
      if (isAbortError(err)) {
        this.logger.debug(`Cancelled ${name}`, { target: this.target });
      } else if (err instanceof TransportError) {
        this.logger.warn('Connection lost', { target: this.target, activity: name, error: describeError(err) });
      } else {
        this.logger.error('Unexpected error', { target: this.target, activity: name, error: describeError(err) });
      }
    } finally {
      this.logger.debug(`Exited ${name}`, { target: this.target });
    }
  }

  private async readLoop(signal: AbortSignal): Promise<void> {
    let badMessages = 0;

    for (;;) {
      // Wait out a socket swap instead of reading the closing socket
      if (this.replacing) {
        await this.replacing;
      }
      const reader = this.reader;
      if (!reader || !this.isConnected || this.shouldClose || signal.aborted) {
        return;
      }

      let message: Message | null;
      try {
        message = await decodeMessage(reader, { extensionTimeoutMs: this.config.extensionTimeoutMs, signal });
      } catch (err) {
        if (!signal.aborted && this.isStale(reader)) {
          continue;
        }
        if (!(err instanceof BadMessageError)) {
          throw err;
        }

        this._lastMessageAt = this.now();
        badMessages += 1;
        this.logger.error('Bad message from device', {
          target: this.target,
          error: err.message,
          consecutive: badMessages,
        });

        if (badMessages >= this.config.maxConsecutiveBadMessages) {
          this.logger.error('Reached threshold for consecutive bad messages; reconnecting', {
            target: this.target,
            threshold: this.config.maxConsecutiveBadMessages,
          });
          badMessages = 0;
          await this.reconnect();
        }
        continue;
      }

      if (message === null) {
        if (this.isStale(reader)) {
          this.logger.debug('Socket replaced; reading from the new one', { target: this.target });
          continue;
        }
        this.logger.debug('Got end of stream', { target: this.target });
        this.setState('disconnected');
        return;
      }

      this._lastMessageAt = this.now();
      badMessages = 0;
      this.sink.dispatch(message);
    }
  }

  /** True once `reader` belongs to a socket that reconnect() has replaced */
  private isStale(reader: StreamReader): boolean {
    return reader !== this.reader || this.replacing !== undefined;
  }

  private async sendLoop(signal: AbortSignal): Promise<void> {
    for (;;) {
      const data = await this.outbox.shift(signal);
      this.logger.debug('Sending from queue', { target: this.target, type: data.type });
      await this.send(data);
    }
  }

  private async watchdog(signal: AbortSignal): Promise<void> {
    const intervalMs = this.config.watchdogIntervalMs ?? this.config.watchdogTimeoutMs;
    this.logger.debug('Starting watchdog', { target: this.target, timeoutMs: this.config.watchdogTimeoutMs });

    for (;;) {
      await sleep(intervalMs, undefined, { signal });

      const silentMs = this.now() - this._lastMessageAt;
      if (silentMs > this.config.watchdogTimeoutMs) {
        this.logger.warn('Last message is too old; assuming connection is dead', {
          target: this.target,
          silentMs,
          timeoutMs: this.config.watchdogTimeoutMs,
        });
        this.setState('disconnected');
        return;
      }
    }
  }

  private async destroySocket(): Promise<void> {
    this.setState('disconnected');
    const socket = this.socket;
    this.socket = undefined;
    this.reader = undefined;
    if (socket) {
      await closeSocket(socket, { logger: this.logger });
    }
  }

  private setState(state: ConnectionState): void {
    if (this._state === state) {
      return;
    }
    this._state = state;
    this.logger.debug('Connection state changed', { target: this.target, state });
    for (const listener of this.stateListeners) {
      listener(state);
    }
  }
}
