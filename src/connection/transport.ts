/**
 * TCP transport for the microphone client.
 *
 * The connection manager only needs "give me a duplex stream to host:port",
 * so the socket factory is injectable; tests substitute in-process streams.
 */

import net from 'node:net';
import type { Duplex } from 'node:stream';

import { ConnectionTimeoutError, TransportError, describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface TransportTarget {
  host: string;
  port: number;
}

export interface ConnectOptions {
  /** Connection timeout in milliseconds */
  timeoutMs: number;
}

export type SocketFactory = (target: TransportTarget, options: ConnectOptions) => Promise<Duplex>;

export function formatTarget(target: TransportTarget): string {
  return `${target.host}:${target.port}`;
}

/**
 * Open a TCP connection. Rejects with ConnectionTimeoutError or
 * TransportError; never leaves a half-open socket behind.
 */
export const connectTcp: SocketFactory = (target, options) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = net.createConnection({ host: target.host, port: target.port });

    const timeout = setTimeout(() => {
      socket.destroy();
      reject(new ConnectionTimeoutError(formatTarget(target), options.timeoutMs));
    }, options.timeoutMs);

    const onError = (err: NodeJS.ErrnoException): void => {
      clearTimeout(timeout);
      socket.destroy();
      reject(new TransportError(`Failed to connect to ${formatTarget(target)}: ${err.message}`, {
        cause: err,
        code: err.code,
      }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timeout);
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });

/** How long a closing socket may take to flush before it is destroyed */
export const CLOSE_GRACE_MS = 2000;

export interface CloseSocketOptions {
  logger?: Logger;
  graceMs?: number;
}

/**
 * End the write side and resolve once the socket has closed. Writes still
 * buffered get up to `graceMs` to drain; after that the socket is
 * destroyed. Errors raised by the teardown itself (typically a reset) are
 * logged at debug level and not propagated.
 */
export function closeSocket(socket: Duplex, options: CloseSocketOptions = {}): Promise<void> {
  const { logger, graceMs = CLOSE_GRACE_MS } = options;
  if (socket.closed) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    socket.on('error', (err) => {
      logger?.debug('Ignoring socket error during close', { error: describeError(err) });
    });

    const grace = setTimeout(() => {
      logger?.debug('Socket did not close in time; destroying it', { graceMs });
      socket.destroy();
    }, graceMs);
    grace.unref();

    socket.once('close', () => {
      clearTimeout(grace);
      resolve();
    });

    if (socket.destroyed) {
      return;
    }
    socket.end();
  });
}
