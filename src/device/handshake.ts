/**
 * Validation handshake.
 *
 * Before committing to a long-lived connection, confirm the candidate
 * target really is a microphone client: it must greet us with a
 * client-info message carrying its uuid.
 */

import type { Duplex } from 'node:stream';

import { closeSocket, connectTcp, formatTarget, type SocketFactory, type TransportTarget } from '../connection/transport.js';
import { decodeMessage } from '../protocol/codec.js';
import { StreamReader } from '../protocol/stream-reader.js';
import type { Message } from '../protocol/types.js';
import { HandshakeError, ReadTimeoutError, describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 2000;

export interface ValidateDeviceOptions extends TransportTarget {
  timeoutMs?: number;
  transport?: SocketFactory;
  logger?: Logger;
}

/**
 * Connect, read one message and return the device uuid. Throws
 * HandshakeError on any other outcome. The connection is always closed
 * before this returns.
 */
export async function validateDevice(options: ValidateDeviceOptions): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
  const transport = options.transport ?? connectTcp;
  const logger = options.logger ?? createLogger('handshake');
  const target = formatTarget(options);

  logger.debug('Trying to validate connection', { target });

  let socket: Duplex;
  try {
    socket = await transport(options, { timeoutMs });
  } catch (err) {
    throw new HandshakeError(`Could not connect to ${target}: ${describeError(err)}`, { cause: err });
  }

  const deadline = new AbortController();
  const timer = setTimeout(() => {
    deadline.abort(new ReadTimeoutError(`No client info from ${target} within ${timeoutMs}ms`, timeoutMs));
  }, timeoutMs);

  try {
    const reader = new StreamReader(socket);
    let message: Message | null;
    try {
      message = await decodeMessage(reader, { signal: deadline.signal });
    } catch (err) {
      throw new HandshakeError(`Handshake with ${target} failed: ${describeError(err)}`, { cause: err });
    }

    if (message === null) {
      throw new HandshakeError(`${target} closed the connection before sending client info`);
    }
    if (message.kind !== 'client-info') {
      throw new HandshakeError(`Expected client-info from ${target}, got ${JSON.stringify(message.type)}`);
    }

    const uuid = message.data.uuid;
    if (typeof uuid !== 'string' || uuid.length === 0) {
      throw new HandshakeError(`Client info from ${target} has no uuid`);
    }

    logger.info('Validated device', { target, uuid });
    return uuid;
  } finally {
    clearTimeout(timer);
    await closeSocket(socket, { logger });
  }
}
