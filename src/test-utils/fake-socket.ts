/**
 * In-process stand-ins for the device socket. Tests push bytes into the
 * socket as if the device had sent them and inspect what the bridge wrote.
 */

import { Duplex } from 'node:stream';

import type { SocketFactory, TransportTarget } from '../connection/transport.js';
import { TransportError } from '../utils/errors.js';

export interface FakeSocketOptions {
  /** Keep the socket open after the bridge ends its side, like a peer that never answers the FIN */
  holdOpen?: boolean;
}

export class FakeSocket extends Duplex {
  readonly written: Buffer[] = [];
  private readonly holdOpen: boolean;

  constructor(options: FakeSocketOptions = {}) {
    super();
    this.holdOpen = options.holdOpen ?? false;
  }

  override _read(): void {
    // Data is pushed by feed()
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(Buffer.from(chunk));
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    callback();
    // The device closes its end once it sees ours
    if (!this.holdOpen) {
      setImmediate(() => this.destroy());
    }
  }

  /** Deliver bytes as if the device had sent them */
  feed(data: string | Buffer): void {
    this.push(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data);
  }

  /** The device closed its end cleanly */
  hangUp(): void {
    this.push(null);
  }

  /** The connection broke, e.g. ECONNRESET */
  fail(message = 'read ECONNRESET'): void {
    const err: NodeJS.ErrnoException = new Error(message);
    err.code = 'ECONNRESET';
    this.destroy(err);
  }

  /** Everything written by the bridge, split into lines */
  get writtenLines(): string[] {
    return Buffer.concat(this.written)
      .toString('utf-8')
      .split('\n')
      .filter((line) => line.length > 0);
  }
}

/**
 * Socket factory that hands out FakeSockets. Sockets queued with
 * prepare() are used first; otherwise a fresh idle socket is created.
 */
export class FakeTransport {
  readonly sockets: FakeSocket[] = [];
  readonly targets: TransportTarget[] = [];
  private readonly prepared: FakeSocket[] = [];
  private failures = 0;

  get attempts(): number {
    return this.targets.length;
  }

  get latest(): FakeSocket | undefined {
    return this.sockets[this.sockets.length - 1];
  }

  prepare(socket: FakeSocket = new FakeSocket()): FakeSocket {
    this.prepared.push(socket);
    return socket;
  }

  /** Make the next `count` connection attempts fail */
  refuse(count = 1): void {
    this.failures += count;
  }

  readonly connect: SocketFactory = async (target) => {
    this.targets.push({ host: target.host, port: target.port });
    if (this.failures > 0) {
      this.failures -= 1;
      throw new TransportError(`connect ECONNREFUSED ${target.host}:${target.port}`, { code: 'ECONNREFUSED' });
    }
    const socket = this.prepared.shift() ?? new FakeSocket();
    this.sockets.push(socket);
    return socket;
  };
}
