/**
 * Pull-style reader over a Node readable stream.
 *
 * Buffers incoming chunks and hands them out as newline-terminated lines or
 * exact-length blocks. Only one read may be pending at a time; the protocol
 * has a single reader per socket.
 */

import type { Readable } from 'node:stream';

import { BadMessageError, ReadTimeoutError, TransportError } from '../utils/errors.js';

export const NEWLINE = 0x0a;
export const DEFAULT_MAX_LINE_BYTES = 64 * 1024;

export interface StreamReaderOptions {
  /** Longest header line accepted before it is discarded as bad */
  maxLineBytes?: number;
}

const EMPTY = Buffer.alloc(0);

export class StreamReader {
  private buffer: Buffer = EMPTY;
  private ended = false;
  private failure?: TransportError;
  private discardingLine = false;
  private wake?: () => void;
  private readonly maxLineBytes: number;

  constructor(stream: Readable, options: StreamReaderOptions = {}) {
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;

    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
      this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);
      this.notify();
    });
    stream.on('end', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('close', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('error', (err: NodeJS.ErrnoException) => {
      this.failure = new TransportError(err.message, { cause: err, code: err.code });
      this.notify();
    });
  }

  /** Bytes received but not yet handed out */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /**
   * Read through the next `\n`, terminator included. At end of stream the
   * remaining partial line is returned, or an empty buffer if nothing is
   * left. Throws BadMessageError for a line over `maxLineBytes` after
   * consuming it.
   */
  async readLine(signal?: AbortSignal): Promise<Buffer> {
    for (;;) {
      const newline = this.buffer.indexOf(NEWLINE);

      if (newline !== -1) {
        const line = this.take(newline + 1);
        if (this.discardingLine || line.length > this.maxLineBytes) {
          this.discardingLine = false;
          throw new BadMessageError(`Line exceeds ${this.maxLineBytes} bytes`, line.subarray(0, 128));
        }
        return line;
      }

      if (this.buffer.length > this.maxLineBytes) {
        this.discardingLine = true;
        this.buffer = EMPTY;
      }

      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        if (this.discardingLine) {
          this.discardingLine = false;
          return EMPTY;
        }
        return this.take(this.buffer.length);
      }

      await this.waitForData(signal);
    }
  }

  /**
   * Read exactly `length` bytes. Nothing is consumed unless all of them
   * arrive within `timeoutMs`.
   */
  async readExactly(length: number, timeoutMs: number, signal?: AbortSignal): Promise<Buffer> {
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(new ReadTimeoutError(`Timed out waiting for ${length} bytes`, timeoutMs));
    }, timeoutMs);
    const onAbort = (): void => deadline.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      for (;;) {
        if (this.buffer.length >= length) {
          return this.take(length);
        }
        if (this.failure) {
          throw this.failure;
        }
        if (this.ended) {
          throw new BadMessageError(
            `Stream ended after ${this.buffer.length} of ${length} bytes`,
            Buffer.from(this.buffer)
          );
        }
        await this.waitForData(deadline.signal);
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private take(length: number): Buffer {
    const chunk = this.buffer.subarray(0, length);
    this.buffer = length >= this.buffer.length ? EMPTY : this.buffer.subarray(length);
    return chunk;
  }

  private notify(): void {
    this.wake?.();
  }

  private waitForData(signal?: AbortSignal): Promise<void> {
    if (this.wake) {
      return Promise.reject(new Error('StreamReader does not support concurrent reads'));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.wake = undefined;
        reject(signal?.reason);
      };
      this.wake = () => {
        this.wake = undefined;
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
