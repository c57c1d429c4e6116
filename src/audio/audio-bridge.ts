/**
 * Audio Bridge
 *
 * Decouples the socket read path from the speech pipeline. The reader
 * enqueues chunks without ever waiting; the pipeline pulls them at its own
 * pace. When the pipeline falls too far behind, the stale backlog is thrown
 * away: old audio is useless to a live recognizer.
 */

import { BoundedQueue } from '../utils/bounded-queue.js';
import { isAbortError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Maximum number of chunks held before the backlog is dumped */
export const DEFAULT_AUDIO_QUEUE_CAPACITY = 2048;

export class AudioBridge {
  private readonly queue: BoundedQueue<Buffer>;
  private readonly logger: Logger;

  constructor(capacity: number = DEFAULT_AUDIO_QUEUE_CAPACITY, logger?: Logger) {
    this.logger = logger ?? createLogger('audio');
    this.queue = new BoundedQueue<Buffer>(capacity, (dropped) => {
      this.logger.error('Chunk queue full, dumping contents', { dropped, capacity });
    });
  }

  get size(): number {
    return this.queue.size;
  }

  get capacity(): number {
    return this.queue.capacity;
  }

  /** Chunks discarded by overflow since construction */
  get droppedChunks(): number {
    return this.queue.dropped;
  }

  /**
   * Add a chunk without blocking. On overflow the queued backlog is dropped
   * and this chunk becomes the only one queued.
   */
  enqueue(chunk: Buffer): void {
    this.queue.push(chunk);
  }

  /** Wait for the next chunk, oldest first. */
  dequeue(signal?: AbortSignal): Promise<Buffer> {
    return this.queue.shift(signal);
  }

  /**
   * Endless stream of chunks for one pipeline run. Each call returns a new
   * iterator over the same queue; the iterator finishes only when `signal`
   * aborts.
   */
  async *stream(signal?: AbortSignal): AsyncGenerator<Buffer, void, undefined> {
    for (;;) {
      let chunk: Buffer;
      try {
        chunk = await this.queue.shift(signal);
      } catch (err) {
        if (signal?.aborted && isAbortError(err)) {
          return;
        }
        throw err;
      }
      yield chunk;
    }
  }

  clear(): number {
    return this.queue.clear();
  }
}
