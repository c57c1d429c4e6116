import { describe, it, expect } from 'vitest';

import { createLogger } from '../utils/logger.js';
import { AudioBridge, DEFAULT_AUDIO_QUEUE_CAPACITY } from './audio-bridge.js';

const silent = createLogger('test', { level: 'silent' });

function chunk(n: number): Buffer {
  return Buffer.from([n & 0xff, (n >> 8) & 0xff]);
}

describe('AudioBridge', () => {
  it('defaults to a capacity of 2048 chunks', () => {
    const bridge = new AudioBridge(undefined, silent);

    expect(bridge.capacity).toBe(DEFAULT_AUDIO_QUEUE_CAPACITY);
    expect(bridge.capacity).toBe(2048);
  });

  it('delivers chunks oldest first', async () => {
    const bridge = new AudioBridge(8, silent);
    bridge.enqueue(chunk(1));
    bridge.enqueue(chunk(2));

    expect(await bridge.dequeue()).toEqual(chunk(1));
    expect(await bridge.dequeue()).toEqual(chunk(2));
  });

  it('keeps only the newest chunk after an overflow', async () => {
    const bridge = new AudioBridge(DEFAULT_AUDIO_QUEUE_CAPACITY, silent);
    for (let i = 0; i <= DEFAULT_AUDIO_QUEUE_CAPACITY; i++) {
      bridge.enqueue(chunk(i));
    }

    expect(bridge.size).toBe(1);
    expect(bridge.droppedChunks).toBe(2048);
    expect(await bridge.dequeue()).toEqual(chunk(2048));
  });

  it('streams chunks until the signal aborts', async () => {
    const bridge = new AudioBridge(8, silent);
    const controller = new AbortController();
    bridge.enqueue(chunk(1));
    bridge.enqueue(chunk(2));

    const received: Buffer[] = [];
    for await (const data of bridge.stream(controller.signal)) {
      received.push(data);
      if (received.length === 2) {
        controller.abort();
      }
    }

    expect(received).toEqual([chunk(1), chunk(2)]);
  });

  it('ends a waiting stream when the signal aborts', async () => {
    const bridge = new AudioBridge(8, silent);
    const controller = new AbortController();
    const iterator = bridge.stream(controller.signal);

    const next = iterator.next();
    controller.abort();

    await expect(next).resolves.toEqual({ done: true, value: undefined });
  });

  it('clear() empties the queue', () => {
    const bridge = new AudioBridge(8, silent);
    bridge.enqueue(chunk(1));
    bridge.enqueue(chunk(2));

    expect(bridge.clear()).toBe(2);
    expect(bridge.size).toBe(0);
  });
});
