import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';

import { FakeSocket } from '../test-utils/fake-socket.js';
import { closeSocket, formatTarget } from './transport.js';

describe('formatTarget', () => {
  it('joins host and port', () => {
    expect(formatTarget({ host: '192.168.1.40', port: 11700 })).toBe('192.168.1.40:11700');
  });
});

describe('closeSocket', () => {
  it('resolves once the socket has closed', async () => {
    const socket = new FakeSocket();

    await closeSocket(socket);

    expect(socket.destroyed).toBe(true);
    expect(socket.closed).toBe(true);
  });

  it('resolves immediately for a socket that is already closed', async () => {
    const socket = new FakeSocket();
    await closeSocket(socket);

    await expect(closeSocket(socket)).resolves.toBeUndefined();
  });

  it('flushes pending writes before closing', async () => {
    const socket = new SlowSocket();
    socket.write('{"type":"play-tts","data":{"url":"http://hass.local/a.mp3"}}\n');
    socket.write('{"type":"play-tts","data":{"url":"http://hass.local/b.mp3"}}\n');
    socket.write('{"type":"play-tts","data":{"url":"http://hass.local/c.mp3"}}\n');

    await closeSocket(socket);

    expect(socket.writtenLines).toEqual([
      '{"type":"play-tts","data":{"url":"http://hass.local/a.mp3"}}',
      '{"type":"play-tts","data":{"url":"http://hass.local/b.mp3"}}',
      '{"type":"play-tts","data":{"url":"http://hass.local/c.mp3"}}',
    ]);
    expect(socket.closed).toBe(true);
  });

  it('destroys a socket that does not close within the grace period', async () => {
    const socket = new FakeSocket({ holdOpen: true });

    await closeSocket(socket, { graceMs: 20 });

    expect(socket.writableFinished).toBe(true);
    expect(socket.destroyed).toBe(true);
  });
});

/** Acknowledges each write a few milliseconds later, like a busy network */
class SlowSocket extends FakeSocket {
  override _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    void sleep(5).then(() => super._write(chunk, encoding, callback));
  }
}
