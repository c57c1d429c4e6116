import { afterEach, describe, it, expect, vi } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';

import type { Message } from '../protocol/types.js';
import { FakeTransport } from '../test-utils/fake-socket.js';
import { createLogger } from '../utils/logger.js';
import { ConnectionManager, type ConnectionManagerConfig, type ConnectionState } from './connection-manager.js';

const silent = createLogger('test', { level: 'silent' });

describe('ConnectionManager', () => {
  const managers: ConnectionManager[] = [];

  afterEach(async () => {
    await Promise.all(managers.splice(0).map((manager) => manager.close()));
  });

  function setup(overrides: Partial<ConnectionManagerConfig> = {}, now?: () => number) {
    const transport = new FakeTransport();
    const messages: Message[] = [];
    const states: ConnectionState[] = [];
    const manager = new ConnectionManager(
      { host: 'mic.local', port: 11700, reconnectDelayMs: 10, ...overrides },
      {
        sink: { dispatch: (message) => messages.push(message) },
        transport: transport.connect,
        logger: silent,
        now,
      }
    );
    manager.onStateChange((state) => states.push(state));
    managers.push(manager);
    return { manager, transport, messages, states };
  }

  it('connects and dispatches messages in arrival order', async () => {
    const { manager, transport, messages } = setup();
    const socket = transport.prepare();

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    socket.feed('{"type":"client-info","data":{"uuid":"mic-1"}}\n{"type":"ping"}\n');

    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(messages.map((message) => message.kind)).toEqual(['client-info', 'ping']);
    expect(transport.targets).toEqual([{ host: 'mic.local', port: 11700 }]);
  });

  it('reports state transitions to listeners', async () => {
    const { manager, states } = setup();

    const running = manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    await manager.close();
    await running;

    expect(states).toEqual(['connecting', 'connected', 'disconnected']);
  });

  it('reconnects after five consecutive bad messages', async () => {
    const { manager, transport, messages } = setup();
    transport.prepare().feed('bad\n'.repeat(5));
    const second = transport.prepare();

    void manager.run();
    await vi.waitFor(() => {
      expect(transport.attempts).toBe(2);
      expect(manager.isConnected).toBe(true);
    });

    second.feed('{"type":"ping"}\n');
    await vi.waitFor(() => expect(messages).toHaveLength(1));
    expect(transport.attempts).toBe(2);
  });

  it('keeps the session running over the new socket after reconnect()', async () => {
    const { manager, transport, messages } = setup();
    const first = transport.prepare();
    const second = transport.prepare();

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    await manager.reconnect();
    second.feed('{"type":"ping"}\n');

    await vi.waitFor(() => expect(messages.map((message) => message.kind)).toEqual(['ping']));
    await sleep(50);
    expect(first.destroyed).toBe(true);
    expect(second.destroyed).toBe(false);
    expect(transport.attempts).toBe(2);
    expect(manager.isConnected).toBe(true);
  });

  it('shares one attempt between concurrent reconnect() calls', async () => {
    const { manager, transport } = setup();

    await Promise.all([manager.reconnect(), manager.reconnect()]);

    expect(transport.attempts).toBe(1);
    expect(manager.isConnected).toBe(true);
  });

  it('resets the bad message count after a good message', async () => {
    const { manager, transport, messages } = setup();
    const socket = transport.prepare();

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    socket.feed('bad\n'.repeat(4));
    socket.feed('{"type":"ping"}\n');
    socket.feed('bad\n'.repeat(4));
    socket.feed('{"type":"client-info","data":{"uuid":"mic-1"}}\n');

    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(transport.attempts).toBe(1);
    expect(manager.isConnected).toBe(true);
  });

  it('treats a bad message as activity', async () => {
    let clock = 1000;
    const { manager, transport } = setup({}, () => clock);
    const socket = transport.prepare();

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    clock = 5000;
    socket.feed('garbage\n');

    await vi.waitFor(() => expect(manager.lastMessageAt).toBe(5000));
  });

  it('reconnects when the device closes the connection', async () => {
    const { manager, transport } = setup();
    transport.prepare().hangUp();

    void manager.run();

    await vi.waitFor(() => {
      expect(transport.attempts).toBe(2);
      expect(manager.isConnected).toBe(true);
    });
  });

  it('reconnects when the socket errors', async () => {
    const { manager, transport } = setup();
    const first = transport.prepare();

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    first.fail();

    await vi.waitFor(() => {
      expect(transport.attempts).toBe(2);
      expect(manager.isConnected).toBe(true);
    });
  });

  it('drops a silent connection once the watchdog expires', async () => {
    const { manager, transport, states } = setup({ watchdogTimeoutMs: 40, watchdogIntervalMs: 10 });

    void manager.run();

    await vi.waitFor(() => expect(transport.attempts).toBeGreaterThanOrEqual(2));
    expect(states.slice(0, 4)).toEqual(['connecting', 'connected', 'disconnected', 'connecting']);
  });

  it('keeps retrying when connections are refused', async () => {
    const { manager, transport } = setup();
    transport.refuse(2);

    await expect(manager.reconnect()).resolves.toBeUndefined();
    expect(manager.state).toBe('disconnected');

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));
    expect(transport.attempts).toBe(3);
  });

  it('flushes queued messages in order once connected', async () => {
    const { manager, transport } = setup();
    const socket = transport.prepare();
    manager.enqueueSend({ type: 'play-tts', data: { url: 'http://host/1.mp3' } });
    manager.enqueueSend({ type: 'play-tts', data: { url: 'http://host/2.mp3' } });
    expect(manager.pendingSends).toBe(2);

    void manager.run();

    await vi.waitFor(() => expect(socket.writtenLines).toHaveLength(2));
    expect(socket.writtenLines).toEqual([
      '{"type":"play-tts","data":{"url":"http://host/1.mp3"}}',
      '{"type":"play-tts","data":{"url":"http://host/2.mp3"}}',
    ]);
    expect(manager.pendingSends).toBe(0);
  });

  it('keeps only the newest message when the outbox overflows', async () => {
    const { manager, transport } = setup({ outboxCapacity: 2 });
    const socket = transport.prepare();
    manager.enqueueSend({ type: 'ping' });
    manager.enqueueSend({ type: 'ping' });
    manager.enqueueSend({ type: 'play-tts', data: { url: 'http://host/3.mp3' } });

    void manager.run();

    await vi.waitFor(() => expect(socket.writtenLines).toHaveLength(1));
    expect(socket.writtenLines[0]).toBe('{"type":"play-tts","data":{"url":"http://host/3.mp3"}}');
  });

  it('refuses to send without a socket', async () => {
    const { manager } = setup();

    await expect(manager.send({ type: 'ping' })).resolves.toBe(false);
  });

  it('writes immediately with send() while connected', async () => {
    const { manager, transport } = setup();
    const socket = transport.prepare();

    void manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));

    await expect(manager.send({ type: 'ping' })).resolves.toBe(true);
    expect(socket.writtenLines).toEqual(['{"type":"ping"}']);
  });

  it('returns the same promise from repeated close() calls', async () => {
    const { manager } = setup();

    const running = manager.run();
    await vi.waitFor(() => expect(manager.isConnected).toBe(true));

    const first = manager.close();
    expect(manager.close()).toBe(first);
    await first;
    await running;
    expect(manager.state).toBe('disconnected');
  });

  it('returns the same promise from repeated run() calls', () => {
    const { manager } = setup();

    expect(manager.run()).toBe(manager.run());
  });

  it('interrupts the reconnect backoff on close', async () => {
    const { manager, transport } = setup({ reconnectDelayMs: 60_000 });
    transport.refuse(1);

    const running = manager.run();
    await vi.waitFor(() => expect(transport.attempts).toBe(1));

    await manager.close();
    await running;
    expect(transport.attempts).toBe(1);
  });

  it('does not connect after close', async () => {
    const { manager, transport } = setup();

    await manager.close();
    await manager.run();

    expect(transport.attempts).toBe(0);
    expect(manager.state).toBe('disconnected');
  });
});
