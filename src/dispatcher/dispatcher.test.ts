import { describe, it, expect, vi } from 'vitest';

import { createMessage } from '../protocol/types.js';
import { createLogger } from '../utils/logger.js';
import { Dispatcher } from './dispatcher.js';

const silent = createLogger('test', { level: 'silent' });

function setup() {
  const enqueue = vi.fn<(chunk: Buffer) => void>();
  const dispatcher = new Dispatcher({ enqueue }, silent);
  return { dispatcher, enqueue };
}

describe('Dispatcher', () => {
  it('forwards audio payloads to the audio sink', () => {
    const { dispatcher, enqueue } = setup();
    const payload = Buffer.from([1, 2, 3, 4]);

    dispatcher.dispatch(createMessage('audio-chunk', {}, payload));

    expect(enqueue).toHaveBeenCalledTimes(1);
    expect(enqueue).toHaveBeenCalledWith(payload);
  });

  it('ignores audio chunks without payload', () => {
    const { dispatcher, enqueue } = setup();

    dispatcher.dispatch(createMessage('audio-chunk'));

    expect(enqueue).not.toHaveBeenCalled();
  });

  it('stores the latest client info', () => {
    const { dispatcher } = setup();
    expect(dispatcher.clientInfo).toBeUndefined();

    dispatcher.dispatch(createMessage('client-info', { uuid: 'mic-1' }));
    dispatcher.dispatch(createMessage('client-info', { uuid: 'mic-2', name: 'Kitchen' }));

    expect(dispatcher.clientInfo).toEqual({ uuid: 'mic-2', name: 'Kitchen' });
  });

  it('ignores pings, play-tts and unknown messages', () => {
    const { dispatcher, enqueue } = setup();

    dispatcher.dispatch(createMessage('ping'));
    dispatcher.dispatch(createMessage('play-tts', { url: 'http://host/a.mp3' }));
    dispatcher.dispatch(createMessage('volume-change', { level: 3 }, Buffer.from([9])));
    dispatcher.dispatch(createMessage(7));

    expect(enqueue).not.toHaveBeenCalled();
    expect(dispatcher.clientInfo).toBeUndefined();
  });

  it('logs unknown messages with their data and payload size', () => {
    const warnings: unknown[] = [];
    const logger = createLogger('test', {
      level: 'warn',
      destination: { write: (chunk: string) => warnings.push(JSON.parse(chunk)) },
    });
    const dispatcher = new Dispatcher({ enqueue: vi.fn() }, logger);

    dispatcher.dispatch(createMessage('volume-change', { level: 3 }, Buffer.from([9])));

    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      msg: 'Got an unknown message; ignoring it',
      message: 'Message (unknown): {"level":3} (payload 1 bytes)',
    });
  });

  it('notifies observers only when connectivity changes', () => {
    const { dispatcher } = setup();
    const seen: boolean[] = [];
    dispatcher.addObserver({ onConnectionStateChange: (connected) => seen.push(connected) });

    dispatcher.handleConnectionStateChange('connecting');
    dispatcher.handleConnectionStateChange('connected');
    dispatcher.handleConnectionStateChange('connected');
    dispatcher.handleConnectionStateChange('disconnected');
    dispatcher.handleConnectionStateChange('connecting');

    expect(seen).toEqual([true, false]);
    expect(dispatcher.isConnected).toBe(false);
  });

  it('keeps notifying when an observer throws', () => {
    const { dispatcher } = setup();
    const healthy = vi.fn();
    dispatcher.addObserver({
      onConnectionStateChange: () => {
        throw new Error('observer broke');
      },
    });
    dispatcher.addObserver({ onConnectionStateChange: healthy });

    dispatcher.handleConnectionStateChange('connected');

    expect(healthy).toHaveBeenCalledWith(true);
  });

  it('stops notifying removed observers', () => {
    const { dispatcher } = setup();
    const observer = vi.fn();
    const remove = dispatcher.addObserver({ onConnectionStateChange: observer });

    remove();
    dispatcher.handleConnectionStateChange('connected');

    expect(observer).not.toHaveBeenCalled();
  });
});
