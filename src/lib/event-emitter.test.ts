import { describe, expect, test, vi } from 'vitest';
import { EventEmitterProtected } from './event-emitter';
import { sleep } from './sleep';

interface TestEvents {
  ping: { count: number };
  done: undefined;
}

class TestEmitter extends EventEmitterProtected<TestEvents> {
  public fire<K extends keyof TestEvents>(event: K, data: TestEvents[K]): void {
    this.emit(event, data);
  }
}

describe('EventEmitterProtected listeners', () => {
  test('delivers data to every listener', () => {
    const emitter = new TestEmitter();
    const received: number[] = [];

    emitter.on('ping', ({ count }) => {
      received.push(count);
    });
    emitter.on('ping', ({ count }) => {
      received.push(count * 10);
    });

    emitter.fire('ping', { count: 2 });

    expect(received).toEqual([2, 20]);
  });

  test('unsubscribe removes the listener', () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();

    const off = emitter.on('ping', listener);
    expect(emitter.listenerCount('ping')).toBe(1);

    off();
    emitter.fire('ping', { count: 1 });

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.hasListeners('ping')).toBe(false);
  });

  test('once listeners fire a single time', () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();

    emitter.once('done', listener);
    emitter.fire('done', undefined);
    emitter.fire('done', undefined);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  test('clear removes one event or all of them', () => {
    const emitter = new TestEmitter();
    emitter.on('ping', vi.fn());
    emitter.on('done', vi.fn());

    emitter.clear('ping');
    expect(emitter.listenerCount('ping')).toBe(0);
    expect(emitter.listenerCount('done')).toBe(1);

    emitter.clear();
    expect(emitter.listenerCount('done')).toBe(0);
  });

  test('sync listener errors go to the error handler and later listeners still run', () => {
    const onListenerError = vi.fn();
    const emitter = new TestEmitter({ onListenerError });
    const after = vi.fn();

    emitter.on('ping', () => {
      throw new Error('listener broke');
    });
    emitter.on('ping', after);

    emitter.fire('ping', { count: 1 });

    expect(after).toHaveBeenCalledTimes(1);
    expect(onListenerError).toHaveBeenCalledTimes(1);
    expect(onListenerError.mock.calls[0]?.[0]).toBe('ping');
  });

  test('async listener rejections go to the error handler', async () => {
    const onListenerError = vi.fn();
    const emitter = new TestEmitter({ onListenerError });

    emitter.on('ping', async () => {
      await sleep(1);
      throw new Error('late failure');
    });

    emitter.fire('ping', { count: 1 });
    await sleep(20);

    expect(onListenerError).toHaveBeenCalledTimes(1);
  });
});

describe('EventEmitterProtected', () => {
  class Counter extends EventEmitterProtected<TestEvents> {
    private count = 0;

    public increment(): void {
      this.count++;
      this.emit('ping', { count: this.count });
    }
  }

  test('subclasses emit through the protected method', () => {
    const counter = new Counter();
    const seen: number[] = [];
    counter.on('ping', ({ count }) => {
      seen.push(count);
    });

    counter.increment();
    counter.increment();

    expect(seen).toEqual([1, 2]);
  });
});
