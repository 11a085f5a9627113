import { describe, it, expect, vi } from 'vitest';
import { Dispatcher, entityKey } from '../dispatcher.js';

describe('entityKey', () => {
  it('builds keys per entity', () => {
    expect(entityKey.door(7)).toBe('door:7');
    expect(entityKey.tempCodes(7)).toBe('temp-codes:7');
    expect(entityKey.otrSchedules()).toBe('otr-schedules');
    expect(entityKey.connection()).toBe('connection');
  });
});

describe('Dispatcher', () => {
  it('delivers only to listeners of the published key', () => {
    const dispatcher = new Dispatcher<number>();
    const door7 = vi.fn();
    const door8 = vi.fn();
    dispatcher.subscribe('door:7', door7);
    dispatcher.subscribe('door:8', door8);

    dispatcher.publish('door:7', 1);

    expect(door7).toHaveBeenCalledWith(1, 'door:7');
    expect(door8).not.toHaveBeenCalled();
  });

  it('does not replay values published before subscribing', () => {
    const dispatcher = new Dispatcher<number>();
    dispatcher.publish('door:7', 1);

    const listener = vi.fn();
    dispatcher.subscribe('door:7', listener);

    expect(listener).not.toHaveBeenCalled();
  });

  it('queues values published from inside a listener', () => {
    const dispatcher = new Dispatcher<string>();
    const seen: string[] = [];
    dispatcher.subscribe('door:7', (value) => {
      seen.push(`first:${value}`);
      if (value === 'a') dispatcher.publish('door:8', 'b');
    });
    dispatcher.subscribe('door:7', (value) => seen.push(`second:${value}`));
    dispatcher.subscribe('door:8', (value) => seen.push(`other:${value}`));

    dispatcher.publish('door:7', 'a');

    expect(seen).toEqual(['first:a', 'second:a', 'other:b']);
  });

  it('stops delivery as soon as a listener unsubscribes', () => {
    const dispatcher = new Dispatcher<number>();
    const second = vi.fn();
    let unsubscribeSecond = (): void => {};
    dispatcher.subscribe('door:7', () => unsubscribeSecond());
    unsubscribeSecond = dispatcher.subscribe('door:7', second);

    dispatcher.publish('door:7', 1);
    unsubscribeSecond();

    expect(second).not.toHaveBeenCalled();
    expect(dispatcher.listenerCount('door:7')).toBe(1);
  });

  it('keeps delivering after a listener throws', () => {
    const dispatcher = new Dispatcher<number>();
    const after = vi.fn();
    dispatcher.subscribe('door:7', () => {
      throw new Error('listener failed');
    });
    dispatcher.subscribe('door:7', after);

    dispatcher.publish('door:7', 1);

    expect(after).toHaveBeenCalledWith(1, 'door:7');
  });

  it('drops every subscription on clear', () => {
    const dispatcher = new Dispatcher<number>();
    const listener = vi.fn();
    dispatcher.subscribe('door:7', listener);

    dispatcher.clear();
    dispatcher.publish('door:7', 1);

    expect(listener).not.toHaveBeenCalled();
    expect(dispatcher.listenerCount('door:7')).toBe(0);
  });
});
