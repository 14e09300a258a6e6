import { describe, expect, it, vi } from 'vitest';
import { EventsService, type Event } from '../src/events.js';

describe('EventsService', () => {
  it('delivers to type and global subscribers', async () => {
    const events = new EventsService();
    const typed = vi.fn();
    const global = vi.fn();
    const other = vi.fn();
    events.subscribe('picture.inserted', typed);
    events.subscribe('picture.deleted', other);
    events.subscribeAll(global);

    await events.emit('picture.inserted', { id: 1 });

    expect(typed).toHaveBeenCalledTimes(1);
    expect(global).toHaveBeenCalledTimes(1);
    expect(other).not.toHaveBeenCalled();
    const event: Event = typed.mock.calls[0]?.[0];
    expect(event.type).toBe('picture.inserted');
    expect(event.payload).toEqual({ id: 1 });
  });

  it('keeps delivering when a handler fails', async () => {
    const events = new EventsService();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const after = vi.fn();
    events.subscribe('picture.updated', () => {
      throw new Error('boom');
    });
    events.subscribe('picture.updated', after);

    await events.emit('picture.updated', {});

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  it('stops delivering after unsubscribe', async () => {
    const events = new EventsService();
    const handler = vi.fn();
    const unsubscribe = events.subscribe('picture.deleted', handler);
    unsubscribe();

    await events.emit('picture.deleted', {});

    expect(handler).not.toHaveBeenCalled();
  });

  it('bounds the history', async () => {
    const events = new EventsService(2);
    await events.emit('picture.inserted', 1);
    await events.emit('picture.updated', 2);
    await events.emit('picture.deleted', 3);

    expect(events.getHistory().map((e) => e.payload)).toEqual([2, 3]);
    expect(events.getHistory(undefined, ['picture.deleted']).map((e) => e.payload)).toEqual([3]);
  });
});
