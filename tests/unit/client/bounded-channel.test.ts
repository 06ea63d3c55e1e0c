import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../../../src/client/bounded-channel';

async function drain<T>(channel: BoundedChannel<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of channel) items.push(item);
  return items;
}

describe('BoundedChannel', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedChannel<number>(0, 'block')).toThrow(RangeError);
  });

  it('hands a value straight to a waiting consumer', async () => {
    const channel = new BoundedChannel<number>(1, 'block');
    const next = channel.next();

    await channel.push(5);

    await expect(next).resolves.toEqual({ done: false, value: 5 });
    expect(channel.size).toBe(0);
  });

  it('discards the oldest values when full under drop-oldest', async () => {
    const channel = new BoundedChannel<number>(2, 'drop-oldest');

    await channel.push(1);
    await channel.push(2);
    await channel.push(3);
    channel.close();

    expect(channel.dropped).toBe(1);
    await expect(drain(channel)).resolves.toEqual([2, 3]);
  });

  it('holds the producer until there is room under block', async () => {
    const channel = new BoundedChannel<number>(1, 'block');
    let delivered = false;

    await channel.push(1);
    const blocked = channel.push(2).then(() => {
      delivered = true;
    });
    await Promise.resolve();
    expect(delivered).toBe(false);

    await expect(channel.next()).resolves.toEqual({ done: false, value: 1 });
    await blocked;
    expect(delivered).toBe(true);

    channel.close();
    await expect(drain(channel)).resolves.toEqual([2]);
    expect(channel.dropped).toBe(0);
  });

  it('drains buffered values before surfacing a failure', async () => {
    const channel = new BoundedChannel<string>(4, 'block');
    await channel.push('a');
    channel.fail(new Error('stream broke'));

    await expect(channel.next()).resolves.toEqual({ done: false, value: 'a' });
    await expect(channel.next()).rejects.toThrow('stream broke');
    await expect(channel.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('rejects a consumer already waiting when the producer fails', async () => {
    const channel = new BoundedChannel<string>(4, 'block');
    const waiting = channel.next();

    channel.fail(new Error('handshake refused'));

    await expect(waiting).rejects.toThrow('handshake refused');
  });

  it('signals cancellation when the consumer stops iterating', async () => {
    const channel = new BoundedChannel<number>(1, 'block');
    let cancelled = 0;
    channel.onCancel(() => cancelled++);

    await channel.push(1);
    const blocked = channel.push(2);

    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }

    await expect(blocked).resolves.toBeUndefined();
    expect(cancelled).toBe(1);
    expect(channel.cancelled).toBe(true);
    expect(channel.open).toBe(false);

    await channel.push(3);
    expect(channel.size).toBe(0);

    let late = 0;
    channel.onCancel(() => late++);
    expect(late).toBe(1);
  });
});
