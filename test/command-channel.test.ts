import { describe, expect, it } from 'vitest';
import { CommandChannel } from '../src/state/command-channel.js';

describe('CommandChannel', () => {
  it('delivers items in publish order on a later turn', async () => {
    const channel = new CommandChannel<number>();
    const seen: number[] = [];
    channel.consume((n) => {
      seen.push(n);
    });

    channel.publish(1);
    channel.publish(2);
    channel.publish(3);
    expect(seen).toEqual([]);

    await channel.whenIdle();
    expect(seen).toEqual([1, 2, 3]);
  });

  it('awaits each item before handing over the next', async () => {
    const channel = new CommandChannel<string>();
    const log: string[] = [];
    channel.consume(async (item) => {
      log.push(`start ${item}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push(`end ${item}`);
    });

    channel.publish('a');
    channel.publish('b');
    await channel.whenIdle();

    expect(log).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('keeps draining after a handler throws', async () => {
    const channel = new CommandChannel<number>();
    const seen: number[] = [];
    channel.consume((n) => {
      if (n === 1) throw new Error('handler boom');
      seen.push(n);
    });

    channel.publish(1);
    channel.publish(2);
    await channel.whenIdle();

    expect(seen).toEqual([2]);
  });

  it('holds items until a consumer attaches', async () => {
    const channel = new CommandChannel<number>();
    channel.publish(7);
    expect(channel.size).toBe(1);

    const seen: number[] = [];
    channel.consume((n) => {
      seen.push(n);
    });
    await channel.whenIdle();

    expect(seen).toEqual([7]);
    expect(channel.size).toBe(0);
  });

  it('rejects new items after close but delivers queued ones', async () => {
    const channel = new CommandChannel<number>();
    const seen: number[] = [];
    channel.consume((n) => {
      seen.push(n);
    });

    expect(channel.publish(1)).toBe(true);
    channel.close();
    expect(channel.publish(2)).toBe(false);
    expect(channel.isClosed).toBe(true);

    await channel.whenIdle();
    expect(seen).toEqual([1]);
  });

  it('drops items beyond the pending limit', () => {
    const channel = new CommandChannel<number>();
    let accepted = 0;
    for (let i = 0; i < 300; i++) if (channel.publish(i)) accepted++;
    expect(accepted).toBe(256);
  });
});
