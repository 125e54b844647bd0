import { describe, it, expect } from 'vitest';
import { KeyedLock, orderKey, productKey } from './lock.js';

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('KeyedLock', () => {
  it('should build namespaced keys', () => {
    expect(productKey('WIDGET')).toBe('product:WIDGET');
    expect(orderKey('ord_1')).toBe('order:ord_1');
  });

  it('should serialize holders of the same key', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const first = lock.runExclusive(['a'], async () => {
      events.push('first:start');
      await tick();
      events.push('first:end');
    });
    const second = lock.runExclusive(['a'], async () => {
      events.push('second:start');
      events.push('second:end');
    });

    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should let disjoint keys run concurrently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const first = lock.runExclusive(['a'], async () => {
      events.push('a:start');
      await tick();
      events.push('a:end');
    });
    const second = lock.runExclusive(['b'], async () => {
      events.push('b:start');
      events.push('b:end');
    });

    await Promise.all([first, second]);

    expect(events.indexOf('b:end')).toBeLessThan(events.indexOf('a:end'));
  });

  it('should serialize disjoint keys in global mode', async () => {
    const lock = new KeyedLock('global');
    const events: string[] = [];

    const first = lock.runExclusive(['a'], async () => {
      events.push('a:start');
      await tick();
      events.push('a:end');
    });
    const second = lock.runExclusive(['b'], async () => {
      events.push('b:start');
    });

    await Promise.all([first, second]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start']);
  });

  it('should not deadlock on overlapping sets taken in opposite order', async () => {
    const lock = new KeyedLock();
    let completed = 0;

    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        lock.runExclusive(i % 2 === 0 ? ['x', 'y'] : ['y', 'x'], async () => {
          await tick();
          completed++;
        })
      )
    );

    expect(completed).toBe(10);
    expect(lock.size).toBe(0);
  });

  it('should reuse a held handle that covers the keys', async () => {
    const lock = new KeyedLock();

    const value = await lock.runExclusive(['a', 'b'], (outer) =>
      lock.runExclusive(['b'], async (inner) => {
        expect(inner).toBe(outer);
        return 42;
      }, outer)
    );

    expect(value).toBe(42);
  });

  it('should acquire keys a held handle does not cover', async () => {
    const lock = new KeyedLock();

    await lock.runExclusive(['order:1'], async (orderHandle) => {
      await lock.runExclusive(['product:a'], async (stockHandle) => {
        expect(stockHandle).not.toBe(orderHandle);
        expect(stockHandle.covers(['product:a'])).toBe(true);
      }, orderHandle);
    });

    expect(lock.size).toBe(0);
  });

  it('should cover every key once held in global mode', async () => {
    const lock = new KeyedLock('global');

    await lock.runExclusive(['order:1'], async (handle) => {
      expect(handle.covers(['product:a', 'product:b'])).toBe(true);
    });
  });

  it('should release keys when fn throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive(['a'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const value = await lock.runExclusive(['a'], async () => 'free');

    expect(value).toBe('free');
    expect(lock.size).toBe(0);
  });

  describe('snapshot', () => {
    it('should wait for current holders to release', async () => {
      const lock = new KeyedLock();
      const handle = await lock.acquire(['a']);
      let ran = false;

      const reading = lock.snapshot(async () => {
        ran = true;
      });
      await tick();
      expect(ran).toBe(false);

      handle.release();
      await reading;

      expect(ran).toBe(true);
    });

    it('should hold back new acquisitions until it finishes', async () => {
      const lock = new KeyedLock();
      const events: string[] = [];

      const reading = lock.snapshot(async () => {
        events.push('snapshot:start');
        await tick();
        events.push('snapshot:end');
      });
      const writer = lock.runExclusive(['a'], async () => {
        events.push('writer');
      });

      await Promise.all([reading, writer]);

      expect(events).toEqual(['snapshot:start', 'snapshot:end', 'writer']);
    });

    it('should let a holder take nested keys while it waits', async () => {
      const lock = new KeyedLock();
      const events: string[] = [];
      const outer = await lock.acquire(['order:1']);

      const reading = lock.snapshot(async () => {
        events.push('snapshot');
      });
      await lock.runExclusive(['product:a'], async () => {
        events.push('nested');
      }, outer);
      outer.release();
      await reading;

      expect(events).toEqual(['nested', 'snapshot']);
      expect(lock.size).toBe(0);
    });

    it('should return the value of fn and reopen when fn throws', async () => {
      const lock = new KeyedLock();

      await expect(
        lock.snapshot(async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await lock.snapshot(async () => 7)).toBe(7);
      expect(await lock.runExclusive(['a'], async () => 'free')).toBe('free');
    });
  });

  it('should stop covering after release', async () => {
    const lock = new KeyedLock();
    const handle = await lock.acquire(['a']);

    expect(handle.covers(['a'])).toBe(true);
    handle.release();
    handle.release();

    expect(handle.isReleased).toBe(true);
    expect(handle.covers(['a'])).toBe(false);
    expect(lock.size).toBe(0);
  });
});
