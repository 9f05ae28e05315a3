import { AccountLock } from './account-lock';

describe('AccountLock', () => {
  let lock: AccountLock;

  beforeEach(() => {
    lock = new AccountLock();
  });

  it('should be acquired immediately when free', async () => {
    const release = await lock.acquire(100);

    expect(release).not.toBeNull();
    expect(lock.isLocked).toBe(true);

    release?.();

    expect(lock.isLocked).toBe(false);
  });

  it('should serve waiters in arrival order', async () => {
    const first = await lock.acquire(1000);
    const order: string[] = [];

    const second = lock.acquire(1000).then((release) => {
      order.push('second');
      return release;
    });
    const third = lock.acquire(1000).then((release) => {
      order.push('third');
      release?.();
    });
    expect(lock.queueLength).toBe(2);

    first?.();
    const releaseSecond = await second;

    expect(order).toEqual(['second']);
    expect(lock.isLocked).toBe(true);

    releaseSecond?.();
    await third;

    expect(order).toEqual(['second', 'third']);
    expect(lock.isLocked).toBe(false);
  });

  it('should give up after the timeout and leave the queue', async () => {
    const holder = await lock.acquire(1000);

    const result = await lock.acquire(10);

    expect(result).toBeNull();
    expect(lock.queueLength).toBe(0);
    expect(lock.isLocked).toBe(true);

    holder?.();

    expect(lock.isLocked).toBe(false);
  });

  it('should ignore a second release of the same hold', async () => {
    const first = await lock.acquire(1000);
    const second = lock.acquire(1000);

    first?.();
    const releaseSecond = await second;
    first?.();

    expect(lock.isLocked).toBe(true);

    releaseSecond?.();

    expect(lock.isLocked).toBe(false);
  });
});
