import { Semaphore } from '../../src/coordination/semaphore';
import { ResultChannel } from '../../src/coordination/result-channel';

describe('Semaphore', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore capacity must be a positive integer, got 0');
  });

  it('queues acquirers beyond capacity in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const first = await semaphore.acquire();
    const order: string[] = [];
    const second = semaphore.acquire().then((release) => {
      order.push('second');
      return release;
    });
    const third = semaphore.acquire().then((release) => {
      order.push('third');
      return release;
    });
    expect(semaphore.inUse).toBe(1);
    expect(semaphore.pending).toBe(2);

    first();
    (await second)();
    (await third)();
    expect(order).toEqual(['second', 'third']);
    expect(semaphore.inUse).toBe(0);
  });

  it('ignores a second release', async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();
    release();
    release();
    expect(semaphore.inUse).toBe(0);
  });

  it('drops an aborted waiter', async () => {
    const semaphore = new Semaphore(1);
    const held = await semaphore.acquire();
    const controller = new AbortController();
    const waiting = semaphore.acquire(controller.signal);
    controller.abort();
    await expect(waiting).rejects.toThrow('Semaphore acquire aborted');
    expect(semaphore.pending).toBe(0);
    held();
  });

  it('releases after a task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(async () => {
      throw new Error('task failed');
    })).rejects.toThrow('task failed');
    expect(semaphore.inUse).toBe(0);
  });
});

describe('ResultChannel', () => {
  it('delivers buffered messages in arrival order', async () => {
    const channel = new ResultChannel<number>();
    channel.send(1);
    channel.send(2);
    expect(channel.size).toBe(2);
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
  });

  it('resolves a waiting receiver on send', async () => {
    const channel = new ResultChannel<string>();
    const pending = channel.receive();
    channel.send('done');
    expect(await pending).toBe('done');
    expect(channel.size).toBe(0);
  });

  it('stops accepting messages once closed', async () => {
    const channel = new ResultChannel<string>();
    channel.close();
    channel.send('late');
    expect(channel.size).toBe(0);
    await expect(channel.receive()).rejects.toThrow('Channel closed');
  });
});
