import { ConnectionLock } from '../lib/connection.lock';

import { deferred, flush } from './helpers/fake-broker';

describe('ConnectionLock', () => {
  let lock: ConnectionLock;

  beforeEach(() => {
    lock = new ConnectionLock();
  });

  it('should let readers run together', async () => {
    const first = deferred<void>();
    const second = deferred<void>();

    const reads = Promise.all([lock.read(() => first.promise), lock.read(() => second.promise)]);
    await flush();

    expect(lock.activeReaders).toBe(2);

    first.resolve();
    second.resolve();
    await reads;

    expect(lock.activeReaders).toBe(0);
  });

  it('should make a writer wait for active readers', async () => {
    const reader = deferred<void>();
    const events: string[] = [];

    const read = lock.read(async () => {
      await reader.promise;
      events.push('read done');
    });
    await flush();

    const write = lock.write(async () => {
      events.push('write');
    });
    await flush();

    expect(events).toEqual([]);
    expect(lock.isWriting).toBe(false);

    reader.resolve();
    await Promise.all([read, write]);

    expect(events).toEqual(['read done', 'write']);
  });

  it('should hold back readers that arrive after a queued writer', async () => {
    const writer = deferred<void>();
    const events: string[] = [];

    const write = lock.write(async () => {
      await writer.promise;
      events.push('write');
    });
    const read = lock.read(async () => {
      events.push('read');
    });
    await flush();

    expect(lock.isWriting).toBe(true);
    expect(lock.activeReaders).toBe(0);

    writer.resolve();
    await Promise.all([write, read]);

    expect(events).toEqual(['write', 'read']);
  });

  it('should release the lock when the callback fails', async () => {
    await expect(lock.read(() => Promise.reject(new Error('read failed')))).rejects.toThrow('read failed');
    await expect(lock.write(() => Promise.reject(new Error('write failed')))).rejects.toThrow('write failed');

    await expect(lock.write(async () => 'ok')).resolves.toBe('ok');
    expect(lock.activeReaders).toBe(0);
    expect(lock.isWriting).toBe(false);
  });
});
