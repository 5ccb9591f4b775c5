import { expect } from 'chai';
import { describe, it } from 'mocha';
import { KeyedLock, LockScope } from '../src/utils/keyedLock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('runs work on the same key one at a time', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('City:paris', async () => {
        events.push('a:start');
        await delay(10);
        events.push('a:end');
      }),
      lock.run('City:paris', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events).to.deep.equal(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys proceed independently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('City:paris', async () => {
        events.push('paris:start');
        await delay(10);
        events.push('paris:end');
      }),
      lock.run('City:lyon', async () => {
        events.push('lyon');
      }),
    ]);

    expect(events).to.deep.equal(['paris:start', 'lyon', 'paris:end']);
  });

  it('releases the key when the work throws', async () => {
    const lock = new KeyedLock();
    let failure: unknown;
    try {
      await lock.run('entry:2024-03-01', async () => {
        throw new Error('boom');
      });
    } catch (error) {
      failure = error;
    }

    expect(failure).to.be.instanceOf(Error);
    expect(lock.isLocked('entry:2024-03-01')).to.equal(false);
    expect(await lock.run('entry:2024-03-01', async () => 'again')).to.equal('again');
  });

  it('forgets a key once its last holder releases', async () => {
    const lock = new KeyedLock();
    const release = await lock.acquire('sweeper');
    expect(lock.isLocked('sweeper')).to.equal(true);
    release();
    release();
    expect(lock.isLocked('sweeper')).to.equal(false);
  });
});

describe('LockScope', () => {
  it('holds keys until releaseAll and skips keys it already holds', async () => {
    const lock = new KeyedLock();
    const scope = new LockScope(lock);

    await scope.hold(['sequence:b', 'sequence:a']);
    await scope.hold(['sequence:a']);
    expect(lock.isLocked('sequence:a')).to.equal(true);
    expect(lock.isLocked('sequence:b')).to.equal(true);

    scope.releaseAll();
    expect(lock.isLocked('sequence:a')).to.equal(false);
    expect(lock.isLocked('sequence:b')).to.equal(false);
  });

  it('makes a second scope wait for the first', async () => {
    const lock = new KeyedLock();
    const first = new LockScope(lock);
    const second = new LockScope(lock);
    const events: string[] = [];

    await first.hold(['sequence:x']);
    const waiting = second.hold(['sequence:x']).then(() => events.push('second'));
    await delay(5);
    events.push('first');
    first.releaseAll();
    await waiting;
    second.releaseAll();

    expect(events).to.deep.equal(['first', 'second']);
  });
});
