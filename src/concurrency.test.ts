import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { KeyedMutex, Semaphore } from './concurrency';
import { deferred } from './test-helpers';

describe('Semaphore', () => {
    it('rejects a non-positive capacity', () => {
        assert.throws(() => new Semaphore(0), /positive integer/);
    });

    it('never admits more than its capacity', async () => {
        const gate = new Semaphore(2);
        let active = 0;
        let peak = 0;

        await Promise.all(Array.from({ length: 7 }, async () => {
            await gate.run(async () => {
                active += 1;
                peak = Math.max(peak, active);
                await new Promise((resolve) => setImmediate(resolve));
                active -= 1;
            });
        }));

        assert.equal(peak, 2);
        assert.equal(gate.inUse, 0);
        assert.equal(gate.waiting, 0);
    });

    it('releases the slot when the task throws', async () => {
        const gate = new Semaphore(1);

        await assert.rejects(
            gate.run(async () => {
                throw new Error('boom');
            }),
            /boom/,
        );

        assert.equal(gate.inUse, 0);
        assert.equal(await gate.run(async () => 'next'), 'next');
    });

    it('admits waiters in arrival order', async () => {
        const gate = new Semaphore(1);
        const release = await gate.acquire();
        const order: string[] = [];
        const first = gate.run(async () => {
            order.push('first');
        });
        const second = gate.run(async () => {
            order.push('second');
        });

        assert.equal(gate.waiting, 2);
        release();
        release();
        await Promise.all([first, second]);

        assert.deepEqual(order, ['first', 'second']);
        assert.equal(gate.inUse, 0);
    });
});

describe('KeyedMutex', () => {
    it('serializes tasks for the same key', async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();
        const order: string[] = [];
        const first = mutex.runExclusive('req-1', async () => {
            order.push('first:start');
            await gate.promise;
            order.push('first:end');
        });
        const second = mutex.runExclusive('req-1', async () => {
            order.push('second');
        });

        await new Promise((resolve) => setImmediate(resolve));
        assert.deepEqual(order, ['first:start']);

        gate.resolve();
        await Promise.all([first, second]);

        assert.deepEqual(order, ['first:start', 'first:end', 'second']);
        assert.equal(mutex.activeKeys, 0);
    });

    it('does not block distinct keys', async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();
        const order: string[] = [];
        const blocked = mutex.runExclusive('req-1', async () => {
            await gate.promise;
            order.push('req-1');
        });

        await mutex.runExclusive('req-2', async () => {
            order.push('req-2');
        });
        gate.resolve();
        await blocked;

        assert.deepEqual(order, ['req-2', 'req-1']);
    });

    it('keeps the lock usable after a failed task', async () => {
        const mutex = new KeyedMutex();

        await assert.rejects(
            mutex.runExclusive('req-1', async () => {
                throw new Error('failed');
            }),
            /failed/,
        );

        assert.equal(
            await mutex.runExclusive('req-1', async () => 42),
            42,
        );
    });
});
