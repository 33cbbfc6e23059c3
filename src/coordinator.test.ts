import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { RestoreCoordinator } from './coordinator';
import { ConfigError, LedgerError } from './errors';
import { RestoreLedgerService } from './ledger.service';
import { PathRestorer } from './path-restorer';
import { InMemoryRestoreRequestStore } from './store';
import {
    FakeObjectStore,
    RecordingEventSink,
    type FakeObjectStoreOptions,
    noSleep,
} from './test-helpers';

const REQUEST_ID = '00112233445566778899aabbccddeeff';

function createFixture(
    storeOptions: FakeObjectStoreOptions,
    options: { concurrency?: number } = {},
) {
    const requestStore = new InMemoryRestoreRequestStore();
    const events = new RecordingEventSink();
    const ledger = new RestoreLedgerService(requestStore, {
        events,
        timeProvider: () => new Date('2026-10-19T12:00:00.000Z'),
    });
    const objectStore = new FakeObjectStore(storeOptions);
    const restorer = new PathRestorer(objectStore, ledger, {
        sleep: noSleep,
    });
    const coordinator = new RestoreCoordinator(ledger, restorer, {
        concurrency: options.concurrency,
        events,
        requestIdFactory: () => REQUEST_ID,
    });

    return {
        coordinator,
        events,
        ledger,
        objectStore,
        requestStore,
        restorer,
    };
}

function rrObjects(prefix: string, count: number) {
    return [Array.from({ length: count }, (_, index) => ({
        key: `${prefix}/${index}`,
        storageTier: 'REDUCED_REDUNDANCY',
    }))];
}

describe('RestoreCoordinator.run', () => {
    it('restores valid paths and reports the malformed one', async () => {
        const { coordinator, events, requestStore } = createFixture({
            listings: {
                'a/x': rrObjects('x', 2),
                'a/y': rrObjects('y', 1),
            },
        });

        const outcome = await coordinator.run({
            paths: ['a/x', 'a/y', 'bad'],
            ttlDays: 30,
        });

        assert.equal(outcome.status, 'completed');
        assert.equal(outcome.requestId, REQUEST_ID);
        assert.deepEqual(outcome.failedPaths, ['bad']);
        assert.deepEqual(outcome.processedPaths, ['a/x', 'a/y']);
        assert.equal(outcome.ledgerCleared, false);

        const row = await requestStore.getRequest(REQUEST_ID);

        assert.deepEqual(row?.pendingPaths, ['bad']);
        assert.deepEqual(
            [...(row?.processedPaths ?? [])].sort(),
            ['a/x', 'a/y'],
        );
        assert.deepEqual(events.events.at(-2), {
            failedPaths: ['bad'],
            kind: 'request_failed_paths',
            requestId: REQUEST_ID,
        });
        assert.deepEqual(events.events.at(-1), {
            kind: 'request_completed',
            requestId: REQUEST_ID,
        });
    });

    it('deletes the ledger row when every path succeeds', async () => {
        const { coordinator, events, objectStore, requestStore } = createFixture({
            listings: {
                'a/x': rrObjects('x', 2),
                'a/y': rrObjects('y', 2),
            },
        });

        const outcome = await coordinator.run({
            paths: ['a/x', 'a/y'],
            ttlDays: 14,
        });

        assert.deepEqual(outcome.failedPaths, []);
        assert.equal(outcome.ledgerCleared, true);
        assert.equal(await requestStore.getRequest(REQUEST_ID), null);
        assert.equal(objectStore.tierOf('a', 'x/1'), 'STANDARD');
        assert.equal(
            events.kinds().includes('request_failed_paths'),
            false,
        );
        assert.equal(events.kinds().at(-1), 'request_completed');
    });

    it('leaves exactly the path-level failures pending', async () => {
        const { coordinator, requestStore } = createFixture({
            failListingFor: ['b/denied'],
            listings: {
                'a/x': rrObjects('x', 1),
            },
            stuckKeys: ['x/0'],
        });

        const outcome = await coordinator.run({
            paths: ['a/x', 'b/denied', 'nope'],
            ttlDays: 30,
        });

        assert.deepEqual(outcome.failedPaths, ['b/denied', 'nope']);
        assert.deepEqual(
            (await requestStore.getRequest(REQUEST_ID))?.pendingPaths,
            ['b/denied', 'nope'],
        );
        assert.equal(outcome.results[0]?.objectFailures, 1);
        assert.equal(outcome.results[0]?.status, 'processed');
    });

    it('never runs more restorers than the gate allows', async () => {
        const paths = Array.from({ length: 9 }, (_, index) => `a/p${index}`);
        const listings: Record<string, ReturnType<typeof rrObjects>> = {};

        for (const path of paths) {
            listings[path] = rrObjects(path.slice(2), 1);
        }

        const { coordinator, objectStore } = createFixture(
            { listings },
            { concurrency: 3 },
        );
        let active = 0;
        let peak = 0;

        objectStore.onCopy = async () => {
            active += 1;
            peak = Math.max(peak, active);
            await new Promise((resolve) => setImmediate(resolve));
            active -= 1;
        };

        const outcome = await coordinator.run({ paths, ttlDays: 30 });

        assert.equal(peak, 3);
        assert.equal(outcome.ledgerCleared, true);
        assert.equal(objectStore.copyCalls.length, 9);
    });

    it('rejects an empty path list', async () => {
        const { coordinator } = createFixture({});

        await assert.rejects(
            coordinator.run({ paths: [], ttlDays: 30 }),
            ConfigError,
        );
    });

    it('propagates a ledger create failure before any restore', async () => {
        const { coordinator, objectStore, requestStore } = createFixture({
            listings: { 'a/x': rrObjects('x', 1) },
        });

        await requestStore.insertRequest({
            createdAt: '2026-10-19T11:00:00Z',
            pendingPaths: ['a/x'],
            processedPaths: [],
            requestId: REQUEST_ID,
            ttlDays: 30,
            updatedAt: '2026-10-19T11:00:00Z',
        });

        await assert.rejects(
            coordinator.run({ paths: ['a/x'], ttlDays: 30 }),
            LedgerError,
        );
        assert.deepEqual(objectStore.listCalls, []);
    });

    it('keeps going when the event sink fails', async () => {
        const requestStore = new InMemoryRestoreRequestStore();
        const events = new RecordingEventSink(new Error('slack down'));
        const ledger = new RestoreLedgerService(requestStore, { events });
        const restorer = new PathRestorer(
            new FakeObjectStore({ listings: { 'a/x': rrObjects('x', 1) } }),
            ledger,
            { sleep: noSleep },
        );
        const coordinator = new RestoreCoordinator(ledger, restorer, {
            events,
            requestIdFactory: () => REQUEST_ID,
        });

        const outcome = await coordinator.run({
            paths: ['a/x', 'bad'],
            ttlDays: 30,
        });

        assert.deepEqual(outcome.failedPaths, ['bad']);
        assert.deepEqual(events.kinds(), [
            'request_created',
            'paths_updated',
            'request_failed_paths',
            'request_completed',
        ]);
    });
});

describe('RestoreCoordinator.resume', () => {
    it('restores only the pending paths of an existing request', async () => {
        const { coordinator, objectStore, requestStore } = createFixture({
            listings: {
                'a/x': rrObjects('x', 1),
                'a/y': rrObjects('y', 1),
            },
        });

        await requestStore.insertRequest({
            createdAt: '2026-10-19T11:00:00Z',
            pendingPaths: ['a/y'],
            processedPaths: ['a/x'],
            requestId: REQUEST_ID,
            ttlDays: 30,
            updatedAt: '2026-10-19T11:30:00Z',
        });

        const outcome = await coordinator.resume(REQUEST_ID);

        assert.deepEqual(objectStore.listCalls, ['a/y']);
        assert.deepEqual(outcome.processedPaths, ['a/y']);
        assert.equal(outcome.ledgerCleared, true);
        assert.equal(await requestStore.getRequest(REQUEST_ID), null);
    });

    it('fails for an unknown request', async () => {
        const { coordinator } = createFixture({});

        await assert.rejects(
            coordinator.resume('missing'),
            (error: unknown) => {
                assert.ok(error instanceof LedgerError);
                assert.equal(error.code, 'request_not_found');
                return true;
            },
        );
    });
});
