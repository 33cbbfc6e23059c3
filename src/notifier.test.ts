import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { NotifierUnavailableError } from './errors';
import {
    RestoreStatusNotifier,
    SlackNotifier,
    UnconfiguredNotifier,
    formatRestoreEvent,
    type MessageRef,
    type Notifier,
    type SlackChatClient,
} from './notifier';

const REQUEST_ID = '00112233445566778899aabbccddeeff';

class RecordingNotifier implements Notifier {
    public readonly posts: Array<{
        channel: string;
        content: string;
        threadRef: MessageRef | null;
    }> = [];

    private counter = 0;

    constructor(private readonly failFirst = false) {}

    async post(
        channel: string,
        threadRef: MessageRef | null,
        content: string,
    ): Promise<MessageRef> {
        this.posts.push({ channel, content, threadRef });
        this.counter += 1;

        if (this.failFirst && this.counter === 1) {
            throw new Error('rate limited');
        }

        return { channel, ts: `1700000000.00000${this.counter}` };
    }
}

describe('formatRestoreEvent', () => {
    it('formats request creation', () => {
        assert.equal(
            formatRestoreEvent({
                createdAt: '2026-10-19T12:00:00Z',
                kind: 'request_created',
                paths: ['a/x', 'bad'],
                requestId: REQUEST_ID,
                ttlDays: 30,
            }),
            [
                `Created restore request ${REQUEST_ID}`,
                'Bucket Paths: ["a/x","bad"]',
                'TTL: 30 days',
                'Processed Paths: []',
                'Created At: 2026-10-19T12:00:00Z',
            ].join('\n'),
        );
    });

    it('formats path updates and the deleted record', () => {
        assert.equal(
            formatRestoreEvent({
                completed: false,
                kind: 'paths_updated',
                pending: ['bad'],
                processed: ['a/x'],
                requestId: REQUEST_ID,
            }),
            `Updated restore request ${REQUEST_ID}\n`
            + 'Remaining Bucket Paths: ["bad"]\n'
            + 'Processed Paths: ["a/x"]',
        );
        assert.equal(
            formatRestoreEvent({
                completed: true,
                kind: 'paths_updated',
                pending: [],
                processed: ['a/x'],
                requestId: REQUEST_ID,
            }),
            `All paths processed for restore request ${REQUEST_ID}. Record deleted.`,
        );
    });

    it('formats failed paths and completion', () => {
        assert.equal(
            formatRestoreEvent({
                failedPaths: ['bad', 'b/denied'],
                kind: 'request_failed_paths',
                requestId: REQUEST_ID,
            }),
            `Restore request ${REQUEST_ID} finished with failed paths: bad, b/denied`,
        );
        assert.equal(
            formatRestoreEvent({
                kind: 'request_completed',
                requestId: REQUEST_ID,
            }),
            `Restore process completed for restore request ${REQUEST_ID}`,
        );
    });
});

describe('RestoreStatusNotifier', () => {
    it('threads every message under the first one', async () => {
        const notifier = new RecordingNotifier();
        const status = new RestoreStatusNotifier(notifier, 'C0RESTORE');

        await status.emit({
            createdAt: '2026-10-19T12:00:00Z',
            kind: 'request_created',
            paths: ['a/x'],
            requestId: REQUEST_ID,
            ttlDays: 30,
        });
        await status.emit({
            kind: 'request_completed',
            requestId: REQUEST_ID,
        });

        assert.equal(notifier.posts[0]?.threadRef, null);
        assert.deepEqual(notifier.posts[1]?.threadRef, {
            channel: 'C0RESTORE',
            ts: '1700000000.000001',
        });
        assert.equal(notifier.posts[1]?.channel, 'C0RESTORE');
    });

    it('swallows post failures and opens the thread later', async () => {
        const notifier = new RecordingNotifier(true);
        const status = new RestoreStatusNotifier(notifier, 'C0RESTORE');

        await status.emit({
            kind: 'request_failed_paths',
            failedPaths: ['bad'],
            requestId: REQUEST_ID,
        });
        await status.emit({
            kind: 'request_failed_paths',
            failedPaths: ['bad'],
            requestId: REQUEST_ID,
        });
        await status.emit({
            kind: 'request_completed',
            requestId: REQUEST_ID,
        });

        assert.equal(notifier.posts[1]?.threadRef, null);
        assert.equal(notifier.posts[2]?.threadRef?.ts, '1700000000.000002');
    });

    it('tolerates an unconfigured notifier', async () => {
        const status = new RestoreStatusNotifier(
            new UnconfiguredNotifier('no token'),
            'unconfigured',
        );

        await status.emit({ kind: 'request_completed', requestId: REQUEST_ID });
    });
});

describe('SlackNotifier', () => {
    function createClient(response: Record<string, unknown>) {
        const calls: Record<string, unknown>[] = [];
        const client = {
            chat: {
                postMessage: async (args: Record<string, unknown>) => {
                    calls.push(args);

                    return response;
                },
            },
        } as unknown as SlackChatClient;

        return { calls, client };
    }

    it('posts into the thread and returns the message ref', async () => {
        const { calls, client } = createClient({
            channel: 'C0RESTORE',
            ok: true,
            ts: '1700000000.000200',
        });
        const notifier = new SlackNotifier('test-token', client);

        const ref = await notifier.post(
            'C0RESTORE',
            { channel: 'C0RESTORE', ts: '1700000000.000100' },
            'hello',
        );

        assert.deepEqual(ref, { channel: 'C0RESTORE', ts: '1700000000.000200' });
        assert.deepEqual(calls, [{
            channel: 'C0RESTORE',
            text: 'hello',
            thread_ts: '1700000000.000100',
        }]);
    });

    it('fails when slack reports an error', async () => {
        const { client } = createClient({ error: 'channel_not_found', ok: false });
        const notifier = new SlackNotifier('test-token', client);

        await assert.rejects(
            notifier.post('C0MISSING', null, 'hello'),
            /slack postMessage failed: channel_not_found/,
        );
    });
});

describe('UnconfiguredNotifier', () => {
    it('rejects every post', async () => {
        await assert.rejects(
            new UnconfiguredNotifier('SLACK_API_TOKEN missing').post(),
            NotifierUnavailableError,
        );
    });
});
