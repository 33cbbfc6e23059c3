import { WebClient } from '@slack/web-api';
import { NotifierUnavailableError, describeError } from './errors';
import type { RestoreEvent, RestoreEventSink } from './types';

export type MessageRef = {
    channel: string;
    ts: string;
};

export interface Notifier {
    post(
        channel: string,
        threadRef: MessageRef | null,
        content: string,
    ): Promise<MessageRef>;
}

export type SlackChatClient = {
    chat: Pick<WebClient['chat'], 'postMessage'>;
};

export class SlackNotifier implements Notifier {
    private readonly client: SlackChatClient;

    constructor(token: string, client?: SlackChatClient) {
        this.client = client ?? new WebClient(token);
    }

    async post(
        channel: string,
        threadRef: MessageRef | null,
        content: string,
    ): Promise<MessageRef> {
        const response = await this.client.chat.postMessage({
            channel,
            text: content,
            thread_ts: threadRef?.ts,
        });

        if (!response.ok || !response.ts) {
            throw new Error(
                `slack postMessage failed: ${response.error ?? 'missing ts'}`,
            );
        }

        return {
            channel: response.channel ?? channel,
            ts: response.ts,
        };
    }
}

export class UnconfiguredNotifier implements Notifier {
    constructor(private readonly reason: string) {}

    async post(): Promise<MessageRef> {
        throw new NotifierUnavailableError(this.reason);
    }
}

export function formatRestoreEvent(event: RestoreEvent): string {
    switch (event.kind) {
        case 'request_created':
            return [
                `Created restore request ${event.requestId}`,
                `Bucket Paths: ${JSON.stringify(event.paths)}`,
                `TTL: ${event.ttlDays} days`,
                'Processed Paths: []',
                `Created At: ${event.createdAt}`,
            ].join('\n');
        case 'paths_updated':
            if (event.completed) {
                return `All paths processed for restore request ${event.requestId}. Record deleted.`;
            }

            return [
                `Updated restore request ${event.requestId}`,
                `Remaining Bucket Paths: ${JSON.stringify(event.pending)}`,
                `Processed Paths: ${JSON.stringify(event.processed)}`,
            ].join('\n');
        case 'request_failed_paths':
            return `Restore request ${event.requestId} finished with failed paths: ${event.failedPaths.join(', ')}`;
        case 'request_completed':
            return `Restore process completed for restore request ${event.requestId}`;
    }
}

/**
 * Posts restore events to one channel. The first message of a request opens
 * a thread; later messages for that request reply in it.
 */
export class RestoreStatusNotifier implements RestoreEventSink {
    private readonly threads = new Map<string, MessageRef>();

    constructor(
        private readonly notifier: Notifier,
        private readonly channel: string,
    ) {}

    async emit(event: RestoreEvent): Promise<void> {
        const content = formatRestoreEvent(event);
        const thread = this.threads.get(event.requestId) ?? null;

        try {
            const ref = await this.notifier.post(this.channel, thread, content);

            if (!thread) {
                this.threads.set(event.requestId, ref);
            }
        } catch (error: unknown) {
            console.error('storage-tier-restore notification not sent', {
                error: describeError(error),
                kind: event.kind,
                request_id: event.requestId,
            });
        }

        if (event.kind === 'request_completed') {
            this.threads.delete(event.requestId);
        }
    }
}
