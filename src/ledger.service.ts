import { randomBytes } from 'node:crypto';
import { REQUEST_ID_BYTES } from './constants';
import { KeyedMutex } from './concurrency';
import { LedgerError, describeError } from './errors';
import type { RestoreRequestStore } from './store';
import type {
    RestoreEvent,
    RestoreEventSink,
    RestoreRequest,
} from './types';

export type RestoreLedgerOptions = {
    events?: RestoreEventSink;
    timeProvider?: () => Date;
};

export function generateRequestId(): string {
    return randomBytes(REQUEST_ID_BYTES).toString('hex');
}

export function formatUtcTimestamp(value: Date): string {
    return value.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Removes the first occurrence of `path` only; later duplicates stay pending.
 */
export function removeFirstMatch(
    paths: readonly string[],
    path: string,
): string[] {
    const index = paths.indexOf(path);

    if (index === -1) {
        return [...paths];
    }

    return [...paths.slice(0, index), ...paths.slice(index + 1)];
}

function asStoreFailure(
    error: unknown,
    action: string,
): LedgerError {
    if (error instanceof LedgerError) {
        return error;
    }

    return new LedgerError(
        'store_failure',
        `failed to ${action}: ${describeError(error)}`,
        { cause: error },
    );
}

/**
 * Durable record of a restore request. This service is the only writer of
 * ledger rows. Mutations for the same request id run one at a time so two
 * paths finishing together cannot both compute removal from the same
 * snapshot of pending paths.
 */
export class RestoreLedgerService {
    private readonly events?: RestoreEventSink;

    private readonly mutex = new KeyedMutex();

    private readonly timeProvider: () => Date;

    constructor(
        private readonly store: RestoreRequestStore,
        options: RestoreLedgerOptions = {},
    ) {
        this.events = options.events;
        this.timeProvider = options.timeProvider ?? (() => new Date());
    }

    async create(
        requestId: string,
        paths: readonly string[],
        ttlDays: number,
    ): Promise<RestoreRequest> {
        const now = formatUtcTimestamp(this.timeProvider());
        const request: RestoreRequest = {
            createdAt: now,
            pendingPaths: [...paths],
            processedPaths: [],
            requestId,
            ttlDays,
            updatedAt: now,
        };

        try {
            await this.store.ensureSchema();
            await this.store.insertRequest(request);
        } catch (error: unknown) {
            throw asStoreFailure(error, 'create restore request');
        }

        console.log('storage-tier-restore ledger row created', {
            pending_paths: request.pendingPaths,
            request_id: requestId,
            ttl_days: ttlDays,
        });

        await this.notify({
            createdAt: now,
            kind: 'request_created',
            paths: [...request.pendingPaths],
            requestId,
            ttlDays,
        });

        return request;
    }

    /**
     * Moves `path` from pending to processed and returns true once nothing is
     * pending, at which point the row has been deleted. `path` is appended to
     * processed on every call, even when it was no longer pending.
     */
    async markProcessed(
        requestId: string,
        path: string,
    ): Promise<boolean> {
        return this.mutex.runExclusive(requestId, async () => {
            let current: RestoreRequest | null;

            try {
                current = await this.store.getRequest(requestId);
            } catch (error: unknown) {
                throw asStoreFailure(error, 'load restore request');
            }

            if (!current) {
                throw new LedgerError(
                    'request_not_found',
                    `restore request ${requestId} not found`,
                );
            }

            const pendingPaths = removeFirstMatch(current.pendingPaths, path);
            const processedPaths = [...current.processedPaths, path];
            const updatedAt = formatUtcTimestamp(this.timeProvider());

            try {
                const updated = await this.store.updatePaths(requestId, {
                    pendingPaths,
                    processedPaths,
                    updatedAt,
                });

                if (!updated) {
                    throw new LedgerError(
                        'request_not_found',
                        `restore request ${requestId} not found`,
                    );
                }
            } catch (error: unknown) {
                throw asStoreFailure(error, 'update processed paths');
            }

            console.log('storage-tier-restore ledger paths updated', {
                path,
                pending_paths: pendingPaths,
                processed_paths: processedPaths,
                request_id: requestId,
            });

            await this.notify({
                completed: false,
                kind: 'paths_updated',
                pending: pendingPaths,
                processed: processedPaths,
                requestId,
            });

            if (pendingPaths.length > 0) {
                return false;
            }

            try {
                await this.store.deleteRequest(requestId);
            } catch (error: unknown) {
                throw asStoreFailure(error, 'delete restore request');
            }

            console.log('storage-tier-restore ledger row deleted', {
                request_id: requestId,
            });

            await this.notify({
                completed: true,
                kind: 'paths_updated',
                pending: [],
                processed: processedPaths,
                requestId,
            });

            return true;
        });
    }

    async get(requestId: string): Promise<RestoreRequest | null> {
        try {
            return await this.store.getRequest(requestId);
        } catch (error: unknown) {
            throw asStoreFailure(error, 'load restore request');
        }
    }

    async listOpen(): Promise<RestoreRequest[]> {
        try {
            return await this.store.listRequests();
        } catch (error: unknown) {
            throw asStoreFailure(error, 'list restore requests');
        }
    }

    private async notify(event: RestoreEvent): Promise<void> {
        if (!this.events) {
            return;
        }

        try {
            await this.events.emit(event);
        } catch (error: unknown) {
            console.error('storage-tier-restore ledger notification failed', {
                error: describeError(error),
                kind: event.kind,
                request_id: event.requestId,
            });
        }
    }
}
