import { DEFAULT_CONCURRENCY } from './constants';
import { Semaphore } from './concurrency';
import { ConfigError, LedgerError, describeError } from './errors';
import { generateRequestId, type RestoreLedgerService } from './ledger.service';
import type { PathRestorer } from './path-restorer';
import type {
    PathRestoreResult,
    RequestOutcome,
    RestoreEvent,
    RestoreEventSink,
} from './types';

export type RestoreCoordinatorOptions = {
    concurrency?: number;
    events?: RestoreEventSink;
    requestIdFactory?: () => string;
};

export type RunRestoreInput = {
    paths: readonly string[];
    signal?: AbortSignal;
    ttlDays: number;
};

/**
 * Fans restore work out across paths behind a fixed-size gate and joins every
 * path before returning. The outcome is always `completed`; path failures are
 * reported in `failedPaths`.
 */
export class RestoreCoordinator {
    private readonly concurrency: number;

    private readonly events?: RestoreEventSink;

    private readonly requestIdFactory: () => string;

    constructor(
        private readonly ledger: RestoreLedgerService,
        private readonly restorer: PathRestorer,
        options: RestoreCoordinatorOptions = {},
    ) {
        this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        this.events = options.events;
        this.requestIdFactory = options.requestIdFactory ?? generateRequestId;
    }

    async run(input: RunRestoreInput): Promise<RequestOutcome> {
        if (input.paths.length === 0) {
            throw new ConfigError('at least one bucket path is required');
        }

        const requestId = this.requestIdFactory();

        // a ledger failure here is fatal: no restoration starts without a row
        await this.ledger.create(requestId, input.paths, input.ttlDays);

        console.log('storage-tier-restore request started', {
            concurrency: this.concurrency,
            paths: input.paths.length,
            request_id: requestId,
            ttl_days: input.ttlDays,
        });

        return this.restorePaths(requestId, input.paths, input.signal);
    }

    /**
     * Picks up an unfinished request and restores whatever is still pending.
     */
    async resume(
        requestId: string,
        options: { signal?: AbortSignal } = {},
    ): Promise<RequestOutcome> {
        const request = await this.ledger.get(requestId);

        if (!request) {
            throw new LedgerError(
                'request_not_found',
                `restore request ${requestId} not found`,
            );
        }

        console.log('storage-tier-restore request resumed', {
            pending_paths: request.pendingPaths,
            processed_paths: request.processedPaths,
            request_id: requestId,
        });

        return this.restorePaths(
            requestId,
            request.pendingPaths,
            options.signal,
        );
    }

    private async restorePaths(
        requestId: string,
        paths: readonly string[],
        signal?: AbortSignal,
    ): Promise<RequestOutcome> {
        const gate = new Semaphore(this.concurrency);
        const results = await Promise.all(paths.map((path) => {
            return gate.run(() => this.restoreOne(path, requestId, signal));
        }));
        const failedPaths = results
            .filter((result) => result.status === 'failed')
            .map((result) => result.path);
        const processedPaths = results
            .filter((result) => result.status === 'processed')
            .map((result) => result.path);
        const remaining = await this.readRemaining(requestId);

        if (failedPaths.length > 0) {
            console.error('storage-tier-restore request has failed paths', {
                failed_paths: failedPaths,
                request_id: requestId,
            });
            await this.notify({
                failedPaths,
                kind: 'request_failed_paths',
                requestId,
            });
        }

        console.log('storage-tier-restore request completed', {
            failed_paths: failedPaths.length,
            processed_paths: processedPaths.length,
            request_id: requestId,
        });
        await this.notify({
            kind: 'request_completed',
            requestId,
        });

        return {
            failedPaths,
            ledgerCleared: remaining === 0,
            processedPaths,
            requestId,
            results,
            status: 'completed',
        };
    }

    private async restoreOne(
        path: string,
        requestId: string,
        signal?: AbortSignal,
    ): Promise<PathRestoreResult> {
        try {
            return await this.restorer.restorePath(path, requestId, signal);
        } catch (error: unknown) {
            console.error('storage-tier-restore path restorer crashed', {
                error: describeError(error),
                path,
                request_id: requestId,
            });

            return {
                objectFailures: 0,
                path,
                reason: 'listing_failed',
                restored: [],
                skipped: 0,
                status: 'failed',
            };
        }
    }

    private async readRemaining(requestId: string): Promise<number | null> {
        try {
            const request = await this.ledger.get(requestId);

            return request ? request.pendingPaths.length : 0;
        } catch (error: unknown) {
            console.error('storage-tier-restore ledger read failed', {
                error: describeError(error),
                request_id: requestId,
            });

            return null;
        }
    }

    private async notify(event: RestoreEvent): Promise<void> {
        if (!this.events) {
            return;
        }

        try {
            await this.events.emit(event);
        } catch (error: unknown) {
            console.error('storage-tier-restore notification failed', {
                error: describeError(error),
                kind: event.kind,
                request_id: event.requestId,
            });
        }
    }
}
