import { tryParseBucketPath } from './bucket-path';
import {
    DEFAULT_THROTTLE_MS,
    DEPRECATED_STORAGE_TIER,
    TARGET_STORAGE_TIER,
} from './constants';
import { OperationAbortedError, describeError } from './errors';
import type { RestoreLedgerService } from './ledger.service';
import type { ObjectStore } from './object-store';
import type { PathFailureReason, PathRestoreResult } from './types';

export type PathLedger = Pick<RestoreLedgerService, 'markProcessed'>;

export type PathRestorerOptions = {
    sleep?: (ms: number) => Promise<void>;
    throttleMs?: number;
};

function sleepMs(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

function failed(
    path: string,
    reason: PathFailureReason,
    progress: Pick<PathRestoreResult, 'objectFailures' | 'restored' | 'skipped'>
        = { objectFailures: 0, restored: [], skipped: 0 },
): PathRestoreResult {
    return {
        ...progress,
        path,
        reason,
        status: 'failed',
    };
}

/**
 * Restores every object under one bucket path that still sits in the
 * deprecated tier. Object failures are logged and skipped; only an invalid
 * path, a listing failure, an abort or a ledger failure fails the path.
 */
export class PathRestorer {
    private readonly sleep: (ms: number) => Promise<void>;

    private readonly throttleMs: number;

    constructor(
        private readonly store: ObjectStore,
        private readonly ledger: PathLedger,
        options: PathRestorerOptions = {},
    ) {
        this.sleep = options.sleep ?? sleepMs;
        this.throttleMs = options.throttleMs ?? DEFAULT_THROTTLE_MS;
    }

    async restorePath(
        path: string,
        requestId: string,
        signal?: AbortSignal,
    ): Promise<PathRestoreResult> {
        const bucketPath = tryParseBucketPath(path);

        if (!bucketPath) {
            console.error('storage-tier-restore invalid bucket path', {
                path,
                request_id: requestId,
            });

            return failed(path, 'invalid_path');
        }

        const restored: string[] = [];
        let objectFailures = 0;
        let skipped = 0;

        try {
            for await (const page of this.store.listUnder(
                bucketPath.bucket,
                bucketPath.prefix,
                { signal },
            )) {
                for (const object of page) {
                    if (signal?.aborted) {
                        throw new OperationAbortedError(`restore ${path}`);
                    }

                    if (object.storageTier !== DEPRECATED_STORAGE_TIER) {
                        skipped += 1;
                        continue;
                    }

                    const ok = await this.restoreObject(
                        bucketPath.bucket,
                        object.key,
                        requestId,
                        signal,
                    );

                    if (!ok) {
                        objectFailures += 1;
                        continue;
                    }

                    restored.push(object.key);
                    await this.sleep(this.throttleMs);
                }
            }

            if (signal?.aborted) {
                throw new OperationAbortedError(`restore ${path}`);
            }
        } catch (error: unknown) {
            const reason: PathFailureReason = signal?.aborted
                ? 'aborted'
                : 'listing_failed';

            console.error('storage-tier-restore path listing failed', {
                error: describeError(error),
                path,
                reason,
                request_id: requestId,
            });

            return failed(path, reason, { objectFailures, restored, skipped });
        }

        try {
            await this.ledger.markProcessed(requestId, path);
        } catch (error: unknown) {
            console.error('storage-tier-restore ledger update failed', {
                error: describeError(error),
                path,
                request_id: requestId,
            });

            return failed(path, 'ledger_update_failed', {
                objectFailures,
                restored,
                skipped,
            });
        }

        console.log('storage-tier-restore path processed', {
            object_failures: objectFailures,
            path,
            request_id: requestId,
            restored: restored.length,
            skipped,
        });

        return {
            objectFailures,
            path,
            restored,
            skipped,
            status: 'processed',
        };
    }

    private async restoreObject(
        bucket: string,
        key: string,
        requestId: string,
        signal?: AbortSignal,
    ): Promise<boolean> {
        try {
            await this.store.changeTier(bucket, key, TARGET_STORAGE_TIER, {
                signal,
            });
        } catch (error: unknown) {
            console.error('storage-tier-restore object restore failed', {
                bucket,
                error: describeError(error),
                key,
                request_id: requestId,
            });

            return false;
        }

        let tier: string;

        try {
            tier = await this.store.getTier(bucket, key, { signal });
        } catch (error: unknown) {
            console.error('storage-tier-restore object verification failed', {
                bucket,
                error: describeError(error),
                key,
                request_id: requestId,
            });

            return false;
        }

        if (tier !== TARGET_STORAGE_TIER) {
            console.error('storage-tier-restore object tier mismatch', {
                bucket,
                expected_tier: TARGET_STORAGE_TIER,
                key,
                observed_tier: tier,
                request_id: requestId,
            });

            return false;
        }

        console.log('storage-tier-restore object restored', {
            bucket,
            key,
            request_id: requestId,
            tier,
        });

        return true;
    }
}
