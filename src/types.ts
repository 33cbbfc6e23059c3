export type StorageTier = string;

export type RestoreRequest = {
    createdAt: string;
    pendingPaths: string[];
    processedPaths: string[];
    requestId: string;
    ttlDays: number;
    updatedAt: string;
};

export type CredentialMaterial = {
    accessKeyId: string;
    expiration: Date | null;
    secretAccessKey: string;
    sessionToken: string;
};

export type BucketPath = {
    bucket: string;
    prefix: string;
    raw: string;
};

export type ListedObject = {
    key: string;
    storageTier: StorageTier;
};

export type PathFailureReason =
    | 'invalid_path'
    | 'listing_failed'
    | 'ledger_update_failed'
    | 'aborted';

export type PathRestoreResult = {
    objectFailures: number;
    path: string;
    reason?: PathFailureReason;
    restored: string[];
    skipped: number;
    status: 'processed' | 'failed';
};

export type RequestOutcome = {
    failedPaths: string[];
    ledgerCleared: boolean;
    processedPaths: string[];
    requestId: string;
    results: PathRestoreResult[];
    status: 'completed';
};

export type RestoreEvent =
    | {
        createdAt: string;
        kind: 'request_created';
        paths: string[];
        requestId: string;
        ttlDays: number;
    }
    | {
        completed: boolean;
        kind: 'paths_updated';
        pending: string[];
        processed: string[];
        requestId: string;
    }
    | {
        failedPaths: string[];
        kind: 'request_failed_paths';
        requestId: string;
    }
    | {
        kind: 'request_completed';
        requestId: string;
    };

export interface RestoreEventSink {
    emit(event: RestoreEvent): Promise<void>;
}
