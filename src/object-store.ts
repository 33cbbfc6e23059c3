import {
    CopyObjectCommand,
    HeadObjectCommand,
    ListObjectsV2Command,
    S3Client,
    StorageClass,
    type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { DEFAULT_CALL_TIMEOUT_MS, TARGET_STORAGE_TIER } from './constants';
import type { CredentialCache } from './credential-cache';
import { withDeadline } from './deadline';
import type { ListedObject, StorageTier } from './types';

export type ObjectStoreCallOptions = {
    signal?: AbortSignal;
};

export interface ObjectStore {
    changeTier(
        bucket: string,
        key: string,
        targetTier: StorageTier,
        options?: ObjectStoreCallOptions,
    ): Promise<void>;
    getTier(
        bucket: string,
        key: string,
        options?: ObjectStoreCallOptions,
    ): Promise<StorageTier>;
    listUnder(
        bucket: string,
        prefix: string,
        options?: ObjectStoreCallOptions,
    ): AsyncIterable<ListedObject[]>;
}

export type S3ObjectStoreConfig = {
    callTimeoutMs?: number;
    endpoint?: string;
    forcePathStyle?: boolean;
    region: string;
};

export type S3ClientFactory = (
    config: S3ClientConfig,
) => Pick<S3Client, 'send'>;

const STORAGE_CLASSES: ReadonlySet<string> = new Set(
    Object.values(StorageClass),
);

function isStorageClass(value: string): value is StorageClass {
    return STORAGE_CLASSES.has(value);
}

function encodeCopySource(bucket: string, key: string): string {
    return `${bucket}/${key.split('/').map(encodeURIComponent).join('/')}`;
}

/**
 * S3 rendition of the object store. Credentials are read from the cache on
 * every call; the SDK client is rebuilt whenever the cache version moves, so
 * a refresh is picked up by in-flight path restorers on their next call.
 */
export class S3ObjectStore implements ObjectStore {
    private cachedClient: {
        client: Pick<S3Client, 'send'>;
        version: number;
    } | null = null;

    private readonly callTimeoutMs: number;

    private readonly createClient: S3ClientFactory;

    constructor(
        private readonly credentials: CredentialCache,
        private readonly config: S3ObjectStoreConfig,
        createClient?: S3ClientFactory,
    ) {
        this.callTimeoutMs = config.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
        this.createClient = createClient
            ?? ((clientConfig: S3ClientConfig) => new S3Client(clientConfig));
    }

    async *listUnder(
        bucket: string,
        prefix: string,
        options: ObjectStoreCallOptions = {},
    ): AsyncIterable<ListedObject[]> {
        let continuationToken: string | undefined;

        do {
            const token = continuationToken;
            const response = await withDeadline(
                `list ${bucket}/${prefix}`,
                (signal) => this.client().send(
                    new ListObjectsV2Command({
                        Bucket: bucket,
                        ContinuationToken: token,
                        Prefix: prefix,
                    }),
                    { abortSignal: signal },
                ),
                { signal: options.signal, timeoutMs: this.callTimeoutMs },
            );
            const page: ListedObject[] = [];

            for (const item of response.Contents ?? []) {
                if (!item.Key) {
                    continue;
                }

                page.push({
                    key: item.Key,
                    storageTier: item.StorageClass ?? TARGET_STORAGE_TIER,
                });
            }

            yield page;

            continuationToken = response.IsTruncated
                ? response.NextContinuationToken
                : undefined;
        } while (continuationToken);
    }

    async changeTier(
        bucket: string,
        key: string,
        targetTier: StorageTier,
        options: ObjectStoreCallOptions = {},
    ): Promise<void> {
        if (!isStorageClass(targetTier)) {
            throw new Error(`unsupported storage class ${targetTier}`);
        }

        await withDeadline(
            `copy ${bucket}/${key}`,
            (signal) => this.client().send(
                new CopyObjectCommand({
                    Bucket: bucket,
                    CopySource: encodeCopySource(bucket, key),
                    Key: key,
                    MetadataDirective: 'COPY',
                    StorageClass: targetTier,
                }),
                { abortSignal: signal },
            ),
            { signal: options.signal, timeoutMs: this.callTimeoutMs },
        );
    }

    async getTier(
        bucket: string,
        key: string,
        options: ObjectStoreCallOptions = {},
    ): Promise<StorageTier> {
        const response = await withDeadline(
            `head ${bucket}/${key}`,
            (signal) => this.client().send(
                new HeadObjectCommand({
                    Bucket: bucket,
                    Key: key,
                }),
                { abortSignal: signal },
            ),
            { signal: options.signal, timeoutMs: this.callTimeoutMs },
        );

        // S3 omits the header for STANDARD objects
        return response.StorageClass ?? TARGET_STORAGE_TIER;
    }

    private client(): Pick<S3Client, 'send'> {
        const snapshot = this.credentials.retrieveSnapshot();

        if (this.cachedClient?.version === snapshot.version) {
            return this.cachedClient.client;
        }

        const clientConfig: S3ClientConfig = {
            credentials: {
                accessKeyId: snapshot.material.accessKeyId,
                expiration: snapshot.material.expiration ?? undefined,
                secretAccessKey: snapshot.material.secretAccessKey,
                sessionToken: snapshot.material.sessionToken,
            },
            forcePathStyle: Boolean(this.config.forcePathStyle),
            region: this.config.region,
        };

        if (this.config.endpoint) {
            clientConfig.endpoint = this.config.endpoint;
        }

        const client = this.createClient(clientConfig);

        this.cachedClient = {
            client,
            version: snapshot.version,
        };

        return client;
    }
}
