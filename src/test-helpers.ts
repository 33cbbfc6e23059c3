import type { CredentialSource } from './credential-cache';
import type { ObjectStore, ObjectStoreCallOptions } from './object-store';
import type {
    CredentialMaterial,
    ListedObject,
    RestoreEvent,
    RestoreEventSink,
    StorageTier,
} from './types';

export function buildCredentials(
    suffix = '1',
    overrides: Partial<CredentialMaterial> = {},
): CredentialMaterial {
    return {
        accessKeyId: `test-access-key-${suffix}`,
        expiration: new Date('2026-10-19T13:00:00.000Z'),
        secretAccessKey: `test-secret-${suffix}`,
        sessionToken: `test-session-${suffix}`,
        ...overrides,
    };
}

export class SequenceCredentialSource implements CredentialSource {
    public readonly calls: Array<{ region: string; roleArn: string }> = [];

    private index = 0;

    constructor(
        private readonly results: Array<CredentialMaterial | Error>,
    ) {}

    async assumeRole(
        roleArn: string,
        region: string,
    ): Promise<CredentialMaterial> {
        this.calls.push({ region, roleArn });

        const result = this.results[
            Math.min(this.index, this.results.length - 1)
        ];

        this.index += 1;

        if (result === undefined) {
            throw new Error('no credentials configured');
        }

        if (result instanceof Error) {
            throw result;
        }

        return result;
    }
}

export class RecordingEventSink implements RestoreEventSink {
    public readonly events: RestoreEvent[] = [];

    constructor(private readonly failWith?: Error) {}

    async emit(event: RestoreEvent): Promise<void> {
        this.events.push(event);

        if (this.failWith) {
            throw this.failWith;
        }
    }

    kinds(): string[] {
        return this.events.map((event) => event.kind);
    }
}

export type FakeObjectStoreOptions = {
    /** `bucket/prefix` -> pages of objects */
    listings?: Record<string, ListedObject[][]>;
    failCopyFor?: string[];
    failListingFor?: string[];
    /** keys whose tier does not change after a copy */
    stuckKeys?: string[];
};

export class FakeObjectStore implements ObjectStore {
    public readonly copyCalls: string[] = [];

    public readonly headCalls: string[] = [];

    public readonly listCalls: string[] = [];

    public onCopy?: (bucket: string, key: string) => Promise<void> | void;

    private readonly tiers = new Map<string, StorageTier>();

    constructor(private readonly options: FakeObjectStoreOptions = {}) {
        for (const [path, pages] of Object.entries(options.listings ?? {})) {
            const bucket = path.slice(0, path.indexOf('/'));

            for (const page of pages) {
                for (const object of page) {
                    this.tiers.set(`${bucket}/${object.key}`, object.storageTier);
                }
            }
        }
    }

    tierOf(bucket: string, key: string): StorageTier | undefined {
        return this.tiers.get(`${bucket}/${key}`);
    }

    async *listUnder(
        bucket: string,
        prefix: string,
        _options?: ObjectStoreCallOptions,
    ): AsyncIterable<ListedObject[]> {
        const path = `${bucket}/${prefix}`;

        this.listCalls.push(path);

        if (this.options.failListingFor?.includes(path)) {
            throw new Error(`access denied listing ${path}`);
        }

        for (const page of this.options.listings?.[path] ?? []) {
            yield page.map((object) => ({ ...object }));
        }
    }

    async changeTier(
        bucket: string,
        key: string,
        targetTier: StorageTier,
    ): Promise<void> {
        this.copyCalls.push(`${bucket}/${key}`);

        if (this.options.failCopyFor?.includes(key)) {
            throw new Error(`copy rejected for ${key}`);
        }

        await this.onCopy?.(bucket, key);

        if (!this.options.stuckKeys?.includes(key)) {
            this.tiers.set(`${bucket}/${key}`, targetTier);
        }
    }

    async getTier(bucket: string, key: string): Promise<StorageTier> {
        this.headCalls.push(`${bucket}/${key}`);

        const tier = this.tiers.get(`${bucket}/${key}`);

        if (tier === undefined) {
            throw new Error(`not found: ${bucket}/${key}`);
        }

        return tier;
    }
}

export function deferred<T = void>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
} {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((innerResolve) => {
        resolve = innerResolve;
    });

    return { promise, resolve };
}

export async function noSleep(): Promise<void> {
    await Promise.resolve();
}
