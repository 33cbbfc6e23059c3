import { DEFAULT_CREDENTIAL_REFRESH_MS } from './constants';
import { CredentialCacheError, describeError } from './errors';
import type { CredentialMaterial } from './types';

export interface CredentialSource {
    assumeRole(roleArn: string, region: string): Promise<CredentialMaterial>;
}

export type CredentialSnapshot = {
    material: CredentialMaterial;
    version: number;
};

/**
 * Holds the current short-lived credentials. Readers never block; `update`
 * swaps the whole snapshot in one assignment, so a reader sees either the old
 * or the new material and never a mix of the two.
 */
export class CredentialCache {
    private snapshot: CredentialSnapshot | null = null;

    constructor(initial?: CredentialMaterial) {
        if (initial) {
            this.update(initial);
        }
    }

    get version(): number {
        return this.snapshot?.version ?? 0;
    }

    retrieve(): CredentialMaterial {
        return this.retrieveSnapshot().material;
    }

    retrieveSnapshot(): CredentialSnapshot {
        if (!this.snapshot) {
            throw new CredentialCacheError('credential cache is not initialized');
        }

        return this.snapshot;
    }

    update(material: CredentialMaterial): void {
        this.snapshot = {
            material: { ...material },
            version: this.version + 1,
        };
    }
}

export type CredentialRefresherOptions = {
    refreshIntervalMs?: number;
    region: string;
    roleArn: string;
};

export class CredentialRefresher {
    private inFlight: Promise<boolean> | null = null;

    private readonly refreshIntervalMs: number;

    private stopped = false;

    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly cache: CredentialCache,
        private readonly source: CredentialSource,
        private readonly options: CredentialRefresherOptions,
    ) {
        this.refreshIntervalMs = options.refreshIntervalMs
            ?? DEFAULT_CREDENTIAL_REFRESH_MS;
    }

    get running(): boolean {
        return this.timer !== null;
    }

    /**
     * Assumes the role once and stores the result. Failures propagate; this is
     * the startup path.
     */
    async initialize(): Promise<CredentialMaterial> {
        const material = await this.source.assumeRole(
            this.options.roleArn,
            this.options.region,
        );

        this.cache.update(material);

        return material;
    }

    start(): void {
        if (this.timer || this.stopped) {
            return;
        }

        this.timer = setInterval(() => {
            if (this.inFlight) {
                return;
            }

            this.inFlight = this.refresh().finally(() => {
                this.inFlight = null;
            });
        }, this.refreshIntervalMs);
        this.timer.unref();
    }

    /**
     * One refresh attempt. A failure keeps the previous material in place.
     */
    async refresh(): Promise<boolean> {
        try {
            const material = await this.source.assumeRole(
                this.options.roleArn,
                this.options.region,
            );

            this.cache.update(material);
            console.log('storage-tier-restore credentials refreshed', {
                expiration: material.expiration?.toISOString() ?? null,
                version: this.cache.version,
            });

            return true;
        } catch (error: unknown) {
            console.error('storage-tier-restore credential refresh failed', {
                error: describeError(error),
                role_arn: this.options.roleArn,
            });

            return false;
        }
    }

    async stop(): Promise<void> {
        this.stopped = true;

        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }

        if (this.inFlight) {
            await this.inFlight;
        }
    }
}
