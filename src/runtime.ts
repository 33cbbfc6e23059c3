import type { RestoreCliOptions } from './cli';
import { RestoreCoordinator } from './coordinator';
import {
    CredentialCache,
    CredentialRefresher,
    type CredentialSource,
} from './credential-cache';
import {
    StsCredentialSource,
    resolveRoleArn,
    type SharedConfigProfiles,
} from './credential-source';
import { parseRestoreEnv, type StorageTierRestoreEnv } from './env';
import { RestoreLedgerService } from './ledger.service';
import {
    RestoreStatusNotifier,
    SlackNotifier,
    UnconfiguredNotifier,
    type Notifier,
} from './notifier';
import { S3ObjectStore, type S3ClientFactory } from './object-store';
import { PathRestorer } from './path-restorer';
import {
    PostgresRestoreRequestStore,
    type RestoreRequestStore,
} from './store';

export type RuntimeBootstrap = {
    close: () => Promise<void>;
    config: StorageTierRestoreEnv;
    coordinator: RestoreCoordinator;
    credentials: CredentialCache;
    ledger: RestoreLedgerService;
    refresher: CredentialRefresher;
    roleArn: string;
};

export type RuntimeDependencyOverrides = {
    createS3Client?: S3ClientFactory;
    createStore?: (config: StorageTierRestoreEnv) => RestoreRequestStore;
    credentialSource?: CredentialSource;
    loadProfiles?: () => Promise<SharedConfigProfiles>;
    notifier?: Notifier;
    sleep?: (ms: number) => Promise<void>;
};

const UNCONFIGURED_CHANNEL = 'unconfigured';

function createNotifier(config: StorageTierRestoreEnv): Notifier {
    if (!config.slack) {
        console.log(
            'storage-tier-restore slack not configured; notifications disabled',
        );

        return new UnconfiguredNotifier(
            'SLACK_API_TOKEN and SLACK_CHANNEL_ID must both be set',
        );
    }

    return new SlackNotifier(config.slack.token);
}

/**
 * Builds every collaborator and fetches the first credentials. Any failure
 * here is fatal: nothing has been restored yet.
 */
export async function createRuntime(
    cli: RestoreCliOptions,
    env: NodeJS.ProcessEnv,
    dependencies: RuntimeDependencyOverrides = {},
): Promise<RuntimeBootstrap> {
    const config = parseRestoreEnv(env);
    const roleArn = await resolveRoleArn({
        loadProfiles: dependencies.loadProfiles,
        profile: cli.profile,
        roleArn: config.roleArn,
    });
    const credentials = new CredentialCache();
    const refresher = new CredentialRefresher(
        credentials,
        dependencies.credentialSource ?? new StsCredentialSource({
            sessionName: config.roleSessionName,
        }),
        {
            refreshIntervalMs: config.credentialRefreshMs,
            region: cli.region,
            roleArn,
        },
    );

    await refresher.initialize();

    const store = dependencies.createStore
        ? dependencies.createStore(config)
        : new PostgresRestoreRequestStore(config.restorePgUrl, {
            schemaName: config.ledgerSchema,
        });
    const events = new RestoreStatusNotifier(
        dependencies.notifier ?? createNotifier(config),
        config.slack?.channelId ?? UNCONFIGURED_CHANNEL,
    );
    const ledger = new RestoreLedgerService(store, { events });
    const objectStore = new S3ObjectStore(
        credentials,
        {
            callTimeoutMs: config.callTimeoutMs,
            endpoint: config.s3Endpoint,
            forcePathStyle: config.s3ForcePathStyle,
            region: cli.region,
        },
        dependencies.createS3Client,
    );
    const restorer = new PathRestorer(objectStore, ledger, {
        sleep: dependencies.sleep,
        throttleMs: config.throttleMs,
    });
    const coordinator = new RestoreCoordinator(ledger, restorer, {
        concurrency: config.concurrency,
        events,
    });

    return {
        close: async () => {
            await refresher.stop();
            await store.close();
        },
        config,
        coordinator,
        credentials,
        ledger,
        refresher,
        roleArn,
    };
}
