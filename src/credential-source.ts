import {
    AssumeRoleCommand,
    STSClient,
    type STSClientConfig,
} from '@aws-sdk/client-sts';
import { loadSharedConfigFiles } from '@smithy/shared-ini-file-loader';
import { DEFAULT_ROLE_SESSION_NAME } from './constants';
import type { CredentialSource } from './credential-cache';
import { ConfigError } from './errors';
import type { CredentialMaterial } from './types';

export type StsCredentialSourceOptions = {
    createClient?: (config: STSClientConfig) => Pick<STSClient, 'send'>;
    durationSeconds?: number;
    endpoint?: string;
    sessionName?: string;
};

export class StsCredentialSource implements CredentialSource {
    private readonly createClient: (
        config: STSClientConfig,
    ) => Pick<STSClient, 'send'>;

    constructor(private readonly options: StsCredentialSourceOptions = {}) {
        this.createClient = options.createClient
            ?? ((config: STSClientConfig) => new STSClient(config));
    }

    async assumeRole(
        roleArn: string,
        region: string,
    ): Promise<CredentialMaterial> {
        const clientConfig: STSClientConfig = {
            region,
        };

        if (this.options.endpoint) {
            clientConfig.endpoint = this.options.endpoint;
        }

        const client = this.createClient(clientConfig);
        const response = await client.send(
            new AssumeRoleCommand({
                DurationSeconds: this.options.durationSeconds,
                RoleArn: roleArn,
                RoleSessionName: this.options.sessionName
                    ?? DEFAULT_ROLE_SESSION_NAME,
            }),
        );
        const credentials = response.Credentials;

        if (
            !credentials?.AccessKeyId
            || !credentials.SecretAccessKey
            || !credentials.SessionToken
        ) {
            throw new Error(`assume role returned no credentials for ${roleArn}`);
        }

        return {
            accessKeyId: credentials.AccessKeyId,
            expiration: credentials.Expiration ?? null,
            secretAccessKey: credentials.SecretAccessKey,
            sessionToken: credentials.SessionToken,
        };
    }
}

export type SharedConfigProfiles = Record<
    string,
    Record<string, string | undefined>
>;

export type ResolveRoleArnInput = {
    loadProfiles?: () => Promise<SharedConfigProfiles>;
    profile?: string;
    roleArn?: string;
};

async function loadConfigProfiles(): Promise<SharedConfigProfiles> {
    const files = await loadSharedConfigFiles();

    return {
        ...files.credentialsFile,
        ...files.configFile,
    };
}

/**
 * An explicit role wins over the profile lookup. The profile's `role_arn`
 * comes from the shared AWS config and credentials files.
 */
export async function resolveRoleArn(
    input: ResolveRoleArnInput,
): Promise<string> {
    if (input.roleArn) {
        return input.roleArn;
    }

    if (!input.profile) {
        throw new ConfigError(
            'a role is required: pass --profile or set RESTORE_ROLE_ARN',
        );
    }

    const profiles = await (input.loadProfiles ?? loadConfigProfiles)();
    const roleArn = profiles[input.profile]?.role_arn?.trim();

    if (!roleArn) {
        throw new ConfigError(
            `profile ${input.profile} does not define role_arn`,
        );
    }

    return roleArn;
}
