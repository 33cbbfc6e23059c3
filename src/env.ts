import {
    DEFAULT_CALL_TIMEOUT_MS,
    DEFAULT_CONCURRENCY,
    DEFAULT_CREDENTIAL_REFRESH_MS,
    DEFAULT_LEDGER_SCHEMA,
    DEFAULT_ROLE_SESSION_NAME,
    DEFAULT_THROTTLE_MS,
} from './constants';
import { ConfigError } from './errors';

export type SlackEnv = {
    channelId: string;
    token: string;
};

export type StorageTierRestoreEnv = {
    callTimeoutMs: number;
    concurrency: number;
    credentialRefreshMs: number;
    ledgerSchema: string;
    restorePgUrl: string;
    roleArn?: string;
    roleSessionName: string;
    s3Endpoint?: string;
    s3ForcePathStyle: boolean;
    slack?: SlackEnv;
    throttleMs: number;
};

function parsePositiveInt(
    value: string | undefined,
    fallback: number,
): number {
    if (!value) {
        return fallback;
    }

    const parsed = Number.parseInt(value, 10);

    if (!Number.isFinite(parsed) || parsed <= 0) {
        return fallback;
    }

    return parsed;
}

function parseNonNegativeInt(
    value: string | undefined,
    fallback: number,
    key: string,
): number {
    const normalized = readOptionalString(value);

    if (normalized === undefined) {
        return fallback;
    }

    const parsed = Number(normalized);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigError(`${key} must be a non-negative integer`);
    }

    return parsed;
}

function readOptionalString(
    value: string | undefined,
): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const trimmed = String(value).trim();

    return trimmed || undefined;
}

function readRequiredString(
    env: NodeJS.ProcessEnv,
    key: string,
): string {
    const value = readOptionalString(env[key]);

    if (!value) {
        throw new ConfigError(`${key} is required`);
    }

    return value;
}

function parseBoolean(
    value: string | undefined,
    fallback: boolean,
    key: string,
): boolean {
    const normalized = readOptionalString(value)?.toLowerCase();

    if (!normalized) {
        return fallback;
    }

    if (
        normalized === '1'
        || normalized === 'true'
        || normalized === 'yes'
        || normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0'
        || normalized === 'false'
        || normalized === 'no'
        || normalized === 'off'
    ) {
        return false;
    }

    throw new ConfigError(`${key} must be true or false when provided`);
}

function parseSlackEnv(env: NodeJS.ProcessEnv): SlackEnv | undefined {
    const token = readOptionalString(env.SLACK_API_TOKEN);
    const channelId = readOptionalString(env.SLACK_CHANNEL_ID);

    if (!token || !channelId) {
        return undefined;
    }

    return {
        channelId,
        token,
    };
}

export function parseRestoreEnv(
    env: NodeJS.ProcessEnv,
): StorageTierRestoreEnv {
    return {
        callTimeoutMs: parsePositiveInt(
            env.RESTORE_CALL_TIMEOUT_MS,
            DEFAULT_CALL_TIMEOUT_MS,
        ),
        concurrency: parsePositiveInt(
            env.RESTORE_CONCURRENCY,
            DEFAULT_CONCURRENCY,
        ),
        credentialRefreshMs: parsePositiveInt(
            env.RESTORE_CREDENTIAL_REFRESH_MS,
            DEFAULT_CREDENTIAL_REFRESH_MS,
        ),
        ledgerSchema: readOptionalString(env.RESTORE_PG_SCHEMA)
            || DEFAULT_LEDGER_SCHEMA,
        restorePgUrl: readRequiredString(env, 'RESTORE_PG_URL'),
        roleArn: readOptionalString(env.RESTORE_ROLE_ARN),
        roleSessionName: readOptionalString(env.RESTORE_ROLE_SESSION_NAME)
            || DEFAULT_ROLE_SESSION_NAME,
        s3Endpoint: readOptionalString(env.RESTORE_S3_ENDPOINT),
        s3ForcePathStyle: parseBoolean(
            env.RESTORE_S3_FORCE_PATH_STYLE,
            false,
            'RESTORE_S3_FORCE_PATH_STYLE',
        ),
        slack: parseSlackEnv(env),
        throttleMs: parseNonNegativeInt(
            env.RESTORE_THROTTLE_MS,
            DEFAULT_THROTTLE_MS,
            'RESTORE_THROTTLE_MS',
        ),
    };
}
