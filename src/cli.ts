import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { splitBucketPathList } from './bucket-path';
import { DEFAULT_TTL_DAYS } from './constants';
import { ConfigError } from './errors';

export type RestoreCliOptions = {
    bucketPaths: string[];
    profile?: string;
    region: string;
    resume?: string;
    ttlDays: number;
};

type RawCliOptions = {
    bucketPaths?: string;
    profile?: string;
    region?: string;
    resume?: string;
    ttl: number;
};

function parseTtlDays(value: string): number {
    const parsed = Number(value);

    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('ttl must be a positive integer');
    }

    return parsed;
}

export function buildCliProgram(): Command {
    return new Command('storage-tier-restore')
        .description(
            'Restore objects from REDUCED_REDUNDANCY to STANDARD storage',
        )
        .option(
            '--bucket-paths <paths>',
            'comma-separated list of bucket/prefix paths to restore',
        )
        .option('--region <region>', 'object store region')
        .option(
            '--ttl <days>',
            'days restored objects stay in STANDARD before reverting',
            parseTtlDays,
            DEFAULT_TTL_DAYS,
        )
        .option('--profile <name>', 'profile whose role_arn is assumed')
        .option('--resume <requestId>', 'resume an unfinished request')
        .exitOverride()
        .configureOutput({
            // parse errors surface as ConfigError instead
            writeErr: () => undefined,
        });
}

/**
 * `argv` excludes the node binary and script path.
 */
export function parseCliArgs(argv: readonly string[]): RestoreCliOptions {
    const program = buildCliProgram();

    try {
        program.parse([...argv], { from: 'user' });
    } catch (error: unknown) {
        if (error instanceof CommanderError && error.exitCode !== 0) {
            throw new ConfigError(error.message);
        }

        throw error;
    }

    const raw = program.opts<RawCliOptions>();
    const region = raw.region?.trim();

    if (!region) {
        throw new ConfigError('--region is required');
    }

    const bucketPaths = splitBucketPathList(raw.bucketPaths ?? '');

    if (!raw.resume && bucketPaths.length === 0) {
        throw new ConfigError('--bucket-paths is required');
    }

    return {
        bucketPaths,
        profile: raw.profile?.trim() || undefined,
        region,
        resume: raw.resume?.trim() || undefined,
        ttlDays: raw.ttl,
    };
}
