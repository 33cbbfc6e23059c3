import { InvalidBucketPathError } from './errors';
import type { BucketPath } from './types';

export function parseBucketPath(raw: string): BucketPath {
    const separatorIndex = raw.indexOf('/');

    if (separatorIndex <= 0) {
        throw new InvalidBucketPathError(raw);
    }

    return {
        bucket: raw.slice(0, separatorIndex),
        prefix: raw.slice(separatorIndex + 1),
        raw,
    };
}

export function tryParseBucketPath(raw: string): BucketPath | null {
    try {
        return parseBucketPath(raw);
    } catch (error: unknown) {
        if (error instanceof InvalidBucketPathError) {
            return null;
        }

        throw error;
    }
}

/**
 * Splits a comma-separated CLI value into paths. Entries are trimmed but not
 * deduplicated; a repeated path is tracked once per occurrence.
 */
export function splitBucketPathList(value: string): string[] {
    return value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
