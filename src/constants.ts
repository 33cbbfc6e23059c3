export const DEPRECATED_STORAGE_TIER = 'REDUCED_REDUNDANCY';
export const TARGET_STORAGE_TIER = 'STANDARD';

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_THROTTLE_MS = 2000;
export const DEFAULT_CALL_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_CREDENTIAL_REFRESH_MS = 30 * 60 * 1000;
export const DEFAULT_TTL_DAYS = 30;
export const DEFAULT_ROLE_SESSION_NAME = 'storage-tier-restore';
export const DEFAULT_LEDGER_SCHEMA = 'storage_tier_restore';
export const LEDGER_TABLE = 'restore_requests';

export const REQUEST_ID_BYTES = 16;
