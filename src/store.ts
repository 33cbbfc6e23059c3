import { Pool, type PoolConfig } from 'pg';
import { DEFAULT_LEDGER_SCHEMA, LEDGER_TABLE } from './constants';
import { LedgerError } from './errors';
import type { RestoreRequest } from './types';

export type RestoreRequestPathsUpdate = {
    pendingPaths: string[];
    processedPaths: string[];
    updatedAt: string;
};

export interface RestoreRequestStore {
    close(): Promise<void>;
    deleteRequest(requestId: string): Promise<boolean>;
    ensureSchema(): Promise<void>;
    getRequest(requestId: string): Promise<RestoreRequest | null>;
    insertRequest(request: RestoreRequest): Promise<void>;
    listRequests(): Promise<RestoreRequest[]>;
    updatePaths(
        requestId: string,
        update: RestoreRequestPathsUpdate,
    ): Promise<boolean>;
}

function cloneRequest(request: RestoreRequest): RestoreRequest {
    return {
        ...request,
        pendingPaths: [...request.pendingPaths],
        processedPaths: [...request.processedPaths],
    };
}

function duplicateRequestError(requestId: string): LedgerError {
    return new LedgerError(
        'duplicate_request',
        `restore request ${requestId} already exists`,
    );
}

export class InMemoryRestoreRequestStore implements RestoreRequestStore {
    private readonly requests = new Map<string, RestoreRequest>();

    private schemaReady = false;

    get isSchemaReady(): boolean {
        return this.schemaReady;
    }

    async close(): Promise<void> {
        this.requests.clear();
    }

    async ensureSchema(): Promise<void> {
        this.schemaReady = true;
    }

    async insertRequest(request: RestoreRequest): Promise<void> {
        if (this.requests.has(request.requestId)) {
            throw duplicateRequestError(request.requestId);
        }

        this.requests.set(request.requestId, cloneRequest(request));
    }

    async getRequest(requestId: string): Promise<RestoreRequest | null> {
        const request = this.requests.get(requestId);

        return request ? cloneRequest(request) : null;
    }

    async updatePaths(
        requestId: string,
        update: RestoreRequestPathsUpdate,
    ): Promise<boolean> {
        const existing = this.requests.get(requestId);

        if (!existing) {
            return false;
        }

        this.requests.set(requestId, {
            ...existing,
            pendingPaths: [...update.pendingPaths],
            processedPaths: [...update.processedPaths],
            updatedAt: update.updatedAt,
        });

        return true;
    }

    async deleteRequest(requestId: string): Promise<boolean> {
        return this.requests.delete(requestId);
    }

    async listRequests(): Promise<RestoreRequest[]> {
        return [...this.requests.values()]
            .sort((left, right) => left.createdAt.localeCompare(right.createdAt))
            .map(cloneRequest);
    }
}

type RestoreRequestRow = {
    created_at: Date | string;
    pending_paths: string;
    processed_paths: string;
    request_id: string;
    ttl_days: number | string;
    updated_at: Date | string;
};

export type PostgresRestoreRequestStoreOptions = {
    pool?: Pool;
    poolConfig?: Omit<PoolConfig, 'connectionString'>;
    schemaName?: string;
};

const PG_UNIQUE_VIOLATION = '23505';

function validateSqlIdentifier(
    value: string,
    field: string,
): string {
    const trimmed = String(value || '').trim();

    if (!trimmed) {
        throw new Error(`${field} must not be empty`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${field} must use [A-Za-z_][A-Za-z0-9_]* identifier format`,
        );
    }

    return trimmed;
}

function toTimestamp(
    value: Date | string,
    field: string,
): string {
    const parsed = value instanceof Date ? value : new Date(value);

    if (Number.isNaN(parsed.getTime())) {
        throw new LedgerError('store_failure', `invalid ${field} timestamp`);
    }

    return parsed.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function parsePathList(
    value: unknown,
    field: string,
): string[] {
    const parsed: unknown = typeof value === 'string'
        ? JSON.parse(value)
        : value;

    if (
        !Array.isArray(parsed)
        || !parsed.every((entry) => typeof entry === 'string')
    ) {
        throw new LedgerError('store_failure', `invalid ${field} payload`);
    }

    return parsed;
}

function readRow(row: RestoreRequestRow): RestoreRequest {
    const ttlDays = Number(row.ttl_days);

    if (!Number.isInteger(ttlDays)) {
        throw new LedgerError('store_failure', 'invalid ttl_days integer');
    }

    return {
        createdAt: toTimestamp(row.created_at, 'created_at'),
        pendingPaths: parsePathList(row.pending_paths, 'pending_paths'),
        processedPaths: parsePathList(row.processed_paths, 'processed_paths'),
        requestId: row.request_id,
        ttlDays,
        updatedAt: toTimestamp(row.updated_at, 'updated_at'),
    };
}

function isUniqueViolation(error: unknown): boolean {
    return error instanceof Error
        && 'code' in error
        && error.code === PG_UNIQUE_VIOLATION;
}

export class PostgresRestoreRequestStore implements RestoreRequestStore {
    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private ready: Promise<void> | null = null;

    private readonly schemaName: string;

    private readonly tableQualified: string;

    constructor(
        pgUrl: string,
        options: PostgresRestoreRequestStoreOptions = {},
    ) {
        const connectionString = String(pgUrl || '').trim();

        if (!connectionString && !options.pool) {
            throw new Error('RESTORE_PG_URL is required');
        }

        this.schemaName = validateSqlIdentifier(
            options.schemaName || DEFAULT_LEDGER_SCHEMA,
            'restore ledger schema name',
        );
        this.tableQualified = `"${this.schemaName}"."${LEDGER_TABLE}"`;

        if (options.pool) {
            this.pool = options.pool;
            this.ownsPool = false;
        } else {
            this.pool = new Pool({
                allowExitOnIdle: true,
                connectionString,
                idleTimeoutMillis: options.poolConfig?.idleTimeoutMillis ?? 30000,
                max: options.poolConfig?.max ?? 10,
                ...options.poolConfig,
            });
            this.ownsPool = true;
        }
    }

    async close(): Promise<void> {
        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    async ensureSchema(): Promise<void> {
        if (!this.ready) {
            this.ready = this.initialize().catch((error: unknown) => {
                this.ready = null;
                throw error;
            });
        }

        await this.ready;
    }

    async insertRequest(request: RestoreRequest): Promise<void> {
        await this.ensureSchema();

        const existing = await this.pool.query<{ request_id: string }>(
            `SELECT request_id FROM ${this.tableQualified}
            WHERE request_id = $1`,
            [request.requestId],
        );

        if (existing.rows.length > 0) {
            throw duplicateRequestError(request.requestId);
        }

        try {
            await this.pool.query(
                `INSERT INTO ${this.tableQualified} (
                    request_id,
                    pending_paths,
                    processed_paths,
                    ttl_days,
                    created_at,
                    updated_at
                ) VALUES ($1, $2, $3, $4, $5, $6)`,
                [
                    request.requestId,
                    JSON.stringify(request.pendingPaths),
                    JSON.stringify(request.processedPaths),
                    request.ttlDays,
                    request.createdAt,
                    request.updatedAt,
                ],
            );
        } catch (error: unknown) {
            if (isUniqueViolation(error)) {
                throw duplicateRequestError(request.requestId);
            }

            throw error;
        }
    }

    async getRequest(requestId: string): Promise<RestoreRequest | null> {
        await this.ensureSchema();

        const result = await this.pool.query<RestoreRequestRow>(
            `SELECT
                request_id,
                pending_paths,
                processed_paths,
                ttl_days,
                created_at,
                updated_at
            FROM ${this.tableQualified}
            WHERE request_id = $1`,
            [requestId],
        );
        const row = result.rows[0];

        return row ? readRow(row) : null;
    }

    async updatePaths(
        requestId: string,
        update: RestoreRequestPathsUpdate,
    ): Promise<boolean> {
        await this.ensureSchema();

        const result = await this.pool.query<{ request_id: string }>(
            `UPDATE ${this.tableQualified}
            SET pending_paths = $2,
                processed_paths = $3,
                updated_at = $4
            WHERE request_id = $1
            RETURNING request_id`,
            [
                requestId,
                JSON.stringify(update.pendingPaths),
                JSON.stringify(update.processedPaths),
                update.updatedAt,
            ],
        );

        return result.rows.length > 0;
    }

    async deleteRequest(requestId: string): Promise<boolean> {
        await this.ensureSchema();

        const result = await this.pool.query<{ request_id: string }>(
            `DELETE FROM ${this.tableQualified}
            WHERE request_id = $1
            RETURNING request_id`,
            [requestId],
        );

        return result.rows.length > 0;
    }

    async listRequests(): Promise<RestoreRequest[]> {
        await this.ensureSchema();

        const result = await this.pool.query<RestoreRequestRow>(
            `SELECT
                request_id,
                pending_paths,
                processed_paths,
                ttl_days,
                created_at,
                updated_at
            FROM ${this.tableQualified}
            ORDER BY created_at ASC, request_id ASC`,
        );

        return result.rows.map(readRow);
    }

    private async initialize(): Promise<void> {
        await this.pool.query(`CREATE SCHEMA IF NOT EXISTS "${this.schemaName}"`);
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.tableQualified} (
    request_id TEXT PRIMARY KEY,
    pending_paths TEXT NOT NULL,
    processed_paths TEXT NOT NULL,
    ttl_days INTEGER NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
)`);
    }
}
