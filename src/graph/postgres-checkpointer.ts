/**
 * PostgreSQL Checkpointer implementation.
 * Works with a pg Pool or Client; only the `query` method is used.
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { PostgresCheckpointer } from 'graphloom';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const checkpointer = new PostgresCheckpointer(pool, { tableName: 'checkpoints' });
 *
 * // Create table (run once)
 * await checkpointer.createTable();
 * ```
 */

import type { Checkpoint, CheckpointMetadata, Checkpointer } from './checkpointer';

/** Postgres client interface (compatible with pg Pool) */
export interface PostgresClient {
    query<T = unknown>(text: string, values?: unknown[]): Promise<{ rows: T[]; rowCount?: number | null }>;
}

/** Postgres checkpointer configuration */
export interface PostgresCheckpointerConfig {
    /** Table name (default: 'graph_checkpoints') */
    tableName?: string;
    /** Schema name (default: 'public') */
    schema?: string;
}

interface CheckpointRow<S> {
    thread_id: string;
    checkpoint_id: string;
    parent_id: string | null;
    next_node: string | null;
    sequence: string | number;
    created_at: string | number;
    metadata: CheckpointMetadata;
    state: S;
}

const COLUMNS = 'thread_id, checkpoint_id, parent_id, next_node, sequence, created_at, metadata, state';

/**
 * PostgreSQL-based checkpointer.
 * State and metadata are stored as JSONB; state must be JSON-safe.
 */
export class PostgresCheckpointer<S = unknown> implements Checkpointer<S> {
    private readonly client: PostgresClient;
    private readonly tableName: string;
    private readonly schema: string;

    constructor(client: PostgresClient, config: PostgresCheckpointerConfig = {}) {
        this.client = client;
        this.tableName = config.tableName ?? 'graph_checkpoints';
        this.schema = config.schema ?? 'public';
    }

    private get table(): string {
        return `"${this.schema}"."${this.tableName}"`;
    }

    /**
     * Create the checkpoints table if it doesn't exist.
     * Run this during application setup.
     */
    async createTable(): Promise<void> {
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                thread_id TEXT NOT NULL,
                checkpoint_id TEXT NOT NULL,
                parent_id TEXT,
                next_node TEXT,
                sequence BIGINT NOT NULL,
                created_at BIGINT NOT NULL,
                metadata JSONB NOT NULL,
                state JSONB NOT NULL,
                PRIMARY KEY (thread_id, checkpoint_id)
            )
        `);

        await this.client.query(`
            CREATE INDEX IF NOT EXISTS idx_${this.tableName}_thread_sequence
            ON ${this.table} (thread_id, sequence)
        `);
    }

    async put(checkpoint: Checkpoint<S>): Promise<void> {
        // ON CONFLICT leaves sequence untouched so the entry keeps its position
        await this.client.query(
            `INSERT INTO ${this.table} (${COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             ON CONFLICT (thread_id, checkpoint_id) DO UPDATE SET
                parent_id = EXCLUDED.parent_id,
                next_node = EXCLUDED.next_node,
                created_at = EXCLUDED.created_at,
                metadata = EXCLUDED.metadata,
                state = EXCLUDED.state`,
            [
                checkpoint.threadId,
                checkpoint.checkpointId,
                checkpoint.parentId,
                checkpoint.nextNode,
                checkpoint.sequence,
                checkpoint.timestamp,
                JSON.stringify(checkpoint.metadata),
                JSON.stringify(checkpoint.state),
            ],
        );
    }

    async get(threadId: string, checkpointId?: string): Promise<Checkpoint<S> | null> {
        const result = checkpointId === undefined
            ? await this.client.query<CheckpointRow<S>>(
                `SELECT ${COLUMNS} FROM ${this.table}
                 WHERE thread_id = $1
                 ORDER BY sequence DESC
                 LIMIT 1`,
                [threadId],
            )
            : await this.client.query<CheckpointRow<S>>(
                `SELECT ${COLUMNS} FROM ${this.table}
                 WHERE thread_id = $1 AND checkpoint_id = $2`,
                [threadId, checkpointId],
            );

        const row = result.rows[0];
        return row ? this.fromRow(row) : null;
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        const result = await this.client.query<CheckpointRow<S>>(
            `SELECT ${COLUMNS} FROM ${this.table}
             WHERE thread_id = $1
             ORDER BY sequence ASC`,
            [threadId],
        );

        return result.rows.map(row => this.fromRow(row));
    }

    async deleteThread(threadId: string): Promise<number> {
        const result = await this.client.query(
            `DELETE FROM ${this.table} WHERE thread_id = $1`,
            [threadId],
        );
        return result.rowCount ?? 0;
    }

    // BIGINT columns come back from pg as strings
    private fromRow(row: CheckpointRow<S>): Checkpoint<S> {
        return {
            threadId: row.thread_id,
            checkpointId: row.checkpoint_id,
            parentId: row.parent_id,
            nextNode: row.next_node,
            sequence: Number(row.sequence),
            timestamp: Number(row.created_at),
            metadata: row.metadata,
            state: row.state,
        };
    }
}
