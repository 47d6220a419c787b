/**
 * Redis Checkpointer implementation.
 * Works with ioredis or any client with the same command surface.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisCheckpointer } from 'graphloom';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const checkpointer = new RedisCheckpointer(redis, { prefix: 'myapp:', ttlSeconds: 86400 });
 * ```
 */

import type { Checkpoint, Checkpointer, CheckpointSerializer } from './checkpointer';
import { jsonSerializer } from './checkpointer';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string, exMode?: 'EX', seconds?: number): Promise<unknown>;
    get(key: string): Promise<string | null>;
    del(...keys: string[]): Promise<number>;
    zadd(key: string, mode: 'NX', score: number, member: string): Promise<unknown>;
    zrange(key: string, start: number, stop: number): Promise<string[]>;
    expire(key: string, seconds: number): Promise<unknown>;
}

/** Redis checkpointer configuration */
export interface RedisCheckpointerConfig<S> {
    /** Key prefix (default: 'graphloom:') */
    prefix?: string;
    /** TTL in seconds for checkpoint and index keys (default: no expiry) */
    ttlSeconds?: number;
    serializer?: CheckpointSerializer<S>;
}

/**
 * Redis-based checkpointer.
 *
 * Key scheme:
 * - `{prefix}checkpoint:{threadId}:{checkpointId}` → serialized checkpoint
 * - `{prefix}index:{threadId}` → sorted set of checkpoint ids scored by sequence
 */
export class RedisCheckpointer<S = unknown> implements Checkpointer<S> {
    private readonly redis: RedisClient;
    private readonly prefix: string;
    private readonly ttlSeconds?: number;
    private readonly serializer: CheckpointSerializer<S>;

    constructor(client: RedisClient, config: RedisCheckpointerConfig<S> = {}) {
        this.redis = client;
        this.prefix = config.prefix ?? 'graphloom:';
        this.ttlSeconds = config.ttlSeconds;
        this.serializer = config.serializer ?? jsonSerializer<S>();
    }

    private checkpointKey(threadId: string, checkpointId: string): string {
        return `${this.prefix}checkpoint:${threadId}:${checkpointId}`;
    }

    private indexKey(threadId: string): string {
        return `${this.prefix}index:${threadId}`;
    }

    async put(checkpoint: Checkpoint<S>): Promise<void> {
        const key = this.checkpointKey(checkpoint.threadId, checkpoint.checkpointId);
        const index = this.indexKey(checkpoint.threadId);

        // A re-submitted checkpoint keeps the sequence it was first stored with
        const previous = await this.redis.get(key);
        const sequence = previous ? this.serializer.parse(previous).sequence : checkpoint.sequence;
        const data = this.serializer.stringify({ ...checkpoint, sequence });

        if (this.ttlSeconds) {
            await this.redis.set(key, data, 'EX', this.ttlSeconds);
        } else {
            await this.redis.set(key, data);
        }

        await this.redis.zadd(index, 'NX', sequence, checkpoint.checkpointId);

        if (this.ttlSeconds) {
            await this.redis.expire(index, this.ttlSeconds);
        }
    }

    async get(threadId: string, checkpointId?: string): Promise<Checkpoint<S> | null> {
        if (checkpointId !== undefined) {
            const data = await this.redis.get(this.checkpointKey(threadId, checkpointId));
            return data ? this.serializer.parse(data) : null;
        }

        // Newest first, skipping index entries whose data has expired
        const ids = await this.redis.zrange(this.indexKey(threadId), 0, -1);
        for (let i = ids.length - 1; i >= 0; i--) {
            const data = await this.redis.get(this.checkpointKey(threadId, ids[i]));
            if (data) {
                return this.serializer.parse(data);
            }
        }
        return null;
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        const ids = await this.redis.zrange(this.indexKey(threadId), 0, -1);
        const result: Checkpoint<S>[] = [];

        for (const id of ids) {
            const data = await this.redis.get(this.checkpointKey(threadId, id));
            // Expired entries may linger in the index
            if (data) {
                result.push(this.serializer.parse(data));
            }
        }

        return result;
    }

    async deleteThread(threadId: string): Promise<number> {
        const ids = await this.redis.zrange(this.indexKey(threadId), 0, -1);
        if (ids.length === 0) return 0;

        await this.redis.del(...ids.map(id => this.checkpointKey(threadId, id)));
        await this.redis.del(this.indexKey(threadId));

        return ids.length;
    }
}
