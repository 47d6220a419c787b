/**
 * Node output cache.
 * Scoped by node name + a hash of the node's input state.
 */

import { createHash } from 'node:crypto';
import type { NodeName, NodeOutput } from './types';

interface CacheEntry<S> {
    output: NodeOutput<S>;
    timestamp: number;
    ttlMs: number;
}

/**
 * JSON with object keys sorted, so equal states hash equally whatever
 * order their keys were assigned in.
 */
function canonicalJson(value: unknown): string {
    return JSON.stringify(value, (_key, current: unknown) => {
        if (current !== null && typeof current === 'object' && !Array.isArray(current)) {
            return Object.fromEntries(
                Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
            );
        }
        return current;
    }) ?? 'undefined';
}

/** sha256 of the canonical JSON form of `state` */
export function hashState(state: unknown): string {
    return createHash('sha256').update(canonicalJson(state)).digest('hex');
}

/**
 * Outputs are handed back as stored; nodes must not mutate what they return.
 */
export class NodeCache<S> {
    private readonly entries = new Map<string, CacheEntry<S>>();

    /** Taken before the node runs */
    keyFor(node: NodeName, state: S): string {
        return `${node}:${hashState(state)}`;
    }

    /**
     * Cached output under `key`; undefined when missing or expired.
     * A node that returned nothing is cached as `{ output: undefined }`.
     */
    get(key: string): { output: NodeOutput<S> } | undefined {
        const entry = this.entries.get(key);

        if (!entry) {
            return undefined;
        }

        if (Date.now() - entry.timestamp >= entry.ttlMs) {
            this.entries.delete(key);
            return undefined;
        }

        return { output: entry.output };
    }

    set(key: string, output: NodeOutput<S>, ttlMs: number): void {
        this.entries.set(key, { output, timestamp: Date.now(), ttlMs });
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }
}
