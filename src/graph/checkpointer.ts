/**
 * Checkpointer - State persistence for graph execution.
 *
 * A checkpoint is the durable record of a run: the state after the last
 * completed node plus the node to execute next. Backends only have to keep
 * checkpoints per thread in sequence order.
 */

import type { NodeName } from './types';

/** Why a checkpoint was written */
export type CheckpointSource = 'input' | 'loop' | 'interrupt' | 'update' | 'fork';

/**
 * Checkpoint metadata.
 */
export interface CheckpointMetadata {
    source: CheckpointSource;
    /** Node executions completed by the writing invocation */
    step: number;
    /** Node that produced the state, if any */
    node?: NodeName;
    /** Set when the run paused in front of this node (interruptBefore) */
    pausedBefore?: NodeName;
    /** Value passed to an imperative interrupt */
    interruptPayload?: unknown;
    /** Caller metadata from the run config */
    custom?: Record<string, unknown>;
}

/**
 * Stored checkpoint.
 */
export interface Checkpoint<S = unknown> {
    threadId: string;
    checkpointId: string;
    state: S;
    /** Node to run on resume; END while paused after the last node; null once the run finished */
    nextNode: NodeName | null;
    parentId: string | null;
    metadata: CheckpointMetadata;
    /** Strictly increasing per thread */
    sequence: number;
    /** Creation time (ms since epoch) */
    timestamp: number;
}

/**
 * Checkpointer interface.
 */
export interface Checkpointer<S = unknown> {
    /**
     * Store a checkpoint. Re-submitting an existing (threadId, checkpointId)
     * replaces its data and keeps its position in the thread.
     */
    put(checkpoint: Checkpoint<S>): Promise<void>;

    /**
     * Load a specific checkpoint, or the highest-sequence one when no id is given.
     */
    get(threadId: string, checkpointId?: string): Promise<Checkpoint<S> | null>;

    /**
     * All checkpoints of a thread, oldest first.
     */
    list(threadId: string): Promise<Checkpoint<S>[]>;

    /**
     * Remove every checkpoint of a thread. Returns the number removed.
     */
    deleteThread(threadId: string): Promise<number>;
}

/** Text encoding used by the external-store backends */
export interface CheckpointSerializer<S> {
    stringify(checkpoint: Checkpoint<S>): string;
    parse(text: string): Checkpoint<S>;
}

/**
 * JSON encoding. State must be JSON-safe; use a custom serializer for
 * Dates, Maps or binary payloads.
 */
export function jsonSerializer<S>(): CheckpointSerializer<S> {
    return {
        stringify: checkpoint => JSON.stringify(checkpoint),
        parse: text => JSON.parse(text),
    };
}

/** In-memory checkpointer options */
export interface MemorySaverOptions<S> {
    /** Keep at most this many checkpoints per thread, dropping the oldest (default: unlimited) */
    maxPerThread?: number;
    /** Copy applied on write and read (default: structuredClone) */
    clone?: (checkpoint: Checkpoint<S>) => Checkpoint<S>;
}

/**
 * In-memory checkpointer.
 * Suitable for testing and short-lived sessions.
 */
export class MemorySaver<S = unknown> implements Checkpointer<S> {
    private readonly threads = new Map<string, Checkpoint<S>[]>();
    private readonly maxPerThread: number;
    private readonly clone: (checkpoint: Checkpoint<S>) => Checkpoint<S>;

    constructor(options: MemorySaverOptions<S> = {}) {
        this.maxPerThread = options.maxPerThread ?? Number.POSITIVE_INFINITY;
        this.clone = options.clone ?? (checkpoint => structuredClone(checkpoint));
    }

    async put(checkpoint: Checkpoint<S>): Promise<void> {
        const stored = this.clone(checkpoint);
        const entries = this.threads.get(checkpoint.threadId) ?? [];

        const existing = entries.findIndex(entry => entry.checkpointId === checkpoint.checkpointId);
        if (existing >= 0) {
            // Replace data, keep ordering position
            entries[existing] = { ...stored, sequence: entries[existing].sequence };
        } else {
            entries.push(stored);
            entries.sort((a, b) => a.sequence - b.sequence);
        }

        if (entries.length > this.maxPerThread) {
            entries.splice(0, entries.length - this.maxPerThread);
        }

        this.threads.set(checkpoint.threadId, entries);
    }

    async get(threadId: string, checkpointId?: string): Promise<Checkpoint<S> | null> {
        const entries = this.threads.get(threadId);
        if (!entries || entries.length === 0) {
            return null;
        }

        const found = checkpointId === undefined
            ? entries[entries.length - 1]
            : entries.find(entry => entry.checkpointId === checkpointId);

        return found ? this.clone(found) : null;
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        return (this.threads.get(threadId) ?? []).map(entry => this.clone(entry));
    }

    async deleteThread(threadId: string): Promise<number> {
        const count = this.threads.get(threadId)?.length ?? 0;
        this.threads.delete(threadId);
        return count;
    }
}
