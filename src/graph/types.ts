/**
 * Graph runtime types.
 */

import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { Checkpointer } from './checkpointer';
import type { Command } from './command';
import type { RunConfig, StreamMode } from './config';

export type { StreamMode } from './config';

/** Sentinel naming the virtual node before the entry point */
export const START = '__start__';

/** Sentinel naming the terminal node */
export const END = '__end__';

export type NodeName = string;

/** What a node hands back to the engine */
export type NodeOutput<S> = Partial<S> | Command<S> | undefined;

/** Per-execution context handed to every node */
export interface NodeContext {
    /** Name the node is registered under */
    node: NodeName;
    /** Zero-based index of this execution within the current invocation */
    step: number;
    /** Run configuration of the owning invocation */
    config: RunConfig;
    /** Aborted when the invocation is cancelled or a sibling fan-out branch fails */
    signal?: AbortSignal;
    logger: Logger;
}

/** Graph node function signature */
export type NodeFunction<S> = (state: S, context: NodeContext) => Promise<NodeOutput<S>> | NodeOutput<S>;

/** Data-dependent edge: picks the next node from the merged state */
export type EdgeRouter<S> = (state: Readonly<S>) => NodeName;

/**
 * Reuse a node's output while its input state is unchanged. Entries are
 * keyed by a hash of the input state and expire `ttlMs` after they are stored.
 */
export interface CachePolicy {
    ttlMs: number;
}

/** Per-node options accepted by `addNode` */
export interface NodeOptions {
    cachePolicy?: CachePolicy;
}

/** Graph node definition */
export interface GraphNode<S> {
    name: NodeName;
    fn: NodeFunction<S>;
    cachePolicy?: CachePolicy;
}

export interface FixedEdge {
    kind: 'fixed';
    source: NodeName;
    target: NodeName;
}

export interface ConditionalEdge<S> {
    kind: 'conditional';
    source: NodeName;
    router: EdgeRouter<S>;
    /** Label → node name, descriptive only */
    pathMap?: Record<string, NodeName>;
}

export type GraphEdge<S> = FixedEdge | ConditionalEdge<S>;

/** Timing record emitted in `debug` mode */
export interface DebugPayload<S> {
    /** Zero-based step of the node execution that produced the event */
    step: number;
    /** Wall time of the whole step, fan-out branches included */
    durationMs: number;
    update: Partial<S>;
    state: S;
}

/**
 * One event per node completion and requested mode. Fan-out emits one per
 * branch. `messages` events are only emitted when the node's update carries
 * a `messages` array.
 */
export type GraphEvent<S> =
    | { mode: 'values'; node: NodeName; payload: S }
    | { mode: 'updates'; node: NodeName; payload: Partial<S> }
    | { mode: 'messages'; node: NodeName; payload: unknown[] }
    | { mode: 'debug'; node: NodeName; payload: DebugPayload<S> };

export interface CompleteResult<S> {
    status: 'complete';
    state: S;
}

export interface InterruptedResult<S> {
    status: 'interrupted';
    state: S;
    /** Node that runs first on resume */
    nextNode: NodeName;
    /** Value passed to `interrupt(...)`, if the pause was imperative */
    payload?: unknown;
    /** Checkpoint holding the paused state, when one was written */
    checkpointId?: string;
}

export type GraphResult<S> = CompleteResult<S> | InterruptedResult<S>;

/** Options accepted by `StateGraph.compile()` */
export interface CompileOptions<S> {
    checkpointer?: Checkpointer<S>;
    logger?: Logger;
    /** Defaults to the global tracer */
    tracer?: Tracer;
    /** Upper bound on concurrently running fan-out branches (default: unlimited) */
    maxConcurrency?: number;
    /** Used in logs and span attributes */
    name?: string;
}

export interface StreamOptions extends RunConfig {
    /** One mode or several; events are tagged with the mode that produced them. Default: 'values' */
    mode?: StreamMode | StreamMode[];
}

/** Read-only structural description of a compiled graph */
export interface GraphStructure {
    name: string;
    entryPoint: NodeName;
    nodes: NodeName[];
    edges: Array<{ source: NodeName; target: NodeName; conditional: boolean; label?: string }>;
    interruptBefore: NodeName[];
    interruptAfter: NodeName[];
}
