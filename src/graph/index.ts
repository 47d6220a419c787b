/**
 * Graph runtime public exports.
 */

export { StateGraph } from './state-graph';
export { CompiledGraph, ITERATION_LIMIT } from './compiled-graph';
export type { GraphDefinition } from './compiled-graph';
export { START, END } from './types';
export type {
    NodeName,
    NodeOutput,
    NodeContext,
    NodeFunction,
    EdgeRouter,
    GraphNode,
    NodeOptions,
    CachePolicy,
    DebugPayload,
    GraphEdge,
    FixedEdge,
    ConditionalEdge,
    StreamMode,
    GraphEvent,
    GraphResult,
    CompleteResult,
    InterruptedResult,
    CompileOptions,
    StreamOptions,
    GraphStructure,
} from './types';

// State
export {
    shallowMerge,
    resolveStateSchema,
    reducers,
    appendReducer,
    sumReducer,
    replaceReducer,
    unionReducer,
} from './state';
export type { StateMerge, StateSchema, ResolvedStateSchema, FieldReducer, FieldReducers } from './state';

// Commands
export { Command, Send, interrupt, isCommand } from './command';
export type { CommandDirective } from './command';

// Run config
export { runConfigSchema, parseRunConfig, streamModeSchema, parseStreamModes } from './config';
export type { RunConfig } from './config';

// Node cache
export { NodeCache, hashState } from './node-cache';

// Fan-out
export { executeFanOut } from './fan-out';
export type { FanOutBranch, FanOutOptions, BranchResult } from './fan-out';

// Checkpointers
export { MemorySaver, jsonSerializer } from './checkpointer';
export type {
    Checkpoint,
    Checkpointer,
    CheckpointMetadata,
    CheckpointSource,
    CheckpointSerializer,
    MemorySaverOptions,
} from './checkpointer';

// Redis Checkpointer (optional - requires ioredis)
export { RedisCheckpointer } from './redis-checkpointer';
export type { RedisClient, RedisCheckpointerConfig } from './redis-checkpointer';

// Postgres Checkpointer (optional - requires pg)
export { PostgresCheckpointer } from './postgres-checkpointer';
export type { PostgresClient, PostgresCheckpointerConfig } from './postgres-checkpointer';
