/**
 * CompiledGraph - the frozen, executable form of a StateGraph.
 *
 * `invoke` and `stream` drive the same state machine: `stream` hands out each
 * node completion as it happens, `invoke` drains the events and returns the
 * final GraphResult.
 */

import { randomUUID } from 'node:crypto';
import { GraphError, InvalidUpdateError, IterationLimitExceededError, NodeError, RoutingError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { noopLogger, withLogContext } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { getGlobalTracer } from '../lib/tracer';
import type { Checkpoint, Checkpointer, CheckpointMetadata } from './checkpointer';
import { isCommand } from './command';
import type { RunConfig, StreamMode } from './config';
import { parseRunConfig, parseStreamModes } from './config';
import { executeFanOut } from './fan-out';
import { NodeCache } from './node-cache';
import type { ResolvedStateSchema } from './state';
import type {
    CompileOptions,
    ConditionalEdge,
    GraphEdge,
    GraphEvent,
    GraphNode,
    GraphResult,
    GraphStructure,
    NodeContext,
    NodeName,
    NodeOutput,
    StreamOptions,
} from './types';
import { END } from './types';

/** Node executions allowed per invocation. Fixed: a circuit breaker, not a tuning knob. */
export const ITERATION_LIMIT = 100;

/** Frozen structure handed over by the builder */
export interface GraphDefinition<S> {
    nodes: ReadonlyMap<NodeName, GraphNode<S>>;
    edges: ReadonlyArray<GraphEdge<S>>;
    entryPoint: NodeName;
    interruptBefore: ReadonlySet<NodeName>;
    interruptAfter: ReadonlySet<NodeName>;
    state: ResolvedStateSchema<S>;
}

/** Outcome of one node after its output has been applied */
interface StepOutcome<S> {
    state: S;
    next: NodeName;
    /** Updates in merge order: the node itself, then any fan-out branches */
    events: Array<{ node: NodeName; update: Partial<S>; state: S }>;
    interrupt?: { payload: unknown };
}

interface RunStart<S> {
    state: S;
    current: NodeName;
    /** Resuming onto a node the previous run paused in front of */
    pastGate: boolean;
}

/**
 * Writes the checkpoints of one invocation, chaining parent ids and sequences.
 */
class CheckpointWriter<S> {
    constructor(
        private readonly checkpointer: Checkpointer<S>,
        readonly threadId: string,
        private sequence: number,
        private parentId: string | null,
        private readonly custom?: Record<string, unknown>,
    ) { }

    /**
     * `nextNode` is null for a finished run. A run paused in front of END
     * (after its last node) keeps END so a resume can tell it apart.
     */
    async write(state: S, nextNode: NodeName | null, metadata: CheckpointMetadata): Promise<string> {
        const checkpoint: Checkpoint<S> = {
            threadId: this.threadId,
            checkpointId: randomUUID(),
            state,
            nextNode,
            parentId: this.parentId,
            metadata: this.custom ? { ...metadata, custom: this.custom } : metadata,
            sequence: this.sequence + 1,
            timestamp: Date.now(),
        };

        await this.checkpointer.put(checkpoint);

        this.sequence = checkpoint.sequence;
        this.parentId = checkpoint.checkpointId;
        return checkpoint.checkpointId;
    }

    /** Chain the next write onto an existing checkpoint */
    continueFrom(checkpointId: string): void {
        this.parentId = checkpointId;
    }
}

export class CompiledGraph<S extends object> {
    readonly name: string;
    private readonly definition: GraphDefinition<S>;
    private readonly options: CompileOptions<S>;
    private readonly checkpointer?: Checkpointer<S>;
    private readonly logger: Logger;
    private readonly tracer: Tracer;
    private readonly fixedEdges = new Map<NodeName, NodeName>();
    private readonly conditionalEdges = new Map<NodeName, ConditionalEdge<S>>();
    private readonly cache = new NodeCache<S>();

    constructor(definition: GraphDefinition<S>, options: CompileOptions<S> = {}) {
        this.definition = definition;
        this.options = options;
        this.name = options.name ?? 'graph';
        this.checkpointer = options.checkpointer;
        this.logger = options.logger ?? noopLogger;
        this.tracer = options.tracer ?? getGlobalTracer();

        for (const edge of definition.edges) {
            if (edge.kind === 'conditional') {
                this.conditionalEdges.set(edge.source, edge);
            } else if (!this.fixedEdges.has(edge.source)) {
                // First registered fixed edge wins
                this.fixedEdges.set(edge.source, edge.target);
            }
        }
    }

    /**
     * Same graph, different persistence. The receiver is left untouched.
     */
    withCheckpointer(checkpointer: Checkpointer<S>): CompiledGraph<S> {
        return new CompiledGraph(this.definition, { ...this.options, checkpointer });
    }

    /**
     * Run to completion or until paused.
     *
     * With a checkpointer and a `threadId`, a pending checkpoint on the thread
     * is resumed and `input` is ignored; a finished thread starts a new run
     * with `input` merged into its last state.
     */
    async invoke(input: S, config?: RunConfig): Promise<GraphResult<S>> {
        const run = this.execute(input, parseRunConfig(config), []);
        let step = await run.next();
        while (!step.done) {
            step = await run.next();
        }
        return step.value;
    }

    /** `invoke` with a mandatory run config */
    invokeWithConfig(input: S, config: RunConfig): Promise<GraphResult<S>> {
        return this.invoke(input, config);
    }

    /**
     * Emit events per node completion, one for each requested mode, in the
     * order the modes are listed. Pull-based: the run advances only as events
     * are consumed. The generator's return value is the GraphResult.
     *
     * @example
     * ```typescript
     * for await (const event of app.stream(input, { mode: ['updates', 'debug'] })) {
     *     console.log(event.mode, event.node, event.payload);
     * }
     * ```
     */
    async *stream(input: S, options: StreamOptions = {}): AsyncGenerator<GraphEvent<S>, GraphResult<S>, undefined> {
        const { mode, ...config } = options;
        const modes = parseStreamModes(mode);
        return yield* this.execute(input, parseRunConfig(config), modes);
    }

    /**
     * Latest (or the configured) checkpoint of a thread, null when none exists.
     */
    async getState(config: RunConfig): Promise<Checkpoint<S> | null> {
        const { checkpointer, threadId, checkpointId } = this.requirePersistence(parseRunConfig(config));
        const checkpoint = await checkpointer.get(threadId, checkpointId);
        return checkpoint ? this.restore(checkpoint) : null;
    }

    /**
     * Every checkpoint of a thread, oldest first.
     */
    async getStateHistory(config: RunConfig): Promise<Checkpoint<S>[]> {
        const { checkpointer, threadId } = this.requirePersistence(parseRunConfig(config));
        const history = await checkpointer.list(threadId);
        return history.map(checkpoint => this.restore(checkpoint));
    }

    /**
     * Merge `update` into the checkpointed state and write it as a new
     * checkpoint, without executing a node. With `asNode`, the next node is
     * resolved as if that node had produced the update.
     */
    async updateState(config: RunConfig, update: Partial<S>, asNode?: NodeName): Promise<Checkpoint<S>> {
        const { checkpointer, threadId, checkpointId } = this.requirePersistence(parseRunConfig(config));

        const base = await checkpointer.get(threadId, checkpointId);
        if (!base) {
            throw new InvalidUpdateError(`No checkpoint found for thread "${threadId}"`);
        }
        if (asNode !== undefined && !this.definition.nodes.has(asNode)) {
            throw new InvalidUpdateError(`Cannot update state as unknown node "${asNode}"`);
        }

        const state = this.definition.state.merge(this.restore(base).state, update);
        const nextNode = asNode === undefined ? base.nextNode : this.resolveEdges(asNode, state);
        const latest = await checkpointer.get(threadId);

        const metadata: CheckpointMetadata = {
            source: 'update',
            step: base.metadata.step,
            ...(asNode === undefined
                ? { pausedBefore: base.metadata.pausedBefore }
                : { node: asNode }),
        };

        const writer = new CheckpointWriter(checkpointer, threadId, latest?.sequence ?? base.sequence, base.checkpointId, base.metadata.custom);
        const id = await writer.write(state, nextNode, metadata);

        this.logger.info('State updated', { graph: this.name, threadId, checkpointId: id, asNode });

        const written = await checkpointer.get(threadId, id);
        if (!written) {
            throw new GraphError(`Checkpoint "${id}" was not readable after write`);
        }
        return this.restore(written);
    }

    /**
     * Structural description for tooling. Data only; nothing here executes.
     */
    getGraph(): GraphStructure {
        const edges: GraphStructure['edges'] = [];
        for (const edge of this.definition.edges) {
            if (edge.kind === 'fixed') {
                edges.push({ source: edge.source, target: edge.target, conditional: false });
            } else if (edge.pathMap) {
                for (const [label, target] of Object.entries(edge.pathMap)) {
                    edges.push({ source: edge.source, target, conditional: true, label });
                }
            }
        }

        return {
            name: this.name,
            entryPoint: this.definition.entryPoint,
            nodes: Array.from(this.definition.nodes.keys()),
            edges,
            interruptBefore: Array.from(this.definition.interruptBefore),
            interruptAfter: Array.from(this.definition.interruptAfter),
        };
    }

    // ========================================================================
    // Execution loop
    // ========================================================================

    private async *execute(
        input: S,
        config: RunConfig,
        modes: StreamMode[],
    ): AsyncGenerator<GraphEvent<S>, GraphResult<S>, undefined> {
        const logger = withLogContext(this.logger, { graph: this.name, threadId: config.threadId });
        const span = this.tracer.startSpan('graph.invoke', {
            'graph.name': this.name,
            'graph.thread_id': config.threadId ?? '',
        });

        try {
            const writer = await this.openWriter(config);
            const start = await this.prepareRun(input, config, writer);

            let state = start.state;
            let current = start.current;
            let pastGate = start.pastGate;
            let steps = 0;

            while (true) {
                if (current === END) {
                    span.setAttribute('graph.steps', steps);
                    logger.debug('Graph completed', { steps });
                    return { status: 'complete', state };
                }

                if (steps >= ITERATION_LIMIT) {
                    logger.error('Iteration limit exceeded', { limit: ITERATION_LIMIT, node: current });
                    throw new IterationLimitExceededError(ITERATION_LIMIT);
                }

                if (!pastGate && this.definition.interruptBefore.has(current)) {
                    const checkpointId = await writer?.write(state, current, {
                        source: 'interrupt',
                        step: steps,
                        pausedBefore: current,
                    });
                    logger.info('Interrupted before node', { node: current, checkpointId });
                    span.setAttribute('graph.interrupted', true);
                    return { status: 'interrupted', state, nextNode: current, checkpointId };
                }
                pastGate = false;

                config.signal?.throwIfAborted();

                const startedAt = Date.now();
                const output = await this.runNode(current, state, steps, config, logger, config.signal);
                const outcome = await this.applyOutput(current, state, output, steps, config, logger);
                yield* emitEvents(outcome.events, modes, steps, Date.now() - startedAt);
                steps++;
                state = outcome.state;

                if (outcome.interrupt) {
                    const checkpointId = await writer?.write(state, outcome.next, {
                        source: 'interrupt',
                        step: steps,
                        node: current,
                        interruptPayload: outcome.interrupt.payload,
                    });
                    logger.info('Interrupted by node', { node: current, checkpointId });
                    span.setAttribute('graph.interrupted', true);
                    return {
                        status: 'interrupted',
                        state,
                        nextNode: outcome.next,
                        payload: outcome.interrupt.payload,
                        checkpointId,
                    };
                }

                if (this.definition.interruptAfter.has(current)) {
                    const checkpointId = await writer?.write(state, outcome.next, {
                        source: 'interrupt',
                        step: steps,
                        node: current,
                    });
                    logger.info('Interrupted after node', { node: current, checkpointId });
                    span.setAttribute('graph.interrupted', true);
                    return { status: 'interrupted', state, nextNode: outcome.next, checkpointId };
                }

                await writer?.write(state, outcome.next === END ? null : outcome.next, {
                    source: 'loop',
                    step: steps,
                    node: current,
                });
                current = outcome.next;
            }
        } catch (error) {
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            throw error;
        } finally {
            span.end();
        }
    }

    private async openWriter(config: RunConfig): Promise<CheckpointWriter<S> | null> {
        if (!this.checkpointer || config.threadId === undefined) {
            return null;
        }
        const latest = await this.checkpointer.get(config.threadId);
        return new CheckpointWriter(this.checkpointer, config.threadId, latest?.sequence ?? 0, null, config.metadata);
    }

    /**
     * Decide where the run starts: fresh, resumed from a pending checkpoint,
     * continued after a finished one, or forked from a historical one.
     */
    private async prepareRun(input: S, config: RunConfig, writer: CheckpointWriter<S> | null): Promise<RunStart<S>> {
        const { entryPoint } = this.definition;

        if (!writer || !this.checkpointer) {
            return { state: input, current: entryPoint, pastGate: false };
        }

        const source = await this.checkpointer.get(writer.threadId, config.checkpointId);
        if (config.checkpointId !== undefined && !source) {
            throw new InvalidUpdateError(`Checkpoint "${config.checkpointId}" not found for thread "${writer.threadId}"`);
        }

        if (!source) {
            await writer.write(input, entryPoint, { source: 'input', step: 0 });
            return { state: input, current: entryPoint, pastGate: false };
        }

        const restored = this.restore(source).state;
        const forking = config.checkpointId !== undefined;

        if (source.nextNode === null) {
            const state = this.definition.state.merge(restored, input);
            await this.chainFrom(writer, source, state, entryPoint, { source: forking ? 'fork' : 'input', step: 0 });
            return { state, current: entryPoint, pastGate: false };
        }

        if (source.nextNode === END) {
            // Paused after the last node: nothing is left to run
            this.logger.info('Resuming thread', { graph: this.name, threadId: writer.threadId, node: END });
            await this.chainFrom(writer, source, restored, null, {
                source: forking ? 'fork' : 'loop',
                step: 0,
                node: source.metadata.node,
            });
            return { state: restored, current: END, pastGate: false };
        }

        if (!this.definition.nodes.has(source.nextNode)) {
            throw new InvalidUpdateError(`Checkpoint "${source.checkpointId}" resumes at unknown node "${source.nextNode}"`);
        }

        if (forking) {
            await this.chainFrom(writer, source, restored, source.nextNode, {
                source: 'fork',
                step: 0,
                pausedBefore: source.metadata.pausedBefore,
            });
        } else {
            this.logger.info('Resuming thread', { graph: this.name, threadId: writer.threadId, node: source.nextNode });
            writer.continueFrom(source.checkpointId);
        }

        return {
            state: restored,
            current: source.nextNode,
            pastGate: source.metadata.pausedBefore === source.nextNode,
        };
    }

    private async chainFrom(
        writer: CheckpointWriter<S>,
        parent: Checkpoint<S>,
        state: S,
        nextNode: NodeName | null,
        metadata: CheckpointMetadata,
    ): Promise<void> {
        writer.continueFrom(parent.checkpointId);
        await writer.write(state, nextNode, metadata);
    }

    private async runNode(
        name: NodeName,
        state: S,
        step: number,
        config: RunConfig,
        logger: Logger,
        signal?: AbortSignal,
    ): Promise<NodeOutput<S>> {
        const node = this.definition.nodes.get(name);
        if (!node) {
            throw new GraphError(`Node "${name}" is not registered`);
        }

        const policy = node.cachePolicy;
        const cacheKey = policy ? this.cache.keyFor(name, state) : undefined;
        if (cacheKey !== undefined) {
            const hit = this.cache.get(cacheKey);
            if (hit) {
                logger.debug('Node cache hit', { node: name, step });
                return hit.output;
            }
        }

        const context: NodeContext = { node: name, step, config, signal, logger };
        logger.debug('Node started', { node: name, step });

        try {
            const output = await this.tracer.withSpan(
                'graph.node',
                () => node.fn(state, context),
                { 'graph.name': this.name, 'graph.node': name, 'graph.step': step },
            );
            logger.debug('Node finished', { node: name, step });
            if (policy && cacheKey !== undefined) {
                this.cache.set(cacheKey, output, policy.ttlMs);
            }
            return output;
        } catch (error) {
            logger.error('Node failed', { node: name, step, error: error instanceof Error ? error.message : String(error) });
            throw new NodeError(name, error);
        }
    }

    /**
     * Fold a node's output into state and pick the next node. Commands win
     * over the edge table.
     */
    private async applyOutput(
        node: NodeName,
        state: S,
        output: NodeOutput<S>,
        step: number,
        config: RunConfig,
        logger: Logger,
    ): Promise<StepOutcome<S>> {
        const { merge } = this.definition.state;
        const fold = (update: Partial<S> | undefined): S => (update ? merge(state, update) : state);

        if (!isCommand<S>(output)) {
            const next = fold(output);
            return {
                state: next,
                next: this.resolveEdges(node, next),
                events: [{ node, update: output ?? {}, state: next }],
            };
        }

        const directive = output.directive;
        switch (directive.type) {
            case 'goto': {
                const next = fold(directive.update);
                return {
                    state: next,
                    next: this.checkTarget(node, directive.target),
                    events: [{ node, update: directive.update ?? {}, state: next }],
                };
            }
            case 'end': {
                const next = fold(directive.update);
                return { state: next, next: END, events: [{ node, update: directive.update ?? {}, state: next }] };
            }
            case 'update': {
                const next = fold(directive.update);
                return {
                    state: next,
                    next: this.resolveEdges(node, next),
                    events: [{ node, update: directive.update, state: next }],
                };
            }
            case 'interrupt': {
                const next = fold(directive.update);
                return {
                    state: next,
                    next: this.resolveEdges(node, next),
                    events: [{ node, update: directive.update ?? {}, state: next }],
                    interrupt: { payload: directive.payload },
                };
            }
            case 'send':
                return this.fanOut(node, state, directive.targets, step, config, logger);
        }
    }

    /**
     * Dispatch every target concurrently, join, merge in listed order.
     */
    private async fanOut(
        node: NodeName,
        state: S,
        targets: Array<{ node: NodeName; input?: S }>,
        step: number,
        config: RunConfig,
        logger: Logger,
    ): Promise<StepOutcome<S>> {
        const { merge, clone } = this.definition.state;

        for (const target of targets) {
            if (!this.definition.nodes.has(target.node)) {
                logger.error('Fan-out to unknown node', { node, target: target.node });
                throw new RoutingError(node, target.node);
            }
        }

        logger.debug('Fan-out started', { node, targets: targets.map(t => t.node) });

        const results = await executeFanOut<S>(
            targets.map(target => ({
                node: target.node,
                input: target.input ?? clone(state),
                execute: async (input, signal) => {
                    const output = await this.runNode(target.node, input, step, config, logger, signal);
                    // Routing from a branch is ignored; only its update joins
                    return isCommand<S>(output) ? output.update : output;
                },
            })),
            { maxConcurrency: this.options.maxConcurrency, signal: config.signal },
        );

        let merged = state;
        const events: StepOutcome<S>['events'] = [{ node, update: {}, state }];
        for (const result of results) {
            if (result.update) {
                merged = merge(merged, result.update);
            }
            events.push({ node: result.node, update: result.update ?? {}, state: merged });
        }

        return { state: merged, next: this.resolveEdges(node, merged), events };
    }

    // ========================================================================
    // Routing
    // ========================================================================

    private resolveEdges(source: NodeName, state: S): NodeName {
        const conditional = this.conditionalEdges.get(source);
        if (conditional) {
            return this.checkTarget(source, conditional.router(Object.freeze({ ...state })));
        }

        // No outgoing edge means END
        return this.fixedEdges.get(source) ?? END;
    }

    private checkTarget(source: NodeName, target: NodeName): NodeName {
        if (target !== END && !this.definition.nodes.has(target)) {
            this.logger.error('Routing to unknown node', { graph: this.name, node: source, target });
            throw new RoutingError(source, target);
        }
        return target;
    }

    // ========================================================================
    // Persistence helpers
    // ========================================================================

    private requirePersistence(config: RunConfig): { checkpointer: Checkpointer<S>; threadId: string; checkpointId?: string } {
        if (!this.checkpointer) {
            throw new InvalidUpdateError('No checkpointer configured for this graph');
        }
        if (config.threadId === undefined) {
            throw new InvalidUpdateError('A threadId is required for state operations');
        }
        return { checkpointer: this.checkpointer, threadId: config.threadId, checkpointId: config.checkpointId };
    }

    private restore(checkpoint: Checkpoint<S>): Checkpoint<S> {
        return { ...checkpoint, state: this.definition.state.validate(checkpoint.state) };
    }
}

// ============================================================================
// Stream events
// ============================================================================

function* emitEvents<S>(
    events: StepOutcome<S>['events'],
    modes: StreamMode[],
    step: number,
    durationMs: number,
): Generator<GraphEvent<S>, void, undefined> {
    for (const { node, update, state } of events) {
        for (const mode of modes) {
            switch (mode) {
                case 'values':
                    yield { mode, node, payload: state };
                    break;
                case 'updates':
                    yield { mode, node, payload: update };
                    break;
                case 'messages': {
                    const added = addedMessages(update);
                    if (added) {
                        yield { mode, node, payload: added };
                    }
                    break;
                }
                case 'debug':
                    yield { mode, node, payload: { step, durationMs, update, state } };
                    break;
            }
        }
    }
}

/** The `messages` array of an update, when it carries a non-empty one */
function addedMessages(update: unknown): unknown[] | undefined {
    if (typeof update !== 'object' || update === null || !('messages' in update)) {
        return undefined;
    }
    const { messages } = update;
    return Array.isArray(messages) && messages.length > 0 ? messages : undefined;
}
