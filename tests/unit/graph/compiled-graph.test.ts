import { describe, it, expect, vi } from 'vitest';
import { Command } from '../../../src/graph/command';
import { ITERATION_LIMIT } from '../../../src/graph/compiled-graph';
import { appendReducer, reducers } from '../../../src/graph/state';
import { StateGraph } from '../../../src/graph/state-graph';
import type { GraphEvent, GraphResult } from '../../../src/graph/types';
import { END, START } from '../../../src/graph/types';
import { InvalidConfigError, IterationLimitExceededError, NodeError, RoutingError } from '../../../src/lib/errors';
import type { Span, SpanAttributes, Tracer } from '../../../src/lib/tracer';

interface CounterState {
    count: number;
}

interface LogState {
    messages: string[];
}

const logSchema = { merge: reducers<LogState>({ messages: appendReducer<string>() }) };

async function collect<S>(stream: AsyncGenerator<GraphEvent<S>, GraphResult<S>, undefined>) {
    const events: GraphEvent<S>[] = [];
    let step = await stream.next();
    while (!step.done) {
        events.push(step.value);
        step = await stream.next();
    }
    return { events, result: step.value };
}

class RecordingTracer implements Tracer {
    readonly spans: Array<{ name: string; attributes: SpanAttributes; ended: boolean }> = [];

    startSpan(name: string, attributes: SpanAttributes = {}): Span {
        const record = { name, attributes: { ...attributes }, ended: false };
        this.spans.push(record);
        return {
            setAttribute: (key, value) => { record.attributes[key] = value; },
            setAttributes: attrs => { Object.assign(record.attributes, attrs); },
            recordException: () => { record.attributes.error = true; },
            addEvent: () => { },
            end: () => { record.ended = true; },
        };
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        const span = this.startSpan(name, attributes);
        try {
            return await fn(span);
        } finally {
            span.end();
        }
    }

    getConfig() {
        return {};
    }
}

describe('CompiledGraph', () => {
    describe('invoke', () => {
        it('should complete a single-node graph after one execution', async () => {
            const node = vi.fn((s: CounterState) => ({ count: s.count + 1 }));
            const app = new StateGraph<CounterState>()
                .addNode('only', node)
                .addEdge(START, 'only')
                .addEdge('only', END)
                .compile();

            const result = await app.invoke({ count: 0 });

            expect(result).toEqual({ status: 'complete', state: { count: 1 } });
            expect(node).toHaveBeenCalledTimes(1);
        });

        it('should follow fixed edges in order', async () => {
            const order: string[] = [];
            const app = new StateGraph<CounterState>()
                .addNode('a', s => { order.push('a'); return { count: s.count + 1 }; })
                .addNode('b', s => { order.push('b'); return { count: s.count * 10 }; })
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            const result = await app.invoke({ count: 1 });

            expect(order).toEqual(['a', 'b']);
            expect(result.state).toEqual({ count: 20 });
        });

        it('should end when a node has no outgoing edge', async () => {
            const app = new StateGraph<CounterState>()
                .addNode('a', () => ({ count: 5 }))
                .setEntryPoint('a')
                .compile();

            expect(await app.invoke({ count: 0 })).toEqual({ status: 'complete', state: { count: 5 } });
        });

        it('should leave state untouched when a node returns nothing', async () => {
            const app = new StateGraph<CounterState>()
                .addNode('noop', () => undefined)
                .setEntryPoint('noop')
                .compile();

            expect((await app.invoke({ count: 3 })).state).toEqual({ count: 3 });
        });

        it('should loop through a conditional edge until the router ends it', async () => {
            const a = vi.fn(() => ({ messages: ['a'] }));
            const app = new StateGraph<LogState>(logSchema)
                .addNode('A', a)
                .addNode('B', () => ({}))
                .addEdge(START, 'A')
                .addEdge('A', 'B')
                .addConditionalEdges('B', s => (s.messages.length > 3 ? END : 'A'))
                .compile();

            const result = await app.invoke({ messages: ['start'] });

            expect(result.status).toBe('complete');
            expect(result.state.messages).toEqual(['start', 'a', 'a', 'a']);
            expect(a).toHaveBeenCalledTimes(3);
        });

        it('should route on node names, never on path map labels', async () => {
            const described = new StateGraph<CounterState>()
                .addNode('work', s => ({ count: s.count + 1 }))
                .setEntryPoint('work')
                .addConditionalEdges('work', s => (s.count >= 2 ? END : 'work'), { finished: END, again: 'work' })
                .compile();
            const labelled = new StateGraph<CounterState>()
                .addNode('work', s => ({ count: s.count + 1 }))
                .setEntryPoint('work')
                .addConditionalEdges('work', () => 'finished', { finished: END })
                .compile();

            expect((await described.invoke({ count: 0 })).state).toEqual({ count: 2 });
            await expect(labelled.invoke({ count: 0 })).rejects.toThrow('Node "work" routed to unknown target "finished"');
        });

        it('should pick the same target every time for the same state', async () => {
            const router = vi.fn((s: Readonly<CounterState>) => {
                if (s.count % 3 === 0) return 'fizz';
                return s.count % 2 === 0 ? 'even' : END;
            });
            const app = new StateGraph<CounterState>()
                .addNode('start', () => ({}))
                .addNode('fizz', () => ({}))
                .addNode('even', () => ({}))
                .setEntryPoint('start')
                .addConditionalEdges('start', router)
                .compile();

            const paths: Record<number, string[]> = {};
            for (const count of [0, 1, 2, 3, 4]) {
                paths[count] = [];
                for (let run = 0; run < 10; run++) {
                    const { events } = await collect(app.stream({ count }));
                    paths[count].push(events.map(event => event.node).join(' > '));
                }
            }

            expect(paths[0]).toEqual(Array(10).fill('start > fizz'));
            expect(paths[1]).toEqual(Array(10).fill('start'));
            expect(paths[2]).toEqual(Array(10).fill('start > even'));
            expect(paths[3]).toEqual(Array(10).fill('start > fizz'));
            expect(paths[4]).toEqual(Array(10).fill('start > even'));
            expect(router).toHaveBeenCalledTimes(50);
            expect(router.mock.calls.every(([state]) => Object.isFrozen(state))).toBe(true);
        });

        it('should call the router with the merged state', async () => {
            const router = vi.fn((s: Readonly<CounterState>) => (s.count > 0 ? END : 'a'));
            const app = new StateGraph<CounterState>()
                .addNode('a', () => ({ count: 7 }))
                .setEntryPoint('a')
                .addConditionalEdges('a', router)
                .compile();

            await app.invoke({ count: 0 });

            expect(router).toHaveBeenCalledWith({ count: 7 });
        });

        it('should fail on an unknown routing target', async () => {
            const app = new StateGraph<CounterState>()
                .addNode('a', () => ({}))
                .setEntryPoint('a')
                .addConditionalEdges('a', () => 'nowhere')
                .compile();

            const error = await app.invoke({ count: 0 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RoutingError);
            expect(error instanceof RoutingError && [error.node, error.target]).toEqual(['a', 'nowhere']);
            expect(error instanceof Error && error.message).toBe('Node "a" routed to unknown target "nowhere"');
        });

        it('should wrap node failures in NodeError', async () => {
            const boom = new Error('boom');
            const app = new StateGraph<CounterState>()
                .addNode('a', () => { throw boom; })
                .setEntryPoint('a')
                .compile();

            const error = await app.invoke({ count: 0 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NodeError);
            expect(error instanceof NodeError && error.node).toBe('a');
            expect(error instanceof Error && error.cause).toBe(boom);
            expect(error instanceof Error && error.message).toBe('Node "a" failed: boom');
        });

        it('should not execute later nodes after a failure', async () => {
            const b = vi.fn(() => ({}));
            const app = new StateGraph<CounterState>()
                .addNode('a', async () => { throw new Error('down'); })
                .addNode('b', b)
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            await expect(app.invoke({ count: 0 })).rejects.toThrow('Node "a" failed: down');
            expect(b).not.toHaveBeenCalled();
        });
    });

    describe('invokeWithConfig', () => {
        it('should hand the validated config to nodes', async () => {
            const seen: Array<string | undefined> = [];
            const app = new StateGraph<CounterState>()
                .addNode('a', (_s, context) => {
                    seen.push(context.config.threadId);
                    return { count: 1 };
                })
                .setEntryPoint('a')
                .compile();

            const result = await app.invokeWithConfig({ count: 0 }, { threadId: 'thread-1' });

            expect(result).toEqual({ status: 'complete', state: { count: 1 } });
            expect(seen).toEqual(['thread-1']);
        });

        it('should reject an empty thread id', async () => {
            const node = vi.fn(() => ({}));
            const app = new StateGraph<CounterState>().addNode('a', node).setEntryPoint('a').compile();

            await expect(app.invokeWithConfig({ count: 0 }, { threadId: '' })).rejects.toBeInstanceOf(InvalidConfigError);
            expect(node).not.toHaveBeenCalled();
        });
    });

    describe('iteration limit', () => {
        it('should stop a cycle after exactly 100 executions', async () => {
            const node = vi.fn((s: CounterState) => ({ count: s.count + 1 }));
            const app = new StateGraph<CounterState>()
                .addNode('loop', node)
                .setEntryPoint('loop')
                .addEdge('loop', 'loop')
                .compile();

            const error = await app.invoke({ count: 0 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(IterationLimitExceededError);
            expect(error instanceof IterationLimitExceededError && error.limit).toBe(100);
            expect(node).toHaveBeenCalledTimes(ITERATION_LIMIT);
        });

        it('should allow reaching END on the 100th transition', async () => {
            const app = new StateGraph<CounterState>()
                .addNode('loop', s => ({ count: s.count + 1 }))
                .setEntryPoint('loop')
                .addConditionalEdges('loop', s => (s.count >= 100 ? END : 'loop'))
                .compile();

            expect(await app.invoke({ count: 0 })).toEqual({ status: 'complete', state: { count: 100 } });
        });
    });

    describe('commands', () => {
        it('should let goto override the router', async () => {
            const router = vi.fn(() => END);
            const app = new StateGraph<CounterState>()
                .addNode('a', () => Command.gotoWithUpdate<CounterState>('b', { count: 1 }))
                .addNode('b', s => ({ count: s.count + 10 }))
                .setEntryPoint('a')
                .addConditionalEdges('a', router)
                .compile();

            expect((await app.invoke({ count: 0 })).state).toEqual({ count: 11 });
            expect(router).not.toHaveBeenCalled();
        });

        it('should end the run with Command.end', async () => {
            const b = vi.fn(() => ({}));
            const app = new StateGraph<CounterState>()
                .addNode('a', () => Command.end<CounterState>({ count: 9 }))
                .addNode('b', b)
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            expect(await app.invoke({ count: 0 })).toEqual({ status: 'complete', state: { count: 9 } });
            expect(b).not.toHaveBeenCalled();
        });

        it('should route Command.update through the edge table', async () => {
            const app = new StateGraph<CounterState>()
                .addNode('a', () => Command.update<CounterState>({ count: 2 }))
                .addNode('b', s => ({ count: s.count * 3 }))
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            expect((await app.invoke({ count: 0 })).state).toEqual({ count: 6 });
        });

        it('should fail when goto names an unknown node', async () => {
            const app = new StateGraph<CounterState>()
                .addNode('a', () => Command.goto<CounterState>('ghost'))
                .setEntryPoint('a')
                .compile();

            await expect(app.invoke({ count: 0 })).rejects.toThrow('Node "a" routed to unknown target "ghost"');
        });
    });

    describe('stream', () => {
        const buildLinear = () => new StateGraph<CounterState>()
            .addNode('a', s => ({ count: s.count + 1 }))
            .addNode('b', s => ({ count: s.count + 2 }))
            .addEdge(START, 'a')
            .addEdge('a', 'b')
            .compile();

        it('should emit full state per node in values mode', async () => {
            const { events, result } = await collect(buildLinear().stream({ count: 0 }));

            expect(events).toEqual([
                { mode: 'values', node: 'a', payload: { count: 1 } },
                { mode: 'values', node: 'b', payload: { count: 3 } },
            ]);
            expect(result).toEqual({ status: 'complete', state: { count: 3 } });
        });

        it('should emit only the node update in updates mode', async () => {
            const { events } = await collect(buildLinear().stream({ count: 10 }, { mode: 'updates' }));

            expect(events).toEqual([
                { mode: 'updates', node: 'a', payload: { count: 11 } },
                { mode: 'updates', node: 'b', payload: { count: 13 } },
            ]);
        });

        it('should emit one event per requested mode in the listed order', async () => {
            const { events } = await collect(buildLinear().stream({ count: 0 }, { mode: ['updates', 'values'] }));

            expect(events).toEqual([
                { mode: 'updates', node: 'a', payload: { count: 1 } },
                { mode: 'values', node: 'a', payload: { count: 1 } },
                { mode: 'updates', node: 'b', payload: { count: 3 } },
                { mode: 'values', node: 'b', payload: { count: 3 } },
            ]);
        });

        it('should ignore repeated modes', async () => {
            const { events } = await collect(buildLinear().stream({ count: 0 }, { mode: ['values', 'values'] }));

            expect(events.map(event => event.node)).toEqual(['a', 'b']);
        });

        it('should emit step timing in debug mode', async () => {
            const { events } = await collect(buildLinear().stream({ count: 0 }, { mode: 'debug' }));

            expect(events).toEqual([
                {
                    mode: 'debug',
                    node: 'a',
                    payload: { step: 0, durationMs: expect.any(Number), update: { count: 1 }, state: { count: 1 } },
                },
                {
                    mode: 'debug',
                    node: 'b',
                    payload: { step: 1, durationMs: expect.any(Number), update: { count: 2 }, state: { count: 3 } },
                },
            ]);
        });

        it('should emit only added messages in messages mode', async () => {
            const app = new StateGraph<LogState>(logSchema)
                .addNode('greet', () => ({ messages: ['hello'] }))
                .addNode('quiet', () => ({}))
                .addEdge(START, 'greet')
                .addEdge('greet', 'quiet')
                .compile();

            const { events } = await collect(app.stream({ messages: ['earlier'] }, { mode: 'messages' }));

            expect(events).toEqual([{ mode: 'messages', node: 'greet', payload: ['hello'] }]);
        });

        it('should reject an empty mode list', async () => {
            const stream = buildLinear().stream({ count: 0 }, { mode: [] });

            await expect(stream.next()).rejects.toThrow('Invalid run config: mode: at least one stream mode is required');
        });

        it('should advance only as events are consumed', async () => {
            const b = vi.fn((s: CounterState) => ({ count: s.count + 2 }));
            const app = new StateGraph<CounterState>()
                .addNode('a', s => ({ count: s.count + 1 }))
                .addNode('b', b)
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            const stream = app.stream({ count: 0 });
            const first = await stream.next();

            expect(first).toEqual({ done: false, value: { mode: 'values', node: 'a', payload: { count: 1 } } });
            expect(b).not.toHaveBeenCalled();

            await stream.return({ status: 'complete', state: { count: 1 } });
            expect(b).not.toHaveBeenCalled();
        });

        it('should reject an invalid config on first pull', async () => {
            const stream = buildLinear().stream({ count: 0 }, { threadId: '' });

            await expect(stream.next()).rejects.toThrow('Invalid run config: threadId: threadId must not be empty');
        });
    });

    describe('cancellation', () => {
        it('should not start when the signal is already aborted', async () => {
            const node = vi.fn(() => ({}));
            const app = new StateGraph<CounterState>().addNode('a', node).setEntryPoint('a').compile();
            const controller = new AbortController();
            controller.abort(new Error('stop'));

            await expect(app.invoke({ count: 0 }, { signal: controller.signal })).rejects.toThrow('stop');
            expect(node).not.toHaveBeenCalled();
        });

        it('should stop between nodes once aborted', async () => {
            const controller = new AbortController();
            const b = vi.fn(() => ({}));
            const app = new StateGraph<CounterState>()
                .addNode('a', (_s, context) => {
                    expect(context.signal).toBe(controller.signal);
                    controller.abort(new Error('cancelled by caller'));
                    return { count: 1 };
                })
                .addNode('b', b)
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            await expect(app.invoke({ count: 0 }, { signal: controller.signal })).rejects.toThrow('cancelled by caller');
            expect(b).not.toHaveBeenCalled();
        });
    });

    describe('observability', () => {
        it('should pass node context to nodes', async () => {
            const seen: Array<{ node: string; step: number }> = [];
            const app = new StateGraph<CounterState>()
                .addNode('a', (_s, context) => { seen.push({ node: context.node, step: context.step }); return {}; })
                .addNode('b', (_s, context) => { seen.push({ node: context.node, step: context.step }); return {}; })
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile();

            await app.invoke({ count: 0 });

            expect(seen).toEqual([{ node: 'a', step: 0 }, { node: 'b', step: 1 }]);
        });

        it('should open one invoke span and one span per node', async () => {
            const tracer = new RecordingTracer();
            const app = new StateGraph<CounterState>()
                .addNode('a', () => ({}))
                .addNode('b', () => ({}))
                .addEdge(START, 'a')
                .addEdge('a', 'b')
                .compile({ tracer, name: 'traced' });

            await app.invoke({ count: 0 });

            expect(tracer.spans.map(span => span.name)).toEqual(['graph.invoke', 'graph.node', 'graph.node']);
            expect(tracer.spans.every(span => span.ended)).toBe(true);
            expect(tracer.spans[0].attributes).toEqual({ 'graph.name': 'traced', 'graph.thread_id': '', 'graph.steps': 2 });
            expect(tracer.spans[2].attributes).toEqual({ 'graph.name': 'traced', 'graph.node': 'b', 'graph.step': 1 });
        });

        it('should log node lifecycle and failures', async () => {
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
            const app = new StateGraph<CounterState>()
                .addNode('a', () => { throw new Error('bad input'); })
                .setEntryPoint('a')
                .compile({ logger, name: 'logged' });

            await expect(app.invoke({ count: 0 })).rejects.toThrow(NodeError);

            expect(logger.debug).toHaveBeenCalledWith('Node started', { graph: 'logged', threadId: undefined, node: 'a', step: 0 });
            expect(logger.error).toHaveBeenCalledWith('Node failed', {
                graph: 'logged',
                threadId: undefined,
                node: 'a',
                step: 0,
                error: 'bad input',
            });
        });
    });
});
