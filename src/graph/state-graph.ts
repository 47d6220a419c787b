/**
 * StateGraph - graph builder.
 *
 * Registration never fails; every structural problem is collected and
 * reported together by `compile()`.
 */

import { CompileError } from '../lib/errors';
import { CompiledGraph } from './compiled-graph';
import type { StateSchema } from './state';
import { resolveStateSchema } from './state';
import type {
    CompileOptions,
    EdgeRouter,
    GraphEdge,
    GraphNode,
    NodeFunction,
    NodeName,
    NodeOptions,
} from './types';
import { END, START } from './types';

const RESERVED_NAMES: ReadonlySet<string> = new Set([START, END]);

/**
 * StateGraph builder for stateful workflows.
 *
 * @example
 * ```typescript
 * const graph = new StateGraph<{ count: number }>()
 *     .addNode('inc', (s) => ({ count: s.count + 1 }))
 *     .addEdge(START, 'inc')
 *     .addConditionalEdges('inc', (s) => (s.count < 3 ? 'inc' : END))
 *     .compile();
 *
 * const result = await graph.invoke({ count: 0 });
 * ```
 */
export class StateGraph<S extends object> {
    private readonly nodes = new Map<NodeName, GraphNode<S>>();
    private readonly edges: GraphEdge<S>[] = [];
    private readonly entryPoints: NodeName[] = [];
    private readonly interruptBeforeNodes = new Set<NodeName>();
    private readonly interruptAfterNodes = new Set<NodeName>();

    constructor(private readonly schema: Partial<StateSchema<S>> = {}) { }

    /**
     * Register a node. Registering a name again replaces the earlier function.
     *
     * @example
     * ```typescript
     * graph.addNode('lookup', fetchProfile, { cachePolicy: { ttlMs: 60_000 } });
     * ```
     */
    addNode(name: NodeName, fn: NodeFunction<S>, options: NodeOptions = {}): this {
        this.nodes.set(name, { name, fn, cachePolicy: options.cachePolicy });
        return this;
    }

    /**
     * Unconditional transition. `addEdge(START, node)` sets the entry point.
     */
    addEdge(source: NodeName, target: NodeName): this {
        if (source === START) {
            this.entryPoints.push(target);
        } else {
            this.edges.push({ kind: 'fixed', source, target });
        }
        return this;
    }

    /**
     * Route from `source` by inspecting state. The router returns a node name
     * or END. `pathMap` (label → node) only describes the possible targets
     * for `getGraph()`; routing never consults it.
     */
    addConditionalEdges(source: NodeName, router: EdgeRouter<S>, pathMap?: Record<string, NodeName>): this {
        this.edges.push({ kind: 'conditional', source, router, pathMap });
        return this;
    }

    setEntryPoint(name: NodeName): this {
        this.entryPoints.push(name);
        return this;
    }

    /** Shorthand for `addEdge(name, END)` */
    setFinishPoint(name: NodeName): this {
        return this.addEdge(name, END);
    }

    /** Pause before any of these nodes runs */
    interruptBefore(...names: NodeName[]): this {
        for (const name of names) this.interruptBeforeNodes.add(name);
        return this;
    }

    /** Pause after any of these nodes completes */
    interruptAfter(...names: NodeName[]): this {
        for (const name of names) this.interruptAfterNodes.add(name);
        return this;
    }

    /**
     * Validate and freeze the graph.
     *
     * @throws CompileError listing every problem found
     */
    compile(options: CompileOptions<S> = {}): CompiledGraph<S> {
        const issues = this.validate();
        if (issues.length > 0) {
            options.logger?.error('Graph compilation failed', { graph: options.name, issues });
            throw new CompileError(issues);
        }

        const [entryPoint] = this.entryPoints;
        const compiled = new CompiledGraph<S>({
            nodes: new Map(this.nodes),
            edges: [...this.edges],
            entryPoint,
            interruptBefore: new Set(this.interruptBeforeNodes),
            interruptAfter: new Set(this.interruptAfterNodes),
            state: resolveStateSchema(this.schema),
        }, options);

        options.logger?.debug('Graph compiled', {
            graph: compiled.name,
            nodes: this.nodes.size,
            edges: this.edges.length,
            entryPoint,
        });

        return compiled;
    }

    private validate(): string[] {
        const issues: string[] = [];
        const isNode = (name: NodeName) => this.nodes.has(name);
        const isTarget = (name: NodeName) => name === END || isNode(name);

        for (const [name, node] of this.nodes) {
            if (name.length === 0) {
                issues.push('Node names must not be empty');
            } else if (RESERVED_NAMES.has(name)) {
                issues.push(`"${name}" is reserved and cannot be used as a node name`);
            }
            if (node.cachePolicy && !(node.cachePolicy.ttlMs > 0)) {
                issues.push(`Cache policy of "${name}" needs a positive ttlMs`);
            }
        }

        const entries = Array.from(new Set(this.entryPoints));
        if (entries.length === 0) {
            issues.push('No entry point set; call setEntryPoint() or addEdge(START, node)');
        } else if (entries.length > 1) {
            issues.push(`Conflicting entry points: ${entries.map(e => `"${e}"`).join(', ')}`);
        } else if (!isNode(entries[0])) {
            issues.push(`Entry point "${entries[0]}" is not a registered node`);
        }

        const fixedSources = new Set<NodeName>();
        const conditionalSources = new Set<NodeName>();

        for (const edge of this.edges) {
            if (edge.source === END) {
                issues.push(`Edge cannot leave ${END}`);
            } else if (!isNode(edge.source)) {
                issues.push(`Edge source "${edge.source}" is not a registered node`);
            }

            if (edge.kind === 'fixed') {
                if (edge.target === START) {
                    issues.push(`Edge from "${edge.source}" cannot target ${START}`);
                } else if (!isTarget(edge.target)) {
                    issues.push(`Edge target "${edge.target}" (from "${edge.source}") is not a registered node`);
                }
                fixedSources.add(edge.source);
                continue;
            }

            if (conditionalSources.has(edge.source)) {
                issues.push(`Node "${edge.source}" has more than one conditional edge`);
            }
            conditionalSources.add(edge.source);

            for (const [label, target] of Object.entries(edge.pathMap ?? {})) {
                if (!isTarget(target)) {
                    issues.push(`Path "${label}" from "${edge.source}" targets unknown node "${target}"`);
                }
            }
        }

        for (const source of conditionalSources) {
            if (fixedSources.has(source)) {
                issues.push(`Node "${source}" mixes conditional and fixed outgoing edges`);
            }
        }

        for (const [kind, names] of [['interruptBefore', this.interruptBeforeNodes], ['interruptAfter', this.interruptAfterNodes]] as const) {
            for (const name of names) {
                if (!isNode(name)) {
                    issues.push(`${kind} names unknown node "${name}"`);
                }
            }
        }

        return issues;
    }
}
