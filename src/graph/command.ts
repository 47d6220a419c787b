/**
 * Commands: node-issued control flow that takes precedence over declared edges.
 */

import type { NodeName, NodeOutput } from './types';

/**
 * Fan-out target. Without an explicit input the target receives a clone of
 * the state at the moment of dispatch.
 */
export class Send<S> {
    constructor(
        public readonly node: NodeName,
        public readonly input?: S,
    ) { }
}

export type CommandDirective<S> =
    | { type: 'goto'; target: NodeName; update?: Partial<S> }
    | { type: 'end'; update?: Partial<S> }
    | { type: 'update'; update: Partial<S> }
    | { type: 'send'; targets: Send<S>[] }
    | { type: 'interrupt'; payload: unknown; update?: Partial<S> };

/**
 * Explicit routing instruction returned from a node.
 *
 * @example
 * ```typescript
 * graph.addNode('triage', (state) =>
 *     state.urgent ? Command.goto('escalate') : Command.update({ triaged: true }));
 * ```
 */
export class Command<S> {
    private constructor(public readonly directive: CommandDirective<S>) { }

    /** Jump straight to `target`, bypassing any router */
    static goto<S>(target: NodeName): Command<S> {
        return new Command<S>({ type: 'goto', target });
    }

    /** Merge `update`, then jump to `target` */
    static gotoWithUpdate<S>(target: NodeName, update: Partial<S>): Command<S> {
        return new Command<S>({ type: 'goto', target, update });
    }

    /** Terminate the run after merging the optional update */
    static end<S>(update?: Partial<S>): Command<S> {
        return new Command<S>({ type: 'end', update });
    }

    /** Merge `update`, then resolve the next node through the edge table */
    static update<S>(update: Partial<S>): Command<S> {
        return new Command<S>({ type: 'update', update });
    }

    /**
     * Run every target concurrently and join. Updates merge in the order the
     * targets are listed here, whatever order they finish in.
     */
    static send<S>(targets: Array<NodeName | Send<S>>): Command<S> {
        return new Command<S>({
            type: 'send',
            targets: targets.map(target => (typeof target === 'string' ? new Send<S>(target) : target)),
        });
    }

    /** Pause the run; `payload` is surfaced on the interrupted result */
    static interrupt<S>(payload: unknown, update?: Partial<S>): Command<S> {
        return new Command<S>({ type: 'interrupt', payload, update });
    }

    /** The state delta carried by this command, if any */
    get update(): Partial<S> | undefined {
        return this.directive.type === 'send' ? undefined : this.directive.update;
    }
}

/**
 * Imperative pause from inside a node. Return the result from the node.
 *
 * @example
 * ```typescript
 * graph.addNode('review', (state) =>
 *     state.approved ? { status: 'ok' } : interrupt({ question: 'Approve draft?' }));
 * ```
 */
export function interrupt<S>(payload: unknown, update?: Partial<S>): Command<S> {
    return Command.interrupt(payload, update);
}

export function isCommand<S>(output: NodeOutput<S>): output is Command<S> {
    return output instanceof Command;
}
