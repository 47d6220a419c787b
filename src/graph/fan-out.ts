/**
 * Fan-out execution for `Command.send`.
 *
 * Branches run concurrently with fail-fast cancellation; results come back
 * indexed by branch position so the caller can merge deterministically.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * One dispatched target.
 */
export interface FanOutBranch<S> {
    /** Target node name, for errors and logs */
    node: string;
    /** Isolated input for this branch */
    input: S;
    /** Runs the target node; resolves to the update it produced */
    execute: (input: S, signal: AbortSignal) => Promise<Partial<S> | undefined>;
}

/**
 * Configuration for fan-out execution.
 */
export interface FanOutOptions {
    /** Maximum concurrent branches (default: unlimited) */
    maxConcurrency?: number;
    /** Parent signal; aborting it cancels every branch */
    signal?: AbortSignal;
}

export interface BranchResult<S> {
    node: string;
    update: Partial<S> | undefined;
}

// ============================================================================
// Fan-out executor
// ============================================================================

/**
 * Execute branches in parallel and join.
 *
 * @returns One result per branch, in branch order (not completion order)
 * @throws The first error raised by any branch; siblings see their signal aborted
 */
export async function executeFanOut<S>(
    branches: FanOutBranch<S>[],
    options: FanOutOptions = {},
): Promise<BranchResult<S>[]> {
    if (branches.length === 0) {
        return [];
    }

    options.signal?.throwIfAborted();

    // Shared controller for fail-fast
    const groupAbort = new AbortController();
    const onParentAbort = () => groupAbort.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onParentAbort, { once: true });

    const semaphore = options.maxConcurrency ? createSemaphore(options.maxConcurrency) : null;
    const results: BranchResult<S>[] = new Array(branches.length);
    const errors: unknown[] = [];

    const running = branches.map(async (branch, index) => {
        if (semaphore) await semaphore.acquire();

        try {
            groupAbort.signal.throwIfAborted();
            const update = await branch.execute(branch.input, groupAbort.signal);
            results[index] = { node: branch.node, update };
        } catch (error) {
            errors.push(error);
            if (errors.length === 1) {
                groupAbort.abort(error);
            }
            throw error;
        } finally {
            if (semaphore) semaphore.release();
        }
    });

    // allSettled so no branch is still running when we return or throw
    await Promise.allSettled(running);
    options.signal?.removeEventListener('abort', onParentAbort);

    if (errors.length > 0) {
        throw errors[0];
    }

    return results;
}

// ============================================================================
// Semaphore (for maxConcurrency)
// ============================================================================

interface Semaphore {
    acquire(): Promise<void>;
    release(): void;
}

function createSemaphore(max: number): Semaphore {
    let current = 0;
    const queue: Array<() => void> = [];

    return {
        async acquire() {
            if (current < max) {
                current++;
                return;
            }
            await new Promise<void>(resolve => queue.push(resolve));
            current++;
        },
        release() {
            current--;
            const next = queue.shift();
            if (next) next();
        },
    };
}
