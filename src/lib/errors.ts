/**
 * Engine error taxonomy.
 *
 * Interrupts are not errors: a paused run comes back as an `interrupted`
 * GraphResult, never through this hierarchy.
 */

export class GraphError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GraphError';
    }
}

/**
 * Structural validation failure raised by `StateGraph.compile()`.
 * Carries every violation found, not just the first.
 */
export class CompileError extends GraphError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(
            issues.length === 1
                ? `Graph compilation failed: ${issues[0]}`
                : `Graph compilation failed with ${issues.length} issues:\n` +
                issues.map(issue => `  - ${issue}`).join('\n'),
        );
        this.name = 'CompileError';
        this.issues = issues;
    }
}

/**
 * A node's own operation failed. The engine does not interpret the cause.
 */
export class NodeError extends GraphError {
    constructor(
        public readonly node: string,
        cause: unknown,
    ) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Node "${node}" failed: ${detail}`, { cause });
        this.name = 'NodeError';
    }
}

/**
 * A router or command named a target that is neither END nor a registered node.
 */
export class RoutingError extends GraphError {
    constructor(
        public readonly node: string,
        public readonly target: string,
    ) {
        super(`Node "${node}" routed to unknown target "${target}"`);
        this.name = 'RoutingError';
    }
}

/**
 * Circuit breaker for runaway cycles. The limit is fixed.
 */
export class IterationLimitExceededError extends GraphError {
    constructor(public readonly limit: number) {
        super(`Graph execution exceeded the iteration limit of ${limit} node executions`);
        this.name = 'IterationLimitExceededError';
    }
}

/**
 * A state operation (getState, updateState, ...) cannot be carried out.
 */
export class InvalidUpdateError extends GraphError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidUpdateError';
    }
}

/** Validation error details */
export interface ConfigIssue {
    path: (string | number)[];
    message: string;
}

/**
 * Run configuration rejected at the invocation boundary.
 */
export class InvalidConfigError extends GraphError {
    constructor(public readonly issues: ConfigIssue[]) {
        super(
            `Invalid run config: ${issues
                .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
                .join('; ')}`,
        );
        this.name = 'InvalidConfigError';
    }
}
