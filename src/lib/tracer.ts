/**
 * Tracer abstraction for observability.
 * The engine opens one span per run and one per node execution; any backend
 * implementing `Tracer` (see OTelTracer) can receive them.
 */

export type SpanAttributes = Record<string, string | number | boolean>;

/** Span interface */
export interface Span {
    /** Set a single attribute */
    setAttribute(key: string, value: string | number | boolean): void;
    /** Set multiple attributes */
    setAttributes(attributes: SpanAttributes): void;
    /** Record an error */
    recordException(error: Error): void;
    /** Add an event */
    addEvent(name: string, attributes?: SpanAttributes): void;
    /** End the span */
    end(): void;
}

/** Tracer configuration */
export interface TracerConfig {
    /** Maximum attribute value length before truncation (default: 256) */
    maxAttributeLength?: number;
    /** Attribute keys to mask (substring match, case insensitive) */
    sensitiveKeys?: string[];
}

/** Tracer interface */
export interface Tracer {
    /** Start a new span */
    startSpan(name: string, attributes?: SpanAttributes): Span;
    /** Execute a function within a span */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T>;
    /** Get the tracer config */
    getConfig(): TracerConfig;
}

export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    maxAttributeLength: 256,
    sensitiveKeys: ['password', 'apikey', 'token', 'secret', 'authorization'],
};

/**
 * Normalize attributes before they leave the process: mask sensitive keys,
 * stringify objects, truncate long values.
 */
export function sanitizeAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG,
): SpanAttributes {
    const maxLen = config.maxAttributeLength ?? DEFAULT_TRACER_CONFIG.maxAttributeLength;
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const result: SpanAttributes = {};

    for (const [key, value] of Object.entries(attributes)) {
        if (value === undefined) continue;

        const lowerKey = key.toLowerCase();
        if (sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()))) {
            result[key] = '[REDACTED]';
            continue;
        }

        if (typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
            continue;
        }

        const text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
        result[key] = text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
    }

    return result;
}

class NoopSpan implements Span {
    setAttribute(_key: string, _value: string | number | boolean): void { }
    setAttributes(_attributes: SpanAttributes): void { }
    recordException(_error: Error): void { }
    addEvent(_name: string, _attributes?: SpanAttributes): void { }
    end(): void { }
}

/**
 * No-op tracer (default when no tracing configured).
 */
export class NoopTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(_name: string, _attributes?: SpanAttributes): Span {
        return new NoopSpan();
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        const span = this.startSpan(name, attributes);
        try {
            return await fn(span);
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

let globalTracer: Tracer = new NoopTracer();

/**
 * Set the tracer used by graphs compiled without an explicit one.
 */
export function setGlobalTracer(tracer: Tracer): void {
    globalTracer = tracer;
}

export function getGlobalTracer(): Tracer {
    return globalTracer;
}
