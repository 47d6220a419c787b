/**
 * OpenTelemetry Tracer adapter.
 * Wraps any @opentelemetry/api tracer provider without a hard dependency on it.
 */

import type { Span, SpanAttributes, Tracer, TracerConfig } from './tracer';
import { DEFAULT_TRACER_CONFIG, sanitizeAttributes } from './tracer';

/** Subset of the OTel span API used here */
interface OTelSpanLike {
    setAttribute(key: string, value: string | number | boolean): unknown;
    setAttributes(attributes: SpanAttributes): unknown;
    recordException(exception: Error): void;
    addEvent(name: string, attributes?: SpanAttributes): unknown;
    end(): void;
}

interface OTelTracerLike {
    startSpan(name: string, options?: { attributes?: SpanAttributes }): OTelSpanLike;
}

/** Anything with `getTracer`, e.g. `trace.getTracerProvider()` */
export interface OTelTracerProviderLike {
    getTracer(name: string, version?: string): OTelTracerLike;
}

class OTelSpanWrapper implements Span {
    constructor(
        private readonly otelSpan: OTelSpanLike,
        private readonly config: TracerConfig,
    ) { }

    setAttribute(key: string, value: string | number | boolean): void {
        this.otelSpan.setAttributes(sanitizeAttributes({ [key]: value }, this.config));
    }

    setAttributes(attributes: SpanAttributes): void {
        this.otelSpan.setAttributes(sanitizeAttributes(attributes, this.config));
    }

    recordException(error: Error): void {
        this.otelSpan.recordException(error);
    }

    addEvent(name: string, attributes?: SpanAttributes): void {
        this.otelSpan.addEvent(name, attributes ? sanitizeAttributes(attributes, this.config) : undefined);
    }

    end(): void {
        this.otelSpan.end();
    }
}

/**
 * OpenTelemetry Tracer implementation.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 * import { OTelTracer, setGlobalTracer } from 'graphloom';
 *
 * setGlobalTracer(new OTelTracer(trace.getTracerProvider()));
 * ```
 */
export class OTelTracer implements Tracer {
    private readonly otelTracer: OTelTracerLike;
    private readonly config: Required<TracerConfig>;

    constructor(provider: OTelTracerProviderLike, config: TracerConfig & { tracerName?: string } = {}) {
        const { tracerName, ...tracerConfig } = config;
        this.otelTracer = provider.getTracer(tracerName ?? 'graphloom', '0.1.0');
        this.config = { ...DEFAULT_TRACER_CONFIG, ...tracerConfig };
    }

    startSpan(name: string, attributes?: SpanAttributes): Span {
        const otelSpan = this.otelTracer.startSpan(name, {
            attributes: attributes ? sanitizeAttributes(attributes, this.config) : undefined,
        });
        return new OTelSpanWrapper(otelSpan, this.config);
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        const span = this.startSpan(name, attributes);
        try {
            return await fn(span);
        } catch (error) {
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            throw error;
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}
