// Graph runtime
export * from './graph';

// Prebuilt agents
export * from './prebuilt';

// Errors
export {
    GraphError,
    CompileError,
    NodeError,
    RoutingError,
    IterationLimitExceededError,
    InvalidUpdateError,
    InvalidConfigError,
} from './lib/errors';
export type { ConfigIssue } from './lib/errors';

// Logging
export { noopLogger, consoleLogger, createFilteredLogger, withLogContext } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Tracing
export {
    NoopTracer,
    setGlobalTracer,
    getGlobalTracer,
    sanitizeAttributes,
    DEFAULT_TRACER_CONFIG,
} from './lib/tracer';
export type { Tracer, Span, SpanAttributes, TracerConfig } from './lib/tracer';
export { OTelTracer } from './lib/otel-tracer';
export type { OTelTracerProviderLike } from './lib/otel-tracer';
