/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('traversal')` from
 * `@opentelemetry/api` can be passed to a {@link TreeBuilder} directly.
 *
 * Multi-segment resolution (`resolvePath`) runs inside one span.
 * A missing child is an expected outcome and leaves the status `UNSET`;
 * only errors thrown by init hooks set `ERROR`.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const tree = new TreeBuilder(Root, {
 *     tracer: trace.getTracer('traversal'),
 * }).build();
 * ```
 *
 * @module
 */

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

/** Matches OpenTelemetry's `SpanAttributeValue`. */
export type TraversalAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Structural subset of OpenTelemetry's `Span`. */
export interface TraversalSpan {
    setAttribute(key: string, value: TraversalAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    addEvent?(name: string, attributes?: Record<string, TraversalAttributeValue>): void;
    /** Must be called exactly once; resolution calls it in a `finally` block */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Structural subset of OpenTelemetry's `Tracer`. */
export interface TraversalTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, TraversalAttributeValue>;
    }): TraversalSpan;
}
