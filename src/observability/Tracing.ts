/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces that are structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('toolhead-watch')` can be passed
 * straight to `ToolWatch` without an adapter or an `@opentelemetry/*`
 * runtime dependency.
 *
 * Spans emitted:
 * - `toolwatch.recompute` — one per inference pass
 * - `toolwatch.dispatch`  — one per command sent to the tool-changer
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const watch = new ToolWatch(config, host, {
 *     tracer: trace.getTracer('toolhead-watch'),
 * });
 * ```
 *
 * @module
 */

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

/**
 * Attribute value type — the scalar subset of OpenTelemetry's `AttributeValue`.
 *
 * Using `unknown` here would break assignment of an OTel `Tracer`
 * under strict function types.
 */
export type WatchAttributeValue = string | number | boolean;

/**
 * Minimal span interface — structural subtype of OTel's `Span`.
 */
export interface WatchSpan {
    setAttribute(key: string, value: WatchAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Must be called exactly once. */
    end(): void;
    recordException(exception: Error | string): void;
}

/**
 * Minimal tracer interface — structural subtype of OTel's `Tracer`.
 */
export interface WatchTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, WatchAttributeValue>;
    }): WatchSpan;
}

/**
 * Run `fn` inside a span when a tracer is present.
 *
 * The span is ended in all cases. A throw is recorded, marked `ERROR`
 * and rethrown to the caller's containment boundary.
 *
 * @internal
 */
export function withSpan<T>(
    tracer: WatchTracer | undefined,
    name: string,
    attributes: Record<string, WatchAttributeValue>,
    fn: (span: WatchSpan | undefined) => T,
): T {
    if (!tracer) return fn(undefined);

    const span = tracer.startSpan(name, { attributes });
    try {
        const result = fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        span.recordException(err instanceof Error ? err : message);
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        throw err;
    } finally {
        span.end();
    }
}
