// src/context/otel-context.ts
import { context, isSpanContextValid, trace, type Span } from '@opentelemetry/api';

export interface TraceLogFields {
    trace_id?: string;
    span_id?: string;
}

/** Active span with a valid context, if any. */
export function currentValidSpan(): Span | undefined {
    const span = trace.getActiveSpan();
    if (!span || !isSpanContextValid(span.spanContext())) return undefined;
    return span;
}

export function currentOtelTraceId(): string | null {
    return currentValidSpan()?.spanContext().traceId ?? null;
}

export function traceFields(): TraceLogFields {
    const span = currentValidSpan();
    if (!span) return {};
    const { traceId, spanId } = span.spanContext();
    return { trace_id: traceId, span_id: spanId };
}

/**
 * Run `fn` with `parentSpan` (default: the span active now) as the active
 * OTel span, whatever another tracer did to the context in between.
 */
export function preserveOtelParentSpan<T>(parentSpan: Span | undefined, fn: () => T): T {
    const base = parentSpan ?? trace.getActiveSpan();
    const ctx = base ? trace.setSpan(context.active(), base) : context.active();
    return context.with(ctx, fn);
}
