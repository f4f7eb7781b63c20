// src/utils/span-ops.ts

import { SpanStatusCode, type AttributeValue, type Span } from '@opentelemetry/api';

export const SpanAttrKeys = {
    DURATION_MS: 'duration_ms',
    ERROR_CODE: 'error_code',
    ERROR_MESSAGE: 'error_message',
    DEPENDENCY_TYPE: 'dependency.type',
    DEPENDENCY_NAME: 'dependency.name',
    DEPENDENCY_WEBSITE: 'dependency.website',
    DEPENDENCY_DURATION_MS: 'dependency.duration_ms'
} as const;

export type NullableAttributes = Record<string, AttributeValue | null | undefined>;

export const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Set every attribute that has a value
 */
export function setSpanAttrs(span: Span, attrs: NullableAttributes): void {
    for (const [key, value] of Object.entries(attrs)) {
        if (value === null || value === undefined) continue;
        span.setAttribute(key, value);
    }
}

export interface DependencyHttpAttrs {
    name: string;
    website?: string;
    durationMs?: number;
}

export function setDependencyHttpAttrs(span: Span, { name, website, durationMs }: DependencyHttpAttrs): void {
    setSpanAttrs(span, {
        [SpanAttrKeys.DEPENDENCY_TYPE]: 'http',
        [SpanAttrKeys.DEPENDENCY_NAME]: name,
        [SpanAttrKeys.DEPENDENCY_WEBSITE]: website || undefined,
        [SpanAttrKeys.DEPENDENCY_DURATION_MS]: durationMs === undefined ? undefined : roundMs(durationMs)
    });
}

export interface SpanErrorOptions {
    errorCode?: string;
    errorMessage?: string;
}

/**
 * Chainable attribute/status helper over one span. It never starts or ends
 * the span.
 */
export class SpanOps {
    constructor(private readonly span: Span) {}

    attrs(attrs: NullableAttributes): this {
        setSpanAttrs(this.span, attrs);
        return this;
    }

    durationMs(value: number, key: string = SpanAttrKeys.DURATION_MS): this {
        this.span.setAttribute(key, roundMs(value));
        return this;
    }

    ok(): this {
        this.span.setStatus({ code: SpanStatusCode.OK });
        return this;
    }

    error(err: unknown, { errorCode, errorMessage }: SpanErrorOptions = {}): this {
        if (err instanceof Error) {
            this.span.recordException(err);
        }
        const defaultMessage = err instanceof Error ? err.message : String(err);
        this.span.setStatus({ code: SpanStatusCode.ERROR, message: defaultMessage });
        return this.attrs({
            [SpanAttrKeys.ERROR_CODE]: errorCode || undefined,
            [SpanAttrKeys.ERROR_MESSAGE]: errorMessage || defaultMessage || undefined
        });
    }
}
