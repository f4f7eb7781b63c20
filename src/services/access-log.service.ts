// src/services/access-log.service.ts

import { HttpException, Inject, Injectable } from '@nestjs/common';
import {
    context,
    Context,
    isSpanContextValid,
    propagation,
    Span,
    SpanKind,
    SpanStatusCode,
    trace
} from '@opentelemetry/api';
import { Request, Response } from 'express';
import {
    CONTENT_LIMITS,
    DEFAULT_TRACE_HEADER,
    OBSERVABILITY_CONSTANTS,
    shouldExcludePath,
    TRACER_NAMES
} from '../config/constants';
import { currentValidSpan } from '../context/otel-context';
import { markRequestStart, markRequestTraced } from '../context/request-lifecycle';
import { ObservabilityConfig } from '../interfaces';
import { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { BodyPreview, BodyPreviewOptions, buildBodyPreview } from '../utils/body-preview';
import { readRequestBody } from '../utils/request-body';
import { getHeader, responseBodyToBytes } from '../utils/serializers';
import { SpanOps } from '../utils/span-ops';

export interface ServerSpan {
    span: Span;
    /** Context to run the rest of the request in. */
    context: Context;
    /** False when an upstream instrumentation owns the span and will end it. */
    owned: boolean;
}

/**
 * Server span and access log line of one HTTP request, shared by the
 * interceptor (routed requests) and the exception filter (requests rejected
 * before a handler ran).
 */
@Injectable()
export class AccessLogService {
    private readonly traceHeaderName: string;
    private readonly previewPaths: string[];
    private readonly previewOptions: BodyPreviewOptions;

    constructor(
        @Inject(OBSERVABILITY_CONSTANTS.MODULE_OPTIONS_TOKEN)
        private readonly config: ObservabilityConfig,
        private readonly logger: ObservabilityLoggerService
    ) {
        this.traceHeaderName = config.traceHeaderName || DEFAULT_TRACE_HEADER;
        this.previewPaths = (config.bodyPreviewPaths ?? [])
            .map(path => path.trim())
            .filter(path => path.length > 0);
        this.previewOptions = {
            maxBytes: Math.max(config.bodyPreviewMaxBytes ?? CONTENT_LIMITS.BODY_PREVIEW_MAX_BYTES, 1),
            redactKeys: config.bodyPreviewRedactKeys
        };
    }

    shouldTrace(req: Request): boolean {
        return !shouldExcludePath(req.path, this.config.excludedPaths);
    }

    shouldCapturePath(path: string): boolean {
        if (!this.config.enableBodyPreview) return false;
        if (this.previewPaths.length === 0) return true;
        return this.previewPaths.some(allowed => path === allowed || path.startsWith(allowed));
    }

    /**
     * Reuse the span an upstream instrumentation already opened, or start a
     * SERVER span parented on the propagation headers. The trace id goes on
     * the response now, while headers can still be set.
     */
    openServerSpan(req: Request, res: Response): ServerSpan {
        markRequestStart(req);
        markRequestTraced(req);

        const ambientSpan = currentValidSpan();
        const server: ServerSpan = ambientSpan
            ? { span: ambientSpan, context: context.active(), owned: false }
            : this.startServerSpan(req);

        const spanContext = server.span.spanContext();
        if (isSpanContextValid(spanContext) && !res.headersSent) {
            res.setHeader(this.traceHeaderName, spanContext.traceId);
        }
        return server;
    }

    /**
     * Status, attributes and the log line of a request that produced a
     * response. `responseBody` is only read on preview paths.
     */
    complete(span: Span, req: Request, statusCode: number, responseBody: Buffer | null): void {
        const durationMs = markRequestStart(req).getResponseTime();
        const ops = new SpanOps(span);
        if (statusCode >= 500) {
            span.setStatus({ code: SpanStatusCode.ERROR });
        } else {
            ops.ok();
        }
        ops.attrs({
            'http.method': req.method,
            'http.target': req.path,
            'http.status_code': statusCode,
            'http.server_duration_ms': durationMs
        });

        const fields: Record<string, unknown> = {
            http_method: req.method,
            http_path: req.path,
            http_status: statusCode,
            duration_ms: durationMs,
            user_agent: getHeader(req, 'user-agent') ?? ''
        };

        if (this.shouldCapturePath(req.path)) {
            this.attachPreview('request', buildBodyPreview(readRequestBody(req), this.previewOptions), ops, fields);
            this.attachPreview('response', buildBodyPreview(responseBody, this.previewOptions), ops, fields);
        }

        this.logger.logJson(OBSERVABILITY_CONSTANTS.HTTP_LOG_METHOD, 'incoming request handled', { fields });
    }

    /**
     * An `HttpException` is a rendered response and completes the request
     * with its own status and body. Anything else is recorded on the span and
     * left to propagate without a log line.
     */
    fail(span: Span, req: Request, error: unknown): void {
        if (error instanceof HttpException) {
            this.complete(span, req, error.getStatus(), responseBodyToBytes(error.getResponse()));
            return;
        }
        span.recordException(error instanceof Error ? error : String(error));
        span.setStatus({
            code: SpanStatusCode.ERROR,
            message: error instanceof Error ? error.message : String(error)
        });
    }

    private startServerSpan(req: Request): ServerSpan {
        const tracer = trace.getTracer(TRACER_NAMES.ACCESS_LOG);
        const parentContext = propagation.extract(context.active(), req.headers);
        const span = tracer.startSpan(`${req.method} ${req.path}`, { kind: SpanKind.SERVER }, parentContext);
        return { span, context: trace.setSpan(parentContext, span), owned: true };
    }

    private attachPreview(
        kind: 'request' | 'response',
        { preview, truncated, size }: BodyPreview,
        ops: SpanOps,
        fields: Record<string, unknown>
    ): void {
        const prefix = `http_${kind}_body`;
        const attrs = {
            [`${prefix}_size`]: size > 0 ? size : undefined,
            [`${prefix}_preview`]: preview || undefined,
            [`${prefix}_preview_truncated`]: truncated || undefined
        };
        ops.attrs(attrs);
        for (const [key, value] of Object.entries(attrs)) {
            if (value !== undefined) fields[key] = value;
        }
    }
}
