import { CallHandler, ExecutionContext, Inject, Injectable, NestInterceptor } from '@nestjs/common';
import { trace } from '@opentelemetry/api';
import { Request } from 'express';
import { defer, lastValueFrom, Observable } from 'rxjs';
import {
    DEFAULT_SESSION_HEADER,
    DEFAULT_TRACE_HEADER,
    OBSERVABILITY_CONSTANTS,
    WRITE_METHODS
} from '../config/constants';
import { LangfuseSettings } from '../config/langfuse-settings';
import { runWithLangfuseSpan } from '../context/langfuse-context';
import { currentOtelTraceId, preserveOtelParentSpan } from '../context/otel-context';
import { extractTraceAttrsFromBody, resolveSessionId, resolveTraceId } from '../context/trace-identity';
import { LangfuseTracer, ObservabilityConfig } from '../interfaces';
import { LangfuseClientRegistry } from '../langfuse/langfuse-client.registry';
import { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { bestEffort, bestEffortAsync } from '../utils/best-effort';
import { readRequestJsonBody } from '../utils/request-body';
import { errorMessage, errorTypeName, getHeader } from '../utils/serializers';

interface RequestIdentity {
    traceId: string | null;
    upstreamTraceRaw: string | null;
    sessionId: string | null;
    upstreamSessionRaw: string | null;
    userId: string | null;
}

/**
 * Mirrors each request into Langfuse as a span on the same trace id as the
 * OTel trace, so LLM generations made by the handler nest under it.
 */
@Injectable()
export class LangfuseTraceInterceptor implements NestInterceptor {
    private readonly traceHeader: string;
    private readonly sessionHeader: string;

    constructor(
        @Inject(OBSERVABILITY_CONSTANTS.MODULE_OPTIONS_TOKEN)
        config: ObservabilityConfig,
        @Inject(OBSERVABILITY_CONSTANTS.LANGFUSE_SETTINGS_TOKEN)
        private readonly settings: LangfuseSettings,
        private readonly registry: LangfuseClientRegistry,
        private readonly logger: ObservabilityLoggerService
    ) {
        this.traceHeader = config.langfuseTraceHeader || DEFAULT_TRACE_HEADER;
        this.sessionHeader = config.langfuseSessionHeader || DEFAULT_SESSION_HEADER;
    }

    intercept(executionContext: ExecutionContext, next: CallHandler): Observable<unknown> {
        if (executionContext.getType() !== 'http') {
            return next.handle();
        }

        const handle = this.registry.resolve(this.settings);
        if (handle.kind === 'disabled') {
            return next.handle();
        }

        const req = executionContext.switchToHttp().getRequest<Request>();
        const { client, settings } = handle;
        return defer(async () => {
            try {
                return await this.traceRequest(client, req, next);
            } finally {
                if (settings.flushAtRequestEnd) {
                    await bestEffortAsync(this.logger, 'Langfuse flush failed', () => client.flush());
                }
            }
        });
    }

    resolveIdentity(req: Request): RequestIdentity {
        const { traceId, upstreamRaw: upstreamTraceRaw } = resolveTraceId(
            getHeader(req, this.traceHeader),
            currentOtelTraceId()
        );
        let { sessionId, upstreamRaw: upstreamSessionRaw } = resolveSessionId(
            getHeader(req, this.sessionHeader)
        );

        let userId: string | null = null;
        if (WRITE_METHODS.has(req.method)) {
            const fromBody = extractTraceAttrsFromBody(readRequestJsonBody(req), getHeader(req, 'content-type'));
            userId = fromBody.userId;
            if (!sessionId && fromBody.sessionId) {
                const bodySession = resolveSessionId(fromBody.sessionId);
                sessionId = bodySession.sessionId;
                // A rejected header value stays visible unless the body one was rejected too.
                upstreamSessionRaw = bodySession.upstreamRaw ?? upstreamSessionRaw;
            }
        }

        return { traceId, upstreamTraceRaw, sessionId, upstreamSessionRaw, userId };
    }

    private async traceRequest(client: LangfuseTracer, req: Request, next: CallHandler): Promise<unknown> {
        const otelParentSpan = trace.getActiveSpan();
        const identity = this.resolveIdentity(req);
        if (!identity.traceId) {
            return lastValueFrom(next.handle(), { defaultValue: undefined });
        }

        const metadata: Record<string, unknown> = {
            'http.method': req.method,
            'http.path': req.path
        };
        if (identity.upstreamTraceRaw) metadata.upstream_trace_id_raw = identity.upstreamTraceRaw;
        if (identity.sessionId) metadata.session_id = identity.sessionId;
        if (identity.upstreamSessionRaw) metadata.upstream_session_id_raw = identity.upstreamSessionRaw;

        const span = client.startSpan({
            name: `${req.method} ${req.path}`,
            traceId: identity.traceId,
            metadata
        });

        try {
            return await runWithLangfuseSpan(span, async () => {
                const { userId, sessionId } = identity;
                if (userId || sessionId) {
                    bestEffort(this.logger, 'Langfuse trace update failed', () =>
                        span.updateTrace({ userId: userId ?? undefined, sessionId: sessionId ?? undefined })
                    );
                }
                try {
                    return await preserveOtelParentSpan(otelParentSpan, () =>
                        lastValueFrom(next.handle(), { defaultValue: undefined })
                    );
                } catch (error) {
                    bestEffort(this.logger, 'Langfuse span update failed', () =>
                        span.update({
                            level: 'ERROR',
                            statusMessage: errorMessage(error),
                            metadata: { 'exception.type': errorTypeName(error) }
                        })
                    );
                    throw error;
                }
            });
        } finally {
            bestEffort(this.logger, 'Langfuse span end failed', () => span.end());
        }
    }
}
