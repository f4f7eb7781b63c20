import { CallHandler, ExecutionContext, Injectable, NestInterceptor, StreamableFile } from '@nestjs/common';
import { SSE_METADATA } from '@nestjs/common/constants';
import { context, Span } from '@opentelemetry/api';
import { Request, Response } from 'express';
import { defer, lastValueFrom, Observable } from 'rxjs';
import { AccessLogService } from '../services/access-log.service';
import { responseBodyToBytes } from '../utils/serializers';

interface DrainedBody {
    bytes: Buffer | null;
    /** What the handler result becomes once its stream has been read. */
    replay: unknown;
}

/**
 * Wraps each HTTP request in a SERVER span (or the span an upstream
 * instrumentation already opened), stamps the trace id on the response and
 * writes one access log line.
 */
@Injectable()
export class TraceAccessLogInterceptor implements NestInterceptor {
    constructor(private readonly accessLog: AccessLogService) {}

    intercept(executionContext: ExecutionContext, next: CallHandler): Observable<unknown> {
        if (executionContext.getType() !== 'http') {
            return next.handle();
        }
        const isEventStream: unknown = Reflect.getMetadata(SSE_METADATA, executionContext.getHandler());
        if (isEventStream) {
            return next.handle();
        }

        const httpContext = executionContext.switchToHttp();
        const req = httpContext.getRequest<Request>();
        const res = httpContext.getResponse<Response>();

        if (!this.accessLog.shouldTrace(req)) {
            return next.handle();
        }

        return defer(() => this.dispatch(req, res, next));
    }

    private async dispatch(req: Request, res: Response, next: CallHandler): Promise<unknown> {
        const server = this.accessLog.openServerSpan(req, res);
        try {
            return await context.with(server.context, () => this.handleInSpan(server.span, req, res, next));
        } finally {
            if (server.owned) server.span.end();
        }
    }

    private async handleInSpan(span: Span, req: Request, res: Response, next: CallHandler): Promise<unknown> {
        let result: unknown;
        try {
            result = await lastValueFrom(next.handle(), { defaultValue: undefined });
        } catch (error) {
            this.accessLog.fail(span, req, error);
            throw error;
        }

        const drained = this.accessLog.shouldCapturePath(req.path)
            ? await this.drainResponseBody(result)
            : { bytes: null, replay: result };
        this.accessLog.complete(span, req, res.statusCode, drained.bytes);
        return drained.replay;
    }

    /**
     * A streamed result can only be read once: read it here and hand back an
     * equivalent one-shot stream over the same bytes.
     */
    private async drainResponseBody(body: unknown): Promise<DrainedBody> {
        if (!(body instanceof StreamableFile)) {
            return { bytes: responseBodyToBytes(body), replay: body };
        }

        const chunks: Buffer[] = [];
        for await (const chunk of body.getStream()) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
        }
        const merged = Buffer.concat(chunks);
        return { bytes: merged, replay: new StreamableFile(merged, body.options) };
    }
}
