// src/filters/trace-access-log.filter.ts
import { ArgumentsHost, Catch } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { context } from '@opentelemetry/api';
import { Request, Response } from 'express';
import { isRequestTraced } from '../context/request-lifecycle';
import { AccessLogService } from '../services/access-log.service';

/**
 * Gives requests that never reached the interceptor (unmatched routes,
 * guard or pipe rejections) their server span and access log line, then
 * renders the exception the default way.
 */
@Catch()
export class TraceAccessLogFilter extends BaseExceptionFilter {
    constructor(private readonly accessLog: AccessLogService) {
        super();
    }

    catch(exception: unknown, host: ArgumentsHost): void {
        if (host.getType() === 'http') {
            const ctx = host.switchToHttp();
            this.traceUnseen(exception, ctx.getRequest<Request>(), ctx.getResponse<Response>());
        }
        super.catch(exception, host);
    }

    private traceUnseen(exception: unknown, req: Request, res: Response): void {
        if (isRequestTraced(req) || !this.accessLog.shouldTrace(req)) return;

        const server = this.accessLog.openServerSpan(req, res);
        try {
            context.with(server.context, () => this.accessLog.fail(server.span, req, exception));
        } finally {
            if (server.owned) server.span.end();
        }
    }
}
