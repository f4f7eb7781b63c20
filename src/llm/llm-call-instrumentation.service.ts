// src/llm/llm-call-instrumentation.service.ts

import { Inject, Injectable, Optional } from '@nestjs/common';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import { DEFAULT_TRACE_UUID, OBSERVABILITY_CONSTANTS } from '../config/constants';
import { LangfuseSettings } from '../config/langfuse-settings';
import { currentLangfuseSpan } from '../context/langfuse-context';
import { preserveOtelParentSpan } from '../context/otel-context';
import {
    ChatMessage,
    CompletionFn,
    CompletionParams,
    CompletionRequest,
    CompletionResponse,
    LangfuseGenerationParams
} from '../interfaces';
import { LangfuseClientRegistry } from '../langfuse/langfuse-client.registry';
import { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { bestEffort } from '../utils/best-effort';
import { BodyPreview, previewJson } from '../utils/body-preview';
import { errorMessage } from '../utils/serializers';
import { NullableAttributes, SpanOps } from '../utils/span-ops';
import {
    buildDefaultRequestPayload,
    extractModelParameters,
    extractOutput,
    extractUsageDetails,
    firstChoiceContent
} from './llm-payload';

export interface InstrumentedCompletionOptions extends CompletionRequest {
    /** Generation name shown in Langfuse. */
    name: string;
    settings?: LangfuseSettings;
}

export interface ObservedCompletionOptions {
    tracerName: string;
    spanName: string;
    generationName: string;
    model: string;
    messages: ChatMessage[];
    baseUrl?: string;
    apiKey?: string;
    userId?: string;
    sessionId?: string;
    requestPayload?: Record<string, unknown>;
    extraSpanAttrs?: NullableAttributes;
    previewMaxBytes?: number;
    params?: CompletionParams;
    settings?: LangfuseSettings;
}

export interface TraceHeaderOptions {
    userId?: string | null;
    sessionId?: string | null;
    includeUuid?: boolean;
}

/**
 * Identity headers to forward on an outbound LLM gateway call.
 */
export function buildTraceHeaders({ userId, sessionId, includeUuid = true }: TraceHeaderOptions = {}): Record<string, string> {
    const headers: Record<string, string> = {};
    if (userId) {
        headers['X-User-ID'] = userId;
        if (includeUuid) headers['X-UUID'] = DEFAULT_TRACE_UUID;
    }
    if (sessionId) headers['X-Session-ID'] = sessionId;
    return headers;
}

@Injectable()
export class LlmCallInstrumentation {
    constructor(
        private readonly registry: LangfuseClientRegistry,
        @Inject(OBSERVABILITY_CONSTANTS.LANGFUSE_SETTINGS_TOKEN)
        private readonly settings: LangfuseSettings,
        private readonly logger: ObservabilityLoggerService,
        @Optional()
        @Inject(OBSERVABILITY_CONSTANTS.COMPLETION_TOKEN)
        private readonly completion?: CompletionFn
    ) {}

    /**
     * Run one completion call as a Langfuse generation. The generation nests
     * under the request's Langfuse span when there is one.
     */
    async instrumentedCompletion({ name, settings, ...request }: InstrumentedCompletionOptions): Promise<CompletionResponse> {
        const { completion } = this;
        if (!completion) {
            throw new Error('No completion function registered: set `completion` in ObservabilityModule.forRoot()');
        }

        const handle = this.registry.resolve(settings ?? this.settings);
        if (handle.kind === 'disabled') {
            return completion(request);
        }

        const modelParameters = extractModelParameters(request.params);
        const generationParams: LangfuseGenerationParams = {
            name,
            model: request.model,
            input: { messages: request.messages },
            ...(Object.keys(modelParameters).length > 0 ? { modelParameters } : {}),
            ...(request.baseUrl !== undefined ? { metadata: { 'llm.base_url': request.baseUrl } } : {})
        };

        const otelSpan = trace.getActiveSpan();
        const parent = currentLangfuseSpan();
        const generation = parent
            ? parent.startGeneration(generationParams)
            : handle.client.startGeneration(generationParams);

        try {
            let response: CompletionResponse;
            try {
                response = await preserveOtelParentSpan(otelSpan, () => completion(request));
            } catch (error) {
                bestEffort(this.logger, 'Langfuse generation update failed', () =>
                    generation.update({ level: 'ERROR', statusMessage: errorMessage(error) })
                );
                throw error;
            }

            bestEffort(this.logger, 'Langfuse generation update failed', () =>
                generation.update({
                    output: extractOutput(response),
                    usageDetails: extractUsageDetails(response)
                })
            );
            return response;
        } finally {
            bestEffort(this.logger, 'Langfuse generation end failed', () => generation.end());
        }
    }

    /**
     * `instrumentedCompletion` inside an active OTel span carrying the model,
     * caller identity, timing and request/response previews.
     */
    async observedInstrumentedCompletion(options: ObservedCompletionOptions): Promise<CompletionResponse> {
        const {
            tracerName,
            spanName,
            generationName,
            model,
            messages,
            baseUrl,
            apiKey,
            userId,
            sessionId,
            requestPayload,
            extraSpanAttrs,
            previewMaxBytes = 4096,
            params,
            settings
        } = options;

        return trace.getTracer(tracerName).startActiveSpan(spanName, async span => {
            try {
                const ops = new SpanOps(span).attrs({
                    'llm.model': model,
                    'app.user_id': userId || undefined,
                    'app.session_id': sessionId || undefined
                });
                if (extraSpanAttrs) ops.attrs(extraSpanAttrs);

                const payload =
                    requestPayload && Object.keys(requestPayload).length > 0
                        ? requestPayload
                        : buildDefaultRequestPayload({ model, messages, params });
                this.attachPreview(ops, 'request', previewJson(payload, previewMaxBytes));

                const startedAt = performance.now();
                let response: CompletionResponse;
                try {
                    response = await this.instrumentedCompletion({
                        name: generationName,
                        model,
                        messages,
                        apiKey,
                        baseUrl,
                        params,
                        settings
                    });
                } catch (error) {
                    span.recordException(error instanceof Error ? error : String(error));
                    span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
                    throw error;
                }

                ops.durationMs(performance.now() - startedAt, 'llm.duration_ms');
                this.attachPreview(ops, 'response', previewJson(response, previewMaxBytes));

                const content = firstChoiceContent(response);
                if (typeof content === 'string') {
                    ops.attrs({ 'llm.output_length': content.length });
                }
                return response;
            } finally {
                span.end();
            }
        });
    }

    private attachPreview(ops: SpanOps, kind: 'request' | 'response', { preview, truncated, size }: BodyPreview): void {
        ops.attrs({
            [`http_${kind}_body_preview`]: preview,
            [`http_${kind}_body_preview_truncated`]: truncated,
            [`http_${kind}_body_size`]: size
        });
    }
}
