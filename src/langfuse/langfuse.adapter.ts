// src/langfuse/langfuse.adapter.ts

import { LangfuseSettings } from '../config/langfuse-settings';
import {
    LangfuseGenerationParams,
    LangfuseObservation,
    LangfuseObservationUpdate,
    LangfuseRequestSpan,
    LangfuseSpanParams,
    LangfuseTraceAttributes,
    LangfuseTracer
} from '../interfaces';

/*
 * The slice of the Langfuse SDK client used here. `Langfuse` satisfies it
 * structurally.
 */
interface LangfuseGenerationClient {
    update(body: LangfuseObservationUpdate): unknown;
    end(): unknown;
}

interface LangfuseSpanClient {
    update(body: Omit<LangfuseObservationUpdate, 'usageDetails'>): unknown;
    generation(body: LangfuseGenerationParams): LangfuseGenerationClient;
    end(): unknown;
}

interface LangfuseTraceClient {
    update(body: LangfuseTraceAttributes): unknown;
    span(body: { name: string; metadata?: Record<string, unknown> }): LangfuseSpanClient;
}

export interface LangfuseSdkClient {
    trace(body: { id: string; name: string }): LangfuseTraceClient;
    generation(body: LangfuseGenerationParams): LangfuseGenerationClient;
    flushAsync(): Promise<void>;
    shutdownAsync(): Promise<void>;
}

class GenerationObservation implements LangfuseObservation {
    constructor(private readonly generation: LangfuseGenerationClient) {}

    update({ level, statusMessage, metadata, output, usageDetails }: LangfuseObservationUpdate): void {
        this.generation.update({ level, statusMessage, metadata, output, usageDetails });
    }

    end(): void {
        this.generation.end();
    }
}

class RequestSpan implements LangfuseRequestSpan {
    constructor(
        readonly traceId: string,
        private readonly traceClient: LangfuseTraceClient,
        private readonly span: LangfuseSpanClient
    ) {}

    update({ level, statusMessage, metadata, output }: LangfuseObservationUpdate): void {
        this.span.update({ level, statusMessage, metadata, output });
    }

    updateTrace({ userId, sessionId }: LangfuseTraceAttributes): void {
        this.traceClient.update({ userId, sessionId });
    }

    startGeneration(params: LangfuseGenerationParams): LangfuseObservation {
        return new GenerationObservation(this.span.generation(params));
    }

    end(): void {
        this.span.end();
    }
}

/**
 * LangfuseTracer backed by the Langfuse SDK. Spans are bound to an
 * explicit trace id, so the Langfuse trace and the OTel trace share it.
 */
export class SdkLangfuseTracer implements LangfuseTracer {
    constructor(private readonly client: LangfuseSdkClient) {}

    startSpan({ name, traceId, metadata }: LangfuseSpanParams): LangfuseRequestSpan {
        const traceClient = this.client.trace({ id: traceId, name });
        return new RequestSpan(traceId, traceClient, traceClient.span({ name, metadata }));
    }

    startGeneration(params: LangfuseGenerationParams): LangfuseObservation {
        return new GenerationObservation(this.client.generation(params));
    }

    flush(): Promise<void> {
        return this.client.flushAsync();
    }

    shutdown(): Promise<void> {
        return this.client.shutdownAsync();
    }
}

// Required on first use: the SDK bundle issues a dynamic import() as it loads,
// which apps that inject their own factory never need.
const loadSdk = (): typeof import('langfuse') => require('langfuse');

export const createLangfuseTracer = (settings: LangfuseSettings): LangfuseTracer => {
    const { Langfuse } = loadSdk();
    return new SdkLangfuseTracer(
        new Langfuse({
            publicKey: settings.publicKey,
            secretKey: settings.secretKey,
            baseUrl: settings.host
        })
    );
};
