// src/interfaces/langfuse.interface.ts

import type { LangfuseSettings } from '../config/langfuse-settings';

export type LangfuseLevel = 'DEBUG' | 'DEFAULT' | 'WARNING' | 'ERROR';

export type ModelParameterValue = string | number | boolean | null;

export interface LangfuseObservationUpdate {
    level?: LangfuseLevel;
    statusMessage?: string;
    metadata?: Record<string, unknown>;
    output?: unknown;
    usageDetails?: Record<string, number>;
}

export interface LangfuseObservation {
    update(body: LangfuseObservationUpdate): void;
    end(): void;
}

export interface LangfuseGenerationParams {
    name: string;
    model?: string;
    input?: unknown;
    modelParameters?: Record<string, ModelParameterValue>;
    metadata?: Record<string, unknown>;
}

export interface LangfuseTraceAttributes {
    userId?: string;
    sessionId?: string;
}

/** A span bound to one Langfuse trace; generations opened from it nest under it. */
export interface LangfuseRequestSpan extends LangfuseObservation {
    readonly traceId: string;
    updateTrace(attributes: LangfuseTraceAttributes): void;
    startGeneration(params: LangfuseGenerationParams): LangfuseObservation;
}

export interface LangfuseSpanParams {
    name: string;
    traceId: string;
    metadata?: Record<string, unknown>;
}

export interface LangfuseTracer {
    startSpan(params: LangfuseSpanParams): LangfuseRequestSpan;
    startGeneration(params: LangfuseGenerationParams): LangfuseObservation;
    flush(): Promise<void>;
    shutdown(): Promise<void>;
}

export type LangfuseClientFactory = (settings: LangfuseSettings) => LangfuseTracer;

export type LangfuseHandle =
    | { readonly kind: 'disabled'; readonly reason: 'not-configured' | 'client-unavailable' }
    | { readonly kind: 'active'; readonly client: LangfuseTracer; readonly settings: LangfuseSettings };
