// src/interfaces/observability-config.interface.ts

import type { DestinationStream, LevelWithSilent } from 'pino';
import type { LangfuseSettings } from '../config/langfuse-settings';
import type { LangfuseClientFactory } from './langfuse.interface';
import type { CompletionFn } from './completion.interface';

export interface ObservabilityConfig {
    LOG_LEVEL?: LevelWithSilent;
    LOG_FORMAT?: 'json' | 'pretty';
    /** `application_name` of every log line; falls back to OTEL_SERVICE_NAME. */
    SERVICE_NAME?: string;
    /** Overrides stdout, mostly for tests. */
    logDestination?: DestinationStream;

    traceHeaderName?: string;
    excludedPaths?: string[];
    enableBodyPreview?: boolean;
    bodyPreviewMaxBytes?: number;
    /** Path prefixes that qualify for body previews; empty means every path. */
    bodyPreviewPaths?: string[];
    bodyPreviewRedactKeys?: string[];

    /** Defaults to `LangfuseSettings.fromEnv()`. */
    langfuse?: LangfuseSettings;
    langfuseTraceHeader?: string;
    langfuseSessionHeader?: string;
    langfuseClientFactory?: LangfuseClientFactory;

    completion?: CompletionFn;
}
