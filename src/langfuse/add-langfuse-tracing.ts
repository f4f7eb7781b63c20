// src/langfuse/add-langfuse-tracing.ts

import { INestApplication } from '@nestjs/common';
import { LangfuseSettings } from '../config/langfuse-settings';
import { LangfuseTraceInterceptor } from '../interceptors/langfuse-trace.interceptor';
import { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { LangfuseClientRegistry } from './langfuse-client.registry';

export interface AddLangfuseTracingOptions {
    /** Defaults to `LangfuseSettings.fromEnv()`. */
    settings?: LangfuseSettings;
    traceHeader?: string;
    sessionHeader?: string;
}

/**
 * Install request tracing into Langfuse on an application that imports
 * `ObservabilityModule`. Returns false, installing nothing, when the settings
 * are not configured for tracing.
 */
export function addLangfuseTracing(app: INestApplication, options: AddLangfuseTracingOptions = {}): boolean {
    const settings = options.settings ?? LangfuseSettings.fromEnv();
    if (!settings.isConfiguredForTracing()) {
        return false;
    }

    app.useGlobalInterceptors(
        new LangfuseTraceInterceptor(
            { langfuseTraceHeader: options.traceHeader, langfuseSessionHeader: options.sessionHeader },
            settings,
            app.get(LangfuseClientRegistry),
            app.get(ObservabilityLoggerService)
        )
    );
    return true;
}
