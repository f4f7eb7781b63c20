// src/langfuse/langfuse-client.registry.ts

import { OnApplicationShutdown } from '@nestjs/common';
import { CONTENT_LIMITS, OBSERVABILITY_CONSTANTS } from '../config/constants';
import { LangfuseSettings } from '../config/langfuse-settings';
import { LangfuseClientFactory, LangfuseHandle } from '../interfaces';
import type { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { createLangfuseTracer } from './langfuse.adapter';

const NOT_CONFIGURED: LangfuseHandle = Object.freeze({ kind: 'disabled', reason: 'not-configured' });
const CLIENT_UNAVAILABLE: LangfuseHandle = Object.freeze({ kind: 'disabled', reason: 'client-unavailable' });

/**
 * Memoizing registry of Langfuse clients keyed by settings value. Distinct
 * settings get distinct clients; the least recently used entry is dropped
 * past the cache size.
 */
export class LangfuseClientRegistry implements OnApplicationShutdown {
    private readonly handles = new Map<string, LangfuseHandle>();

    constructor(
        private readonly factory: LangfuseClientFactory = createLangfuseTracer,
        private readonly logger?: ObservabilityLoggerService,
        private readonly maxSize: number = CONTENT_LIMITS.LANGFUSE_CLIENT_CACHE_SIZE
    ) {}

    resolve(settings: LangfuseSettings): LangfuseHandle {
        if (!settings.isConfiguredForTracing()) return NOT_CONFIGURED;

        const key = settings.cacheKey();
        const cached = this.handles.get(key);
        if (cached) {
            this.handles.delete(key);
            this.handles.set(key, cached);
            return cached;
        }

        const handle = this.create(settings);
        this.handles.set(key, handle);
        if (this.handles.size > this.maxSize) {
            const oldest = this.handles.keys().next();
            if (!oldest.done) this.handles.delete(oldest.value);
        }
        return handle;
    }

    /** Flush and shut down every client created so far. */
    async shutdown(): Promise<void> {
        const clients = [...this.handles.values()].flatMap(handle =>
            handle.kind === 'active' ? [handle.client] : []
        );
        this.handles.clear();
        await Promise.all(clients.map(client => client.shutdown()));
    }

    async onApplicationShutdown(): Promise<void> {
        await this.shutdown();
    }

    private create(settings: LangfuseSettings): LangfuseHandle {
        try {
            return { kind: 'active', client: this.factory(settings), settings };
        } catch (err) {
            this.logger?.warn(
                OBSERVABILITY_CONSTANTS.LANGFUSE_LOG_METHOD,
                'Langfuse client unavailable; tracing disabled',
                err
            );
            return CLIENT_UNAVAILABLE;
        }
    }
}
