// src/otel/init-otel.ts

import { ProxyTracerProvider, trace } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { Resource } from '@opentelemetry/resources';
import { BasicTracerProvider, BatchSpanProcessor, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { DEFAULT_OTLP_ENDPOINT, OBSERVABILITY_CONSTANTS } from '../config/constants';
import type { ObservabilityLoggerService } from '../logger/observability-logger.service';

export interface OtlpEndpoint {
    /** host:port, scheme stripped */
    endpoint: string;
    insecure: boolean;
}

export interface InitOtelOptions {
    logger?: ObservabilityLoggerService;
    /** Replaces the OTLP gRPC exporter. */
    exporter?: SpanExporter;
    env?: NodeJS.ProcessEnv;
}

export function parseOtlpEndpoint(raw: string | undefined): OtlpEndpoint {
    const endpoint = (raw ?? '').trim();
    if (!endpoint) return { endpoint: DEFAULT_OTLP_ENDPOINT, insecure: true };
    if (endpoint.startsWith('http://')) return { endpoint: endpoint.slice('http://'.length), insecure: true };
    if (endpoint.startsWith('https://')) return { endpoint: endpoint.slice('https://'.length), insecure: false };
    return { endpoint, insecure: true };
}

const hasSdkTracerProvider = (): boolean => {
    const provider = trace.getTracerProvider();
    const delegate = provider instanceof ProxyTracerProvider ? provider.getDelegate() : provider;
    return delegate instanceof BasicTracerProvider;
};

/**
 * Register a global tracer provider exporting over OTLP/gRPC. Does nothing
 * when an SDK provider is already registered, so calling it twice is safe.
 */
export function initOtel(serviceName: string, { logger, exporter, env = process.env }: InitOtelOptions = {}): void {
    if (hasSdkTracerProvider()) {
        logger?.info(
            OBSERVABILITY_CONSTANTS.OTEL_INIT_LOG_METHOD,
            'otel tracer provider already initialized, skipping setup'
        );
        return;
    }

    const { endpoint, insecure } = parseOtlpEndpoint(env.OTEL_EXPORTER_OTLP_ENDPOINT);
    const provider = new NodeTracerProvider({
        resource: new Resource({ [ATTR_SERVICE_NAME]: env.OTEL_SERVICE_NAME || serviceName }),
        spanProcessors: [
            new BatchSpanProcessor(
                exporter ?? new OTLPTraceExporter({ url: `${insecure ? 'http' : 'https'}://${endpoint}` })
            )
        ]
    });
    provider.register();

    logger?.info(OBSERVABILITY_CONSTANTS.OTEL_INIT_LOG_METHOD, 'initialized otel tracer provider', {
        otlp_endpoint: endpoint,
        otlp_insecure: insecure
    });
}
