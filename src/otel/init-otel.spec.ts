import { ProxyTracerProvider, trace } from '@opentelemetry/api';
import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { LogCapture } from '../../test/fakes/log-capture';
import { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { initOtel, parseOtlpEndpoint } from './init-otel';

describe('parseOtlpEndpoint', () => {
    it('picks transport security from the scheme', () => {
        expect(parseOtlpEndpoint(undefined)).toEqual({ endpoint: 'localhost:4317', insecure: true });
        expect(parseOtlpEndpoint('  ')).toEqual({ endpoint: 'localhost:4317', insecure: true });
        expect(parseOtlpEndpoint('http://collector:4317')).toEqual({ endpoint: 'collector:4317', insecure: true });
        expect(parseOtlpEndpoint('https://collector:4317')).toEqual({ endpoint: 'collector:4317', insecure: false });
        expect(parseOtlpEndpoint(' collector:4317 ')).toEqual({ endpoint: 'collector:4317', insecure: true });
    });
});

describe('initOtel', () => {
    const capture = new LogCapture();
    const logger = new ObservabilityLoggerService({ SERVICE_NAME: 'svc', logDestination: capture });
    const exporter = new InMemorySpanExporter();

    const registeredProvider = (): NodeTracerProvider | undefined => {
        const provider = trace.getTracerProvider();
        const delegate = provider instanceof ProxyTracerProvider ? provider.getDelegate() : provider;
        return delegate instanceof NodeTracerProvider ? delegate : undefined;
    };

    afterAll(async () => {
        await registeredProvider()?.shutdown();
        trace.disable();
    });

    it('registers a provider exporting spans for the service', async () => {
        initOtel('svc', {
            logger,
            exporter,
            env: { OTEL_EXPORTER_OTLP_ENDPOINT: 'https://collector:4317', OTEL_SERVICE_NAME: 'svc-env' }
        });

        expect(capture.lines).toHaveLength(1);
        expect(capture.lines[0]).toMatchObject({
            application_name: 'svc',
            method_name: 'observability.init_otel',
            detail: 'initialized otel tracer provider',
            otlp_endpoint: 'collector:4317',
            otlp_insecure: false
        });

        trace.getTracer('test').startSpan('op').end();
        await registeredProvider()?.forceFlush();

        const [span] = exporter.getFinishedSpans();
        expect(span.name).toBe('op');
        expect(span.resource.attributes['service.name']).toBe('svc-env');
    });

    it('skips setup when a provider is already registered', () => {
        const before = registeredProvider();

        initOtel('other', { logger, exporter });

        expect(registeredProvider()).toBe(before);
        expect(capture.lines[1]).toMatchObject({
            method_name: 'observability.init_otel',
            detail: 'otel tracer provider already initialized, skipping setup'
        });
    });
});
