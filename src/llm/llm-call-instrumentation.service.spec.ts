import { SpanStatusCode, trace } from '@opentelemetry/api';
import { InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { FakeFailure, FakeLangfuseTracer } from '../../test/fakes/fake-langfuse';
import { LogCapture } from '../../test/fakes/log-capture';
import { LangfuseSettings } from '../config/langfuse-settings';
import { runWithLangfuseSpan } from '../context/langfuse-context';
import { CompletionRequest, CompletionResponse } from '../interfaces';
import { LangfuseClientRegistry } from '../langfuse/langfuse-client.registry';
import { ObservabilityLoggerService } from '../logger/observability-logger.service';
import { buildTraceHeaders, LlmCallInstrumentation } from './llm-call-instrumentation.service';

const enabled = new LangfuseSettings({
    host: 'http://langfuse.test',
    publicKey: 'pk',
    secretKey: 'sk',
    tracingEnabled: true
});

const RESPONSE: CompletionResponse = {
    choices: [{ message: { role: 'assistant', content: 'hi' } }],
    usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 }
};

const MESSAGES = [{ role: 'user', content: 'hello' }];

describe('LlmCallInstrumentation', () => {
    const exporter = new InMemorySpanExporter();
    const provider = new NodeTracerProvider({ spanProcessors: [new SimpleSpanProcessor(exporter)] });

    beforeAll(() => provider.register());
    afterAll(() => provider.shutdown());
    afterEach(() => exporter.reset());

    const setup = (
        options: { settings?: LangfuseSettings; failing?: FakeFailure[]; completion?: jest.Mock<Promise<CompletionResponse>, [CompletionRequest]> } = {}
    ) => {
        const fake = new FakeLangfuseTracer(new Set(options.failing));
        const capture = new LogCapture();
        const logger = new ObservabilityLoggerService({ logDestination: capture });
        const completion =
            options.completion ?? jest.fn<Promise<CompletionResponse>, [CompletionRequest]>(async () => RESPONSE);
        const service = new LlmCallInstrumentation(
            new LangfuseClientRegistry(() => fake, logger),
            options.settings ?? enabled,
            logger,
            completion
        );
        return { fake, capture, completion, service };
    };

    describe('instrumentedCompletion', () => {
        it('fails without a registered completion function', async () => {
            const service = new LlmCallInstrumentation(
                new LangfuseClientRegistry(),
                enabled,
                new ObservabilityLoggerService({ logDestination: new LogCapture() })
            );

            await expect(service.instrumentedCompletion({ name: 'g', model: 'm', messages: MESSAGES })).rejects.toThrow(
                'No completion function registered'
            );
        });

        it('calls straight through when Langfuse is disabled', async () => {
            const { fake, completion, service } = setup({ settings: new LangfuseSettings() });

            const response = await service.instrumentedCompletion({ name: 'g', model: 'm', messages: MESSAGES, apiKey: 'test-secret' });

            expect(response).toBe(RESPONSE);
            expect(completion).toHaveBeenCalledWith({ model: 'm', messages: MESSAGES, apiKey: 'test-secret' });
            expect(fake.generations).toHaveLength(0);
        });

        it('records a standalone generation with parameters, output and usage', async () => {
            const { fake, completion, service } = setup();

            await service.instrumentedCompletion({
                name: 'reply',
                model: 'm',
                messages: MESSAGES,
                apiKey: 'test-secret',
                baseUrl: 'http://gateway.test',
                params: { temperature: 0.1, stream: false }
            });

            expect(completion.mock.calls[0][0].apiKey).toBe('test-secret');
            const [generation] = fake.generations;
            expect(generation.params).toEqual({
                name: 'reply',
                model: 'm',
                input: { messages: MESSAGES },
                modelParameters: { temperature: 0.1 },
                metadata: { 'llm.base_url': 'http://gateway.test' }
            });
            expect(JSON.stringify(generation.params)).not.toContain('test-secret');
            expect(generation.updates).toEqual([
                { output: { content: 'hi' }, usageDetails: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 } }
            ]);
            expect(generation.ended).toBe(true);
        });

        it('nests the generation under the current request span', async () => {
            const { fake, service } = setup();
            const requestSpan = fake.startSpan({ name: 'POST /chat', traceId: 'a'.repeat(32) });

            await runWithLangfuseSpan(requestSpan, () =>
                service.instrumentedCompletion({ name: 'reply', model: 'm', messages: MESSAGES })
            );

            expect(fake.generations).toHaveLength(0);
            expect(fake.spans[0].generations).toHaveLength(1);
            expect(fake.spans[0].generations[0].params.name).toBe('reply');
        });

        it('marks the generation as failed and rethrows', async () => {
            const failure = new Error('gateway down');
            const { fake, service } = setup({
                completion: jest.fn<Promise<CompletionResponse>, [CompletionRequest]>(async () => {
                    throw failure;
                })
            });

            await expect(service.instrumentedCompletion({ name: 'reply', model: 'm', messages: MESSAGES })).rejects.toBe(failure);

            expect(fake.generations[0].updates).toEqual([{ level: 'ERROR', statusMessage: 'gateway down' }]);
            expect(fake.generations[0].ended).toBe(true);
        });

        it('returns the response when the generation update fails', async () => {
            const { fake, capture, service } = setup({ failing: ['generationUpdate'] });

            await expect(service.instrumentedCompletion({ name: 'reply', model: 'm', messages: MESSAGES })).resolves.toBe(RESPONSE);

            expect(fake.generations[0].ended).toBe(true);
            expect(capture.lines).toHaveLength(1);
            expect(capture.lines[0]).toMatchObject({
                method_name: 'langfuse.tracing',
                detail: 'Langfuse generation update failed',
                level: 'warn',
                error: { type: 'FakeBackendError', message: 'langfuse generationUpdate unavailable' }
            });
        });

        it('runs the completion under the caller OTel span', async () => {
            let seenSpanId: string | undefined;
            const { service } = setup({
                completion: jest.fn<Promise<CompletionResponse>, [CompletionRequest]>(async () => {
                    seenSpanId = trace.getActiveSpan()?.spanContext().spanId;
                    return RESPONSE;
                })
            });

            const outerSpanId = await trace.getTracer('test').startActiveSpan('outer', async span => {
                await service.instrumentedCompletion({ name: 'reply', model: 'm', messages: MESSAGES });
                span.end();
                return span.spanContext().spanId;
            });

            expect(seenSpanId).toBe(outerSpanId);
        });
    });

    describe('observedInstrumentedCompletion', () => {
        const observe = (service: LlmCallInstrumentation, overrides: Partial<Parameters<LlmCallInstrumentation['observedInstrumentedCompletion']>[0]> = {}) =>
            service.observedInstrumentedCompletion({
                tracerName: 'chat',
                spanName: 'chat.completion',
                generationName: 'reply',
                model: 'm',
                messages: MESSAGES,
                apiKey: 'test-secret',
                userId: 'u-1',
                sessionId: 's-1',
                extraSpanAttrs: { 'chat.kind': 'test', 'chat.ignored': null },
                params: { temperature: 0.1 },
                ...overrides
            });

        it('records model, identity, timing and previews on an active span', async () => {
            const { fake, service } = setup();

            await observe(service);

            const [span] = exporter.getFinishedSpans();
            const requestJson = JSON.stringify({ model: 'm', messages: MESSAGES, temperature: 0.1 });
            const responseJson = JSON.stringify(RESPONSE);
            expect(span.name).toBe('chat.completion');
            expect(span.attributes).toMatchObject({
                'llm.model': 'm',
                'app.user_id': 'u-1',
                'app.session_id': 's-1',
                'chat.kind': 'test',
                http_request_body_preview: requestJson,
                http_request_body_preview_truncated: false,
                http_request_body_size: Buffer.byteLength(requestJson),
                http_response_body_preview: responseJson,
                http_response_body_preview_truncated: false,
                http_response_body_size: Buffer.byteLength(responseJson),
                'llm.output_length': 2
            });
            expect(span.attributes).not.toHaveProperty('chat.ignored');
            expect(typeof span.attributes['llm.duration_ms']).toBe('number');
            expect(fake.generations[0].params.name).toBe('reply');
        });

        it('previews an explicit request payload and honours the preview budget', async () => {
            const { service } = setup();

            await observe(service, { requestPayload: { prompt: 'abcdefghij' }, previewMaxBytes: 8 });

            const [span] = exporter.getFinishedSpans();
            expect(span.attributes).toMatchObject({
                http_request_body_preview: '{"prompt',
                http_request_body_preview_truncated: true,
                http_request_body_size: 23
            });
        });

        it('reports a zero output length when the response has no choices', async () => {
            const { service } = setup({
                completion: jest.fn<Promise<CompletionResponse>, [CompletionRequest]>(async () => ({ id: 'cmpl-1' }))
            });

            await observe(service);

            const [span] = exporter.getFinishedSpans();
            expect(span.attributes['llm.output_length']).toBe(0);
        });

        it('omits the output length when the content is not text', async () => {
            const { service } = setup({
                completion: jest.fn<Promise<CompletionResponse>, [CompletionRequest]>(async () => ({
                    choices: [{ message: { content: [{ type: 'image' }] } }]
                }))
            });

            await observe(service, { userId: undefined, sessionId: undefined });

            const [span] = exporter.getFinishedSpans();
            expect(span.attributes).not.toHaveProperty('llm.output_length');
            expect(span.attributes).not.toHaveProperty('app.user_id');
        });

        it('records the failure on the span and rethrows', async () => {
            const failure = new Error('rate limited');
            const { service } = setup({
                completion: jest.fn<Promise<CompletionResponse>, [CompletionRequest]>(async () => {
                    throw failure;
                })
            });

            await expect(observe(service)).rejects.toBe(failure);

            const [span] = exporter.getFinishedSpans();
            expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'rate limited' });
            expect(span.events.map(event => event.name)).toEqual(['exception']);
            expect(span.attributes).not.toHaveProperty('llm.duration_ms');
        });
    });
});

describe('buildTraceHeaders', () => {
    it('builds identity headers', () => {
        expect(buildTraceHeaders({ userId: 'u-1', sessionId: 's-1' })).toEqual({
            'X-User-ID': 'u-1',
            'X-UUID': '123e4567-e89b-12d3-a456-426614174000',
            'X-Session-ID': 's-1'
        });
        expect(buildTraceHeaders({ userId: 'u-1', includeUuid: false })).toEqual({ 'X-User-ID': 'u-1' });
        expect(buildTraceHeaders({ sessionId: 's-1' })).toEqual({ 'X-Session-ID': 's-1' });
        expect(buildTraceHeaders()).toEqual({});
    });
});
