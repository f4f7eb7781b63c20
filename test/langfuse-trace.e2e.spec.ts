import 'reflect-metadata';
import { Body, Controller, Get, INestApplication, Post, ServiceUnavailableException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { addLangfuseTracing, LangfuseSettings, LangfuseTracer, ObservabilityConfig, ObservabilityModule } from '../src';
import { FakeFailure, FakeLangfuseTracer } from './fakes/fake-langfuse';
import { LogCapture } from './fakes/log-capture';
import { InMemoryTracing, registerInMemoryTracing } from './support/in-memory-tracing';

@Controller()
class TracedController {
    readonly bodies: unknown[] = [];

    @Post('chat')
    chat(@Body() body: unknown) {
        this.bodies.push(body);
        return { ok: true };
    }

    @Get('ping')
    ping() {
        return 'pong';
    }

    @Get('unavailable')
    unavailable() {
        throw new ServiceUnavailableException('maintenance');
    }

    @Get('crash')
    crash() {
        throw new TypeError('kaboom');
    }
}

const enabled = (flushAtRequestEnd = true): LangfuseSettings =>
    new LangfuseSettings({
        host: 'http://langfuse.test',
        publicKey: 'pk',
        secretKey: 'sk',
        tracingEnabled: true,
        flushAtRequestEnd
    });

const HEADER_TRACE_ID = '0123456789abcdef0123456789abcdef';

describe('LangfuseTraceInterceptor (e2e)', () => {
    let tracing: InMemoryTracing;
    let app: INestApplication | undefined;

    beforeAll(() => {
        tracing = registerInMemoryTracing();
    });

    afterAll(() => tracing.shutdown());

    afterEach(async () => {
        await app?.close();
        app = undefined;
    });

    const createApp = async (
        config: ObservabilityConfig,
        factory: () => LangfuseTracer
    ): Promise<{ nest: INestApplication; capture: LogCapture; controller: TracedController }> => {
        const capture = new LogCapture();
        const moduleRef = await Test.createTestingModule({
            imports: [ObservabilityModule.forRoot({ logDestination: capture, langfuseClientFactory: factory, ...config })],
            controllers: [TracedController]
        }).compile();
        const nest = moduleRef.createNestApplication({ logger: false });
        app = nest;
        return { nest, capture, controller: nest.get(TracedController) };
    };

    const withFake = async (config: ObservabilityConfig = {}, failing: FakeFailure[] = []) => {
        const fake = new FakeLangfuseTracer(new Set(failing));
        const created = await createApp({ langfuse: enabled(), ...config }, () => fake);
        await created.nest.init();
        return { fake, ...created };
    };

    it('opens a span on the header trace id with identity from body and headers', async () => {
        const { fake, nest } = await withFake();

        await request(nest.getHttpServer())
            .post('/chat')
            .set('X-Trace-Id', HEADER_TRACE_ID.toUpperCase())
            .set('X-Session-Id', 'campaign_42')
            .send({ user_id: 7 })
            .expect(201);

        expect(fake.spans).toHaveLength(1);
        const [span] = fake.spans;
        expect(span.params).toEqual({
            name: 'POST /chat',
            traceId: HEADER_TRACE_ID,
            metadata: { 'http.method': 'POST', 'http.path': '/chat', session_id: 'campaign_42' }
        });
        expect(span.traceUpdates).toEqual([{ userId: '7', sessionId: 'campaign_42' }]);
        expect(span.ended).toBe(true);
        expect(fake.flushCount).toBe(1);
    });

    it('falls back to the OTel trace id and keeps rejected identities for diagnostics', async () => {
        const { fake, nest, controller } = await withFake();
        const longSession = 's'.repeat(201);

        const res = await request(nest.getHttpServer())
            .post('/chat')
            .set('X-Trace-Id', 'not-a-valid-trace-id')
            .set('X-Session-Id', longSession)
            .send({ sessionId: 'from-body', message: 'hi' })
            .expect(201);

        expect(fake.spans[0].params).toEqual({
            name: 'POST /chat',
            traceId: res.headers['x-trace-id'],
            metadata: {
                'http.method': 'POST',
                'http.path': '/chat',
                upstream_trace_id_raw: 'not-a-valid-trace-id',
                session_id: 'from-body',
                upstream_session_id_raw: longSession
            }
        });
        expect(fake.spans[0].traceUpdates).toEqual([{ userId: undefined, sessionId: 'from-body' }]);
        expect(controller.bodies).toEqual([{ sessionId: 'from-body', message: 'hi' }]);
    });

    it('skips the trace update when there is no identity to set', async () => {
        const { fake, nest } = await withFake();

        await request(nest.getHttpServer()).get('/ping').expect(200);

        expect(fake.spans[0].params.metadata).toEqual({ 'http.method': 'GET', 'http.path': '/ping' });
        expect(fake.spans[0].traceUpdates).toEqual([]);
    });

    it('marks the span as failed and lets the error through', async () => {
        const { fake, nest } = await withFake();

        await request(nest.getHttpServer()).get('/unavailable').expect(503);
        await request(nest.getHttpServer()).get('/crash').expect(500);

        expect(fake.spans.map(span => span.updates)).toEqual([
            [{ level: 'ERROR', statusMessage: 'maintenance', metadata: { 'exception.type': 'ServiceUnavailableException' } }],
            [{ level: 'ERROR', statusMessage: 'kaboom', metadata: { 'exception.type': 'TypeError' } }]
        ]);
        expect(fake.spans.every(span => span.ended)).toBe(true);
        expect(fake.flushCount).toBe(2);
    });

    it('never fails a request because the backend does', async () => {
        const { fake, nest, capture } = await withFake({}, ['traceUpdate', 'spanEnd', 'flush']);

        const res = await request(nest.getHttpServer())
            .post('/chat')
            .set('X-Session-Id', 'campaign_42')
            .send({ user_id: 'u-1' })
            .expect(201);

        expect(res.body).toEqual({ ok: true });
        expect(fake.flushCount).toBe(1);
        expect(capture.byMethod('langfuse.tracing').map(line => [line.detail, line.level])).toEqual([
            ['Langfuse trace update failed', 'warn'],
            ['Langfuse span end failed', 'warn'],
            ['Langfuse flush failed', 'warn']
        ]);
    });

    it('does not flush when flushing at request end is off', async () => {
        const { fake, nest } = await withFake({ langfuse: enabled(false) });

        await request(nest.getHttpServer()).get('/ping').expect(200);

        expect(fake.spans).toHaveLength(1);
        expect(fake.flushCount).toBe(0);
    });

    it('shuts the client down with the application', async () => {
        const { fake, nest } = await withFake();
        await request(nest.getHttpServer()).get('/ping').expect(200);

        await nest.close();
        app = undefined;

        expect(fake.shutdownCount).toBe(1);
    });

    describe('addLangfuseTracing', () => {
        it('installs nothing and stays transparent when not configured', async () => {
            const factory = jest.fn((): LangfuseTracer => new FakeLangfuseTracer());
            const { nest, controller } = await createApp({ langfuse: new LangfuseSettings() }, factory);

            expect(addLangfuseTracing(nest, { settings: new LangfuseSettings({ host: 'http://langfuse.test' }) })).toBe(false);
            await nest.init();

            const res = await request(nest.getHttpServer())
                .post('/chat')
                .set('X-Trace-Id', HEADER_TRACE_ID)
                .send({ user_id: 'u-1' })
                .expect(201);

            expect(res.text).toBe('{"ok":true}');
            expect(controller.bodies).toEqual([{ user_id: 'u-1' }]);
            expect(factory).not.toHaveBeenCalled();
        });

        it('installs the interceptor with custom headers when configured', async () => {
            const fake = new FakeLangfuseTracer();
            const { nest } = await createApp({ langfuse: new LangfuseSettings() }, () => fake);

            expect(
                addLangfuseTracing(nest, { settings: enabled(), traceHeader: 'X-Request-Trace', sessionHeader: 'X-Conversation' })
            ).toBe(true);
            await nest.init();

            await request(nest.getHttpServer())
                .get('/ping')
                .set('X-Request-Trace', HEADER_TRACE_ID)
                .set('X-Conversation', 'conv-1')
                .expect(200);

            expect(fake.spans[0].params).toMatchObject({ traceId: HEADER_TRACE_ID, metadata: { session_id: 'conv-1' } });
            expect(fake.spans[0].traceUpdates).toEqual([{ userId: undefined, sessionId: 'conv-1' }]);
        });
    });
});
