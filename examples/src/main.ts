// examples/src/main.ts

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { initOtel, ObservabilityLoggerService } from '../../src';
import { AppModule } from './app.module';
import { createGatewayCompletion } from './gateway-completion';

async function bootstrap(): Promise<void> {
  initOtel('example-app', { logger: new ObservabilityLoggerService({ SERVICE_NAME: 'example-app' }) });

  // Langfuse tracing is switched on by LANGFUSE_TRACING_ENABLED and friends.
  const app = await NestFactory.create(
    AppModule.forRoot({
      completion: createGatewayCompletion(process.env.LLM_GATEWAY_URL || 'http://localhost:4000/v1')
    }),
    { rawBody: true }
  );

  await app.listen(Number(process.env.PORT) || 3000);
}

bootstrap().catch(err => {
  console.error(err);
  process.exit(1);
});
