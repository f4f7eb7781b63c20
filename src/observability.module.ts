// src/observability.module.ts

import { DynamicModule, Global, MiddlewareConsumer, Module, NestModule, Provider } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { OBSERVABILITY_CONSTANTS } from './config/constants';
import { LangfuseSettings } from './config/langfuse-settings';
import { TraceAccessLogFilter } from './filters/trace-access-log.filter';
import { LangfuseTraceInterceptor } from './interceptors/langfuse-trace.interceptor';
import { TraceAccessLogInterceptor } from './interceptors/trace-access-log.interceptor';
import { ObservabilityConfig } from './interfaces';
import { LangfuseClientRegistry } from './langfuse/langfuse-client.registry';
import { createLangfuseTracer } from './langfuse/langfuse.adapter';
import { LlmCallInstrumentation } from './llm/llm-call-instrumentation.service';
import { ObservabilityLoggerService } from './logger/observability-logger.service';
import { RequestStartMiddleware } from './middleware/request-start.middleware';
import { AccessLogService } from './services/access-log.service';

@Global()
@Module({})
export class ObservabilityModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestStartMiddleware).forRoutes('*');
  }

  static forRoot(config: ObservabilityConfig = {}): DynamicModule {
    const settings = config.langfuse ?? LangfuseSettings.fromEnv();

    const providers: Provider[] = [
      {
        provide: OBSERVABILITY_CONSTANTS.MODULE_OPTIONS_TOKEN,
        useValue: config
      },
      {
        provide: OBSERVABILITY_CONSTANTS.LANGFUSE_SETTINGS_TOKEN,
        useValue: settings
      },
      ObservabilityLoggerService,
      {
        provide: LangfuseClientRegistry,
        useFactory: (logger: ObservabilityLoggerService) =>
          new LangfuseClientRegistry(config.langfuseClientFactory ?? createLangfuseTracer, logger),
        inject: [ObservabilityLoggerService]
      },
      LlmCallInstrumentation,
      AccessLogService,
      {
        provide: APP_FILTER,
        useClass: TraceAccessLogFilter
      },
      // Registration order is nesting order: the access log wraps Langfuse.
      {
        provide: APP_INTERCEPTOR,
        useClass: TraceAccessLogInterceptor
      },
      ...(settings.isConfiguredForTracing()
        ? [
            {
              provide: APP_INTERCEPTOR,
              useClass: LangfuseTraceInterceptor
            }
          ]
        : []),
      ...(config.completion
        ? [
            {
              provide: OBSERVABILITY_CONSTANTS.COMPLETION_TOKEN,
              useValue: config.completion
            }
          ]
        : [])
    ];

    return {
      module: ObservabilityModule,
      providers,
      exports: [
        ObservabilityLoggerService,
        LangfuseClientRegistry,
        LlmCallInstrumentation,
        OBSERVABILITY_CONSTANTS.LANGFUSE_SETTINGS_TOKEN
      ]
    };
  }
}
