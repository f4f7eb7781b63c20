// src/index.ts

import 'reflect-metadata';

export * from './observability.module';
export * from './config/constants';
export * from './config/langfuse-settings';
export * from './interfaces';
export * from './logger/observability-logger.service';
export * from './interceptors/trace-access-log.interceptor';
export * from './interceptors/langfuse-trace.interceptor';
export * from './filters/trace-access-log.filter';
export * from './middleware/request-start.middleware';
export * from './services/access-log.service';
export * from './langfuse/langfuse-client.registry';
export * from './langfuse/langfuse.adapter';
export * from './langfuse/add-langfuse-tracing';
export * from './llm/llm-call-instrumentation.service';
export * from './llm/llm-payload';
export * from './otel/init-otel';
export * from './context/otel-context';
export * from './context/langfuse-context';
export * from './context/request-lifecycle';
export * from './context/trace-identity';
export * from './utils/body-preview';
export * from './utils/span-ops';
export * from './utils/formatters';
export * from './utils/serializers';
export * from './utils/request-body';
export * from './utils/best-effort';
