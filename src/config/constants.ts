// src/config/constants.ts

import type { LevelWithSilent } from 'pino';

export const EXCLUDED_PATHS = [
  '/health',
  '/metrics',
  '/*/health',
  '/*/metrics'
];

export const shouldExcludePath = (path: string, customExclusions: string[] = []): boolean => {
  const pathsToCheck = [...EXCLUDED_PATHS, ...customExclusions];
  return pathsToCheck.some(pattern => {
    if (pattern.includes('*')) {
      const regexPattern = pattern.replace('*', '[^/]+');
      return new RegExp(`^${regexPattern}$`).test(path);
    }
    return path === pattern;
  });
};

export const DEFAULT_REDACT_KEYS: ReadonlySet<string> = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'password',
  'passwd',
  'secret',
  'token',
  'access_token',
  'refresh_token',
  'api_token',
  'api_key'
]);

export const REDACTED_MASK = '***';

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

export const DEFAULT_APPLICATION_NAME = 'app';

export const DEFAULT_TRACE_HEADER = 'X-Trace-Id';
export const DEFAULT_SESSION_HEADER = 'X-Session-Id';

export const TRACE_ID_PATTERN = /^[0-9a-f]{32}$/;
export const MAX_SESSION_ID_LENGTH = 200;
export const WRITE_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH']);

/** Fixed X-UUID value forwarded alongside X-User-ID. */
export const DEFAULT_TRACE_UUID = '123e4567-e89b-12d3-a456-426614174000';

export const CONTENT_LIMITS = {
  BODY_PREVIEW_MAX_BYTES: 2048,
  JSON_PREVIEW_MAX_BYTES: 4096,
  LANGFUSE_CLIENT_CACHE_SIZE: 8
} as const;

export const DEFAULT_OTLP_ENDPOINT = 'localhost:4317';

export const TRACER_NAMES = {
  ACCESS_LOG: 'nest-llm-observability/http'
} as const;

export const LLM_MODEL_PARAMETER_KEYS = [
  'temperature',
  'top_p',
  'max_tokens',
  'max_completion_tokens',
  'timeout',
  'presence_penalty',
  'frequency_penalty',
  'seed',
  'response_format',
  'extra_body'
] as const;

export const OBSERVABILITY_CONSTANTS = {
  MODULE_OPTIONS_TOKEN: 'OBSERVABILITY_MODULE_OPTIONS',
  LANGFUSE_SETTINGS_TOKEN: 'LANGFUSE_SETTINGS',
  COMPLETION_TOKEN: 'LLM_COMPLETION_FN',
  HTTP_LOG_METHOD: 'http.request',
  LANGFUSE_LOG_METHOD: 'langfuse.tracing',
  OTEL_INIT_LOG_METHOD: 'observability.init_otel'
} as const;
