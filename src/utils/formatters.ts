// src/utils/formatters.ts

import { DEFAULT_APPLICATION_NAME } from '../config/constants';
import { traceFields } from '../context/otel-context';

export type LogJsonLevel = 'debug' | 'info' | 'warn' | 'warning' | 'error';

export interface LogPayloadOptions {
    level?: LogJsonLevel;
    applicationName?: string;
    fields?: Record<string, unknown>;
}

export interface LogPayload {
    application_name: string;
    method_name: string;
    detail: string;
    time: string;
    level: LogJsonLevel;
    trace_id?: string;
    span_id?: string;
    [field: string]: unknown;
}

export const resolveApplicationName = (configured?: string): string =>
    configured || process.env.OTEL_SERVICE_NAME || DEFAULT_APPLICATION_NAME;

/**
 * One structured log record; the active span's ids are stamped in before
 * the caller's fields, which win on conflict.
 */
export const buildPayload = (
    methodName: string,
    detail: string,
    { level = 'info', applicationName, fields }: LogPayloadOptions = {}
): LogPayload => ({
    application_name: resolveApplicationName(applicationName),
    method_name: methodName,
    detail,
    time: new Date().toISOString(),
    level,
    ...traceFields(),
    ...fields
});
