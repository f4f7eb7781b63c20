// src/utils/serializers.ts

import type { Request } from 'express';

export interface SerializedError {
    type: string;
    message: string;
    code?: string | number;
    stack?: string;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const errorMessage = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);

/**
 * Class name of a thrown value (`TypeError`, `HttpException`, ...)
 */
export const errorTypeName = (err: unknown): string => {
    if (err instanceof Error) return err.constructor.name || err.name;
    return err === null ? 'null' : typeof err;
};

/**
 * Serialize an error for a log line
 */
export const serializeError = (err: unknown): SerializedError => {
    if (!(err instanceof Error)) {
        return { type: errorTypeName(err), message: String(err) };
    }
    const code = 'code' in err ? err.code : undefined;
    return {
        type: errorTypeName(err),
        message: err.message,
        ...(typeof code === 'string' || typeof code === 'number' ? { code } : {}),
        ...(err.stack ? { stack: err.stack } : {})
    };
};

/**
 * First value of a request header, if any
 */
export const getHeader = (req: Request, name: string): string | undefined => {
    const value = req.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
};

/**
 * Bytes express would send for a handler result
 */
export const responseBodyToBytes = (data: unknown): Buffer | null => {
    if (data === undefined || data === null) return null;
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof Uint8Array) return Buffer.from(data);
    if (typeof data === 'string') return Buffer.from(data, 'utf8');
    const json = JSON.stringify(data);
    return json === undefined ? null : Buffer.from(json, 'utf8');
};
