// src/utils/request-body.ts

import type { RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';
import { getHeader, isRecord, responseBodyToBytes } from './serializers';

const hasDeclaredBody = (req: Request): boolean => {
    if (getHeader(req, 'transfer-encoding')) return true;
    const length = Number(getHeader(req, 'content-length') ?? 0);
    return Number.isFinite(length) && length > 0;
};

/**
 * The request body exactly as the client sent it, or null when the platform
 * kept no copy. Nest keeps one when the app is created with `rawBody: true`
 * and a JSON or urlencoded parser read the body. The socket stream is never
 * read here, so `req.body` stays untouched for the handler.
 */
export function readRequestBody(req: RawBodyRequest<Request>): Buffer | null {
    const { rawBody } = req;
    return Buffer.isBuffer(rawBody) && rawBody.length > 0 ? rawBody : null;
}

/**
 * JSON body for identity lookups: the raw bytes when kept, otherwise the body
 * the JSON parser produced, serialized again. Only the parsed values matter
 * here, so the result is never used as a preview.
 */
export function readRequestJsonBody(req: RawBodyRequest<Request>): Buffer | null {
    const raw = readRequestBody(req);
    if (raw) return raw;
    if (!hasDeclaredBody(req)) return null;
    const { body }: { body: unknown } = req;
    return isRecord(body) || Array.isArray(body) ? responseBodyToBytes(body) : null;
}
