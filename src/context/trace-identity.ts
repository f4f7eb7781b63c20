// src/context/trace-identity.ts
import { MAX_SESSION_ID_LENGTH, TRACE_ID_PATTERN } from '../config/constants';
import { isRecord } from '../utils/serializers';
import { tryParseJson } from '../utils/body-preview';

export interface TraceIdResolution {
    /** Lowercase 32-hex trace id, or null when nothing usable was supplied. */
    traceId: string | null;
    /** Rejected header value, kept for diagnostics only. */
    upstreamRaw: string | null;
}

export interface SessionIdResolution {
    sessionId: string | null;
    upstreamRaw: string | null;
}

export interface BodyTraceAttributes {
    userId: string | null;
    sessionId: string | null;
}

const ASCII_PATTERN = /^[\x00-\x7F]*$/;

const normalizeAmbient = (ambientTraceId?: string | null): string | null => {
    const normalized = (ambientTraceId ?? '').trim().toLowerCase();
    return normalized || null;
};

/**
 * Pick the trace id for a request: a valid header wins, otherwise the
 * ambient OTel trace id.
 */
export function resolveTraceId(
    headerValue: string | null | undefined,
    ambientTraceId: string | null | undefined
): TraceIdResolution {
    const upstreamRaw = (headerValue ?? '').trim();
    if (upstreamRaw) {
        const candidate = upstreamRaw.toLowerCase();
        if (TRACE_ID_PATTERN.test(candidate)) {
            return { traceId: candidate, upstreamRaw: null };
        }
        return { traceId: normalizeAmbient(ambientTraceId), upstreamRaw };
    }
    return { traceId: normalizeAmbient(ambientTraceId), upstreamRaw: null };
}

export function resolveSessionId(headerValue: string | null | undefined): SessionIdResolution {
    const upstreamRaw = (headerValue ?? '').trim();
    if (!upstreamRaw) return { sessionId: null, upstreamRaw: null };
    if (upstreamRaw.length <= MAX_SESSION_ID_LENGTH && ASCII_PATTERN.test(upstreamRaw)) {
        return { sessionId: upstreamRaw, upstreamRaw: null };
    }
    return { sessionId: null, upstreamRaw };
}

const stringifyField = (value: unknown): string | null => {
    if (value === undefined || value === null) return null;
    if (typeof value === 'string') return value;
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
};

export function extractTraceAttrsFromBody(
    body: Buffer | string | null | undefined,
    contentType: string | null | undefined
): BodyTraceAttributes {
    const none: BodyTraceAttributes = { userId: null, sessionId: null };
    if (!body || body.length === 0) return none;
    if (!(contentType ?? '').toLowerCase().includes('application/json')) return none;

    const payload = tryParseJson(typeof body === 'string' ? Buffer.from(body, 'utf8') : body);
    if (!isRecord(payload)) return none;

    const sessionId = payload.session_id ?? payload.sessionId;
    return {
        userId: stringifyField(payload.user_id),
        sessionId: stringifyField(sessionId)
    };
}

export function extractUserIdFromBody(
    body: Buffer | string | null | undefined,
    contentType: string | null | undefined
): string | null {
    return extractTraceAttrsFromBody(body, contentType).userId;
}
