// src/utils/body-preview.ts

import { CONTENT_LIMITS, DEFAULT_REDACT_KEYS, REDACTED_MASK } from '../config/constants';
import { isRecord } from './serializers';

export interface BodyPreview {
    preview: string;
    truncated: boolean;
    /** Byte length of the payload before sanitizing or truncating. */
    size: number;
}

export interface BodyPreviewOptions {
    maxBytes?: number;
    redactKeys?: Iterable<string>;
}

const EMPTY_PREVIEW: BodyPreview = Object.freeze({ preview: '', truncated: false, size: 0 });

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Try to parse bytes as JSON, return undefined if they are not valid UTF-8 JSON
 */
export function tryParseJson(raw: Uint8Array): unknown {
    try {
        return JSON.parse(strictUtf8.decode(raw));
    } catch {
        return undefined;
    }
}

/**
 * Normalize redact keys: trimmed, lower-cased, empties dropped. An empty
 * input falls back to the default set.
 */
export function normalizeRedactKeys(redactKeys?: Iterable<string>): Set<string> {
    const keys = new Set<string>();
    for (const key of redactKeys ?? []) {
        const normalized = key.trim().toLowerCase();
        if (normalized) keys.add(normalized);
    }
    return keys.size > 0 ? keys : new Set(DEFAULT_REDACT_KEYS);
}

export function shouldRedactKey(key: string, redactKeys: ReadonlySet<string>): boolean {
    const normalized = key.trim().toLowerCase();
    if (!normalized) return false;
    if (redactKeys.has(normalized)) return true;
    for (const candidate of redactKeys) {
        if (normalized.includes(candidate)) return true;
    }
    return false;
}

/**
 * Mask redacted keys in place. Arrays are walked, never masked by position.
 */
export function redactInPlace(value: unknown, redactKeys: ReadonlySet<string>): void {
    if (Array.isArray(value)) {
        value.forEach(item => redactInPlace(item, redactKeys));
        return;
    }
    if (!isRecord(value)) return;

    for (const key of Object.keys(value)) {
        if (shouldRedactKey(key, redactKeys)) {
            value[key] = REDACTED_MASK;
            continue;
        }
        redactInPlace(value[key], redactKeys);
    }
}

/**
 * JSON bodies come back redacted and re-serialized in compact form; anything
 * else is returned as-is.
 */
export function sanitizeBody(raw: Buffer, redactKeys: ReadonlySet<string>): Buffer {
    const parsed = tryParseJson(raw);
    if (parsed === undefined) return raw;

    redactInPlace(parsed, redactKeys);
    return Buffer.from(JSON.stringify(parsed), 'utf8');
}

function truncateBytes(bytes: Buffer, maxBytes: number): { text: string; truncated: boolean } {
    const limit = Math.max(Math.floor(maxBytes), 1);
    const truncated = bytes.length > limit;
    const kept = truncated ? bytes.subarray(0, limit) : bytes;
    // Buffer#toString substitutes U+FFFD for a split multi-byte sequence.
    return { text: kept.toString('utf8'), truncated };
}

export function buildBodyPreview(
    body: Buffer | Uint8Array | string | null | undefined,
    options: BodyPreviewOptions = {}
): BodyPreview {
    if (body === null || body === undefined) return { ...EMPTY_PREVIEW };

    const raw = typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.from(body);
    if (raw.length === 0) return { ...EMPTY_PREVIEW };

    const sanitized = sanitizeBody(raw, normalizeRedactKeys(options.redactKeys));
    const { text, truncated } = truncateBytes(
        sanitized,
        options.maxBytes ?? CONTENT_LIMITS.BODY_PREVIEW_MAX_BYTES
    );
    return { preview: text, truncated, size: raw.length };
}

const jsonReplacer = (_key: string, value: unknown): unknown =>
    typeof value === 'bigint' ? value.toString() : value;

/**
 * Serialize any value and bound it; `size` is the serialized length.
 */
export function previewJson(
    value: unknown,
    maxBytes: number = CONTENT_LIMITS.JSON_PREVIEW_MAX_BYTES
): BodyPreview {
    const encoded = Buffer.from(JSON.stringify(value, jsonReplacer) ?? 'null', 'utf8');
    const { text, truncated } = truncateBytes(encoded, maxBytes);
    return { preview: text, truncated, size: encoded.length };
}
