// src/llm/llm-payload.ts

import { LLM_MODEL_PARAMETER_KEYS } from '../config/constants';
import { CompletionParams, ChatMessage, ModelParameterValue } from '../interfaces';
import { isRecord } from '../utils/serializers';

const USAGE_KEYS = ['prompt_tokens', 'completion_tokens', 'total_tokens'] as const;

const INTEGER_STRING = /^\s*[-+]?\d+\s*$/;

const isScalar = (value: unknown): value is string | number | boolean | null =>
    value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

const isPlainObject = (value: unknown): boolean => {
    if (!isRecord(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
};

const isJsonValue = (value: unknown): boolean =>
    isScalar(value) || Array.isArray(value) || isPlainObject(value);

const stringifyValue = (value: unknown): string => {
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
};

/**
 * Integer view of a token count, or null when the value has none.
 */
export function safeInt(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;
    if (typeof value === 'string' && INTEGER_STRING.test(value)) return Number.parseInt(value, 10);
    return null;
}

export function extractUsageDetails(response: unknown): Record<string, number> | undefined {
    if (!isRecord(response) || !isRecord(response.usage)) return undefined;
    const usage = response.usage;
    const details: Record<string, number> = {};
    for (const key of USAGE_KEYS) {
        const count = safeInt(usage[key]);
        if (count !== null) details[key] = count;
    }
    return Object.keys(details).length > 0 ? details : undefined;
}

/** `choices[0].message.content`, or '' when the response has no such path. */
export function firstChoiceContent(response: unknown): unknown {
    if (!isRecord(response)) return '';
    const { choices } = response;
    const first: unknown = Array.isArray(choices) && choices.length > 0 ? choices[0] : {};
    if (!isRecord(first) || !isRecord(first.message)) return '';
    const { message } = first;
    return 'content' in message ? message.content : '';
}

export function extractOutput(response: unknown): { content: unknown } | { raw: string } {
    if (!isRecord(response)) return { raw: String(response) };
    return { content: firstChoiceContent(response) };
}

/**
 * Allow-listed call parameters as Langfuse model parameters; anything that is
 * not a scalar is stringified.
 */
export function extractModelParameters(params: CompletionParams = {}): Record<string, ModelParameterValue> {
    const out: Record<string, ModelParameterValue> = {};
    for (const key of LLM_MODEL_PARAMETER_KEYS) {
        if (!(key in params) || params[key] === undefined) continue;
        const value = params[key];
        out[key] = isScalar(value) ? value : stringifyValue(value);
    }
    return out;
}

export interface DefaultRequestPayloadInit {
    model: string;
    messages: ChatMessage[];
    params?: CompletionParams;
}

/** What the completion call sends over the wire, minus credentials. */
export function buildDefaultRequestPayload({
    model,
    messages,
    params = {}
}: DefaultRequestPayloadInit): Record<string, unknown> {
    const payload: Record<string, unknown> = { model, messages };
    for (const [key, value] of Object.entries(params)) {
        if (key === 'api_key' || key === 'apiKey') continue;
        if (value === null || value === undefined) continue;
        payload[key] = isJsonValue(value) ? value : stringifyValue(value);
    }
    return payload;
}
