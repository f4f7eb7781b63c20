// examples/src/gateway-completion.ts

import { CompletionFn, isRecord } from '../../src';

const toHeaders = (value: unknown): Record<string, string> => {
  if (!isRecord(value)) return {};
  const headers: Record<string, string> = {};
  for (const [name, header] of Object.entries(value)) {
    if (typeof header === 'string') headers[name] = header;
  }
  return headers;
};

/**
 * Completion call against an OpenAI-compatible gateway. `extra_headers` in the
 * params are sent as HTTP headers instead of in the body.
 */
export const createGatewayCompletion = (defaultBaseUrl: string): CompletionFn =>
  async ({ model, messages, apiKey, baseUrl, params = {} }) => {
    const { extra_headers: extraHeaders, ...body } = params;
    const res = await fetch(`${(baseUrl ?? defaultBaseUrl).replace(/\/+$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        ...(apiKey ? { authorization: `Bearer ${apiKey}` } : {}),
        ...toHeaders(extraHeaders)
      },
      body: JSON.stringify({ model, messages, ...body })
    });
    if (!res.ok) {
      throw new Error(`completion gateway responded ${res.status}`);
    }
    const data: unknown = await res.json();
    if (!isRecord(data)) {
      throw new Error('completion gateway returned a non-object body');
    }
    return data;
  };
