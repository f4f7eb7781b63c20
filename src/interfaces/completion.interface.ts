// src/interfaces/completion.interface.ts

export interface ChatMessage {
    role: string;
    content: string | null | Array<Record<string, unknown>>;
    [key: string]: unknown;
}

/** Wire-level completion parameters (`temperature`, `max_tokens`, ...). */
export type CompletionParams = Record<string, unknown>;

export interface CompletionRequest {
    model: string;
    messages: ChatMessage[];
    apiKey?: string;
    baseUrl?: string;
    params?: CompletionParams;
}

/**
 * OpenAI-compatible response body: `choices[0].message.content` and an
 * optional `usage` with token counts. Read defensively.
 */
export type CompletionResponse = Record<string, unknown>;

/** An OpenAI-compatible chat completion call. */
export type CompletionFn = (request: CompletionRequest) => Promise<CompletionResponse>;
