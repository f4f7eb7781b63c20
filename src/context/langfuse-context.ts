// src/context/langfuse-context.ts
import { AsyncLocalStorage } from 'async_hooks';
import { LangfuseRequestSpan } from '../interfaces';

const currentSpanStorage = new AsyncLocalStorage<LangfuseRequestSpan>();

/**
 * Run `fn` with `span` as the current Langfuse span for everything it awaits.
 */
export function runWithLangfuseSpan<T>(span: LangfuseRequestSpan, fn: () => T): T {
    return currentSpanStorage.run(span, fn);
}

export function currentLangfuseSpan(): LangfuseRequestSpan | undefined {
    return currentSpanStorage.getStore();
}
