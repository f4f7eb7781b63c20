// src/config/langfuse-settings.ts

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

export const parseBoolEnv = (raw: string | undefined, defaultValue = false): boolean => {
  const normalized = (raw ?? '').trim().toLowerCase();
  if (normalized === '') return defaultValue;
  return TRUTHY_VALUES.has(normalized);
};

export interface LangfuseSettingsInit {
  host?: string;
  publicKey?: string;
  secretKey?: string;
  tracingEnabled?: boolean;
  flushAtRequestEnd?: boolean;
}

/**
 * Immutable Langfuse connection settings. Two instances with the same
 * values share a cache key and therefore the same client.
 */
export class LangfuseSettings {
  readonly host: string;
  readonly publicKey: string;
  readonly secretKey: string;
  readonly tracingEnabled: boolean;
  readonly flushAtRequestEnd: boolean;

  constructor(init: LangfuseSettingsInit = {}) {
    this.host = init.host ?? '';
    this.publicKey = init.publicKey ?? '';
    this.secretKey = init.secretKey ?? '';
    this.tracingEnabled = init.tracingEnabled ?? false;
    this.flushAtRequestEnd = init.flushAtRequestEnd ?? true;
    Object.freeze(this);
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): LangfuseSettings {
    return new LangfuseSettings({
      host: (env.LANGFUSE_HOST ?? '').trim(),
      publicKey: (env.LANGFUSE_PUBLIC_KEY ?? '').trim(),
      secretKey: (env.LANGFUSE_SECRET_KEY ?? '').trim(),
      tracingEnabled: parseBoolEnv(env.LANGFUSE_TRACING_ENABLED, false),
      flushAtRequestEnd: parseBoolEnv(env.LANGFUSE_FLUSH_AT_REQUEST_END, true)
    });
  }

  isConfiguredForTracing(): boolean {
    if (!this.tracingEnabled) return false;
    return Boolean(this.host && this.publicKey && this.secretKey);
  }

  cacheKey(): string {
    return JSON.stringify([
      this.host,
      this.publicKey,
      this.secretKey,
      this.tracingEnabled,
      this.flushAtRequestEnd
    ]);
  }
}
