export * from './observability-config.interface';
export * from './completion.interface';
export * from './langfuse.interface';
