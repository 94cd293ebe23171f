export { InMemoryJobRegistry } from './registry.js';
export type { JobRegistry, JobHooks, InMemoryJobRegistryConfig } from './types.js';
