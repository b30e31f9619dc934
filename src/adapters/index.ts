/**
 * Adapter exports
 */

// Default HTTP adapter
export * from './http-adapter/index.js';

// Re-export base adapter for convenience
export { BaseOAuthAdapter } from '../base-adapter.js';
export type { Adapter } from '../base-adapter.js';
