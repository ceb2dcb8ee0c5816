/**
 * @module @muxkit/core/infrastructure
 * @description Infrastructure layer exports
 */

export * from './platform';
export * from './pipeline';
export * from './routing';
export * from './http';
