/**
 * @muxkit/core - Pipeline Module
 *
 * Middleware stack folding
 */

export { MiddlewareStack, createStack, compose, toWrapper } from './builder';
export type { MiddlewareLike } from './builder';
