/**
 * @fileoverview @muxkit/core - Request dispatch composition
 * @description
 * Register handlers by method and path pattern, mount independently built
 * routers under a prefix, and wrap the whole dispatch surface in an ordered
 * middleware stack. `Router.finalize()` turns all of it into one handler.
 *
 * ## Architecture Layers
 * - domain: request context and exceptions
 * - application: router, host and adapter ports
 * - infrastructure: pattern substrate, middleware, Node HTTP adapter
 *
 * @packageDocumentation
 * @module @muxkit/core
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ==================== Version ====================
export const VERSION = '1.0.0';
