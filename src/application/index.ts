/**
 * @module @muxkit/core/application
 * @description Application layer exports
 */

// ============================================================================
// Router (composition engine)
// ============================================================================

export * from './router';

// ============================================================================
// Hosting & Ports
// ============================================================================

export * from './host';
export * from './ports';
