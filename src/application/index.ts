/**
 * @fileoverview Application Layer
 * @module conduit/application
 */

// ============================================================================
// Dispatch
// ============================================================================

export * from './dispatch';

// ============================================================================
// Host & Adapters
// ============================================================================

export * from './host';
