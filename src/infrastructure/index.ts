/**
 * @fileoverview Infrastructure Layer
 * @module conduit/infrastructure
 */

// ============================================================================
// Platform (request/response, middleware contract)
// ============================================================================

export * from './platform';

// ============================================================================
// Logging
// ============================================================================

export * from './logging';

// ============================================================================
// Pipelines
// ============================================================================

export * from './pipeline';

// ============================================================================
// Routing
// ============================================================================

export * from './routing';
