/**
 * @fileoverview Domain Layer
 * @module conduit/domain
 *
 * Core data structures with no transport knowledge: typed stores, request
 * State, the ambient request context and the error taxonomy.
 */

// ============================================================================
// Heterogeneous Store
// ============================================================================

export * from './store';

// ============================================================================
// Request State
// ============================================================================

export * from './state';

// ============================================================================
// Context Management
// ============================================================================

export * from './context';

// ============================================================================
// Errors
// ============================================================================

export * from './exceptions';
