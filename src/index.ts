/**
 * @fileoverview conduit - typed pipelines, segment-tree routing and onion
 * dispatch for Node.js
 *
 * ## Architecture Layers
 *
 * - **domain**: HeteroStore, State, RequestContext, errors
 * - **infrastructure**: platform types and middleware, logging, pipelines,
 *   routing
 * - **application**: Dispatcher, finalizers, ConduitApp, adapter port
 * - **hosting**: node:http adapter
 * - **testing**: in-process TestClient
 *
 * @packageDocumentation
 * @module conduit
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER
// ============================================================================

export * from './domain';

// ============================================================================
// INFRASTRUCTURE LAYER
// ============================================================================

export * from './infrastructure';

// ============================================================================
// APPLICATION LAYER
// ============================================================================

export * from './application';

// ============================================================================
// HOSTING & TESTING
// ============================================================================

export * from './hosting';
export * from './testing';
