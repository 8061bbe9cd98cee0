/**
 * conduit - Heterogeneous Store Module
 */

export type { Handle, IndexOf, HandleValue } from './Handle';
export { StoreLineage } from './Handle';

export type { StoreAddition, ReadableStore } from './HeteroStore';
export { StoreBuilder, FrozenStore, createStore } from './HeteroStore';
