/**
 * conduit - Port Module
 *
 * Transport adapters
 */

export type {
  IAdapter,
  AdapterLifecycle,
  RequestHandler,
  ServerInfo,
} from './adapter';

export { AdapterBase } from './adapter';
