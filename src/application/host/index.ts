/**
 * conduit - Hosting Module
 *
 * Application and adapter lifecycle
 */

export type { IAdapter, AdapterLifecycle, RequestHandler, ServerInfo } from '../ports';
export { AdapterBase } from '../ports';

export {
  ConduitApp,
  ConduitAppBuilder,
  createApp,
  createAppBuilder,
  resolveAppOptions,
} from './app';

export type { ConduitAppOptions } from './app';
