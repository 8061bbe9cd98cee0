export type { NodeHttpAdapterOptions } from './node-http-adapter';
export {
  NodeHttpAdapter,
  serializeBody,
  toConduitRequest,
  writeResponse,
} from './node-http-adapter';
