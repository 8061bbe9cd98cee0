/**
 * conduit - node:http adapter
 *
 * Serves a {@link ConduitApp} on a plain `node:http` server. The request
 * body is handed over unread: `request.body` is the IncomingMessage stream.
 * A client disconnecting before the response is written aborts the
 * request's signal.
 */

import http from 'node:http';
import { AddressInfo } from 'node:net';
import { AdapterBase, RequestHandler, ServerInfo } from '../application/ports';
import { ConduitError, toError } from '../domain/exceptions';
import { ILogger, consoleLogger } from '../infrastructure/logging';
import {
  ConduitRequest,
  ConduitResponse,
  RequestHeaders,
  getResponseHeader,
} from '../infrastructure/platform';

export interface NodeHttpAdapterOptions {
  logger?: ILogger;

  /** Options passed to `http.createServer` */
  serverOptions?: http.ServerOptions;
}

/**
 * Convert an IncomingMessage into a request
 */
export function toConduitRequest(req: http.IncomingMessage): ConduitRequest<http.IncomingMessage> {
  const url = req.url ?? '/';
  const queryStart = url.indexOf('?');
  const headers: RequestHeaders = { ...req.headers };

  return {
    method: (req.method ?? 'GET').toUpperCase(),
    path: queryStart === -1 ? url : url.slice(0, queryStart),
    ...(queryStart !== -1 && { query: url.slice(queryStart + 1) }),
    headers,
    body: req,
    ...(req.socket.remoteAddress !== undefined && {
      remoteAddress: req.socket.remoteAddress,
    }),
    raw: req,
  };
}

/**
 * Serialize a response body. Strings and bytes are written as they are;
 * anything else is JSON.
 */
export function serializeBody(
  response: ConduitResponse,
): { payload?: string | Uint8Array; contentType?: string } {
  const { body } = response;
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return { payload: body };
  }
  return { payload: JSON.stringify(body), contentType: 'application/json' };
}

/**
 * Write a response to a ServerResponse
 */
export function writeResponse(
  res: http.ServerResponse,
  response: ConduitResponse,
  method: string,
): void {
  const { payload, contentType } = serializeBody(response);

  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  if (contentType && getResponseHeader(response, 'content-type') === undefined) {
    res.setHeader('Content-Type', contentType);
  }
  if (payload !== undefined && getResponseHeader(response, 'content-length') === undefined) {
    res.setHeader('Content-Length', Buffer.byteLength(payload));
  }

  res.statusCode = response.status;
  if (method === 'HEAD' || payload === undefined) {
    res.end();
  } else {
    res.end(payload);
  }
}

export class NodeHttpAdapter extends AdapterBase {
  readonly name = 'node-http';
  readonly protocol = 'http';

  private server?: http.Server;
  private readonly logger: ILogger;

  constructor(private readonly options: NodeHttpAdapterOptions = {}) {
    super();
    this.logger = options.logger ?? consoleLogger;
  }

  async start(port = 3000, host = '0.0.0.0'): Promise<ServerInfo> {
    if (this.running) {
      throw new ConduitError(`${this.name} adapter is already running`);
    }
    const handler = this.requireHandler();
    await this.onBeforeStart?.();

    const server = http.createServer(this.options.serverOptions ?? {}, (req, res) => {
      void this.serve(handler, req, res);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.running = true;

    const address = server.address();
    const boundPort = typeof address === 'object' && address ? address.port : port;
    return {
      protocol: this.protocol,
      host,
      port: boundPort,
      url: `http://${host}:${boundPort}`,
    };
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server = undefined;
    this.running = false;
    await this.onAfterStop?.();
  }

  /**
   * The bound address, once started
   */
  address(): AddressInfo | undefined {
    const address = this.server?.address();
    return typeof address === 'object' && address ? address : undefined;
  }

  private async serve(
    handler: RequestHandler,
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const controller = new AbortController();
    res.once('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const request = toConduitRequest(req);
      const response = await handler(request, { signal: controller.signal });
      if (!controller.signal.aborted) {
        writeResponse(res, response, request.method);
      }
    } catch (thrown) {
      const error = toError(thrown);
      this.logger.error(`${this.name}: failed to serve ${req.method} ${req.url}: ${error.message}`);
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    }
  }
}
