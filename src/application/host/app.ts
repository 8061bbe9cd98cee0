/**
 * conduit - Application
 *
 * Entry point tying a frozen router to the dispatcher and to transport
 * adapters.
 */

import { FrozenStructureError, IExceptionFilter } from '../../domain/exceptions';
import {
  ILogger,
  LogLevel,
  createConsoleLogger,
  isLogLevel,
} from '../../infrastructure/logging';
import { ConduitRequest, ConduitResponse } from '../../infrastructure/platform';
import { Router } from '../../infrastructure/routing';
import {
  DispatchOptions,
  Dispatcher,
  Finalizer,
  requestIdFinalizer,
} from '../dispatch';
import { IAdapter, ServerInfo } from '../ports';

/**
 * Application options
 */
export interface ConduitAppOptions {
  /** Application name, used in log lines */
  name?: string;

  /** Deployment environment (default: `NODE_ENV` or `development`) */
  environment?: string;

  /** Default port for `listen` */
  port?: number;

  /** Default host for `listen` */
  host?: string;

  logger?: ILogger;

  /** Finalizers, run last registered first */
  finalizers?: Finalizer[];

  /** Tried in order before DefaultExceptionFilter, which answers every fault */
  exceptionFilters?: IExceptionFilter[];

  /** Add `requestIdFinalizer` (default: true) */
  echoRequestId?: boolean;

  /** Request header carrying a caller-chosen request id */
  requestIdHeader?: string;
}

/**
 * Defaults read from the environment:
 * - `NODE_ENV` becomes `environment`
 * - `CONDUIT_LOG_LEVEL` picks the console logger's level; unknown values
 *   fall back to `info`
 */
export function resolveAppOptions(
  env: NodeJS.ProcessEnv = process.env,
): Required<Pick<ConduitAppOptions, 'environment' | 'logger'>> & { logLevel: LogLevel } {
  const requested = env.CONDUIT_LOG_LEVEL?.trim().toLowerCase();
  const logLevel: LogLevel = requested && isLogLevel(requested) ? requested : 'info';

  return {
    environment: env.NODE_ENV ?? 'development',
    logLevel,
    logger: createConsoleLogger({ level: logLevel, prefix: '[conduit]' }),
  };
}

/**
 * ConduitApp - serves requests with one router
 *
 * @example
 * ```typescript
 * const router = buildSimpleRouter((route) => {
 *   route.get('/health').to(() => response().ok().text().body('ok').build());
 * });
 *
 * const app = ConduitApp.create(router);
 * await app.listen(new NodeHttpAdapter(), 8080);
 * ```
 */
export class ConduitApp {
  private readonly options: ConduitAppOptions & { name: string; environment: string };
  private readonly finalizers: Finalizer[];
  private readonly filters: IExceptionFilter[];
  private readonly adapters: IAdapter[] = [];
  private dispatcher?: Dispatcher;
  readonly logger: ILogger;

  private constructor(
    readonly router: Router,
    options: ConduitAppOptions = {},
  ) {
    const defaults = resolveAppOptions();
    this.options = {
      ...options,
      name: options.name ?? 'conduit',
      environment: options.environment ?? defaults.environment,
    };
    this.logger = options.logger ?? defaults.logger;
    this.finalizers = [...(options.finalizers ?? [])];
    if (options.echoRequestId !== false) {
      this.finalizers.unshift(requestIdFinalizer);
    }
    this.filters = [...(options.exceptionFilters ?? [])];
  }

  static create(router: Router, options?: ConduitAppOptions): ConduitApp {
    return new ConduitApp(router, options);
  }

  get name(): string {
    return this.options.name;
  }

  get environment(): string {
    return this.options.environment;
  }

  // ==================== Configuration ====================

  /**
   * Add a finalizer. It runs before every finalizer added earlier.
   */
  addFinalizer(finalizer: Finalizer): this {
    this.assertNotStarted('addFinalizer');
    this.finalizers.push(finalizer);
    return this;
  }

  /**
   * Add an exception filter to the outermost fault boundary
   */
  useExceptionFilter(filter: IExceptionFilter): this {
    this.assertNotStarted('useExceptionFilter');
    this.filters.push(filter);
    return this;
  }

  // ==================== Serving ====================

  /**
   * Serve one request in process
   */
  handle(request: ConduitRequest, options?: DispatchOptions): Promise<ConduitResponse> {
    return this.getDispatcher().dispatch(request, options);
  }

  /**
   * Initialize and start an adapter
   *
   * @param port - defaults to `options.port`, then 3000
   * @param host - defaults to `options.host`, then `0.0.0.0`
   */
  async listen(adapter: IAdapter, port?: number, host?: string): Promise<ServerInfo> {
    const dispatcher = this.getDispatcher();
    await adapter.init((request, options) => dispatcher.dispatch(request, options));

    const info = await adapter.start(
      port ?? this.options.port ?? 3000,
      host ?? this.options.host ?? '0.0.0.0',
    );
    this.adapters.push(adapter);

    this.logger.info(`${this.name} listening on ${info.url} (${this.environment})`);
    return info;
  }

  /**
   * Stop every running adapter
   */
  async stop(): Promise<void> {
    for (const adapter of this.adapters) {
      if (adapter.isRunning()) {
        await adapter.stop();
      }
    }
    this.adapters.length = 0;
    this.logger.info(`${this.name} stopped`);
  }

  private getDispatcher(): Dispatcher {
    if (!this.dispatcher) {
      this.dispatcher = new Dispatcher(this.router, {
        finalizers: this.finalizers,
        exceptionFilters: this.filters,
        logger: this.logger,
        requestIdHeader: this.options.requestIdHeader,
      });
    }
    return this.dispatcher;
  }

  private assertNotStarted(operation: string): void {
    if (this.dispatcher) {
      throw new FrozenStructureError(`application (${operation} after the first request)`);
    }
  }
}

// ==================== Builder ====================

/**
 * Fluent construction of a {@link ConduitApp}
 */
export class ConduitAppBuilder {
  private options: ConduitAppOptions = {};
  private finalizers: Finalizer[] = [];
  private filters: IExceptionFilter[] = [];

  withName(name: string): this {
    this.options.name = name;
    return this;
  }

  withPort(port: number): this {
    this.options.port = port;
    return this;
  }

  withHost(host: string): this {
    this.options.host = host;
    return this;
  }

  withEnvironment(env: string): this {
    this.options.environment = env;
    return this;
  }

  withLogger(logger: ILogger): this {
    this.options.logger = logger;
    return this;
  }

  withRequestIdHeader(header: string): this {
    this.options.requestIdHeader = header;
    return this;
  }

  withoutRequestIdEcho(): this {
    this.options.echoRequestId = false;
    return this;
  }

  addFinalizer(finalizer: Finalizer): this {
    this.finalizers.push(finalizer);
    return this;
  }

  useExceptionFilter(filter: IExceptionFilter): this {
    this.filters.push(filter);
    return this;
  }

  build(router: Router): ConduitApp {
    return ConduitApp.create(router, {
      ...this.options,
      finalizers: [...this.finalizers],
      exceptionFilters: [...this.filters],
    });
  }
}

export function createAppBuilder(): ConduitAppBuilder {
  return new ConduitAppBuilder();
}

export function createApp(router: Router, options?: ConduitAppOptions): ConduitApp {
  return ConduitApp.create(router, options);
}
