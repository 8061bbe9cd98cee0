/**
 * conduit - Transport adapter port
 *
 * An adapter owns a listening transport. It turns incoming messages into
 * {@link ConduitRequest}s, hands them to the application's request handler
 * and writes the returned {@link ConduitResponse} back.
 */

import { ConduitRequest, ConduitResponse } from '../../infrastructure/platform';
import { ConduitError } from '../../domain/exceptions';
import { DispatchOptions } from '../dispatch';

/**
 * What the application hands to an adapter on `init`
 */
export type RequestHandler = (
  request: ConduitRequest,
  options?: DispatchOptions,
) => Promise<ConduitResponse>;

/**
 * Where a started adapter listens
 */
export interface ServerInfo {
  protocol: string;
  host: string;
  port: number;
  url: string;
}

export interface AdapterLifecycle {
  onInit?(): Promise<void>;
  onBeforeStart?(): Promise<void>;
  onAfterStop?(): Promise<void>;
}

export interface IAdapter extends AdapterLifecycle {
  readonly name: string;
  readonly protocol: string;

  /** Register the request handler. Called once, before `start`. */
  init(handler: RequestHandler): Promise<void>;

  start(port?: number, host?: string): Promise<ServerInfo>;

  stop(): Promise<void>;

  isRunning(): boolean;
}

/**
 * Base class for adapters
 */
export abstract class AdapterBase implements IAdapter {
  abstract readonly name: string;
  abstract readonly protocol: string;

  protected handler?: RequestHandler;
  protected running = false;

  async init(handler: RequestHandler): Promise<void> {
    this.handler = handler;
    await this.onInit?.();
  }

  abstract start(port?: number, host?: string): Promise<ServerInfo>;
  abstract stop(): Promise<void>;

  isRunning(): boolean {
    return this.running;
  }

  onInit?(): Promise<void>;
  onBeforeStart?(): Promise<void>;
  onAfterStop?(): Promise<void>;

  /**
   * The registered handler
   *
   * @throws ConduitError when `init` has not been called
   */
  protected requireHandler(): RequestHandler {
    if (!this.handler) {
      throw new ConduitError(`Adapter "${this.name}" was started before init()`);
    }
    return this.handler;
  }
}
