/**
 * @fileoverview State - Request-scoped heterogeneous container
 *
 * @packageDocumentation
 * @module conduit/domain/state
 *
 * One State exists per in-flight request. The dispatcher creates it with the
 * request metadata, extractors add the parsed path and query values,
 * middleware add whatever they provide (sessions, principals, timers) and
 * the handler reads from it. It is discarded once the response is produced.
 *
 * Each type identity holds at most one value: `put` of a type already
 * present replaces it. Reading a type that is absent throws
 * {@link StateAbsentError}, which is distinguishable from other faults.
 *
 * State is owned by one request. Work spawned concurrently from a handler
 * gets its own copy through {@link State.fork}.
 *
 * @example
 * ```typescript
 * class Visitor {
 *   constructor(public readonly name: string) {}
 * }
 *
 * state.put(new Visitor('ada'));
 * state.borrow(Visitor).name; // 'ada'
 *
 * state.take(Visitor);        // removes it
 * state.has(Visitor);         // false
 * state.borrow(Visitor);      // throws StateAbsentError
 * ```
 */

import { ConduitError, StateAbsentError } from '../exceptions/errors';
import { StateKey, StateType, stateTypeName } from './StateKey';

function identityOf(value: object): Function {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor !== 'function' || ctor === Object || ctor === Array) {
    throw new ConduitError(
      'State.put() needs a class instance; store plain values with State.putAs() and a StateKey',
    );
  }
  return ctor;
}

/**
 * Request-scoped map from type identity to value
 */
export class State {
  private readonly values = new Map<unknown, unknown>();

  /**
   * Store a class instance under its own class, replacing any previous value
   */
  put<T extends object>(value: T): void {
    this.values.set(identityOf(value), value);
  }

  /**
   * Store a value under a key, replacing any previous value
   */
  putAs<T>(key: StateKey<T>, value: T): void {
    this.values.set(key, value);
  }

  has(type: StateType<unknown>): boolean {
    return this.values.has(type);
  }

  /**
   * Read a value without removing it
   *
   * @throws StateAbsentError when no value of this type is present
   */
  borrow<T>(type: StateType<T>): Readonly<T> {
    return this.lookup(type);
  }

  /**
   * Read a value for in-place modification
   *
   * @throws StateAbsentError when no value of this type is present
   */
  borrowMut<T>(type: StateType<T>): T {
    return this.lookup(type);
  }

  tryBorrow<T>(type: StateType<T>): Readonly<T> | undefined {
    return this.values.has(type) ? this.lookup(type) : undefined;
  }

  /**
   * Remove a value and return it
   *
   * @throws StateAbsentError when no value of this type is present
   */
  take<T>(type: StateType<T>): T {
    const value = this.lookup(type);
    this.values.delete(type);
    return value;
  }

  tryTake<T>(type: StateType<T>): T | undefined {
    return this.values.has(type) ? this.take(type) : undefined;
  }

  /**
   * Independent shallow copy, for work running concurrently with the request
   */
  fork(): State {
    const copy = new State();
    for (const [type, value] of this.values) {
      copy.values.set(type, value);
    }
    return copy;
  }

  /**
   * Names of the identities currently present
   */
  typeNames(): string[] {
    const names: string[] = [];
    for (const type of this.values.keys()) {
      if (type instanceof StateKey) {
        names.push(type.name);
      } else if (typeof type === 'function') {
        names.push(type.name);
      }
    }
    return names;
  }

  get size(): number {
    return this.values.size;
  }

  private lookup<T>(type: StateType<T>): T {
    if (!this.values.has(type)) {
      throw new StateAbsentError(stateTypeName(type));
    }
    const value = this.values.get(type);
    if (type instanceof StateKey) {
      // keyed entries are only written through putAs with the same key
      return value as T;
    }
    if (value instanceof type) {
      return value;
    }
    throw new StateAbsentError(stateTypeName(type));
  }
}
