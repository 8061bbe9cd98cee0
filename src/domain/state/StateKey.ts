/**
 * conduit - State type identities
 *
 * State is keyed by type identity. Classes are their own identity:
 * `state.put(new Session(...))` is found again with `state.borrow(Session)`.
 * Values that are not class instances (strings, records, functions) are
 * stored under a {@link StateKey} token.
 */

declare const keyType: unique symbol;

/**
 * Token standing for the type `T` inside a request State.
 *
 * @example
 * ```typescript
 * export const TenantId = stateKey<string>('TenantId');
 *
 * state.putAs(TenantId, 'acme');
 * state.borrow(TenantId); // 'acme'
 * ```
 */
export class StateKey<T> {
  declare readonly [keyType]?: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `StateKey(${this.name})`;
  }
}

/**
 * Constructor usable as a state identity
 */
export type StateClass<T> = abstract new (...args: never[]) => T;

/**
 * Anything accepted as a type identity by State
 */
export type StateType<T> = StateKey<T> | StateClass<T>;

/**
 * Create a state key
 */
export function stateKey<T>(name: string): StateKey<T> {
  return new StateKey<T>(name);
}

/**
 * Display name of a state identity, used in errors and logs
 */
export function stateTypeName(type: StateType<unknown>): string {
  return type instanceof StateKey ? type.name : type.name || 'anonymous class';
}
