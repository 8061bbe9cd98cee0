/**
 * @fileoverview Handle - Typed witness of a slot in a heterogeneous store
 *
 * @packageDocumentation
 * @module conduit/domain/store
 *
 * A handle carries three pieces of compile-time information:
 *
 * - `T`: the exact type of the stored value
 * - `I`: the slot index, as a numeric literal type
 * - `B`: the brand of the store lineage that produced it (a `unique symbol`)
 *
 * ```typescript
 * const Middleware = Symbol('middleware');
 *
 * const { store, handle } = createStore(Middleware).add(new Timer());
 * //                ^? Handle<Timer, 0, typeof Middleware>
 * ```
 *
 * At run time a handle is a small frozen record (`index`, `brand`,
 * `lineage`). The slot type `T` exists only in the type system. Stores are
 * read-only through handles, so a `Handle<Dog>` may be used where a
 * `Handle<Animal>` is expected.
 */

declare const slotType: unique symbol;

/**
 * Identity of one store lineage: a store and every store derived from it
 * through `add`.
 *
 * @internal
 */
export class StoreLineage {
  constructor(public readonly name: string) {}
}

/**
 * Opaque reference to a slot of type `T` at index `I` in a store of brand `B`.
 */
export interface Handle<
  T,
  I extends number = number,
  B extends symbol = symbol,
> {
  /** Slot index */
  readonly index: I;

  /** Brand of the producing store */
  readonly brand: B;

  /** @internal */
  readonly lineage: StoreLineage;

  /** Phantom slot type, never present at run time */
  readonly [slotType]?: T;
}

/**
 * Union of the valid slot indices of a tuple of stored types.
 *
 * @example
 * ```typescript
 * type I = IndexOf<[string, number, Date]>; // 0 | 1 | 2
 * type None = IndexOf<[]>;                  // never
 * ```
 */
export type IndexOf<Items extends readonly unknown[]> = Extract<
  Exclude<Partial<Items>['length'], Items['length']>,
  number
>;

/**
 * The value type a handle points at.
 */
export type HandleValue<H> = H extends Handle<infer T, number, symbol>
  ? T
  : never;

/**
 * Create a handle.
 *
 * @internal
 */
export function createHandle<T, I extends number, B extends symbol>(
  index: I,
  brand: B,
  lineage: StoreLineage,
): Handle<T, I, B> {
  return Object.freeze({ index, brand, lineage });
}
