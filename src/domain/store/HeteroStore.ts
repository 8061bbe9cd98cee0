/**
 * @fileoverview HeteroStore - Add-only, type-indexed collection
 *
 * @packageDocumentation
 * @module conduit/domain/store
 *
 * ## Two-Phase Lifecycle
 *
 * 1. **Build**: a {@link StoreBuilder} is threaded through `add` calls. Each
 *    call consumes the builder it was made on and returns a new builder
 *    whose type records one more slot, plus a {@link Handle} for the slot.
 * 2. **Frozen**: `freeze()` consumes the last builder and returns a
 *    {@link FrozenStore}, whose only operation is `borrow`.
 *
 * ```
 * createStore(B)      add(a)            add(b)             freeze()
 *   Builder<B,[]>  →  Builder<B,[A]>  →  Builder<B,[A,C]>  →  FrozenStore<B,[A,C]>
 *                     + Handle<A,0,B>    + Handle<C,1,B>
 * ```
 *
 * A handle is accepted by the store that produced it and by every store
 * derived from it. Handles from a store with another brand do not
 * type-check. Reusing a consumed builder throws {@link BuilderConsumedError}.
 *
 * TypeScript erases types at run time, so each `borrow` also verifies the
 * handle's lineage and index in constant time; a failure there can only be
 * reached by bypassing the type checker.
 *
 * @example
 * ```typescript
 * const Services = Symbol('services');
 *
 * const first = createStore(Services).add(new Clock());
 * const second = first.store.add(new Mailer());
 * const frozen = second.store.freeze();
 *
 * frozen.borrow(first.handle);  // Clock
 * frozen.borrow(second.handle); // Mailer
 * ```
 */

import {
  BuilderConsumedError,
  ForeignHandleError,
} from '../exceptions/errors';
import { Handle, IndexOf, StoreLineage, createHandle } from './Handle';

/**
 * Result of {@link StoreBuilder.add}
 */
export interface StoreAddition<
  B extends symbol,
  Items extends readonly unknown[],
  T,
  I extends number,
> {
  /** The builder to continue with */
  store: StoreBuilder<B, Items>;

  /** Handle of the slot just added */
  handle: Handle<T, I, B>;
}

/**
 * Read side shared by builders and frozen stores
 */
export interface ReadableStore<B extends symbol, Items extends readonly unknown[]> {
  readonly brand: B;
  readonly name: string;
  readonly size: number;
  borrow<I extends IndexOf<Items>>(handle: Handle<Items[I], I, B>): Items[I];
}

function checkHandle<T, I extends number, B extends symbol>(
  lineage: StoreLineage,
  brand: B,
  slotCount: number,
  handle: Handle<T, I, B>,
): void {
  if (
    handle.lineage !== lineage ||
    handle.brand !== brand ||
    handle.index < 0 ||
    handle.index >= slotCount
  ) {
    throw new ForeignHandleError(lineage.name, handle.index);
  }
}

/**
 * Mutable build phase of a heterogeneous store.
 *
 * @template B - Store brand (`unique symbol`)
 * @template Items - Tuple of the stored value types, in insertion order
 */
export class StoreBuilder<
  B extends symbol,
  Items extends readonly unknown[] = [],
> implements ReadableStore<B, Items>
{
  private consumed = false;

  private constructor(
    public readonly brand: B,
    private readonly lineage: StoreLineage,
    private readonly slots: unknown[],
  ) {}

  /**
   * Start a new store lineage.
   *
   * @param brand - A `unique symbol` naming the lineage at the type level
   * @param name - Label used in error messages (defaults to the symbol description)
   */
  static create<B extends symbol>(brand: B, name?: string): StoreBuilder<B, []> {
    const label = name ?? brand.description ?? 'store';
    return new StoreBuilder<B, []>(brand, new StoreLineage(label), []);
  }

  get name(): string {
    return this.lineage.name;
  }

  get size(): number {
    this.assertLive();
    return this.slots.length;
  }

  /**
   * Append a value. Consumes this builder.
   */
  add<T>(value: T): StoreAddition<B, [...Items, T], T, Items['length']> {
    this.assertLive();
    this.consumed = true;

    const index = this.slots.length as Items['length'];
    this.slots.push(value);

    return {
      store: new StoreBuilder<B, [...Items, T]>(
        this.brand,
        this.lineage,
        this.slots,
      ),
      handle: createHandle<T, Items['length'], B>(index, this.brand, this.lineage),
    };
  }

  borrow<I extends IndexOf<Items>>(handle: Handle<Items[I], I, B>): Items[I] {
    this.assertLive();
    return readSlot<Items, I, B>(this.lineage, this.brand, this.slots, handle);
  }

  /**
   * End the build phase. Consumes this builder.
   */
  freeze(): FrozenStore<B, Items> {
    this.assertLive();
    this.consumed = true;
    return new FrozenStore<B, Items>(
      this.brand,
      this.lineage,
      Object.freeze([...this.slots]),
    );
  }

  /**
   * Whether this builder has been consumed by `add` or `freeze`
   */
  isConsumed(): boolean {
    return this.consumed;
  }

  private assertLive(): void {
    if (this.consumed) {
      throw new BuilderConsumedError(`StoreBuilder "${this.lineage.name}"`);
    }
  }
}

/**
 * Read-only snapshot of a heterogeneous store. Safe to share between any
 * number of concurrent requests.
 */
export class FrozenStore<B extends symbol, Items extends readonly unknown[]>
  implements ReadableStore<B, Items>
{
  /** @internal */
  constructor(
    public readonly brand: B,
    private readonly lineage: StoreLineage,
    private readonly slots: ReadonlyArray<unknown>,
  ) {}

  get name(): string {
    return this.lineage.name;
  }

  get size(): number {
    return this.slots.length;
  }

  borrow<I extends IndexOf<Items>>(handle: Handle<Items[I], I, B>): Items[I] {
    return readSlot<Items, I, B>(this.lineage, this.brand, this.slots, handle);
  }

  /**
   * Read through a handle whose index is only known as `number`, such as
   * one taken from a list of handles. The lineage and bounds are checked
   * at run time.
   *
   * @throws ForeignHandleError
   */
  lookup(handle: Handle<unknown, number, B>): Items[number] {
    checkHandle(this.lineage, this.brand, this.slots.length, handle);
    return this.slots[handle.index] as Items[number];
  }

  /**
   * All slots, in insertion order
   */
  values(): ReadonlyArray<Items[number]> {
    return this.slots as ReadonlyArray<Items[number]>;
  }
}

/**
 * Slots hold type-erased values; `Items` records what each one is.
 */
function readSlot<
  Items extends readonly unknown[],
  I extends IndexOf<Items>,
  B extends symbol,
>(
  lineage: StoreLineage,
  brand: B,
  slots: ReadonlyArray<unknown>,
  handle: Handle<Items[I], I, B>,
): Items[I] {
  checkHandle(lineage, brand, slots.length, handle);
  return slots[handle.index] as Items[I];
}

/**
 * Start a new heterogeneous store.
 *
 * @example
 * ```typescript
 * const Pipelines = Symbol('pipelines');
 * const builder = createStore(Pipelines);
 * ```
 */
export function createStore<B extends symbol>(
  brand: B,
  name?: string,
): StoreBuilder<B, []> {
  return StoreBuilder.create(brand, name);
}
