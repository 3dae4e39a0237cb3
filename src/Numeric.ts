/**
 * Numeric adapter for quantities.
 *
 * Generic algorithms (sum, average, sort) only need a handful of operations
 * and a zero and a one. The adapter is built explicitly from a reference unit,
 * which fixes what `one()`, `fromNumber` and `toNumber` mean; every other
 * operation works on canonical values, so inputs built from different units
 * combine exactly.
 *
 * @since 0.1.0
 */

import { Array as Arr, Option, Order } from "effect"
import type { Quantity } from "./Quantity.js"
import { order as quantityOrder } from "./Quantity.js"
import type { UnitOfMeasure } from "./Units.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface QuantityNumeric<D extends string> {
  /** Reference unit backing `one`, `fromNumber` and `toNumber`. */
  readonly unit: UnitOfMeasure<D>
  readonly order: Order.Order<Quantity<D>>
  zero(): Quantity<D>
  /** One reference unit. */
  one(): Quantity<D>
  add(left: Quantity<D>, right: Quantity<D>): Quantity<D>
  subtract(left: Quantity<D>, right: Quantity<D>): Quantity<D>
  multiply(quantity: Quantity<D>, scalar: number): Quantity<D>
  negate(quantity: Quantity<D>): Quantity<D>
  compare(left: Quantity<D>, right: Quantity<D>): -1 | 0 | 1
  fromNumber(value: number): Quantity<D>
  toNumber(quantity: Quantity<D>): number
}

/**
 * Build the adapter for a family, with `unit` as its reference unit.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const MassNumeric = Numeric.make(Kilograms)
 * Numeric.sum(MassNumeric, [Kilograms.of(1), Grams.of(500)]).to(Kilograms) // => 1.5
 * ```
 */
export const make = <D extends string>(unit: UnitOfMeasure<D>): QuantityNumeric<D> => ({
  unit,
  order: quantityOrder,
  zero: () => unit.dimension.fromValue(0),
  one: () => unit.of(1),
  add: (left, right) => left.plus(right),
  subtract: (left, right) => left.minus(right),
  multiply: (quantity, scalar) => quantity.times(scalar),
  negate: (quantity) => quantity.negate(),
  compare: (left, right) => left.compare(right),
  fromNumber: (value) => unit.of(value),
  toNumber: (quantity) => quantity.to(unit),
})

/**
 * @category Folding
 * @since 0.1.0
 */
export const sum = <D extends string>(numeric: QuantityNumeric<D>, quantities: Iterable<Quantity<D>>): Quantity<D> =>
  Arr.reduce(quantities, numeric.zero(), numeric.add)

/**
 * Arithmetic mean; `None` for an empty input.
 *
 * @category Folding
 * @since 0.1.0
 */
export const average = <D extends string>(
  numeric: QuantityNumeric<D>,
  quantities: Iterable<Quantity<D>>,
): Option.Option<Quantity<D>> => {
  const items = Arr.fromIterable(quantities)
  return Arr.isNonEmptyReadonlyArray(items)
    ? Option.some(sum(numeric, items).divide(items.length))
    : Option.none()
}

/**
 * Ascending by canonical value.
 *
 * @category Sorting
 * @since 0.1.0
 */
export const sort = <D extends string>(
  numeric: QuantityNumeric<D>,
  quantities: Iterable<Quantity<D>>,
): Array<Quantity<D>> => Arr.sort(quantities, numeric.order)

/**
 * @category Folding
 * @since 0.1.0
 */
export const min = <D extends string>(
  numeric: QuantityNumeric<D>,
  quantities: Iterable<Quantity<D>>,
): Option.Option<Quantity<D>> => {
  const items = Arr.fromIterable(quantities)
  return Arr.isNonEmptyReadonlyArray(items) ? Option.some(Arr.min(items, numeric.order)) : Option.none()
}

/**
 * @category Folding
 * @since 0.1.0
 */
export const max = <D extends string>(
  numeric: QuantityNumeric<D>,
  quantities: Iterable<Quantity<D>>,
): Option.Option<Quantity<D>> => {
  const items = Arr.fromIterable(quantities)
  return Arr.isNonEmptyReadonlyArray(items) ? Option.some(Arr.max(items, numeric.order)) : Option.none()
}
