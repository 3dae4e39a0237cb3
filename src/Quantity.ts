/**
 * Immutable quantities.
 *
 * A quantity stores one number, its value in the canonical unit of its
 * family, next to the family itself. The family name is also the type
 * parameter, so `Quantity<"Mass">` and `Quantity<"Length">` never mix:
 * same-family arithmetic is a method here, and cross-family arithmetic only
 * exists where a relation is declared in an `Algebra`.
 *
 * @since 0.1.0
 */

import { Equal, Hash, Inspectable, Order, Predicate } from "effect"
import type { Equivalence } from "effect"
import type { Dimension } from "./Dimension.js"
import { DimensionMismatchError } from "./Errors.js"
import type { UnitOfMeasure } from "./Units.js"

/**
 * @category Symbols
 * @since 0.1.0
 */
export const QuantityTypeId: unique symbol = Symbol.for("effect-quantities/Quantity")

/**
 * @category Symbols
 * @since 0.1.0
 */
export type QuantityTypeId = typeof QuantityTypeId

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (u: unknown): u is Quantity<string> => Predicate.hasProperty(u, QuantityTypeId)

/**
 * A value of one quantity family, held in that family's canonical unit.
 *
 * Built by `unit.of(raw)`, `dimension.fromValue(canonical)`, `dimension.parse`
 * or a declared relation; never mutated afterwards.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const total = Kilograms.of(1).plus(Grams.of(500))
 * total.to(Kilograms) // => 1.5
 * total.format()      // => "1.5 kg"
 * ```
 */
export class Quantity<D extends string> implements Equal.Equal, Inspectable.Inspectable {
  readonly [QuantityTypeId]: QuantityTypeId = QuantityTypeId

  constructor(
    readonly dimension: Dimension<D>,
    readonly value: number,
  ) {}

  /**
   * The value of this quantity expressed in `unit`.
   */
  to(unit: UnitOfMeasure<D>): number {
    return unit.fromCanonical(this.value)
  }

  plus(that: Quantity<D>): Quantity<D> {
    return this.#with(this.value + this.#operand("plus", that))
  }

  minus(that: Quantity<D>): Quantity<D> {
    return this.#with(this.value - this.#operand("minus", that))
  }

  /**
   * Scale by a dimensionless factor.
   */
  times(scalar: number): Quantity<D> {
    return this.#with(this.value * scalar)
  }

  divide(scalar: number): Quantity<D> {
    return this.#with(this.value / scalar)
  }

  /**
   * Dimensionless ratio of two quantities of the same family.
   */
  ratio(that: Quantity<D>): number {
    return this.value / this.#operand("ratio", that)
  }

  negate(): Quantity<D> {
    return this.#with(-this.value)
  }

  abs(): Quantity<D> {
    return this.#with(Math.abs(this.value))
  }

  compare(that: Quantity<D>): -1 | 0 | 1 {
    return Order.number(this.value, this.#operand("compare", that))
  }

  equals(that: Quantity<D>): boolean {
    return this.dimension.name === that.dimension.name && this.value === that.value
  }

  lessThan(that: Quantity<D>): boolean {
    return this.value < this.#operand("lessThan", that)
  }

  lessThanOrEqual(that: Quantity<D>): boolean {
    return this.value <= this.#operand("lessThanOrEqual", that)
  }

  greaterThan(that: Quantity<D>): boolean {
    return this.value > this.#operand("greaterThan", that)
  }

  greaterThanOrEqual(that: Quantity<D>): boolean {
    return this.value >= this.#operand("greaterThanOrEqual", that)
  }

  min(that: Quantity<D>): Quantity<D> {
    return this.#operand("min", that) < this.value ? that : this
  }

  max(that: Quantity<D>): Quantity<D> {
    return this.#operand("max", that) > this.value ? that : this
  }

  /**
   * Render as `"<value> <symbol>"`. Without a unit, the family's display
   * table picks one.
   */
  format(unit?: UnitOfMeasure<D>): string {
    return this.dimension.format(this, unit)
  }

  toString(unit?: UnitOfMeasure<D>): string {
    return this.format(unit)
  }

  toJSON(): unknown {
    return {
      _id: "Quantity",
      dimension: this.dimension.name,
      value: this.value,
    }
  }

  [Inspectable.NodeInspectSymbol](): unknown {
    return this.toJSON()
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isQuantity(that) && that.dimension.name === this.dimension.name && that.value === this.value
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.number(this.value))(Hash.string(this.dimension.name))
  }

  /**
   * Canonical value of `that`, after checking it belongs to this family.
   */
  #operand(operation: string, that: Quantity<D>): number {
    if (that.dimension.name !== this.dimension.name) {
      throw new DimensionMismatchError({ operation, left: this.dimension.name, right: that.dimension.name })
    }
    return that.value
  }

  #with(value: number): Quantity<D> {
    return new Quantity(this.dimension, value)
  }
}

/**
 * Orders quantities of one family by canonical value. Comparing two
 * families throws a `DimensionMismatchError`.
 *
 * @category Instances
 * @since 0.1.0
 */
export const order: Order.Order<Quantity<string>> = Order.make((self, that) => self.compare(that))

/**
 * @category Instances
 * @since 0.1.0
 */
export const equivalence: Equivalence.Equivalence<Quantity<string>> = (self, that) =>
  self.dimension.name === that.dimension.name && self.value === that.value
