/**
 * Quantity families.
 *
 * A family is declared once with `Dimension.make`. The callback receives a
 * unit factory bound to the family and returns the family's units plus its
 * optional display table. Declaration checks run immediately: exactly one
 * value unit, and no symbol or alias used twice. Failing any of them throws,
 * because a family that breaks them is a bug in the catalog.
 *
 * @since 0.1.0
 */

import { Either, Option } from "effect"
import { DuplicateSymbolError, DuplicateValueUnitError, MissingValueUnitError, QuantityParseError } from "./Errors.js"
import { makeQuantityLexer, type QuantityLexer } from "./internal/lexer.js"
import { isQuantity, Quantity } from "./Quantity.js"
import { UnitFactory, type UnitOfMeasure } from "./Units.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type UnitRecord<D extends string> = { readonly [name: string]: UnitOfMeasure<D> }

/**
 * Ordered "best unit" table used by the unitless `format`. Thresholds are
 * evaluated top down; the first unit in which the quantity is at least
 * `minimum` wins, otherwise `fallback` is used.
 *
 * @category Models
 * @since 0.1.0
 */
export interface DisplayTable<D extends string> {
  readonly thresholds: ReadonlyArray<readonly [minimum: number, unit: UnitOfMeasure<D>]>
  readonly fallback: UnitOfMeasure<D>
}

/**
 * What a family declaration callback returns.
 *
 * @category Models
 * @since 0.1.0
 */
export interface DimensionDefinition<D extends string, U extends UnitRecord<D>> {
  readonly units: U
  readonly display?: DisplayTable<D>
  /** The SI base unit, where it differs from the value unit. */
  readonly siUnit?: UnitOfMeasure<D>
  /** Dimension symbol of an SI base quantity, e.g. `"M"` for mass. */
  readonly dimensionSymbol?: string
}

/**
 * A quantity family: one canonical unit, a set of interchangeable units and
 * the parse and format rules that use their symbols.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * export const Mass = Dimension.make("Mass", (unit) => {
 *   const Grams = unit.value("g")
 *   const Kilograms = unit.linear("kg", MetricSystem.Kilo)
 *   return {
 *     units: { Grams, Kilograms },
 *     display: { thresholds: [[1, Kilograms]], fallback: Grams },
 *   }
 * })
 * ```
 */
export class Dimension<D extends string, U extends UnitRecord<D> = UnitRecord<D>> {
  static make<D extends string, U extends UnitRecord<D>>(
    name: D,
    build: (unit: UnitFactory<D>) => DimensionDefinition<D, U>,
  ): Dimension<D, U> {
    return new Dimension(name, build)
  }

  readonly name: D
  readonly units: U
  readonly valueUnit: UnitOfMeasure<D>
  readonly allUnits: ReadonlyArray<UnitOfMeasure<D>>
  readonly siUnit: Option.Option<UnitOfMeasure<D>>
  readonly dimensionSymbol: Option.Option<string>
  readonly display: DisplayTable<D>
  readonly #bySymbol: ReadonlyMap<string, UnitOfMeasure<D>>
  readonly #lexer: QuantityLexer<UnitOfMeasure<D>>

  private constructor(name: D, build: (unit: UnitFactory<D>) => DimensionDefinition<D, U>) {
    this.name = name
    const definition = build(new UnitFactory<D>(this))
    const units: UnitRecord<D> = definition.units

    this.units = definition.units
    this.allUnits = Object.values(units)
    this.valueUnit = findValueUnit(name, this.allUnits)
    this.siUnit = Option.fromNullable(definition.siUnit)
    this.dimensionSymbol = Option.fromNullable(definition.dimensionSymbol)
    this.display = definition.display ?? { thresholds: [], fallback: this.valueUnit }
    this.#bySymbol = indexSymbols(name, this.allUnits)
    this.#lexer = makeQuantityLexer(name, [...this.#bySymbol])
  }

  /**
   * Every symbol and alias of the family.
   */
  get symbols(): ReadonlyArray<string> {
    return [...this.#bySymbol.keys()]
  }

  /**
   * Find a unit by symbol or alias. Matching is exact and case sensitive.
   */
  unit(symbol: string): Option.Option<UnitOfMeasure<D>> {
    return Option.fromNullable(this.#bySymbol.get(symbol))
  }

  /**
   * Build a quantity straight from a canonical value.
   */
  fromValue(canonical: number): Quantity<D> {
    return new Quantity(this, canonical)
  }

  is(u: unknown): u is Quantity<D> {
    return isQuantity(u) && u.dimension.name === this.name
  }

  /**
   * Read `"<number> <symbol>"`. Never throws; failures carry the input and
   * the family name.
   */
  parse(text: string): Either.Either<Quantity<D>, QuantityParseError> {
    return this.#lexer(text).pipe(
      Either.map(([value, unit]) => unit.of(value)),
      Either.mapLeft((reason) => new QuantityParseError({ input: text, dimension: this.name, reason })),
    )
  }

  bestUnit(quantity: Quantity<D>): UnitOfMeasure<D> {
    for (const [minimum, unit] of this.display.thresholds) {
      if (quantity.to(unit) >= minimum) {
        return unit
      }
    }
    return this.display.fallback
  }

  format(quantity: Quantity<D>, unit: UnitOfMeasure<D> = this.bestUnit(quantity)): string {
    return `${quantity.to(unit)} ${unit.symbol}`
  }

  toString(): string {
    return this.name
  }
}

const findValueUnit = <D extends string>(name: D, units: ReadonlyArray<UnitOfMeasure<D>>): UnitOfMeasure<D> => {
  const valueUnits = units.filter((unit) => unit.isValueUnit)
  const [valueUnit] = valueUnits
  if (valueUnit === undefined) {
    throw new MissingValueUnitError({ dimension: name })
  }
  if (valueUnits.length > 1) {
    throw new DuplicateValueUnitError({ dimension: name, symbols: valueUnits.map((unit) => unit.symbol) })
  }
  return valueUnit
}

const indexSymbols = <D extends string>(
  name: D,
  units: ReadonlyArray<UnitOfMeasure<D>>,
): ReadonlyMap<string, UnitOfMeasure<D>> => {
  const index = new Map<string, UnitOfMeasure<D>>()
  for (const unit of units) {
    for (const symbol of unit.symbols) {
      if (index.has(symbol)) {
        throw new DuplicateSymbolError({ dimension: name, symbol })
      }
      index.set(symbol, unit)
    }
  }
  return index
}
