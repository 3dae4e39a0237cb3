/**
 * Unit descriptors: a symbol, optional parse aliases and a conversion rule
 * relative to the canonical unit of one quantity family.
 *
 * Units are only ever created through the {@link UnitFactory} a family hands
 * to its declaration callback, which validates the symbol and multiplier with
 * `Schema` before the unit exists. A bad declaration throws an
 * {@link InvalidUnitError}: it is a defect in the catalog, not user input.
 *
 * @since 0.1.0
 */

import { Either, ParseResult, Schema } from "effect"
import * as Conversion from "./Conversion.js"
import type { Dimension } from "./Dimension.js"
import { InvalidUnitError } from "./Errors.js"
import { Quantity } from "./Quantity.js"

/**
 * @category Schemas
 * @since 0.1.0
 */
export const UnitSymbol = Schema.NonEmptyTrimmedString

/**
 * Declarative part of a unit, validated before the unit is built.
 *
 * @category Schemas
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: UnitSymbol,
  aliases: Schema.Array(UnitSymbol),
  multiplier: Schema.optional(Conversion.Multiplier),
}) {}

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitOptions {
  /** Extra symbols accepted when parsing, e.g. `"tonnes"` next to `"t"`. */
  readonly aliases?: ReadonlyArray<string>
}

/**
 * A named conversion rule between a user-facing unit and the canonical unit
 * of its family.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const mass = Kilograms.of(2.5)
 * mass.to(Grams) // => 2500
 * ```
 */
export class UnitOfMeasure<D extends string> {
  readonly dimension: Dimension<D>
  readonly symbol: string
  readonly aliases: ReadonlyArray<string>
  readonly conversion: Conversion.Conversion
  readonly isValueUnit: boolean

  constructor(options: {
    readonly dimension: Dimension<D>
    readonly symbol: string
    readonly aliases: ReadonlyArray<string>
    readonly conversion: Conversion.Conversion
    readonly isValueUnit: boolean
  }) {
    this.dimension = options.dimension
    this.symbol = options.symbol
    this.aliases = options.aliases
    this.conversion = options.conversion
    this.isValueUnit = options.isValueUnit
  }

  /**
   * The primary symbol followed by every alias.
   */
  get symbols(): ReadonlyArray<string> {
    return [this.symbol, ...this.aliases]
  }

  toCanonical(raw: number): number {
    return Conversion.toCanonical(this.conversion, raw)
  }

  fromCanonical(canonical: number): number {
    return Conversion.fromCanonical(this.conversion, canonical)
  }

  /**
   * Build a quantity from a value expressed in this unit.
   */
  of(raw: number): Quantity<D> {
    return new Quantity(this.dimension, this.toCanonical(raw))
  }

  /**
   * Convert a raw value in this unit into another unit of the same family.
   */
  convertTo(raw: number, unit: UnitOfMeasure<D>): number {
    return Conversion.convert(raw, this.conversion, unit.conversion)
  }

  toString(): string {
    return this.symbol
  }
}

/**
 * Builds the units of one family. Handed to the callback of
 * `Dimension.make`, so every unit it returns is bound to that family.
 *
 * @category Constructors
 * @since 0.1.0
 */
export class UnitFactory<D extends string> {
  readonly #dimension: Dimension<D>

  constructor(dimension: Dimension<D>) {
    this.#dimension = dimension
  }

  /**
   * The canonical unit of the family: multiplier 1.
   */
  value(symbol: string, options: UnitOptions = {}): UnitOfMeasure<D> {
    const definition = this.#decode(symbol, options, 1)
    return this.#make(definition, Conversion.identity, true)
  }

  linear(symbol: string, multiplier: number, options: UnitOptions = {}): UnitOfMeasure<D> {
    const definition = this.#decode(symbol, options, multiplier)
    return this.#make(definition, Conversion.linear(multiplier), false)
  }

  nonLinear(symbol: string, converters: Conversion.Converters, options: UnitOptions = {}): UnitOfMeasure<D> {
    const definition = this.#decode(symbol, options, undefined)
    return this.#make(definition, Conversion.nonLinear(converters), false)
  }

  #decode(symbol: string, options: UnitOptions, multiplier: number | undefined): UnitDefinition {
    const input = multiplier === undefined
      ? { symbol, aliases: options.aliases ?? [] }
      : { symbol, aliases: options.aliases ?? [], multiplier }
    return Either.getOrThrowWith(
      Schema.decodeUnknownEither(UnitDefinition)(input),
      (error) =>
        new InvalidUnitError({
          dimension: this.#dimension.name,
          symbol,
          reason: ParseResult.TreeFormatter.formatErrorSync(error),
        }),
    )
  }

  #make(definition: UnitDefinition, conversion: Conversion.Conversion, isValueUnit: boolean): UnitOfMeasure<D> {
    return new UnitOfMeasure({
      dimension: this.#dimension,
      symbol: definition.symbol,
      aliases: definition.aliases,
      conversion,
      isValueUnit,
    })
  }
}
