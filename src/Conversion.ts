/**
 * Conversion rules between a unit and the canonical unit of its family.
 *
 * A linear rule is a single multiplier `m` with `canonical = raw * m`. A
 * non-linear rule carries an explicit converter pair, for scales with an
 * offset such as degrees Celsius. Both directions are plain double-precision
 * arithmetic; nothing is rounded.
 *
 * @since 0.1.0
 */

import { Data, Schema } from "effect"

/**
 * @category Models
 * @since 0.1.0
 */
export type Conversion = Data.TaggedEnum<{
  Linear: { readonly multiplier: number }
  NonLinear: {
    readonly toCanonical: (raw: number) => number
    readonly fromCanonical: (canonical: number) => number
  }
}>

/**
 * Constructors and guards for {@link Conversion}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const Conversion = Data.taggedEnum<Conversion>()

/**
 * Multipliers must be finite and strictly positive.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const Multiplier = Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0))

/**
 * Converter pair of a non-linear scale.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Converters {
  readonly toCanonical: (raw: number) => number
  readonly fromCanonical: (canonical: number) => number
}

/**
 * The rule of every value unit.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const identity: Conversion = Conversion.Linear({ multiplier: 1 })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const linear = (multiplier: number): Conversion => Conversion.Linear({ multiplier })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const nonLinear = (converters: Converters): Conversion =>
  Conversion.NonLinear({
    toCanonical: converters.toCanonical,
    fromCanonical: converters.fromCanonical,
  })

/**
 * @category Conversions
 * @since 0.1.0
 */
export const toCanonical = (conversion: Conversion, raw: number): number => {
  switch (conversion._tag) {
    case "Linear":
      return raw * conversion.multiplier
    case "NonLinear":
      return conversion.toCanonical(raw)
  }
}

/**
 * @category Conversions
 * @since 0.1.0
 */
export const fromCanonical = (conversion: Conversion, canonical: number): number => {
  switch (conversion._tag) {
    case "Linear":
      return canonical / conversion.multiplier
    case "NonLinear":
      return conversion.fromCanonical(canonical)
  }
}

/**
 * Convert a raw value between two rules of the same family by passing
 * through the canonical unit.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convert = (value: number, from: Conversion, to: Conversion): number =>
  fromCanonical(to, toCanonical(from, value))
