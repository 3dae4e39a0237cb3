/**
 * `Schema` codecs for quantities.
 *
 * They only call `unit.of(value)` and `quantity.to(unit)` (or `parse` and
 * `format`), so any serializer built on `Schema` can carry quantities in and
 * out of JSON. Encoding through the value unit is exact for every finite
 * number, because the value unit has multiplier 1.
 *
 * @since 0.1.0
 */

import { Either, Option, ParseResult, Schema } from "effect"
import type { Dimension } from "./Dimension.js"
import { UnitNotFoundError } from "./Errors.js"
import type { Quantity } from "./Quantity.js"
import type { UnitOfMeasure } from "./Units.js"

/**
 * Accepts an already-built quantity of `dimension`.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const QuantityFromSelf = <D extends string>(dimension: Dimension<D>) =>
  Schema.declare((u: unknown): u is Quantity<D> => dimension.is(u), {
    identifier: `${dimension.name}FromSelf`,
    description: `a quantity of ${dimension.name}`,
  })

/**
 * A bare number, read and written in `unit`.
 *
 * @category Schemas
 * @since 0.1.0
 * @example
 * ```ts
 * const Kg = QuantitySchema.fromNumber(Kilograms)
 * Schema.decodeSync(Kg)(2).to(Grams)       // => 2000
 * Schema.encodeSync(Kg)(Grams.of(500))     // => 0.5
 * ```
 */
export const fromNumber = <D extends string>(unit: UnitOfMeasure<D>) =>
  Schema.transform(Schema.Number, QuantityFromSelf(unit.dimension), {
    strict: true,
    decode: (value) => unit.of(value),
    encode: (quantity) => quantity.to(unit),
  })

/**
 * The `"<number> <symbol>"` text form. Encodes in the value unit.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const fromString = <D extends string>(dimension: Dimension<D>) =>
  Schema.transformOrFail(Schema.String, QuantityFromSelf(dimension), {
    strict: true,
    decode: (text, _, ast) =>
      dimension.parse(text).pipe(Either.mapLeft((error) => new ParseResult.Type(ast, text, error.message))),
    encode: (quantity) => ParseResult.succeed(quantity.format(dimension.valueUnit)),
  })

/**
 * Encoded shape of {@link fromValueAndUnit}.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const ValueAndUnit = Schema.Struct({
  value: Schema.Number,
  unit: Schema.String,
})

/**
 * `{ value, unit }` with any symbol of the family on the way in and the value
 * unit on the way out.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const fromValueAndUnit = <D extends string>(dimension: Dimension<D>) =>
  Schema.transformOrFail(ValueAndUnit, QuantityFromSelf(dimension), {
    strict: true,
    decode: (encoded, _, ast) =>
      Option.match(dimension.unit(encoded.unit), {
        onNone: () =>
          ParseResult.fail(
            new ParseResult.Type(
              ast,
              encoded,
              new UnitNotFoundError({ dimension: dimension.name, symbol: encoded.unit }).message,
            ),
          ),
        onSome: (unit) => ParseResult.succeed(unit.of(encoded.value)),
      }),
    encode: (quantity) => ParseResult.succeed({ value: quantity.value, unit: dimension.valueUnit.symbol }),
  })
