import { describe, expect, it } from "@effect/vitest"
import { Arbitrary, Either, Equal, Schema } from "effect"
import * as FastCheck from "effect/FastCheck"
import * as QuantitySchema from "../src/QuantitySchema.js"
import { Hours, Seconds, seconds, StandardAlgebra, StandardDimensions, Time } from "../src/quantities/index.js"
import { Grams, Kilograms, Mass, Pounds } from "../src/quantities/Mass.js"
import { Meters, meters } from "../src/quantities/Space.js"
import { MetersPerSecond } from "../src/quantities/Motion.js"

const FiniteValue = Schema.Number.pipe(Schema.finite())
const finiteValue = Arbitrary.make(FiniteValue)
const moderateValue = Arbitrary.make(
  Schema.Number.pipe(Schema.finite(), Schema.greaterThanOrEqualTo(-1e9), Schema.lessThanOrEqualTo(1e9)),
)
const positiveValue = Arbitrary.make(
  Schema.Number.pipe(Schema.finite(), Schema.greaterThanOrEqualTo(1e-3), Schema.lessThanOrEqualTo(1e6)),
)

const closeTo = (actual: number, expected: number): boolean =>
  Math.abs(actual - expected) <= 1e-9 * (1 + Math.max(Math.abs(actual), Math.abs(expected)))

const everyUnit = StandardDimensions.flatMap((dimension) => dimension.allUnits)
const everyUnitPair = StandardDimensions.flatMap((dimension) =>
  dimension.allUnits.flatMap((from) => dimension.allUnits.map((to) => [from, to] as const))
)

describe("quantity properties", () => {
  it("parses what the value unit formats", () => {
    FastCheck.assert(
      FastCheck.property(finiteValue, (value) => {
        const quantity = Grams.of(value)
        const parsed = Mass.parse(quantity.format(Grams))
        return Either.isRight(parsed) && Equal.equals(parsed.right, quantity)
      }),
    )
  })

  it("round trips every schema codec through the value unit", () => {
    const codec = QuantitySchema.fromValueAndUnit(Time)
    FastCheck.assert(
      FastCheck.property(finiteValue, (value) => {
        const quantity = Time.fromValue(value)
        const decoded = Schema.decodeSync(codec)(Schema.encodeSync(codec)(quantity))
        return decoded.value === quantity.value
      }),
    )
  })

  it("converts to another unit and back within rounding", () => {
    FastCheck.assert(
      FastCheck.property(moderateValue, (value) => {
        const inPounds = Kilograms.of(value).to(Pounds)
        return closeTo(Pounds.of(inPounds).to(Kilograms), value)
      }),
    )
  })

  it("reads a value back from the unit it was built in", () => {
    for (const unit of everyUnit) {
      FastCheck.assert(
        FastCheck.property(moderateValue, (value) => closeTo(unit.of(value).to(unit), value)),
        { numRuns: 25 },
      )
    }
  })

  it("converts between any two units of a family and back", () => {
    for (const [from, to] of everyUnitPair) {
      FastCheck.assert(
        FastCheck.property(moderateValue, (value) => {
          const original = from.of(value)
          return closeTo(to.of(original.to(to)).value, original.value)
        }),
        { numRuns: 10 },
      )
    }
  })

  it("parses what any unit formats", () => {
    for (const unit of everyUnit) {
      FastCheck.assert(
        FastCheck.property(moderateValue, (value) => {
          const quantity = unit.of(value)
          const parsed = quantity.dimension.parse(quantity.format(unit))
          return Either.isRight(parsed) && closeTo(parsed.right.value, quantity.value)
        }),
        { numRuns: 25 },
      )
    }
  })

  it("adds commutatively and compares antisymmetrically", () => {
    FastCheck.assert(
      FastCheck.property(moderateValue, moderateValue, (left, right) => {
        const a = meters(left)
        const b = meters(right)
        return a.plus(b).equals(b.plus(a)) && a.compare(b) === -b.compare(a)
      }),
    )
  })

  it("undoes a time derivative with its integral", () => {
    FastCheck.assert(
      FastCheck.property(moderateValue, positiveValue, (distance, duration) => {
        const velocity = StandardAlgebra.div(meters(distance), seconds(duration))
        const back = StandardAlgebra.times(velocity, seconds(duration))
        return closeTo(back.to(Meters), distance) && velocity.to(MetersPerSecond) === distance / duration
      }),
    )
  })

  it("reads the same duration from any unit", () => {
    FastCheck.assert(
      FastCheck.property(positiveValue, (value) => closeTo(Hours.of(value).to(Seconds), value * 3600)),
    )
    expect(Hours.of(1).to(Seconds)).toBe(3600)
  })
})
