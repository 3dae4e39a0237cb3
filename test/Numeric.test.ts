import { describe, expect, it } from "@effect/vitest"
import { Option } from "effect"
import * as Numeric from "../src/Numeric.js"
import { grams, Kilograms, kilograms } from "../src/quantities/Mass.js"

describe("Numeric", () => {
  const MassNumeric = Numeric.make(Kilograms)

  it("uses the reference unit for one, fromNumber and toNumber", () => {
    expect(MassNumeric.unit).toBe(Kilograms)
    expect(MassNumeric.zero().value).toBe(0)
    expect(MassNumeric.one().value).toBe(1000)
    expect(MassNumeric.fromNumber(2).value).toBe(2000)
    expect(MassNumeric.toNumber(grams(500))).toBe(0.5)
  })

  it("combines quantities built from different units", () => {
    expect(MassNumeric.add(kilograms(1), grams(500)).to(Kilograms)).toBe(1.5)
    expect(MassNumeric.subtract(kilograms(1), grams(500)).value).toBe(500)
    expect(MassNumeric.multiply(grams(3), 4).value).toBe(12)
    expect(MassNumeric.negate(grams(3)).value).toBe(-3)
    expect(MassNumeric.compare(grams(3), grams(4))).toBe(-1)
  })

  it("sums and averages", () => {
    expect(Numeric.sum(MassNumeric, [kilograms(1), grams(500)]).to(Kilograms)).toBe(1.5)
    expect(Numeric.sum(MassNumeric, []).value).toBe(0)
    expect(Option.map(Numeric.average(MassNumeric, [grams(1), grams(2), grams(3)]), (mean) => mean.value)).toEqual(
      Option.some(2),
    )
    expect(Numeric.average(MassNumeric, [])).toEqual(Option.none())
  })

  it("sorts and picks extremes", () => {
    const items = [kilograms(1), grams(5), grams(250)]
    expect(Numeric.sort(MassNumeric, items).map((quantity) => quantity.value)).toEqual([5, 250, 1000])
    expect(Option.map(Numeric.min(MassNumeric, items), (quantity) => quantity.value)).toEqual(Option.some(5))
    expect(Option.map(Numeric.max(MassNumeric, items), (quantity) => quantity.value)).toEqual(Option.some(1000))
    expect(Numeric.max(MassNumeric, [])).toEqual(Option.none())
  })
})
