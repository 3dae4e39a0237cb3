import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import {
  DimensionMismatchError,
  DimensionNotFoundError,
  DuplicateDimensionError,
  DuplicateValueUnitError,
  InvalidUnitError,
  QuantityParseError,
  UndeclaredRelationError,
  UnitNotFoundError,
} from "../src/Errors.js"

describe("quantity errors", () => {
  it("formats declaration error messages", () => {
    expect(new InvalidUnitError({ dimension: "Mass", symbol: "kg", reason: "bad multiplier" }).message).toBe(
      "Invalid unit \"kg\" for Mass: bad multiplier",
    )
    expect(new DuplicateValueUnitError({ dimension: "Mass", symbols: ["g", "kg"] }).message).toBe(
      "Mass declares more than one value unit: g, kg",
    )
    expect(new DuplicateDimensionError({ name: "Mass" }).message).toBe("Quantity family \"Mass\" is registered more than once")
  })

  it("formats run-time error messages", () => {
    expect(new QuantityParseError({ input: "5 xyz", dimension: "Mass", reason: "oops" }).message).toBe(
      "Unable to parse \"5 xyz\" as Mass: oops",
    )
    expect(new UnitNotFoundError({ dimension: "Mass", symbol: "st" }).message).toBe(
      "Unknown unit symbol \"st\" for Mass",
    )
    expect(new UndeclaredRelationError({ left: "Mass", operator: "*", right: "Time" }).message).toBe(
      "No relation is declared for Mass * Time",
    )
    expect(new DimensionMismatchError({ operation: "plus", left: "Mass", right: "Length" }).message).toBe(
      "Cannot apply plus to Mass and Length: the families differ",
    )
  })

  it("is an Error carrying its tag", () => {
    const error = new DimensionNotFoundError({ name: "Luminosity" })
    expect(error).toBeInstanceOf(Error)
    expect(error._tag).toBe("DimensionNotFoundError")
  })

  it.effect("supports catchTag on QuantityParseError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(new QuantityParseError({ input: "x", dimension: "Mass", reason: "r" })).pipe(
        Effect.catchTag("QuantityParseError", (error) => Effect.succeed(error.input)),
      )
      expect(handled).toBe("x")
    }),
  )
})
