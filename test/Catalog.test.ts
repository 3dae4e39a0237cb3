import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { QuantityCatalog } from "../src/Catalog.js"
import { Dimension } from "../src/Dimension.js"
import {
  DimensionMismatchError,
  DimensionNotFoundError,
  DuplicateDimensionError,
  DuplicateRelationError,
  QuantityParseError,
  UndeclaredRelationError,
  UnitNotFoundError,
} from "../src/Errors.js"
import { kilograms, Mass } from "../src/quantities/Mass.js"
import { metersPerSecond } from "../src/quantities/Motion.js"
import { VelocityOfLength } from "../src/quantities/Relations.js"
import { Length } from "../src/quantities/Space.js"
import { seconds } from "../src/quantities/Time.js"
import { kelvin } from "../src/quantities/Thermal.js"

describe("QuantityCatalog", () => {
  it.effect("resolves the built-in families by name", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      const mass = yield* catalog.find("Mass")
      expect(mass).toBe(Mass)
      expect(catalog.dimensions).toHaveLength(21)
      expect(catalog.relations).toHaveLength(58)
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("fails for unknown families", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      const error = yield* catalog.find("Luminosity").pipe(Effect.flip)
      expect(error).toBeInstanceOf(DimensionNotFoundError)
      expect(error.message).toBe("Unknown quantity family \"Luminosity\"")
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("parses text for a family named at run time", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      const distance = yield* catalog.parse("Length", "2 km")
      expect(distance.value).toBe(2000)

      const error = yield* catalog.parse("Length", "2 parsecs").pipe(Effect.flip)
      expect(error).toBeInstanceOf(QuantityParseError)
      expect(error.message).toBe("Unable to parse \"2 parsecs\" as Length: unrecognized input at offset 2")
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("converts between unit symbols", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      expect(yield* catalog.convert("Mass", 2, "kg", "g")).toBe(2000)
      expect(yield* catalog.convert("Time", 90, "min", "h")).toBe(1.5)

      const error = yield* catalog.convert("Mass", 1, "kg", "stone").pipe(Effect.flip)
      expect(error).toEqual(new UnitNotFoundError({ dimension: "Mass", symbol: "stone" }))
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("applies declared relations and reports undeclared ones", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      const momentum = yield* catalog.multiply(kilograms(2), metersPerSecond(3))
      expect(momentum.dimension.name).toBe("Momentum")
      expect(momentum.value).toBe(6)

      const error = yield* catalog.divide(kilograms(1), kelvin(1)).pipe(Effect.flip)
      expect(error).toBeInstanceOf(UndeclaredRelationError)
      expect(error.message).toBe("No relation is declared for Mass / Temperature")
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("refuses same-family operations on quantities of different families", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      const mass = yield* catalog.parse("Mass", "2 kg")
      const length = yield* catalog.parse("Length", "3 m")

      expect(() => mass.plus(length)).toThrow(DimensionMismatchError)
      expect(() => mass.plus(length)).toThrow("Cannot apply plus to Mass and Length: the families differ")
      expect(() => mass.compare(length)).toThrow("Cannot apply compare to Mass and Length: the families differ")
      expect(mass.equals(length)).toBe(false)
      expect(mass.plus(yield* catalog.parse("Mass", "500 g")).value).toBe(2500)
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("does not divide a family that only shares a declared name", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      const OtherLength = Dimension.make("Length", (unit) => ({ units: { Meters: unit.value("m") } }))
      const error = yield* Effect.flip(catalog.divide(OtherLength.fromValue(10), seconds(2)))
      expect(error).toEqual(new UndeclaredRelationError({ left: "Length", operator: "/", right: "Time" }))
    }).pipe(Effect.provide(QuantityCatalog.layer())),
  )

  it.effect("can be built from a custom configuration", () =>
    Effect.gen(function* () {
      const catalog = yield* QuantityCatalog
      expect(catalog.dimensions.map((dimension) => dimension.name)).toEqual(["Length"])
      const error = yield* catalog.find("Mass").pipe(Effect.flip)
      expect(error.name).toBe("Mass")
    }).pipe(Effect.provide(QuantityCatalog.layer({ dimensions: [Length], relations: [] }))),
  )

  it.effect("rejects a family listed twice", () =>
    Effect.gen(function* () {
      const error = yield* QuantityCatalog.pipe(
        Effect.provide(QuantityCatalog.layer({ dimensions: [Mass, Mass], relations: [] })),
        Effect.flip,
      )
      expect(error).toEqual(new DuplicateDimensionError({ name: "Mass" }))
    }),
  )

  it.effect("rejects a relation listed twice", () =>
    Effect.gen(function* () {
      const relations = [...VelocityOfLength.relations, ...VelocityOfLength.relations]
      const error = yield* QuantityCatalog.pipe(
        Effect.provide(QuantityCatalog.layer({ dimensions: [Length], relations })),
        Effect.flip,
      )
      expect(error).toBeInstanceOf(DuplicateRelationError)
      expect(error.message).toBe("Relation \"Velocity * Time\" is declared more than once")
    }),
  )
})
