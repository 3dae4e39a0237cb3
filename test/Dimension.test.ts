import { describe, expect, it } from "@effect/vitest"
import { Either, Option } from "effect"
import { QuantityParseError } from "../src/Errors.js"
import { KilowattHours, wattHours } from "../src/quantities/Energy.js"
import {
  Grams,
  kilograms,
  Kilograms,
  Mass,
  Milligrams,
  MolesPerLitre,
  SubstanceConcentration,
  Tonnes,
} from "../src/quantities/Mass.js"
import { Length, meters, Micrometers, Nanometers } from "../src/quantities/Space.js"
import { Kelvin, Temperature } from "../src/quantities/Thermal.js"
import { Hours, Seconds, seconds, Time } from "../src/quantities/Time.js"

const parseReason = (text: string): string =>
  Either.match(Mass.parse(text), {
    onLeft: (error) => error.reason,
    onRight: (quantity) => `parsed ${quantity.value}`,
  })

describe("Dimension", () => {
  it("exposes its value unit and SI unit", () => {
    expect(Mass.name).toBe("Mass")
    expect(Mass.valueUnit).toBe(Grams)
    expect(Mass.siUnit).toEqual(Option.some(Kilograms))
    expect(Length.siUnit).toEqual(Option.none())
    expect(Mass.dimensionSymbol).toEqual(Option.some("M"))
    expect(String(Mass)).toBe("Mass")
  })

  it("finds units by symbol or alias", () => {
    expect(Mass.unit("t")).toEqual(Option.some(Tonnes))
    expect(Mass.unit("tonnes")).toEqual(Option.some(Tonnes))
    expect(Mass.unit("KG")).toEqual(Option.none())
    expect(Mass.symbols).toContain("µg")
  })

  it("builds quantities from canonical values", () => {
    expect(Mass.fromValue(1500).to(Kilograms)).toBe(1.5)
  })

  it("recognises its own quantities", () => {
    expect(Mass.is(kilograms(1))).toBe(true)
    expect(Mass.is(meters(1))).toBe(false)
    expect(Mass.is(1000)).toBe(false)
  })

  describe("parse", () => {
    it("reads a number followed by a symbol", () => {
      const parsed = Mass.parse("10 kg")
      expect(Either.map(parsed, (quantity) => quantity.value)).toEqual(Either.right(10_000))
    })

    it("accepts input without separating whitespace and with aliases", () => {
      expect(Either.map(Mass.parse("2.5tonnes"), (quantity) => quantity.value)).toEqual(Either.right(2_500_000))
      expect(Either.map(Mass.parse("  3 g  "), (quantity) => quantity.value)).toEqual(Either.right(3))
    })

    it("tries longer symbols first", () => {
      expect(Either.map(Mass.parse("5 mg"), (quantity) => quantity.to(Milligrams))).toEqual(Either.right(5))
      expect(Either.map(Time.parse("2 min"), (quantity) => quantity.value)).toEqual(Either.right(120))
    })

    it("accepts signs, leading dots and exponents", () => {
      expect(Either.map(Mass.parse("-4 g"), (quantity) => quantity.value)).toEqual(Either.right(-4))
      expect(Either.map(Mass.parse(".5 g"), (quantity) => quantity.value)).toEqual(Either.right(0.5))
      expect(Either.map(Mass.parse("1e3 g"), (quantity) => quantity.value)).toEqual(Either.right(1000))
      expect(Either.map(Mass.parse("1e+21 g"), (quantity) => quantity.value)).toEqual(Either.right(1e21))
    })

    it("is case sensitive", () => {
      expect(Either.map(SubstanceConcentration.parse("2 M"), (quantity) => quantity.to(MolesPerLitre))).toEqual(
        Either.right(2),
      )
      expect(parseReason("5 KG")).toBe("unrecognized input at offset 2")
    })

    it("reports the input and family on failure", () => {
      const parsed = Mass.parse("5 xyz")
      expect(parsed).toEqual(
        Either.left(
          new QuantityParseError({ input: "5 xyz", dimension: "Mass", reason: "unrecognized input at offset 2" }),
        ),
      )
      expect(Either.getLeft(parsed).pipe(Option.map((error) => error.message))).toEqual(
        Option.some("Unable to parse \"5 xyz\" as Mass: unrecognized input at offset 2"),
      )
    })

    it("rejects malformed input", () => {
      expect(parseReason("")).toBe("expected a number followed by a unit symbol")
      expect(parseReason("kg")).toBe("expected a number at offset 0")
      expect(parseReason("5")).toBe("expected a unit symbol after the number")
      expect(parseReason("5 5")).toBe("expected a unit symbol at offset 2")
      expect(parseReason("5 kg kg")).toBe("unexpected trailing input at offset 5")
    })
  })

  describe("format", () => {
    it("uses the first threshold the quantity reaches", () => {
      expect(kilograms(1.5).format()).toBe("1.5 kg")
      expect(Tonnes.of(3).format()).toBe("3 t")
      expect(Grams.of(0.25).format()).toBe("250 mg")
      expect(wattHours(1500).format()).toBe("1.5 kWh")
      expect(seconds(90).format()).toBe("1.5 min")
    })

    it("selects the larger unit at exactly one of it", () => {
      expect(wattHours(1000).format()).toBe("1 kWh")
      expect(Grams.of(1000).format()).toBe("1 kg")
      expect(Seconds.of(60).format()).toBe("1 min")
      expect(Micrometers.of(1000).format()).toBe("1 mm")
    })

    it("prints the conversion result without rounding", () => {
      expect(Nanometers.of(1000).format()).toBe("1.0000000000000002 µm")
    })

    it("falls back to the value unit without a display table", () => {
      expect(Temperature.bestUnit(Kelvin.of(300))).toBe(Kelvin)
      expect(Kelvin.of(300).format()).toBe("300 K")
    })

    it("formats in a requested unit", () => {
      expect(wattHours(1500).format(KilowattHours)).toBe("1.5 kWh")
      expect(seconds(5400).format(Hours)).toBe("1.5 h")
      expect(Mass.format(Grams.of(2500), Kilograms)).toBe("2.5 kg")
    })
  })
})
