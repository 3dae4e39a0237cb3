/**
 * Length, area, volume and solid angle.
 *
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import * as MetricSystem from "../MetricSystem.js"
import type { Quantity } from "../Quantity.js"

const MetersPerFoot = 0.3048

/**
 * @category Families
 * @since 0.1.0
 */
export const Length = Dimension.make("Length", (unit) => {
  const Nanometers = unit.linear("nm", MetricSystem.Nano)
  const Micrometers = unit.linear("µm", MetricSystem.Micro, { aliases: ["um"] })
  const Millimeters = unit.linear("mm", MetricSystem.Milli)
  const Centimeters = unit.linear("cm", MetricSystem.Centi)
  const Decimeters = unit.linear("dm", MetricSystem.Deci)
  const Meters = unit.value("m")
  const Kilometers = unit.linear("km", MetricSystem.Kilo)
  const Inches = unit.linear("in", MetersPerFoot / 12)
  const Feet = unit.linear("ft", MetersPerFoot)
  const Yards = unit.linear("yd", MetersPerFoot * 3)
  const UsMiles = unit.linear("mi", 1_609.344)
  const NauticalMiles = unit.linear("nmi", 1_852)

  return {
    units: {
      Nanometers,
      Micrometers,
      Millimeters,
      Centimeters,
      Decimeters,
      Meters,
      Kilometers,
      Inches,
      Feet,
      Yards,
      UsMiles,
      NauticalMiles,
    },
    display: {
      thresholds: [
        [1, Kilometers],
        [1, Meters],
        [1, Centimeters],
        [1, Millimeters],
        [1, Micrometers],
      ],
      fallback: Nanometers,
    },
    dimensionSymbol: "L",
  }
})

/** @since 0.1.0 */
export type Length = Quantity<"Length">

/** @since 0.1.0 */
export const {
  Nanometers,
  Micrometers,
  Millimeters,
  Centimeters,
  Decimeters,
  Meters,
  Kilometers,
  Inches,
  Feet,
  Yards,
  UsMiles,
  NauticalMiles,
} = Length.units

/** @since 0.1.0 */
export const meters = (value: number): Length => Meters.of(value)

/** @since 0.1.0 */
export const kilometers = (value: number): Length => Kilometers.of(value)

/**
 * @category Families
 * @since 0.1.0
 */
export const Area = Dimension.make("Area", (unit) => {
  const SquareCentimeters = unit.linear("cm²", MetricSystem.Centi * MetricSystem.Centi, { aliases: ["cm^2"] })
  const SquareMeters = unit.value("m²", { aliases: ["m^2"] })
  const Hectares = unit.linear("ha", 1e4)
  const SquareKilometers = unit.linear("km²", MetricSystem.Kilo * MetricSystem.Kilo, { aliases: ["km^2"] })
  const SquareFeet = unit.linear("ft²", MetersPerFoot * MetersPerFoot, { aliases: ["ft^2"] })
  const Acres = unit.linear("acre", 4_046.8564224)

  return {
    units: { SquareCentimeters, SquareMeters, Hectares, SquareKilometers, SquareFeet, Acres },
  }
})

/** @since 0.1.0 */
export type Area = Quantity<"Area">

/** @since 0.1.0 */
export const { SquareCentimeters, SquareMeters, Hectares, SquareKilometers, SquareFeet, Acres } = Area.units

/**
 * @category Families
 * @since 0.1.0
 */
export const Volume = Dimension.make("Volume", (unit) => {
  const CubicMeters = unit.value("m³", { aliases: ["m^3"] })
  const Litres = unit.linear("L", MetricSystem.Milli, { aliases: ["l"] })
  const Millilitres = unit.linear("mL", MetricSystem.Micro, { aliases: ["ml"] })
  const CubicCentimeters = unit.linear("cm³", MetricSystem.Micro, { aliases: ["cm^3"] })
  const UsGallons = unit.linear("gal", 0.003785411784)

  return {
    units: { CubicMeters, Litres, Millilitres, CubicCentimeters, UsGallons },
    display: {
      thresholds: [
        [1, CubicMeters],
        [1, Litres],
      ],
      fallback: Millilitres,
    },
  }
})

/** @since 0.1.0 */
export type Volume = Quantity<"Volume">

/** @since 0.1.0 */
export const { CubicMeters, Litres, Millilitres, CubicCentimeters, UsGallons } = Volume.units

/**
 * @category Families
 * @since 0.1.0
 */
export const SolidAngle = Dimension.make("SolidAngle", (unit) => ({
  units: { SquaredRadians: unit.value("sr") },
}))

/** @since 0.1.0 */
export type SolidAngle = Quantity<"SolidAngle">

/** @since 0.1.0 */
export const { SquaredRadians } = SolidAngle.units

/** @since 0.1.0 */
export const steradians = (value: number): SolidAngle => SquaredRadians.of(value)
