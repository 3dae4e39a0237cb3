/**
 * Velocity, its time derivatives, momentum and force.
 *
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import * as MetricSystem from "../MetricSystem.js"
import type { Quantity } from "../Quantity.js"
import { SecondsPerHour } from "./Time.js"

const MetersPerFoot = 0.3048

/** Standard gravity in m/s². */
const StandardGravity = 9.80665

/**
 * @category Families
 * @since 0.1.0
 */
export const Velocity = Dimension.make("Velocity", (unit) => {
  const MetersPerSecond = unit.value("m/s")
  const KilometersPerHour = unit.linear("km/h", MetricSystem.Kilo / SecondsPerHour)
  const UsMilesPerHour = unit.linear("mph", 1_609.344 / SecondsPerHour)
  const Knots = unit.linear("kn", 1_852 / SecondsPerHour)
  const FeetPerSecond = unit.linear("ft/s", MetersPerFoot)

  return {
    units: { MetersPerSecond, KilometersPerHour, UsMilesPerHour, Knots, FeetPerSecond },
  }
})

/** @since 0.1.0 */
export type Velocity = Quantity<"Velocity">

/** @since 0.1.0 */
export const { MetersPerSecond, KilometersPerHour, UsMilesPerHour, Knots, FeetPerSecond } = Velocity.units

/** @since 0.1.0 */
export const metersPerSecond = (value: number): Velocity => MetersPerSecond.of(value)

/**
 * @category Families
 * @since 0.1.0
 */
export const Acceleration = Dimension.make("Acceleration", (unit) => {
  const MetersPerSecondSquared = unit.value("m/s²", { aliases: ["m/s^2"] })
  const FeetPerSecondSquared = unit.linear("ft/s²", MetersPerFoot, { aliases: ["ft/s^2"] })
  const EarthGravities = unit.linear("g", StandardGravity)

  return {
    units: { MetersPerSecondSquared, FeetPerSecondSquared, EarthGravities },
  }
})

/** @since 0.1.0 */
export type Acceleration = Quantity<"Acceleration">

/** @since 0.1.0 */
export const { MetersPerSecondSquared, FeetPerSecondSquared, EarthGravities } = Acceleration.units

/**
 * Rate of change of acceleration.
 *
 * @category Families
 * @since 0.1.0
 */
export const Jerk = Dimension.make("Jerk", (unit) => {
  const MetersPerSecondCubed = unit.value("m/s³", { aliases: ["m/s^3"] })
  const FeetPerSecondCubed = unit.linear("ft/s³", MetersPerFoot, { aliases: ["ft/s^3"] })

  return {
    units: { MetersPerSecondCubed, FeetPerSecondCubed },
  }
})

/** @since 0.1.0 */
export type Jerk = Quantity<"Jerk">

/** @since 0.1.0 */
export const { MetersPerSecondCubed, FeetPerSecondCubed } = Jerk.units

/**
 * @category Families
 * @since 0.1.0
 */
export const Momentum = Dimension.make("Momentum", (unit) => ({
  units: { NewtonSeconds: unit.value("Ns", { aliases: ["N·s", "kg·m/s"] }) },
}))

/** @since 0.1.0 */
export type Momentum = Quantity<"Momentum">

/** @since 0.1.0 */
export const { NewtonSeconds } = Momentum.units

/**
 * @category Families
 * @since 0.1.0
 */
export const Force = Dimension.make("Force", (unit) => {
  const Newtons = unit.value("N")
  const Kilonewtons = unit.linear("kN", MetricSystem.Kilo)
  const Meganewtons = unit.linear("MN", MetricSystem.Mega)
  const KilogramForce = unit.linear("kgf", StandardGravity)
  const PoundForce = unit.linear("lbf", 4.4482216152605)

  return {
    units: { Newtons, Kilonewtons, Meganewtons, KilogramForce, PoundForce },
  }
})

/** @since 0.1.0 */
export type Force = Quantity<"Force">

/** @since 0.1.0 */
export const { Newtons, Kilonewtons, Meganewtons, KilogramForce, PoundForce } = Force.units

/** @since 0.1.0 */
export const newtons = (value: number): Force => Newtons.of(value)
