/**
 * Energy, power and spectral power.
 *
 * Energy is held in watt-hours rather than joules, so Power is paired with
 * Energy through hours.
 *
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import * as MetricSystem from "../MetricSystem.js"
import type { Quantity } from "../Quantity.js"
import { SecondsPerHour } from "./Time.js"

const JoulesPerBtu = 1_055.05585262

/**
 * @category Families
 * @since 0.1.0
 */
export const Energy = Dimension.make("Energy", (unit) => {
  const Joule = 1 / SecondsPerHour
  const WattHours = unit.value("Wh")
  const KilowattHours = unit.linear("kWh", MetricSystem.Kilo)
  const MegawattHours = unit.linear("MWh", MetricSystem.Mega)
  const GigawattHours = unit.linear("GWh", MetricSystem.Giga)
  const Picojoules = unit.linear("pJ", MetricSystem.Pico * Joule)
  const Nanojoules = unit.linear("nJ", MetricSystem.Nano * Joule)
  const Microjoules = unit.linear("µJ", MetricSystem.Micro * Joule)
  const Millijoules = unit.linear("mJ", MetricSystem.Milli * Joule)
  const Joules = unit.linear("J", Joule)
  const Kilojoules = unit.linear("kJ", MetricSystem.Kilo * Joule)
  const Megajoules = unit.linear("MJ", MetricSystem.Mega * Joule)
  const Gigajoules = unit.linear("GJ", MetricSystem.Giga * Joule)
  const Terajoules = unit.linear("TJ", MetricSystem.Tera * Joule)
  const BritishThermalUnits = unit.linear("Btu", Joule * JoulesPerBtu)
  const MBtus = unit.linear("MBtu", Joule * JoulesPerBtu * MetricSystem.Kilo)
  const MMBtus = unit.linear("MMBtu", Joule * JoulesPerBtu * MetricSystem.Mega)

  return {
    units: {
      WattHours,
      KilowattHours,
      MegawattHours,
      GigawattHours,
      Picojoules,
      Nanojoules,
      Microjoules,
      Millijoules,
      Joules,
      Kilojoules,
      Megajoules,
      Gigajoules,
      Terajoules,
      BritishThermalUnits,
      MBtus,
      MMBtus,
    },
    display: {
      thresholds: [
        [1, GigawattHours],
        [1, MegawattHours],
        [1, KilowattHours],
        [1, WattHours],
      ],
      fallback: Joules,
    },
    siUnit: Joules,
  }
})

/** @since 0.1.0 */
export type Energy = Quantity<"Energy">

/** @since 0.1.0 */
export const {
  WattHours,
  KilowattHours,
  MegawattHours,
  GigawattHours,
  Picojoules,
  Nanojoules,
  Microjoules,
  Millijoules,
  Joules,
  Kilojoules,
  Megajoules,
  Gigajoules,
  Terajoules,
  BritishThermalUnits,
  MBtus,
  MMBtus,
} = Energy.units

/** @since 0.1.0 */
export const wattHours = (value: number): Energy => WattHours.of(value)

/** @since 0.1.0 */
export const joules = (value: number): Energy => Joules.of(value)

/**
 * @category Families
 * @since 0.1.0
 */
export const Power = Dimension.make("Power", (unit) => {
  const Milliwatts = unit.linear("mW", MetricSystem.Milli)
  const Watts = unit.value("W")
  const Kilowatts = unit.linear("kW", MetricSystem.Kilo)
  const Megawatts = unit.linear("MW", MetricSystem.Mega)
  const Gigawatts = unit.linear("GW", MetricSystem.Giga)
  const BtusPerHour = unit.linear("Btu/hr", JoulesPerBtu / SecondsPerHour, { aliases: ["Btu/h"] })

  return {
    units: { Milliwatts, Watts, Kilowatts, Megawatts, Gigawatts, BtusPerHour },
    display: {
      thresholds: [
        [1, Gigawatts],
        [1, Megawatts],
        [1, Kilowatts],
        [1, Watts],
      ],
      fallback: Milliwatts,
    },
  }
})

/** @since 0.1.0 */
export type Power = Quantity<"Power">

/** @since 0.1.0 */
export const { Milliwatts, Watts, Kilowatts, Megawatts, Gigawatts, BtusPerHour } = Power.units

/** @since 0.1.0 */
export const watts = (value: number): Power => Watts.of(value)

/**
 * Power per unit length, e.g. the output of a linear heat source.
 *
 * @category Families
 * @since 0.1.0
 */
export const SpectralPower = Dimension.make("SpectralPower", (unit) => ({
  units: { WattsPerMeter: unit.value("W/m") },
}))

/** @since 0.1.0 */
export type SpectralPower = Quantity<"SpectralPower">

/** @since 0.1.0 */
export const { WattsPerMeter } = SpectralPower.units
