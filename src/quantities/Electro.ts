/**
 * Current, potential and resistance.
 *
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import * as MetricSystem from "../MetricSystem.js"
import type { Quantity } from "../Quantity.js"

/**
 * @category Families
 * @since 0.1.0
 */
export const ElectricCurrent = Dimension.make("ElectricCurrent", (unit) => {
  const Microamperes = unit.linear("µA", MetricSystem.Micro, { aliases: ["uA"] })
  const Milliamperes = unit.linear("mA", MetricSystem.Milli)
  const Amperes = unit.value("A")
  const Kiloamperes = unit.linear("kA", MetricSystem.Kilo)

  return {
    units: { Microamperes, Milliamperes, Amperes, Kiloamperes },
    display: {
      thresholds: [
        [1, Kiloamperes],
        [1, Amperes],
        [1, Milliamperes],
      ],
      fallback: Microamperes,
    },
    dimensionSymbol: "I",
  }
})

/** @since 0.1.0 */
export type ElectricCurrent = Quantity<"ElectricCurrent">

/** @since 0.1.0 */
export const { Microamperes, Milliamperes, Amperes, Kiloamperes } = ElectricCurrent.units

/** @since 0.1.0 */
export const amperes = (value: number): ElectricCurrent => Amperes.of(value)

/**
 * @category Families
 * @since 0.1.0
 */
export const ElectricPotential = Dimension.make("ElectricPotential", (unit) => {
  const Microvolts = unit.linear("µV", MetricSystem.Micro, { aliases: ["uV"] })
  const Millivolts = unit.linear("mV", MetricSystem.Milli)
  const Volts = unit.value("V")
  const Kilovolts = unit.linear("kV", MetricSystem.Kilo)
  const Megavolts = unit.linear("MV", MetricSystem.Mega)

  return {
    units: { Microvolts, Millivolts, Volts, Kilovolts, Megavolts },
    display: {
      thresholds: [
        [1, Megavolts],
        [1, Kilovolts],
        [1, Volts],
        [1, Millivolts],
      ],
      fallback: Microvolts,
    },
  }
})

/** @since 0.1.0 */
export type ElectricPotential = Quantity<"ElectricPotential">

/** @since 0.1.0 */
export const { Microvolts, Millivolts, Volts, Kilovolts, Megavolts } = ElectricPotential.units

/** @since 0.1.0 */
export const volts = (value: number): ElectricPotential => Volts.of(value)

/**
 * @category Families
 * @since 0.1.0
 */
export const ElectricalResistance = Dimension.make("ElectricalResistance", (unit) => {
  const Nanohms = unit.linear("nΩ", MetricSystem.Nano)
  const Microhms = unit.linear("µΩ", MetricSystem.Micro)
  const Milliohms = unit.linear("mΩ", MetricSystem.Milli)
  const Ohms = unit.value("Ω", { aliases: ["ohm"] })
  const Kilohms = unit.linear("kΩ", MetricSystem.Kilo, { aliases: ["kohm"] })
  const Megohms = unit.linear("MΩ", MetricSystem.Mega, { aliases: ["Mohm"] })
  const Gigohms = unit.linear("GΩ", MetricSystem.Giga)

  return {
    units: { Nanohms, Microhms, Milliohms, Ohms, Kilohms, Megohms, Gigohms },
    display: {
      thresholds: [
        [1, Gigohms],
        [1, Megohms],
        [1, Kilohms],
        [1, Ohms],
        [1, Milliohms],
        [1, Microhms],
      ],
      fallback: Nanohms,
    },
  }
})

/** @since 0.1.0 */
export type ElectricalResistance = Quantity<"ElectricalResistance">

/** @since 0.1.0 */
export const { Nanohms, Microhms, Milliohms, Ohms, Kilohms, Megohms, Gigohms } = ElectricalResistance.units

/** @since 0.1.0 */
export const ohms = (value: number): ElectricalResistance => Ohms.of(value)
