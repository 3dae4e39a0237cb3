/**
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import type { Quantity } from "../Quantity.js"

const CelsiusOffset = 273.15
const FahrenheitOffset = 459.67

/**
 * Absolute temperature, held in kelvin. Celsius and Fahrenheit are offset
 * scales and convert through their own formulas; Rankine is linear.
 *
 * Differences between two temperatures are not modelled: `minus` on two
 * Celsius readings yields a kelvin value, not a temperature delta.
 *
 * @category Families
 * @since 0.1.0
 */
export const Temperature = Dimension.make("Temperature", (unit) => {
  const Kelvin = unit.value("K")
  const Celsius = unit.nonLinear("°C", {
    toCanonical: (celsius) => celsius + CelsiusOffset,
    fromCanonical: (kelvin) => kelvin - CelsiusOffset,
  }, { aliases: ["degC"] })
  const Fahrenheit = unit.nonLinear("°F", {
    toCanonical: (fahrenheit) => ((fahrenheit + FahrenheitOffset) * 5) / 9,
    fromCanonical: (kelvin) => (kelvin * 9) / 5 - FahrenheitOffset,
  }, { aliases: ["degF"] })
  const Rankine = unit.linear("°R", 5 / 9, { aliases: ["degR"] })

  return {
    units: { Kelvin, Celsius, Fahrenheit, Rankine },
    dimensionSymbol: "Θ",
  }
})

/** @since 0.1.0 */
export type Temperature = Quantity<"Temperature">

/** @since 0.1.0 */
export const { Kelvin, Celsius, Fahrenheit, Rankine } = Temperature.units

/** @since 0.1.0 */
export const kelvin = (value: number): Temperature => Kelvin.of(value)

/** @since 0.1.0 */
export const celsius = (value: number): Temperature => Celsius.of(value)
