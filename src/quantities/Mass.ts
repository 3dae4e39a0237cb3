/**
 * Mass, density and amount of substance.
 *
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import * as MetricSystem from "../MetricSystem.js"
import type { Quantity } from "../Quantity.js"

const GramsPerPound = 453.59237

/**
 * Held in grams; the SI base unit is the kilogram.
 *
 * @category Families
 * @since 0.1.0
 */
export const Mass = Dimension.make("Mass", (unit) => {
  const Micrograms = unit.linear("mcg", MetricSystem.Micro, { aliases: ["µg"] })
  const Milligrams = unit.linear("mg", MetricSystem.Milli)
  const Grams = unit.value("g")
  const Kilograms = unit.linear("kg", MetricSystem.Kilo)
  const Tonnes = unit.linear("t", MetricSystem.Mega, { aliases: ["tonnes"] })
  const Pounds = unit.linear("lb", GramsPerPound)
  const Ounces = unit.linear("oz", GramsPerPound / 16)

  return {
    units: { Micrograms, Milligrams, Grams, Kilograms, Tonnes, Pounds, Ounces },
    display: {
      thresholds: [
        [1, Tonnes],
        [1, Kilograms],
        [1, Grams],
      ],
      fallback: Milligrams,
    },
    siUnit: Kilograms,
    dimensionSymbol: "M",
  }
})

/** @since 0.1.0 */
export type Mass = Quantity<"Mass">

/** @since 0.1.0 */
export const { Micrograms, Milligrams, Grams, Kilograms, Tonnes, Pounds, Ounces } = Mass.units

/** @since 0.1.0 */
export const grams = (value: number): Mass => Grams.of(value)

/** @since 0.1.0 */
export const kilograms = (value: number): Mass => Kilograms.of(value)

/**
 * @category Families
 * @since 0.1.0
 */
export const Density = Dimension.make("Density", (unit) => {
  const KilogramsPerCubicMeter = unit.value("kg/m³", { aliases: ["kg/m^3"] })
  const GramsPerCubicCentimeter = unit.linear("g/cm³", MetricSystem.Kilo, { aliases: ["g/cm^3"] })
  const GramsPerLitre = unit.linear("g/L", 1)

  return {
    units: { KilogramsPerCubicMeter, GramsPerCubicCentimeter, GramsPerLitre },
  }
})

/** @since 0.1.0 */
export type Density = Quantity<"Density">

/** @since 0.1.0 */
export const { KilogramsPerCubicMeter, GramsPerCubicCentimeter, GramsPerLitre } = Density.units

/**
 * @category Families
 * @since 0.1.0
 */
export const ChemicalAmount = Dimension.make("ChemicalAmount", (unit) => {
  const Moles = unit.value("mol")
  const PoundMoles = unit.linear("lb-mol", GramsPerPound)

  return {
    units: { Moles, PoundMoles },
    siUnit: Moles,
    dimensionSymbol: "N",
  }
})

/** @since 0.1.0 */
export type ChemicalAmount = Quantity<"ChemicalAmount">

/** @since 0.1.0 */
export const { Moles, PoundMoles } = ChemicalAmount.units

/** @since 0.1.0 */
export const moles = (value: number): ChemicalAmount => Moles.of(value)

/**
 * Amount of substance per volume, the result of dividing a chemical amount by
 * a volume.
 *
 * @category Families
 * @since 0.1.0
 */
export const SubstanceConcentration = Dimension.make("SubstanceConcentration", (unit) => {
  const MolesPerCubicMeter = unit.value("mol/m³", { aliases: ["mol/m^3"] })
  const MillimolesPerLitre = unit.linear("mmol/L", 1, { aliases: ["mM"] })
  const MolesPerLitre = unit.linear("mol/L", MetricSystem.Kilo, { aliases: ["M"] })

  return {
    units: { MolesPerCubicMeter, MillimolesPerLitre, MolesPerLitre },
  }
})

/** @since 0.1.0 */
export type SubstanceConcentration = Quantity<"SubstanceConcentration">

/** @since 0.1.0 */
export const { MolesPerCubicMeter, MillimolesPerLitre, MolesPerLitre } = SubstanceConcentration.units
