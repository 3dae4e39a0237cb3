/**
 * The built-in quantity families and the relations between them.
 *
 * @since 0.1.0
 */

import type { Dimension } from "../Dimension.js"
import { ElectricalResistance, ElectricCurrent, ElectricPotential } from "./Electro.js"
import { Energy, Power, SpectralPower } from "./Energy.js"
import { ChemicalAmount, Density, Mass, SubstanceConcentration } from "./Mass.js"
import { Acceleration, Force, Jerk, Momentum, Velocity } from "./Motion.js"
import { Area, Length, SolidAngle, Volume } from "./Space.js"
import { Temperature } from "./Thermal.js"
import { Time } from "./Time.js"

export * from "./Electro.js"
export * from "./Energy.js"
export * from "./Mass.js"
export * from "./Motion.js"
export * from "./Relations.js"
export * from "./Space.js"
export * from "./Thermal.js"
export * from "./Time.js"

/**
 * @category Catalogs
 * @since 0.1.0
 */
export const StandardDimensions: ReadonlyArray<Dimension<string>> = [
  Time,
  Length,
  Area,
  Volume,
  SolidAngle,
  Mass,
  Density,
  ChemicalAmount,
  SubstanceConcentration,
  Velocity,
  Acceleration,
  Jerk,
  Momentum,
  Force,
  Energy,
  Power,
  SpectralPower,
  Temperature,
  ElectricCurrent,
  ElectricPotential,
  ElectricalResistance,
]
