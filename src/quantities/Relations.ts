/**
 * Relations between the built-in families.
 *
 * Each declaration names the units its formula is evaluated in. Energy is
 * held in watt-hours, so Power is its derivative over hours, and Force times
 * Length is evaluated in joules.
 *
 * @since 0.1.0
 */

import { Algebra, product, timeDerivative } from "../Algebra.js"
import { Amperes, Ohms, Volts } from "./Electro.js"
import { Joules, WattHours, Watts, WattsPerMeter } from "./Energy.js"
import { Kilograms, KilogramsPerCubicMeter, Moles, MolesPerCubicMeter } from "./Mass.js"
import { MetersPerSecond, MetersPerSecondCubed, MetersPerSecondSquared, Newtons, NewtonSeconds } from "./Motion.js"
import { CubicMeters, Meters, SquareMeters } from "./Space.js"
import { Hours, Seconds } from "./Time.js"

/**
 * @category Time derivatives
 * @since 0.1.0
 */
export const VelocityOfLength = timeDerivative({ base: Meters, derivative: MetersPerSecond, time: Seconds })

/**
 * @category Time derivatives
 * @since 0.1.0
 */
export const AccelerationOfVelocity = timeDerivative({
  base: MetersPerSecond,
  derivative: MetersPerSecondSquared,
  time: Seconds,
})

/**
 * @category Time derivatives
 * @since 0.1.0
 */
export const JerkOfAcceleration = timeDerivative({
  base: MetersPerSecondSquared,
  derivative: MetersPerSecondCubed,
  time: Seconds,
})

/**
 * @category Time derivatives
 * @since 0.1.0
 */
export const ForceOfMomentum = timeDerivative({ base: NewtonSeconds, derivative: Newtons, time: Seconds })

/**
 * @category Time derivatives
 * @since 0.1.0
 */
export const PowerOfEnergy = timeDerivative({ base: WattHours, derivative: Watts, time: Hours })

/**
 * @category Products
 * @since 0.1.0
 */
export const MomentumProduct = product({ left: Kilograms, right: MetersPerSecond, result: NewtonSeconds })

/**
 * @category Products
 * @since 0.1.0
 */
export const ForceProduct = product({ left: Kilograms, right: MetersPerSecondSquared, result: Newtons })

/**
 * @category Products
 * @since 0.1.0
 */
export const WorkProduct = product({ left: Newtons, right: Meters, result: Joules })

/**
 * @category Products
 * @since 0.1.0
 */
export const AreaProduct = product({ left: Meters, right: Meters, result: SquareMeters })

/**
 * @category Products
 * @since 0.1.0
 */
export const VolumeProduct = product({ left: SquareMeters, right: Meters, result: CubicMeters })

/**
 * @category Products
 * @since 0.1.0
 */
export const MassProduct = product({ left: KilogramsPerCubicMeter, right: CubicMeters, result: Kilograms })

/**
 * @category Products
 * @since 0.1.0
 */
export const ChemicalAmountProduct = product({ left: MolesPerCubicMeter, right: CubicMeters, result: Moles })

/**
 * Ohm's law.
 *
 * @category Products
 * @since 0.1.0
 */
export const PotentialProduct = product({ left: Ohms, right: Amperes, result: Volts })

/**
 * @category Products
 * @since 0.1.0
 */
export const ElectricPowerProduct = product({ left: Volts, right: Amperes, result: Watts })

/**
 * @category Products
 * @since 0.1.0
 */
export const LinearPowerProduct = product({ left: WattsPerMeter, right: Meters, result: Watts })

/**
 * Every built-in relation.
 *
 * @category Algebras
 * @since 0.1.0
 * @example
 * ```ts
 * StandardAlgebra.div(meters(10), seconds(2)).to(MetersPerSecond) // => 5
 * StandardAlgebra.times(kilograms(2), metersPerSecond(3)).to(NewtonSeconds) // => 6
 * ```
 */
export const StandardAlgebra = Algebra.empty
  .declare(VelocityOfLength)
  .declare(AccelerationOfVelocity)
  .declare(JerkOfAcceleration)
  .declare(ForceOfMomentum)
  .declare(PowerOfEnergy)
  .declare(MomentumProduct)
  .declare(ForceProduct)
  .declare(WorkProduct)
  .declare(AreaProduct)
  .declare(VolumeProduct)
  .declare(MassProduct)
  .declare(ChemicalAmountProduct)
  .declare(PotentialProduct)
  .declare(ElectricPowerProduct)
  .declare(LinearPowerProduct)
