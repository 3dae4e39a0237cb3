/**
 * SI prefix multipliers used when declaring linear units.
 *
 * @since 0.1.0
 */

/** @since 0.1.0 */
export const Pico = 1e-12
/** @since 0.1.0 */
export const Nano = 1e-9
/** @since 0.1.0 */
export const Micro = 1e-6
/** @since 0.1.0 */
export const Milli = 1e-3
/** @since 0.1.0 */
export const Centi = 1e-2
/** @since 0.1.0 */
export const Deci = 1e-1
/** @since 0.1.0 */
export const Deca = 1e1
/** @since 0.1.0 */
export const Hecto = 1e2
/** @since 0.1.0 */
export const Kilo = 1e3
/** @since 0.1.0 */
export const Mega = 1e6
/** @since 0.1.0 */
export const Giga = 1e9
/** @since 0.1.0 */
export const Tera = 1e12
