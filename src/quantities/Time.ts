/**
 * @since 0.1.0
 */

import { Dimension } from "../Dimension.js"
import * as MetricSystem from "../MetricSystem.js"
import type { Quantity } from "../Quantity.js"

/** @since 0.1.0 */
export const SecondsPerMinute = 60
/** @since 0.1.0 */
export const SecondsPerHour = 3600
/** @since 0.1.0 */
export const SecondsPerDay = 86_400

/**
 * Durations, held in seconds.
 *
 * @category Families
 * @since 0.1.0
 */
export const Time = Dimension.make("Time", (unit) => {
  const Nanoseconds = unit.linear("ns", MetricSystem.Nano)
  const Microseconds = unit.linear("µs", MetricSystem.Micro, { aliases: ["us"] })
  const Milliseconds = unit.linear("ms", MetricSystem.Milli)
  const Seconds = unit.value("s")
  const Minutes = unit.linear("min", SecondsPerMinute)
  const Hours = unit.linear("h", SecondsPerHour, { aliases: ["hr"] })
  const Days = unit.linear("d", SecondsPerDay)

  return {
    units: { Nanoseconds, Microseconds, Milliseconds, Seconds, Minutes, Hours, Days },
    display: {
      thresholds: [
        [1, Days],
        [1, Hours],
        [1, Minutes],
        [1, Seconds],
        [1, Milliseconds],
        [1, Microseconds],
      ],
      fallback: Nanoseconds,
    },
    dimensionSymbol: "T",
  }
})

/** @since 0.1.0 */
export type Time = Quantity<"Time">

/** @since 0.1.0 */
export const { Nanoseconds, Microseconds, Milliseconds, Seconds, Minutes, Hours, Days } = Time.units

/** @since 0.1.0 */
export const seconds = (value: number): Time => Seconds.of(value)

/** @since 0.1.0 */
export const hours = (value: number): Time => Hours.of(value)
