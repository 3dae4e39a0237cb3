import { Effect, Schema } from "effect"
import { QuantityCatalog } from "../src/Catalog.js"
import * as QuantitySchema from "../src/QuantitySchema.js"
import {
  kilograms,
  Kilometers,
  KilometersPerHour,
  Length,
  metersPerSecond,
  NewtonSeconds,
  Seconds,
  StandardAlgebra,
  Time,
} from "../src/quantities/index.js"
import { writeFileSync, mkdirSync } from "node:fs"
import { resolve } from "node:path"

const Trip = Schema.Struct({
  distance: QuantitySchema.fromString(Length),
  duration: QuantitySchema.fromString(Time),
})

const program = Effect.gen(function* () {
  const trip = yield* Schema.decodeUnknown(Trip)({ distance: "42.195 km", duration: "2.5 h" })
  const speed = StandardAlgebra.div(trip.distance, trip.duration)
  const momentum = StandardAlgebra.times(kilograms(60), speed)

  const catalog = yield* QuantityCatalog
  const pace = yield* catalog.convert("Velocity", speed.to(KilometersPerHour), "km/h", "mph")

  return {
    distance: trip.distance.format(Kilometers),
    duration: trip.duration.format(Seconds),
    speed: speed.format(KilometersPerHour),
    mph: pace,
    momentum: momentum.format(NewtonSeconds),
    sprint: StandardAlgebra.times(metersPerSecond(10), Time.fromValue(9.58)).format(),
  }
}).pipe(Effect.provide(QuantityCatalog.layer()))

const outDir = resolve("examples/out")
const reportPath = resolve(outDir, "kinematics.json")

const writeReport = Effect.gen(function* () {
  const report = yield* program
  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  yield* Effect.sync(() => writeFileSync(reportPath, JSON.stringify(report, null, 2), "utf-8"))
  yield* Effect.logInfo(`wrote ${reportPath}`)
})

Effect.runPromise(writeReport).catch((error) => {
  console.error("Failed to generate kinematics example", error)
  process.exitCode = 1
})
