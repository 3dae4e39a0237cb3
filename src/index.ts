/**
 * @since 0.1.0
 */

export * from "./Algebra.js"
export * from "./Catalog.js"
export * as Conversion from "./Conversion.js"
export * from "./Dimension.js"
export * from "./Errors.js"
export * as MetricSystem from "./MetricSystem.js"
export * as Numeric from "./Numeric.js"
export * from "./quantities/index.js"
export * from "./Quantity.js"
export * as QuantitySchema from "./QuantitySchema.js"
export * from "./Units.js"
