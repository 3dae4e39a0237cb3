/**
 * Error hierarchy for dimensional quantities.
 *
 * Two kinds of failure exist. Declaration errors describe a broken quantity
 * catalog (a unit without a usable multiplier, two value units in one family,
 * a relation declared twice); they are thrown while the catalog module loads
 * and are never caught. Everything a caller can cause at run time (a string
 * that does not parse, a family name that is not registered) is returned as a
 * value: an `Either` left or the failure channel of an `Effect`, so callers
 * can pattern match with `Effect.catchTag`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a unit declaration has an empty symbol or an unusable
 * multiplier (zero, negative, NaN or infinite).
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export class InvalidUnitError extends Data.TaggedError("InvalidUnitError")<{
  readonly dimension: string
  readonly symbol: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid unit "${this.symbol}" for ${this.dimension}: ${this.reason}`
  }
}

/**
 * Raised when a quantity family declares no value unit.
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export class MissingValueUnitError extends Data.TaggedError("MissingValueUnitError")<{
  readonly dimension: string
}> {
  override get message(): string {
    return `${this.dimension} declares no value unit`
  }
}

/**
 * Raised when a quantity family declares more than one value unit.
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export class DuplicateValueUnitError extends Data.TaggedError("DuplicateValueUnitError")<{
  readonly dimension: string
  readonly symbols: ReadonlyArray<string>
}> {
  override get message(): string {
    return `${this.dimension} declares more than one value unit: ${this.symbols.join(", ")}`
  }
}

/**
 * Raised when a symbol or alias is used by two units of the same family.
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export class DuplicateSymbolError extends Data.TaggedError("DuplicateSymbolError")<{
  readonly dimension: string
  readonly symbol: string
}> {
  override get message(): string {
    return `Symbol "${this.symbol}" is declared twice for ${this.dimension}`
  }
}

/**
 * Raised when the same `(left, operator, right)` relation is declared twice.
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export class DuplicateRelationError extends Data.TaggedError("DuplicateRelationError")<{
  readonly relation: string
}> {
  override get message(): string {
    return `Relation "${this.relation}" is declared more than once`
  }
}

/**
 * Raised when two quantity families with the same name are registered in one
 * catalog.
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export class DuplicateDimensionError extends Data.TaggedError("DuplicateDimensionError")<{
  readonly name: string
}> {
  override get message(): string {
    return `Quantity family "${this.name}" is registered more than once`
  }
}

/**
 * Union of all declaration errors.
 *
 * @category Declaration errors
 * @since 0.1.0
 */
export type DeclarationError =
  | InvalidUnitError
  | MissingValueUnitError
  | DuplicateValueUnitError
  | DuplicateSymbolError
  | DuplicateRelationError
  | DuplicateDimensionError

/**
 * Returned when a string cannot be read as a quantity of the requested family.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const result = Mass.parse("5 xyz")
 * // Either.left(QuantityParseError { input: "5 xyz", dimension: "Mass", ... })
 * ```
 */
export class QuantityParseError extends Data.TaggedError("QuantityParseError")<{
  readonly input: string
  readonly dimension: string
  readonly reason: string
}> {
  override get message(): string {
    return `Unable to parse "${this.input}" as ${this.dimension}: ${this.reason}`
  }
}

/**
 * Returned when a catalog has no quantity family with the requested name.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionNotFoundError extends Data.TaggedError("DimensionNotFoundError")<{
  readonly name: string
}> {
  override get message(): string {
    return `Unknown quantity family "${this.name}"`
  }
}

/**
 * Returned when a symbol does not belong to the requested family.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly dimension: string
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}" for ${this.dimension}`
  }
}

/**
 * Returned when no relation is declared for a pair of families.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UndeclaredRelationError extends Data.TaggedError("UndeclaredRelationError")<{
  readonly left: string
  readonly operator: string
  readonly right: string
}> {
  override get message(): string {
    return `No relation is declared for ${this.left} ${this.operator} ${this.right}`
  }
}

/**
 * Thrown when a same-family operation (`plus`, `compare`, ...) receives
 * quantities of two different families. Only reachable through values typed
 * `Quantity<string>`, such as those returned by the catalog.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly operation: string
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    return `Cannot apply ${this.operation} to ${this.left} and ${this.right}: the families differ`
  }
}
