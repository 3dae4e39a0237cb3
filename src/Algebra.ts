/**
 * Declared relations between quantity families.
 *
 * A relation states that `left <operator> right` yields a quantity of a third
 * family and carries the function that computes it. Relations are never
 * inferred: `Length / Time = Velocity` and `Velocity / Time = Acceleration`
 * say nothing about `Length / Time²`. Each useful pair is declared once, and
 * the set of declarations is an immutable `Algebra` that can be listed,
 * looked up by family name and used for statically typed arithmetic.
 *
 * @since 0.1.0
 */

import { Either, identity, Option } from "effect"
import type { Dimension } from "./Dimension.js"
import { DuplicateRelationError, UndeclaredRelationError } from "./Errors.js"
import type { Quantity } from "./Quantity.js"
import type { UnitOfMeasure } from "./Units.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type Operator = "*" | "/"

/**
 * A directed declaration `(left, operator, right) → result`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Relation<A extends string, Op extends Operator, B extends string, C extends string> {
  readonly left: Dimension<A>
  readonly operator: Op
  readonly right: Dimension<B>
  readonly result: Dimension<C>
  apply(left: Quantity<A>, right: Quantity<B>): Quantity<C>
}

/**
 * @category Models
 * @since 0.1.0
 */
export type AnyRelation = Relation<string, Operator, string, string>

/**
 * A bundle of relations produced by one declaration helper.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Declaration<R extends AnyRelation> {
  readonly relations: ReadonlyArray<R>
}

/**
 * Families that may appear on the right of `A <Op> _` in `R`.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type RightOperand<R, A extends string, Op extends Operator> = R extends Relation<A, Op, infer B extends string, string> ? B
  : never

/**
 * Result family of `A <Op> B` in `R`.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type ResultOf<R, A extends string, Op extends Operator, B extends string> = R extends
  Relation<A, Op, B, infer C extends string> ? C
  : never

/**
 * Key under which a relation is registered, e.g. `"Mass * Velocity"`.
 *
 * @category Utils
 * @since 0.1.0
 */
export const relationKey = (left: string, operator: Operator, right: string): string =>
  `${left} ${operator} ${right}`

/**
 * Human-readable form, e.g. `"Mass * Velocity = Momentum"`.
 *
 * @category Utils
 * @since 0.1.0
 */
export const describeRelation = (relation: AnyRelation): string =>
  `${relationKey(relation.left.name, relation.operator, relation.right.name)} = ${relation.result.name}`

/**
 * Declare a single relation with an explicit formula.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const relation = <A extends string, Op extends Operator, B extends string, C extends string>(
  left: Dimension<A>,
  operator: Op,
  right: Dimension<B>,
  result: Dimension<C>,
  apply: (left: Quantity<A>, right: Quantity<B>) => Quantity<C>,
): Relation<A, Op, B, C> & Declaration<Relation<A, Op, B, C>> => {
  const declared: Relation<A, Op, B, C> = { left, operator, right, result, apply }
  return { ...declared, relations: [declared] }
}

/**
 * Units in which the canonical product formula is evaluated. They carry any
 * normalizing constant: `result.of(a.to(left) * b.to(right))`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ProductUnits<A extends string, B extends string, C extends string> {
  readonly left: UnitOfMeasure<A>
  readonly right: UnitOfMeasure<B>
  readonly result: UnitOfMeasure<C>
}

/**
 * The triangle `A * B = C` with its commuted form and both decompositions.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Product<A extends string, B extends string, C extends string> extends
  Declaration<
    | Relation<A, "*", B, C>
    | Relation<B, "*", A, C>
    | Relation<C, "/", B, A>
    | Relation<C, "/", A, B>
  >
{
  /** `A * B = C` */
  readonly multiply: Relation<A, "*", B, C>
  /** `B * A = C` */
  readonly commuted: Relation<B, "*", A, C>
  /** `C / B = A` */
  readonly divideByRight: Relation<C, "/", B, A>
  /** `C / A = B` */
  readonly divideByLeft: Relation<C, "/", A, B>
}

/**
 * Declare `A * B = C` together with `B * A = C`, `C / B = A` and `C / A = B`.
 * When `A` and `B` are the same family only `A * A = C` and `C / A = A` are
 * registered.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const momentum = product({ left: Kilograms, right: MetersPerSecond, result: NewtonSeconds })
 * momentum.multiply.apply(Kilograms.of(2), MetersPerSecond.of(3)) // 6 N·s
 * ```
 */
export const product = <A extends string, B extends string, C extends string>(
  units: ProductUnits<A, B, C>,
): Product<A, B, C> => {
  const { left, right, result } = units
  const multiply: Relation<A, "*", B, C> = {
    left: left.dimension,
    operator: "*",
    right: right.dimension,
    result: result.dimension,
    apply: (a, b) => result.of(a.to(left) * b.to(right)),
  }
  const commuted: Relation<B, "*", A, C> = {
    left: right.dimension,
    operator: "*",
    right: left.dimension,
    result: result.dimension,
    apply: (b, a) => result.of(a.to(left) * b.to(right)),
  }
  const divideByRight: Relation<C, "/", B, A> = {
    left: result.dimension,
    operator: "/",
    right: right.dimension,
    result: left.dimension,
    apply: (c, b) => left.of(c.to(result) / b.to(right)),
  }
  const divideByLeft: Relation<C, "/", A, B> = {
    left: result.dimension,
    operator: "/",
    right: left.dimension,
    result: right.dimension,
    apply: (c, a) => right.of(c.to(result) / a.to(left)),
  }
  const leftName: string = left.dimension.name
  const relations = leftName === right.dimension.name
    ? [multiply, divideByRight]
    : [multiply, commuted, divideByRight, divideByLeft]
  return { multiply, commuted, divideByRight, divideByLeft, relations }
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface TimeDerivativeUnits<B extends string, D extends string> {
  readonly base: UnitOfMeasure<B>
  readonly derivative: UnitOfMeasure<D>
  readonly time: UnitOfMeasure<"Time">
}

/**
 * A family and its rate of change over time.
 *
 * @category Models
 * @since 0.1.0
 */
export interface TimeDerivative<B extends string, D extends string> extends Product<D, "Time", B> {
  /** `base / Time = derivative` */
  readonly differentiate: Relation<B, "/", "Time", D>
  /** `derivative * Time = base` */
  readonly integrate: Relation<D, "*", "Time", B>
}

/**
 * Declare `derivative` as the time derivative of `base`. The three units fix
 * the formula: `derivative.of(b.to(base) / t.to(time))`, so Power as the
 * derivative of Energy in watt-hours uses hours.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const velocity = timeDerivative({ base: Meters, derivative: MetersPerSecond, time: Seconds })
 * velocity.differentiate.apply(Meters.of(10), Seconds.of(2)) // 5 m/s
 * ```
 */
export const timeDerivative = <B extends string, D extends string>(
  units: TimeDerivativeUnits<B, D>,
): TimeDerivative<B, D> => {
  const declared = product({ left: units.derivative, right: units.time, result: units.base })
  return {
    ...declared,
    differentiate: declared.divideByRight,
    integrate: declared.multiply,
  }
}

/**
 * The key only carries family names. The declared operands must also be the
 * same `Dimension` objects as those of the quantities being combined, so a
 * different family that happens to share a name never reaches `apply`.
 */
const isRelationFor = <R extends AnyRelation, A extends string, Op extends Operator, B extends string>(
  candidate: R,
  left: Dimension<A>,
  operator: Op,
  right: Dimension<B>,
): candidate is Relation<A, Op, B, ResultOf<R, A, Op, B>> & R =>
  candidate.left === left && candidate.operator === operator && candidate.right === right

/**
 * Index relations by key, rejecting a key declared twice.
 *
 * @category Utils
 * @since 0.1.0
 */
export const indexRelations = <R extends AnyRelation>(
  relations: ReadonlyArray<R>,
): Either.Either<ReadonlyMap<string, R>, DuplicateRelationError> => {
  const index = new Map<string, R>()
  for (const declared of relations) {
    const key = relationKey(declared.left.name, declared.operator, declared.right.name)
    if (index.has(key)) {
      return Either.left(new DuplicateRelationError({ relation: key }))
    }
    index.set(key, declared)
  }
  return Either.right(index)
}

/**
 * An immutable registry of relations. Built with `Algebra.empty.declare(...)`;
 * declaring an existing key throws a {@link DuplicateRelationError}.
 *
 * `times` and `div` only accept pairs the registry declares: any other
 * combination fails to type-check.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const algebra = Algebra.empty.declare(timeDerivative({ base: Meters, derivative: MetersPerSecond, time: Seconds }))
 * algebra.div(Meters.of(10), Seconds.of(2)).to(MetersPerSecond) // => 5
 * ```
 */
export class Algebra<R extends AnyRelation> {
  static readonly empty: Algebra<never> = new Algebra<never>([])

  readonly relations: ReadonlyArray<R>
  readonly #index: ReadonlyMap<string, R>

  private constructor(relations: ReadonlyArray<R>) {
    this.#index = Either.getOrThrowWith(indexRelations(relations), identity)
    this.relations = relations
  }

  declare<S extends AnyRelation>(declaration: Declaration<S>): Algebra<R | S> {
    return new Algebra<R | S>([...this.relations, ...declaration.relations])
  }

  merge<S extends AnyRelation>(that: Algebra<S>): Algebra<R | S> {
    return new Algebra<R | S>([...this.relations, ...that.relations])
  }

  times<A extends string, B extends RightOperand<R, A, "*">>(
    left: Quantity<A>,
    right: Quantity<B>,
  ): Quantity<ResultOf<R, A, "*", B>> {
    return this.#apply(left, "*", right)
  }

  div<A extends string, B extends RightOperand<R, A, "/">>(
    left: Quantity<A>,
    right: Quantity<B>,
  ): Quantity<ResultOf<R, A, "/", B>> {
    return this.#apply(left, "/", right)
  }

  lookup(left: string, operator: Operator, right: string): Option.Option<R> {
    return Option.fromNullable(this.#index.get(relationKey(left, operator, right)))
  }

  /**
   * One `"A <op> B = C"` line per relation, in declaration order.
   */
  describe(): ReadonlyArray<string> {
    return this.relations.map(describeRelation)
  }

  #apply<A extends string, Op extends Operator, B extends string>(
    left: Quantity<A>,
    operator: Op,
    right: Quantity<B>,
  ): Quantity<ResultOf<R, A, Op, B>> {
    const candidate = this.#index.get(relationKey(left.dimension.name, operator, right.dimension.name))
    if (candidate !== undefined && isRelationFor(candidate, left.dimension, operator, right.dimension)) {
      return candidate.apply(left, right)
    }
    throw new UndeclaredRelationError({
      left: left.dimension.name,
      operator,
      right: right.dimension.name,
    })
  }
}
