/**
 * Run-time access to a catalog of quantity families and relations.
 *
 * The typed API (`Mass.parse`, `algebra.times`) needs the family at compile
 * time. Callers that only learn it at run time (a family named in a
 * configuration file, a quantity read from a message) go through this
 * service, which resolves families and relations by name and reports every
 * miss as a typed failure.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect"
import { type AnyRelation, indexRelations, type Operator, relationKey } from "./Algebra.js"
import type { Dimension } from "./Dimension.js"
import {
  DimensionNotFoundError,
  DuplicateDimensionError,
  type QuantityParseError,
  UndeclaredRelationError,
  UnitNotFoundError,
} from "./Errors.js"
import type { Quantity } from "./Quantity.js"
import { StandardAlgebra, StandardDimensions } from "./quantities/index.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface QuantityCatalogConfig {
  readonly dimensions: ReadonlyArray<Dimension<string>>
  readonly relations: ReadonlyArray<AnyRelation>
}

/**
 * @category Services
 * @since 0.1.0
 */
export interface QuantityCatalogService {
  readonly dimensions: ReadonlyArray<Dimension<string>>
  readonly relations: ReadonlyArray<AnyRelation>
  readonly find: (name: string) => Effect.Effect<Dimension<string>, DimensionNotFoundError>
  readonly parse: (
    name: string,
    text: string,
  ) => Effect.Effect<Quantity<string>, DimensionNotFoundError | QuantityParseError>
  readonly convert: (
    name: string,
    value: number,
    fromSymbol: string,
    toSymbol: string,
  ) => Effect.Effect<number, DimensionNotFoundError | UnitNotFoundError>
  readonly multiply: (
    left: Quantity<string>,
    right: Quantity<string>,
  ) => Effect.Effect<Quantity<string>, UndeclaredRelationError>
  readonly divide: (
    left: Quantity<string>,
    right: Quantity<string>,
  ) => Effect.Effect<Quantity<string>, UndeclaredRelationError>
}

const defaultConfig: QuantityCatalogConfig = {
  dimensions: StandardDimensions,
  relations: StandardAlgebra.relations,
}

const indexDimensions = (
  dimensions: ReadonlyArray<Dimension<string>>,
): Effect.Effect<ReadonlyMap<string, Dimension<string>>, DuplicateDimensionError> =>
  Effect.suspend(() => {
    const index = new Map<string, Dimension<string>>()
    for (const dimension of dimensions) {
      if (index.has(dimension.name)) {
        return Effect.fail(new DuplicateDimensionError({ name: dimension.name }))
      }
      index.set(dimension.name, dimension)
    }
    return Effect.succeed(index)
  })

const findUnit = (dimension: Dimension<string>, symbol: string) =>
  Option.match(dimension.unit(symbol), {
    onNone: () => Effect.fail(new UnitNotFoundError({ dimension: dimension.name, symbol })),
    onSome: Effect.succeed,
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class QuantityCatalog extends Context.Tag("effect-quantities/QuantityCatalog")<
  QuantityCatalog,
  QuantityCatalogService
>() {
  static layer(config: QuantityCatalogConfig = defaultConfig) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const dimensions = yield* indexDimensions(config.dimensions)
        const relations = yield* indexRelations(config.relations)

        yield* Effect.logDebug("quantity catalog ready").pipe(
          Effect.annotateLogs({ dimensions: dimensions.size, relations: relations.size }),
        )

        const find = (name: string): Effect.Effect<Dimension<string>, DimensionNotFoundError> => {
          const dimension = dimensions.get(name)
          return dimension === undefined
            ? Effect.fail(new DimensionNotFoundError({ name }))
            : Effect.succeed(dimension)
        }

        const apply = (operator: Operator) => (left: Quantity<string>, right: Quantity<string>) => {
          const relation = relations.get(relationKey(left.dimension.name, operator, right.dimension.name))
          return relation === undefined || relation.left !== left.dimension || relation.right !== right.dimension
            ? Effect.fail(
                new UndeclaredRelationError({ left: left.dimension.name, operator, right: right.dimension.name }),
              )
            : Effect.succeed(relation.apply(left, right))
        }

        const service: QuantityCatalogService = {
          dimensions: config.dimensions,
          relations: config.relations,
          find,
          parse: (name, text) => Effect.flatMap(find(name), (dimension) => dimension.parse(text)),
          convert: (name, value, fromSymbol, toSymbol) =>
            Effect.gen(function* () {
              const dimension = yield* find(name)
              const from = yield* findUnit(dimension, fromSymbol)
              const to = yield* findUnit(dimension, toSymbol)
              return from.convertTo(value, to)
            }),
          multiply: apply("*"),
          divide: apply("/"),
        }

        return service
      }),
    )
  }
}
