/**
 * Butcher Tableau
 *
 * Immutable description of a Runge-Kutta method: nodes `c`, coefficient
 * matrix `a`, weights `b` and optional embedded weights `b*`. Indices are
 * zero-based throughout the library, so `node(0)` is the usual `c_1`.
 *
 * A tableau is validated once, when it is built, and its structure
 * (explicit or implicit) is decided from the coefficient pattern at that
 * point. The same instance can then be shared by any number of concurrent
 * solves.
 *
 * @since 0.1.0
 */

import { Data, Effect, Either, Option, ParseResult, Schema } from "effect"
import { ConfigurationError } from "./Errors.js"

/**
 * Raw coefficient arrays as accepted by {@link Tableau.make}. `stages`
 * defaults to the number of weights.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const TableauCoefficients = Schema.Struct({
  name: Schema.NonEmptyTrimmedString,
  order: Schema.Number,
  embeddedOrder: Schema.optional(Schema.Number),
  stages: Schema.optional(Schema.Number),
  nodes: Schema.Array(Schema.Number),
  matrix: Schema.Array(Schema.Array(Schema.Number)),
  weights: Schema.Array(Schema.Number),
  embeddedWeights: Schema.optional(Schema.Array(Schema.Number)),
  /** Require a strictly lower-triangular matrix. */
  explicit: Schema.optional(Schema.Boolean),
})

/**
 * @category Schemas
 * @since 0.1.0
 */
export type TableauCoefficients = typeof TableauCoefficients.Type

/**
 * Coefficient pattern decided at construction.
 *
 * - `Explicit`: `a[i][j] = 0` for every `j >= i`; stages are computed in
 *   order, each from the ones before it.
 * - `Implicit`: some stage depends on itself or a later stage; the stage
 *   equations form a coupled system. `diagonal` is set when only the
 *   diagonal breaks lower-triangularity.
 *
 * @category Models
 * @since 0.1.0
 */
export type TableauStructure = Data.TaggedEnum<{
  Explicit: {}
  Implicit: { readonly diagonal: boolean }
}>

/**
 * @category Models
 * @since 0.1.0
 */
export const TableauStructure = Data.taggedEnum<TableauStructure>()

const fail = (reason: ConfigurationError["reason"], detail: string) =>
  Either.left(new ConfigurationError({ reason, detail }))

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0

const freeze = (values: ReadonlyArray<number>): ReadonlyArray<number> => Object.freeze(Array.from(values))

const classify = (matrix: ReadonlyArray<ReadonlyArray<number>>): TableauStructure => {
  let diagonal = false
  for (let i = 0; i < matrix.length; i += 1) {
    const row = matrix[i] ?? []
    for (let j = i + 1; j < row.length; j += 1) {
      if (row[j] !== 0) {
        return TableauStructure.Implicit({ diagonal: false })
      }
    }
    if ((row[i] ?? 0) !== 0) {
      diagonal = true
    }
  }
  return diagonal ? TableauStructure.Implicit({ diagonal: true }) : TableauStructure.Explicit()
}

const validate = (coefficients: TableauCoefficients): Either.Either<TableauFields, ConfigurationError> => {
  const stages = coefficients.stages ?? coefficients.weights.length
  if (!isPositiveInteger(stages)) {
    return fail("StageCount", `stage count must be a positive integer, got ${stages}`)
  }
  if (coefficients.nodes.length !== stages) {
    return fail("NodesDimension", `expected ${stages} nodes, got ${coefficients.nodes.length}`)
  }
  if (coefficients.matrix.length !== stages) {
    return fail("MatrixDimension", `expected ${stages} matrix rows, got ${coefficients.matrix.length}`)
  }
  for (let i = 0; i < stages; i += 1) {
    const length = coefficients.matrix[i]?.length ?? 0
    if (length !== stages) {
      return fail("MatrixDimension", `matrix row ${i} has ${length} entries, expected ${stages}`)
    }
  }
  if (coefficients.weights.length !== stages) {
    return fail("WeightsDimension", `expected ${stages} weights, got ${coefficients.weights.length}`)
  }
  const embedded = coefficients.embeddedWeights
  if (embedded !== undefined && embedded.length !== stages) {
    return fail("EmbeddedWeightsDimension", `expected ${stages} embedded weights, got ${embedded.length}`)
  }

  const all = [
    ...coefficients.nodes,
    ...coefficients.matrix.flat(),
    ...coefficients.weights,
    ...(embedded ?? []),
  ]
  if (!all.every(Number.isFinite)) {
    return fail("NonFiniteCoefficient", `tableau "${coefficients.name}" contains a non-finite coefficient`)
  }

  if (!isPositiveInteger(coefficients.order)) {
    return fail("Order", `order must be a positive integer, got ${coefficients.order}`)
  }
  const embeddedOrder = coefficients.embeddedOrder
  if (embeddedOrder !== undefined) {
    if (embedded === undefined) {
      return fail("Order", "embedded order given without embedded weights")
    }
    if (!isPositiveInteger(embeddedOrder)) {
      return fail("Order", `embedded order must be a positive integer, got ${embeddedOrder}`)
    }
  }

  const matrix = Object.freeze(coefficients.matrix.map(freeze))
  const structure = classify(matrix)
  if (coefficients.explicit === true && structure._tag !== "Explicit") {
    return fail("NonLowerTriangularMatrix", `tableau "${coefficients.name}" is declared explicit but its matrix is not strictly lower triangular`)
  }

  return Either.right({
    name: coefficients.name,
    order: coefficients.order,
    embeddedOrder: embedded === undefined
      ? Option.none()
      : Option.some(embeddedOrder ?? Math.max(1, coefficients.order - 1)),
    stages,
    nodes: freeze(coefficients.nodes),
    matrix,
    weights: freeze(coefficients.weights),
    embeddedWeights: embedded === undefined ? Option.none() : Option.some(freeze(embedded)),
    structure,
  })
}

interface TableauFields {
  readonly name: string
  readonly order: number
  readonly embeddedOrder: Option.Option<number>
  readonly stages: number
  readonly nodes: ReadonlyArray<number>
  readonly matrix: ReadonlyArray<ReadonlyArray<number>>
  readonly weights: ReadonlyArray<number>
  readonly embeddedWeights: Option.Option<ReadonlyArray<number>>
  readonly structure: TableauStructure
}

/**
 * Validated, immutable Butcher tableau.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const heun = yield* Tableau.make({
 *   name: "Heun",
 *   order: 2,
 *   nodes: [0, 1],
 *   matrix: [[0, 0], [1, 0]],
 *   weights: [1 / 2, 1 / 2],
 * })
 * ```
 */
export class Tableau {
  readonly name: string
  /** Order `p` of the propagated solution. */
  readonly order: number
  readonly embeddedOrder: Option.Option<number>
  readonly stages: number
  readonly nodes: ReadonlyArray<number>
  readonly matrix: ReadonlyArray<ReadonlyArray<number>>
  readonly weights: ReadonlyArray<number>
  readonly embeddedWeights: Option.Option<ReadonlyArray<number>>
  readonly structure: TableauStructure
  /** Every `a[i][j]` is zero, so no stage depends on another. */
  readonly uncoupled: boolean
  /** `b*_i - b_i`, present with the embedded method. */
  readonly weightDifferences: Option.Option<ReadonlyArray<number>>

  private constructor(fields: TableauFields) {
    this.name = fields.name
    this.order = fields.order
    this.embeddedOrder = fields.embeddedOrder
    this.stages = fields.stages
    this.nodes = fields.nodes
    this.matrix = fields.matrix
    this.weights = fields.weights
    this.embeddedWeights = fields.embeddedWeights
    this.structure = fields.structure
    this.uncoupled = fields.matrix.every((row) => row.every((value) => value === 0))
    this.weightDifferences = Option.map(fields.embeddedWeights, (embedded) =>
      freeze(embedded.map((value, index) => value - (fields.weights[index] ?? 0))),
    )
    Object.freeze(this)
  }

  /**
   * Validate raw coefficients.
   */
  static make(coefficients: TableauCoefficients): Effect.Effect<Tableau, ConfigurationError> {
    return Effect.gen(function* () {
      const fields = yield* validate(coefficients)
      return new Tableau(fields)
    })
  }

  /**
   * Decode coefficients from an untyped source (for example parsed JSON)
   * and validate them.
   */
  static decode(input: unknown): Effect.Effect<Tableau, ConfigurationError> {
    return Schema.decodeUnknown(TableauCoefficients)(input).pipe(
      Effect.mapError(
        (error) =>
          new ConfigurationError({
            reason: "InvalidCoefficients",
            detail: ParseResult.TreeFormatter.formatErrorSync(error),
          }),
      ),
      Effect.flatMap((coefficients) => Tableau.make(coefficients)),
    )
  }

  /**
   * Build a tableau from coefficients known to be valid. Throws the
   * `ConfigurationError` otherwise.
   */
  static unsafeMake(coefficients: TableauCoefficients): Tableau {
    const fields = Either.getOrThrowWith(validate(coefficients), (error) => error)
    return new Tableau(fields)
  }

  /** Node `c_i`. */
  node(index: number): number {
    return this.nodes[index] ?? 0
  }

  /** Row `a_i`. */
  row(index: number): ReadonlyArray<number> {
    return this.matrix[index] ?? []
  }

  hasEmbeddedMethod(): boolean {
    return Option.isSome(this.embeddedWeights)
  }

  get isExplicit(): boolean {
    return this.structure._tag === "Explicit"
  }

  /**
   * Order used by the step controller's exponent: the lower of the two
   * orders of an embedded pair, or the method order otherwise.
   */
  get errorOrder(): number {
    return Option.match(this.embeddedOrder, {
      onNone: () => this.order,
      onSome: (embedded) => Math.min(this.order, embedded),
    })
  }

  /**
   * Encode back to raw coefficients.
   */
  toCoefficients(): TableauCoefficients {
    return {
      name: this.name,
      order: this.order,
      stages: this.stages,
      nodes: this.nodes,
      matrix: this.matrix,
      weights: this.weights,
      ...Option.match(this.embeddedWeights, {
        onNone: () => ({}),
        onSome: (embeddedWeights) => ({ embeddedWeights }),
      }),
      ...Option.match(this.embeddedOrder, {
        onNone: () => ({}),
        onSome: (embeddedOrder) => ({ embeddedOrder }),
      }),
    }
  }
}
