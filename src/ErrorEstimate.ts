/**
 * Embedded Error Estimation
 *
 * For a tableau carrying a second weight set `b*`, the difference between
 * the two solutions sharing the same stages estimates the local error:
 *
 *   e = h Σ_i (b*_i - b_i) k_i
 *
 * The scalar used for step control scales every component by its own
 * tolerance, `atol + rtol * max(|y|, |y_candidate|)`, and takes the maximum.
 *
 * @since 0.1.0
 */

import { Effect, Option } from "effect"
import { ConfigurationError } from "./Errors.js"
import type { SolverOptions } from "./Options.js"
import type { Tableau } from "./Tableau.js"
import type { VectorSpace } from "./Vector.js"
import { weightedErrorNorm, weightedSum } from "./internal/pure.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface ErrorEstimate<Y> {
  readonly error: Y
  /** Weighted max-norm; `<= 1` means the step is within tolerance. */
  readonly norm: number
}

/**
 * @category Models
 * @since 0.1.0
 */
export type Tolerances = Pick<SolverOptions, "absoluteTolerance" | "relativeTolerance">

/**
 * Weighted error norm of an arbitrary error vector.
 *
 * @category Error Estimation
 * @since 0.1.0
 */
export const errorNorm = <Y>(
  space: VectorSpace<Y>,
  error: Y,
  y: Y,
  candidate: Y,
  tolerances: Tolerances,
): number =>
  weightedErrorNorm(space, error, y, candidate, tolerances.absoluteTolerance, tolerances.relativeTolerance)

/**
 * Error estimate from precomputed weight differences `b* - b`.
 *
 * @category Error Estimation
 * @since 0.1.0
 */
export const estimateErrorWith = <Y>(
  space: VectorSpace<Y>,
  stages: ReadonlyArray<Y>,
  h: number,
  differences: ReadonlyArray<number>,
  y: Y,
  candidate: Y,
  tolerances: Tolerances,
): ErrorEstimate<Y> => {
  const error = weightedSum(space, stages, differences, h, y)
  return { error, norm: errorNorm(space, error, y, candidate, tolerances) }
}

/**
 * Estimate the local error of the step from `y` to `candidate`.
 *
 * Fails with `ConfigurationError` when the tableau has no embedded method;
 * the embedded solver rules this out when it is built.
 *
 * @category Error Estimation
 * @since 0.1.0
 */
export const estimateError = <Y>(
  space: VectorSpace<Y>,
  stages: ReadonlyArray<Y>,
  h: number,
  tableau: Tableau,
  y: Y,
  candidate: Y,
  tolerances: Tolerances,
): Effect.Effect<ErrorEstimate<Y>, ConfigurationError> =>
  Option.match(tableau.weightDifferences, {
    onNone: () =>
      Effect.fail(
        new ConfigurationError({
          reason: "MissingEmbeddedMethod",
          detail: `tableau "${tableau.name}" has no embedded weights`,
        }),
      ),
    onSome: (differences) =>
      Effect.succeed(estimateErrorWith(space, stages, h, differences, y, candidate, tolerances)),
  })
